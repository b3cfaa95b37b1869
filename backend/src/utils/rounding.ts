/**
 * 가장 가까운 정수로 반올림하되, 정확히 .5 인 경우 짝수 쪽으로 보냅니다 (banker's rounding)
 */
export const roundHalfToEven = (value: number): number => {
  const floor = Math.floor(value);
  const fraction = value - floor;

  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
};
