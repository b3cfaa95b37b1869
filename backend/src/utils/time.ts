export const DAY_MS = 24 * 60 * 60 * 1000;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const addDays = (date: Date, days: number): Date => {
  return new Date(date.getTime() + days * DAY_MS);
};

/**
 * 두 시점 사이에 경과한 "완전한" 일수 (24시간 단위, 내림)
 */
export const wholeDaysBetween = (from: Date, to: Date): number => {
  const elapsed = to.getTime() - from.getTime();
  if (elapsed <= 0) {
    return 0;
  }
  return Math.floor(elapsed / DAY_MS);
};
