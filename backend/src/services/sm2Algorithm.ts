import { createError } from '../utils/errors.js';
import { roundHalfToEven } from '../utils/rounding.js';
import { DEFAULT_SCHEDULING_CONFIG } from '../config/scheduling.js';
import type { SchedulingConfig } from '../config/scheduling.js';

// SuperMemo-2 상수
export const SM2_CONSTANTS = {
  MIN_QUALITY: 0,
  MAX_QUALITY: 5,
  // 3 미만이면 lapse (기억 실패)
  PASSING_QUALITY: 3,
  // 단순 정답/오답을 품질 점수로 변환할 때 사용
  CORRECT_ANSWER_QUALITY: 4,   // 약간 망설였지만 정답
  WRONG_ANSWER_QUALITY: 1,     // 오답이지만 낯익음
  MAX_STAGE: 5
} as const;

export type SM2Options = Pick<
  SchedulingConfig,
  'minEasiness' | 'initialInterval' | 'graduationInterval' | 'maxIntervalDays'
>;

export interface SM2Result {
  intervalDays: number;
  easinessFactor: number;
  repetitions: number;
}

const DEFAULT_SM2_OPTIONS: SM2Options = {
  minEasiness: DEFAULT_SCHEDULING_CONFIG.minEasiness,
  initialInterval: DEFAULT_SCHEDULING_CONFIG.initialInterval,
  graduationInterval: DEFAULT_SCHEDULING_CONFIG.graduationInterval,
  maxIntervalDays: DEFAULT_SCHEDULING_CONFIG.maxIntervalDays
};

/**
 * SuperMemo-2 변형 알고리즘
 */
export class SM2Algorithm {

  static isValidQuality(quality: number): boolean {
    return (
      Number.isInteger(quality) &&
      quality >= SM2_CONSTANTS.MIN_QUALITY &&
      quality <= SM2_CONSTANTS.MAX_QUALITY
    );
  }

  static assertValidQuality(quality: number): void {
    if (!this.isValidQuality(quality)) {
      throw createError(`Quality must be an integer between 0 and 5, got ${quality}`);
    }
  }

  /**
   * 다음 복습 간격, 난이도 계수, 반복 횟수를 계산합니다
   * @param quality 회상 품질 (0 = 완전히 잊음, 5 = 완벽한 회상)
   * @param repetitions 마지막 실패 이후 연속 성공 횟수
   * @param easinessFactor 현재 난이도 계수
   * @param intervalDays 현재 복습 간격 (일)
   */
  static computeNextSchedule(
    quality: number,
    repetitions: number,
    easinessFactor: number,
    intervalDays: number,
    options: SM2Options = DEFAULT_SM2_OPTIONS
  ): SM2Result {
    this.assertValidQuality(quality);
    if (!Number.isInteger(repetitions) || repetitions < 0) {
      throw createError(`Repetitions must be a non-negative integer, got ${repetitions}`);
    }
    if (!Number.isInteger(intervalDays) || intervalDays < 0) {
      throw createError(`Interval must be a non-negative integer, got ${intervalDays}`);
    }
    if (!Number.isFinite(easinessFactor) || easinessFactor <= 0) {
      throw createError(`Easiness factor must be a positive number, got ${easinessFactor}`);
    }

    let nextRepetitions: number;
    let nextInterval: number;

    if (quality < SM2_CONSTANTS.PASSING_QUALITY) {
      // 실패: 처음부터 다시
      nextRepetitions = 0;
      nextInterval = 0;
    } else {
      if (repetitions === 0) {
        nextInterval = options.initialInterval;
      } else if (repetitions === 1) {
        nextInterval = options.graduationInterval;
      } else {
        nextInterval = roundHalfToEven(intervalDays * easinessFactor);
      }
      nextRepetitions = repetitions + 1;

      if (options.maxIntervalDays !== null) {
        nextInterval = Math.min(options.maxIntervalDays, nextInterval);
      }
    }

    return {
      intervalDays: nextInterval,
      easinessFactor: this.nextEasinessFactor(easinessFactor, quality, options.minEasiness),
      repetitions: nextRepetitions
    };
  }

  /**
   * 난이도 계수 갱신: EF' = EF + (0.1 - (5-q) * (0.08 + (5-q) * 0.02)), 하한 minEasiness
   */
  static nextEasinessFactor(easinessFactor: number, quality: number, minEasiness: number): number {
    const miss = SM2_CONSTANTS.MAX_QUALITY - quality;
    const updated = easinessFactor + (0.1 - miss * (0.08 + miss * 0.02));
    return Math.max(minEasiness, updated);
  }

  static qualityFromAnswer(isCorrect: boolean): number {
    return isCorrect ? SM2_CONSTANTS.CORRECT_ANSWER_QUALITY : SM2_CONSTANTS.WRONG_ANSWER_QUALITY;
  }

  static stageFor(repetitions: number): number {
    return Math.min(SM2_CONSTANTS.MAX_STAGE, repetitions);
  }
}

export const computeNextSchedule = (
  quality: number,
  repetitions: number,
  easinessFactor: number,
  intervalDays: number,
  options?: SM2Options
): SM2Result => SM2Algorithm.computeNextSchedule(quality, repetitions, easinessFactor, intervalDays, options);

export const qualityFromAnswer = (isCorrect: boolean): number => SM2Algorithm.qualityFromAnswer(isCorrect);

export default SM2Algorithm;
