import { createModuleLogger } from '../config/logger.js';
import { DEFAULT_SCHEDULING_CONFIG } from '../config/scheduling.js';
import type { SchedulingConfig } from '../config/scheduling.js';
import type { ReviewProgress, ReviewStats } from '../types/common.js';
import type { ReviewProgressStore } from '../types/store.js';
import { createError } from '../utils/errors.js';
import { addDays, systemClock } from '../utils/time.js';
import type { Clock } from '../utils/time.js';
import SM2Algorithm from './sm2Algorithm.js';

const logger = createModuleLogger('review-scheduling');

// srs stage 기준 통계 구간
const MASTERED_STAGE = 4;

export interface ReviewSchedulingDependencies {
  store: ReviewProgressStore;
  config?: SchedulingConfig;
  clock?: Clock;
}

/**
 * 복습 스케줄링 서비스
 * SM-2 알고리즘으로 단어별 복습 일정을 관리하고, 복습 시점이 된 단어를 골라냅니다
 */
export class ReviewSchedulingService {
  private readonly store: ReviewProgressStore;
  private readonly config: SchedulingConfig;
  private readonly now: Clock;

  constructor({ store, config = DEFAULT_SCHEDULING_CONFIG, clock = systemClock }: ReviewSchedulingDependencies) {
    this.store = store;
    this.config = config;
    this.now = clock;
  }

  /**
   * 복습 시점이 지난 단어들을 가장 오래 밀린 순으로 조회합니다
   */
  async getDueItems(userId: number, limit: number = this.config.maxReviewsPerSession): Promise<ReviewProgress[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw createError(`Limit must be a non-negative integer, got ${limit}`);
    }
    if (limit === 0) {
      return [];
    }

    const now = this.now();
    const dueItems = await this.store.findDue(userId, now, limit);

    // 저장소 구현과 무관하게 미래 항목과 초과분은 걸러냅니다
    return dueItems
      .filter(item => item.nextReviewTime.getTime() <= now.getTime())
      .sort((a, b) => a.nextReviewTime.getTime() - b.nextReviewTime.getTime())
      .slice(0, limit);
  }

  /**
   * 답변 결과를 반영해 복습 일정을 갱신합니다.
   * 기록이 없으면 (오래된 id) 아무 것도 하지 않고 null을 반환합니다
   */
  async applyAnswer(progressId: number, quality: number, wasCorrect: boolean): Promise<ReviewProgress | null> {
    SM2Algorithm.assertValidQuality(quality);

    try {
      const updated = await this.store.transaction(async (tx) => {
        const progress = await tx.findById(progressId);
        if (!progress) {
          return null;
        }

        const schedule = SM2Algorithm.computeNextSchedule(
          quality,
          progress.repetitions,
          progress.easinessFactor,
          progress.intervalDays,
          this.config
        );
        const now = this.now();

        const next: ReviewProgress = {
          ...progress,
          lastQuality: quality,
          intervalDays: schedule.intervalDays,
          easinessFactor: schedule.easinessFactor,
          repetitions: schedule.repetitions,
          nextReviewTime: addDays(now, schedule.intervalDays),
          lastReviewed: now,
          timesReviewed: progress.timesReviewed + 1,
          timesCorrect: progress.timesCorrect + (wasCorrect ? 1 : 0),
          timesWrong: progress.timesWrong + (wasCorrect ? 0 : 1),
          stage: SM2Algorithm.stageFor(schedule.repetitions)
        };

        await tx.update(next);
        return next;
      });

      if (!updated) {
        logger.debug(`Progress ${progressId} not found, answer ignored`);
        return null;
      }

      logger.info(
        `Review applied: progress ${progressId}, quality ${quality}, next in ${updated.intervalDays} day(s)`
      );
      return updated;

    } catch (error) {
      logger.error(`Error applying answer to progress ${progressId}:`, error);
      throw error;
    }
  }

  /**
   * 단어를 사용자의 학습 목록에 추가합니다. 이미 있으면 null을 반환합니다
   */
  async addItemToUser(userId: number, itemId: number): Promise<ReviewProgress | null> {
    const existing = await this.store.findByUserAndItem(userId, itemId);
    if (existing) {
      return null;
    }

    const created = await this.store.insert({
      userId,
      itemId,
      repetitions: 0,
      easinessFactor: this.config.initialEasiness,
      intervalDays: 0,
      // 바로 복습 대상
      nextReviewTime: this.now(),
      lastQuality: 0,
      lastReviewed: null,
      timesReviewed: 0,
      timesCorrect: 0,
      timesWrong: 0,
      stage: 0
    });

    if (created) {
      logger.info(`Item ${itemId} added to review list of user ${userId}`);
    }
    return created;
  }

  async removeItemFromUser(userId: number, itemId: number): Promise<boolean> {
    const existing = await this.store.findByUserAndItem(userId, itemId);
    if (!existing) {
      return false;
    }

    const removed = await this.store.delete(existing.id);
    if (removed) {
      logger.info(`Item ${itemId} removed from review list of user ${userId}`);
    }
    return removed;
  }

  /**
   * 사용자의 복습 현황 통계
   */
  async getReviewStats(userId: number): Promise<ReviewStats> {
    const records = await this.store.findByUser(userId);
    const now = this.now().getTime();

    return records.reduce<ReviewStats>(
      (stats, record) => ({
        total: stats.total + 1,
        dueNow: stats.dueNow + (record.nextReviewTime.getTime() <= now ? 1 : 0),
        mastered: stats.mastered + (record.stage >= MASTERED_STAGE ? 1 : 0),
        learning: stats.learning + (record.stage > 0 && record.stage < MASTERED_STAGE ? 1 : 0),
        new: stats.new + (record.stage === 0 ? 1 : 0)
      }),
      { total: 0, dueNow: 0, mastered: 0, learning: 0, new: 0 }
    );
  }
}

export default ReviewSchedulingService;
