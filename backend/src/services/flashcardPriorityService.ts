import { createModuleLogger } from '../config/logger.js';
import { DEFAULT_SCHEDULING_CONFIG } from '../config/scheduling.js';
import type { SchedulingConfig } from '../config/scheduling.js';
import type { ExposureStats, FlashcardSelection, LearningStats, VocabularyItem } from '../types/common.js';
import type { ExposureStatsStore, VocabularyCatalog } from '../types/store.js';
import { systemClock, wholeDaysBetween } from '../utils/time.js';
import type { Clock } from '../utils/time.js';

const logger = createModuleLogger('flashcard-priority');

export const FLASHCARD_PRIORITY = {
  NEW_ITEM: 100.0,

  // 선택 시점 가중치 (최근성 중시)
  SELECTION_DONT_KNOW_WEIGHT: 3.0,
  SELECTION_KNOW_WEIGHT: 1.0,
  SELECTION_DAY_WEIGHT: 2.0,
  SELECTION_BASE: 10.0,
  SELECTION_FLOOR: 0.0,

  // 피드백 시점 가중치 (오답 누적 시 급격히 상승)
  FEEDBACK_BASE: 100.0,
  FEEDBACK_MISTAKE_EXPONENT: 1.5,
  FEEDBACK_MISTAKE_WEIGHT: 20,
  FEEDBACK_KNOWN_EXPONENT: 0.8,
  FEEDBACK_KNOWN_WEIGHT: 8,
  MASTERY_PENALTY: 50,
  FEEDBACK_FLOOR: 1.0,

  MASTERY_KNOW_COUNT: 3
} as const;

type Counts = Pick<ExposureStats, 'knowCount' | 'dontKnowCount'>;

/** 3번 이상 알았고 한 번도 틀리지 않은 단어 */
export const isMastered = ({ knowCount, dontKnowCount }: Counts): boolean => {
  return knowCount >= FLASHCARD_PRIORITY.MASTERY_KNOW_COUNT && dontKnowCount === 0;
};

/**
 * 다음 카드를 고를 때의 우선순위
 */
export const selectionPriority = (stats: Counts, daysSinceLastShown: number): number => {
  const priority =
    stats.dontKnowCount * FLASHCARD_PRIORITY.SELECTION_DONT_KNOW_WEIGHT -
    stats.knowCount * FLASHCARD_PRIORITY.SELECTION_KNOW_WEIGHT +
    daysSinceLastShown * FLASHCARD_PRIORITY.SELECTION_DAY_WEIGHT +
    FLASHCARD_PRIORITY.SELECTION_BASE;
  return Math.max(FLASHCARD_PRIORITY.SELECTION_FLOOR, priority);
};

/**
 * 사용자가 "안다/모른다"를 누른 직후의 우선순위.
 * 오답 횟수에 대해 selectionPriority 보다 가파르게 증가합니다
 */
export const feedbackPriority = (stats: Counts): number => {
  const mistakeBonus =
    stats.dontKnowCount ** FLASHCARD_PRIORITY.FEEDBACK_MISTAKE_EXPONENT * FLASHCARD_PRIORITY.FEEDBACK_MISTAKE_WEIGHT;
  let knowledgePenalty =
    stats.knowCount ** FLASHCARD_PRIORITY.FEEDBACK_KNOWN_EXPONENT * FLASHCARD_PRIORITY.FEEDBACK_KNOWN_WEIGHT;

  if (isMastered(stats)) {
    knowledgePenalty += FLASHCARD_PRIORITY.MASTERY_PENALTY;
  }

  const priority = FLASHCARD_PRIORITY.FEEDBACK_BASE + mistakeBonus - knowledgePenalty;
  return Math.max(FLASHCARD_PRIORITY.FEEDBACK_FLOOR, priority);
};

export interface FlashcardPriorityDependencies {
  store: ExposureStatsStore;
  catalog: VocabularyCatalog;
  config?: SchedulingConfig;
  clock?: Clock;
}

/**
 * 플래시카드 학습 서비스
 * 처음 배우는 단어들 중 가장 급한 단어를 골라 보여주고, 사용자 피드백으로 우선순위를 갱신합니다
 */
export class FlashcardPriorityService {
  private readonly store: ExposureStatsStore;
  private readonly catalog: VocabularyCatalog;
  private readonly config: SchedulingConfig;
  private readonly now: Clock;

  constructor({
    store,
    catalog,
    config = DEFAULT_SCHEDULING_CONFIG,
    clock = systemClock
  }: FlashcardPriorityDependencies) {
    this.store = store;
    this.catalog = catalog;
    this.config = config;
    this.now = clock;
  }

  /**
   * 우선순위가 가장 높은 다음 단어를 선택합니다. 후보가 없으면 null
   */
  async selectNext(userId: number, excludeIds: number[] = []): Promise<FlashcardSelection | null> {
    const items = await this.catalog.listByTiers(this.config.flashcardTiers, excludeIds);
    const excluded = new Set(excludeIds);
    const candidates = items
      .filter(item => !excluded.has(item.id))
      .sort((a, b) => a.id - b.id);

    if (candidates.length === 0) {
      return null;
    }

    try {
      return await this.store.transaction(async (tx) => {
        const existing = await tx.findByUserAndItems(userId, candidates.map(item => item.id));
        const statsByItem = new Map(existing.map(stats => [stats.itemId, stats]));
        const now = this.now();

        let best: { item: VocabularyItem; priority: number } | null = null;
        const changed: ExposureStats[] = [];

        for (const item of candidates) {
          const stats = statsByItem.get(item.id);
          let priority: number;

          if (!stats) {
            priority = FLASHCARD_PRIORITY.NEW_ITEM;
          } else {
            const days = stats.lastShown ? wholeDaysBetween(stats.lastShown, now) : 0;
            priority = selectionPriority(stats, days);
            if (priority !== stats.priorityScore) {
              const updated = { ...stats, priorityScore: priority };
              statsByItem.set(item.id, updated);
              changed.push(updated);
            }
          }

          // 동점이면 먼저 나온 (id가 작은) 단어
          if (best === null || priority > best.priority) {
            best = { item, priority };
          }
        }

        for (const stats of changed) {
          await tx.update(stats);
        }

        if (best === null) {
          return null;
        }
        const { item, priority } = best;
        const stats = statsByItem.get(item.id) ?? await tx.insert({
          userId,
          itemId: item.id,
          knowCount: 0,
          dontKnowCount: 0,
          lastShown: null,
          priorityScore: priority
        });

        logger.debug(`Selected item ${item.id} for user ${userId} (priority ${priority})`);
        return { item, stats };
      });

    } catch (error) {
      logger.error(`Error selecting next flashcard for user ${userId}:`, error);
      throw error;
    }
  }

  /**
   * 사용자의 "안다/모른다" 응답을 기록합니다. 기록이 없으면 null
   */
  async recordFeedback(statsId: number, knowsWord: boolean): Promise<ExposureStats | null> {
    try {
      const updated = await this.store.transaction(async (tx) => {
        const stats = await tx.findById(statsId);
        if (!stats) {
          return null;
        }

        const counts = {
          knowCount: stats.knowCount + (knowsWord ? 1 : 0),
          dontKnowCount: stats.dontKnowCount + (knowsWord ? 0 : 1)
        };
        const next: ExposureStats = {
          ...stats,
          ...counts,
          lastShown: this.now(),
          priorityScore: feedbackPriority(counts)
        };

        await tx.update(next);
        return next;
      });

      if (!updated) {
        logger.debug(`Exposure stats ${statsId} not found, feedback ignored`);
      }
      return updated;

    } catch (error) {
      logger.error(`Error recording feedback for stats ${statsId}:`, error);
      throw error;
    }
  }

  async removeFlashcard(userId: number, itemId: number): Promise<boolean> {
    const [stats] = await this.store.findByUserAndItems(userId, [itemId]);
    if (!stats) {
      return false;
    }
    return this.store.delete(stats.id);
  }

  /**
   * 플래시카드 학습 현황 통계
   */
  async getLearningStats(userId: number): Promise<LearningStats> {
    const [records, totalAvailable] = await Promise.all([
      this.store.findByUser(userId),
      this.catalog.countByTiers(this.config.flashcardTiers)
    ]);

    const knownWords = records.filter(isMastered).length;
    const touched = records.filter(stats => stats.knowCount > 0 || stats.dontKnowCount > 0).length;

    return {
      totalWords: records.length,
      knownWords,
      learningWords: touched - knownWords,
      newWords: Math.max(0, totalAvailable - records.length)
    };
  }
}

export default FlashcardPriorityService;
