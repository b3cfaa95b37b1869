import type {
  DifficultyTier,
  DueUserSummary,
  ExposureStats,
  NewExposureStats,
  NewReviewProgress,
  ReviewProgress,
  VocabularyItem
} from './common.js';

/**
 * SM-2 복습 진행 기록 저장소
 *
 * `transaction` 안에서 전달되는 저장소는 같은 트랜잭션을 공유하며,
 * `findById` 로 읽은 행은 트랜잭션이 끝날 때까지 잠깁니다.
 */
export interface ReviewProgressStore {
  findByUser(userId: number): Promise<ReviewProgress[]>;
  /** next_review_time <= now, 오래된 순, 최대 limit개 */
  findDue(userId: number, now: Date, limit: number): Promise<ReviewProgress[]>;
  findById(id: number): Promise<ReviewProgress | null>;
  findByUserAndItem(userId: number, itemId: number): Promise<ReviewProgress | null>;
  /** 같은 (userId, itemId) 기록이 이미 있으면 null */
  insert(record: NewReviewProgress): Promise<ReviewProgress | null>;
  update(record: ReviewProgress): Promise<void>;
  delete(id: number): Promise<boolean>;
  findUsersWithDueItems(now: Date): Promise<DueUserSummary[]>;
  transaction<T>(work: (store: ReviewProgressStore) => Promise<T>): Promise<T>;
}

/**
 * 플래시카드 노출 통계 저장소
 */
export interface ExposureStatsStore {
  findByUser(userId: number): Promise<ExposureStats[]>;
  findByUserAndItems(userId: number, itemIds: number[]): Promise<ExposureStats[]>;
  findById(id: number): Promise<ExposureStats | null>;
  insert(record: NewExposureStats): Promise<ExposureStats>;
  update(record: ExposureStats): Promise<void>;
  delete(id: number): Promise<boolean>;
  transaction<T>(work: (store: ExposureStatsStore) => Promise<T>): Promise<T>;
}

export interface VocabularyCatalog {
  /** id 오름차순 */
  listByTiers(tiers: DifficultyTier[], excludeIds?: number[]): Promise<VocabularyItem[]>;
  countByTiers(tiers: DifficultyTier[]): Promise<number>;
}
