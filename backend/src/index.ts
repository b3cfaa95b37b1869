import type { Pool } from 'pg';
import { createPool, loadDatabaseConfig } from './config/database.js';
import {
  loadEnvironment,
  loadReminderConfig,
  loadSchedulingConfig
} from './config/scheduling.js';
import type { ReminderConfig, SchedulingConfig } from './config/scheduling.js';
import PgExposureStatsRepository from './database/exposureStatsRepository.js';
import PgReviewProgressRepository from './database/reviewProgressRepository.js';
import PgVocabularyCatalog from './database/vocabularyCatalog.js';
import FlashcardPriorityService from './services/flashcardPriorityService.js';
import ReviewReminderScheduler from './services/reviewScheduler.js';
import type { DueReviewNotifier } from './services/reviewScheduler.js';
import ReviewSchedulingService from './services/reviewSchedulingService.js';
import type { Clock } from './utils/time.js';

export * from './types/common.js';
export * from './types/store.js';
export * from './config/scheduling.js';
export {
  createPool,
  loadDatabaseConfig,
  checkDatabaseConnection,
  closeDatabaseConnection,
  withTransaction
} from './config/database.js';
export { logger, createModuleLogger } from './config/logger.js';
export { createError, isAppError } from './utils/errors.js';
export type { AppError, AppErrorCode } from './utils/errors.js';
export type { Clock } from './utils/time.js';
export { runMigrations, rollbackMigration, migrations } from './database/migrations.js';
export type { Migration } from './database/migrations.js';
export {
  SM2Algorithm,
  SM2_CONSTANTS,
  computeNextSchedule,
  qualityFromAnswer
} from './services/sm2Algorithm.js';
export type { SM2Options, SM2Result } from './services/sm2Algorithm.js';
export { ReviewSchedulingService } from './services/reviewSchedulingService.js';
export {
  FlashcardPriorityService,
  FLASHCARD_PRIORITY,
  feedbackPriority,
  isMastered,
  selectionPriority
} from './services/flashcardPriorityService.js';
export { ReviewReminderScheduler } from './services/reviewScheduler.js';
export type { DueReviewNotifier, ReminderJobStats } from './services/reviewScheduler.js';
export {
  PgExposureStatsRepository,
  PgReviewProgressRepository,
  PgVocabularyCatalog
};

export interface VocabularyCoreOptions {
  pool: Pool;
  config?: SchedulingConfig;
  reminders?: ReminderConfig;
  notifier?: DueReviewNotifier;
  clock?: Clock;
}

export interface VocabularyCore {
  reviews: ReviewSchedulingService;
  flashcards: FlashcardPriorityService;
  // notifier가 주어진 경우에만 생성
  reminders: ReviewReminderScheduler | null;
}

/**
 * PostgreSQL 풀 위에 스케줄링 서비스들을 조립합니다
 */
export const createVocabularyCore = ({
  pool,
  config = loadSchedulingConfig(),
  reminders = loadReminderConfig(),
  notifier,
  clock
}: VocabularyCoreOptions): VocabularyCore => {
  const progressStore = new PgReviewProgressRepository(pool);
  const statsStore = new PgExposureStatsRepository(pool);
  const catalog = new PgVocabularyCatalog(pool);

  return {
    reviews: new ReviewSchedulingService({ store: progressStore, config, clock }),
    flashcards: new FlashcardPriorityService({ store: statsStore, catalog, config, clock }),
    reminders: notifier
      ? new ReviewReminderScheduler({ store: progressStore, notifier, config: reminders, clock })
      : null
  };
};

/**
 * .env 를 읽어 풀과 서비스를 함께 생성합니다
 */
export const createVocabularyCoreFromEnv = (
  notifier?: DueReviewNotifier,
  envPath?: string
): VocabularyCore & { pool: Pool } => {
  const env = loadEnvironment(envPath);
  const pool = createPool(loadDatabaseConfig(env));
  return {
    pool,
    ...createVocabularyCore({
      pool,
      config: loadSchedulingConfig(env),
      reminders: loadReminderConfig(env),
      notifier
    })
  };
};
