import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createModuleLogger } from '../config/logger.js';
import { DEFAULT_REMINDER_CONFIG } from '../config/scheduling.js';
import type { ReminderConfig } from '../config/scheduling.js';
import type { ReviewProgressStore } from '../types/store.js';
import { createError } from '../utils/errors.js';
import { systemClock } from '../utils/time.js';
import type { Clock } from '../utils/time.js';

const logger = createModuleLogger('review-reminder');

/** 복습할 단어가 있는 사용자에게 알림을 보내는 콜백 (채팅 레이어가 구현) */
export type DueReviewNotifier = (userId: number, dueCount: number) => Promise<void>;

export interface ReminderJobStats {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  lastRunTime: Date | null;
  lastNotifiedUsers: number;
}

export interface ReviewReminderDependencies {
  store: ReviewProgressStore;
  notifier: DueReviewNotifier;
  config?: ReminderConfig;
  clock?: Clock;
}

/**
 * 복습 알림 스케줄러
 * Cron job으로 주기적으로 복습 시점이 된 사용자를 찾아 알립니다
 */
export class ReviewReminderScheduler {
  private readonly store: ReviewProgressStore;
  private readonly notifier: DueReviewNotifier;
  private readonly config: ReminderConfig;
  private readonly now: Clock;
  private task: ScheduledTask | null = null;
  private running = false;
  private jobStats: ReminderJobStats = {
    totalRuns: 0,
    successfulRuns: 0,
    failedRuns: 0,
    lastRunTime: null,
    lastNotifiedUsers: 0
  };

  constructor({ store, notifier, config = DEFAULT_REMINDER_CONFIG, clock = systemClock }: ReviewReminderDependencies) {
    if (!cron.validate(config.cronExpression)) {
      throw createError(`Invalid cron expression: "${config.cronExpression}"`, 'INVALID_CONFIG');
    }
    this.store = store;
    this.notifier = notifier;
    this.config = config;
    this.now = clock;
  }

  public start(): void {
    if (!this.config.enabled) {
      logger.info('Review reminders are disabled');
      return;
    }
    if (this.task) {
      return;
    }

    this.task = cron.schedule(
      this.config.cronExpression,
      () => {
        void this.tick();
      },
      { timezone: this.config.timezone }
    );

    logger.info(`Review reminder job registered (${this.config.cronExpression})`);
  }

  public stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('Review reminder job stopped');
    }
  }

  public isScheduled(): boolean {
    return this.task !== null;
  }

  /**
   * 복습할 단어가 있는 모든 사용자에게 알림을 보내고, 알림을 받은 사용자 수를 반환합니다
   */
  public async runCheck(): Promise<number> {
    const dueUsers = await this.store.findUsersWithDueItems(this.now());
    let notified = 0;

    for (const { userId, dueCount } of dueUsers) {
      try {
        await this.notifier(userId, dueCount);
        notified++;
      } catch (error) {
        // 실패한 사용자는 로그만 남기고 다음 사용자로 진행
        logger.warn(`Failed to notify user ${userId} about ${dueCount} due review(s)`, error);
      }
    }

    logger.info(`Review reminder check finished: ${notified}/${dueUsers.length} user(s) notified`);
    return notified;
  }

  public getStats(): ReminderJobStats {
    return { ...this.jobStats };
  }

  private async tick(): Promise<void> {
    if (this.running) {
      logger.warn('Review reminder check already running, skipping...');
      return;
    }

    this.running = true;
    this.jobStats.totalRuns++;
    this.jobStats.lastRunTime = this.now();

    try {
      this.jobStats.lastNotifiedUsers = await this.runCheck();
      this.jobStats.successfulRuns++;
    } catch (error) {
      logger.error('Review reminder check failed:', error);
      this.jobStats.failedRuns++;
    } finally {
      this.running = false;
    }
  }
}

export default ReviewReminderScheduler;
