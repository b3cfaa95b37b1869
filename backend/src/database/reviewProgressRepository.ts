import type { Pool, PoolClient, QueryResultRow } from 'pg';
import { withTransaction } from '../config/database.js';
import type { DueUserSummary, NewReviewProgress, ReviewProgress } from '../types/common.js';
import type { ReviewProgressStore } from '../types/store.js';

type ReviewProgressRow = {
  id: number;
  user_id: number;
  item_id: number;
  repetitions: number;
  easiness_factor: number;
  interval_days: number;
  next_review_time: Date;
  last_quality: number;
  last_reviewed: Date | null;
  times_reviewed: number;
  times_correct: number;
  times_wrong: number;
  srs_stage: number;
};

const COLUMNS = `
  id, user_id, item_id, repetitions, easiness_factor, interval_days, next_review_time,
  last_quality, last_reviewed, times_reviewed, times_correct, times_wrong, srs_stage
`;

export const toReviewProgress = (row: ReviewProgressRow): ReviewProgress => ({
  id: row.id,
  userId: row.user_id,
  itemId: row.item_id,
  repetitions: row.repetitions,
  easinessFactor: row.easiness_factor,
  intervalDays: row.interval_days,
  nextReviewTime: row.next_review_time,
  lastQuality: row.last_quality,
  lastReviewed: row.last_reviewed,
  timesReviewed: row.times_reviewed,
  timesCorrect: row.times_correct,
  timesWrong: row.times_wrong,
  stage: row.srs_stage
});

/**
 * review_progress 테이블 저장소.
 * client가 주어지면 해당 트랜잭션 안에서 동작하고 findById는 행을 잠급니다 (FOR UPDATE)
 */
export class PgReviewProgressRepository implements ReviewProgressStore {
  constructor(
    private readonly pool: Pool,
    private readonly client: PoolClient | null = null
  ) {}

  private async run<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<{ rows: R[]; rowCount: number }> {
    const result = this.client
      ? await this.client.query<R>(text, values)
      : await this.pool.query<R>(text, values);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }

  async findByUser(userId: number): Promise<ReviewProgress[]> {
    const { rows } = await this.run<ReviewProgressRow>(
      `SELECT ${COLUMNS} FROM review_progress WHERE user_id = $1 ORDER BY id`,
      [userId]
    );
    return rows.map(toReviewProgress);
  }

  async findDue(userId: number, now: Date, limit: number): Promise<ReviewProgress[]> {
    const { rows } = await this.run<ReviewProgressRow>(
      `SELECT ${COLUMNS} FROM review_progress
       WHERE user_id = $1 AND next_review_time <= $2
       ORDER BY next_review_time ASC, id ASC
       LIMIT $3`,
      [userId, now, limit]
    );
    return rows.map(toReviewProgress);
  }

  async findById(id: number): Promise<ReviewProgress | null> {
    const lock = this.client ? ' FOR UPDATE' : '';
    const { rows } = await this.run<ReviewProgressRow>(
      `SELECT ${COLUMNS} FROM review_progress WHERE id = $1${lock}`,
      [id]
    );
    return rows.length > 0 ? toReviewProgress(rows[0]) : null;
  }

  async findByUserAndItem(userId: number, itemId: number): Promise<ReviewProgress | null> {
    const { rows } = await this.run<ReviewProgressRow>(
      `SELECT ${COLUMNS} FROM review_progress WHERE user_id = $1 AND item_id = $2`,
      [userId, itemId]
    );
    return rows.length > 0 ? toReviewProgress(rows[0]) : null;
  }

  async insert(record: NewReviewProgress): Promise<ReviewProgress | null> {
    const { rows } = await this.run<ReviewProgressRow>(
      `INSERT INTO review_progress (
         user_id, item_id, repetitions, easiness_factor, interval_days, next_review_time,
         last_quality, last_reviewed, times_reviewed, times_correct, times_wrong, srs_stage
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       ON CONFLICT (user_id, item_id) DO NOTHING
       RETURNING ${COLUMNS}`,
      [
        record.userId,
        record.itemId,
        record.repetitions,
        record.easinessFactor,
        record.intervalDays,
        record.nextReviewTime,
        record.lastQuality,
        record.lastReviewed,
        record.timesReviewed,
        record.timesCorrect,
        record.timesWrong,
        record.stage
      ]
    );
    return rows.length > 0 ? toReviewProgress(rows[0]) : null;
  }

  async update(record: ReviewProgress): Promise<void> {
    await this.run(
      `UPDATE review_progress SET
         repetitions = $2,
         easiness_factor = $3,
         interval_days = $4,
         next_review_time = $5,
         last_quality = $6,
         last_reviewed = $7,
         times_reviewed = $8,
         times_correct = $9,
         times_wrong = $10,
         srs_stage = $11
       WHERE id = $1`,
      [
        record.id,
        record.repetitions,
        record.easinessFactor,
        record.intervalDays,
        record.nextReviewTime,
        record.lastQuality,
        record.lastReviewed,
        record.timesReviewed,
        record.timesCorrect,
        record.timesWrong,
        record.stage
      ]
    );
  }

  async delete(id: number): Promise<boolean> {
    const { rowCount } = await this.run('DELETE FROM review_progress WHERE id = $1', [id]);
    return rowCount > 0;
  }

  async findUsersWithDueItems(now: Date): Promise<DueUserSummary[]> {
    const { rows } = await this.run<{ user_id: number; due_count: number }>(
      `SELECT user_id, COUNT(*)::int AS due_count
       FROM review_progress
       WHERE next_review_time <= $1
       GROUP BY user_id
       ORDER BY user_id`,
      [now]
    );
    return rows.map(row => ({ userId: row.user_id, dueCount: row.due_count }));
  }

  async transaction<T>(work: (store: ReviewProgressStore) => Promise<T>): Promise<T> {
    if (this.client) {
      return work(this);
    }
    return withTransaction(this.pool, (client) => work(new PgReviewProgressRepository(this.pool, client)));
  }
}

export default PgReviewProgressRepository;
