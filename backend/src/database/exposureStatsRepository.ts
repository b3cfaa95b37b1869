import type { Pool, PoolClient, QueryResultRow } from 'pg';
import { withTransaction } from '../config/database.js';
import type { ExposureStats, NewExposureStats } from '../types/common.js';
import type { ExposureStatsStore } from '../types/store.js';

type ExposureStatsRow = {
  id: number;
  user_id: number;
  item_id: number;
  know_count: number;
  dont_know_count: number;
  last_shown: Date | null;
  priority_score: number;
};

const COLUMNS = 'id, user_id, item_id, know_count, dont_know_count, last_shown, priority_score';

export const toExposureStats = (row: ExposureStatsRow): ExposureStats => ({
  id: row.id,
  userId: row.user_id,
  itemId: row.item_id,
  knowCount: row.know_count,
  dontKnowCount: row.dont_know_count,
  lastShown: row.last_shown,
  priorityScore: row.priority_score
});

/**
 * exposure_stats 테이블 저장소 (플래시카드 학습 통계)
 */
export class PgExposureStatsRepository implements ExposureStatsStore {
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

  async findByUser(userId: number): Promise<ExposureStats[]> {
    const { rows } = await this.run<ExposureStatsRow>(
      `SELECT ${COLUMNS} FROM exposure_stats WHERE user_id = $1 ORDER BY item_id`,
      [userId]
    );
    return rows.map(toExposureStats);
  }

  async findByUserAndItems(userId: number, itemIds: number[]): Promise<ExposureStats[]> {
    if (itemIds.length === 0) {
      return [];
    }
    const lock = this.client ? ' FOR UPDATE' : '';
    const { rows } = await this.run<ExposureStatsRow>(
      `SELECT ${COLUMNS} FROM exposure_stats
       WHERE user_id = $1 AND item_id = ANY($2::int[])
       ORDER BY item_id${lock}`,
      [userId, itemIds]
    );
    return rows.map(toExposureStats);
  }

  async findById(id: number): Promise<ExposureStats | null> {
    const lock = this.client ? ' FOR UPDATE' : '';
    const { rows } = await this.run<ExposureStatsRow>(
      `SELECT ${COLUMNS} FROM exposure_stats WHERE id = $1${lock}`,
      [id]
    );
    return rows.length > 0 ? toExposureStats(rows[0]) : null;
  }

  async insert(record: NewExposureStats): Promise<ExposureStats> {
    // 동시에 같은 단어가 선택된 경우 기존 행을 그대로 돌려받습니다
    const { rows } = await this.run<ExposureStatsRow>(
      `INSERT INTO exposure_stats (user_id, item_id, know_count, dont_know_count, last_shown, priority_score)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (user_id, item_id) DO UPDATE SET updated_at = exposure_stats.updated_at
       RETURNING ${COLUMNS}`,
      [
        record.userId,
        record.itemId,
        record.knowCount,
        record.dontKnowCount,
        record.lastShown,
        record.priorityScore
      ]
    );
    return toExposureStats(rows[0]);
  }

  async update(record: ExposureStats): Promise<void> {
    await this.run(
      `UPDATE exposure_stats SET
         know_count = $2,
         dont_know_count = $3,
         last_shown = $4,
         priority_score = $5,
         updated_at = NOW()
       WHERE id = $1`,
      [record.id, record.knowCount, record.dontKnowCount, record.lastShown, record.priorityScore]
    );
  }

  async delete(id: number): Promise<boolean> {
    const { rowCount } = await this.run('DELETE FROM exposure_stats WHERE id = $1', [id]);
    return rowCount > 0;
  }

  async transaction<T>(work: (store: ExposureStatsStore) => Promise<T>): Promise<T> {
    if (this.client) {
      return work(this);
    }
    return withTransaction(this.pool, (client) => work(new PgExposureStatsRepository(this.pool, client)));
  }
}

export default PgExposureStatsRepository;
