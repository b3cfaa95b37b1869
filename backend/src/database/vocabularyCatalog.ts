import type { Pool } from 'pg';
import type { DifficultyTier, VocabularyItem } from '../types/common.js';
import type { VocabularyCatalog } from '../types/store.js';

type VocabularyRow = {
  id: number;
  word: string;
  translation: string;
  difficulty_level: string;
  category: string | null;
  example_sentence: string | null;
};

const toVocabularyItem = (row: VocabularyRow): VocabularyItem => ({
  id: row.id,
  word: row.word,
  translation: row.translation,
  difficultyTier: row.difficulty_level,
  category: row.category,
  exampleSentence: row.example_sentence
});

export class PgVocabularyCatalog implements VocabularyCatalog {
  constructor(private readonly pool: Pool) {}

  async listByTiers(tiers: DifficultyTier[], excludeIds: number[] = []): Promise<VocabularyItem[]> {
    if (tiers.length === 0) {
      return [];
    }
    const { rows } = await this.pool.query<VocabularyRow>(
      `SELECT id, word, translation, difficulty_level, category, example_sentence
       FROM vocabulary
       WHERE difficulty_level = ANY($1::text[])
         AND NOT (id = ANY($2::int[]))
       ORDER BY id ASC`,
      [tiers, excludeIds]
    );
    return rows.map(toVocabularyItem);
  }

  async countByTiers(tiers: DifficultyTier[]): Promise<number> {
    if (tiers.length === 0) {
      return 0;
    }
    const { rows } = await this.pool.query<{ total: number }>(
      'SELECT COUNT(*)::int AS total FROM vocabulary WHERE difficulty_level = ANY($1::text[])',
      [tiers]
    );
    return rows[0]?.total ?? 0;
  }
}

export default PgVocabularyCatalog;
