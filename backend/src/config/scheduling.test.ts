import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SCHEDULING_CONFIG,
  loadReminderConfig,
  loadSchedulingConfig
} from './scheduling.js';
import { loadDatabaseConfig } from './database.js';

describe('loadSchedulingConfig', () => {
  it('falls back to defaults', () => {
    expect(loadSchedulingConfig({})).toEqual(DEFAULT_SCHEDULING_CONFIG);
  });

  it('reads values from the environment', () => {
    const config = loadSchedulingConfig({
      SRS_MIN_EASINESS: '1.5',
      SRS_INITIAL_EASINESS: '2.2',
      SRS_INITIAL_INTERVAL: '2',
      SRS_GRADUATION_INTERVAL: '4',
      SRS_MAX_INTERVAL: '180',
      MAX_REVIEWS_PER_SESSION: '25',
      FLASHCARD_TIERS: ' B1, B2 ,'
    });

    expect(config).toEqual({
      minEasiness: 1.5,
      initialEasiness: 2.2,
      initialInterval: 2,
      graduationInterval: 4,
      maxIntervalDays: 180,
      maxReviewsPerSession: 25,
      flashcardTiers: ['B1', 'B2']
    });
  });

  it('rejects malformed numbers', () => {
    expect(() => loadSchedulingConfig({ SRS_INITIAL_INTERVAL: 'soon' })).toThrow('SRS_INITIAL_INTERVAL');
    expect(() => loadSchedulingConfig({ MAX_REVIEWS_PER_SESSION: '2.5' })).toThrow('MAX_REVIEWS_PER_SESSION');
  });

  it('rejects inconsistent values', () => {
    expect(() => loadSchedulingConfig({ SRS_MIN_EASINESS: '3' })).toThrow('initialEasiness');
    expect(() => loadSchedulingConfig({ SRS_MAX_INTERVAL: '0' })).toThrow('maxIntervalDays');
    expect(() => loadSchedulingConfig({ MAX_REVIEWS_PER_SESSION: '0' })).toThrow('maxReviewsPerSession');
  });
});

describe('loadReminderConfig', () => {
  it('defaults to an hourly check', () => {
    expect(loadReminderConfig({})).toEqual({ enabled: true, cronExpression: '0 * * * *', timezone: undefined });
  });

  it('reads the schedule and switch', () => {
    expect(loadReminderConfig({
      REVIEW_REMINDERS_ENABLED: 'false',
      REVIEW_CHECK_CRON: '30 9 * * *',
      REVIEW_CHECK_TIMEZONE: 'Europe/Warsaw'
    })).toEqual({ enabled: false, cronExpression: '30 9 * * *', timezone: 'Europe/Warsaw' });
  });
});

describe('loadDatabaseConfig', () => {
  it('builds pool settings from the environment', () => {
    const config = loadDatabaseConfig({ DB_HOST: 'db', DB_PORT: '6543', DB_NAME: 'words', DB_SSL: 'true' });

    expect(config).toMatchObject({
      host: 'db',
      port: 6543,
      database: 'words',
      user: 'postgres',
      ssl: { rejectUnauthorized: false },
      max: 20,
      min: 2
    });
  });

  it('rejects a malformed port', () => {
    expect(() => loadDatabaseConfig({ DB_PORT: 'five' })).toThrow('DB_PORT');
  });
});
