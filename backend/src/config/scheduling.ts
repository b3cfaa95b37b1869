import dotenv from 'dotenv';
import { createError } from '../utils/errors.js';
import type { DifficultyTier } from '../types/common.js';

export interface SchedulingConfig {
  minEasiness: number;
  initialEasiness: number;
  initialInterval: number;
  graduationInterval: number;
  // null = intervals grow without a ceiling
  maxIntervalDays: number | null;
  maxReviewsPerSession: number;
  flashcardTiers: DifficultyTier[];
}

export interface ReminderConfig {
  enabled: boolean;
  cronExpression: string;
  timezone?: string;
}

export const DEFAULT_SCHEDULING_CONFIG: SchedulingConfig = {
  minEasiness: 1.3,
  initialEasiness: 2.5,
  initialInterval: 1,
  graduationInterval: 6,
  maxIntervalDays: null,
  maxReviewsPerSession: 10,
  flashcardTiers: ['A1', 'A2']
};

export const DEFAULT_REMINDER_CONFIG: ReminderConfig = {
  enabled: true,
  cronExpression: '0 * * * *'
};

type Env = Record<string, string | undefined>;

/**
 * .env 파일을 process.env에 로드합니다 (이미 설정된 값은 덮어쓰지 않음)
 */
export const loadEnvironment = (path?: string): Env => {
  dotenv.config(path ? { path } : undefined);
  return process.env;
};

const readNumber = (env: Env, key: string, fallback: number, integer: boolean): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw createError(`${key} must be ${integer ? 'an integer' : 'a number'}, got "${raw}"`, 'INVALID_CONFIG');
  }
  return value;
};

const readBoolean = (env: Env, key: string, fallback: boolean): boolean => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return raw.trim().toLowerCase() !== 'false';
};

export const validateSchedulingConfig = (config: SchedulingConfig): SchedulingConfig => {
  if (config.minEasiness <= 0) {
    throw createError('minEasiness must be positive', 'INVALID_CONFIG');
  }
  if (config.initialEasiness < config.minEasiness) {
    throw createError('initialEasiness must not be below minEasiness', 'INVALID_CONFIG');
  }
  if (config.initialInterval < 0 || config.graduationInterval < 0) {
    throw createError('Intervals must not be negative', 'INVALID_CONFIG');
  }
  if (config.maxIntervalDays !== null && config.maxIntervalDays < 1) {
    throw createError('maxIntervalDays must be at least 1 day', 'INVALID_CONFIG');
  }
  if (config.maxReviewsPerSession < 1) {
    throw createError('maxReviewsPerSession must be at least 1', 'INVALID_CONFIG');
  }
  if (config.flashcardTiers.length === 0) {
    throw createError('At least one flashcard tier is required', 'INVALID_CONFIG');
  }
  return config;
};

export const loadSchedulingConfig = (env: Env = process.env): SchedulingConfig => {
  const defaults = DEFAULT_SCHEDULING_CONFIG;
  const maxInterval = env.SRS_MAX_INTERVAL;
  const tiers = (env.FLASHCARD_TIERS ?? '')
    .split(',')
    .map(tier => tier.trim())
    .filter(tier => tier.length > 0);

  return validateSchedulingConfig({
    minEasiness: readNumber(env, 'SRS_MIN_EASINESS', defaults.minEasiness, false),
    initialEasiness: readNumber(env, 'SRS_INITIAL_EASINESS', defaults.initialEasiness, false),
    initialInterval: readNumber(env, 'SRS_INITIAL_INTERVAL', defaults.initialInterval, true),
    graduationInterval: readNumber(env, 'SRS_GRADUATION_INTERVAL', defaults.graduationInterval, true),
    maxIntervalDays: maxInterval === undefined || maxInterval.trim() === ''
      ? null
      : readNumber(env, 'SRS_MAX_INTERVAL', 0, true),
    maxReviewsPerSession: readNumber(env, 'MAX_REVIEWS_PER_SESSION', defaults.maxReviewsPerSession, true),
    flashcardTiers: tiers.length > 0 ? tiers : [...defaults.flashcardTiers]
  });
};

export const loadReminderConfig = (env: Env = process.env): ReminderConfig => {
  return {
    enabled: readBoolean(env, 'REVIEW_REMINDERS_ENABLED', DEFAULT_REMINDER_CONFIG.enabled),
    cronExpression: env.REVIEW_CHECK_CRON?.trim() || DEFAULT_REMINDER_CONFIG.cronExpression,
    timezone: env.REVIEW_CHECK_TIMEZONE?.trim() || undefined
  };
};
