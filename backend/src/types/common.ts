// Domain types shared by the scheduling services and the stores

// CEFR 레벨 (A1, A2, B1 ...)
export type DifficultyTier = string;

export interface VocabularyItem {
  id: number;
  word: string;
  translation: string;
  difficultyTier: DifficultyTier;
  category: string | null;
  exampleSentence: string | null;
}

export interface ReviewProgress {
  id: number;
  userId: number;
  itemId: number;
  repetitions: number;
  easinessFactor: number;
  intervalDays: number;
  nextReviewTime: Date;
  lastQuality: number;
  lastReviewed: Date | null;
  timesReviewed: number;
  timesCorrect: number;
  timesWrong: number;
  // 0-5, min(5, repetitions)
  stage: number;
}

export type NewReviewProgress = Omit<ReviewProgress, 'id'>;

export interface ExposureStats {
  id: number;
  userId: number;
  itemId: number;
  knowCount: number;
  dontKnowCount: number;
  lastShown: Date | null;
  priorityScore: number;
}

export type NewExposureStats = Omit<ExposureStats, 'id'>;

export interface ReviewStats {
  total: number;
  dueNow: number;
  mastered: number;
  learning: number;
  new: number;
}

export interface LearningStats {
  totalWords: number;
  knownWords: number;
  learningWords: number;
  newWords: number;
}

export interface DueUserSummary {
  userId: number;
  dueCount: number;
}

export interface FlashcardSelection {
  item: VocabularyItem;
  stats: ExposureStats;
}
