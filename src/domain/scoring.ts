import { Question } from "./quizContent";

// ============================================
// Configuration
// ============================================

export const SCORING_CONFIG = {
  // Share of base points every correct answer earns, however slow
  minimumShare: 0.5,

  // Streak bonus per consecutive correct answer going in, capped
  streakBonusPerStep: 100,
  maxBonusStreak: 5,
};

export interface CorrectAnswerScore {
  pointsAwarded: number;
  streakBonus: number;
  total: number;
}

// ============================================
// Scoring rules
// ============================================

/**
 * Fraction of the time limit still left when the answer came in.
 * 1 for an instant answer, 0 at the buzzer.
 */
export function calculateTimeBonusFraction(timeRemaining: number, timeLimit: number): number {
  if (timeLimit <= 0) return 0;
  return Math.max(0, timeRemaining) / timeLimit;
}

/**
 * Points for a correct answer before the streak bonus:
 * between half and all of the base value, scaled by speed.
 */
export function calculateAnswerPoints(pointsBase: number, timeBonusFraction: number): number {
  const { minimumShare } = SCORING_CONFIG;
  return Math.round(pointsBase * (minimumShare + (1 - minimumShare) * timeBonusFraction));
}

/**
 * Bonus from the streak held before this answer. Independent of the time bonus.
 */
export function calculateStreakBonus(streakBeforeAnswer: number): number {
  const { streakBonusPerStep, maxBonusStreak } = SCORING_CONFIG;
  return Math.min(Math.max(0, streakBeforeAnswer), maxBonusStreak) * streakBonusPerStep;
}

export function scoreCorrectAnswer(
  question: Question,
  timeRemaining: number,
  streakBeforeAnswer: number
): CorrectAnswerScore {
  const fraction = calculateTimeBonusFraction(timeRemaining, question.timeLimit);
  const pointsAwarded = calculateAnswerPoints(question.pointsBase, fraction);
  const streakBonus = calculateStreakBonus(streakBeforeAnswer);

  return {
    pointsAwarded,
    streakBonus,
    total: pointsAwarded + streakBonus,
  };
}
