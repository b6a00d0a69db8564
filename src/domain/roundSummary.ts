import { PlayerResult } from "./playerResult";

export interface RoundSummary {
  totalScore: number;
  correctCount: number;
  incorrectCount: number;
  totalQuestions: number;
  accuracy: number; // percent of the pack answered correctly
  starRating: 1 | 2 | 3;
  bestStreak: number;
  averageTime: number;
}

const STAR_THRESHOLDS = {
  threeStars: 80, // strictly above
  twoStars: 50,
};

export function calculateAccuracy(correctCount: number, totalQuestions: number): number {
  if (totalQuestions <= 0) return 0;
  return (correctCount / totalQuestions) * 100;
}

export function deriveStarRating(accuracy: number): 1 | 2 | 3 {
  if (accuracy > STAR_THRESHOLDS.threeStars) return 3;
  if (accuracy >= STAR_THRESHOLDS.twoStars) return 2;
  return 1;
}

/**
 * Final numbers shown on the results screen for one player.
 */
export function summarizeRound(result: PlayerResult, totalQuestions: number): RoundSummary {
  const accuracy = calculateAccuracy(result.correctCount, totalQuestions);

  return {
    totalScore: result.totalScore,
    correctCount: result.correctCount,
    incorrectCount: result.incorrectCount,
    totalQuestions,
    accuracy,
    starRating: deriveStarRating(accuracy),
    bestStreak: result.bestStreak,
    averageTime: result.averageTime,
  };
}

/**
 * A finished round as kept by the host after the engine is gone.
 */
export interface RoundRecord {
  id: string;
  gameId: string;
  playerId: string;
  playerName: string;
  quizPackId: string;
  quizPackTitle: string;
  summary: RoundSummary;
  answerTimes: number[];
  completedAt: string; // ISO date
}
