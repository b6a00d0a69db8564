/**
 * A player's running tally for one round.
 *
 * Each helper returns a new result; callers replace the old one.
 * answerTimes always has one entry per scored question, so
 * answerTimes.length === correctCount + incorrectCount.
 */
export interface PlayerResult {
  totalScore: number;
  correctCount: number;
  incorrectCount: number;
  streak: number;
  bestStreak: number;
  averageTime: number; // seconds
  answerTimes: number[]; // seconds per question, in order
}

export function createPlayerResult(): PlayerResult {
  return {
    totalScore: 0,
    correctCount: 0,
    incorrectCount: 0,
    streak: 0,
    bestStreak: 0,
    averageTime: 0,
    answerTimes: [],
  };
}

export function calculateAverageTime(answerTimes: readonly number[]): number {
  if (answerTimes.length === 0) return 0;
  const total = answerTimes.reduce((sum, t) => sum + t, 0);
  return total / answerTimes.length;
}

export function recordCorrectAnswer(
  result: PlayerResult,
  points: number,
  answerTime: number
): PlayerResult {
  const answerTimes = [...result.answerTimes, answerTime];
  const streak = result.streak + 1;

  return {
    totalScore: result.totalScore + points,
    correctCount: result.correctCount + 1,
    incorrectCount: result.incorrectCount,
    streak,
    bestStreak: Math.max(result.bestStreak, streak),
    averageTime: calculateAverageTime(answerTimes),
    answerTimes,
  };
}

/**
 * Wrong answers and timeouts score the same way: no points, streak broken.
 */
export function recordIncorrectAnswer(result: PlayerResult, answerTime: number): PlayerResult {
  const answerTimes = [...result.answerTimes, answerTime];

  return {
    ...result,
    incorrectCount: result.incorrectCount + 1,
    streak: 0,
    averageTime: calculateAverageTime(answerTimes),
    answerTimes,
  };
}

export function copyPlayerResult(result: PlayerResult): PlayerResult {
  return { ...result, answerTimes: [...result.answerTimes] };
}
