// ============================================
// Round phases
// ============================================

export type GamePhase =
  | "lobby" // waiting to start
  | "countdown" // 3-2-1 before each question
  | "question" // timer running, answers open
  | "answerReveal" // correct answer + streak shown
  | "leaderboard" // standings between questions
  | "results"; // final screen for the round

export const PHASE_LABELS: Record<GamePhase, string> = {
  lobby: "Waiting to start",
  countdown: "Get ready",
  question: "Answer now",
  answerReveal: "Answer revealed",
  leaderboard: "Leaderboard",
  results: "Final results",
};

// ============================================
// Errors
// ============================================

export type GameErrorKind = "InvalidTransition" | "NoActiveQuestion" | "EmptyPack";

export interface GameError {
  kind: GameErrorKind;
  message: string;
}

export type GameActionResult = { success: true } | { success: false; error: GameError };

export function invalidTransition(operation: string, phase: GamePhase): GameActionResult {
  return {
    success: false,
    error: {
      kind: "InvalidTransition",
      message: `Cannot ${operation} during ${phase} phase`,
    },
  };
}

export function noActiveQuestion(operation: string): GameActionResult {
  return {
    success: false,
    error: {
      kind: "NoActiveQuestion",
      message: `Cannot ${operation} without a current question`,
    },
  };
}

export function emptyPack(packTitle: string): GameActionResult {
  return {
    success: false,
    error: {
      kind: "EmptyPack",
      message: `Quiz pack "${packTitle}" has no questions`,
    },
  };
}

export const OK: GameActionResult = { success: true };
