import {
  GameActionResult,
  GamePhase,
  OK,
  emptyPack,
  invalidTransition,
  noActiveQuestion,
} from "./gamePhase";
import {
  PlayerResult,
  copyPlayerResult,
  createPlayerResult,
  recordCorrectAnswer,
  recordIncorrectAnswer,
} from "./playerResult";
import { DEFAULT_TIME_LIMIT, Question, QuizPack, findAnswer, isLastQuestionIndex } from "./quizContent";
import { Scheduler, TimerHandle, systemScheduler } from "./scheduler";
import { scoreCorrectAnswer } from "./scoring";

/**
 * Quiz Game Engine
 *
 * Runs one player's timed round through a quiz pack:
 * lobby → countdown → question → answerReveal → (leaderboard) → ... → results
 *
 * The engine owns exactly one periodic timer at a time (countdown ticker or
 * question ticker). Hosts drive it with startGame / submitAnswer /
 * nextQuestion / showLeaderboard / reset and re-render from subscribe().
 * Operations called in the wrong phase return an error and change nothing.
 */

// ============================================
// Types
// ============================================

export interface QuizGameEngineOptions {
  scheduler?: Scheduler;
  tickIntervalMs?: number; // length of one countdown/question second
  countdownFrom?: number;
}

export interface LastAnswer {
  questionId: string;
  answerId: string | null; // null when the timer ran out
  isCorrect: boolean;
  pointsAwarded: number;
  streakBonus: number;
  timedOut: boolean;
}

export interface GameStateSnapshot {
  phase: GamePhase;
  quizPack: QuizPack | null;
  currentQuestionIndex: number;
  currentQuestion: Question | null;
  isLastQuestion: boolean;
  progressFraction: number;
  timeRemaining: number;
  timeFraction: number;
  countdownValue: number;
  selectedAnswerId: string | null;
  playerResult: PlayerResult;
  lastAnswer: LastAnswer | null;
}

export type GameStateListener = (state: GameStateSnapshot) => void;

const DEFAULT_COUNTDOWN_FROM = 3;
const DEFAULT_TICK_INTERVAL_MS = 1000;

export class QuizGameEngine {
  private readonly scheduler: Scheduler;
  private readonly tickIntervalMs: number;
  private readonly countdownFrom: number;

  private _phase: GamePhase = "lobby";
  private _quizPack: QuizPack | null = null;
  private _currentQuestionIndex = 0;
  private _timeRemaining = DEFAULT_TIME_LIMIT;
  private _countdownValue: number;
  private _selectedAnswerId: string | null = null;
  private _playerResult: PlayerResult = createPlayerResult();
  private _lastAnswer: LastAnswer | null = null;

  private timer: TimerHandle | null = null;
  private questionStartedAt: number | null = null;
  private listeners = new Set<GameStateListener>();

  constructor(options: QuizGameEngineOptions = {}) {
    this.scheduler = options.scheduler ?? systemScheduler;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.countdownFrom = options.countdownFrom ?? DEFAULT_COUNTDOWN_FROM;
    this._countdownValue = this.countdownFrom;
  }

  // ============================================
  // Read-only state
  // ============================================

  get phase(): GamePhase {
    return this._phase;
  }

  get quizPack(): QuizPack | null {
    return this._quizPack;
  }

  get currentQuestionIndex(): number {
    return this._currentQuestionIndex;
  }

  get timeRemaining(): number {
    return this._timeRemaining;
  }

  get countdownValue(): number {
    return this._countdownValue;
  }

  get selectedAnswerId(): string | null {
    return this._selectedAnswerId;
  }

  get playerResult(): PlayerResult {
    return copyPlayerResult(this._playerResult);
  }

  get lastAnswer(): LastAnswer | null {
    return this._lastAnswer ? { ...this._lastAnswer } : null;
  }

  get currentQuestion(): Question | null {
    const pack = this._quizPack;
    if (!pack || this._currentQuestionIndex >= pack.questions.length) {
      return null;
    }
    return pack.questions[this._currentQuestionIndex];
  }

  get isLastQuestion(): boolean {
    if (!this._quizPack) return true;
    return isLastQuestionIndex(this._quizPack, this._currentQuestionIndex);
  }

  get progressFraction(): number {
    const pack = this._quizPack;
    if (!pack || pack.questions.length === 0) return 0;
    return (this._currentQuestionIndex + 1) / pack.questions.length;
  }

  get timeFraction(): number {
    const question = this.currentQuestion;
    if (!question || question.timeLimit <= 0) return 0;
    return this._timeRemaining / question.timeLimit;
  }

  getState(): GameStateSnapshot {
    return {
      phase: this._phase,
      quizPack: this._quizPack,
      currentQuestionIndex: this._currentQuestionIndex,
      currentQuestion: this.currentQuestion,
      isLastQuestion: this.isLastQuestion,
      progressFraction: this.progressFraction,
      timeRemaining: this._timeRemaining,
      timeFraction: this.timeFraction,
      countdownValue: this._countdownValue,
      selectedAnswerId: this._selectedAnswerId,
      playerResult: this.playerResult,
      lastAnswer: this.lastAnswer,
    };
  }

  /**
   * Listen for state changes. Returns an unsubscribe function.
   */
  subscribe(listener: GameStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ============================================
  // Start game
  // ============================================

  startGame(pack: QuizPack): GameActionResult {
    if (this._phase !== "lobby") {
      return invalidTransition("start a game", this._phase);
    }
    if (pack.questions.length === 0) {
      return emptyPack(pack.title);
    }

    this._quizPack = pack;
    this._currentQuestionIndex = 0;
    this._playerResult = createPlayerResult();
    this._selectedAnswerId = null;
    this._lastAnswer = null;

    this.beginCountdown();
    return OK;
  }

  // ============================================
  // Countdown
  // ============================================

  /**
   * Restart the running countdown from the top. Countdowns are entered
   * through startGame and nextQuestion; this only re-enters one.
   */
  startCountdown(): GameActionResult {
    if (!this.currentQuestion) {
      return noActiveQuestion("start the countdown");
    }
    if (this._phase !== "countdown") {
      return invalidTransition("start the countdown", this._phase);
    }

    this.beginCountdown();
    return OK;
  }

  private beginCountdown(): void {
    this._phase = "countdown";
    this._countdownValue = this.countdownFrom;
    this.startTimer(() => this.handleCountdownTick());
    this.notify();
  }

  private handleCountdownTick(): void {
    if (this._countdownValue > 1) {
      this._countdownValue -= 1;
      this.notify();
      return;
    }

    this.cancelTimer();
    const result = this.startQuestion();
    if (!result.success) {
      console.error("[quiz-engine] Countdown finished but question could not start:", result.error.message);
    }
  }

  // ============================================
  // Question
  // ============================================

  startQuestion(): GameActionResult {
    const question = this.currentQuestion;
    if (!question) {
      return noActiveQuestion("start a question");
    }
    if (this._phase !== "countdown") {
      return invalidTransition("start a question", this._phase);
    }

    this._phase = "question";
    this._timeRemaining = question.timeLimit;
    this._selectedAnswerId = null;
    this._lastAnswer = null;
    this.questionStartedAt = this.scheduler.now();

    this.startTimer(() => this.handleQuestionTick());
    this.notify();
    return OK;
  }

  private handleQuestionTick(): void {
    this._timeRemaining = Math.max(0, this._timeRemaining - 1);

    if (this._timeRemaining <= 0) {
      this.cancelTimer();
      this.handleTimeout();
      return;
    }

    this.notify();
  }

  // ============================================
  // Submit answer
  // ============================================

  submitAnswer(answerId: string): GameActionResult {
    if (this._phase !== "question" || this._selectedAnswerId !== null) {
      return invalidTransition("submit an answer", this._phase);
    }
    const question = this.currentQuestion;
    if (!question) {
      return noActiveQuestion("submit an answer");
    }

    this.cancelTimer();
    this._selectedAnswerId = answerId;

    const answerTime =
      this.questionStartedAt !== null
        ? (this.scheduler.now() - this.questionStartedAt) / 1000
        : question.timeLimit;

    const answer = findAnswer(question, answerId);

    if (answer?.isCorrect) {
      const score = scoreCorrectAnswer(question, this._timeRemaining, this._playerResult.streak);
      this._playerResult = recordCorrectAnswer(this._playerResult, score.total, answerTime);
      this._lastAnswer = {
        questionId: question.id,
        answerId,
        isCorrect: true,
        pointsAwarded: score.pointsAwarded,
        streakBonus: score.streakBonus,
        timedOut: false,
      };
    } else {
      this._playerResult = recordIncorrectAnswer(this._playerResult, answerTime);
      this._lastAnswer = {
        questionId: question.id,
        answerId,
        isCorrect: false,
        pointsAwarded: 0,
        streakBonus: 0,
        timedOut: false,
      };
    }

    this._phase = "answerReveal";
    this.notify();
    return OK;
  }

  // ============================================
  // Timeout
  // ============================================

  private handleTimeout(): void {
    if (this._phase !== "question" || this._selectedAnswerId !== null) return;

    const question = this.currentQuestion;
    const timeLimit = question?.timeLimit ?? DEFAULT_TIME_LIMIT;

    this._playerResult = recordIncorrectAnswer(this._playerResult, timeLimit);
    this._lastAnswer = question
      ? {
          questionId: question.id,
          answerId: null,
          isCorrect: false,
          pointsAwarded: 0,
          streakBonus: 0,
          timedOut: true,
        }
      : null;

    this._phase = "answerReveal";
    this.notify();
  }

  // ============================================
  // Between questions
  // ============================================

  nextQuestion(): GameActionResult {
    if (this._phase !== "answerReveal" && this._phase !== "leaderboard") {
      return invalidTransition("move to the next question", this._phase);
    }

    if (this.isLastQuestion) {
      this.cancelTimer();
      this._phase = "results";
      this.notify();
      return OK;
    }

    this._currentQuestionIndex += 1;
    this._selectedAnswerId = null;
    this.beginCountdown();
    return OK;
  }

  showLeaderboard(): GameActionResult {
    if (this._phase !== "answerReveal" && this._phase !== "leaderboard") {
      return invalidTransition("show the leaderboard", this._phase);
    }

    this._phase = "leaderboard";
    this.notify();
    return OK;
  }

  // ============================================
  // Reset / dispose
  // ============================================

  reset(): GameActionResult {
    this.cancelTimer();
    this._phase = "lobby";
    this._quizPack = null;
    this._currentQuestionIndex = 0;
    this._timeRemaining = DEFAULT_TIME_LIMIT;
    this._countdownValue = this.countdownFrom;
    this._selectedAnswerId = null;
    this._playerResult = createPlayerResult();
    this._lastAnswer = null;
    this.questionStartedAt = null;
    this.notify();
    return OK;
  }

  /**
   * Stop the timer and drop all listeners. The engine should not be used afterwards.
   */
  dispose(): void {
    this.cancelTimer();
    this.listeners.clear();
  }

  // ============================================
  // Timer + notification plumbing
  // ============================================

  private startTimer(onTick: () => void): void {
    this.cancelTimer();
    const handle = this.scheduler.setInterval(() => {
      // A cancelled timer's last callback must not touch state
      if (this.timer !== handle) return;
      onTick();
    }, this.tickIntervalMs);
    this.timer = handle;
  }

  private cancelTimer(): void {
    if (this.timer) {
      this.timer.cancel();
      this.timer = null;
    }
  }

  private notify(): void {
    if (this.listeners.size === 0) return;

    const state = this.getState();
    for (const listener of this.listeners) {
      try {
        listener(state);
      } catch (error) {
        console.error("[quiz-engine] State listener failed:", error);
      }
    }
  }
}
