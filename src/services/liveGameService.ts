/**
 * Live Game Service
 *
 * Hosts multiplayer quiz games. Every player gets their own QuizGameEngine
 * with its own timer; nothing mutable is shared between players. The
 * leaderboard is computed from each engine's result on demand.
 *
 * When a player's engine reaches the results phase the round is summarized
 * and saved as a RoundRecord. Finished games are dropped once they have
 * been finished for FINISHED_GAME_TTL_MS.
 */

import { randomUUID } from "crypto";
import { getTickIntervalMs } from "../config";
import { GameErrorKind, GamePhase, PHASE_LABELS } from "../domain/gamePhase";
import { LeaderboardEntry, buildLeaderboard } from "../domain/leaderboard";
import { PlayerResult } from "../domain/playerResult";
import { QuizPack, correctAnswerFor } from "../domain/quizContent";
import {
  GameStateSnapshot,
  LastAnswer,
  QuizGameEngine,
  QuizGameEngineOptions,
} from "../domain/quizGameEngine";
import { RoundRecord, summarizeRound } from "../domain/roundSummary";
import { Scheduler, systemScheduler } from "../domain/scheduler";
import {
  QuizPackSummary,
  StudentQuestion,
  loadQuizPackById,
  sanitizeQuestionForStudent,
  summarizeQuizPack,
} from "../loaders/quizPackLoader";
import { RoundResultStore } from "../stores/roundResultStore";

// ============================================
// Types
// ============================================

export type GameStatus = "waiting" | "playing" | "finished";

export type ServiceErrorCode =
  | "GAME_NOT_FOUND"
  | "PACK_NOT_FOUND"
  | "PLAYER_NOT_FOUND"
  | "INVALID_NAME"
  | "DUPLICATE_NAME"
  | "GAME_ALREADY_STARTED"
  | "NO_PLAYERS"
  | GameErrorKind;

export interface ServiceError {
  code: ServiceErrorCode;
  message: string;
}

export type ServiceResult<T> = { success: true; data: T } | { success: false; error: ServiceError };

export interface RoundRecordSink {
  save(record: RoundRecord): void;
}

export interface LiveGameServiceOptions {
  loadQuizPack?: (quizPackId: string) => QuizPack | null;
  recordStore?: RoundRecordSink;
  scheduler?: Scheduler;
  tickIntervalMs?: number;
  finishedGameTtlMs?: number;
  createEngine?: (options: QuizGameEngineOptions) => QuizGameEngine;
}

export const FINISHED_GAME_TTL_MS = 10 * 60 * 1000;

export interface PlayerStateView {
  phase: GamePhase;
  phaseLabel: string;
  currentQuestionIndex: number;
  currentQuestion: StudentQuestion | null;
  correctAnswerId: string | null; // only once the answer is revealed
  isLastQuestion: boolean;
  progressFraction: number;
  timeRemaining: number;
  timeFraction: number;
  countdownValue: number;
  selectedAnswerId: string | null;
  playerResult: PlayerResult;
  lastAnswer: LastAnswer | null;
}

export interface PlayerView {
  playerId: string;
  playerName: string;
  joinedAt: string;
  state: PlayerStateView;
}

export interface GameView {
  id: string;
  status: GameStatus;
  quizPack: QuizPackSummary;
  createdAt: string;
  players: PlayerView[];
  leaderboard: LeaderboardEntry[];
}

export interface BroadcastOutcome {
  advancedPlayerIds: string[];
  skippedPlayerIds: string[];
}

interface GamePlayer {
  id: string;
  name: string;
  joinedAt: string;
  engine: QuizGameEngine;
  recordSaved: boolean;
  unsubscribe: () => void;
}

interface LiveGame {
  id: string;
  quizPack: QuizPack;
  status: GameStatus;
  createdAt: string;
  finishedAt: number | null; // scheduler time
  players: Map<string, GamePlayer>;
}

const REVEALED_PHASES: GamePhase[] = ["answerReveal", "leaderboard", "results"];

function fail<T>(code: ServiceErrorCode, message: string): ServiceResult<T> {
  return { success: false, error: { code, message } };
}

function toPlayerStateView(state: GameStateSnapshot): PlayerStateView {
  const question = state.currentQuestion;
  const revealed = question !== null && REVEALED_PHASES.includes(state.phase);

  return {
    phase: state.phase,
    phaseLabel: PHASE_LABELS[state.phase],
    currentQuestionIndex: state.currentQuestionIndex,
    currentQuestion: question ? sanitizeQuestionForStudent(question) : null,
    correctAnswerId: revealed && question ? correctAnswerFor(question)?.id ?? null : null,
    isLastQuestion: state.isLastQuestion,
    progressFraction: state.progressFraction,
    timeRemaining: state.timeRemaining,
    timeFraction: state.timeFraction,
    countdownValue: state.countdownValue,
    selectedAnswerId: state.selectedAnswerId,
    playerResult: state.playerResult,
    lastAnswer: state.lastAnswer,
  };
}

// ============================================
// Service
// ============================================

export class LiveGameService {
  private games = new Map<string, LiveGame>();
  private readonly loadQuizPack: (quizPackId: string) => QuizPack | null;
  private readonly recordStore: RoundRecordSink;
  private readonly scheduler: Scheduler;
  private readonly tickIntervalMs: number;
  private readonly finishedGameTtlMs: number;
  private readonly createEngine: (options: QuizGameEngineOptions) => QuizGameEngine;

  constructor(options: LiveGameServiceOptions = {}) {
    this.loadQuizPack = options.loadQuizPack ?? loadQuizPackById;
    this.recordStore = options.recordStore ?? new RoundResultStore();
    this.scheduler = options.scheduler ?? systemScheduler;
    this.tickIntervalMs = options.tickIntervalMs ?? getTickIntervalMs();
    this.finishedGameTtlMs = options.finishedGameTtlMs ?? FINISHED_GAME_TTL_MS;
    this.createEngine = options.createEngine ?? ((engineOptions) => new QuizGameEngine(engineOptions));
  }

  // ============================================
  // Game lifecycle
  // ============================================

  createGame(quizPackId: string): ServiceResult<GameView> {
    this.pruneFinishedGames();

    const quizPack = this.loadQuizPack(quizPackId);
    if (!quizPack) {
      return fail("PACK_NOT_FOUND", `Quiz pack not found: ${quizPackId}`);
    }
    if (quizPack.questions.length === 0) {
      return fail("EmptyPack", `Quiz pack "${quizPack.title}" has no questions`);
    }

    const game: LiveGame = {
      id: randomUUID(),
      quizPack,
      status: "waiting",
      createdAt: new Date().toISOString(),
      finishedAt: null,
      players: new Map(),
    };
    this.games.set(game.id, game);

    console.log(`[live-game] Created game ${game.id} with pack "${quizPack.title}"`);
    return { success: true, data: this.toGameView(game) };
  }

  joinGame(gameId: string, name: string): ServiceResult<PlayerView> {
    const game = this.games.get(gameId);
    if (!game) {
      return fail("GAME_NOT_FOUND", `Game not found: ${gameId}`);
    }
    if (game.status !== "waiting") {
      return fail("GAME_ALREADY_STARTED", "Players can only join before the game starts");
    }

    const trimmedName = name.trim();
    if (!trimmedName) {
      return fail("INVALID_NAME", "Player name is required");
    }

    const lowerName = trimmedName.toLowerCase();
    for (const existing of game.players.values()) {
      if (existing.name.toLowerCase() === lowerName) {
        return fail("DUPLICATE_NAME", `Name "${trimmedName}" is already taken in this game`);
      }
    }

    const engine = this.createEngine({
      scheduler: this.scheduler,
      tickIntervalMs: this.tickIntervalMs,
    });

    const player: GamePlayer = {
      id: randomUUID(),
      name: trimmedName,
      joinedAt: new Date().toISOString(),
      engine,
      recordSaved: false,
      unsubscribe: () => {},
    };
    player.unsubscribe = engine.subscribe((state) => this.handlePlayerStateChange(game, player, state));

    game.players.set(player.id, player);
    return { success: true, data: this.toPlayerView(player) };
  }

  startGame(gameId: string): ServiceResult<GameView> {
    const game = this.games.get(gameId);
    if (!game) {
      return fail("GAME_NOT_FOUND", `Game not found: ${gameId}`);
    }
    if (game.status !== "waiting") {
      return fail("GAME_ALREADY_STARTED", "Game has already started");
    }
    if (game.players.size === 0) {
      return fail("NO_PLAYERS", "At least one player must join before starting");
    }

    const started: GamePlayer[] = [];
    for (const player of game.players.values()) {
      const result = player.engine.startGame(game.quizPack);
      if (!result.success) {
        // All or nothing: put the engines already counting down back in the lobby
        for (const startedPlayer of started) {
          startedPlayer.engine.reset();
        }
        console.warn(`[live-game] Could not start game ${game.id} for ${player.name}: ${result.error.message}`);
        return fail(result.error.kind, result.error.message);
      }
      started.push(player);
    }

    game.status = "playing";
    console.log(`[live-game] Started game ${game.id} with ${game.players.size} player(s)`);
    return { success: true, data: this.toGameView(game) };
  }

  resetGame(gameId: string): ServiceResult<GameView> {
    const game = this.games.get(gameId);
    if (!game) {
      return fail("GAME_NOT_FOUND", `Game not found: ${gameId}`);
    }

    for (const player of game.players.values()) {
      player.engine.reset();
      player.recordSaved = false;
    }
    game.status = "waiting";
    game.finishedAt = null;

    return { success: true, data: this.toGameView(game) };
  }

  endGame(gameId: string): boolean {
    const game = this.games.get(gameId);
    if (!game) {
      return false;
    }

    for (const player of game.players.values()) {
      player.unsubscribe();
      player.engine.dispose();
    }
    this.games.delete(gameId);

    console.log(`[live-game] Ended game ${gameId}`);
    return true;
  }

  /**
   * End games that finished more than finishedGameTtlMs ago
   */
  private pruneFinishedGames(): void {
    const now = this.scheduler.now();
    for (const game of [...this.games.values()]) {
      if (game.finishedAt !== null && now - game.finishedAt >= this.finishedGameTtlMs) {
        this.endGame(game.id);
      }
    }
  }

  /**
   * Stop every game's timers (used on shutdown)
   */
  endAllGames(): void {
    for (const gameId of [...this.games.keys()]) {
      this.endGame(gameId);
    }
  }

  // ============================================
  // Player actions
  // ============================================

  submitAnswer(gameId: string, playerId: string, answerId: string): ServiceResult<PlayerView> {
    const game = this.games.get(gameId);
    if (!game) {
      return fail("GAME_NOT_FOUND", `Game not found: ${gameId}`);
    }
    const player = game.players.get(playerId);
    if (!player) {
      return fail("PLAYER_NOT_FOUND", `Player not found: ${playerId}`);
    }

    const result = player.engine.submitAnswer(answerId);
    if (!result.success) {
      return fail(result.error.kind, result.error.message);
    }

    return { success: true, data: this.toPlayerView(player) };
  }

  // ============================================
  // Host actions (applied to every player)
  // ============================================

  nextQuestion(gameId: string): ServiceResult<BroadcastOutcome> {
    return this.broadcast(gameId, (engine) => engine.nextQuestion());
  }

  showLeaderboard(gameId: string): ServiceResult<BroadcastOutcome> {
    return this.broadcast(gameId, (engine) => engine.showLeaderboard());
  }

  private broadcast(
    gameId: string,
    action: (engine: QuizGameEngine) => { success: boolean }
  ): ServiceResult<BroadcastOutcome> {
    const game = this.games.get(gameId);
    if (!game) {
      return fail("GAME_NOT_FOUND", `Game not found: ${gameId}`);
    }
    if (game.status !== "playing") {
      return fail("InvalidTransition", `Game is ${game.status}`);
    }

    const outcome: BroadcastOutcome = { advancedPlayerIds: [], skippedPlayerIds: [] };
    for (const player of game.players.values()) {
      if (action(player.engine).success) {
        outcome.advancedPlayerIds.push(player.id);
      } else {
        outcome.skippedPlayerIds.push(player.id);
      }
    }

    return { success: true, data: outcome };
  }

  // ============================================
  // Views
  // ============================================

  getGameState(gameId: string): ServiceResult<GameView> {
    const game = this.games.get(gameId);
    if (!game) {
      return fail("GAME_NOT_FOUND", `Game not found: ${gameId}`);
    }
    return { success: true, data: this.toGameView(game) };
  }

  getLeaderboard(gameId: string): ServiceResult<LeaderboardEntry[]> {
    const game = this.games.get(gameId);
    if (!game) {
      return fail("GAME_NOT_FOUND", `Game not found: ${gameId}`);
    }
    return { success: true, data: this.buildGameLeaderboard(game) };
  }

  private buildGameLeaderboard(game: LiveGame): LeaderboardEntry[] {
    return buildLeaderboard(
      [...game.players.values()].map((player) => ({
        playerId: player.id,
        playerName: player.name,
        result: player.engine.playerResult,
      }))
    );
  }

  private toPlayerView(player: GamePlayer): PlayerView {
    return {
      playerId: player.id,
      playerName: player.name,
      joinedAt: player.joinedAt,
      state: toPlayerStateView(player.engine.getState()),
    };
  }

  private toGameView(game: LiveGame): GameView {
    return {
      id: game.id,
      status: game.status,
      quizPack: summarizeQuizPack(game.quizPack),
      createdAt: game.createdAt,
      players: [...game.players.values()].map((p) => this.toPlayerView(p)),
      leaderboard: this.buildGameLeaderboard(game),
    };
  }

  // ============================================
  // Round completion
  // ============================================

  private handlePlayerStateChange(game: LiveGame, player: GamePlayer, state: GameStateSnapshot): void {
    if (state.phase !== "results" || player.recordSaved) {
      return;
    }

    player.recordSaved = true;
    const record: RoundRecord = {
      id: randomUUID(),
      gameId: game.id,
      playerId: player.id,
      playerName: player.name,
      quizPackId: game.quizPack.id,
      quizPackTitle: game.quizPack.title,
      summary: summarizeRound(state.playerResult, game.quizPack.questions.length),
      answerTimes: state.playerResult.answerTimes,
      completedAt: new Date().toISOString(),
    };

    try {
      this.recordStore.save(record);
    } catch (error) {
      console.error(`[live-game] Failed to save round record for ${player.name}:`, error);
    }

    const allFinished = [...game.players.values()].every((p) => p.recordSaved);
    if (allFinished) {
      game.status = "finished";
      game.finishedAt = this.scheduler.now();
      console.log(`[live-game] Game ${game.id} finished`);
    }
  }
}
