/**
 * Live Game API Routes
 *
 * Host endpoints drive every player's engine at once (start, next, leaderboard).
 * Player endpoints act on a single engine (join, answer).
 * Clients poll GET /api/games/:id for timer and phase updates.
 */

import { Response, Router } from "express";
import { LiveGameService, ServiceError, ServiceErrorCode } from "../../services/liveGameService";

const router = Router();
export const liveGameService = new LiveGameService();

const STATUS_BY_CODE: Record<ServiceErrorCode, number> = {
  GAME_NOT_FOUND: 404,
  PACK_NOT_FOUND: 404,
  PLAYER_NOT_FOUND: 404,
  INVALID_NAME: 400,
  DUPLICATE_NAME: 409,
  GAME_ALREADY_STARTED: 409,
  NO_PLAYERS: 409,
  InvalidTransition: 409,
  NoActiveQuestion: 409,
  EmptyPack: 400,
};

function sendError(res: Response, error: ServiceError) {
  return res.status(STATUS_BY_CODE[error.code]).json({ error: error.message, code: error.code });
}

// ============================================
// Host Endpoints
// ============================================

/**
 * POST /api/games
 * Create a game for a quiz pack
 */
router.post("/", (req, res) => {
  try {
    const { quizPackId } = req.body;
    if (!quizPackId || typeof quizPackId !== "string") {
      return res.status(400).json({ error: "quizPackId is required" });
    }

    const result = liveGameService.createGame(quizPackId);
    if (!result.success) {
      return sendError(res, result.error);
    }
    res.status(201).json(result.data);
  } catch (error) {
    console.error("Error creating game:", error);
    res.status(500).json({ error: "Failed to create game" });
  }
});

/**
 * GET /api/games/:id
 * Current state of every player plus the leaderboard
 */
router.get("/:id", (req, res) => {
  try {
    const result = liveGameService.getGameState(req.params.id);
    if (!result.success) {
      return sendError(res, result.error);
    }
    res.json(result.data);
  } catch (error) {
    console.error("Error fetching game:", error);
    res.status(500).json({ error: "Failed to fetch game" });
  }
});

/**
 * POST /api/games/:id/start
 */
router.post("/:id/start", (req, res) => {
  try {
    const result = liveGameService.startGame(req.params.id);
    if (!result.success) {
      return sendError(res, result.error);
    }
    res.json(result.data);
  } catch (error) {
    console.error("Error starting game:", error);
    res.status(500).json({ error: "Failed to start game" });
  }
});

/**
 * POST /api/games/:id/next
 * Advance every player who is on the reveal or leaderboard screen
 */
router.post("/:id/next", (req, res) => {
  try {
    const result = liveGameService.nextQuestion(req.params.id);
    if (!result.success) {
      return sendError(res, result.error);
    }
    res.json(result.data);
  } catch (error) {
    console.error("Error advancing game:", error);
    res.status(500).json({ error: "Failed to advance game" });
  }
});

/**
 * POST /api/games/:id/leaderboard
 * Show the leaderboard between questions
 */
router.post("/:id/leaderboard", (req, res) => {
  try {
    const result = liveGameService.showLeaderboard(req.params.id);
    if (!result.success) {
      return sendError(res, result.error);
    }
    res.json(result.data);
  } catch (error) {
    console.error("Error showing leaderboard:", error);
    res.status(500).json({ error: "Failed to show leaderboard" });
  }
});

/**
 * GET /api/games/:id/leaderboard
 */
router.get("/:id/leaderboard", (req, res) => {
  try {
    const result = liveGameService.getLeaderboard(req.params.id);
    if (!result.success) {
      return sendError(res, result.error);
    }
    res.json(result.data);
  } catch (error) {
    console.error("Error fetching leaderboard:", error);
    res.status(500).json({ error: "Failed to fetch leaderboard" });
  }
});

/**
 * POST /api/games/:id/reset
 * Put every player back in the lobby for a replay
 */
router.post("/:id/reset", (req, res) => {
  try {
    const result = liveGameService.resetGame(req.params.id);
    if (!result.success) {
      return sendError(res, result.error);
    }
    res.json(result.data);
  } catch (error) {
    console.error("Error resetting game:", error);
    res.status(500).json({ error: "Failed to reset game" });
  }
});

/**
 * DELETE /api/games/:id
 */
router.delete("/:id", (req, res) => {
  try {
    const ended = liveGameService.endGame(req.params.id);
    if (!ended) {
      return res.status(404).json({ error: "Game not found" });
    }
    res.json({ success: true });
  } catch (error) {
    console.error("Error ending game:", error);
    res.status(500).json({ error: "Failed to end game" });
  }
});

// ============================================
// Player Endpoints
// ============================================

/**
 * POST /api/games/:id/players
 * Join before the game starts
 */
router.post("/:id/players", (req, res) => {
  try {
    const { name } = req.body;
    if (typeof name !== "string") {
      return res.status(400).json({ error: "name is required" });
    }

    const result = liveGameService.joinGame(req.params.id, name);
    if (!result.success) {
      return sendError(res, result.error);
    }
    res.status(201).json(result.data);
  } catch (error) {
    console.error("Error joining game:", error);
    res.status(500).json({ error: "Failed to join game" });
  }
});

/**
 * POST /api/games/:id/answers
 * Submit the player's answer for the current question
 */
router.post("/:id/answers", (req, res) => {
  try {
    const { playerId, answerId } = req.body;
    if (!playerId || typeof playerId !== "string") {
      return res.status(400).json({ error: "playerId is required" });
    }
    if (!answerId || typeof answerId !== "string") {
      return res.status(400).json({ error: "answerId is required" });
    }

    const result = liveGameService.submitAnswer(req.params.id, playerId, answerId);
    if (!result.success) {
      return sendError(res, result.error);
    }
    res.json(result.data);
  } catch (error) {
    console.error("Error submitting answer:", error);
    res.status(500).json({ error: "Failed to submit answer" });
  }
});

export default router;
