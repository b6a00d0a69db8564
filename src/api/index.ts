import "dotenv/config";
import express from "express";
import cors from "cors";

import quizPacksRouter from "./routes/quizPacks";
import gamesRouter, { liveGameService } from "./routes/games";
import resultsRouter from "./routes/results";
import { getApiPort } from "../config";

const app = express();
const PORT = getApiPort();

// Middleware
app.use(cors({
  origin: ["http://localhost:5173", "http://localhost:3000"],
  credentials: true,
}));
app.use(express.json());

// Routes
app.use("/api/quiz-packs", quizPacksRouter);
app.use("/api/games", gamesRouter);
app.use("/api/results", resultsRouter);

// Health check
app.get("/api/health", (req, res) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Start server
const server = app.listen(PORT, () => {
  console.log(`API server running on http://localhost:${PORT}`);
});

// Stop game timers so the process can exit
function shutdown(signal: string) {
  console.log(`${signal} received, shutting down`);
  liveGameService.endAllGames();
  server.close(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

export default app;
