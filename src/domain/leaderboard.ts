import { PlayerResult } from "./playerResult";

/**
 * Leaderboard is a read-only projection over independent players' results.
 * It never writes back into an engine.
 */

export interface LeaderboardInput {
  playerId: string;
  playerName: string;
  result: PlayerResult;
}

export interface LeaderboardEntry {
  rank: number;
  playerId: string;
  playerName: string;
  totalScore: number;
  correctCount: number;
  streak: number;
  bestStreak: number;
  averageTime: number;
}

function compareEntries(a: LeaderboardInput, b: LeaderboardInput): number {
  return (
    b.result.totalScore - a.result.totalScore ||
    b.result.correctCount - a.result.correctCount ||
    a.result.averageTime - b.result.averageTime ||
    a.playerName.localeCompare(b.playerName)
  );
}

function isTie(a: LeaderboardInput, b: LeaderboardInput): boolean {
  return (
    a.result.totalScore === b.result.totalScore &&
    a.result.correctCount === b.result.correctCount &&
    a.result.averageTime === b.result.averageTime
  );
}

/**
 * Rank players by score, then correct answers, then speed.
 * Tied players share a rank and the next rank is skipped (1, 1, 3).
 */
export function buildLeaderboard(players: LeaderboardInput[]): LeaderboardEntry[] {
  const sorted = [...players].sort(compareEntries);
  const entries: LeaderboardEntry[] = [];

  sorted.forEach((player, index) => {
    const previous = index > 0 ? sorted[index - 1] : null;
    const rank = previous && isTie(previous, player) ? entries[index - 1].rank : index + 1;

    entries.push({
      rank,
      playerId: player.playerId,
      playerName: player.playerName,
      totalScore: player.result.totalScore,
      correctCount: player.result.correctCount,
      streak: player.result.streak,
      bestStreak: player.result.bestStreak,
      averageTime: player.result.averageTime,
    });
  });

  return entries;
}
