import { LEADERBOARD_LIMIT } from '../../shared/constants';

export interface ScoreEntry {
  playerName: string;
  score: number;
  maxTile: number;
  moves: number;
  size: number;
  achievedAt: number;
}

export interface LeaderboardStats {
  totalPlayers: number;
  highestScore: number;
  highestTile: number;
  averageScore: number;
}

/**
 * In-memory best-score table. One entry per player: a new submission only
 * replaces the stored one when its score is higher.
 */
export class Leaderboard {
  private readonly entries = new Map<string, ScoreEntry>();

  constructor(private readonly limit: number = LEADERBOARD_LIMIT) {}

  /**
   * @returns true when the entry was stored
   */
  addOrUpdateScore(entry: Omit<ScoreEntry, 'achievedAt'>, now: number = Date.now()): boolean {
    const existing = this.entries.get(entry.playerName);
    if (existing && existing.score >= entry.score) {
      return false;
    }
    this.entries.set(entry.playerName, { ...entry, achievedAt: now });
    return true;
  }

  getTopScores(limit: number = this.limit): ScoreEntry[] {
    return Array.from(this.entries.values())
      .sort((a, b) => b.score - a.score || b.maxTile - a.maxTile || a.achievedAt - b.achievedAt)
      .slice(0, limit)
      .map((entry) => ({ ...entry }));
  }

  getStats(): LeaderboardStats {
    const all = Array.from(this.entries.values());
    if (all.length === 0) {
      return { totalPlayers: 0, highestScore: 0, highestTile: 0, averageScore: 0 };
    }
    const total = all.reduce((sum, entry) => sum + entry.score, 0);
    return {
      totalPlayers: all.length,
      highestScore: Math.max(...all.map((entry) => entry.score)),
      highestTile: Math.max(...all.map((entry) => entry.maxTile)),
      averageScore: Math.round(total / all.length),
    };
  }

  clear(): void {
    this.entries.clear();
  }
}
