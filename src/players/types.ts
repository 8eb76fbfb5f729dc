// src/players/types.ts
import type { PlayerID } from '../ratings/types';

export type Outcome = 'win' | 'draw' | 'loss';

export interface OpponentTally {
  games: number;
  wins: number;
  draws: number;
  losses: number;
}

/** A win over a higher-rated player, or a loss to a lower-rated one. */
export interface NotableResult {
  opponent: PlayerID;
  /** |own − opponent| pre-game ELO. */
  ratingDiff: number;
  ownRating: number;
  opponentRating: number;
  gameNumber: number;
  date: string | null;
  result: 'Win' | 'Loss';
}

/** Ratings right after one of the player's games. */
export interface HistoryEntry {
  game: number;
  /** Formatted date, or `"Game N"` when the line had none. */
  date: string;
  elo: number;
  glicko2: number;
  uscf: number;
}

export interface Player {
  name: PlayerID;

  elo: number;
  glickoRating: number;
  glickoDeviation: number;
  glickoVolatility: number;
  uscfRating: number;
  uscfGames: number;

  games: number;
  wins: number;
  draws: number;
  losses: number;

  opponents: Record<PlayerID, OpponentTally>;

  biggestWins: NotableResult[];
  biggestUpsets: NotableResult[];

  highestElo: number;
  lowestElo: number;
  highestGlicko: number;
  lowestGlicko: number;
  highestUscf: number;
  lowestUscf: number;

  history: HistoryEntry[];
}

export interface PlayerDefaults {
  /** Starting ELO. Glicko-2 and USCF always start at 1200. */
  initialRating?: number;
}
