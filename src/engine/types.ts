// src/engine/types.ts
import type { PlayerID } from '../ratings/types';
import type { ResultToken } from '../parser/types';
import type { Player } from '../players/types';

/** One processed game. Frozen once appended; carries ELO figures only. */
export interface GameRecord {
  /** 1-based line number in the log, skipped lines included. */
  readonly gameNumber: number;
  readonly white: PlayerID;
  readonly black: PlayerID;
  readonly result: ResultToken;
  readonly date: string | null;
  readonly dateRaw: string | null;
  readonly whiteRatingBefore: number;
  readonly blackRatingBefore: number;
  readonly whiteRatingAfter: number;
  readonly blackRatingAfter: number;
  readonly whiteChange: number;
  readonly blackChange: number;
}

/** Everything a report needs: the player map and the ordered game list. */
export interface EngineSnapshot {
  players: Record<PlayerID, Player>;
  games: GameRecord[];
}
