// src/parser/types.ts
import type { PlayerID, Score } from '../ratings/types';

export type ResultToken =
  | '1:0'
  | '1-0'
  | '0:1'
  | '0-1'
  | '0.5:0.5'
  | '0.5-0.5';

export interface ScorePair {
  white: Score;
  black: Score;
}

/** One successfully parsed log line. */
export interface ParsedGame {
  white: PlayerID;
  black: PlayerID;
  /** Raw result token exactly as written. */
  result: ResultToken;
  scores: ScorePair;
  /** 8-digit `YYYYMMDD` token, when the line carried one. */
  dateRaw: string | null;
  /** `"Mon D, YYYY"`, or null when absent or not a real month/day. */
  date: string | null;
}
