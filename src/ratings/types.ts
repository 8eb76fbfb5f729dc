// src/ratings/types.ts

export type PlayerID = string;

/** White-side score of a single game. Black's score is always `1 - score`. */
export type Score = 0 | 0.5 | 1;

export const DEFAULT_RATING = 1200;
export const DEFAULT_ELO_K = 32;

// Glicko-2 starting values and scale
export const GLICKO2_SCALE = 173.7178;
export const GLICKO2_DEFAULT_DEVIATION = 350;
export const GLICKO2_DEFAULT_VOLATILITY = 0.06;
export const GLICKO2_VOLATILITY_CAP = 0.2;

// USCF K-factor tiers
export const USCF_PROVISIONAL_GAMES = 20;
export const USCF_MASTER_RATING = 2100;
export const USCF_K_PROVISIONAL = 40;
export const USCF_K_REGULAR = 32;
export const USCF_K_MASTER = 24;

// ----------------------
// ELO
// ----------------------
export interface EloOptions {
  /** Fixed K-factor for both sides. Default: 32 */
  K?: number;
}

export interface EloPairInput {
  white: number;
  black: number;
  score: Score;
}

export interface EloPairResult {
  mode: 'elo';
  white: number;
  black: number;
  whiteDelta: number;
  blackDelta: number;
}

// ----------------------
// Glicko-2 (simplified single-opponent variant)
// ----------------------
export interface Glicko2State {
  rating: number;
  deviation: number;
  volatility: number;
}

export interface Glicko2PairInput {
  white: Glicko2State;
  black: Glicko2State;
  score: Score;
}

export interface Glicko2PairResult {
  mode: 'glicko2';
  white: Glicko2State;
  black: Glicko2State;
}

// ----------------------
// USCF-style variable K
// ----------------------
export interface UscfState {
  rating: number;
  /** Games rated under this system so far; drives the K tier. */
  games: number;
}

export interface UscfPairInput {
  white: UscfState;
  black: UscfState;
  score: Score;
}

export interface UscfPairResult {
  mode: 'uscf';
  white: UscfState;
  black: UscfState;
  whiteDelta: number;
  blackDelta: number;
  whiteK: number;
  blackK: number;
}

// ----------------------
// Facade
// ----------------------
export type RatingMode = 'elo' | 'glicko2' | 'uscf';

export type RatingRequest =
  | ({ mode: 'elo' } & EloPairInput & { options?: EloOptions })
  | ({ mode: 'glicko2' } & Glicko2PairInput)
  | ({ mode: 'uscf' } & UscfPairInput);

export type RatingResult = EloPairResult | Glicko2PairResult | UscfPairResult;
