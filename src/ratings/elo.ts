// src/ratings/elo.ts
import {
  type EloOptions,
  type EloPairResult,
  type Score,
  DEFAULT_ELO_K,
} from './types';
import { roundHalfEven } from './rounding';

export type { EloPairInput, EloPairResult, EloOptions } from './types';

// ---------------------------------------
// Expected score
// ---------------------------------------
export function expectedScore(rA: number, rB: number): number {
  // 1 / (1 + 10^((Rb - Ra)/400))
  return 1 / (1 + Math.pow(10, (rB - rA) / 400));
}

/** Integer rating change for the side rated `rA` scoring `score` against `rB`. */
export function eloDelta(rA: number, rB: number, score: number, K: number): number {
  return roundHalfEven(K * (score - expectedScore(rA, rB)));
}

// ----------------------
// Core ELO update (simultaneous)
// ----------------------
export function updateEloPair(
  white: number,
  black: number,
  score: Score,
  options?: EloOptions
): EloPairResult {
  const { K = DEFAULT_ELO_K } = options ?? {};

  // both deltas come from the pre-game pair
  const whiteDelta = eloDelta(white, black, score, K);
  const blackDelta = eloDelta(black, white, 1 - score, K);

  return {
    mode: 'elo',
    white: white + whiteDelta,
    black: black + blackDelta,
    whiteDelta,
    blackDelta,
  };
}
