// src/ratings/glicko2.ts
// Simplified single-period, single-opponent Glicko-2.
//
// Volatility is taken analytically as sqrt((σ² + Δ²/v) / 2), capped at 0.2,
// instead of the iterative solve of the full algorithm. No τ.

import {
  type Glicko2PairResult,
  type Glicko2State,
  type Score,
  DEFAULT_RATING,
  GLICKO2_SCALE,
  GLICKO2_VOLATILITY_CAP,
} from './types';
import { roundHalfEven } from './rounding';

export type { Glicko2State, Glicko2PairInput, Glicko2PairResult } from './types';

// ---------- scale conversions ----------
export const toMu = (rating: number): number => (rating - DEFAULT_RATING) / GLICKO2_SCALE;
export const fromMu = (mu: number): number => mu * GLICKO2_SCALE + DEFAULT_RATING;
export const toPhi = (deviation: number): number => deviation / GLICKO2_SCALE;
export const fromPhi = (phi: number): number => phi * GLICKO2_SCALE;

export function g(phi: number): number {
  return 1 / Math.sqrt(1 + (3 * phi * phi) / (Math.PI * Math.PI));
}

/** Expected score of μ against an opponent at (μj, φj). */
export function E(mu: number, muJ: number, phiJ: number): number {
  return 1 / (1 + Math.exp(-g(phiJ) * (mu - muJ)));
}

/** One side's update against a single opponent, on the Glicko-2 scale. */
function rateAgainst(
  self: Glicko2State,
  opp: Glicko2State,
  score: number
): Glicko2State {
  const mu = toMu(self.rating);
  const phi = toPhi(self.deviation);
  const sigma = self.volatility;

  const muJ = toMu(opp.rating);
  const gJ = g(toPhi(opp.deviation));
  const e = E(mu, muJ, toPhi(opp.deviation));

  const v = 1 / (gJ * gJ * e * (1 - e));
  const delta = v * gJ * (score - e);

  const sigmaNew = Math.min(
    Math.sqrt((sigma * sigma + (delta * delta) / v) / 2),
    GLICKO2_VOLATILITY_CAP
  );

  const phiStar2 = phi * phi + sigmaNew * sigmaNew;
  const phiNew = 1 / Math.sqrt(1 / phiStar2 + 1 / v);
  const muNew = mu + phiNew * phiNew * gJ * (score - e);

  return {
    rating: roundHalfEven(fromMu(muNew)),
    deviation: roundHalfEven(fromPhi(phiNew), 1),
    volatility: roundHalfEven(sigmaNew, 4),
  };
}

export function updateGlicko2Pair(
  white: Readonly<Glicko2State>,
  black: Readonly<Glicko2State>,
  score: Score
): Glicko2PairResult {
  return {
    mode: 'glicko2',
    white: rateAgainst(white, black, score),
    black: rateAgainst(black, white, 1 - score),
  };
}
