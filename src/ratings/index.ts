// src/ratings/index.ts
import { updateEloPair, expectedScore, eloDelta } from './elo';
import { updateGlicko2Pair } from './glicko2';
import { updateUscfPair, uscfKFactor } from './uscf';
import type { RatingRequest, RatingResult } from './types';

export type {
  PlayerID,
  Score,
  RatingMode,
  RatingRequest,
  RatingResult,
  EloOptions,
  EloPairInput,
  EloPairResult,
  Glicko2State,
  Glicko2PairInput,
  Glicko2PairResult,
  UscfState,
  UscfPairInput,
  UscfPairResult,
} from './types';
export {
  DEFAULT_RATING,
  DEFAULT_ELO_K,
  GLICKO2_DEFAULT_DEVIATION,
  GLICKO2_DEFAULT_VOLATILITY,
} from './types';

export { updateEloPair, expectedScore, eloDelta };
export { updateGlicko2Pair };
export { updateUscfPair, uscfKFactor };
export { roundHalfEven } from './rounding';

// Generic facade – one pair, one system
export function updateRatings(req: RatingRequest): RatingResult {
  if (req.mode === 'elo') {
    return updateEloPair(req.white, req.black, req.score, req.options);
  }
  if (req.mode === 'glicko2') {
    return updateGlicko2Pair(req.white, req.black, req.score);
  }
  if (req.mode === 'uscf') {
    return updateUscfPair(req.white, req.black, req.score);
  }
  // Exhaustiveness guard; untyped callers can still get here
  const _exhaustive: never = req;
  throw new Error(`Unsupported rating mode: ${modeOf(_exhaustive)}`);
}

function modeOf(value: unknown): string {
  return typeof value === 'object' && value !== null && 'mode' in value ? String(value.mode) : String(value);
}
