// src/ratings/uscf.ts
import {
  type Score,
  type UscfPairResult,
  type UscfState,
  USCF_K_MASTER,
  USCF_K_PROVISIONAL,
  USCF_K_REGULAR,
  USCF_MASTER_RATING,
  USCF_PROVISIONAL_GAMES,
} from './types';
import { eloDelta } from './elo';

export type { UscfState, UscfPairInput, UscfPairResult } from './types';

/**
 * K tier from a player's own pre-game USCF state:
 * provisional (< 20 games) 40, below 2100 32, otherwise 24.
 */
export function uscfKFactor(games: number, rating: number): number {
  if (games < USCF_PROVISIONAL_GAMES) return USCF_K_PROVISIONAL;
  if (rating < USCF_MASTER_RATING) return USCF_K_REGULAR;
  return USCF_K_MASTER;
}

export function updateUscfPair(
  white: Readonly<UscfState>,
  black: Readonly<UscfState>,
  score: Score
): UscfPairResult {
  const whiteK = uscfKFactor(white.games, white.rating);
  const blackK = uscfKFactor(black.games, black.rating);

  const whiteDelta = eloDelta(white.rating, black.rating, score, whiteK);
  const blackDelta = eloDelta(black.rating, white.rating, 1 - score, blackK);

  return {
    mode: 'uscf',
    white: { rating: white.rating + whiteDelta, games: white.games + 1 },
    black: { rating: black.rating + blackDelta, games: black.games + 1 },
    whiteDelta,
    blackDelta,
    whiteK,
    blackK,
  };
}
