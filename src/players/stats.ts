// src/players/stats.ts
// Per-game bookkeeping on a single player record.

import type { PlayerID } from '../ratings/types';
import type { NotableResult, OpponentTally, Outcome, Player } from './types';

export const NOTABLE_LIMIT_DEFAULT = 5;

/**
 * Append, sort by rating gap (descending), keep the first `limit`.
 * Array#sort is stable, so equal gaps keep their prior relative order and
 * a newcomer tied with the current tail falls off.
 */
export function recordNotable(
  list: NotableResult[],
  entry: NotableResult,
  limit = NOTABLE_LIMIT_DEFAULT
): NotableResult[] {
  const next = [...list, entry];
  next.sort((a, b) => b.ratingDiff - a.ratingDiff);
  return next.slice(0, limit);
}

/** Widen the six extremes to cover the player's current ratings. */
export function updateExtremes(p: Player): void {
  p.highestElo = Math.max(p.highestElo, p.elo);
  p.lowestElo = Math.min(p.lowestElo, p.elo);
  p.highestGlicko = Math.max(p.highestGlicko, p.glickoRating);
  p.lowestGlicko = Math.min(p.lowestGlicko, p.glickoRating);
  p.highestUscf = Math.max(p.highestUscf, p.uscfRating);
  p.lowestUscf = Math.min(p.lowestUscf, p.uscfRating);
}

// safe counter bump on a tally
function bump(t: OpponentTally | Player, outcome: Outcome): void {
  t.games++;
  if (outcome === 'win') t.wins++;
  else if (outcome === 'loss') t.losses++;
  else t.draws++;
}

export function recordOutcome(p: Player, outcome: Outcome): void {
  bump(p, outcome);
}

export function tallyOpponent(p: Player, opponent: PlayerID, outcome: Outcome): OpponentTally {
  const tally = (p.opponents[opponent] ??= { games: 0, wins: 0, draws: 0, losses: 0 });
  bump(tally, outcome);
  return tally;
}

export const invertOutcome = (o: Outcome): Outcome =>
  o === 'win' ? 'loss' : o === 'loss' ? 'win' : 'draw';
