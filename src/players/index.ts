// src/players/index.ts
export type {
  Player,
  PlayerDefaults,
  Outcome,
  OpponentTally,
  NotableResult,
  HistoryEntry,
} from './types';
export { PlayerRegistry, createPlayer } from './registry';
export {
  NOTABLE_LIMIT_DEFAULT,
  recordNotable,
  recordOutcome,
  tallyOpponent,
  updateExtremes,
  invertOutcome,
} from './stats';
