// src/index.ts

// ──────────────────────────────────────────────────────────────
// Engine (facade + options + output shapes)
// ──────────────────────────────────────────────────────────────
export {
  RatingEngine,
  DEFAULT_ENGINE_OPTIONS,
  engineOptionsSchema,
  resolveEngineOptions,
  type EngineOptions,
  type EngineOptionsInput,
  type EngineSnapshot,
  type GameRecord,
} from './engine';

// ──────────────────────────────────────────────────────────────
// Ratings (ELO, simplified Glicko-2, USCF variable K)
// ──────────────────────────────────────────────────────────────
export {
  // Generic facade
  updateRatings,

  // Systems
  updateEloPair,
  updateGlicko2Pair,
  updateUscfPair,
  expectedScore,
  eloDelta,
  uscfKFactor,
  roundHalfEven,

  DEFAULT_RATING,
  DEFAULT_ELO_K,
  GLICKO2_DEFAULT_DEVIATION,
  GLICKO2_DEFAULT_VOLATILITY,

  type PlayerID,
  type Score,
  type RatingMode,
  type RatingRequest,
  type RatingResult,
  type EloOptions,
  type EloPairResult,
  type Glicko2State,
  type Glicko2PairResult,
  type UscfState,
  type UscfPairResult,
} from './ratings';

// ──────────────────────────────────────────────────────────────
// Parsing
// ──────────────────────────────────────────────────────────────
export {
  parseGameLine,
  parseResultToken,
  formatDate,
  type ParsedGame,
  type ResultToken,
  type ScorePair,
} from './parser';

// ──────────────────────────────────────────────────────────────
// Players (registry + per-player bookkeeping)
// ──────────────────────────────────────────────────────────────
export {
  PlayerRegistry,
  createPlayer,
  recordNotable,
  updateExtremes,
  tallyOpponent,
  NOTABLE_LIMIT_DEFAULT,
  type Player,
  type Outcome,
  type OpponentTally,
  type NotableResult,
  type HistoryEntry,
} from './players';

// ──────────────────────────────────────────────────────────────
// Collaborators: loading, summary, JSON export
// ──────────────────────────────────────────────────────────────
export { readGameLines, loadGamesFile, type LoadSummary } from './io/load';
export {
  topPlayers,
  winRate,
  formatSummary,
  toExportDocument,
  writeExport,
  type SummaryRow,
  type ExportDocument,
} from './report';

export {
  RatingsError,
  RatingOptionsError,
  GamesFileError,
  ExportError,
} from './errors';
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger';
