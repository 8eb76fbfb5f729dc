// src/engine/index.ts
export type { GameRecord, EngineSnapshot } from './types';
export type { EngineOptions, EngineOptionsInput } from './options';
export {
  DEFAULT_ENGINE_OPTIONS,
  engineOptionsSchema,
  resolveEngineOptions,
} from './options';
export { RatingEngine } from './engine';
