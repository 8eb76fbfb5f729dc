// src/parser/index.ts
export type { ParsedGame, ResultToken, ScorePair } from './types';
export { parseGameLine, parseResultToken } from './line';
export { formatDate, isDateToken } from './date';
