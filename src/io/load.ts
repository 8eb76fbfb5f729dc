// src/io/load.ts
import { readFile } from 'node:fs/promises';

import { GamesFileError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { RatingEngine } from '../engine/engine';

export interface LoadSummary {
  path: string;
  lines: number;
  /** Records appended by this load. */
  games: number;
  /** Registry size after the load. */
  players: number;
}

/** Read a games file as lines. Line numbers are positions in this array + 1. */
export async function readGameLines(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new GamesFileError(path, err);
  }
  const lines = text.split(/\r\n|\r|\n/);
  // a trailing newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export async function loadGamesFile(
  engine: RatingEngine,
  path: string,
  logger: Logger = silentLogger
): Promise<LoadSummary> {
  const lines = await readGameLines(path);
  const games = engine.processLines(lines);
  const summary: LoadSummary = {
    path,
    lines: lines.length,
    games,
    players: engine.players.size,
  };
  logger.info(`Processed ${summary.games} games for ${summary.players} players`, { path });
  return summary;
}
