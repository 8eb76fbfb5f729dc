// src/report/export.ts
// JSON hand-off for renderers: `{ players, games }` exactly as the engine holds them.

import { writeFile } from 'node:fs/promises';

import { ExportError } from '../errors';
import type { EngineSnapshot } from '../engine/types';

export const EXPORT_VERSION = 1;

export interface ExportDocument extends EngineSnapshot {
  version: typeof EXPORT_VERSION;
  generatedAt: string;
}

export function toExportDocument(snapshot: EngineSnapshot, now: Date = new Date()): ExportDocument {
  return {
    version: EXPORT_VERSION,
    generatedAt: now.toISOString(),
    players: snapshot.players,
    games: snapshot.games,
  };
}

export async function writeExport(
  path: string,
  snapshot: EngineSnapshot,
  now?: Date
): Promise<ExportDocument> {
  const doc = toExportDocument(snapshot, now);
  try {
    await writeFile(path, JSON.stringify(doc, null, 2) + '\n', 'utf8');
  } catch (err) {
    throw new ExportError(path, err);
  }
  return doc;
}
