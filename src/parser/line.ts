// src/parser/line.ts
// Game log grammar, one game per line:
//   <White Name> - <Black Name> <result>[ <YYYYMMDD>]

import type { ParsedGame, ResultToken, ScorePair } from './types';
import { formatDate, isDateToken } from './date';

const PLAYER_SEPARATOR = ' - ';

const RESULTS: Readonly<Record<ResultToken, ScorePair>> = {
  '1:0': { white: 1, black: 0 },
  '1-0': { white: 1, black: 0 },
  '0:1': { white: 0, black: 1 },
  '0-1': { white: 0, black: 1 },
  '0.5:0.5': { white: 0.5, black: 0.5 },
  '0.5-0.5': { white: 0.5, black: 0.5 },
};

const isResultToken = (token: string): token is ResultToken =>
  Object.prototype.hasOwnProperty.call(RESULTS, token);

export function parseResultToken(token: string): ScorePair | null {
  return isResultToken(token) ? { ...RESULTS[token] } : null;
}

/** Splits `text` at its last whitespace run. */
function splitLast(text: string): [string, string] | null {
  const m = /^(.*\S)\s+(\S+)$/s.exec(text);
  if (!m || m[1] === undefined || m[2] === undefined) return null;
  return [m[1], m[2]];
}

/**
 * Parse one raw log line. Anything off-grammar yields null; callers skip it.
 */
export function parseGameLine(line: string): ParsedGame | null {
  let text = line.trim();
  if (!text) return null;

  const tokens = text.split(/\s+/);
  if (tokens.length < 3) return null;

  let dateRaw: string | null = null;
  const last = tokens[tokens.length - 1];
  if (tokens.length > 3 && last !== undefined && isDateToken(last)) {
    dateRaw = last;
    text = tokens.slice(0, -1).join(' ');
  }

  const split = splitLast(text);
  if (!split) return null;
  const [playerPart, result] = split;

  const sep = playerPart.indexOf(PLAYER_SEPARATOR);
  if (sep < 0) return null;

  const white = playerPart.slice(0, sep).trim();
  const black = playerPart.slice(sep + PLAYER_SEPARATOR.length).trim();
  if (!white || !black) return null;

  if (!isResultToken(result)) return null;

  return {
    white,
    black,
    result,
    scores: { ...RESULTS[result] },
    dateRaw,
    date: formatDate(dateRaw),
  };
}
