// src/engine/options.ts
import { z } from 'zod';

import { DEFAULT_ELO_K, DEFAULT_RATING } from '../ratings/types';
import { NOTABLE_LIMIT_DEFAULT } from '../players/stats';
import { RatingOptionsError } from '../errors';
import { silentLogger, type Logger } from '../logger';

export const DEFAULT_ENGINE_OPTIONS = {
  k: DEFAULT_ELO_K,
  initialRating: DEFAULT_RATING,
  notableLimit: NOTABLE_LIMIT_DEFAULT,
} as const;

export const engineOptionsSchema = z.object({
  /** ELO K-factor (the USCF tiers are fixed). */
  k: z.number().int().positive().default(DEFAULT_ENGINE_OPTIONS.k),
  /** Starting ELO for new players. */
  initialRating: z.number().int().positive().default(DEFAULT_ENGINE_OPTIONS.initialRating),
  /** Length of the biggest-wins / biggest-upsets lists. */
  notableLimit: z.number().int().positive().default(DEFAULT_ENGINE_OPTIONS.notableLimit),
});

export type EngineOptionsInput = z.input<typeof engineOptionsSchema> & { logger?: Logger };
export type EngineOptions = z.output<typeof engineOptionsSchema> & { logger: Logger };

export function resolveEngineOptions(input: EngineOptionsInput = {}): EngineOptions {
  const { logger, ...rest } = input;
  const parsed = engineOptionsSchema.safeParse(rest);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join('.') || '(root)'}: ${i.message}`
    );
    throw new RatingOptionsError(`Invalid engine options: ${issues.join('; ')}`, issues);
  }
  return { ...parsed.data, logger: logger ?? silentLogger };
}
