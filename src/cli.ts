// src/cli.ts
import yargs from 'yargs';
import { z } from 'zod';

import { RatingEngine } from './engine/engine';
import { DEFAULT_ENGINE_OPTIONS } from './engine/options';
import { loadGamesFile } from './io/load';
import { formatSummary } from './report/summary';
import { writeExport } from './report/export';
import { RatingOptionsError, RatingsError, stringifyError } from './errors';
import { createLogger, type Logger } from './logger';

export const DEFAULT_GAMES_FILE = 'games.txt';
export const DEFAULT_TOP = 5;

const cliOptionsSchema = z.object({
  file: z.string().min(1),
  top: z.number().int().positive(),
  json: z.string().min(1).optional(),
  k: z.number().int().positive(),
  initialRating: z.number().int().positive(),
  verbose: z.boolean(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export interface CliIO {
  /** Summary output; defaults to console.log. */
  stdout?: (line: string) => void;
  /** Replaces the logger built from --verbose. */
  logger?: Logger;
}

export async function parseCliArgs(argv: string[]): Promise<CliOptions> {
  const args = await yargs(argv)
    .scriptName('chess-ratings')
    .usage('$0 [file] [options]\n\nRate every player in a game log (default: games.txt).')
    .option('top', {
      alias: 'n',
      type: 'number',
      default: DEFAULT_TOP,
      describe: 'Players listed in the summary',
    })
    .option('json', {
      alias: 'o',
      type: 'string',
      describe: 'Write players and games as JSON to this path',
    })
    .option('k', {
      type: 'number',
      default: DEFAULT_ENGINE_OPTIONS.k,
      describe: 'ELO K-factor',
    })
    .option('initial-rating', {
      type: 'number',
      default: DEFAULT_ENGINE_OPTIONS.initialRating,
      describe: 'Starting ELO for new players',
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      default: false,
      describe: 'Log skipped lines and other debug output',
    })
    .strictOptions()
    .fail((msg, err) => {
      throw err ?? new RatingOptionsError(msg);
    })
    .help()
    .parseAsync();

  const first = args._[0];
  const parsed = cliOptionsSchema.safeParse({
    file: first === undefined ? DEFAULT_GAMES_FILE : String(first),
    top: args.top,
    json: args.json,
    k: args.k,
    initialRating: args['initial-rating'],
    verbose: args.verbose,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`);
    throw new RatingOptionsError(`Invalid arguments: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/** Full run: load, rate, optionally export, print the summary. Resolves to an exit code. */
export async function runCli(argv: string[], io: CliIO = {}): Promise<number> {
  const print = io.stdout ?? ((line: string) => console.log(line));

  let opts: CliOptions;
  try {
    opts = await parseCliArgs(argv);
  } catch (err) {
    (io.logger ?? createLogger()).error(stringifyError(err));
    return 1;
  }

  const logger = io.logger ?? createLogger({ level: opts.verbose ? 'debug' : 'info' });

  try {
    const engine = new RatingEngine({ k: opts.k, initialRating: opts.initialRating, logger });
    await loadGamesFile(engine, opts.file, logger);
    const snapshot = engine.snapshot();

    if (opts.json) {
      await writeExport(opts.json, snapshot);
      logger.info(`Wrote ${opts.json}`);
    }

    for (const line of formatSummary(snapshot, opts.top)) print(line);
    return 0;
  } catch (err) {
    if (err instanceof RatingsError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }
}
