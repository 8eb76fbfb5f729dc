// src/engine/engine.ts
// Sequential rating engine: one log line in, every rating system and every
// per-player statistic updated, one frozen game record out.

import { parseGameLine, type ParsedGame } from '../parser';
import { updateEloPair } from '../ratings/elo';
import { updateGlicko2Pair } from '../ratings/glicko2';
import { updateUscfPair } from '../ratings/uscf';
import {
  PlayerRegistry,
  invertOutcome,
  recordNotable,
  recordOutcome,
  tallyOpponent,
  updateExtremes,
  type NotableResult,
  type Outcome,
  type Player,
} from '../players';
import type { Logger } from '../logger';
import {
  resolveEngineOptions,
  type EngineOptions,
  type EngineOptionsInput,
} from './options';
import type { EngineSnapshot, GameRecord } from './types';

const outcomeOfWhite = (whiteScore: number, blackScore: number): Outcome =>
  whiteScore > blackScore ? 'win' : whiteScore < blackScore ? 'loss' : 'draw';

export class RatingEngine {
  readonly players: PlayerRegistry;
  private readonly records: GameRecord[] = [];
  private readonly options: EngineOptions;
  private readonly log: Logger;

  constructor(options?: EngineOptionsInput) {
    this.options = resolveEngineOptions(options);
    this.log = this.options.logger;
    this.players = new PlayerRegistry({ initialRating: this.options.initialRating });
  }

  get games(): ReadonlyArray<GameRecord> {
    return this.records;
  }

  /**
   * Process every line in order; line `i` (0-based) is game number `i + 1`
   * whether or not it parses. Returns how many records were appended.
   */
  processLines(lines: Iterable<string>): number {
    const before = this.records.length;
    let n = 0;
    for (const line of lines) this.processLine(line, ++n);
    const added = this.records.length - before;
    this.log.debug('processed lines', { lines: n, games: added });
    return added;
  }

  /** Returns the new record, or null when the line was skipped. */
  processLine(line: string, gameNumber: number): GameRecord | null {
    const parsed = parseGameLine(line);
    if (!parsed) {
      if (line.trim()) this.log.debug('skipping unparsable line', { gameNumber, line: line.trim() });
      return null;
    }
    return this.apply(parsed, gameNumber);
  }

  snapshot(): EngineSnapshot {
    return { players: this.players.toRecord(), games: [...this.records] };
  }

  // ----------------------
  // per-game update
  // ----------------------
  private apply(game: ParsedGame, gameNumber: number): GameRecord {
    const white = this.players.ensure(game.white);
    const black = this.players.ensure(game.black);
    const score = game.scores.white;

    const whiteBefore = white.elo;
    const blackBefore = black.elo;

    // ELO
    const elo = updateEloPair(whiteBefore, blackBefore, score, { K: this.options.k });
    // apply deltas: white and black can be the same record
    white.elo += elo.whiteDelta;
    black.elo += elo.blackDelta;

    // Glicko-2, from each side's own pre-game state
    const glicko = updateGlicko2Pair(
      { rating: white.glickoRating, deviation: white.glickoDeviation, volatility: white.glickoVolatility },
      { rating: black.glickoRating, deviation: black.glickoDeviation, volatility: black.glickoVolatility },
      score
    );
    white.glickoRating = glicko.white.rating;
    white.glickoDeviation = glicko.white.deviation;
    white.glickoVolatility = glicko.white.volatility;
    black.glickoRating = glicko.black.rating;
    black.glickoDeviation = glicko.black.deviation;
    black.glickoVolatility = glicko.black.volatility;

    // USCF
    const uscf = updateUscfPair(
      { rating: white.uscfRating, games: white.uscfGames },
      { rating: black.uscfRating, games: black.uscfGames },
      score
    );
    white.uscfRating += uscf.whiteDelta;
    black.uscfRating += uscf.blackDelta;
    white.uscfGames++;
    black.uscfGames++;

    updateExtremes(white);
    updateExtremes(black);

    const whiteOutcome = outcomeOfWhite(game.scores.white, game.scores.black);
    const blackOutcome = invertOutcome(whiteOutcome);
    recordOutcome(white, whiteOutcome);
    recordOutcome(black, blackOutcome);
    tallyOpponent(white, black.name, whiteOutcome);
    tallyOpponent(black, white.name, blackOutcome);

    if (whiteOutcome === 'win') {
      this.recordUpset(white, black, whiteBefore, blackBefore, gameNumber, game.date);
    } else if (whiteOutcome === 'loss') {
      this.recordUpset(black, white, blackBefore, whiteBefore, gameNumber, game.date);
    }

    const label = game.date ?? `Game ${gameNumber}`;
    for (const p of [white, black]) {
      p.history.push({
        game: gameNumber,
        date: label,
        elo: p.elo,
        glicko2: p.glickoRating,
        uscf: p.uscfRating,
      });
    }

    const record: GameRecord = Object.freeze({
      gameNumber,
      white: white.name,
      black: black.name,
      result: game.result,
      date: game.date,
      dateRaw: game.dateRaw,
      whiteRatingBefore: whiteBefore,
      blackRatingBefore: blackBefore,
      whiteRatingAfter: white.elo,
      blackRatingAfter: black.elo,
      whiteChange: elo.whiteDelta,
      blackChange: elo.blackDelta,
    });
    this.records.push(record);
    return record;
  }

  /**
   * A decisive game between unequal pre-game ELOs where the lower-rated side
   * won: a biggest-win entry for the winner, a biggest-upset entry for the loser.
   */
  private recordUpset(
    winner: Player,
    loser: Player,
    winnerBefore: number,
    loserBefore: number,
    gameNumber: number,
    date: string | null
  ): void {
    if (loserBefore <= winnerBefore) return;

    const ratingDiff = Math.abs(winnerBefore - loserBefore);
    const limit = this.options.notableLimit;

    const win: NotableResult = {
      opponent: loser.name,
      ratingDiff,
      ownRating: winnerBefore,
      opponentRating: loserBefore,
      gameNumber,
      date,
      result: 'Win',
    };
    const upset: NotableResult = {
      opponent: winner.name,
      ratingDiff,
      ownRating: loserBefore,
      opponentRating: winnerBefore,
      gameNumber,
      date,
      result: 'Loss',
    };

    winner.biggestWins = recordNotable(winner.biggestWins, win, limit);
    loser.biggestUpsets = recordNotable(loser.biggestUpsets, upset, limit);
  }
}
