// src/players/registry.ts
// Name → mutable player state. One registry per run; entries are created
// lazily and never removed.

import type { PlayerID } from '../ratings/types';
import {
  DEFAULT_RATING,
  GLICKO2_DEFAULT_DEVIATION,
  GLICKO2_DEFAULT_VOLATILITY,
} from '../ratings/types';
import type { Player, PlayerDefaults } from './types';

export function createPlayer(name: PlayerID, defaults?: PlayerDefaults): Player {
  const elo = defaults?.initialRating ?? DEFAULT_RATING;
  return {
    name,
    elo,
    glickoRating: DEFAULT_RATING,
    glickoDeviation: GLICKO2_DEFAULT_DEVIATION,
    glickoVolatility: GLICKO2_DEFAULT_VOLATILITY,
    uscfRating: DEFAULT_RATING,
    uscfGames: 0,
    games: 0,
    wins: 0,
    draws: 0,
    losses: 0,
    opponents: Object.create(null),
    biggestWins: [],
    biggestUpsets: [],
    highestElo: elo,
    lowestElo: elo,
    highestGlicko: DEFAULT_RATING,
    lowestGlicko: DEFAULT_RATING,
    highestUscf: DEFAULT_RATING,
    lowestUscf: DEFAULT_RATING,
    history: [],
  };
}

export class PlayerRegistry {
  private readonly byName = new Map<PlayerID, Player>();

  constructor(private readonly defaults: PlayerDefaults = {}) {}

  /** Returns the player, creating it with starting values on first sight. */
  ensure(name: PlayerID): Player {
    const key = name.trim();
    let player = this.byName.get(key);
    if (!player) {
      player = createPlayer(key, this.defaults);
      this.byName.set(key, player);
    }
    return player;
  }

  get(name: PlayerID): Player | undefined {
    return this.byName.get(name.trim());
  }

  has(name: PlayerID): boolean {
    return this.byName.has(name.trim());
  }

  get size(): number {
    return this.byName.size;
  }

  /** Names in first-seen order. */
  names(): PlayerID[] {
    return [...this.byName.keys()];
  }

  values(): Player[] {
    return [...this.byName.values()];
  }

  /** Plain name → player object, first-seen order. Shares the live records. */
  toRecord(): Record<PlayerID, Player> {
    const out: Record<PlayerID, Player> = Object.create(null);
    for (const [name, player] of this.byName) out[name] = player;
    return out;
  }
}
