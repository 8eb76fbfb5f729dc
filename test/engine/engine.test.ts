import { describe, it, expect } from "vitest";
import { RatingEngine } from "../../src/engine";
import type { Player } from "../../src/players";

// helper to assert a player exists
const must = (engine: RatingEngine, name: string): Player => {
  const p = engine.players.get(name);
  if (!p) throw new Error(`Missing player ${name}`);
  return p;
};

describe("RatingEngine – two-game scenario", () => {
  const engine = new RatingEngine();
  engine.processLines(["Alice - Bob 1-0 20250101", "Bob - Alice 0-1 20250102"]);
  const [g1, g2] = engine.games;

  it("game 1: equal ratings, ±16", () => {
    expect(g1).toEqual({
      gameNumber: 1,
      white: "Alice",
      black: "Bob",
      result: "1-0",
      date: "Jan 1, 2025",
      dateRaw: "20250101",
      whiteRatingBefore: 1200,
      blackRatingBefore: 1200,
      whiteRatingAfter: 1216,
      blackRatingAfter: 1184,
      whiteChange: 16,
      blackChange: -16,
    });
  });

  it("game 2: fresh deltas from 1184 vs 1216", () => {
    expect(g2).toMatchObject({
      gameNumber: 2,
      white: "Bob",
      black: "Alice",
      whiteRatingBefore: 1184,
      blackRatingBefore: 1216,
      whiteRatingAfter: 1169,
      blackRatingAfter: 1231,
      whiteChange: -15,
      blackChange: 15,
    });
  });

  it("all three systems end where they should", () => {
    expect(must(engine, "Alice")).toMatchObject({
      elo: 1231,
      glickoRating: 1422,
      glickoDeviation: 262.6,
      glickoVolatility: 0.2,
      uscfRating: 1238,
      uscfGames: 2,
      games: 2, wins: 2, draws: 0, losses: 0,
      highestElo: 1231, lowestElo: 1200,
      highestGlicko: 1422, lowestGlicko: 1200,
      highestUscf: 1238, lowestUscf: 1200,
    });
    expect(must(engine, "Bob")).toMatchObject({
      elo: 1169,
      glickoRating: 978,
      uscfRating: 1162,
      games: 2, wins: 0, draws: 0, losses: 2,
      highestElo: 1200, lowestElo: 1169,
      lowestGlicko: 978, lowestUscf: 1162,
    });
  });

  it("favourite beating the underdog is not notable", () => {
    expect(must(engine, "Alice").biggestWins).toEqual([]);
    expect(must(engine, "Bob").biggestUpsets).toEqual([]);
  });

  it("history has one snapshot per game", () => {
    expect(must(engine, "Alice").history).toEqual([
      { game: 1, date: "Jan 1, 2025", elo: 1216, glicko2: 1363, uscf: 1220 },
      { game: 2, date: "Jan 2, 2025", elo: 1231, glicko2: 1422, uscf: 1238 },
    ]);
    expect(must(engine, "Bob").history).toEqual([
      { game: 1, date: "Jan 1, 2025", elo: 1184, glicko2: 1037, uscf: 1180 },
      { game: 2, date: "Jan 2, 2025", elo: 1169, glicko2: 978, uscf: 1162 },
    ]);
  });

  it("head-to-head both ways", () => {
    expect(must(engine, "Alice").opponents["Bob"]).toEqual({ games: 2, wins: 2, draws: 0, losses: 0 });
    expect(must(engine, "Bob").opponents["Alice"]).toEqual({ games: 2, wins: 0, draws: 0, losses: 2 });
  });

  it("game records are frozen", () => {
    expect(Object.isFrozen(g1)).toBe(true);
  });
});

describe("RatingEngine – upsets and skipped lines", () => {
  const engine = new RatingEngine();
  const added = engine.processLines(["Alice - Bob 1-0 20250101", "garbage text", "Bob - Alice 1-0"]);

  it("skipped lines still consume a game number", () => {
    expect(added).toBe(2);
    expect(engine.games.map((g) => g.gameNumber)).toEqual([1, 3]);
    expect(engine.players.size).toBe(2);
  });

  it("lower-rated winner gets a biggest win, higher-rated loser a biggest upset", () => {
    expect(must(engine, "Bob").biggestWins).toEqual([
      {
        opponent: "Alice",
        ratingDiff: 32,
        ownRating: 1184,
        opponentRating: 1216,
        gameNumber: 3,
        date: null,
        result: "Win",
      },
    ]);
    expect(must(engine, "Alice").biggestUpsets).toEqual([
      {
        opponent: "Bob",
        ratingDiff: 32,
        ownRating: 1216,
        opponentRating: 1184,
        gameNumber: 3,
        date: null,
        result: "Loss",
      },
    ]);
    expect(must(engine, "Bob").biggestUpsets).toEqual([]);
    expect(must(engine, "Alice").biggestWins).toEqual([]);
  });

  it("undated games are labelled by number in history", () => {
    expect(must(engine, "Bob").history.map((h) => h.date)).toEqual(["Jan 1, 2025", "Game 3"]);
    expect(must(engine, "Bob").history[1]).toEqual({ game: 3, date: "Game 3", elo: 1201, glicko2: 1270, uscf: 1202 });
  });

  it("extremes track the dip and recovery", () => {
    expect(must(engine, "Bob")).toMatchObject({ highestElo: 1201, lowestElo: 1184 });
    expect(must(engine, "Alice")).toMatchObject({ highestElo: 1216, lowestElo: 1199 });
  });
});

describe("RatingEngine – draws and malformed input", () => {
  it("draw at equal ratings: no ELO change, nothing notable", () => {
    const engine = new RatingEngine();
    const rec = engine.processLine("Carol - Dave 0.5:0.5", 1);
    expect(rec?.whiteChange).toBe(0);
    expect(rec?.blackChange).toBe(0);
    for (const n of ["Carol", "Dave"]) {
      const p = must(engine, n);
      expect(p.draws).toBe(1);
      expect(p.biggestWins).toEqual([]);
      expect(p.biggestUpsets).toEqual([]);
    }
  });

  it("an unparsable line changes nothing", () => {
    const engine = new RatingEngine();
    expect(engine.processLine("garbage text", 1)).toBeNull();
    expect(engine.processLine("Alice - Bob 2-0", 2)).toBeNull();
    expect(engine.processLine("", 3)).toBeNull();
    expect(engine.players.size).toBe(0);
    expect(engine.games).toHaveLength(0);
  });

  it("the next valid line keeps its own line number", () => {
    const engine = new RatingEngine();
    engine.processLines(["garbage text", "", "Alice - Bob 0-1"]);
    expect(engine.games).toHaveLength(1);
    expect(engine.games[0]?.gameNumber).toBe(3);
  });

  it("doubled spaces in a dated line name the same player", () => {
    const engine = new RatingEngine();
    engine.processLines(["Alice  Smith - Bob 1-0 20250101", "Alice Smith - Bob 1-0 20250102"]);
    expect(engine.players.names()).toEqual(["Alice Smith", "Bob"]);
    expect(must(engine, "Alice Smith").games).toBe(2);
  });

  it("different-cased names are different players", () => {
    const engine = new RatingEngine();
    engine.processLine("alice - Alice 1-0", 1);
    expect(engine.players.names()).toEqual(["alice", "Alice"]);
  });
});

describe("RatingEngine – options", () => {
  it("uses the configured K and starting rating", () => {
    const engine = new RatingEngine({ k: 16, initialRating: 1500 });
    const rec = engine.processLine("A - B 1-0", 1);
    expect(rec).toMatchObject({ whiteRatingBefore: 1500, whiteChange: 8, blackChange: -8 });
  });

  it("caps notable lists at notableLimit", () => {
    const engine = new RatingEngine({ notableLimit: 2 });
    // Top climbs, then loses to three weaker players in turn
    engine.processLines([
      "Top - X 1-0",
      "Top - Y 1-0",
      "Top - Z 1-0",
      "Top - X 0-1",
      "Top - Y 0-1",
      "Top - Z 0-1",
    ]);
    expect(must(engine, "Top").biggestUpsets).toHaveLength(2);
  });

  it("logs skipped lines at debug", () => {
    const lines: string[] = [];
    const logger = {
      debug: (m: string, ctx?: Record<string, unknown>) => lines.push(`${m} ${JSON.stringify(ctx)}`),
      info: () => undefined,
      warn: () => undefined,
      error: () => undefined,
    };
    const engine = new RatingEngine({ logger });
    engine.processLine("not a game", 4);
    expect(lines).toEqual(['skipping unparsable line {"gameNumber":4,"line":"not a game"}']);
  });
});

describe("RatingEngine – snapshot", () => {
  it("exposes the player map and a copy of the game list", () => {
    const engine = new RatingEngine();
    engine.processLines(["A - B 1-0", "B - C 0.5-0.5"]);
    const snap = engine.snapshot();
    expect(Object.keys(snap.players)).toEqual(["A", "B", "C"]);
    expect(snap.games).toHaveLength(2);
    snap.games.pop();
    expect(engine.games).toHaveLength(2);
  });
});

describe("RatingEngine – self-paired line", () => {
  const engine = new RatingEngine();
  const rec = engine.processLine("Solo - Solo 1-0 20250101", 1);
  const solo = must(engine, "Solo");

  it("both ELO and USCF deltas land on the one record", () => {
    expect(rec).toMatchObject({
      whiteRatingBefore: 1200,
      blackRatingBefore: 1200,
      whiteChange: 16,
      blackChange: -16,
      whiteRatingAfter: 1200,
      blackRatingAfter: 1200,
    });
    expect(solo.elo).toBe(1200);
    expect(solo.uscfRating).toBe(1200);
    expect(solo.uscfGames).toBe(2);
  });

  it("Glicko-2 keeps the black-side result", () => {
    expect(solo.glickoRating).toBe(1037);
    expect(solo.glickoDeviation).toBe(291.2);
    expect(solo.glickoVolatility).toBe(0.2);
    expect(solo).toMatchObject({ highestGlicko: 1200, lowestGlicko: 1037 });
  });

  it("counts a win and a loss against itself", () => {
    expect(solo).toMatchObject({ games: 2, wins: 1, draws: 0, losses: 1 });
    expect(solo.opponents).toEqual({ Solo: { games: 2, wins: 1, draws: 0, losses: 1 } });
    expect(solo.biggestWins).toEqual([]);
    expect(solo.biggestUpsets).toEqual([]);
  });

  it("writes two history entries", () => {
    const entry = { game: 1, date: "Jan 1, 2025", elo: 1200, glicko2: 1037, uscf: 1200 };
    expect(solo.history).toEqual([entry, entry]);
  });

  it("keeps the per-player invariants", () => {
    const tallied = Object.values(solo.opponents).reduce((n, t) => n + t.games, 0);
    expect(solo.games).toBe(solo.wins + solo.draws + solo.losses);
    expect(tallied).toBe(solo.games);
    expect(solo.history).toHaveLength(solo.games);
  });
});
