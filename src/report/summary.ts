// src/report/summary.ts
// Console summary: totals plus the top players by ELO.

import type { Player } from '../players/types';
import type { EngineSnapshot } from '../engine/types';

export interface SummaryRow {
  rank: number;
  name: string;
  elo: number;
  wins: number;
  draws: number;
  losses: number;
  /** (wins + draws/2) / games · 100; 0 with no games. */
  winRate: number;
}

export const winRate = (p: Pick<Player, 'wins' | 'draws' | 'games'>): number =>
  p.games > 0 ? ((p.wins + p.draws * 0.5) / p.games) * 100 : 0;

/** Highest ELO first; equal ratings keep first-seen order. */
export function topPlayers(players: Iterable<Player>, n = 5): SummaryRow[] {
  return [...players]
    .sort((a, b) => b.elo - a.elo)
    .slice(0, Math.max(0, n))
    .map((p, i) => ({
      rank: i + 1,
      name: p.name,
      elo: p.elo,
      wins: p.wins,
      draws: p.draws,
      losses: p.losses,
      winRate: winRate(p),
    }));
}

export const formatSummaryRow = (r: SummaryRow): string =>
  `${r.rank}. ${r.name}: ${r.elo} (${r.wins}-${r.draws}-${r.losses}, ${r.winRate.toFixed(1)}%)`;

export function formatSummary(snapshot: EngineSnapshot, top = 5): string[] {
  const players = Object.values(snapshot.players);
  const rows = topPlayers(players, top);
  return [
    'Rating Summary:',
    `Total players: ${players.length}`,
    `Total games: ${snapshot.games.length}`,
    '',
    `Top ${top} Players:`,
    ...rows.map(formatSummaryRow),
  ];
}
