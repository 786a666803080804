// src/standings/ranking.ts
// Score ordering with a stable secondary key (input order).

import type { Player, PlayerID, Standing, StandingRow } from './types';
import { seededShuffle } from '../utils/hash';

/**
 * Orders standings by score descending. Equal scores keep their input order
 * unless `shuffleSeed` is given, in which case each equal-score group is
 * reordered by a deterministic shuffle of that seed.
 */
export function rankStandings(
  standings: ReadonlyArray<Standing>,
  shuffleSeed?: string,
): Standing[] {
  // Array.prototype.sort is stable, so input order breaks ties
  const sorted = [...standings].sort((a, b) => b.score - a.score);
  if (shuffleSeed === undefined) return sorted;

  const out: Standing[] = [];
  let i = 0;
  while (i < sorted.length) {
    const first = sorted[i];
    if (!first) break;
    let j = i + 1;
    while (j < sorted.length && sorted[j]?.score === first.score) j++;
    out.push(...seededShuffle(sorted.slice(i, j), `${shuffleSeed}::${first.score}`));
    i = j;
  }
  return out;
}

/** Ranked rows with display names; ranks are positional (1..n). */
export function toStandingRows(
  standings: ReadonlyArray<Standing>,
  players: ReadonlyArray<Player>,
): StandingRow[] {
  const names = new Map<PlayerID, string>(players.map(p => [p.id, p.name]));
  return rankStandings(standings).map((s, idx) => ({
    ...s,
    rank: idx + 1,
    name: names.get(s.playerId) ?? s.playerId,
  }));
}

/** Every player sharing the top score, in rank order. */
export function leaders(standings: ReadonlyArray<Standing>): Standing[] {
  const ranked = rankStandings(standings);
  const top = ranked[0];
  if (!top) return [];
  return ranked.filter(s => s.score === top.score);
}
