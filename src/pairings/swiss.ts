// src/pairings/swiss.ts
// Swiss pairings: bye from the bottom, greedy nearest-rank pairing without rematches.

import type { MatchRecord, Pairing, PlayerID, Standing } from '../standings/types';
import { rankStandings } from '../standings/ranking';
import {
  InsufficientPlayersError,
  NoEligibleByeCandidateError,
  NoValidPairingError,
} from '../errors';
import { IS_PAIRING_DEBUG_ENABLED, pairingLogger } from '../logging';

export interface SwissPairingOptions {
  /**
   * Deterministically shuffle players of equal score by this seed.
   * If omitted, equal scores keep the input (registration) order.
   */
  shuffleSeed?: string;
  /**
   * When the greedy walk finds no opponent for a player, search depth-first
   * for any rematch-free pairing of the pool. Default: false.
   */
  backtrack?: boolean;
  /** Step budget for the backtracking search. Default: 10000. */
  maxBacktrack?: number;
}

export interface SwissPairingResult {
  pairings: Pairing[];
  bye?: PlayerID;
}

/** Order-independent key for a pair of players. */
export function pairKey(a: PlayerID, b: PlayerID): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

/** Keys of every pair that already met; byes are not pairs. */
export function playedPairs(history: ReadonlyArray<MatchRecord>): Set<string> {
  const played = new Set<string>();
  for (const m of history) {
    if (m.loserId === null) continue;
    played.add(pairKey(m.winnerId, m.loserId));
  }
  return played;
}

/** Lowest-ranked player without a bye, scanning upward. */
function pickBye(ranked: ReadonlyArray<Standing>): PlayerID {
  for (let i = ranked.length - 1; i >= 0; i--) {
    const s = ranked[i];
    if (s && s.byes === 0) return s.playerId;
  }
  throw new NoEligibleByeCandidateError(ranked.map(s => s.playerId));
}

function pairGreedily(pool: ReadonlyArray<PlayerID>, played: ReadonlySet<string>): Pairing[] {
  const open = [...pool];
  const pairings: Pairing[] = [];
  while (open.length > 0) {
    const p = open.shift();
    if (p === undefined) break;
    const idx = open.findIndex(q => !played.has(pairKey(p, q)));
    const q = open[idx];
    if (idx === -1 || q === undefined) throw new NoValidPairingError(p);
    open.splice(idx, 1);
    pairings.push({ a: p, b: q });
  }
  return pairings;
}

/**
 * Depth-first search in rank order. The first solution it reaches is the
 * greedy pairing whenever the greedy walk would have succeeded.
 */
function pairWithBacktracking(
  pool: ReadonlyArray<PlayerID>,
  played: ReadonlySet<string>,
  maxSteps: number,
  stuck: PlayerID,
): Pairing[] {
  let steps = 0;

  const search = (open: ReadonlyArray<PlayerID>): Pairing[] | null => {
    const [p, ...rest] = open;
    if (p === undefined) return [];
    for (let i = 0; i < rest.length; i++) {
      const q = rest[i];
      if (q === undefined || played.has(pairKey(p, q))) continue;
      if (++steps > maxSteps) {
        throw new NoValidPairingError(p, `backtracking budget of ${maxSteps} steps exhausted`);
      }
      const tail = search(rest.filter((_, j) => j !== i));
      if (tail) return [{ a: p, b: q }, ...tail];
    }
    return null;
  };

  const found = search(pool);
  if (!found) throw new NoValidPairingError(stuck, 'no rematch-free pairing of the pool exists');
  if (IS_PAIRING_DEBUG_ENABLED) {
    pairingLogger.withMetadata({ steps }).debug('backtracking found a pairing');
  }
  return found;
}

/**
 * Next-round Swiss pairings.
 *
 * Standings are ranked by score (input order breaks ties). With an odd
 * pool the lowest-ranked player without a bye sits out; the rest are paired
 * top-down, each with the nearest-ranked player they have not met.
 * Rematches are never produced: a dead end throws NoValidPairingError.
 */
export function generateSwissPairings(
  standings: ReadonlyArray<Standing>,
  history: ReadonlyArray<MatchRecord>,
  options?: SwissPairingOptions,
): SwissPairingResult {
  const { shuffleSeed, backtrack = false, maxBacktrack = 10_000 } = options ?? {};

  if (standings.length === 0) return { pairings: [] };
  if (standings.length === 1) throw new InsufficientPlayersError(1);

  const ranked = rankStandings(standings, shuffleSeed);
  let pool = ranked.map(s => s.playerId);

  let bye: PlayerID | undefined;
  if (pool.length % 2 === 1) {
    const chosen = pickBye(ranked);
    bye = chosen;
    pool = pool.filter(id => id !== chosen);
  }

  const played = playedPairs(history);
  if (IS_PAIRING_DEBUG_ENABLED) {
    pairingLogger
      .withMetadata({ pool, bye: bye ?? null, playedPairs: played.size })
      .debug('pairing round');
  }

  let pairings: Pairing[];
  try {
    pairings = pairGreedily(pool, played);
  } catch (err) {
    if (!backtrack || !(err instanceof NoValidPairingError)) throw err;
    pairingLogger
      .withMetadata({ playerId: err.playerId })
      .warn('greedy pairing dead-ended, backtracking');
    pairings = pairWithBacktracking(pool, played, maxBacktrack, err.playerId);
  }

  return bye === undefined ? { pairings } : { pairings, bye };
}
