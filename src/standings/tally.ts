// src/standings/tally.ts
// Rebuilds standings from match records (store read-back, invariant checks).

import type { MatchRecord, Player, PlayerID, Standing } from './types';
import { applyResult, creditBye, creditMatch, emptyStanding } from '../scoring';
import { InvalidInputError } from '../errors';

function inRoundOrder(matches: ReadonlyArray<MatchRecord>): MatchRecord[] {
  return [...matches].sort((a, b) => a.round - b.round || a.matchId - b.matchId);
}

/**
 * Replays `matches` over zeroed standings for `players`, returned in
 * registration order. Records naming an unregistered player are rejected.
 */
export function computeStandings(
  players: ReadonlyArray<Player>,
  matches: ReadonlyArray<MatchRecord>,
): Standing[] {
  const by = new Map<PlayerID, Standing>();
  for (const p of players) by.set(p.id, emptyStanding(p.id));

  const get = (id: PlayerID, m: MatchRecord): Standing => {
    const s = by.get(id);
    if (!s) {
      throw new InvalidInputError(
        `computeStandings: match ${m.matchId} references unknown player ${id}`,
      );
    }
    return s;
  };

  for (const m of inRoundOrder(matches)) {
    if (m.loserId === null) {
      by.set(m.winnerId, creditBye(get(m.winnerId, m)));
      continue;
    }
    const loserId = m.loserId;
    const w = get(m.winnerId, m);
    const l = get(loserId, m);
    if (m.tie) {
      const [da, db] = applyResult({ kind: 'tie' });
      by.set(m.winnerId, creditMatch(w, 'tie', da));
      by.set(loserId, creditMatch(l, 'tie', db));
    } else {
      const [dw, dl] = applyResult({ kind: 'win', winner: m.winnerId });
      by.set(m.winnerId, creditMatch(w, 'win', dw));
      by.set(loserId, creditMatch(l, 'loss', dl));
    }
  }

  return players.map(p => by.get(p.id) ?? emptyStanding(p.id));
}
