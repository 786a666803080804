// src/scoring/index.ts
// Point rules and pure standing updates.

import type { PlayerID, Standing } from '../standings/types';
import { ByeAlreadyReceivedError } from '../errors';

export const POINTS = { win: 2, loss: 0, tie: 1, bye: 1 } as const;

export type MatchOutcome =
  | { kind: 'win'; winner: PlayerID }
  | { kind: 'tie' };

/** [winnerDelta, loserDelta]; for a tie both sides get the same delta. */
export type ResultDelta = readonly [number, number];

export function applyResult(outcome: MatchOutcome): ResultDelta {
  switch (outcome.kind) {
    case 'win':
      return [POINTS.win, POINTS.loss];
    case 'tie':
      return applyTie();
    default: {
      const _exhaustive: never = outcome;
      return _exhaustive;
    }
  }
}

export function applyTie(): ResultDelta {
  return [POINTS.tie, POINTS.tie];
}

export function applyBye(): number {
  return POINTS.bye;
}

// ---------- standing updates ----------

export function emptyStanding(playerId: PlayerID): Standing {
  return { playerId, wins: 0, losses: 0, ties: 0, byes: 0, score: 0, matches: 0 };
}

export type MatchSide = 'win' | 'loss' | 'tie';

/** Adds one played match and its point delta to a standing. */
export function creditMatch(s: Standing, side: MatchSide, delta: number): Standing {
  return {
    ...s,
    wins: s.wins + (side === 'win' ? 1 : 0),
    losses: s.losses + (side === 'loss' ? 1 : 0),
    ties: s.ties + (side === 'tie' ? 1 : 0),
    matches: s.matches + 1,
    score: s.score + delta,
  };
}

export function creditBye(s: Standing): Standing {
  if (s.byes >= 1) throw new ByeAlreadyReceivedError(s.playerId);
  return { ...s, byes: s.byes + 1, score: s.score + applyBye() };
}

/** Score formula and the one-bye limit. */
export function checkStanding(s: Standing): boolean {
  return (
    s.score === POINTS.win * s.wins + POINTS.tie * s.ties + POINTS.bye * s.byes &&
    s.byes <= 1
  );
}
