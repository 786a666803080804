// src/standings/types.ts
// Core data model shared by scoring, pairings, sessions and stores.

export type PlayerID = string;
export type TournamentID = string;

export interface Player {
  id: PlayerID;
  name: string;
}

/** Cumulative record for one player. `score` is always 2*wins + ties + byes. */
export interface Standing {
  playerId: PlayerID;
  wins: number;
  losses: number;
  ties: number;
  byes: number;
  score: number;
  /** Played matches, byes excluded. */
  matches: number;
}

export interface StandingRow extends Standing {
  rank: number; // 1-based
  name: string;
}

/**
 * One reported match. A bye has `loserId === null`; for a tie the ids keep
 * the order the pair was formed in.
 */
export interface MatchRecord {
  tournamentId: TournamentID;
  matchId: number;
  round: number; // 1-based
  winnerId: PlayerID;
  loserId: PlayerID | null;
  tie: boolean;
}

export interface Pairing {
  a: PlayerID;
  b: PlayerID;
}

