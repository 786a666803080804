// src/store/types.ts
// Persistence contract consumed by sessions on finish().

import type { MatchRecord, Player, Standing, TournamentID } from '../standings/types';

export interface TournamentCommit {
  tournamentId: TournamentID;
  players: ReadonlyArray<Player>;
  standings: ReadonlyArray<Standing>;
  matches: ReadonlyArray<MatchRecord>;
}

export interface TournamentSnapshot {
  tournamentId: TournamentID;
  players: Player[];
  standings: Standing[];
  matches: MatchRecord[];
}

export interface TournamentStore {
  /**
   * Writes everything in one atomic transaction. Recommitting an id
   * replaces its rows, so a retried finish() is safe; the recommit must
   * carry the same player ids, and a different roster under a committed
   * id is refused. Throws CommitFailedError on any failure, with nothing
   * written.
   */
  commitTournament(commit: TournamentCommit): Promise<TournamentID>;
}

/** Stores that can also read a committed tournament back. */
export interface ReadableTournamentStore extends TournamentStore {
  loadTournament(tournamentId: TournamentID): Promise<TournamentSnapshot | undefined>;
}
