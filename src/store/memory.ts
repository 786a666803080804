// src/store/memory.ts
import type { TournamentID } from '../standings/types';
import type { ReadableTournamentStore, TournamentCommit, TournamentSnapshot } from './types';
import { CommitFailedError } from '../errors';
import { assertSameRoster } from './roster';

function snapshotOf(commit: TournamentCommit): TournamentSnapshot {
  return {
    tournamentId: commit.tournamentId,
    players: commit.players.map(p => ({ ...p })),
    standings: commit.standings.map(s => ({ ...s })),
    matches: commit.matches.map(m => ({ ...m })),
  };
}

export class MemoryTournamentStore implements ReadableTournamentStore {
  private readonly tournaments = new Map<TournamentID, TournamentSnapshot>();

  async commitTournament(commit: TournamentCommit): Promise<TournamentID> {
    const foreign = commit.matches.find(m => m.tournamentId !== commit.tournamentId);
    if (foreign) {
      throw new CommitFailedError(
        commit.tournamentId,
        new Error(`match ${foreign.matchId} belongs to tournament ${foreign.tournamentId}`),
      );
    }
    const stored = this.tournaments.get(commit.tournamentId);
    try {
      assertSameRoster(commit.tournamentId, stored?.players.map(p => p.id) ?? [], commit);
    } catch (err) {
      throw new CommitFailedError(commit.tournamentId, err);
    }
    // built in full before the single assignment that publishes it
    this.tournaments.set(commit.tournamentId, snapshotOf(commit));
    return commit.tournamentId;
  }

  async loadTournament(tournamentId: TournamentID): Promise<TournamentSnapshot | undefined> {
    const t = this.tournaments.get(tournamentId);
    return t ? snapshotOf(t) : undefined;
  }

  listTournaments(): TournamentID[] {
    return [...this.tournaments.keys()];
  }
}
