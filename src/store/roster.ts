// src/store/roster.ts
import type { PlayerID, TournamentID } from '../standings/types';
import type { TournamentCommit } from './types';

/**
 * A tournament id may be recommitted only with the roster it was first
 * committed with. Names may change; ids may not.
 */
export function assertSameRoster(
  tournamentId: TournamentID,
  storedIds: ReadonlyArray<PlayerID>,
  commit: TournamentCommit,
): void {
  if (storedIds.length === 0) return;
  const incoming = new Set(commit.players.map(p => p.id));
  const same = incoming.size === storedIds.length && storedIds.every(id => incoming.has(id));
  if (!same) {
    throw new Error(`tournament ${tournamentId} is already committed with a different roster`);
  }
}
