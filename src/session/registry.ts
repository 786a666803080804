// src/session/registry.ts
// Single owner per tournament id within a process.

import type { TournamentID } from '../standings/types';
import { TournamentBusyError } from '../errors';
import { TournamentSession, type TournamentSessionOptions } from './session';

export class TournamentRegistry {
  private readonly sessions = new Map<TournamentID, TournamentSession>();

  /**
   * Opens a session holding `options.tournamentId` until it finishes or is
   * abandoned. Throws TournamentBusyError while another session holds it.
   */
  open(options: TournamentSessionOptions): TournamentSession {
    const id = options.tournamentId;
    if (this.sessions.has(id)) throw new TournamentBusyError(id);

    const userOnClose = options.onClose;
    const session = new TournamentSession({
      ...options,
      onClose: (closedId) => {
        this.sessions.delete(closedId);
        userOnClose?.(closedId);
      },
    });
    this.sessions.set(session.tournamentId, session);
    return session;
  }

  get(tournamentId: TournamentID): TournamentSession | undefined {
    return this.sessions.get(tournamentId);
  }

  isOpen(tournamentId: TournamentID): boolean {
    return this.sessions.has(tournamentId);
  }

  openIds(): TournamentID[] {
    return [...this.sessions.keys()];
  }
}
