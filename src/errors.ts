// src/errors.ts
// Error taxonomy shared by the pairing engine, sessions and stores.

import type { PlayerID } from './standings/types';

export type SwissErrorCode =
  // pairing engine
  | 'NoEligibleByeCandidate'
  | 'NoValidPairing'
  | 'InsufficientPlayers'
  // session usage
  | 'UnexpectedPair'
  | 'DuplicateReport'
  | 'TournamentIncomplete'
  | 'InvalidSessionState'
  | 'InvalidOutcome'
  | 'DuplicatePlayer'
  | 'ByeAlreadyReceived'
  | 'InvalidInput'
  | 'TournamentBusy'
  // store
  | 'CommitFailed';

export class SwissError extends Error {
  readonly code: SwissErrorCode;

  constructor(code: SwissErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

export class NoEligibleByeCandidateError extends SwissError {
  constructor(readonly candidates: PlayerID[]) {
    super(
      'NoEligibleByeCandidate',
      `No eligible bye candidate: every player in the pool already had a bye (${candidates.join(', ')})`,
    );
  }
}

export class NoValidPairingError extends SwissError {
  constructor(readonly playerId: PlayerID, reason = 'no opponent left without a rematch') {
    super('NoValidPairing', `Cannot pair ${playerId}: ${reason}`);
  }
}

export class InsufficientPlayersError extends SwissError {
  constructor(readonly count: number) {
    super('InsufficientPlayers', `Cannot pair a round with ${count} active player(s)`);
  }
}

export class UnexpectedPairError extends SwissError {
  constructor(readonly players: PlayerID[], round: number) {
    super('UnexpectedPair', `${players.join(' vs ')} is not expected in round ${round}`);
  }
}

export class DuplicateReportError extends SwissError {
  constructor(readonly players: PlayerID[], round: number) {
    super('DuplicateReport', `${players.join(' vs ')} was already reported in round ${round}`);
  }
}

export class TournamentIncompleteError extends SwissError {
  constructor(readonly completedRounds: number, readonly totalRounds: number) {
    super(
      'TournamentIncomplete',
      `Tournament is incomplete: ${completedRounds} of ${totalRounds} rounds finished`,
    );
  }
}

export class InvalidSessionStateError extends SwissError {
  constructor(operation: string, state: string) {
    super('InvalidSessionState', `${operation}() is not allowed while the session is ${state}`);
  }
}

export class InvalidOutcomeError extends SwissError {
  constructor(message: string) {
    super('InvalidOutcome', message);
  }
}

export class DuplicatePlayerError extends SwissError {
  constructor(readonly playerId: PlayerID) {
    super('DuplicatePlayer', `Player id ${playerId} is registered more than once`);
  }
}

export class ByeAlreadyReceivedError extends SwissError {
  constructor(readonly playerId: PlayerID) {
    super('ByeAlreadyReceived', `Player ${playerId} already received a bye`);
  }
}

export class InvalidInputError extends SwissError {
  constructor(message: string, readonly issues: string[] = []) {
    super('InvalidInput', issues.length ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class TournamentBusyError extends SwissError {
  constructor(readonly tournamentId: string) {
    super('TournamentBusy', `Tournament ${tournamentId} already has an open session`);
  }
}

export class CommitFailedError extends SwissError {
  constructor(readonly tournamentId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('CommitFailed', `Commit of tournament ${tournamentId} failed: ${detail}`, { cause });
  }
}

export function isSwissError(err: unknown, code?: SwissErrorCode): err is SwissError {
  return err instanceof SwissError && (code === undefined || err.code === code);
}
