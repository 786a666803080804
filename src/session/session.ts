// src/session/session.ts
// One tournament's working set and round state machine.

import type { LogLayer } from 'loglayer';

import type {
  MatchRecord,
  Pairing,
  Player,
  PlayerID,
  Standing,
  StandingRow,
  TournamentID,
} from '../standings/types';
import { leaders, toStandingRows } from '../standings/ranking';
import { generateSwissPairings, pairKey } from '../pairings/swiss';
import {
  applyResult,
  creditBye,
  creditMatch,
  emptyStanding,
  type MatchOutcome,
} from '../scoring';
import type { TournamentStore } from '../store/types';
import {
  CommitFailedError,
  DuplicatePlayerError,
  DuplicateReportError,
  InvalidOutcomeError,
  InvalidSessionStateError,
  TournamentIncompleteError,
  UnexpectedPairError,
  isSwissError,
} from '../errors';
import {
  parseOrThrow,
  playerInputSchema,
  sessionConfigSchema,
  type PlayerInput,
  type SessionConfig,
  type SessionConfigInput,
} from '../config';
import { createSessionLogger } from '../logging';

export type SessionState =
  | 'NotStarted'
  | 'AwaitingRound'
  | 'RoundInProgress'
  | 'RoundComplete'
  | 'Finished'
  | 'Abandoned';

export interface TournamentSessionOptions extends SessionConfigInput {
  store: TournamentStore;
  logger?: LogLayer;
  /** Called once when the session finishes or is abandoned. */
  onClose?: (tournamentId: TournamentID) => void;
}

export interface RoundPairings {
  round: number;
  pairings: Pairing[];
  bye?: PlayerID;
}

interface ExpectedMatch {
  pairing: Pairing;
  reported: boolean;
}

/**
 * Rounds recommended for `playerCount` players: ceil(log2(n)) over the
 * even-rounded count, 0 below two players.
 */
export function recommendedRounds(playerCount: number): number {
  const effective = playerCount - (playerCount % 2);
  if (effective < 2) return 0;
  return Math.ceil(Math.log2(effective));
}

export class TournamentSession {
  readonly tournamentId: TournamentID;

  private readonly config: SessionConfig;
  private readonly store: TournamentStore;
  private readonly log: LogLayer;
  private readonly onClose?: (tournamentId: TournamentID) => void;

  private _state: SessionState = 'NotStarted';
  private committing = false;
  private _round = 0;
  private _totalRounds = 0;
  private nextMatchId = 1;

  private roster: Player[] = [];
  private table = new Map<PlayerID, Standing>();
  private history: MatchRecord[] = [];
  private expected = new Map<string, ExpectedMatch>();
  private bye: { playerId: PlayerID; reported: boolean } | undefined;

  constructor(options: TournamentSessionOptions) {
    const { store, logger, onClose, ...rest } = options;
    this.config = parseOrThrow(sessionConfigSchema, rest, 'session options');
    this.tournamentId = this.config.tournamentId;
    this.store = store;
    this.onClose = onClose;
    this.log = (logger ?? createSessionLogger()).child();
    this.log.withContext({ tournamentId: this.tournamentId });
  }

  // ---------- views ----------

  get state(): SessionState {
    return this._state;
  }

  /** Current (or last completed) round, 0 before the first. */
  get round(): number {
    return this._round;
  }

  get totalRounds(): number {
    return this._totalRounds;
  }

  players(): Player[] {
    return this.roster.map(p => ({ ...p }));
  }

  /** Ranked rows; equal scores keep registration order. */
  standings(): StandingRow[] {
    return toStandingRows(this.snapshot(), this.roster);
  }

  /** Every player on the top score. */
  leaders(): StandingRow[] {
    const top = new Set(leaders(this.snapshot()).map(s => s.playerId));
    return this.standings().filter(r => top.has(r.playerId));
  }

  matches(): MatchRecord[] {
    return this.history.map(m => ({ ...m }));
  }

  pendingPairs(): Pairing[] {
    return [...this.expected.values()].filter(e => !e.reported).map(e => ({ ...e.pairing }));
  }

  pendingBye(): PlayerID | undefined {
    return this.bye && !this.bye.reported ? this.bye.playerId : undefined;
  }

  // ---------- lifecycle ----------

  start(players: ReadonlyArray<PlayerInput>): void {
    this.assertState('start', 'NotStarted');

    const roster: Player[] = [];
    const seen = new Set<PlayerID>();
    let nextId = 1;
    const supplied = new Set(players.flatMap(p => (p.id === undefined ? [] : [p.id])));

    for (const raw of players) {
      const input = parseOrThrow(playerInputSchema, raw, 'player');
      let id = input.id;
      if (id === undefined) {
        while (supplied.has(String(nextId)) || seen.has(String(nextId))) nextId++;
        id = String(nextId++);
      }
      if (seen.has(id)) throw new DuplicatePlayerError(id);
      seen.add(id);
      roster.push({ id, name: input.name });
    }

    this.roster = roster;
    this.table = new Map(roster.map(p => [p.id, emptyStanding(p.id)]));
    this._totalRounds = this.config.rounds ?? recommendedRounds(roster.length);
    this._state = 'AwaitingRound';

    this.log
      .withMetadata({ players: roster.length, rounds: this._totalRounds })
      .info('tournament started');
  }

  beginRound(): RoundPairings {
    this.assertState('beginRound', 'AwaitingRound', 'RoundComplete');
    if (this._round >= this._totalRounds) {
      throw new InvalidSessionStateError('beginRound', `done with all ${this._totalRounds} rounds`);
    }

    const round = this._round + 1;
    const { backtrack, maxBacktrack, shuffleScoreGroups } = this.config.pairing;
    // pairing errors propagate before any state changes
    const result = generateSwissPairings(this.snapshot(), this.history, {
      backtrack,
      maxBacktrack,
      shuffleSeed: shuffleScoreGroups ? `${this.tournamentId}#${round}` : undefined,
    });

    this._round = round;
    this.expected = new Map(
      result.pairings.map(p => [pairKey(p.a, p.b), { pairing: p, reported: false }]),
    );
    this.bye = result.bye === undefined ? undefined : { playerId: result.bye, reported: false };
    this._state = 'RoundInProgress';

    this.log
      .withMetadata({ round, pairings: result.pairings.length, bye: result.bye ?? null })
      .info('round paired');

    this.completeRoundIfDone();
    return result.bye === undefined
      ? { round, pairings: result.pairings }
      : { round, pairings: result.pairings, bye: result.bye };
  }

  reportResult(pair: Pairing, outcome: MatchOutcome): MatchRecord {
    // a completed round still answers repeats with DuplicateReport
    this.assertState('reportResult', 'RoundInProgress', 'RoundComplete');

    const players = [pair.a, pair.b];
    const entry = this.expected.get(pairKey(pair.a, pair.b));
    if (!entry) throw new UnexpectedPairError(players, this._round);
    if (entry.reported) throw new DuplicateReportError(players, this._round);

    const { a, b } = entry.pairing;
    let winnerId = a;
    let loserId = b;
    if (outcome.kind === 'win') {
      if (outcome.winner !== a && outcome.winner !== b) {
        throw new InvalidOutcomeError(
          `Winner ${outcome.winner} is not part of ${a} vs ${b} in round ${this._round}`,
        );
      }
      winnerId = outcome.winner;
      loserId = outcome.winner === a ? b : a;
    }

    const winner = this.standingOf(winnerId);
    const loser = this.standingOf(loserId);
    const [winnerDelta, loserDelta] = applyResult(outcome);
    const tie = outcome.kind === 'tie';

    const record: MatchRecord = {
      tournamentId: this.tournamentId,
      matchId: this.nextMatchId++,
      round: this._round,
      winnerId,
      loserId,
      tie,
    };
    this.table.set(winnerId, creditMatch(winner, tie ? 'tie' : 'win', winnerDelta));
    this.table.set(loserId, creditMatch(loser, tie ? 'tie' : 'loss', loserDelta));
    this.history.push(record);
    entry.reported = true;

    this.log
      .withMetadata({ round: this._round, matchId: record.matchId, winnerId, loserId, tie })
      .debug('result reported');

    this.completeRoundIfDone();
    return { ...record };
  }

  reportBye(playerId: PlayerID): MatchRecord {
    this.assertState('reportBye', 'RoundInProgress', 'RoundComplete');

    if (!this.bye || this.bye.playerId !== playerId) {
      throw new UnexpectedPairError([playerId], this._round);
    }
    if (this.bye.reported) throw new DuplicateReportError([playerId], this._round);

    const updated = creditBye(this.standingOf(playerId));
    const record: MatchRecord = {
      tournamentId: this.tournamentId,
      matchId: this.nextMatchId++,
      round: this._round,
      winnerId: playerId,
      loserId: null,
      tie: false,
    };
    this.table.set(playerId, updated);
    this.history.push(record);
    this.bye.reported = true;

    this.log.withMetadata({ round: this._round, playerId }).debug('bye reported');

    this.completeRoundIfDone();
    return { ...record };
  }

  /**
   * Commits players, standings and matches in one store transaction.
   * Nothing reaches the store unless every configured round is complete.
   */
  async finish(): Promise<TournamentID> {
    if (this.committing) throw new InvalidSessionStateError('finish', 'committing');
    const ready =
      this._round === this._totalRounds &&
      (this._state === 'RoundComplete' || this._state === 'AwaitingRound');
    if (!ready) {
      if (this._state === 'NotStarted' || this._state === 'Finished' || this._state === 'Abandoned') {
        throw new InvalidSessionStateError('finish', this._state);
      }
      const completed = this._state === 'RoundInProgress' ? this._round - 1 : this._round;
      throw new TournamentIncompleteError(completed, this._totalRounds);
    }

    this.committing = true;
    try {
      const id = await this.store.commitTournament({
        tournamentId: this.tournamentId,
        players: this.players(),
        standings: this.snapshot(),
        matches: this.matches(),
      });
      this._state = 'Finished';
      this.log.withMetadata({ matches: this.history.length }).info('tournament committed');
      this.onClose?.(this.tournamentId);
      return id;
    } catch (err) {
      const failure = isSwissError(err, 'CommitFailed') ? err : new CommitFailedError(this.tournamentId, err);
      this.log.withError(failure).error('tournament commit failed');
      throw failure;
    } finally {
      this.committing = false;
    }
  }

  /** Drops the working set; nothing is ever committed. */
  abandon(): void {
    if (this.committing) throw new InvalidSessionStateError('abandon', 'committing');
    if (this._state === 'Finished' || this._state === 'Abandoned') {
      throw new InvalidSessionStateError('abandon', this._state);
    }
    this._state = 'Abandoned';
    this.expected.clear();
    this.bye = undefined;
    this.log.withMetadata({ round: this._round }).warn('tournament abandoned');
    this.onClose?.(this.tournamentId);
  }

  // ---------- internals ----------

  /** Standings in registration order. */
  private snapshot(): Standing[] {
    return this.roster.map(p => this.standingOf(p.id));
  }

  private standingOf(id: PlayerID): Standing {
    return this.table.get(id) ?? emptyStanding(id);
  }

  private completeRoundIfDone(): void {
    const pairsDone = [...this.expected.values()].every(e => e.reported);
    const byeDone = this.bye === undefined || this.bye.reported;
    if (pairsDone && byeDone) {
      this._state = 'RoundComplete';
      this.log.withMetadata({ round: this._round }).info('round complete');
    }
  }

  private assertState(operation: string, ...allowed: SessionState[]): void {
    if (this.committing) throw new InvalidSessionStateError(operation, 'committing');
    if (!allowed.includes(this._state)) throw new InvalidSessionStateError(operation, this._state);
  }
}
