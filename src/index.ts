// src/index.ts

// ──────────────────────────────────────────────────────────────
// Standings (data model, ranking, history replay)
// ──────────────────────────────────────────────────────────────
export {
  rankStandings,
  toStandingRows,
  leaders,
  computeStandings,
  type PlayerID,
  type TournamentID,
  type Player,
  type Standing,
  type StandingRow,
  type MatchRecord,
  type Pairing,
} from './standings';

// ──────────────────────────────────────────────────────────────
// Scoring rules
// ──────────────────────────────────────────────────────────────
export {
  POINTS,
  applyResult,
  applyTie,
  applyBye,
  emptyStanding,
  creditMatch,
  creditBye,
  checkStanding,
  type MatchOutcome,
  type MatchSide,
  type ResultDelta,
} from './scoring';

// ──────────────────────────────────────────────────────────────
// Pairings (facade + swiss engine)
// ──────────────────────────────────────────────────────────────
export {
  generatePairings,
  generateSwissPairings,
  pairKey,
  playedPairs,
  type PairingMode,
  type PairingRequest,
  type PairingResult,
  type SwissPairingOptions,
  type SwissPairingResult,
} from './pairings';

// ──────────────────────────────────────────────────────────────
// Sessions
// ──────────────────────────────────────────────────────────────
export {
  TournamentSession,
  TournamentRegistry,
  recommendedRounds,
  type SessionState,
  type TournamentSessionOptions,
  type RoundPairings,
} from './session';

// ──────────────────────────────────────────────────────────────
// Stores
// ──────────────────────────────────────────────────────────────
export type {
  TournamentStore,
  ReadableTournamentStore,
  TournamentCommit,
  TournamentSnapshot,
} from './store/types';
export { MemoryTournamentStore } from './store/memory';
export { SqlTournamentStore } from './store/sql/store';

// ──────────────────────────────────────────────────────────────
// Errors, config, logging
// ──────────────────────────────────────────────────────────────
export * from './errors';
export {
  loadEnvConfig,
  envConfigSchema,
  sessionConfigSchema,
  pairingConfigSchema,
  type EnvConfig,
  type SessionConfigInput,
  type PairingConfig,
  type PlayerInput,
} from './config';
export { createLogger, createPairingLogger, createSessionLogger } from './logging';
