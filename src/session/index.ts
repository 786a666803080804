// src/session/index.ts
export {
  TournamentSession,
  recommendedRounds,
  type SessionState,
  type TournamentSessionOptions,
  type RoundPairings,
} from './session';
export { TournamentRegistry } from './registry';
