// src/standings/index.ts
// Data model, ranking and history replay.

export type {
  PlayerID,
  TournamentID,
  Player,
  Standing,
  StandingRow,
  MatchRecord,
  Pairing,
} from './types';

export { rankStandings, toStandingRows, leaders } from './ranking';
export { computeStandings } from './tally';
