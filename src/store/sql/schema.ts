// src/store/sql/schema.ts
import { integer, primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const players = sqliteTable(
  'players',
  {
    tournamentId: text('tournament_id').notNull(),
    playerId: text('player_id').notNull(),
    name: text('name').notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.tournamentId, t.playerId] }),
  }),
);

// A bye row has loser_id and tie both NULL.
export const matches = sqliteTable(
  'matches',
  {
    tournamentId: text('tournament_id').notNull(),
    matchId: integer('match_id').notNull(),
    winnerId: text('winner_id').notNull(),
    loserId: text('loser_id'),
    tie: integer('tie', { mode: 'boolean' }),
    roundNum: integer('round_num').notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.tournamentId, t.matchId] }),
  }),
);

export const standings = sqliteTable(
  'standings',
  {
    tournamentId: text('tournament_id').notNull(),
    playerId: text('player_id').notNull(),
    wins: integer('wins').notNull(),
    losses: integer('losses').notNull(),
    ties: integer('ties').notNull(),
    byes: integer('byes').notNull(),
    score: integer('score').notNull(),
    matches: integer('matches').notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.tournamentId, t.playerId] }),
  }),
);
