// src/store/sql/store.ts
// Relational store on drizzle-orm over a libsql client.

import { createClient, type Client } from '@libsql/client';
import { asc, eq, sql } from 'drizzle-orm';
import { drizzle, type LibSQLDatabase } from 'drizzle-orm/libsql';

import type { MatchRecord, TournamentID } from '../../standings/types';
import type { ReadableTournamentStore, TournamentCommit, TournamentSnapshot } from '../types';
import { CommitFailedError } from '../../errors';
import type { EnvConfig } from '../../config';
import { assertSameRoster } from '../roster';
import * as schema from './schema';

type MatchRow = typeof schema.matches.$inferSelect;

function toMatchRow(m: MatchRecord): typeof schema.matches.$inferInsert {
  const bye = m.loserId === null;
  return {
    tournamentId: m.tournamentId,
    matchId: m.matchId,
    winnerId: m.winnerId,
    loserId: m.loserId,
    tie: bye ? null : m.tie,
    roundNum: m.round,
  };
}

function fromMatchRow(r: MatchRow): MatchRecord {
  return {
    tournamentId: r.tournamentId,
    matchId: r.matchId,
    round: r.roundNum,
    winnerId: r.winnerId,
    loserId: r.loserId,
    tie: r.tie ?? false,
  };
}

export class SqlTournamentStore implements ReadableTournamentStore {
  private readonly db: LibSQLDatabase<typeof schema>;

  constructor(client: Client) {
    this.db = drizzle(client, { schema });
  }

  /** Connects using SWISS_DATABASE_URL / SWISS_DATABASE_AUTH_TOKEN. */
  static fromEnv(env: Pick<EnvConfig, 'SWISS_DATABASE_URL' | 'SWISS_DATABASE_AUTH_TOKEN'>): SqlTournamentStore {
    return new SqlTournamentStore(
      createClient({ url: env.SWISS_DATABASE_URL, authToken: env.SWISS_DATABASE_AUTH_TOKEN }),
    );
  }

  async commitTournament(commit: TournamentCommit): Promise<TournamentID> {
    const id = commit.tournamentId;
    try {
      await this.db.transaction(async (tx) => {
        const stored = await tx
          .select({ playerId: schema.players.playerId })
          .from(schema.players)
          .where(eq(schema.players.tournamentId, id));
        assertSameRoster(id, stored.map(r => r.playerId), commit);

        await tx.delete(schema.standings).where(eq(schema.standings.tournamentId, id));
        await tx.delete(schema.matches).where(eq(schema.matches.tournamentId, id));
        await tx.delete(schema.players).where(eq(schema.players.tournamentId, id));

        if (commit.players.length > 0) {
          await tx
            .insert(schema.players)
            .values(commit.players.map(p => ({ tournamentId: id, playerId: p.id, name: p.name })));
        }
        if (commit.matches.length > 0) {
          await tx.insert(schema.matches).values(commit.matches.map(toMatchRow));
        }
        if (commit.standings.length > 0) {
          await tx.insert(schema.standings).values(
            commit.standings.map(s => ({
              tournamentId: id,
              playerId: s.playerId,
              wins: s.wins,
              losses: s.losses,
              ties: s.ties,
              byes: s.byes,
              score: s.score,
              matches: s.matches,
            })),
          );
        }
      });
    } catch (err) {
      throw new CommitFailedError(id, err);
    }
    return id;
  }

  async loadTournament(tournamentId: TournamentID): Promise<TournamentSnapshot | undefined> {
    const playerRows = await this.db
      .select()
      .from(schema.players)
      .where(eq(schema.players.tournamentId, tournamentId))
      .orderBy(sql`rowid`);
    if (playerRows.length === 0) return undefined;

    const matchRows = await this.db
      .select()
      .from(schema.matches)
      .where(eq(schema.matches.tournamentId, tournamentId))
      .orderBy(asc(schema.matches.matchId));

    const standingRows = await this.db
      .select()
      .from(schema.standings)
      .where(eq(schema.standings.tournamentId, tournamentId))
      .orderBy(sql`rowid`);

    return {
      tournamentId,
      players: playerRows.map(r => ({ id: r.playerId, name: r.name })),
      matches: matchRows.map(fromMatchRow),
      standings: standingRows.map(({ tournamentId: _tid, ...s }) => s),
    };
  }
}
