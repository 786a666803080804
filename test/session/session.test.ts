import { describe, it, expect, vi } from "vitest";
import { TournamentSession, recommendedRounds } from "../../src/session";
import type { TournamentCommit, TournamentStore } from "../../src/store/types";
import { MemoryTournamentStore } from "../../src/store/memory";
import { createLogger } from "../../src/logging";
import { checkStanding } from "../../src/scoring";
import { pairKey } from "../../src/pairings/swiss";
import { isSwissError, type SwissErrorCode } from "../../src/errors";

const logger = createLogger({ enabled: false });

function spyStore() {
  const commitTournament = vi.fn<(commit: TournamentCommit) => Promise<string>>(
    async (commit) => commit.tournamentId,
  );
  const store: TournamentStore = { commitTournament };
  return { store, commitTournament };
}

function codeOf(fn: () => unknown): SwissErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (isSwissError(err)) return err.code;
    throw err;
  }
  return undefined;
}

async function asyncCodeOf(p: Promise<unknown>): Promise<SwissErrorCode | undefined> {
  try {
    await p;
  } catch (err) {
    if (isSwissError(err)) return err.code;
    throw err;
  }
  return undefined;
}

function fourPlayerSession(store: TournamentStore = spyStore().store): TournamentSession {
  const session = new TournamentSession({ tournamentId: "T-4", store, logger });
  session.start([{ name: "Ada" }, { name: "Ben" }, { name: "Cy" }, { name: "Di" }]);
  return session;
}

describe("recommendedRounds", () => {
  it("is ceil(log2) of the even-rounded field", () => {
    expect(recommendedRounds(0)).toBe(0);
    expect(recommendedRounds(1)).toBe(0);
    expect(recommendedRounds(2)).toBe(1);
    expect(recommendedRounds(4)).toBe(2);
    expect(recommendedRounds(7)).toBe(3);
    expect(recommendedRounds(8)).toBe(3);
    expect(recommendedRounds(11)).toBe(4);
  });
});

describe("TournamentSession – registration", () => {
  it("allocates ids from a counter and zeroes standings", () => {
    const session = fourPlayerSession();
    expect(session.state).toBe("AwaitingRound");
    expect(session.totalRounds).toBe(2);
    expect(session.players().map(p => p.id)).toEqual(["1", "2", "3", "4"]);
    expect(session.standings().every(r => r.score === 0 && r.matches === 0)).toBe(true);
  });

  it("skips counter values already taken by supplied ids", () => {
    const session = new TournamentSession({ tournamentId: "T", store: spyStore().store, logger });
    session.start([{ name: "Ada" }, { name: "Ben", id: "1" }]);
    expect(session.players()).toEqual([
      { id: "2", name: "Ada" },
      { id: "1", name: "Ben" },
    ]);
  });

  it("rejects duplicate ids and blank names", () => {
    const a = new TournamentSession({ tournamentId: "T", store: spyStore().store, logger });
    expect(codeOf(() => a.start([{ name: "Ada", id: "x" }, { name: "Ben", id: "x" }]))).toBe(
      "DuplicatePlayer",
    );
    const b = new TournamentSession({ tournamentId: "T", store: spyStore().store, logger });
    expect(codeOf(() => b.start([{ name: "   " }]))).toBe("InvalidInput");
    expect(b.state).toBe("NotStarted");
  });

  it("rejects invalid options", () => {
    expect(
      codeOf(() => new TournamentSession({ tournamentId: "", store: spyStore().store, logger })),
    ).toBe("InvalidInput");
  });

  it("cannot be started twice", () => {
    const session = fourPlayerSession();
    expect(codeOf(() => session.start([{ name: "Eve" }]))).toBe("InvalidSessionState");
  });
});

describe("TournamentSession – rounds", () => {
  it("pairs by standing, scores results and re-pairs without rematches", () => {
    const session = fourPlayerSession();

    const r1 = session.beginRound();
    expect(r1).toEqual({
      round: 1,
      pairings: [
        { a: "1", b: "2" },
        { a: "3", b: "4" },
      ],
    });
    expect(session.state).toBe("RoundInProgress");

    session.reportResult({ a: "1", b: "2" }, { kind: "win", winner: "1" });
    expect(session.state).toBe("RoundInProgress");
    session.reportResult({ a: "4", b: "3" }, { kind: "tie" });
    expect(session.state).toBe("RoundComplete");

    expect(session.standings().map(r => [r.playerId, r.score])).toEqual([
      ["1", 2],
      ["3", 1],
      ["4", 1],
      ["2", 0],
    ]);

    const r2 = session.beginRound();
    expect(r2.pairings).toEqual([
      { a: "1", b: "3" },
      { a: "4", b: "2" },
    ]);
  });

  it("records ties in pairing order and wins winner-first", () => {
    const session = fourPlayerSession();
    session.beginRound();
    const win = session.reportResult({ a: "2", b: "1" }, { kind: "win", winner: "2" });
    const tie = session.reportResult({ a: "4", b: "3" }, { kind: "tie" });
    expect(win).toEqual({ tournamentId: "T-4", matchId: 1, round: 1, winnerId: "2", loserId: "1", tie: false });
    expect(tie).toEqual({ tournamentId: "T-4", matchId: 2, round: 1, winnerId: "3", loserId: "4", tie: true });
  });

  it("rejects a pair outside the round and leaves standings unchanged", () => {
    const session = fourPlayerSession();
    session.beginRound();
    const before = session.standings();
    expect(codeOf(() => session.reportResult({ a: "1", b: "4" }, { kind: "win", winner: "1" }))).toBe(
      "UnexpectedPair",
    );
    expect(session.standings()).toEqual(before);
    expect(session.matches()).toEqual([]);
  });

  it("rejects a second report of the same pair", () => {
    const session = fourPlayerSession();
    session.beginRound();
    session.reportResult({ a: "1", b: "2" }, { kind: "win", winner: "1" });
    const before = session.standings();
    expect(codeOf(() => session.reportResult({ a: "2", b: "1" }, { kind: "tie" }))).toBe(
      "DuplicateReport",
    );
    expect(session.standings()).toEqual(before);
  });

  it("rejects a winner who is not in the pair", () => {
    const session = fourPlayerSession();
    session.beginRound();
    expect(codeOf(() => session.reportResult({ a: "1", b: "2" }, { kind: "win", winner: "3" }))).toBe(
      "InvalidOutcome",
    );
    expect(session.pendingPairs()).toHaveLength(2);
  });

  it("refuses results before a round begins and rounds beyond the configured count", () => {
    const session = new TournamentSession({ tournamentId: "T", store: spyStore().store, logger, rounds: 1 });
    session.start([{ name: "Ada" }, { name: "Ben" }]);
    expect(codeOf(() => session.reportResult({ a: "1", b: "2" }, { kind: "tie" }))).toBe(
      "InvalidSessionState",
    );
    session.beginRound();
    expect(codeOf(() => session.beginRound())).toBe("InvalidSessionState");
    session.reportResult({ a: "1", b: "2" }, { kind: "tie" });
    expect(codeOf(() => session.beginRound())).toBe("InvalidSessionState");
  });

  it("leaves the session untouched when pairing fails", () => {
    const session = new TournamentSession({ tournamentId: "T", store: spyStore().store, logger, rounds: 1 });
    session.start([{ name: "Solo" }]);
    expect(codeOf(() => session.beginRound())).toBe("InsufficientPlayers");
    expect(session.state).toBe("AwaitingRound");
    expect(session.round).toBe(0);
  });
});

describe("TournamentSession – byes", () => {
  it("hands the bye up the table and never twice to the same player", () => {
    const session = new TournamentSession({ tournamentId: "T-3", store: spyStore().store, logger, rounds: 2 });
    session.start([{ name: "Ada" }, { name: "Ben" }, { name: "Cy" }]);

    const r1 = session.beginRound();
    expect(r1).toEqual({ round: 1, pairings: [{ a: "1", b: "2" }], bye: "3" });
    expect(codeOf(() => session.reportBye("1"))).toBe("UnexpectedPair");
    session.reportBye("3");
    expect(codeOf(() => session.reportBye("3"))).toBe("DuplicateReport");
    expect(session.state).toBe("RoundInProgress");
    session.reportResult({ a: "1", b: "2" }, { kind: "win", winner: "1" });
    expect(session.state).toBe("RoundComplete");

    // 1 on 2, 3 on 1 (bye), 2 on 0: the bye goes to 2
    const r2 = session.beginRound();
    expect(r2).toEqual({ round: 2, pairings: [{ a: "1", b: "3" }], bye: "2" });
    expect(session.pendingBye()).toBe("2");
  });

  it("answers repeats after the round completes with DuplicateReport or UnexpectedPair", () => {
    const session = new TournamentSession({ tournamentId: "T-3", store: spyStore().store, logger, rounds: 1 });
    session.start([{ name: "Ada" }, { name: "Ben" }, { name: "Cy" }]);
    session.beginRound();
    session.reportBye("3");
    session.reportResult({ a: "1", b: "2" }, { kind: "win", winner: "1" });
    expect(session.state).toBe("RoundComplete");
    const before = session.standings();

    expect(codeOf(() => session.reportResult({ a: "2", b: "1" }, { kind: "win", winner: "2" }))).toBe(
      "DuplicateReport",
    );
    expect(codeOf(() => session.reportBye("3"))).toBe("DuplicateReport");
    expect(codeOf(() => session.reportResult({ a: "1", b: "3" }, { kind: "tie" }))).toBe(
      "UnexpectedPair",
    );
    expect(codeOf(() => session.reportBye("2"))).toBe("UnexpectedPair");
    expect(session.state).toBe("RoundComplete");
    expect(session.standings()).toEqual(before);
    expect(session.matches()).toHaveLength(2);
  });
});

describe("TournamentSession – finish", () => {
  it("refuses to finish a session that never started", async () => {
    const { store, commitTournament } = spyStore();
    const session = new TournamentSession({ tournamentId: "T-N", store, logger, rounds: 0 });
    expect(await asyncCodeOf(session.finish())).toBe("InvalidSessionState");
    expect(session.state).toBe("NotStarted");
    expect(commitTournament).not.toHaveBeenCalled();
  });

  it("fails with TournamentIncomplete and never calls the store before the last round", async () => {
    const { store, commitTournament } = spyStore();
    const session = fourPlayerSession(store);
    expect(await asyncCodeOf(session.finish())).toBe("TournamentIncomplete");

    session.beginRound();
    session.reportResult({ a: "1", b: "2" }, { kind: "win", winner: "1" });
    expect(await asyncCodeOf(session.finish())).toBe("TournamentIncomplete");
    session.reportResult({ a: "3", b: "4" }, { kind: "win", winner: "3" });
    expect(await asyncCodeOf(session.finish())).toBe("TournamentIncomplete");

    expect(commitTournament).not.toHaveBeenCalled();
  });

  it("commits players, standings and matches once every round is reported", async () => {
    const { store, commitTournament } = spyStore();
    const session = fourPlayerSession(store);
    for (let r = 0; r < 2; r++) {
      const { pairings } = session.beginRound();
      for (const p of pairings) session.reportResult(p, { kind: "win", winner: p.a });
    }

    await expect(session.finish()).resolves.toBe("T-4");
    expect(session.state).toBe("Finished");
    expect(commitTournament).toHaveBeenCalledTimes(1);

    const commit = commitTournament.mock.calls[0]?.[0];
    expect(commit?.tournamentId).toBe("T-4");
    expect(commit?.players).toHaveLength(4);
    expect(commit?.matches.map(m => m.matchId)).toEqual([1, 2, 3, 4]);
    expect(commit?.standings.map(s => s.score)).toEqual([4, 2, 2, 0]);

    expect(await asyncCodeOf(session.finish())).toBe("InvalidSessionState");
  });

  it("wraps store failures in CommitFailed and allows a retry", async () => {
    const { store, commitTournament } = spyStore();
    commitTournament.mockRejectedValueOnce(new Error("disk full"));
    const session = new TournamentSession({ tournamentId: "T-0", store, logger, rounds: 0 });
    session.start([]);

    const err = await session.finish().catch((e: unknown) => e);
    expect(isSwissError(err, "CommitFailed")).toBe(true);
    expect(err).toMatchObject({ message: "Commit of tournament T-0 failed: disk full" });
    expect(session.state).toBe("AwaitingRound");

    await expect(session.finish()).resolves.toBe("T-0");
    expect(commitTournament).toHaveBeenCalledTimes(2);
  });

  it("rejects mutations while a commit is in flight", async () => {
    let release: (id: string) => void = () => undefined;
    const store: TournamentStore = {
      commitTournament: () => new Promise<string>(resolve => { release = resolve; }),
    };
    const session = new TournamentSession({ tournamentId: "T-0", store, logger });
    session.start([]);

    const pending = session.finish();
    expect(await asyncCodeOf(session.finish())).toBe("InvalidSessionState");
    expect(codeOf(() => session.abandon())).toBe("InvalidSessionState");
    release("T-0");
    await expect(pending).resolves.toBe("T-0");
  });

  it("abandoning discards the tournament without committing", async () => {
    const { store, commitTournament } = spyStore();
    const onClose = vi.fn();
    const session = new TournamentSession({ tournamentId: "T-A", store, logger, onClose });
    session.start([{ name: "Ada" }, { name: "Ben" }]);
    session.beginRound();
    session.abandon();

    expect(session.state).toBe("Abandoned");
    expect(onClose).toHaveBeenCalledWith("T-A");
    expect(codeOf(() => session.reportResult({ a: "1", b: "2" }, { kind: "tie" }))).toBe(
      "InvalidSessionState",
    );
    expect(await asyncCodeOf(session.finish())).toBe("InvalidSessionState");
    expect(commitTournament).not.toHaveBeenCalled();
  });
});

describe("TournamentSession – whole tournaments", () => {
  function play(size: number, rounds: number) {
    const store = new MemoryTournamentStore();
    const session = new TournamentSession({ tournamentId: `T-${size}`, store, logger, rounds });
    session.start(Array.from({ length: size }, (_, i) => ({ name: `Player ${i + 1}` })));

    for (let r = 1; r <= rounds; r++) {
      const { pairings, bye } = session.beginRound();
      if (bye !== undefined) session.reportBye(bye);
      pairings.forEach((p, i) => {
        session.reportResult(p, i % 3 === 2 ? { kind: "tie" } : { kind: "win", winner: p.a });
        // score invariant after every update
        expect(session.standings().every(checkStanding)).toBe(true);
      });
      // matches + byes == rounds played, for every player
      expect(session.standings().every(s => s.matches + s.byes === r)).toBe(true);
    }
    return { session, store };
  }

  it.each([
    [8, 3],
    [7, 3],
  ])("%i players over %i rounds: no rematches, at most one bye each", async (size, rounds) => {
    const { session, store } = play(size, rounds);

    const games = session.matches().filter(m => m.loserId !== null);
    const keys = games.map(m => pairKey(m.winnerId, m.loserId ?? ""));
    expect(new Set(keys).size).toBe(keys.length);
    expect(session.standings().every(s => s.byes <= 1)).toBe(true);

    await session.finish();
    const saved = await store.loadTournament(`T-${size}`);
    expect(saved?.matches).toEqual(session.matches());
  });

  it("is reproducible: the same reports give the same pairings", () => {
    const a = play(8, 3).session.matches();
    const b = play(8, 3).session.matches();
    expect(a).toEqual(b);
  });

  it("shuffled score groups are reproducible for the same tournament id", () => {
    const run = () => {
      const session = new TournamentSession({
        tournamentId: "T-shuffle",
        store: spyStore().store,
        logger,
        pairing: { shuffleScoreGroups: true },
      });
      session.start(Array.from({ length: 6 }, (_, i) => ({ name: `P${i}` })));
      return session.beginRound().pairings;
    };
    const first = run();
    expect(run()).toEqual(first);
    expect(new Set(first.flatMap(p => [p.a, p.b])).size).toBe(6);
  });
});
