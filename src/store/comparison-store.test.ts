import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import assert from "node:assert/strict";
import Database from "better-sqlite3";
import { InvalidComparisonError, StoreUnavailableError, UnknownCandidateError } from "../ranking/errors.js";
import { ComparisonStore, isWinner } from "./comparison-store.js";

function withStore(run: (store: ComparisonStore, dbPath: string) => void): void {
  const tempRoot = mkdtempSync(path.join(os.tmpdir(), "pairrank-store-"));
  const dbPath = path.join(tempRoot, "rankings.db");
  const store = new ComparisonStore(dbPath);

  try {
    run(store, dbPath);
  } finally {
    store.close();
    rmSync(tempRoot, { recursive: true, force: true });
  }
}

test("register creates a candidate once at the default score", () => {
  withStore((store) => {
    assert.equal(store.register("alpha"), true);
    assert.equal(store.register("alpha"), false);

    const candidate = store.requireCandidate("alpha");
    assert.equal(candidate.score, 1);
    assert.equal(candidate.games, 0);
    assert.equal(store.getCandidate("missing"), null);
  });
});

test("record registers both sides and updates win, loss and tie counts", () => {
  withStore((store) => {
    const first = store.record("a", "b", "a", "clearer structure");
    store.record("a", "c", "tie");

    assert.equal(first.id, 1);
    assert.equal(first.winner, "a");
    assert.equal(first.reasoning, "clearer structure");

    const a = store.requireCandidate("a");
    const b = store.requireCandidate("b");
    const c = store.requireCandidate("c");
    assert.deepEqual([a.wins, a.losses, a.ties, a.games], [1, 0, 1, 2]);
    assert.deepEqual([b.wins, b.losses, b.ties, b.games], [0, 1, 0, 1]);
    assert.deepEqual([c.wins, c.losses, c.ties, c.games], [0, 0, 1, 1]);

    assert.deepEqual(
      store.listCandidates().map((candidate) => candidate.candidateId),
      ["a", "b", "c"]
    );
    assert.deepEqual(
      store.getComparisonHistory("a").map((comparison) => comparison.id),
      [2, 1]
    );
    assert.equal(store.countComparisons(), 2);
  });
});

test("record rejects self comparisons and unknown winners without writing", () => {
  withStore((store) => {
    assert.throws(() => store.record("a", "a", "a"), InvalidComparisonError);
    assert.throws(() => store.record("a", "b", "left"), InvalidComparisonError);
    assert.throws(() => store.record("", "b", "a"), InvalidComparisonError);

    assert.equal(store.countComparisons(), 0);
    assert.equal(store.listCandidates().length, 0);
  });
});

test("loadAll returns candidates by score and comparisons in insertion order", () => {
  withStore((store) => {
    store.record("x", "y", "b");
    store.record("y", "z", "a");
    store.persistScores(
      new Map([
        ["x", 0.5],
        ["y", 2],
        ["z", 1]
      ])
    );

    const snapshot = store.loadAll();
    assert.deepEqual(
      snapshot.candidates.map((candidate) => candidate.candidateId),
      ["y", "z", "x"]
    );
    assert.deepEqual(
      snapshot.comparisons.map((comparison) => [comparison.candidateA, comparison.candidateB, comparison.winner]),
      [
        ["x", "y", "b"],
        ["y", "z", "a"]
      ]
    );
  });
});

test("persistScores rolls back every score when one candidate is unknown", () => {
  withStore((store) => {
    store.record("a", "b", "a");

    assert.throws(
      () =>
        store.persistScores(
          new Map([
            ["a", 2],
            ["ghost", 3]
          ])
        ),
      UnknownCandidateError
    );
    assert.equal(store.requireCandidate("a").score, 1);
  });
});

test("persistScores rejects non-positive and non-finite scores", () => {
  withStore((store) => {
    store.register("a");

    assert.throws(() => store.persistScores(new Map([["a", 0]])), RangeError);
    assert.throws(() => store.persistScores(new Map([["a", Number.NaN]])), RangeError);
    assert.equal(store.requireCandidate("a").score, 1);
  });
});

test("rescore writes the computed scores and returns the computation result", () => {
  withStore((store) => {
    store.record("a", "b", "b");

    const result = store.rescore((snapshot) => ({
      scores: new Map([
        ["a", 0.25],
        ["b", 4]
      ]),
      seen: snapshot.comparisons.length
    }));

    assert.equal(result.seen, 1);
    assert.equal(store.requireCandidate("a").score, 0.25);
    assert.equal(store.requireCandidate("b").score, 4);
  });
});

test("recordAndRescore writes the comparison and the scores together", () => {
  withStore((store) => {
    const { comparison, result } = store.recordAndRescore("a", "b", "b", "tighter loop", (snapshot) => ({
      scores: new Map([
        ["a", 0.5],
        ["b", 2]
      ]),
      logged: snapshot.comparisons.map((entry) => entry.id)
    }));

    assert.equal(comparison.id, 1);
    assert.deepEqual(result.logged, [1]);
    assert.equal(store.requireCandidate("b").score, 2);
    assert.equal(store.requireCandidate("b").wins, 1);
  });
});

test("recordAndRescore rolls the comparison back when scoring fails", () => {
  withStore((store) => {
    assert.throws(
      () =>
        store.recordAndRescore("a", "b", "a", "", () => {
          throw new Error("solver exploded");
        }),
      /solver exploded/
    );
    assert.throws(
      () => store.recordAndRescore("a", "b", "a", "", () => ({ scores: new Map([["a", -1]]) })),
      RangeError
    );

    assert.equal(store.countComparisons(), 0);
    assert.equal(store.getCandidate("a"), null);
  });
});

test("rebuildCounts repairs counts that drifted from the comparison log", () => {
  withStore((store, dbPath) => {
    store.record("a", "b", "a");
    store.record("b", "a", "tie");

    const raw = new Database(dbPath);
    try {
      raw.prepare("UPDATE candidates SET wins = 9, games = 9 WHERE id = 'a'").run();
    } finally {
      raw.close();
    }

    assert.deepEqual(store.rebuildCounts(), { updatedCandidates: 1 });

    const a = store.requireCandidate("a");
    assert.deepEqual([a.wins, a.losses, a.ties, a.games], [1, 0, 1, 2]);
    assert.deepEqual(store.rebuildCounts(), { updatedCandidates: 0 });
  });
});

test("a locked store surfaces StoreUnavailableError", () => {
  withStore((store, dbPath) => {
    store.register("a");
    const contender = new ComparisonStore(dbPath, { busyTimeoutMs: 0 });
    const locker = new Database(dbPath);

    try {
      locker.exec("BEGIN IMMEDIATE");
      assert.throws(
        () => contender.record("a", "b", "a"),
        (error: unknown) =>
          error instanceof StoreUnavailableError && error.retryable && (error.code ?? "").startsWith("SQLITE_BUSY")
      );
    } finally {
      locker.exec("ROLLBACK");
      locker.close();
      contender.close();
    }

    assert.equal(store.countComparisons(), 0);
  });
});

test("isWinner accepts only a, b and tie", () => {
  assert.equal(isWinner("a"), true);
  assert.equal(isWinner("tie"), true);
  assert.equal(isWinner("A"), false);
});
