import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import {
  InvalidComparisonError,
  StoreUnavailableError,
  UnknownCandidateError,
  isStoreUnavailableCode,
  readErrorCode
} from "../ranking/errors.js";
import { STORE_SCHEMA_SQL } from "./schema.js";
import { DEFAULT_SCORE } from "./types.js";
import type {
  CandidateRecord,
  ComparisonRecord,
  ComparisonStoreOptions,
  RebuildCountsResult,
  StoreSnapshot,
  Winner
} from "./types.js";

const DEFAULT_BUSY_TIMEOUT_MS = 5000;

type CandidateRow = {
  id: string;
  score: number;
  wins: number;
  losses: number;
  ties: number;
  games: number;
  created_at: string;
  updated_at: string;
};

type ComparisonRow = {
  id: number;
  candidate_a: string;
  candidate_b: string;
  winner: string;
  reasoning: string;
  created_at: string;
};

type CountRow = {
  count: number;
};

const CANDIDATE_COLUMNS = "id, score, wins, losses, ties, games, created_at, updated_at";
const COMPARISON_COLUMNS = "id, candidate_a, candidate_b, winner, reasoning, created_at";

export class ComparisonStore {
  private readonly db: Database.Database;

  constructor(
    readonly dbPath: string,
    options: ComparisonStoreOptions = {}
  ) {
    const busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = guardStore(`open ${dbPath}`, () => {
      const db = new Database(dbPath);
      db.pragma(`busy_timeout = ${Math.max(0, Math.floor(busyTimeoutMs))}`);
      db.pragma("journal_mode = WAL");
      db.pragma("foreign_keys = ON");
      db.exec(STORE_SCHEMA_SQL);
      return db;
    });
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  register(candidateId: string): boolean {
    assertCandidateId(candidateId);
    return guardStore("register candidate", () =>
      this.db.transaction(() => this.insertCandidate(candidateId, new Date().toISOString())).immediate()
    );
  }

  record(candidateA: string, candidateB: string, winner: string, reasoning: string = ""): ComparisonRecord {
    assertComparison(candidateA, candidateB, winner);
    const verdict: Winner = winner;

    return guardStore("record comparison", () =>
      this.db.transaction(() => this.insertComparison(candidateA, candidateB, verdict, reasoning)).immediate()
    );
  }

  /**
   * Records a comparison and rescores from the resulting log in one write
   * transaction. A lock failure leaves neither the comparison nor the scores
   * behind.
   */
  recordAndRescore<T extends { scores: ReadonlyMap<string, number> }>(
    candidateA: string,
    candidateB: string,
    winner: string,
    reasoning: string,
    compute: (snapshot: StoreSnapshot) => T
  ): { comparison: ComparisonRecord; result: T } {
    assertComparison(candidateA, candidateB, winner);
    const verdict: Winner = winner;

    return guardStore("record and rescore", () =>
      this.db
        .transaction(() => {
          const comparison = this.insertComparison(candidateA, candidateB, verdict, reasoning);
          const result = compute(this.readSnapshot());
          assertScores(result.scores);
          this.writeScores(result.scores);
          return { comparison, result };
        })
        .immediate()
    );
  }

  loadAll(): StoreSnapshot {
    return guardStore("load snapshot", () => this.db.transaction(() => this.readSnapshot()).deferred());
  }

  persistScores(scores: ReadonlyMap<string, number>): void {
    assertScores(scores);
    guardStore("persist scores", () => {
      this.db.transaction(() => this.writeScores(scores)).immediate();
    });
  }

  rescore<T extends { scores: ReadonlyMap<string, number> }>(compute: (snapshot: StoreSnapshot) => T): T {
    return guardStore("rescore", () =>
      this.db
        .transaction((): T => {
          const result = compute(this.readSnapshot());
          assertScores(result.scores);
          this.writeScores(result.scores);
          return result;
        })
        .immediate()
    );
  }

  getCandidate(candidateId: string): CandidateRecord | null {
    const row = guardStore("read candidate", () =>
      this.db
        .prepare<[string], CandidateRow>(
          `
          SELECT ${CANDIDATE_COLUMNS}
          FROM candidates
          WHERE id = ?
          LIMIT 1
        `
        )
        .get(candidateId)
    );

    return row ? toCandidateRecord(row) : null;
  }

  requireCandidate(candidateId: string): CandidateRecord {
    const candidate = this.getCandidate(candidateId);
    if (!candidate) {
      throw new UnknownCandidateError(candidateId);
    }
    return candidate;
  }

  listCandidates(): CandidateRecord[] {
    return guardStore("list candidates", () => this.selectCandidates().map(toCandidateRecord));
  }

  getComparisonHistory(candidateId: string): ComparisonRecord[] {
    const rows = guardStore("read comparison history", () =>
      this.db
        .prepare<[string, string], ComparisonRow>(
          `
          SELECT ${COMPARISON_COLUMNS}
          FROM comparisons
          WHERE candidate_a = ? OR candidate_b = ?
          ORDER BY id DESC
        `
        )
        .all(candidateId, candidateId)
    );

    return rows.map(toComparisonRecord);
  }

  countComparisons(): number {
    const row = guardStore("count comparisons", () =>
      this.db.prepare<[], CountRow>("SELECT COUNT(*) AS count FROM comparisons").get()
    );
    return row?.count ?? 0;
  }

  rebuildCounts(): RebuildCountsResult {
    return guardStore("rebuild counts", () =>
      this.db
        .transaction((): RebuildCountsResult => {
          const result = this.db
            .prepare<[string]>(
              `
              WITH sides AS (
                SELECT candidate_a AS id,
                       CASE winner WHEN 'a' THEN 1 ELSE 0 END AS win,
                       CASE winner WHEN 'b' THEN 1 ELSE 0 END AS loss,
                       CASE winner WHEN 'tie' THEN 1 ELSE 0 END AS tie
                FROM comparisons
                UNION ALL
                SELECT candidate_b AS id,
                       CASE winner WHEN 'b' THEN 1 ELSE 0 END AS win,
                       CASE winner WHEN 'a' THEN 1 ELSE 0 END AS loss,
                       CASE winner WHEN 'tie' THEN 1 ELSE 0 END AS tie
                FROM comparisons
              ),
              totals AS (
                SELECT c.id AS id,
                       COALESCE(SUM(s.win), 0) AS wins,
                       COALESCE(SUM(s.loss), 0) AS losses,
                       COALESCE(SUM(s.tie), 0) AS ties,
                       COUNT(s.id) AS games
                FROM candidates c
                LEFT JOIN sides s ON s.id = c.id
                GROUP BY c.id
              )
              UPDATE candidates
              SET wins = totals.wins,
                  losses = totals.losses,
                  ties = totals.ties,
                  games = totals.games,
                  updated_at = ?
              FROM totals
              WHERE candidates.id = totals.id
                AND (candidates.wins <> totals.wins
                  OR candidates.losses <> totals.losses
                  OR candidates.ties <> totals.ties
                  OR candidates.games <> totals.games)
            `
            )
            .run(new Date().toISOString());

          return { updatedCandidates: result.changes };
        })
        .immediate()
    );
  }

  private insertComparison(
    candidateA: string,
    candidateB: string,
    winner: Winner,
    reasoning: string
  ): ComparisonRecord {
    const now = new Date().toISOString();
    this.insertCandidate(candidateA, now);
    this.insertCandidate(candidateB, now);

    const insertResult = this.db
      .prepare<[string, string, Winner, string, string]>(
        `
        INSERT INTO comparisons (candidate_a, candidate_b, winner, reasoning, created_at)
        VALUES (?, ?, ?, ?, ?)
      `
      )
      .run(candidateA, candidateB, winner, reasoning, now);

    this.applyOutcome(candidateA, outcomeFor("a", winner), now);
    this.applyOutcome(candidateB, outcomeFor("b", winner), now);

    return {
      id: Number(insertResult.lastInsertRowid),
      candidateA,
      candidateB,
      winner,
      reasoning,
      createdAt: now
    };
  }

  private insertCandidate(candidateId: string, now: string): boolean {
    const result = this.db
      .prepare<[string, number, string, string]>(
        `
        INSERT OR IGNORE INTO candidates (id, score, created_at, updated_at)
        VALUES (?, ?, ?, ?)
      `
      )
      .run(candidateId, DEFAULT_SCORE, now, now);

    return result.changes > 0;
  }

  private applyOutcome(candidateId: string, outcome: "win" | "loss" | "tie", now: string): void {
    this.db
      .prepare<[number, number, number, string, string]>(
        `
        UPDATE candidates
        SET games = games + 1,
            wins = wins + ?,
            losses = losses + ?,
            ties = ties + ?,
            updated_at = ?
        WHERE id = ?
      `
      )
      .run(outcome === "win" ? 1 : 0, outcome === "loss" ? 1 : 0, outcome === "tie" ? 1 : 0, now, candidateId);
  }

  private writeScores(scores: ReadonlyMap<string, number>): void {
    const update = this.db.prepare<[number, string, string]>(
      `
      UPDATE candidates
      SET score = ?, updated_at = ?
      WHERE id = ?
    `
    );
    const now = new Date().toISOString();

    for (const [candidateId, score] of scores) {
      const result = update.run(score, now, candidateId);
      if (result.changes === 0) {
        throw new UnknownCandidateError(candidateId);
      }
    }
  }

  private readSnapshot(): StoreSnapshot {
    const comparisons = this.db
      .prepare<[], ComparisonRow>(
        `
        SELECT ${COMPARISON_COLUMNS}
        FROM comparisons
        ORDER BY id ASC
      `
      )
      .all();

    return {
      candidates: this.selectCandidates().map(toCandidateRecord),
      comparisons: comparisons.map(toComparisonRecord)
    };
  }

  private selectCandidates(): CandidateRow[] {
    return this.db
      .prepare<[], CandidateRow>(
        `
        SELECT ${CANDIDATE_COLUMNS}
        FROM candidates
        ORDER BY score DESC, id ASC
      `
      )
      .all();
  }
}

export function isWinner(value: string): value is Winner {
  return value === "a" || value === "b" || value === "tie";
}

function outcomeFor(side: "a" | "b", winner: Winner): "win" | "loss" | "tie" {
  if (winner === "tie") {
    return "tie";
  }
  return winner === side ? "win" : "loss";
}

function assertCandidateId(candidateId: string): void {
  if (candidateId.trim().length === 0) {
    throw new InvalidComparisonError("Candidate id must be non-empty.", candidateId, "", "");
  }
}

function assertComparison(candidateA: string, candidateB: string, winner: string): asserts winner is Winner {
  if (candidateA.trim().length === 0 || candidateB.trim().length === 0) {
    throw new InvalidComparisonError("Candidate ids must be non-empty.", candidateA, candidateB, winner);
  }

  if (candidateA === candidateB) {
    throw new InvalidComparisonError(
      `A candidate cannot be compared with itself ('${candidateA}').`,
      candidateA,
      candidateB,
      winner
    );
  }

  if (!isWinner(winner)) {
    throw new InvalidComparisonError(
      `Invalid winner '${winner}'. Expected a, b or tie.`,
      candidateA,
      candidateB,
      winner
    );
  }
}

function assertScores(scores: ReadonlyMap<string, number>): void {
  for (const [candidateId, score] of scores) {
    if (!Number.isFinite(score) || score <= 0) {
      throw new RangeError(`Score for '${candidateId}' must be positive and finite, got ${score}.`);
    }
  }
}

function guardStore<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error: unknown) {
    const code = readErrorCode(error);
    if (code !== null && isStoreUnavailableCode(code)) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new StoreUnavailableError(`Store unavailable during ${operation}: ${detail}`, code, { cause: error });
    }
    throw error;
  }
}

function toCandidateRecord(row: CandidateRow): CandidateRecord {
  return {
    candidateId: row.id,
    score: row.score,
    wins: row.wins,
    losses: row.losses,
    ties: row.ties,
    games: row.games,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function toComparisonRecord(row: ComparisonRow): ComparisonRecord {
  if (!isWinner(row.winner)) {
    throw new Error(`Comparison ${row.id} has corrupt winner '${row.winner}'.`);
  }

  return {
    id: row.id,
    candidateA: row.candidate_a,
    candidateB: row.candidate_b,
    winner: row.winner,
    reasoning: row.reasoning,
    createdAt: row.created_at
  };
}
