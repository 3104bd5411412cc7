import { ConvergenceWarning, UnknownCandidateError } from "./errors.js";
import type {
  CandidateStats,
  NextOpponentsOptions,
  OpponentPlan,
  RankingEntry,
  RankingEvent,
  RankingExport,
  RankingQuery,
  RankingReporter,
  RecomputeSummary,
  SubmitResult
} from "./types.js";
import { createRandomSource, mulberry32 } from "../selector/random.js";
import {
  ComparisonSelector,
  DEFAULT_SELECTION_COUNTS,
  resolveSelectionCounts,
  sortByRank,
  type SelectionCounts,
  type SelectionPhase
} from "../selector/selector.js";
import { createSolver } from "../solver/create-solver.js";
import { PHANTOM_GAMES } from "../solver/graph.js";
import type { SolveResult, Solver } from "../solver/types.js";
import type { ComparisonStore } from "../store/comparison-store.js";
import type { CandidateRecord, ComparisonRecord, StoreSnapshot } from "../store/types.js";

export interface RankingEngineOptions {
  store: ComparisonStore;
  solver?: Solver;
  selection?: SelectionCounts;
  seed?: number | null;
  reporter?: RankingReporter;
}

type SolvedSnapshot = SolveResult & { candidates: number; comparisons: number };

export class RankingEngine {
  readonly solver: Solver;
  private readonly store: ComparisonStore;
  private readonly selection: SelectionCounts;
  private readonly selector: ComparisonSelector;
  private readonly reporter: RankingReporter | undefined;

  constructor(options: RankingEngineOptions) {
    this.store = options.store;
    this.solver = options.solver ?? createSolver();
    this.selection = options.selection ?? DEFAULT_SELECTION_COUNTS;
    this.selector = new ComparisonSelector(createRandomSource(options.seed));
    this.reporter = options.reporter;
  }

  close(): void {
    this.store.close();
  }

  register(candidateId: string): boolean {
    const created = this.store.register(candidateId);
    if (created) {
      this.report({ phase: "candidate-registered", candidateId, message: `Registered ${candidateId}` });
    }
    return created;
  }

  submitResult(candidateA: string, candidateB: string, winner: string, reasoning: string = ""): SubmitResult {
    const { comparison, result } = this.store.recordAndRescore(
      candidateA,
      candidateB,
      winner,
      reasoning,
      (snapshot) => this.solveSnapshot(snapshot)
    );

    this.report({
      phase: "comparison-recorded",
      candidateId: candidateA,
      message: `Recorded #${comparison.id} ${candidateA} vs ${candidateB}: ${describeOutcome(comparison)}`
    });

    return { ...this.summarize(result), comparison };
  }

  recompute(): RecomputeSummary {
    return this.summarize(this.store.rescore((snapshot) => this.solveSnapshot(snapshot)));
  }

  nextOpponents(
    candidateId: string,
    counts: Partial<SelectionCounts> = {},
    options: NextOpponentsOptions = {}
  ): string[] {
    return this.planOpponents(candidateId, counts, options).opponents;
  }

  planOpponents(
    candidateId: string,
    counts: Partial<SelectionCounts> = {},
    options: NextOpponentsOptions = {}
  ): OpponentPlan {
    const snapshot = this.store.loadAll();
    const target = snapshot.candidates.find((candidate) => candidate.candidateId === candidateId);
    if (!target) {
      throw new UnknownCandidateError(candidateId);
    }

    const phase = resolvePhase(options.phase, target);
    const exclude = options.allowRepeats ? undefined : comparedOpponents(snapshot, candidateId);
    const selector = options.seed === undefined ? this.selector : new ComparisonSelector(mulberry32(options.seed));

    const opponents = selector.select(
      phase,
      { candidateId, population: snapshot.candidates, exclude },
      resolveSelectionCounts(this.selection, counts)
    );

    this.report({
      phase: "opponents-selected",
      candidateId,
      message: `${phase} picked ${opponents.length} opponent(s)`
    });

    return { candidateId, phase, opponents };
  }

  getRankings(query: RankingQuery = {}): RankingEntry[] {
    const minGames = query.minGames ?? 0;
    const ranked = sortByRank(this.store.listCandidates())
      .filter((candidate) => candidate.games >= minGames)
      .map((candidate, index) => toRankingEntry(candidate, index + 1));

    return query.top === undefined ? ranked : ranked.slice(0, Math.max(0, query.top));
  }

  exportScores(): Record<string, number> {
    return Object.fromEntries(this.getRankings().map((entry) => [entry.candidateId, entry.score]));
  }

  exportData(): RankingExport {
    const snapshot = this.store.loadAll();
    const rankings = sortByRank(snapshot.candidates).map((candidate, index) => toRankingEntry(candidate, index + 1));

    return {
      metadata: {
        algorithm: "bradley-terry-mm",
        solver: this.solver.method,
        tolerance: this.solver.settings.tolerance,
        maxIterations: this.solver.settings.maxIterations,
        phantomGames: PHANTOM_GAMES,
        totalCandidates: snapshot.candidates.length,
        totalComparisons: snapshot.comparisons.length,
        exportedAt: new Date().toISOString()
      },
      rankings,
      comparisons: snapshot.comparisons
    };
  }

  getCandidateStats(candidateId: string): CandidateStats {
    const snapshot = this.store.loadAll();
    const ranked = sortByRank(snapshot.candidates);
    const index = ranked.findIndex((candidate) => candidate.candidateId === candidateId);
    if (index === -1) {
      throw new UnknownCandidateError(candidateId);
    }

    const candidate = ranked[index];
    return {
      ...toRankingEntry(candidate, index + 1),
      createdAt: candidate.createdAt,
      updatedAt: candidate.updatedAt,
      opponents: comparedOpponents(snapshot, candidateId).size
    };
  }

  getComparisonHistory(candidateId: string): ComparisonRecord[] {
    this.store.requireCandidate(candidateId);
    return this.store.getComparisonHistory(candidateId);
  }

  private solveSnapshot(snapshot: StoreSnapshot): SolvedSnapshot {
    const solved = this.solver.solve({
      candidateIds: snapshot.candidates.map((candidate) => candidate.candidateId),
      comparisons: snapshot.comparisons
    });
    return { ...solved, candidates: snapshot.candidates.length, comparisons: snapshot.comparisons.length };
  }

  private summarize(result: SolvedSnapshot): RecomputeSummary {
    const warning = result.converged
      ? null
      : new ConvergenceWarning(result.iterations, result.maxDelta, this.solver.settings.tolerance);

    this.report({
      phase: "scores-recomputed",
      message: `Rescored ${result.candidates} candidate(s) from ${result.comparisons} comparison(s) via ${result.method} in ${result.iterations} iteration(s)`
    });
    if (warning) {
      this.report({ phase: "convergence-warning", message: warning.message });
    }

    return {
      method: result.method,
      candidates: result.candidates,
      comparisons: result.comparisons,
      iterations: result.iterations,
      converged: result.converged,
      maxDelta: result.maxDelta,
      logLikelihood: result.logLikelihood,
      warning
    };
  }

  private report(event: RankingEvent): void {
    this.reporter?.(event);
  }
}

function resolvePhase(requested: NextOpponentsOptions["phase"], target: CandidateRecord): SelectionPhase {
  if (requested === "exploration" || requested === "refinement") {
    return requested;
  }
  return target.games === 0 ? "exploration" : "refinement";
}

function comparedOpponents(snapshot: StoreSnapshot, candidateId: string): Set<string> {
  const opponents = new Set<string>();
  for (const comparison of snapshot.comparisons) {
    if (comparison.candidateA === candidateId) {
      opponents.add(comparison.candidateB);
    } else if (comparison.candidateB === candidateId) {
      opponents.add(comparison.candidateA);
    }
  }
  return opponents;
}

function toRankingEntry(candidate: CandidateRecord, rank: number): RankingEntry {
  return {
    rank,
    candidateId: candidate.candidateId,
    score: candidate.score,
    games: candidate.games,
    wins: candidate.wins,
    losses: candidate.losses,
    ties: candidate.ties,
    winRate: candidate.games === 0 ? 0 : (candidate.wins + 0.5 * candidate.ties) / candidate.games
  };
}

function describeOutcome(comparison: ComparisonRecord): string {
  if (comparison.winner === "tie") {
    return "tie";
  }
  return `${comparison.winner === "a" ? comparison.candidateA : comparison.candidateB} wins`;
}
