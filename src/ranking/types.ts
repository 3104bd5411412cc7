import type { ConvergenceWarning } from "./errors.js";
import type { SelectionPhase } from "../selector/selector.js";
import type { SolverMethod } from "../solver/types.js";
import type { ComparisonRecord } from "../store/types.js";

export interface RankingEntry {
  rank: number;
  candidateId: string;
  score: number;
  games: number;
  wins: number;
  losses: number;
  ties: number;
  /** Ties count as half a win. */
  winRate: number;
}

export interface RankingQuery {
  top?: number;
  minGames?: number;
}

export interface RecomputeSummary {
  method: SolverMethod;
  candidates: number;
  comparisons: number;
  iterations: number;
  converged: boolean;
  maxDelta: number;
  logLikelihood: number;
  warning: ConvergenceWarning | null;
}

export interface SubmitResult extends RecomputeSummary {
  comparison: ComparisonRecord;
}

export interface NextOpponentsOptions {
  /** "auto" explores for a candidate without games and refines otherwise. */
  phase?: SelectionPhase | "auto";
  seed?: number;
  /** Allow opponents this candidate was already compared against. */
  allowRepeats?: boolean;
}

export interface OpponentPlan {
  candidateId: string;
  phase: SelectionPhase;
  opponents: string[];
}

export interface CandidateStats extends RankingEntry {
  createdAt: string;
  updatedAt: string;
  opponents: number;
}

export interface RankingExport {
  metadata: {
    algorithm: "bradley-terry-mm";
    solver: SolverMethod;
    tolerance: number;
    maxIterations: number;
    phantomGames: number;
    totalCandidates: number;
    totalComparisons: number;
    exportedAt: string;
  };
  rankings: RankingEntry[];
  comparisons: ComparisonRecord[];
}

export type RankingEventPhase =
  | "candidate-registered"
  | "comparison-recorded"
  | "scores-recomputed"
  | "convergence-warning"
  | "opponents-selected";

export interface RankingEvent {
  phase: RankingEventPhase;
  message: string;
  candidateId?: string;
}

export type RankingReporter = (event: RankingEvent) => void;
