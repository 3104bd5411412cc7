import type { Winner } from "../store/types.js";

export type SolverMethod = "mm" | "optimizer";

export type SolverPreference = "auto" | SolverMethod;

export interface PairwiseOutcome {
  candidateA: string;
  candidateB: string;
  winner: Winner;
}

export interface SolverInput {
  candidateIds: readonly string[];
  comparisons: readonly PairwiseOutcome[];
}

export interface SolverSettings {
  tolerance: number;
  maxIterations: number;
}

export interface SolveResult {
  scores: Map<string, number>;
  iterations: number;
  converged: boolean;
  maxDelta: number;
  method: SolverMethod;
  /** Log-likelihood of the regularized model at the returned scores; 0 when nothing was fit. */
  logLikelihood: number;
}

export interface Solver {
  readonly method: SolverMethod;
  readonly settings: SolverSettings;
  solve(input: SolverInput): SolveResult;
}

export const DEFAULT_SOLVER_SETTINGS: SolverSettings = {
  tolerance: 1e-6,
  maxIterations: 1000
};
