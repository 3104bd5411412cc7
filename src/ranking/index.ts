export { RankingEngine, type RankingEngineOptions } from "./engine.js";
export {
  ConvergenceWarning,
  InvalidComparisonError,
  StoreUnavailableError,
  UnknownCandidateError
} from "./errors.js";
export type {
  CandidateStats,
  NextOpponentsOptions,
  OpponentPlan,
  RankingEntry,
  RankingEvent,
  RankingEventPhase,
  RankingExport,
  RankingQuery,
  RankingReporter,
  RecomputeSummary,
  SubmitResult
} from "./types.js";
export { ComparisonStore } from "../store/comparison-store.js";
export { DEFAULT_SCORE } from "../store/types.js";
export type { CandidateRecord, ComparisonRecord, StoreSnapshot, Winner } from "../store/types.js";
export { createSolver, type CreateSolverOptions } from "../solver/create-solver.js";
export { MmSolver } from "../solver/mm-solver.js";
export { OptimizerSolver } from "../solver/optimizer-solver.js";
export { loadOptimizer } from "../solver/optimizer-loader.js";
export { PHANTOM_GAMES } from "../solver/graph.js";
export type { SolveResult, Solver, SolverMethod, SolverPreference, SolverSettings } from "../solver/types.js";
export {
  ComparisonSelector,
  planSelectionCounts,
  type SelectionCounts,
  type SelectionPhase
} from "../selector/selector.js";
export { mulberry32 } from "../selector/random.js";
export { rebuildFromLog, type RebuildSummary } from "../maintenance/rebuild.js";
