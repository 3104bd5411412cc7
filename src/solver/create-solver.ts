import { MmSolver } from "./mm-solver.js";
import { OPTIMIZER_PACKAGE, loadOptimizer, type OptimizerModule } from "./optimizer-loader.js";
import { OptimizerSolver } from "./optimizer-solver.js";
import { DEFAULT_SOLVER_SETTINGS } from "./types.js";
import type { Solver, SolverPreference, SolverSettings } from "./types.js";

export interface CreateSolverOptions {
  preference?: SolverPreference;
  settings?: SolverSettings;
  loadOptimizer?: () => OptimizerModule | null;
}

export function createSolver(options: CreateSolverOptions = {}): Solver {
  const preference = options.preference ?? "auto";
  const settings = options.settings ?? DEFAULT_SOLVER_SETTINGS;

  if (preference === "mm") {
    return new MmSolver(settings);
  }

  const optimizer = (options.loadOptimizer ?? loadOptimizer)();
  if (optimizer) {
    return new OptimizerSolver(optimizer, settings);
  }

  if (preference === "optimizer") {
    throw new Error(`Solver 'optimizer' needs the optional '${OPTIMIZER_PACKAGE}' package, which is not installed.`);
  }

  return new MmSolver(settings);
}

export function parseSolverPreference(raw: string): SolverPreference | null {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "auto" || normalized === "mm" || normalized === "optimizer") {
    return normalized;
  }
  return null;
}
