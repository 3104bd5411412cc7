import { buildComparisonGraph, buildSolveResult, iterateMm, unfittedResult, uniformStart } from "./graph.js";
import { DEFAULT_SOLVER_SETTINGS } from "./types.js";
import type { SolveResult, Solver, SolverInput, SolverMethod, SolverSettings } from "./types.js";

export class MmSolver implements Solver {
  readonly method: SolverMethod = "mm";

  constructor(readonly settings: SolverSettings = DEFAULT_SOLVER_SETTINGS) {}

  solve(input: SolverInput): SolveResult {
    const graph = buildComparisonGraph(input.comparisons);
    if (!graph) {
      return unfittedResult(input, this.method);
    }

    const run = iterateMm(graph, uniformStart(graph), this.settings);
    return buildSolveResult(input, graph, run, this.method);
  }
}
