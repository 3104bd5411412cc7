import {
  buildComparisonGraph,
  buildSolveResult,
  iterateMm,
  unfittedResult,
  uniformStart,
  type ComparisonGraph
} from "./graph.js";
import type { OptimizerModule } from "./optimizer-loader.js";
import { DEFAULT_SOLVER_SETTINGS } from "./types.js";
import type { SolveResult, Solver, SolverInput, SolverMethod, SolverSettings } from "./types.js";

const FLAT_GRADIENT = 1e-12;

/**
 * Minimizes the negative log-likelihood over log-scores with conjugate
 * gradient, then runs MM sweeps from that point until the usual tolerance
 * holds. Both strategies therefore stop at the same fixed point; this one
 * usually needs far fewer sweeps to get there.
 */
export class OptimizerSolver implements Solver {
  readonly method: SolverMethod = "optimizer";

  constructor(
    private readonly optimizer: OptimizerModule,
    readonly settings: SolverSettings = DEFAULT_SOLVER_SETTINGS
  ) {}

  solve(input: SolverInput): SolveResult {
    const graph = buildComparisonGraph(input.comparisons);
    if (!graph) {
      return unfittedResult(input, this.method);
    }

    const run = iterateMm(graph, this.minimize(graph), this.settings);
    return buildSolveResult(input, graph, run, this.method);
  }

  private minimize(graph: ComparisonGraph): Float64Array {
    const initial = new Array<number>(graph.size).fill(0);
    const objective = (x: number[], gradient: number[]): number => negativeLogLikelihood(graph, x, gradient);

    const initialGradient = new Array<number>(graph.size).fill(0);
    objective(initial, initialGradient);
    if (Math.sqrt(initialGradient.reduce((sum, g) => sum + g * g, 0)) <= FLAT_GRADIENT) {
      return uniformStart(graph);
    }

    const solution = this.optimizer.conjugateGradient(objective, initial, {
      maxIterations: this.settings.maxIterations
    });

    if (solution.x.length !== graph.size || !solution.x.every(Number.isFinite)) {
      return uniformStart(graph);
    }

    // Center before exponentiating; the likelihood is invariant to the shift.
    const mean = solution.x.reduce((sum, value) => sum + value, 0) / solution.x.length;
    return Float64Array.from(solution.x, (value) => Math.exp(value - mean));
  }
}

export function negativeLogLikelihood(graph: ComparisonGraph, x: number[], gradient: number[]): number {
  let value = 0;
  gradient.fill(0);

  for (let i = 0; i < graph.size; i += 1) {
    value -= graph.wins[i] * x[i];
    gradient[i] -= graph.wins[i];

    for (const edge of graph.neighbors[i]) {
      const j = edge.index;
      if (j <= i) {
        continue;
      }

      const diff = x[i] - x[j];
      value += edge.games * (Math.max(x[i], x[j]) + Math.log1p(Math.exp(-Math.abs(diff))));

      const pi = sigmoid(diff);
      gradient[i] += edge.games * pi;
      gradient[j] += edge.games * (1 - pi);
    }
  }

  return value;
}

function sigmoid(value: number): number {
  if (value >= 0) {
    return 1 / (1 + Math.exp(-value));
  }
  const exp = Math.exp(value);
  return exp / (1 + exp);
}
