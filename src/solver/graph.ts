import { InvalidComparisonError } from "../ranking/errors.js";
import { DEFAULT_SCORE } from "../store/types.js";
import type { PairwiseOutcome, SolveResult, SolverInput, SolverMethod, SolverSettings } from "./types.js";

/**
 * Phantom comparisons each fitted candidate plays against a shared virtual
 * reference, scored as half a win for each side. The reference is fitted like
 * any other node, so the likelihood stays scale invariant while unanimous
 * records (all wins or all losses) still have a finite maximum.
 */
export const PHANTOM_GAMES = 1;

const FIXED_POINT_MARGIN = 0.25;

export interface GraphEdge {
  index: number;
  games: number;
}

export interface ComparisonGraph {
  /** Candidates with at least one comparison, sorted. The reference node sits at `ids.length`. */
  ids: string[];
  size: number;
  wins: Float64Array;
  neighbors: GraphEdge[][];
}

export interface IterationRun {
  values: Float64Array;
  iterations: number;
  converged: boolean;
  maxDelta: number;
}

export function buildComparisonGraph(comparisons: readonly PairwiseOutcome[]): ComparisonGraph | null {
  if (comparisons.length === 0) {
    return null;
  }

  const active = new Set<string>();
  for (const comparison of comparisons) {
    if (comparison.candidateA === comparison.candidateB) {
      throw new InvalidComparisonError(
        `A candidate cannot be compared with itself ('${comparison.candidateA}').`,
        comparison.candidateA,
        comparison.candidateB,
        comparison.winner
      );
    }
    active.add(comparison.candidateA);
    active.add(comparison.candidateB);
  }

  const ids = [...active].sort();
  const indexOf = new Map(ids.map((id, index) => [id, index] as const));
  const reference = ids.length;
  const size = ids.length + 1;
  const wins = new Float64Array(size);
  const pairGames = new Map<number, Map<number, number>>();

  for (const comparison of comparisons) {
    const i = lookup(indexOf, comparison.candidateA);
    const j = lookup(indexOf, comparison.candidateB);

    if (comparison.winner === "a") {
      wins[i] += 1;
    } else if (comparison.winner === "b") {
      wins[j] += 1;
    } else {
      wins[i] += 0.5;
      wins[j] += 0.5;
    }

    const low = Math.min(i, j);
    const high = Math.max(i, j);
    const row = pairGames.get(low) ?? new Map<number, number>();
    row.set(high, (row.get(high) ?? 0) + 1);
    pairGames.set(low, row);
  }

  const neighbors: GraphEdge[][] = Array.from({ length: size }, () => []);
  for (const [i, row] of pairGames) {
    for (const [j, games] of row) {
      neighbors[i].push({ index: j, games });
      neighbors[j].push({ index: i, games });
    }
  }

  for (let i = 0; i < reference; i += 1) {
    wins[i] += 0.5 * PHANTOM_GAMES;
    wins[reference] += 0.5 * PHANTOM_GAMES;
    neighbors[i].push({ index: reference, games: PHANTOM_GAMES });
    neighbors[reference].push({ index: i, games: PHANTOM_GAMES });
  }

  return { ids, size, wins, neighbors };
}

export function uniformStart(graph: ComparisonGraph): Float64Array {
  return new Float64Array(graph.size).fill(1);
}

// Rescales so the geometric mean over fitted candidates (reference excluded) is 1.
export function normalizeGeometricMean(values: Float64Array, candidateCount: number): void {
  if (candidateCount === 0) {
    return;
  }

  let logSum = 0;
  for (let i = 0; i < candidateCount; i += 1) {
    logSum += Math.log(values[i]);
  }

  const scale = Math.exp(logSum / candidateCount);
  for (let i = 0; i < values.length; i += 1) {
    values[i] /= scale;
  }
}

export function mmSweep(graph: ComparisonGraph, current: Float64Array): Float64Array {
  const next = new Float64Array(graph.size);

  for (let i = 0; i < graph.size; i += 1) {
    let denominator = 0;
    for (const edge of graph.neighbors[i]) {
      denominator += edge.games / (current[i] + current[edge.index]);
    }
    next[i] = graph.wins[i] / denominator;
  }

  return next;
}

export function iterateMm(graph: ComparisonGraph, start: Float64Array, settings: SolverSettings): IterationRun {
  const candidateCount = graph.ids.length;
  let current: Float64Array = Float64Array.from(start);
  normalizeGeometricMean(current, candidateCount);

  let iterations = 0;
  let maxDelta = Number.POSITIVE_INFINITY;
  let previousDelta: number | null = null;
  let converged = false;

  while (iterations < settings.maxIterations) {
    const next = mmSweep(graph, current);
    normalizeGeometricMean(next, candidateCount);
    iterations += 1;

    maxDelta = 0;
    for (let i = 0; i < graph.size; i += 1) {
      maxDelta = Math.max(maxDelta, Math.abs(next[i] - current[i]));
    }

    current = next;
    if (maxDelta === 0 || (maxDelta < settings.tolerance && nearFixedPoint(maxDelta, previousDelta, settings))) {
      converged = true;
      break;
    }
    previousDelta = maxDelta;
  }

  return { values: current, iterations, converged, maxDelta };
}

/**
 * A small step alone does not mean the scores are close to the fixed point:
 * MM contracts slowly on sparse graphs. With an observed contraction rate r
 * the remaining distance is about delta * r / (1 - r), which must fit in a
 * quarter of the tolerance so two runs from different starts agree within it.
 */
export function nearFixedPoint(delta: number, previousDelta: number | null, settings: SolverSettings): boolean {
  if (previousDelta === null || previousDelta === 0) {
    return false;
  }

  const rate = delta / previousDelta;
  if (rate >= 1) {
    return false;
  }

  return (delta * rate) / (1 - rate) < FIXED_POINT_MARGIN * settings.tolerance;
}

export function logLikelihood(graph: ComparisonGraph, values: Float64Array): number {
  let total = 0;
  for (let i = 0; i < graph.size; i += 1) {
    total += graph.wins[i] * Math.log(values[i]);
    for (const edge of graph.neighbors[i]) {
      if (edge.index > i) {
        total -= edge.games * Math.log(values[i] + values[edge.index]);
      }
    }
  }
  return total;
}

export function unfittedResult(input: SolverInput, method: SolverMethod): SolveResult {
  const scores = new Map<string, number>();
  for (const candidateId of input.candidateIds) {
    scores.set(candidateId, DEFAULT_SCORE);
  }

  return { scores, iterations: 0, converged: true, maxDelta: 0, method, logLikelihood: 0 };
}

export function buildSolveResult(
  input: SolverInput,
  graph: ComparisonGraph,
  run: IterationRun,
  method: SolverMethod
): SolveResult {
  const scores = new Map<string, number>();
  const fitted = new Map(graph.ids.map((id, index) => [id, run.values[index]] as const));

  for (const candidateId of input.candidateIds) {
    scores.set(candidateId, fitted.get(candidateId) ?? DEFAULT_SCORE);
  }
  for (const [candidateId, score] of fitted) {
    if (!scores.has(candidateId)) {
      scores.set(candidateId, score);
    }
  }

  return {
    scores,
    iterations: run.iterations,
    converged: run.converged,
    maxDelta: run.maxDelta,
    method,
    logLikelihood: logLikelihood(graph, run.values)
  };
}

function lookup(indexOf: Map<string, number>, candidateId: string): number {
  const index = indexOf.get(candidateId);
  if (index === undefined) {
    throw new Error(`Comparison graph is missing candidate '${candidateId}'.`);
  }
  return index;
}
