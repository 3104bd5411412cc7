import test from "node:test";
import assert from "node:assert/strict";
import { InvalidComparisonError } from "../ranking/errors.js";
import type { Winner } from "../store/types.js";
import { buildComparisonGraph } from "./graph.js";
import { MmSolver } from "./mm-solver.js";
import { loadOptimizer } from "./optimizer-loader.js";
import { OptimizerSolver, negativeLogLikelihood } from "./optimizer-solver.js";
import { DEFAULT_SOLVER_SETTINGS } from "./types.js";
import type { PairwiseOutcome, Solver, SolverSettings } from "./types.js";

const optimizer = loadOptimizer();
assert.ok(optimizer, "fmin must be installed so both strategies are exercised");
const TIGHT: SolverSettings = { tolerance: 1e-12, maxIterations: 100_000 };

const strategies: Array<[string, (settings?: SolverSettings) => Solver]> = [
  ["mm", (settings) => new MmSolver(settings)],
  ["optimizer", (settings) => new OptimizerSolver(optimizer, settings)]
];

function games(candidateA: string, candidateB: string, winner: Winner, times: number = 1): PairwiseOutcome[] {
  return Array.from({ length: times }, () => ({ candidateA, candidateB, winner }));
}

function score(scores: ReadonlyMap<string, number>, candidateId: string): number {
  const value = scores.get(candidateId);
  assert.notEqual(value, undefined, `missing score for ${candidateId}`);
  return value ?? Number.NaN;
}

function assertClose(actual: number, expected: number, epsilon: number = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= epsilon, `expected ${actual} to be within ${epsilon} of ${expected}`);
}

for (const [name, create] of strategies) {
  test(`${name}: a balanced cycle leaves every candidate at 1`, () => {
    const result = create().solve({
      candidateIds: ["a", "b", "c"],
      comparisons: [...games("a", "b", "a", 3), ...games("b", "c", "a", 3), ...games("c", "a", "a", 3)]
    });

    assert.equal(result.converged, true);
    for (const candidateId of ["a", "b", "c"]) {
      assertClose(score(result.scores, candidateId), 1);
    }
  });

  test(`${name}: a unanimous record stays finite`, () => {
    const result = create().solve({ candidateIds: ["a", "b"], comparisons: games("a", "b", "a", 10) });

    const a = score(result.scores, "a");
    const b = score(result.scores, "b");
    assert.equal(result.converged, true);
    assert.ok(Number.isFinite(a) && Number.isFinite(b));
    assert.ok(a > 1 && b < 1 && b > 0);
    assertClose(Math.log(a) + Math.log(b), 0);
  });

  test(`${name}: ties split evenly`, () => {
    const result = create().solve({ candidateIds: ["a", "b"], comparisons: games("a", "b", "tie", 4) });

    assertClose(score(result.scores, "a"), 1);
    assertClose(score(result.scores, "b"), 1);
  });

  test(`${name}: scores follow a transitive chain`, () => {
    const result = create().solve({
      candidateIds: ["a", "b", "c"],
      comparisons: [...games("a", "b", "a", 3), ...games("b", "c", "a", 3)]
    });

    const a = score(result.scores, "a");
    const b = score(result.scores, "b");
    const c = score(result.scores, "c");
    assert.ok(a > b && b > c, `expected ${a} > ${b} > ${c}`);
  });

  test(`${name}: fitted scores have geometric mean 1 and idle candidates keep the default`, () => {
    const result = create().solve({
      candidateIds: ["a", "b", "c", "d", "idle"],
      comparisons: [
        ...games("a", "b", "a", 2),
        ...games("b", "c", "b"),
        ...games("c", "d", "tie"),
        ...games("d", "a", "a"),
        ...games("a", "c", "b")
      ]
    });

    const logSum = ["a", "b", "c", "d"].reduce((sum, id) => sum + Math.log(score(result.scores, id)), 0);
    assertClose(logSum, 0);
    assert.equal(score(result.scores, "idle"), 1);
    assert.ok(result.logLikelihood < 0);
  });

  test(`${name}: identical input gives identical output`, () => {
    const input = {
      candidateIds: ["a", "b", "c"],
      comparisons: [...games("a", "b", "a", 2), ...games("c", "b", "b"), ...games("a", "c", "tie")]
    };

    const first = create().solve(input);
    const second = create().solve(input);
    assert.deepEqual([...first.scores], [...second.scores]);
    assert.equal(first.iterations, second.iterations);
  });

  test(`${name}: comparison order does not change the fit`, () => {
    const comparisons = [...games("a", "b", "a", 3), ...games("b", "c", "b"), ...games("c", "a", "a", 2)];
    const forward = create(TIGHT).solve({ candidateIds: ["a", "b", "c"], comparisons });
    const reversed = create(TIGHT).solve({ candidateIds: ["a", "b", "c"], comparisons: [...comparisons].reverse() });

    for (const candidateId of ["a", "b", "c"]) {
      assertClose(score(forward.scores, candidateId), score(reversed.scores, candidateId), 1e-8);
    }
  });

  test(`${name}: a better record against the same opponents never scores lower`, () => {
    const result = create().solve({
      candidateIds: ["x", "y", "o1", "o2", "o3"],
      comparisons: [
        ...games("x", "o1", "a", 2),
        ...games("x", "o1", "b"),
        ...games("x", "o2", "a", 2),
        ...games("o2", "x", "a"),
        ...games("o3", "x", "b", 3),
        ...games("y", "o1", "a"),
        ...games("y", "o1", "b", 2),
        ...games("o2", "y", "a", 2),
        ...games("y", "o2", "a"),
        ...games("y", "o3", "tie", 3)
      ]
    });

    assert.ok(score(result.scores, "x") >= score(result.scores, "y"));
  });

  test(`${name}: no comparisons leaves every candidate at the default`, () => {
    const result = create().solve({ candidateIds: ["a", "b"], comparisons: [] });

    assert.deepEqual([...result.scores], [
      ["a", 1],
      ["b", 1]
    ]);
    assert.equal(result.iterations, 0);
    assert.equal(result.converged, true);
  });

  test(`${name}: self comparisons are rejected`, () => {
    assert.throws(
      () => create().solve({ candidateIds: ["a"], comparisons: games("a", "a", "a") }),
      InvalidComparisonError
    );
  });
}

test("mm: hitting the iteration cap reports non-convergence", () => {
  const result = new MmSolver({ tolerance: 1e-6, maxIterations: 1 }).solve({
    candidateIds: ["a", "b"],
    comparisons: games("a", "b", "a", 10)
  });

  assert.equal(result.converged, false);
  assert.equal(result.iterations, 1);
  assert.ok(result.maxDelta > 1e-6);
  assert.ok(score(result.scores, "a") > score(result.scores, "b"));
});

test("mm: an already balanced start converges on the first sweep", () => {
  const result = new MmSolver().solve({
    candidateIds: ["a", "b", "c"],
    comparisons: [...games("a", "b", "a"), ...games("b", "c", "a"), ...games("c", "a", "a")]
  });

  assert.equal(result.iterations, 1);
  assert.equal(result.maxDelta, 0);
});

test("optimizer and mm agree within the default tolerance", () => {
  const input = {
    candidateIds: ["a", "b", "c", "d", "e", "idle"],
    comparisons: [
      ...games("a", "b", "a", 10),
      ...games("c", "d", "a", 2),
      ...games("d", "e", "b", 2),
      ...games("c", "e", "a", 2),
      ...games("d", "c", "tie", 2),
      ...games("e", "c", "b", 2)
    ]
  };
  const mm = new MmSolver().solve(input);
  const optimized = new OptimizerSolver(optimizer).solve(input);

  assert.equal(mm.converged, true);
  assert.equal(optimized.converged, true);
  for (const candidateId of input.candidateIds) {
    const gap = Math.abs(score(optimized.scores, candidateId) - score(mm.scores, candidateId));
    assert.ok(gap <= DEFAULT_SOLVER_SETTINGS.tolerance, `${candidateId} differs by ${gap}`);
  }
});

test("mm stops within the tolerance of the fixed point, not just on a small step", () => {
  const input = {
    candidateIds: ["a", "b", "c", "d", "e"],
    comparisons: [
      ...games("a", "b", "a", 10),
      ...games("c", "d", "a", 2),
      ...games("d", "e", "b", 2),
      ...games("c", "e", "a", 2),
      ...games("d", "c", "tie", 2),
      ...games("e", "c", "b", 2)
    ]
  };
  const loose = new MmSolver().solve(input);
  const exact = new MmSolver(TIGHT).solve(input);

  for (const candidateId of input.candidateIds) {
    const gap = Math.abs(score(loose.scores, candidateId) - score(exact.scores, candidateId));
    assert.ok(gap <= DEFAULT_SOLVER_SETTINGS.tolerance / 2, `${candidateId} is ${gap} from the fixed point`);
  }
});

test("negativeLogLikelihood gradient matches finite differences", () => {
  const graph = buildComparisonGraph([...games("a", "b", "a", 3), ...games("b", "c", "tie"), ...games("c", "a", "a")]);
  assert.ok(graph);

  const x = [0.3, -0.2, 0.1, 0];
  const gradient = new Array<number>(graph.size).fill(0);
  negativeLogLikelihood(graph, x, gradient);

  const step = 1e-6;
  for (let i = 0; i < graph.size; i += 1) {
    const plus = [...x];
    const minus = [...x];
    plus[i] += step;
    minus[i] -= step;
    const scratch = new Array<number>(graph.size).fill(0);
    const numeric =
      (negativeLogLikelihood(graph, plus, scratch) - negativeLogLikelihood(graph, minus, scratch)) / (2 * step);
    assertClose(gradient[i], numeric, 1e-5);
  }
});
