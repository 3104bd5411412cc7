import { config as loadDotEnv } from "dotenv";
import { parseSolverPreference } from "../solver/create-solver.js";
import type { SolverPreference } from "../solver/types.js";

const MIN_TOLERANCE = 1e-12;
const MAX_TOLERANCE = 1e-2;

export interface RankingConfig {
  dbPath: string | null;
  tolerance: number;
  maxIterations: number;
  solver: SolverPreference;
  numComparisons: number;
  seed: number | null;
  busyTimeoutMs: number;
}

export function loadRankingConfig(env: NodeJS.ProcessEnv = process.env): RankingConfig {
  loadDotEnv();

  return {
    dbPath: env.PAIRRANK_DB_PATH?.trim() || null,
    tolerance: parseBoundedFloat(env.PAIRRANK_TOLERANCE, 1e-6, MIN_TOLERANCE, MAX_TOLERANCE),
    maxIterations: parseBoundedInt(env.PAIRRANK_MAX_ITERATIONS, 1000, 1, 100_000),
    solver: parseSolver(env.PAIRRANK_SOLVER, "auto"),
    numComparisons: parseBoundedInt(env.PAIRRANK_NUM_COMPARISONS, 10, 1, 100),
    seed: parseOptionalInt(env.PAIRRANK_SEED),
    busyTimeoutMs: parseBoundedInt(env.PAIRRANK_BUSY_TIMEOUT_MS, 5000, 0, 60_000)
  };
}

function parseSolver(raw: string | undefined, fallback: SolverPreference): SolverPreference {
  if (!raw) {
    return fallback;
  }

  return parseSolverPreference(raw) ?? fallback;
}

function parseOptionalInt(raw: string | undefined): number | null {
  if (!raw || raw.trim().length === 0) {
    return null;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

function parseBoundedInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }

  return clamp(parsed, min, max);
}

function parseBoundedFloat(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return clamp(parsed, min, max);
}

function clamp(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }

  if (value > max) {
    return max;
  }

  return value;
}
