import { InvalidComparisonError } from "../ranking/errors.js";
import { planSelectionCounts, type SelectionCounts, type SelectionPhase } from "../selector/selector.js";
import { parseSolverPreference } from "../solver/create-solver.js";
import type { SolverPreference } from "../solver/types.js";
import type { Winner } from "../store/types.js";

export type SelectionOptions = {
  comparisons?: number;
  random?: number;
  quartile?: number;
  neighbors?: number;
};

const TIE_ALIASES = new Set(["tie", "neither", "none", "draw"]);

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid integer value: ${value}`);
  }
  return parsed;
}

export function parseCount(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 0) {
    throw new Error(`Expected a non-negative count, got ${value}.`);
  }
  return parsed;
}

export function parseSolverOption(value: string): SolverPreference {
  const preference = parseSolverPreference(value);
  if (!preference) {
    throw new Error(`Invalid solver value: ${value}. Expected auto, mm or optimizer.`);
  }
  return preference;
}

export function parsePhaseOption(value: string): SelectionPhase | "auto" {
  const normalized = value.trim().toLowerCase();
  if (normalized === "auto" || normalized === "exploration" || normalized === "refinement") {
    return normalized;
  }
  throw new Error(`Invalid phase value: ${value}. Expected auto, exploration or refinement.`);
}

// Accepts a/b/tie (and tie aliases) or the winning candidate's own id.
export function parseWinnerArgument(raw: string, candidateA: string, candidateB: string): Winner {
  if (raw === candidateA && raw !== candidateB) {
    return "a";
  }

  if (raw === candidateB && raw !== candidateA) {
    return "b";
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === "a" || normalized === "b") {
    return normalized;
  }

  if (TIE_ALIASES.has(normalized)) {
    return "tie";
  }

  throw new InvalidComparisonError(
    `Invalid winner '${raw}'. Expected a, b, tie, '${candidateA}' or '${candidateB}'.`,
    candidateA,
    candidateB,
    raw
  );
}

export function resolveRequestedCounts(numComparisons: number, options: SelectionOptions): SelectionCounts {
  const planned = planSelectionCounts(options.comparisons ?? numComparisons);

  return {
    random: options.random ?? planned.random,
    quartile: options.quartile ?? planned.quartile,
    neighbors: options.neighbors ?? planned.neighbors
  };
}
