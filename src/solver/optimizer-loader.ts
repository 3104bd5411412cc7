import { createRequire } from "node:module";
import { readErrorCode } from "../ranking/errors.js";

export const OPTIMIZER_PACKAGE = "fmin";

/** Fills `gradient` in place and returns the objective value at `x`. */
export type ObjectiveWithGradient = (x: number[], gradient: number[]) => number;

export interface ConjugateGradientResult {
  x: number[];
  fx: number;
}

export interface ConjugateGradientParams {
  maxIterations?: number;
}

export interface OptimizerModule {
  conjugateGradient(
    objective: ObjectiveWithGradient,
    initial: number[],
    params?: ConjugateGradientParams
  ): ConjugateGradientResult;
}

const requireOptional = createRequire(import.meta.url);

export function loadOptimizer(moduleName: string = OPTIMIZER_PACKAGE): OptimizerModule | null {
  let loaded: unknown;
  try {
    loaded = requireOptional(moduleName);
  } catch (error: unknown) {
    if (readErrorCode(error) === "MODULE_NOT_FOUND") {
      return null;
    }
    throw error;
  }

  return isOptimizerModule(loaded) ? loaded : null;
}

export function isOptimizerModule(value: unknown): value is OptimizerModule {
  return (
    typeof value === "object" &&
    value !== null &&
    "conjugateGradient" in value &&
    typeof value.conjugateGradient === "function"
  );
}
