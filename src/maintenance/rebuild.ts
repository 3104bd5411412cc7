import type { RankingEngine } from "../ranking/engine.js";
import type { RecomputeSummary } from "../ranking/types.js";
import type { ComparisonStore } from "../store/comparison-store.js";

export interface RebuildSummary {
  repairedCandidates: number;
  totalComparisons: number;
  recompute: RecomputeSummary;
}

interface RebuildFromLogInput {
  store: ComparisonStore;
  engine: RankingEngine;
}

// Counts and scores are derived state; the comparison log is the record.
export function rebuildFromLog(input: RebuildFromLogInput): RebuildSummary {
  const counts = input.store.rebuildCounts();
  const recompute = input.engine.recompute();

  return {
    repairedCandidates: counts.updatedCandidates,
    totalComparisons: input.store.countComparisons(),
    recompute
  };
}
