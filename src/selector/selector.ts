import { DEFAULT_SCORE } from "../store/types.js";
import { sampleWithoutReplacement, type RandomSource } from "./random.js";

export type SelectionPhase = "exploration" | "refinement";

export interface SelectionCounts {
  random: number;
  quartile: number;
  neighbors: number;
}

export interface RankedCandidate {
  candidateId: string;
  score: number;
}

export interface SelectionContext {
  candidateId: string;
  population: readonly RankedCandidate[];
  /** Opponents to leave out, typically the ones already compared against. */
  exclude?: ReadonlySet<string>;
}

export const DEFAULT_SELECTION_COUNTS: SelectionCounts = {
  random: 3,
  quartile: 4,
  neighbors: 3
};

const RANDOM_FRACTION = 0.3;
const QUARTILE_FRACTION = 0.4;
const MAX_QUARTILE_REPRESENTATIVES = 4;

export class ComparisonSelector {
  constructor(private readonly random: RandomSource = Math.random) {}

  select(phase: SelectionPhase, context: SelectionContext, counts: SelectionCounts): string[] {
    return phase === "exploration" ? this.explore(context, counts) : this.refine(context, counts.neighbors);
  }

  explore(context: SelectionContext, counts: Pick<SelectionCounts, "random" | "quartile">): string[] {
    const pool = eligibleOpponents(context);
    const quota = toCount(counts.random) + toCount(counts.quartile);

    if (pool.length <= quota) {
      return sortByRank(pool).map((candidate) => candidate.candidateId);
    }

    const byId = [...pool].sort((left, right) => compareIds(left.candidateId, right.candidateId));
    const randomPicks = sampleWithoutReplacement(byId, toCount(counts.random), this.random).map(
      (candidate) => candidate.candidateId
    );

    const taken = new Set(randomPicks);
    const ascending = sortByRank(pool).reverse();
    const representatives = pickQuartileRepresentatives(ascending, toCount(counts.quartile), taken);

    return [...randomPicks, ...representatives];
  }

  refine(context: SelectionContext, count: number): string[] {
    const target = context.population.find((candidate) => candidate.candidateId === context.candidateId);
    const targetScore = target?.score ?? DEFAULT_SCORE;

    return eligibleOpponents(context)
      .map((candidate) => ({ candidate, distance: Math.abs(candidate.score - targetScore) }))
      .sort(
        (left, right) =>
          left.distance - right.distance || compareIds(left.candidate.candidateId, right.candidate.candidateId)
      )
      .slice(0, toCount(count))
      .map((entry) => entry.candidate.candidateId);
  }
}

export function planSelectionCounts(totalComparisons: number): SelectionCounts {
  const total = toCount(totalComparisons);
  const random = Math.max(1, Math.floor(RANDOM_FRACTION * total));
  const quartile = Math.min(MAX_QUARTILE_REPRESENTATIVES, Math.max(1, Math.floor(QUARTILE_FRACTION * total)));
  const neighbors = Math.max(1, total - random - quartile);

  return { random, quartile, neighbors };
}

export function resolveSelectionCounts(
  base: SelectionCounts,
  overrides: Partial<SelectionCounts> = {}
): SelectionCounts {
  return {
    random: toCount(overrides.random ?? base.random),
    quartile: toCount(overrides.quartile ?? base.quartile),
    neighbors: toCount(overrides.neighbors ?? base.neighbors)
  };
}

/**
 * Nearest-rank percentiles t/k for t = 1..k over `ascending` (lowest score
 * first). A slot already taken moves to the closest free rank, preferring the
 * stronger side.
 */
export function pickQuartileRepresentatives(
  ascending: readonly RankedCandidate[],
  count: number,
  taken: Set<string>
): string[] {
  const picks: string[] = [];
  const n = ascending.length;

  for (let t = 1; t <= count; t += 1) {
    const target = Math.min(n - 1, Math.max(0, Math.ceil((t / count) * n) - 1));
    const index = nearestFreeIndex(ascending, target, taken);
    if (index === null) {
      break;
    }

    const candidateId = ascending[index].candidateId;
    taken.add(candidateId);
    picks.push(candidateId);
  }

  return picks;
}

export function sortByRank<T extends RankedCandidate>(candidates: readonly T[]): T[] {
  return [...candidates].sort(
    (left, right) => right.score - left.score || compareIds(left.candidateId, right.candidateId)
  );
}

function nearestFreeIndex(ascending: readonly RankedCandidate[], target: number, taken: Set<string>): number | null {
  for (let offset = 0; offset < ascending.length; offset += 1) {
    const above = target + offset;
    if (above < ascending.length && !taken.has(ascending[above].candidateId)) {
      return above;
    }

    const below = target - offset;
    if (below >= 0 && !taken.has(ascending[below].candidateId)) {
      return below;
    }
  }
  return null;
}

function eligibleOpponents(context: SelectionContext): RankedCandidate[] {
  const seen = new Set<string>();
  const eligible: RankedCandidate[] = [];

  for (const candidate of context.population) {
    if (
      candidate.candidateId === context.candidateId ||
      context.exclude?.has(candidate.candidateId) ||
      seen.has(candidate.candidateId)
    ) {
      continue;
    }
    seen.add(candidate.candidateId);
    eligible.push(candidate);
  }

  return eligible;
}

function compareIds(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

function toCount(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}
