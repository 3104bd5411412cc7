export const DEFAULT_SCORE = 1.0;

export type Winner = "a" | "b" | "tie";

export interface CandidateRecord {
  candidateId: string;
  score: number;
  wins: number;
  losses: number;
  ties: number;
  games: number;
  createdAt: string;
  updatedAt: string;
}

export interface ComparisonRecord {
  id: number;
  candidateA: string;
  candidateB: string;
  winner: Winner;
  reasoning: string;
  createdAt: string;
}

export interface StoreSnapshot {
  candidates: CandidateRecord[];
  comparisons: ComparisonRecord[];
}

export interface RebuildCountsResult {
  updatedCandidates: number;
}

export interface ComparisonStoreOptions {
  busyTimeoutMs?: number;
}
