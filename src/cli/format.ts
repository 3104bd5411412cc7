import type { CandidateStats, OpponentPlan, RankingEntry } from "../ranking/types.js";
import type { ComparisonRecord } from "../store/types.js";

type Print = (line: string) => void;

export function formatScore(score: number): string {
  return score.toFixed(4);
}

export function formatWinRate(winRate: number): string {
  return `${(winRate * 100).toFixed(1)}%`;
}

export function printRankingsTable(entries: RankingEntry[], print: Print = console.log): void {
  if (entries.length === 0) {
    print("No candidates ranked yet.");
    return;
  }

  print("RANK\tCANDIDATE\tSCORE\tW-L-T\tGAMES\tWIN_RATE");
  for (const entry of entries) {
    print(
      `${entry.rank}\t${entry.candidateId}\t${formatScore(entry.score)}\t${entry.wins}-${entry.losses}-${entry.ties}\t${entry.games}\t${formatWinRate(entry.winRate)}`
    );
  }
}

export function printCandidateDetails(
  stats: CandidateStats,
  history: ComparisonRecord[],
  print: Print = console.log
): void {
  print(`Candidate: ${stats.candidateId}`);
  print(`Rank: ${stats.rank}`);
  print(`Score: ${formatScore(stats.score)}`);
  print(`Record: ${stats.wins}W-${stats.losses}L-${stats.ties}T over ${stats.games} game(s)`);
  print(`Win Rate: ${formatWinRate(stats.winRate)}`);
  print(`Distinct Opponents: ${stats.opponents}`);
  print(`Created: ${stats.createdAt}`);
  print("");
  print("Comparisons:");

  if (history.length === 0) {
    print("- none");
    return;
  }

  for (const comparison of history) {
    const opponent = comparison.candidateA === stats.candidateId ? comparison.candidateB : comparison.candidateA;
    print(`- #${comparison.id} vs ${opponent}: ${describeResult(comparison, stats.candidateId)} (${comparison.createdAt})`);
    const reasoning = summarizeReasoning(comparison.reasoning);
    if (reasoning) {
      print(`  reasoning: ${reasoning}`);
    }
  }
}

export function printOpponentPlan(plan: OpponentPlan, print: Print = console.log): void {
  if (plan.opponents.length === 0) {
    print(`No opponents available for '${plan.candidateId}' (${plan.phase}).`);
    return;
  }

  print(`Phase: ${plan.phase}`);
  plan.opponents.forEach((opponent, index) => {
    print(`${index + 1}. ${opponent}`);
  });
}

function describeResult(comparison: ComparisonRecord, candidateId: string): string {
  if (comparison.winner === "tie") {
    return "tie";
  }

  const side = comparison.candidateA === candidateId ? "a" : "b";
  return comparison.winner === side ? "won" : "lost";
}

function summarizeReasoning(reasoning: string, maxLength: number = 160): string {
  const singleLine = reasoning.replace(/\s+/g, " ").trim();
  if (singleLine.length <= maxLength) {
    return singleLine;
  }
  return `${singleLine.slice(0, maxLength - 3)}...`;
}
