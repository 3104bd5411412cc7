import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { loadRankingConfig } from "../config/env.js";
import { resolveRuntimePaths } from "../config/runtime-paths.js";
import { rebuildFromLog } from "../maintenance/rebuild.js";
import { RankingEngine } from "../ranking/engine.js";
import type { NextOpponentsOptions, RankingEvent } from "../ranking/types.js";
import { planSelectionCounts } from "../selector/selector.js";
import { createSolver } from "../solver/create-solver.js";
import type { SolverPreference } from "../solver/types.js";
import { ComparisonStore } from "../store/comparison-store.js";
import { formatScore, printCandidateDetails, printOpponentPlan, printRankingsTable } from "./format.js";
import {
  parseCount,
  parseInteger,
  parsePhaseOption,
  parseSolverOption,
  parseWinnerArgument,
  resolveRequestedCounts,
  type SelectionOptions
} from "./options.js";

type JsonOption = { json?: boolean };
type GlobalOptions = {
  db?: string;
  solver?: SolverPreference;
  quiet?: boolean;
};
type RecordOptions = JsonOption & { reasoning: string };
type RankingsOptions = JsonOption & { top?: number; minGames?: number };
type OpponentsOptions = JsonOption &
  SelectionOptions & {
    phase: NextOpponentsOptions["phase"];
    seed?: number;
    allowRepeats?: boolean;
  };
type ShowOptions = JsonOption & { limit?: number };
type ExportOptions = { out?: string; scoresOnly?: boolean };

export function buildProgram(): Command {
  const config = loadRankingConfig();

  const program = new Command();
  program
    .name("pairrank")
    .description("Rank evolving candidates from pairwise judgments with a Bradley-Terry model.")
    .option("--db <path>", "Comparison store file (default .pairrank/rankings.db)")
    .option("--solver <name>", "auto, mm or optimizer", parseSolverOption)
    .option("-q, --quiet", "Suppress progress lines")
    .showHelpAfterError();

  const withEngine = <T>(action: (engine: RankingEngine, store: ComparisonStore) => T): T => {
    const globals = program.opts<GlobalOptions>();
    const paths = resolveRuntimePaths(process.cwd(), globals.db ?? config.dbPath);

    const store = new ComparisonStore(paths.dbPath, { busyTimeoutMs: config.busyTimeoutMs });
    try {
      const engine = new RankingEngine({
        store,
        solver: createSolver({
          preference: globals.solver ?? config.solver,
          settings: { tolerance: config.tolerance, maxIterations: config.maxIterations }
        }),
        selection: planSelectionCounts(config.numComparisons),
        seed: config.seed,
        reporter: globals.quiet ? undefined : printProgress
      });
      return action(engine, store);
    } finally {
      store.close();
    }
  };

  program
    .command("register")
    .argument("<candidates...>", "Candidate ids")
    .description("Register candidates at the default score.")
    .action((candidateIds: string[]) => {
      withEngine((engine) => {
        for (const candidateId of candidateIds) {
          const created = engine.register(candidateId);
          console.log(created ? `Registered '${candidateId}'.` : `'${candidateId}' already registered.`);
        }
      });
    });

  program
    .command("record")
    .argument("<candidateA>", "First candidate id")
    .argument("<candidateB>", "Second candidate id")
    .argument("<winner>", "a, b, tie, or the winning candidate id")
    .option("--reasoning <text>", "Judge justification", "")
    .option("--json", "Output JSON")
    .description("Record a judged comparison and rescore every candidate.")
    .action((candidateA: string, candidateB: string, rawWinner: string, options: RecordOptions) => {
      const winner = parseWinnerArgument(rawWinner, candidateA, candidateB);
      withEngine((engine) => {
        const result = engine.submitResult(candidateA, candidateB, winner, options.reasoning);
        if (options.json) {
          console.log(JSON.stringify({ ...result, warning: result.warning?.message ?? null }, null, 2));
          return;
        }

        const scores = engine.exportScores();
        console.log(
          `Recorded #${result.comparison.id}: ${candidateA}=${formatScore(scores[candidateA])} ${candidateB}=${formatScore(scores[candidateB])}`
        );
      });
    });

  program
    .command("rankings")
    .option("--top <count>", "Only the first N candidates", parseCount)
    .option("--min-games <count>", "Only candidates with at least N games", parseCount)
    .option("--json", "Output JSON")
    .description("Print candidates by score.")
    .action((options: RankingsOptions) => {
      withEngine((engine) => {
        const rankings = engine.getRankings({ top: options.top, minGames: options.minGames });
        if (options.json) {
          console.log(JSON.stringify(rankings, null, 2));
          return;
        }

        printRankingsTable(rankings);
      });
    });

  program
    .command("opponents")
    .argument("<candidate>", "Candidate id")
    .option("--phase <phase>", "auto, exploration or refinement", parsePhaseOption, "auto")
    .option("--comparisons <count>", "Comparison budget split across phases", parseCount)
    .option("--random <count>", "Random opponents in exploration", parseCount)
    .option("--quartile <count>", "Rank-quartile representatives in exploration", parseCount)
    .option("--neighbors <count>", "Nearest-score opponents in refinement", parseCount)
    .option("--seed <seed>", "Seed for the random draw", parseInteger)
    .option("--allow-repeats", "Include opponents already compared against")
    .option("--json", "Output JSON")
    .description("Choose the next opponents for a candidate.")
    .action((candidateId: string, options: OpponentsOptions) => {
      withEngine((engine) => {
        const plan = engine.planOpponents(candidateId, resolveRequestedCounts(config.numComparisons, options), {
          phase: options.phase,
          seed: options.seed,
          allowRepeats: options.allowRepeats
        });
        if (options.json) {
          console.log(JSON.stringify(plan, null, 2));
          return;
        }

        printOpponentPlan(plan);
      });
    });

  program
    .command("show")
    .argument("<candidate>", "Candidate id")
    .option("--limit <count>", "Most recent comparisons to list", parseCount)
    .option("--json", "Output JSON")
    .description("Show a candidate's score, record and comparison history.")
    .action((candidateId: string, options: ShowOptions) => {
      withEngine((engine) => {
        const stats = engine.getCandidateStats(candidateId);
        const history = engine.getComparisonHistory(candidateId).slice(0, options.limit);
        if (options.json) {
          console.log(JSON.stringify({ ...stats, history }, null, 2));
          return;
        }

        printCandidateDetails(stats, history);
      });
    });

  program
    .command("export")
    .option("--out <file>", "Write to a file instead of stdout")
    .option("--scores-only", "Export only candidate scores, for use as selection weights")
    .description("Export rankings and the comparison log as JSON.")
    .action((options: ExportOptions) => {
      withEngine((engine) => {
        const payload = options.scoresOnly ? engine.exportScores() : engine.exportData();
        const json = JSON.stringify(payload, null, 2);
        if (!options.out) {
          console.log(json);
          return;
        }

        const outPath = path.resolve(process.cwd(), options.out);
        mkdirSync(path.dirname(outPath), { recursive: true });
        writeFileSync(outPath, `${json}\n`, "utf8");
        console.log(`Exported to ${outPath}`);
      });
    });

  program
    .command("rescore")
    .description("Re-derive counts and scores from the comparison log.")
    .action(() => {
      withEngine((engine, store) => {
        const summary = rebuildFromLog({ store, engine });
        console.log(
          `Repaired ${summary.repairedCandidates} candidate record(s) across ${summary.totalComparisons} comparison(s).`
        );
        console.log(
          `Solver ${summary.recompute.method}: ${summary.recompute.iterations} iteration(s), converged=${summary.recompute.converged}.`
        );
      });
    });

  return program;
}

function printProgress(event: RankingEvent): void {
  const prefix = event.candidateId ? `[${event.candidateId}]` : "[engine]";
  const timestamp = new Date().toLocaleTimeString();
  if (event.phase === "convergence-warning") {
    console.error(`[${timestamp}][warn] ${event.message}`);
    return;
  }
  console.error(`[${timestamp}]${prefix} ${event.message}`);
}
