import path from "node:path";

export interface RuntimePaths {
  dbPath: string;
}

// The store file defaults to .pairrank/rankings.db under cwd; an override resolves against cwd.
export function resolveRuntimePaths(cwd: string = process.cwd(), dbPathOverride?: string | null): RuntimePaths {
  return {
    dbPath: dbPathOverride ? path.resolve(cwd, dbPathOverride) : path.join(cwd, ".pairrank", "rankings.db")
  };
}
