export const STORE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS candidates (
  id TEXT PRIMARY KEY,
  score REAL NOT NULL DEFAULT 1.0 CHECK (score > 0),
  wins INTEGER NOT NULL DEFAULT 0,
  losses INTEGER NOT NULL DEFAULT 0,
  ties INTEGER NOT NULL DEFAULT 0,
  games INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS comparisons (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  candidate_a TEXT NOT NULL,
  candidate_b TEXT NOT NULL,
  winner TEXT NOT NULL CHECK (winner IN ('a', 'b', 'tie')),
  reasoning TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL,
  CHECK (candidate_a <> candidate_b),
  FOREIGN KEY (candidate_a) REFERENCES candidates(id),
  FOREIGN KEY (candidate_b) REFERENCES candidates(id)
);

CREATE INDEX IF NOT EXISTS idx_candidates_score ON candidates(score DESC);
CREATE INDEX IF NOT EXISTS idx_comparisons_candidate_a ON comparisons(candidate_a);
CREATE INDEX IF NOT EXISTS idx_comparisons_candidate_b ON comparisons(candidate_b);
CREATE INDEX IF NOT EXISTS idx_comparisons_pair ON comparisons(candidate_a, candidate_b);
`;
