export class InvalidComparisonError extends Error {
  constructor(
    message: string,
    public readonly candidateA: string,
    public readonly candidateB: string,
    public readonly winner: string
  ) {
    super(message);
    this.name = "InvalidComparisonError";
  }
}

export class UnknownCandidateError extends Error {
  constructor(public readonly candidateId: string) {
    super(`Candidate '${candidateId}' is not registered.`);
    this.name = "UnknownCandidateError";
  }
}

// Returned alongside usable scores, never thrown.
export class ConvergenceWarning extends Error {
  constructor(
    public readonly iterations: number,
    public readonly maxDelta: number,
    public readonly tolerance: number
  ) {
    super(
      `Solver stopped after ${iterations} iteration(s) with max change ${maxDelta.toExponential(3)} (tolerance ${tolerance.toExponential(3)}).`
    );
    this.name = "ConvergenceWarning";
  }
}

export class StoreUnavailableError extends Error {
  readonly retryable = true;

  constructor(
    message: string,
    public readonly code: string | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

const UNAVAILABLE_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_CANTOPEN", "SQLITE_READONLY"]);

export function isStoreUnavailableCode(code: string): boolean {
  for (const prefix of UNAVAILABLE_CODES) {
    if (code === prefix || code.startsWith(`${prefix}_`)) {
      return true;
    }
  }
  return false;
}

export function readErrorCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}
