// ── Upstream failures ─────────────────────────────────────────────

export type UpstreamErrorKind = "timeout" | "connectivity" | "rate_limit" | "parse" | "http";

export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly status?: number;

  constructor(kind: UpstreamErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "UpstreamError";
    this.kind = kind;
    this.status = options?.status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Fetch failure classification (session level) ─────────────────

export type FetchFailure = "timeout" | "connectivity" | "rate_limit" | "other";

export function classifyFetchFailure(err: unknown): FetchFailure {
  if (err instanceof UpstreamError) {
    switch (err.kind) {
      case "timeout":
      case "connectivity":
      case "rate_limit":
        return err.kind;
      default:
        return "other";
    }
  }
  return "other";
}

// ── Worker crash classification (supervisor level) ────────────────

export type CrashDirective = "restart" | "escalate";

/**
 * Transient upstream trouble and malformed responses are worth a fresh worker;
 * anything else is not ours to absorb and goes to whoever owns the session.
 */
export function classifyWorkerCrash(err: unknown): CrashDirective {
  if (err instanceof UpstreamError) {
    return err.kind === "timeout" || err.kind === "connectivity" || err.kind === "parse"
      ? "restart"
      : "escalate";
  }
  if (err instanceof SyntaxError) return "restart";
  return "escalate";
}

/** Raised past the session boundary when a worker crash cannot be handled locally. */
export class WorkerEscalation extends Error {
  readonly workerKind: string;

  constructor(workerKind: string, cause: unknown) {
    super(`Worker ${workerKind} failed: ${errorMessage(cause)}`, { cause });
    this.name = "WorkerEscalation";
    this.workerKind = workerKind;
  }
}
