import { UpstreamError, errorMessage } from "./errors.js";
import { ResultOf, TaskOf, WorkerKind, WorkerPayloads } from "./types.js";
import { Logger, createLogger } from "../logger.js";

export interface AnalysisWorkerOptions {
  /** Upper bound on one collaborator call before the fallback is used. */
  timeoutMs?: number;
  logger?: Logger;
}

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new UpstreamError("timeout", `${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * One analytic dimension over a batch. `handle` always resolves with exactly
 * one result for the task: collaborator failures (rejections, timeouts, empty
 * answers) become the kind's fallback payload with `isValid: false`.
 *
 * Anything that escapes `handle` is a crash of the worker itself and is left
 * to the supervisor.
 */
export abstract class AnalysisWorker<K extends WorkerKind> {
  abstract readonly kind: K;

  protected readonly timeoutMs: number;
  protected readonly log: Logger;
  private disposed = false;

  constructor(options?: AnalysisWorkerOptions) {
    this.timeoutMs = options?.timeoutMs ?? 10_000;
    this.log = options?.logger ?? createLogger("worker");
  }

  async handle(task: TaskOf<K>): Promise<ResultOf<K>> {
    if (this.disposed) {
      throw new Error(`${this.kind} worker received a task after dispose`);
    }

    const skipReason = this.precheck(task);
    if (skipReason !== null) {
      this.log.warn(`${this.kind}: ${skipReason}, replying with fallback`);
      return { kind: this.kind, data: this.fallback(task) };
    }

    try {
      const data = await withTimeout(this.analyze(task), this.timeoutMs, `${this.kind} analysis`);
      return { kind: this.kind, data };
    } catch (err) {
      this.log.error(`${this.kind} analysis failed: ${errorMessage(err)}`);
      return { kind: this.kind, data: this.fallback(task) };
    }
  }

  dispose(): void {
    this.disposed = true;
  }

  /** Returns a reason to skip the collaborator entirely, or null to proceed. */
  protected precheck(_task: TaskOf<K>): string | null {
    return null;
  }

  protected abstract analyze(task: TaskOf<K>): Promise<WorkerPayloads[K]>;
  protected abstract fallback(task: TaskOf<K>): WorkerPayloads[K];
}

/** Shared precheck for the kinds that analyze items. */
export function emptyItemsReason(task: { items: readonly unknown[] }): string | null {
  return task.items.length === 0 ? "received an empty item list" : null;
}
