import { AnalysisWorker } from "./analysis-worker.js";
import { CrashDirective, classifyWorkerCrash, errorMessage } from "./errors.js";
import { ResultOf, TaskOf, WorkerKind, WorkerTask } from "./types.js";
import { WorkerFactory, WorkerRegistry } from "./worker-registry.js";
import { Logger, createLogger } from "../logger.js";

// ── Outcomes ──────────────────────────────────────────────────────

export type CrashHandling = "restarted" | "stopped" | "escalated";

export type KindOutcome<K extends WorkerKind> =
  | { status: "completed"; kind: K; result: ResultOf<K> }
  | { status: "crashed"; kind: K; handling: CrashHandling; error: unknown }
  | { status: "disabled"; kind: K };

export type DispatchOutcome = { [K in WorkerKind]: KindOutcome<K> }[WorkerKind];

// ── Restart bookkeeping per worker ────────────────────────────────

interface Slot<K extends WorkerKind> {
  kind: K;
  factory: WorkerFactory<K>;
  worker: AnalysisWorker<K> | null;
  /** Timestamps of restarts still inside the rolling window. */
  restarts: number[];
  stopped: boolean;
}

type SlotTable = { [K in WorkerKind]: Slot<K> };

export interface WorkerSupervisorOptions {
  maxRestarts?: number;
  restartWindowMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface WorkerHealth {
  kind: WorkerKind;
  running: boolean;
  stopped: boolean;
  recentRestarts: number;
}

/**
 * One-for-one supervision of the five analysis workers of a session. A crash
 * only ever touches the slot of the worker that crashed.
 */
export class WorkerSupervisor {
  private slots: SlotTable;
  private maxRestarts: number;
  private restartWindowMs: number;
  private now: () => number;
  private log: Logger;
  private closed = false;

  constructor(registry: WorkerRegistry, options?: WorkerSupervisorOptions) {
    this.maxRestarts = options?.maxRestarts ?? 3;
    this.restartWindowMs = options?.restartWindowMs ?? 60_000;
    this.now = options?.now ?? Date.now;
    this.log = options?.logger ?? createLogger("supervisor");

    this.slots = {
      readability: makeSlot(registry, "readability"),
      sentiment: makeSlot(registry, "sentiment"),
      wordStats: makeSlot(registry, "wordStats"),
      sourceProfile: makeSlot(registry, "sourceProfile"),
      sources: makeSlot(registry, "sources"),
    };
  }

  /** Never rejects: every failure is reported as an outcome. */
  dispatch(task: WorkerTask): Promise<DispatchOutcome> {
    switch (task.kind) {
      case "readability":
        return this.run(this.slots.readability, task);
      case "sentiment":
        return this.run(this.slots.sentiment, task);
      case "wordStats":
        return this.run(this.slots.wordStats, task);
      case "sourceProfile":
        return this.run(this.slots.sourceProfile, task);
      case "sources":
        return this.run(this.slots.sources, task);
    }
  }

  health(): WorkerHealth[] {
    return Object.values(this.slots).map((slot) => ({
      kind: slot.kind,
      running: slot.worker !== null,
      stopped: slot.stopped,
      recentRestarts: this.pruneRestarts(slot).length,
    }));
  }

  /** Releases every worker; later dispatches report the kind as disabled. */
  shutdown(): void {
    this.closed = true;
    for (const slot of Object.values(this.slots)) {
      slot.worker?.dispose();
      slot.worker = null;
    }
  }

  // ── Internals ───────────────────────────────────────────────

  private async run<K extends WorkerKind>(slot: Slot<K>, task: TaskOf<K>): Promise<KindOutcome<K>> {
    if (this.closed || slot.stopped) return { status: "disabled", kind: slot.kind };

    let worker: AnalysisWorker<K> | null = slot.worker;
    try {
      worker = worker ?? this.start(slot);
      const result = await worker.handle(task);
      return { status: "completed", kind: slot.kind, result };
    } catch (err) {
      const handling = this.onCrash(slot, worker, err);
      return { status: "crashed", kind: slot.kind, handling, error: err };
    }
  }

  private start<K extends WorkerKind>(slot: Slot<K>): AnalysisWorker<K> {
    const worker = slot.factory();
    slot.worker = worker;
    return worker;
  }

  private onCrash<K extends WorkerKind>(
    slot: Slot<K>,
    crashed: AnalysisWorker<K> | null,
    err: unknown,
  ): CrashHandling {
    // A sibling task may already have replaced the instance that crashed.
    if (crashed && slot.worker === crashed) {
      crashed.dispose();
      slot.worker = null;
    }

    const directive: CrashDirective = classifyWorkerCrash(err);
    if (directive === "escalate") {
      this.log.error(`${slot.kind} worker crashed with an unclassified failure, escalating`, {
        error: errorMessage(err),
      });
      return "escalated";
    }

    const restarts = this.pruneRestarts(slot);
    if (restarts.length >= this.maxRestarts) {
      slot.stopped = true;
      this.log.error(`${slot.kind} worker exceeded ${this.maxRestarts} restarts in ${this.restartWindowMs}ms, stopping it`, {
        error: errorMessage(err),
      });
      return "stopped";
    }

    // The replacement instance is created on the next dispatch to this kind.
    restarts.push(this.now());
    this.log.warn(`${slot.kind} worker restarted (${restarts.length}/${this.maxRestarts})`, {
      error: errorMessage(err),
    });
    return "restarted";
  }

  private pruneRestarts(slot: { restarts: number[] }): number[] {
    const cutoff = this.now() - this.restartWindowMs;
    slot.restarts = slot.restarts.filter((t) => t > cutoff);
    return slot.restarts;
  }
}

function makeSlot<K extends WorkerKind>(registry: WorkerRegistry, kind: K): Slot<K> {
  return { kind, factory: registry.get(kind), worker: null, restarts: [], stopped: false };
}
