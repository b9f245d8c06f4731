import { classifyFetchFailure, errorMessage, WorkerEscalation } from "./errors.js";
import { HistoryRing } from "./history-ring.js";
import {
  ClientMessage,
  ERROR_MESSAGES,
  EventSink,
  ServerEvent,
  STATUS_MESSAGES,
  toWorkerEvent,
} from "./protocol.js";
import { SeenCache } from "./seen-cache.js";
import {
  DEFAULT_SORT_MODE,
  Item,
  parseSortMode,
  ResultBatch,
  SearchProvider,
  SortMode,
  SourceFilter,
  WorkerTask,
} from "./types.js";
import { DispatchOutcome, WorkerSupervisor } from "./worker-supervisor.js";
import { Logger, createLogger } from "../logger.js";

export type SessionState = "idle" | "searching" | "stopped" | "closed";

type FetchOrigin = "initial" | "tick";

// Everything the session reacts to goes through one mailbox, one message at a time.
type SessionMessage =
  | { kind: "client"; message: ClientMessage }
  | { kind: "tick"; generation: number }
  | { kind: "fetch_ok"; generation: number; origin: FetchOrigin; batch: ResultBatch }
  | { kind: "fetch_failed"; generation: number; origin: FetchOrigin; error: unknown }
  | { kind: "worker_outcome"; generation: number; outcome: DispatchOutcome };

export interface SearchSessionOptions {
  pollIntervalMs?: number;
  rateLimitBackoffFactor?: number;
  historyCapacity?: number;
  seenCapacity?: number;
  /** Filter handed to the source catalog worker on every fanout. */
  sourceFilter?: SourceFilter;
  /** Called when a worker crash cannot be absorbed by the session. */
  onEscalate?: (error: WorkerEscalation) => void;
  logger?: Logger;
}

function attempt<T>(fn: () => Promise<T>): Promise<T> {
  return new Promise<T>((resolve) => resolve(fn()));
}

function itemKey(item: Item): string | null {
  const key = item.url?.trim();
  return key ? key : null;
}

/**
 * Connection-scoped search state: the active query, the poll timer, the seen
 * cache and the history ring. Every fetch and fanout is stamped with the
 * search generation it belongs to; a completion from an older generation is
 * dropped.
 */
export class SearchSession {
  private status: SessionState = "idle";
  private query: string | null = null;
  private sortMode: SortMode = DEFAULT_SORT_MODE;
  private generation = 0;
  private inFlightGeneration: number | null = null;
  /** Whether the current generation has delivered its first batch. */
  private initialDelivered = false;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly baseIntervalMs: number;
  private intervalMs: number;
  private readonly backoffFactor: number;

  private readonly seen: SeenCache;
  private readonly history: HistoryRing<ResultBatch>;
  private readonly sourceFilter: SourceFilter;
  private readonly onEscalate?: (error: WorkerEscalation) => void;
  private readonly log: Logger;

  private mailbox: SessionMessage[] = [];
  private draining = false;

  constructor(
    readonly id: string,
    private search: SearchProvider,
    private workers: WorkerSupervisor,
    private sink: EventSink,
    options?: SearchSessionOptions,
  ) {
    this.baseIntervalMs = options?.pollIntervalMs ?? 30_000;
    this.intervalMs = this.baseIntervalMs;
    this.backoffFactor = options?.rateLimitBackoffFactor ?? 4;
    this.seen = new SeenCache(options?.seenCapacity ?? 100);
    this.history = new HistoryRing<ResultBatch>(options?.historyCapacity ?? 10);
    this.sourceFilter = options?.sourceFilter ?? {};
    this.onEscalate = options?.onEscalate;
    this.log = options?.logger ?? createLogger("session");
    this.log.info("Session opened", { sessionId: id });
  }

  // ── Public surface ──────────────────────────────────────────

  get state(): SessionState {
    return this.status;
  }

  get pollIntervalMs(): number {
    return this.intervalMs;
  }

  hasActiveTimer(): boolean {
    return this.timer !== null;
  }

  seenCount(): number {
    return this.seen.size();
  }

  handle(message: ClientMessage): void {
    this.send({ kind: "client", message });
  }

  /** Tears the session down: timer cancelled, workers released, late completions ignored. */
  close(): void {
    if (this.status === "closed") return;
    this.cancelTimer();
    this.generation++;
    this.inFlightGeneration = null;
    this.query = null;
    this.status = "closed";
    this.mailbox = [];
    this.seen.clear();
    this.workers.shutdown();
    this.log.info("Session closed", { sessionId: this.id });
  }

  // ── Mailbox ─────────────────────────────────────────────────

  private send(message: SessionMessage): void {
    if (this.status === "closed") return;
    this.mailbox.push(message);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.mailbox.shift();
      while (next) {
        this.receive(next);
        next = this.mailbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private receive(message: SessionMessage): void {
    if (this.status === "closed") return;
    try {
      switch (message.kind) {
        case "client":
          this.onClientMessage(message.message);
          break;
        case "tick":
          this.onTick(message.generation);
          break;
        case "fetch_ok":
          this.onFetchOk(message.generation, message.batch);
          break;
        case "fetch_failed":
          this.onFetchFailed(message.generation, message.origin, message.error);
          break;
        case "worker_outcome":
          this.onWorkerOutcome(message.generation, message.outcome);
          break;
      }
    } catch (err) {
      this.log.error(`Failed to process ${message.kind} message`, {
        sessionId: this.id,
        error: errorMessage(err),
      });
      this.emit({ type: "error", data: { message: `Internal error: ${errorMessage(err)}`, fatal: false } });
    }
  }

  // ── Client messages ─────────────────────────────────────────

  private onClientMessage(message: ClientMessage): void {
    this.log.debug(`Received ${message.type}`, { sessionId: this.id });
    switch (message.type) {
      case "start_search":
        this.startSearch(message.query, parseSortMode(message.sortBy));
        break;
      case "stop_search":
        this.stopSearch();
        break;
      case "ping":
        this.emit({ type: "pong", data: {} });
        break;
      case "get_history":
        this.emitHistory();
        break;
    }
  }

  private startSearch(rawQuery: string, sortMode: SortMode): void {
    const query = rawQuery.trim();
    if (!query) {
      this.emit({ type: "error", data: { message: ERROR_MESSAGES.emptyQuery, fatal: false } });
      return;
    }

    this.cancelTimer();
    this.generation++;
    this.query = query;
    this.sortMode = sortMode;
    this.seen.clear();
    this.intervalMs = this.baseIntervalMs;
    this.initialDelivered = false;
    this.status = "searching";
    this.log.info(`Starting search query='${query}' sort=${sortMode}`, { sessionId: this.id });
    this.startFetch("initial");
  }

  private stopSearch(): void {
    this.cancelTimer();
    this.generation++;
    this.inFlightGeneration = null;
    this.query = null;
    this.seen.clear();
    this.status = "stopped";
    this.log.info("Search stopped", { sessionId: this.id });
    this.emit({ type: "status", data: { message: STATUS_MESSAGES.stopped } });
  }

  // ── Poll loop ───────────────────────────────────────────────

  private armTimer(delayMs: number): void {
    this.cancelTimer();
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.send({ kind: "tick", generation });
    }, delayMs);
  }

  private cancelTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private onTick(generation: number): void {
    if (generation !== this.generation || this.status !== "searching") return;

    this.armTimer(this.intervalMs);
    if (this.inFlightGeneration === this.generation) {
      this.log.debug("Previous fetch still running, skipping tick", { sessionId: this.id });
      return;
    }
    this.startFetch("tick");
  }

  private startFetch(origin: FetchOrigin): void {
    const query = this.query;
    if (query === null) return;

    const generation = this.generation;
    const sortMode = this.sortMode;
    this.inFlightGeneration = generation;

    void attempt(() => this.search.search(query, sortMode)).then(
      (batch) => this.send({ kind: "fetch_ok", generation, origin, batch }),
      (error: unknown) => this.send({ kind: "fetch_failed", generation, origin, error }),
    );
  }

  private onFetchOk(generation: number, batch: ResultBatch): void {
    if (generation !== this.generation) {
      this.log.debug("Discarding results of a superseded search", { sessionId: this.id });
      return;
    }
    this.inFlightGeneration = null;

    // A search whose first fetch failed gets its initial results from the first successful poll.
    if (!this.initialDelivered) {
      this.initialDelivered = true;
      this.onInitialResults(batch);
    } else {
      this.onPollResults(batch);
    }
  }

  private onInitialResults(batch: ResultBatch): void {
    this.log.info(`Initial results: ${batch.items.length} item(s)`, { sessionId: this.id });

    this.history.pushFront(batch);
    for (const item of batch.items) {
      const key = itemKey(item);
      if (key) this.seen.add(key);
    }
    this.fanOut(batch.items);
    this.armTimer(this.intervalMs);

    this.emit({
      type: "initial_results",
      data: {
        query: batch.query,
        sortMode: batch.sortMode,
        totalResults: batch.totalResults,
        items: batch.items,
        timestamp: batch.createdAt,
        readability: batch.analytics.readability,
        articleReadability: batch.analytics.articleReadability,
        articleSentiment: batch.analytics.articleSentiment,
      },
    });
    this.emitHistory();
  }

  private onPollResults(batch: ResultBatch): void {
    // Items without a URL cannot be de-duplicated and always count as new.
    const fresh = batch.items.filter((item) => {
      const key = itemKey(item);
      return key === null || this.seen.add(key);
    });

    if (fresh.length === 0) {
      this.log.debug("No new items", { sessionId: this.id });
      return;
    }

    this.log.info(`Found ${fresh.length} new item(s)`, { sessionId: this.id });
    this.emit({ type: "append", data: { items: fresh, count: fresh.length } });
    this.fanOut(fresh);
  }

  private onFetchFailed(generation: number, origin: FetchOrigin, error: unknown): void {
    if (generation !== this.generation) return;
    this.inFlightGeneration = null;

    const failure = classifyFetchFailure(error);
    const context = { sessionId: this.id, origin, error: errorMessage(error) };

    switch (failure) {
      case "timeout":
        this.log.warn("News API timeout", context);
        this.emit({ type: "status", data: { message: STATUS_MESSAGES.delayed } });
        this.ensureTimer();
        break;
      case "connectivity":
        this.log.error("News API unreachable, stopping search", context);
        this.emit({ type: "error", data: { message: ERROR_MESSAGES.unavailable, fatal: true } });
        this.stopSearch();
        break;
      case "rate_limit":
        this.intervalMs = this.baseIntervalMs * this.backoffFactor;
        this.log.warn(`News API rate limit, polling every ${this.intervalMs}ms`, context);
        this.emit({ type: "error", data: { message: ERROR_MESSAGES.rateLimited, fatal: false } });
        this.armTimer(this.intervalMs);
        break;
      case "other":
        this.log.error("News API error", context);
        this.emit({ type: "error", data: { message: `Search failed: ${errorMessage(error)}`, fatal: false } });
        this.ensureTimer();
        break;
    }
  }

  /** A searching session keeps a live timer even when its first fetch failed. */
  private ensureTimer(): void {
    if (this.status === "searching" && this.timer === null) this.armTimer(this.intervalMs);
  }

  // ── Fanout ──────────────────────────────────────────────────

  private fanOut(items: Item[]): void {
    if (items.length === 0) return;

    const generation = this.generation;
    const tasks: WorkerTask[] = [
      { kind: "readability", items },
      { kind: "sentiment", items },
      { kind: "wordStats", items },
      { kind: "sourceProfile", items },
      { kind: "sources", filter: this.sourceFilter },
    ];

    for (const task of tasks) {
      void this.workers.dispatch(task).then((outcome) =>
        this.send({ kind: "worker_outcome", generation, outcome }),
      );
    }
  }

  private onWorkerOutcome(generation: number, outcome: DispatchOutcome): void {
    if (outcome.status === "crashed") {
      if (outcome.handling === "escalated") {
        this.escalate(new WorkerEscalation(outcome.kind, outcome.error));
      } else {
        this.log.warn(`${outcome.kind} worker crashed and was ${outcome.handling}`, { sessionId: this.id });
      }
      return;
    }

    if (outcome.status === "disabled") {
      this.log.debug(`${outcome.kind} worker is stopped, no result`, { sessionId: this.id });
      return;
    }

    if (generation !== this.generation || this.status !== "searching") {
      this.log.debug(`Suppressing late ${outcome.kind} result`, { sessionId: this.id });
      return;
    }

    this.emit(toWorkerEvent(outcome.result));
  }

  private escalate(error: WorkerEscalation): void {
    if (this.onEscalate) {
      this.onEscalate(error);
      return;
    }
    this.log.error(`Unhandled escalation: ${error.message}`, { sessionId: this.id });
  }

  // ── Outbound ────────────────────────────────────────────────

  private emitHistory(): void {
    const searches = this.history.list();
    this.emit({
      type: "history",
      data: { searches, count: searches.length, maxHistory: this.history.capacity },
    });
  }

  private emit(event: ServerEvent): void {
    try {
      this.sink(event);
    } catch (err) {
      this.log.error(`Failed to deliver ${event.type} event`, {
        sessionId: this.id,
        error: errorMessage(err),
      });
    }
  }
}
