import { z } from "zod";
import {
  Item,
  ReadabilityScore,
  ResultBatch,
  SentimentLabel,
  SortMode,
  WorkerKind,
  WorkerPayloads,
  WorkerResult,
} from "./types.js";

// ── Inbound: client → session ─────────────────────────────────────

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("start_search"),
    query: z.string(),
    sortBy: z.string().optional(),
  }),
  z.object({ type: z.literal("stop_search") }),
  z.object({ type: z.literal("ping") }),
  z.object({ type: z.literal("get_history") }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export const CLIENT_MESSAGE_TYPES: readonly string[] = clientMessageSchema.options.map(
  (option) => option.shape.type.value,
);

// ── Outbound: session → client ────────────────────────────────────

export interface InitialResultsData {
  query: string;
  sortMode: SortMode;
  totalResults: number;
  items: Item[];
  timestamp: string;
  readability: ReadabilityScore;
  articleReadability: ReadabilityScore[];
  articleSentiment: SentimentLabel[];
}

export interface HistoryData {
  searches: ResultBatch[];
  count: number;
  maxHistory: number;
}

export type WorkerEvent = { [K in WorkerKind]: { type: K; data: WorkerPayloads[K] } }[WorkerKind];

export function toWorkerEvent(result: WorkerResult): WorkerEvent {
  switch (result.kind) {
    case "readability":
      return { type: "readability", data: result.data };
    case "sentiment":
      return { type: "sentiment", data: result.data };
    case "wordStats":
      return { type: "wordStats", data: result.data };
    case "sourceProfile":
      return { type: "sourceProfile", data: result.data };
    case "sources":
      return { type: "sources", data: result.data };
  }
}

export type ServerEvent =
  | { type: "initial_results"; data: InitialResultsData }
  | { type: "append"; data: { items: Item[]; count: number } }
  | { type: "history"; data: HistoryData }
  | { type: "status"; data: { message: string } }
  | { type: "error"; data: { message: string; fatal: boolean } }
  | { type: "pong"; data: Record<string, never> }
  | WorkerEvent;

export type EventSink = (event: ServerEvent) => void;

export const STATUS_MESSAGES = {
  stopped: "Search stopped",
  delayed: "Search delayed due to slow API response",
} as const;

export const ERROR_MESSAGES = {
  unavailable: "News service temporarily unavailable. Please try again later.",
  rateLimited: "Too many requests. Please wait a moment and try again.",
  emptyQuery: "Search query is required",
  invalidMessage: "Invalid message format",
} as const;
