import { createServer, type Server } from "node:http";
import express, { type Express } from "express";
import cors from "cors";

import { NewsApiClient } from "./adapters/newsapi.js";
import { FleschReadabilityScorer } from "./analytics/readability.js";
import { LexiconSentimentScorer } from "./analytics/sentiment.js";
import { FrequencyWordCounter } from "./analytics/word-stats.js";
import { RelayConfig } from "./config.js";
import { SearchSession } from "./core/search-session.js";
import { WorkerSupervisor } from "./core/worker-supervisor.js";
import { createRoutes } from "./http/routes.js";
import { createLogger } from "./logger.js";
import { SearchService } from "./services/search-service.js";
import { SourceService } from "./services/source-service.js";
import { buildWorkerRegistry } from "./workers/index.js";
import { SessionFactory } from "./ws/connection.js";
import { SessionServer } from "./ws/server.js";

export const SERVER_NAME = "news-pulse-relay";
export const SERVER_VERSION = "1.0.0";

export interface RelayServer {
  app: Express;
  httpServer: Server;
  sessions: SessionServer;
  listen(): Promise<number>;
  close(): Promise<void>;
}

export interface RelayServerOptions {
  fetchImpl?: typeof fetch;
}

export function createRelayServer(config: RelayConfig, options?: RelayServerOptions): RelayServer {
  const log = createLogger("server");

  // ── Upstream and analytics ──────────────────────────────────

  const client = new NewsApiClient({
    apiKey: config.newsApi.apiKey,
    baseUrl: config.newsApi.baseUrl,
    timeoutMs: config.newsApi.timeoutMs,
    fetchImpl: options?.fetchImpl,
  });
  const readability = new FleschReadabilityScorer();
  const sentiment = new LexiconSentimentScorer();
  const wordCounter = new FrequencyWordCounter();
  const sourceService = new SourceService(client, { cacheTtlMs: config.sourcesCacheTtlMs });
  const searchService = new SearchService(client, readability, sentiment, config.newsApi.pageSize);

  const registry = buildWorkerRegistry(
    { readability, sentiment, wordCounter, profiler: sourceService, catalog: sourceService },
    { timeoutMs: config.workers.analysisTimeoutMs, logger: createLogger("worker") },
  );
  const missing = registry.missing();
  if (missing.length > 0) throw new Error(`No worker registered for: ${missing.join(", ")}`);

  // ── Sessions ────────────────────────────────────────────────

  const createSession: SessionFactory = (sessionId, sink, onEscalate) =>
    new SearchSession(
      sessionId,
      searchService,
      new WorkerSupervisor(registry, {
        maxRestarts: config.workers.maxRestarts,
        restartWindowMs: config.workers.restartWindowMs,
      }),
      sink,
      { ...config.session, onEscalate },
    );

  // ── Express app ─────────────────────────────────────────────

  const app = express();
  app.use(express.json());
  app.use(cors({ origin: config.corsOrigin ?? true }));
  app.use(
    createRoutes({
      client,
      catalog: sourceService,
      profiler: sourceService,
      wordCounter,
      name: SERVER_NAME,
      version: SERVER_VERSION,
    }),
  );

  const httpServer = createServer(app);
  const sessions = new SessionServer(httpServer, createSession);

  return {
    app,
    httpServer,
    sessions,

    listen() {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(config.port, () => {
          httpServer.off("error", reject);
          const address = httpServer.address();
          const port = typeof address === "object" && address !== null ? address.port : config.port;
          log.info(`${SERVER_NAME} listening on http://localhost:${port}`);
          log.info(`  WebSocket endpoint: ws://localhost:${port}/ws`);
          log.info(`  Health check: http://localhost:${port}/health`);
          resolve(port);
        });
      });
    },

    async close() {
      await sessions.close();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
