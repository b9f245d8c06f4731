import { Router, type Request, type Response } from "express";

import { NewsApiClient } from "../adapters/newsapi.js";
import { errorMessage } from "../core/errors.js";
import { SourceCatalog, SourceFilter, SourceProfiler, WordCounter } from "../core/types.js";
import { Logger, createLogger } from "../logger.js";

const WORD_STATS_ARTICLES = 50;

export interface RouteDeps {
  client: NewsApiClient;
  catalog: SourceCatalog;
  profiler: SourceProfiler;
  wordCounter: WordCounter;
  name: string;
  version: string;
  logger?: Logger;
}

function queryText(req: Request, key: string): string | undefined {
  const value = req.query[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function createRoutes(deps: RouteDeps): Router {
  const router = Router();
  const log = deps.logger ?? createLogger("http");

  const fail = (res: Response, message: string, err: unknown) => {
    log.error(message, { error: errorMessage(err) });
    res.status(500).json({ error: message });
  };

  // ── Health ──────────────────────────────────────────────────

  router.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", server: deps.name, version: deps.version });
  });

  // ── Sources ─────────────────────────────────────────────────

  router.get("/api/sources", async (req: Request, res: Response) => {
    try {
      const filter: SourceFilter = {
        country: queryText(req, "country"),
        category: queryText(req, "category"),
        language: queryText(req, "language"),
      };
      const sources = await deps.catalog.listSources(filter);
      res.json({ sources, count: sources.length });
    } catch (err) {
      fail(res, "Failed to list sources", err);
    }
  });

  router.get("/api/sources/facets", async (_req: Request, res: Response) => {
    try {
      res.json(await deps.catalog.facets());
    } catch (err) {
      fail(res, "Failed to load source facets", err);
    }
  });

  router.get("/api/source-profile/:source", async (req: Request, res: Response) => {
    try {
      const profile = await deps.profiler.profile(req.params.source);
      res.json(profile);
    } catch (err) {
      fail(res, "Failed to load source profile", err);
    }
  });

  // ── Word statistics ─────────────────────────────────────────

  router.get("/api/word-stats", async (req: Request, res: Response) => {
    const query = queryText(req, "q");
    if (!query) {
      res.status(400).json({ error: "Missing query parameter q" });
      return;
    }
    try {
      const response = await deps.client.searchEverything(query, "publishedAt", WORD_STATS_ARTICLES);
      res.json({ query, ...deps.wordCounter.count(response.items) });
    } catch (err) {
      fail(res, "Failed to compute word statistics", err);
    }
  });

  return router;
}
