import { AnalysisWorkerOptions } from "../core/analysis-worker.js";
import {
  ReadabilityScorer,
  SentimentScorer,
  SourceCatalog,
  SourceProfiler,
  WordCounter,
} from "../core/types.js";
import { WorkerRegistry } from "../core/worker-registry.js";
import { ReadabilityWorker } from "./readability.js";
import { SentimentWorker } from "./sentiment.js";
import { SourceCatalogWorker } from "./source-catalog.js";
import { SourceProfileWorker } from "./source-profile.js";
import { WordStatsWorker } from "./word-stats.js";

export interface AnalysisCollaborators {
  readability: ReadabilityScorer;
  sentiment: SentimentScorer;
  wordCounter: WordCounter;
  profiler: SourceProfiler;
  catalog: SourceCatalog;
}

/** Registers a factory for each of the five analysis workers. */
export function buildWorkerRegistry(
  collaborators: AnalysisCollaborators,
  options?: AnalysisWorkerOptions,
): WorkerRegistry {
  const registry = new WorkerRegistry();
  registry.register("readability", () => new ReadabilityWorker(collaborators.readability, options));
  registry.register("sentiment", () => new SentimentWorker(collaborators.sentiment, options));
  registry.register("wordStats", () => new WordStatsWorker(collaborators.wordCounter, options));
  registry.register("sourceProfile", () => new SourceProfileWorker(collaborators.profiler, options));
  registry.register("sources", () => new SourceCatalogWorker(collaborators.catalog, options));
  return registry;
}
