import { AnalysisWorker, AnalysisWorkerOptions } from "../core/analysis-worker.js";
import { SourceCatalog, SourceCatalogPayload, SourceFilter, TaskOf } from "../core/types.js";

function echoFilter(filter: SourceFilter): Pick<SourceCatalogPayload, "country" | "category" | "language"> {
  return {
    country: filter.country ?? "",
    category: filter.category ?? "",
    language: filter.language ?? "",
  };
}

export class SourceCatalogWorker extends AnalysisWorker<"sources"> {
  readonly kind = "sources";

  constructor(
    private catalog: SourceCatalog,
    options?: AnalysisWorkerOptions,
  ) {
    super(options);
  }

  protected async analyze(task: TaskOf<"sources">): Promise<SourceCatalogPayload> {
    const sources = await this.catalog.listSources(task.filter);
    if (!sources) throw new Error("source catalog returned no list");
    return { sources, count: sources.length, ...echoFilter(task.filter), isValid: true };
  }

  protected fallback(task: TaskOf<"sources">): SourceCatalogPayload {
    return {
      sources: [],
      count: 0,
      ...echoFilter(task.filter),
      isValid: false,
      error: "Unable to load sources",
    };
  }
}
