import { AnalysisWorker, AnalysisWorkerOptions, emptyItemsReason } from "../core/analysis-worker.js";
import { SourceProfilePayload, SourceProfiler, TaskOf, sourceDisplayName } from "../core/types.js";

function leadSource(task: TaskOf<"sourceProfile">): string {
  const first = task.items[0];
  return first ? sourceDisplayName(first) : "Unknown Source";
}

/** Profiles the source of the first item in the batch. */
export class SourceProfileWorker extends AnalysisWorker<"sourceProfile"> {
  readonly kind = "sourceProfile";

  constructor(
    private profiler: SourceProfiler,
    options?: AnalysisWorkerOptions,
  ) {
    super(options);
  }

  protected precheck(task: TaskOf<"sourceProfile">): string | null {
    return emptyItemsReason(task);
  }

  protected async analyze(task: TaskOf<"sourceProfile">): Promise<SourceProfilePayload> {
    const sourceName = leadSource(task);
    const profile = await this.profiler.profile(sourceName);
    if (!profile) throw new Error(`no profile returned for ${sourceName}`);
    return { sourceName, source: profile.source, articles: profile.articles, isValid: true };
  }

  protected fallback(task: TaskOf<"sourceProfile">): SourceProfilePayload {
    return {
      sourceName: leadSource(task),
      source: null,
      articles: [],
      isValid: false,
      error: "Failed to load source profile",
    };
  }
}
