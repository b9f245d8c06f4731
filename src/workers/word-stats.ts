import { AnalysisWorker, AnalysisWorkerOptions, emptyItemsReason } from "../core/analysis-worker.js";
import { TaskOf, WordCounter, WordStatsPayload } from "../core/types.js";

export class WordStatsWorker extends AnalysisWorker<"wordStats"> {
  readonly kind = "wordStats";

  constructor(
    private counter: WordCounter,
    options?: AnalysisWorkerOptions,
  ) {
    super(options);
  }

  protected precheck(task: TaskOf<"wordStats">): string | null {
    return emptyItemsReason(task);
  }

  protected async analyze(task: TaskOf<"wordStats">): Promise<WordStatsPayload> {
    const stats = this.counter.count(task.items);
    if (!stats) throw new Error("word counter returned no statistics");
    return { ...stats, isValid: stats.totalArticles > 0 };
  }

  protected fallback(): WordStatsPayload {
    return {
      totalArticles: 0,
      totalWords: 0,
      uniqueWords: 0,
      wordFrequencies: [],
      isValid: false,
      error: "Failed to compute word statistics",
    };
  }
}
