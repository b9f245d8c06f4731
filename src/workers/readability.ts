import { AnalysisWorker, AnalysisWorkerOptions, emptyItemsReason } from "../core/analysis-worker.js";
import { ReadabilityPayload, ReadabilityScorer, TaskOf } from "../core/types.js";

export class ReadabilityWorker extends AnalysisWorker<"readability"> {
  readonly kind = "readability";

  constructor(
    private scorer: ReadabilityScorer,
    options?: AnalysisWorkerOptions,
  ) {
    super(options);
  }

  protected precheck(task: TaskOf<"readability">): string | null {
    return emptyItemsReason(task);
  }

  protected async analyze(task: TaskOf<"readability">): Promise<ReadabilityPayload> {
    const average = this.scorer.averageScore(task.items);
    const articleScores = task.items.map((item) => this.scorer.scoreItem(item));
    return {
      gradeLevel: average.gradeLevel,
      readingEase: average.readingEase,
      interpretation: average.interpretation,
      articleCount: task.items.length,
      isValid: average.isValid,
      articleScores,
    };
  }

  protected fallback(): ReadabilityPayload {
    return {
      gradeLevel: 0,
      readingEase: 0,
      interpretation: "Unknown",
      articleCount: 0,
      isValid: false,
      error: "Failed to compute readability",
      articleScores: [],
    };
  }
}
