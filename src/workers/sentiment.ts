import { AnalysisWorker, AnalysisWorkerOptions, emptyItemsReason } from "../core/analysis-worker.js";
import { SentimentPayload, SentimentScorer, TaskOf } from "../core/types.js";
import { sentimentEmoji } from "../analytics/sentiment.js";

export class SentimentWorker extends AnalysisWorker<"sentiment"> {
  readonly kind = "sentiment";

  constructor(
    private scorer: SentimentScorer,
    options?: AnalysisWorkerOptions,
  ) {
    super(options);
  }

  protected precheck(task: TaskOf<"sentiment">): string | null {
    return emptyItemsReason(task);
  }

  protected async analyze(task: TaskOf<"sentiment">): Promise<SentimentPayload> {
    const sentiment = this.scorer.analyzeItems(task.items);
    if (!sentiment) throw new Error("sentiment scorer returned no label");
    return { sentiment, emoji: sentimentEmoji(sentiment), isValid: true };
  }

  protected fallback(): SentimentPayload {
    return {
      sentiment: "neutral",
      emoji: sentimentEmoji("neutral"),
      isValid: false,
      error: "Failed to compute sentiment",
    };
  }
}
