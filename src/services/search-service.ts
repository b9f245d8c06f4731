import { NewsApiClient } from "../adapters/newsapi.js";
import {
  Item,
  ReadabilityScorer,
  ResultBatch,
  SearchProvider,
  SentimentLabel,
  SortMode,
  toUpstreamSort,
} from "../core/types.js";

export interface ItemSentimentScorer {
  analyzeItem(item: Item): SentimentLabel;
}

export class SearchService implements SearchProvider {
  constructor(
    private client: NewsApiClient,
    private readability: ReadabilityScorer,
    private sentiment: ItemSentimentScorer,
    private pageSize = 10,
    private now: () => Date = () => new Date(),
  ) {}

  async search(query: string, sortMode: SortMode): Promise<ResultBatch> {
    const response = await this.client.searchEverything(query, toUpstreamSort(sortMode), this.pageSize);
    const items = response.items;

    return {
      query,
      sortMode,
      totalResults: response.totalResults,
      items,
      createdAt: this.now().toISOString(),
      analytics: {
        readability: this.readability.averageScore(items),
        articleReadability: items.map((item) => this.readability.scoreItem(item)),
        articleSentiment: items.map((item) => this.sentiment.analyzeItem(item)),
      },
    };
  }
}
