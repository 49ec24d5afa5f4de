import type { AgentReport, NewsItem } from "@investment-desk/shared";
import { BaseAgent, type AgentConfig } from "../base";
import type { AnalysisContext } from "../../core/context";
import { mean } from "../../utils/math";

// ============================================
// Sentiment Analyst Agent
// ============================================

/**
 * SentimentAnalyst scores recent news with a fixed keyword vocabulary.
 * Each article scores (positive - negative) / hits; the aggregate is the
 * tanh of the mean article score.
 */

const DEFAULT_CONFIG: AgentConfig = {
  type: "sentiment_analyst",
  name: "Sentiment Analyst",
};

export const POSITIVE_KEYWORDS: readonly string[] = Object.freeze([
  "beats",
  "growth",
  "surge",
  "outperform",
  "bullish",
  "upgrade",
  "strong",
  "record",
]);

export const NEGATIVE_KEYWORDS: readonly string[] = Object.freeze([
  "miss",
  "decline",
  "drop",
  "lawsuit",
  "bearish",
  "downgrade",
  "weak",
  "fraud",
  "risk",
]);

// Lookup sets stay module-private; only the frozen lists are exported
const positiveWords: ReadonlySet<string> = new Set(POSITIVE_KEYWORDS);
const negativeWords: ReadonlySet<string> = new Set(NEGATIVE_KEYWORDS);

export interface ArticleScore {
  title: string;
  score: number;
}

export function scoreText(text: string): number {
  let positive = 0;
  let negative = 0;

  for (const word of text.toLowerCase().split(/\s+/)) {
    if (positiveWords.has(word)) positive++;
    else if (negativeWords.has(word)) negative++;
  }

  return (positive - negative) / Math.max(positive + negative, 1);
}

export class SentimentAnalyst extends BaseAgent {
  constructor(config: Partial<AgentConfig> = {}) {
    super({ ...DEFAULT_CONFIG, ...config });
  }

  analyze(context: AnalysisContext): AgentReport {
    const articles = this.scoreArticles(context.news);

    if (articles.length === 0) {
      this.log(`No recent news for ${context.symbol}`);
      return this.report(context, 0, "No recent news", { news_count: 0, articles: [] });
    }

    const score = Math.tanh(mean(articles.map((a) => a.score)));

    const report = this.report(
      context,
      score,
      `Average sentiment score ${score.toFixed(2)} based on ${articles.length} articles`,
      { news_count: articles.length, articles },
    );

    this.log(`Analysis complete for ${context.symbol}: ${report.score.toFixed(2)}`);
    return report;
  }

  private scoreArticles(news: readonly NewsItem[]): ArticleScore[] {
    const articles: ArticleScore[] = [];

    for (const item of news) {
      const title = item.title || "";
      const summary = item.summary || "";
      const combined = `${title} ${summary}`.trim();
      if (!combined) continue;

      articles.push({ title, score: scoreText(combined) });
    }

    return articles;
  }
}
