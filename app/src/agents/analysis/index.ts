// Analysis Agent Exports
export { TechnicalAnalyst } from "./technical";
export {
  SentimentAnalyst,
  scoreText,
  POSITIVE_KEYWORDS,
  NEGATIVE_KEYWORDS,
  type ArticleScore,
} from "./sentiment";
export { FundamentalAnalyst, FUNDAMENTAL_METRICS, type FundamentalMetric } from "./fundamental";
