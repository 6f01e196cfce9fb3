export {
  BaseStageClient,
  formatIssues,
  PROCESS_PATH,
  HEALTH_PATH,
  HEALTH_CHECK_TIMEOUT_MS,
} from './base.js';
export {
  SentimentClient,
  sentimentPolarity,
  DEFAULT_SENTIMENT_CONFIG,
  DEFAULT_SENTIMENT_OPTIONS,
} from './sentiment.js';
export { HateCheckClient, DEFAULT_HATE_CHECK_CONFIG, DEFAULT_HATE_CHECK_OPTIONS } from './hate-check.js';
export { FactCheckClient, buildCheckSheet, DEFAULT_FACT_CHECK_CONFIG } from './fact-check.js';
