export {
  TokenUsageNormalizer,
  type TokenUsageNormalizerOptions,
  type UsageAnalysis,
} from './token-usage-normalizer';
