export * from './transport';
export * from './config';
export { redactSensitive } from './utils/redact';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  LLMCaller,
  type LLMCallConfig,
  type LLMCallResult,
  type LLMStructuredCallConfig,
  type LLMStructuredCallResult,
  type ModelTokenUsage,
} from './utils/llm-caller';
export {
  TokenUsageAggregator,
  type TrackedQueryUsage,
} from './utils/token-usage-aggregator';
