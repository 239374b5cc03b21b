export {
  QueryRouter,
  createQueryRouter,
  type BackendHealth,
  type QueryRequest,
  type QueryRouterDependencies,
  type QueryRouterOptions,
} from './core';
export {
  RemoteRetrievalClient,
  type RemoteBackend,
  type RemoteCallOptions,
  type RemoteQueryRequest,
  type RemoteRetrievalClientOptions,
} from './clients/remote-retrieval-client';
export {
  RouterError,
  type RouterErrorKind,
  type RouterErrorOptions,
} from './errors/router-error';
export {
  TokenUsageNormalizer,
  type TokenUsageNormalizerOptions,
  type UsageAnalysis,
} from './normalizers';
export {
  LlmAnswerPipeline,
  type LlmAnswerPipelineOptions,
} from './pipeline/llm-answer-pipeline';
export type {
  ContextRetriever,
  LocalPipeline,
  LocalPipelineRequest,
} from './pipeline/local-pipeline';
export {
  PromptProvider,
  type PromptProviderOptions,
} from './pipeline/prompt-provider';
export {
  GROUNDED_ANSWER_PROMPT,
  SIMPLE_ASSISTANT_PROMPT,
} from './pipeline/prompts';
export {
  DocumentShredder,
  ShreddingError,
  ShreddingResponseSchema,
  type DocumentSource,
  type ShredFile,
  type ShredRequest,
  type ShreddingErrorKind,
  type ShreddingResponse,
  type ShreddingResult,
} from './extractors';
