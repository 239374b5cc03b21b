import type { LoggerMethods } from '@ragbridge/logger';
import type {
  RagBridgeConfig,
  SecureTransport,
  TokenUsageAggregator,
} from '@ragbridge/shared';
import type { LanguageModel } from 'ai';

import type { ContextRetriever } from '../pipeline/local-pipeline';

import { createOpenAI } from '@ai-sdk/openai';
import { createConsoleLogger } from '@ragbridge/logger';
import { createSecureTransport } from '@ragbridge/shared';

import { RemoteRetrievalClient } from '../clients/remote-retrieval-client';
import { TokenUsageNormalizer } from '../normalizers/token-usage-normalizer';
import { LlmAnswerPipeline } from '../pipeline/llm-answer-pipeline';
import { PromptProvider } from '../pipeline/prompt-provider';
import { QueryRouter } from './query-router';

export interface QueryRouterDependencies {
  /**
   * Default: console logger at the configured level
   */
  logger?: LoggerMethods;

  /**
   * Default: transport using the configured system CA path
   */
  transport?: SecureTransport;

  /**
   * Context source for the local pipeline (default: none, simple mode)
   */
  retriever?: ContextRetriever;

  /**
   * Model for the local pipeline (default: OpenAI chat model from config)
   */
  model?: LanguageModel;

  fallbackModel?: LanguageModel;
  aggregator?: TokenUsageAggregator;
}

/**
 * Wire a QueryRouter with both backends from configuration
 */
export function createQueryRouter(
  config: Pick<
    RagBridgeConfig,
    | 'ragVersion'
    | 'certificateMode'
    | 'queryTimeoutMs'
    | 'toleranceTokens'
    | 'remoteServiceUrl'
    | 'promptApiUrl'
    | 'openaiModel'
    | 'openaiApiKey'
    | 'systemCaPath'
    | 'logLevel'
  >,
  deps: QueryRouterDependencies = {},
): QueryRouter {
  const logger = deps.logger ?? createConsoleLogger(config.logLevel);
  const transport = deps.transport ?? createSecureTransport(config, logger);

  const model =
    deps.model ??
    createOpenAI({ apiKey: config.openaiApiKey }).chat(config.openaiModel);

  const localPipeline = new LlmAnswerPipeline(
    logger,
    model,
    {
      retriever: deps.retriever,
      promptProvider: new PromptProvider({
        logger,
        transport,
        baseUrl: config.promptApiUrl,
        certificateMode: config.certificateMode,
      }),
    },
    deps.fallbackModel,
  );

  const remoteBackend = new RemoteRetrievalClient({
    logger,
    transport,
    baseUrl: config.remoteServiceUrl,
    certificateMode: config.certificateMode,
  });

  return new QueryRouter({
    logger,
    localPipeline,
    remoteBackend,
    normalizer: new TokenUsageNormalizer({
      logger,
      toleranceTokens: config.toleranceTokens,
    }),
    queryTimeoutMs: config.queryTimeoutMs,
    defaultVersion: config.ragVersion,
    aggregator: deps.aggregator,
  });
}
