import type { BackendVersion } from './backend-version';
import type { TokenUsage } from './token-usage-report';

/**
 * Opaque backend payload (mapping from string key to value)
 */
export type RawBackendResponse = Record<string, unknown>;

/**
 * A previous turn of the conversation, forwarded to the backend as-is
 */
export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Canonical, backend-agnostic answer to one query.
 *
 * Assembled once by the router and frozen; never mutated afterwards.
 */
export interface ChatEnvelope {
  readonly query: string;
  readonly organizationId: string;
  readonly answerText: string;

  /** Source identifiers, deduplicated. Order is not significant. */
  readonly sources: readonly string[];

  readonly tokenUsage: Readonly<TokenUsage>;

  /**
   * Every backend field the router does not consume (algorithm name,
   * confidence score, retrieval diagnostics...) plus usage flags.
   */
  readonly backendMetadata: Readonly<Record<string, unknown>>;

  readonly backendVersion: BackendVersion;
}

/**
 * Wire form of {@link ChatEnvelope} returned to API callers
 */
export interface UnifiedQueryResponse {
  query: string;
  organizationId: string;
  answerText: string;
  sources: string[];
  token_usage: {
    input_tokens: number;
    output_tokens: number;
    total_tokens: number;
  };
  backendVersion: BackendVersion;
  metadata: Record<string, unknown>;
}

export function toUnifiedQueryResponse(
  envelope: ChatEnvelope,
): UnifiedQueryResponse {
  return {
    query: envelope.query,
    organizationId: envelope.organizationId,
    answerText: envelope.answerText,
    sources: [...envelope.sources],
    token_usage: {
      input_tokens: envelope.tokenUsage.inputTokens,
      output_tokens: envelope.tokenUsage.outputTokens,
      total_tokens: envelope.tokenUsage.totalTokens,
    },
    backendVersion: envelope.backendVersion,
    metadata: { ...envelope.backendMetadata },
  };
}
