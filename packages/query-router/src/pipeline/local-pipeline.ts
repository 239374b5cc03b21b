import type { ConversationTurn, RawBackendResponse } from '@ragbridge/model';

export interface LocalPipelineRequest {
  query: string;
  organizationId: string;
  conversationHistory: readonly ConversationTurn[];
  abortSignal?: AbortSignal;
}

/**
 * In-process retrieval + generation pipeline (v1 backend)
 *
 * The returned payload carries `answer`, a `usage` mapping with
 * `prompt_tokens`/`completion_tokens`/`total_tokens`, and a `metadata`
 * mapping the router flattens into the envelope.
 */
export interface LocalPipeline {
  generate(request: LocalPipelineRequest): Promise<RawBackendResponse>;

  /**
   * Optional readiness check; a pipeline without one is always healthy
   */
  checkHealth?(abortSignal?: AbortSignal): Promise<void>;
}

/**
 * Supplies retrieved document text for a query. Storage lives outside this
 * package; an empty string means nothing relevant was found.
 */
export interface ContextRetriever {
  retrieve(
    query: string,
    organizationId: string,
    abortSignal?: AbortSignal,
  ): Promise<string>;
}
