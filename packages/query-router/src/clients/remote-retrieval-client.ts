import type { LoggerMethods } from '@ragbridge/logger';
import type {
  CertificateMode,
  ConversationTurn,
  RawBackendResponse,
} from '@ragbridge/model';
import type { SecureTransport, TransportResponse } from '@ragbridge/shared';

import { z } from 'zod';

const generateResponseSchema = z
  .object({
    response: z.string(),
    sources: z.unknown().optional(),
    usage: z.unknown().optional(),
  })
  .passthrough();

export interface RemoteRetrievalClientOptions {
  logger: LoggerMethods;
  transport: SecureTransport;

  /**
   * Service root, without trailing slash
   */
  baseUrl: string;

  /**
   * TLS mode for every call (default: 'strict')
   */
  certificateMode?: CertificateMode;

  /**
   * Answer length limit sent with each query (default: 1024)
   */
  maxTokens?: number;

  /**
   * Sampling temperature sent with each query (default: 0.7)
   */
  temperature?: number;
}

export interface RemoteQueryRequest {
  query: string;
  organizationId: string;
  conversationHistory: readonly ConversationTurn[];
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

export interface RemoteCallOptions {
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

/**
 * Remote retrieval service (v2 backend) as seen by the router
 */
export interface RemoteBackend {
  query(request: RemoteQueryRequest): Promise<RawBackendResponse>;
  checkHealth(options: RemoteCallOptions): Promise<void>;
}

/**
 * RemoteRetrievalClient
 *
 * Talks to the remote graph retrieval service over the secure transport.
 * Responses are validated before they reach the router; unknown fields are
 * kept so they end up in the envelope metadata.
 */
export class RemoteRetrievalClient implements RemoteBackend {
  private readonly logger: LoggerMethods;
  private readonly transport: SecureTransport;
  private readonly baseUrl: string;
  private readonly certificateMode: CertificateMode;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(options: RemoteRetrievalClientOptions) {
    this.logger = options.logger;
    this.transport = options.transport;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.certificateMode = options.certificateMode ?? 'strict';
    this.maxTokens = options.maxTokens ?? 1024;
    this.temperature = options.temperature ?? 0.7;
  }

  async query(request: RemoteQueryRequest): Promise<RawBackendResponse> {
    this.logger.debug(
      `[RemoteRetrievalClient] Querying for organization ${request.organizationId} (${request.conversationHistory.length} history turns)`,
    );

    const response = await this.transport.fetch(
      `${this.baseUrl}/api/v1/generate-response`,
      {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          accept: 'application/json',
        },
        body: JSON.stringify({
          org_id: request.organizationId,
          query: request.query,
          conversation_history: request.conversationHistory,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        }),
      },
      this.certificateMode,
      { timeoutMs: request.timeoutMs, abortSignal: request.abortSignal },
    );

    const parsed = generateResponseSchema.safeParse(this.parseJson(response));
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Remote service returned a malformed response: ${issues}`);
    }

    return parsed.data;
  }

  async checkHealth(options: RemoteCallOptions): Promise<void> {
    await this.transport.fetch(
      `${this.baseUrl}/api/v1/health`,
      { method: 'GET', headers: { accept: 'application/json' } },
      this.certificateMode,
      options,
    );
  }

  private parseJson(response: TransportResponse): unknown {
    try {
      return response.json();
    } catch (error) {
      throw new Error('Remote service returned a non-JSON response', {
        cause: error,
      });
    }
  }
}
