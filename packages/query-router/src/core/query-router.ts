import type { LoggerMethods } from '@ragbridge/logger';
import type {
  BackendVersion,
  ChatEnvelope,
  ConversationTurn,
  RawBackendResponse,
} from '@ragbridge/model';
import type { TokenUsageAggregator } from '@ragbridge/shared';

import { isBackendVersion } from '@ragbridge/model';
import { redactSensitive } from '@ragbridge/shared';
import { omit, uniq } from 'es-toolkit';

import type { RemoteBackend } from '../clients/remote-retrieval-client';
import type { TokenUsageNormalizer } from '../normalizers/token-usage-normalizer';
import type { LocalPipeline } from '../pipeline/local-pipeline';

import { RouterError } from '../errors/router-error';

/**
 * Field holding the answer text in each backend's payload
 */
const ANSWER_FIELD: Record<BackendVersion, string> = {
  v1: 'answer',
  v2: 'response',
};

/**
 * Keys tried, in order, when a source entry is an object
 */
const SOURCE_ID_KEYS = ['file_id', 'id', 'source'] as const;

export interface QueryRequest {
  query: string;
  organizationId: string;

  /**
   * Validated at run time; anything but 'v1' or 'v2' is rejected.
   * Omitted means the router's default version.
   */
  version?: BackendVersion | string;

  conversationHistory?: readonly ConversationTurn[];
  abortSignal?: AbortSignal;
}

export interface QueryRouterOptions {
  logger: LoggerMethods;
  localPipeline: LocalPipeline;
  remoteBackend: RemoteBackend;
  normalizer: TokenUsageNormalizer;

  /**
   * Upper bound for one backend call (default: 8000)
   */
  queryTimeoutMs?: number;

  /**
   * Backend for requests that do not name one (default: 'v1')
   */
  defaultVersion?: BackendVersion;

  aggregator?: TokenUsageAggregator;
}

export interface BackendHealth {
  version: BackendVersion;
  healthy: boolean;

  /**
   * Redacted failure message when unhealthy
   */
  error?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sourceId(entry: unknown): string | undefined {
  if (typeof entry === 'string') {
    return entry || undefined;
  }
  if (typeof entry === 'number') {
    return Number.isFinite(entry) ? String(entry) : undefined;
  }
  if (isRecord(entry)) {
    for (const key of SOURCE_ID_KEYS) {
      const value = entry[key];
      if (typeof value === 'string' || typeof value === 'number') {
        const id = sourceId(value);
        if (id !== undefined) {
          return id;
        }
      }
    }
  }
  return undefined;
}

/**
 * Coerce a backend `sources` value into a set of identifiers
 */
function toSourceIds(sources: unknown): string[] {
  const entries = Array.isArray(sources) ? sources : [sources];
  return uniq(
    entries
      .map(sourceId)
      .filter((id): id is string => id !== undefined),
  );
}

/**
 * Settle with the promise, or reject with the signal's reason once it aborts
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * QueryRouter
 *
 * Dispatches a query to exactly one backend and assembles the frozen
 * {@link ChatEnvelope}. There is no failover between versions: a failing
 * backend surfaces as RouterError('backend-unavailable').
 */
export class QueryRouter {
  private readonly logger: LoggerMethods;
  private readonly localPipeline: LocalPipeline;
  private readonly remoteBackend: RemoteBackend;
  private readonly normalizer: TokenUsageNormalizer;
  private readonly queryTimeoutMs: number;
  private readonly defaultVersion: BackendVersion;
  private readonly aggregator?: TokenUsageAggregator;

  constructor(options: QueryRouterOptions) {
    this.logger = options.logger;
    this.localPipeline = options.localPipeline;
    this.remoteBackend = options.remoteBackend;
    this.normalizer = options.normalizer;
    this.queryTimeoutMs = options.queryTimeoutMs ?? 8000;
    this.defaultVersion = options.defaultVersion ?? 'v1';
    this.aggregator = options.aggregator;
  }

  async route(request: QueryRequest): Promise<ChatEnvelope> {
    const version = this.validate(request);
    const query = request.query.trim();
    const organizationId = request.organizationId.trim();
    const conversationHistory = request.conversationHistory ?? [];

    this.logger.info(
      `[QueryRouter] Routing query for ${organizationId} to ${version}`,
    );
    const startTime = Date.now();

    const timeoutSignal = AbortSignal.timeout(this.queryTimeoutMs);
    const signal = request.abortSignal
      ? AbortSignal.any([request.abortSignal, timeoutSignal])
      : timeoutSignal;

    let raw: RawBackendResponse;
    try {
      signal.throwIfAborted();
      const call =
        version === 'v1'
          ? this.localPipeline.generate({
              query,
              organizationId,
              conversationHistory,
              abortSignal: signal,
            })
          : this.remoteBackend.query({
              query,
              organizationId,
              conversationHistory,
              timeoutMs: this.queryTimeoutMs,
              abortSignal: signal,
            });
      raw = await raceAbort(call, signal);
    } catch (error) {
      if (request.abortSignal?.aborted) {
        throw request.abortSignal.reason;
      }
      const cause = timeoutSignal.aborted
        ? new Error(`No answer within ${this.queryTimeoutMs} ms`, {
            cause: error,
          })
        : error;
      const routerError = RouterError.backendUnavailable(version, cause);
      this.logger.error(`[QueryRouter] ${routerError.message}`);
      throw routerError;
    }

    const envelope = this.buildEnvelope(raw, {
      query,
      organizationId,
      version,
    });

    this.aggregator?.track({
      organizationId,
      version,
      usage: envelope.tokenUsage,
      usageAvailable: envelope.backendMetadata.usage_unavailable !== true,
    });

    this.logger.info(
      `[QueryRouter] ${version} answered in ${Date.now() - startTime}ms (${envelope.sources.length} sources, ${envelope.tokenUsage.totalTokens} tokens)`,
    );

    return envelope;
  }

  /**
   * Check one backend. Never throws for an unreachable backend.
   */
  async checkHealth(version: BackendVersion | string): Promise<BackendHealth> {
    if (!isBackendVersion(version)) {
      throw new RouterError(
        'invalid-version',
        `Unsupported backend version: ${version}`,
      );
    }

    try {
      if (version === 'v1') {
        await this.localPipeline.checkHealth?.(
          AbortSignal.timeout(this.queryTimeoutMs),
        );
      } else {
        await this.remoteBackend.checkHealth({
          timeoutMs: this.queryTimeoutMs,
        });
      }
      return { version, healthy: true };
    } catch (error) {
      const message = redactSensitive(RouterError.getErrorMessage(error));
      this.logger.warn(
        `[QueryRouter] Health check failed for ${version}: ${message}`,
      );
      return { version, healthy: false, error: message };
    }
  }

  private validate(request: QueryRequest): BackendVersion {
    const version = request.version ?? this.defaultVersion;
    if (!isBackendVersion(version)) {
      throw new RouterError(
        'invalid-version',
        `Unsupported backend version: ${version}`,
      );
    }
    if (!request.query.trim()) {
      throw new RouterError('invalid-request', 'Query must not be empty', {
        version,
      });
    }
    if (!request.organizationId.trim()) {
      throw new RouterError(
        'invalid-request',
        'Organization id must not be empty',
        { version },
      );
    }
    return version;
  }

  private buildEnvelope(
    raw: RawBackendResponse,
    params: { query: string; organizationId: string; version: BackendVersion },
  ): ChatEnvelope {
    const { version } = params;
    const answerField = ANSWER_FIELD[version];
    const answerText = raw[answerField];
    if (typeof answerText !== 'string') {
      const routerError = RouterError.backendUnavailable(
        version,
        new Error(`Response has no ${answerField} text`),
      );
      this.logger.error(`[QueryRouter] ${routerError.message}`);
      throw routerError;
    }

    const analysis = this.normalizer.analyze(raw, version);

    // v1 nests its diagnostics under `metadata`
    const backendMetadata: Record<string, unknown> =
      version === 'v1'
        ? {
            ...omit(raw, [answerField, 'sources', 'usage', 'metadata']),
            ...(isRecord(raw.metadata) ? raw.metadata : {}),
          }
        : { ...omit(raw, [answerField, 'sources', 'usage']) };
    if (!analysis.usageAvailable) {
      backendMetadata.usage_unavailable = true;
    }
    if (analysis.consistencyWarning) {
      backendMetadata.usage_warning = analysis.consistencyWarning;
    }

    const envelope: ChatEnvelope = Object.freeze({
      query: params.query,
      organizationId: params.organizationId,
      answerText,
      sources: Object.freeze(toSourceIds(raw.sources)),
      tokenUsage: Object.freeze({ ...analysis.usage }),
      backendMetadata: Object.freeze(backendMetadata),
      backendVersion: version,
    });

    return envelope;
  }
}
