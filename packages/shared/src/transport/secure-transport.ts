import type { LoggerMethods } from '@ragbridge/logger';
import type { CertificateMode } from '@ragbridge/model';
import type {
  IncomingHttpHeaders,
  IncomingMessage,
  RequestOptions,
} from 'node:http';

import { Agent as HttpAgent, request as httpRequest } from 'node:http';
import { Agent as HttpsAgent, request as httpsRequest } from 'node:https';

import { classifyTransportFailure } from './classify-transport-failure';
import { loadSystemTrustStore } from './system-trust-store';
import { NetworkError } from './transport-error';

export interface TransportRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** FormData bodies are sent as multipart/form-data */
  body?: string | Buffer | FormData;
}

export interface TransportCallOptions {
  /** Upper bound for the whole call, response body included */
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

export interface TransportResponse {
  statusCode: number;
  headers: IncomingHttpHeaders;
  body: Buffer;
  text(): string;
  json(): unknown;
}

export interface SecureTransportOptions {
  logger: LoggerMethods;

  /** CA bundle used by `system-trust-store` mode (default: OS lookup) */
  systemCaPath?: string;

  /** Maximum sockets per host for each pooled agent (default: 50) */
  maxSockets?: number;
}

type PooledAgent = HttpAgent | HttpsAgent;

const KEEP_ALIVE_MSECS = 30000;

/**
 * SecureTransport - outbound HTTP(S) with an explicit certificate mode per call
 *
 * No process-wide TLS setting is touched: each (protocol, mode) pair gets
 * its own lazily created keep-alive agent, and those pools are the only
 * state shared between concurrent calls.
 *
 * Failures are classified into:
 * - CertificateVerificationError: chain/hostname could not be verified
 * - NetworkError: timeout, DNS, refused connection, non-2xx status
 *
 * The transport never retries and never downgrades the certificate mode;
 * escalation is the caller's decision.
 */
export class SecureTransport {
  private readonly logger: LoggerMethods;
  private readonly systemCaPath?: string;
  private readonly maxSockets: number;
  private readonly agents = new Map<string, PooledAgent>();

  constructor(options: SecureTransportOptions) {
    this.logger = options.logger;
    this.systemCaPath = options.systemCaPath;
    this.maxSockets = options.maxSockets ?? 50;
  }

  async fetch(
    url: string,
    request: TransportRequest,
    certificateMode: CertificateMode,
    options: TransportCallOptions,
  ): Promise<TransportResponse> {
    const timeoutSignal = AbortSignal.timeout(options.timeoutMs);
    const signal = options.abortSignal
      ? AbortSignal.any([options.abortSignal, timeoutSignal])
      : timeoutSignal;

    let response: TransportResponse;
    try {
      const target = new URL(url);
      const agent = this.getAgent(target.protocol, certificateMode);
      if (certificateMode === 'insecure' && target.protocol === 'https:') {
        this.logger.warn(
          `[SecureTransport] Certificate verification disabled for request to ${target.host}`,
        );
      }
      const { body, headers } = await this.encodeBody(request);

      response = await this.send(target, {
        method: request.method ?? (body ? 'POST' : 'GET'),
        headers,
        body,
        agent,
        signal,
      });
    } catch (error) {
      if (options.abortSignal?.aborted) {
        throw options.abortSignal.reason;
      }
      if (timeoutSignal.aborted) {
        throw new NetworkError(
          `Request timed out after ${options.timeoutMs} ms`,
          { cause: error },
        );
      }
      throw classifyTransportFailure(error);
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new NetworkError(
        `Unexpected HTTP status ${response.statusCode}`,
        { statusCode: response.statusCode },
      );
    }

    return response;
  }

  /**
   * Close every pooled connection.
   */
  destroy(): void {
    for (const agent of this.agents.values()) {
      agent.destroy();
    }
    this.agents.clear();
  }

  private getAgent(protocol: string, mode: CertificateMode): PooledAgent {
    if (protocol !== 'https:' && protocol !== 'http:') {
      throw new NetworkError(`Unsupported protocol: ${protocol}`);
    }

    // Certificate mode only matters for TLS connections
    const key = protocol === 'http:' ? 'http' : `https:${mode}`;
    const existing = this.agents.get(key);
    if (existing) {
      return existing;
    }

    const poolOptions = {
      keepAlive: true,
      keepAliveMsecs: KEEP_ALIVE_MSECS,
      maxSockets: this.maxSockets,
    };

    let agent: PooledAgent;
    if (protocol === 'http:') {
      agent = new HttpAgent(poolOptions);
    } else if (mode === 'system-trust-store') {
      agent = new HttpsAgent({
        ...poolOptions,
        ca: loadSystemTrustStore(this.systemCaPath),
      });
    } else if (mode === 'insecure') {
      agent = new HttpsAgent({ ...poolOptions, rejectUnauthorized: false });
    } else {
      agent = new HttpsAgent(poolOptions);
    }

    this.agents.set(key, agent);
    return agent;
  }

  private async encodeBody(
    request: TransportRequest,
  ): Promise<{ body?: Buffer; headers: Record<string, string> }> {
    const headers = { ...request.headers };
    const { body } = request;

    if (body === undefined) {
      return { headers };
    }

    if (typeof body === 'string') {
      return { body: Buffer.from(body, 'utf-8'), headers };
    }
    if (Buffer.isBuffer(body)) {
      return { body, headers };
    }

    // Let the platform pick the multipart boundary
    const encoded = new Response(body);
    const contentType = encoded.headers.get('content-type');
    if (contentType) {
      headers['content-type'] = contentType;
    }
    return { body: Buffer.from(await encoded.arrayBuffer()), headers };
  }

  private send(
    target: URL,
    params: {
      method: string;
      headers: Record<string, string>;
      body?: Buffer;
      agent: PooledAgent;
      signal: AbortSignal;
    },
  ): Promise<TransportResponse> {
    const headers = params.body
      ? { ...params.headers, 'content-length': String(params.body.length) }
      : params.headers;
    const requestOptions: RequestOptions = {
      method: params.method,
      headers,
      agent: params.agent,
      signal: params.signal,
    };

    return new Promise((resolve, reject) => {
      const onResponse = (res: IncomingMessage): void => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', reject);
        res.on('end', () => {
          const body = Buffer.concat(chunks);
          resolve({
            statusCode: res.statusCode ?? 0,
            headers: res.headers,
            body,
            text: () => body.toString('utf-8'),
            json: (): unknown => JSON.parse(body.toString('utf-8')),
          });
        });
      };

      const req =
        target.protocol === 'https:'
          ? httpsRequest(target, requestOptions, onResponse)
          : httpRequest(target, requestOptions, onResponse);

      req.on('error', reject);

      if (params.body) {
        req.write(params.body);
      }
      req.end();
    });
  }
}
