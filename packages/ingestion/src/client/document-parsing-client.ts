import type { LoggerMethods } from '@ragbridge/logger';
import type { CertificateMode } from '@ragbridge/model';
import type { SecureTransport, TransportResponse } from '@ragbridge/shared';

import { NetworkError } from '@ragbridge/shared';
import { readFile } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';

import type { SourceDocument } from '../core/parse-strategy';

import { DOCUMENT_PARSING_CLIENT } from '../config/constants';
import { ParseFailure } from '../errors/parse-failure';

const uploadResponseSchema = z
  .object({
    id: z.string().min(1),
    status: z.string(),
  })
  .passthrough();

const jobStatusSchema = z
  .object({
    id: z.string().optional(),
    status: z.string(),
    error_message: z.string().nullish(),
  })
  .passthrough();

const jobResultSchema = z
  .object({
    pages: z
      .array(
        z
          .object({
            page: z.number().int().positive().optional(),
            md: z.string().nullish(),
            text: z.string().nullish(),
          })
          .passthrough(),
      )
      .default([]),
    job_metadata: z
      .object({
        job_pages: z.number().nullish(),
        job_is_cache_hit: z.boolean().nullish(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type JobResult = z.infer<typeof jobResultSchema>;

const FAILED_JOB_STATUSES = new Set(['ERROR', 'CANCELED']);

export interface DocumentParsingClientOptions {
  logger: LoggerMethods;
  transport: SecureTransport;
  baseUrl: string;
  apiKey?: string;

  /** Parsing language (default: 'en') */
  language?: string;

  /** Interval between job status polls (default: 1000) */
  pollIntervalMs?: number;
}

export interface ParseCallOptions {
  certificateMode: CertificateMode;

  /**
   * Epoch milliseconds after which no further request is started
   */
  deadline: number;

  abortSignal?: AbortSignal;
}

export interface ParsedPage {
  pageNumber: number;
  text: string;
}

export interface ParsedDocument {
  jobId: string;

  /** Non-empty pages only */
  pages: ParsedPage[];

  pageCount: number;
  cacheHit: boolean;
}

/**
 * DocumentParsingClient - client for a LlamaParse-compatible parsing API
 *
 * Flow per document:
 * 1. Upload the file as multipart (`/api/parsing/upload`)
 * 2. Poll the job (`/api/parsing/job/{id}`) until it reports SUCCESS
 * 3. Fetch the per-page JSON result (`/api/parsing/job/{id}/result/json`)
 *
 * Every call goes through SecureTransport with the caller's certificate mode
 * and the time left before `deadline`.
 */
export class DocumentParsingClient {
  private readonly logger: LoggerMethods;
  private readonly transport: SecureTransport;
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly language: string;
  private readonly pollIntervalMs: number;

  constructor(options: DocumentParsingClientOptions) {
    this.logger = options.logger;
    this.transport = options.transport;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.language = options.language ?? DOCUMENT_PARSING_CLIENT.DEFAULT_LANGUAGE;
    this.pollIntervalMs =
      options.pollIntervalMs ?? DOCUMENT_PARSING_CLIENT.POLL_INTERVAL_MS;
  }

  get isConfigured(): boolean {
    return !!this.apiKey;
  }

  async parse(
    document: SourceDocument,
    options: ParseCallOptions,
  ): Promise<ParsedDocument> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new ParseFailure(
        'configuration',
        'Parsing service API key is not configured',
      );
    }

    const jobId = await this.upload(document, apiKey, options);
    await this.waitForJob(jobId, apiKey, options);
    const result = await this.fetchResult(jobId, apiKey, options);

    const parsed = this.toParsedDocument(jobId, result);
    this.logger.info(
      `[DocumentParsingClient] Job ${jobId} parsed ${parsed.pageCount} pages` +
        (parsed.cacheHit ? ' (cache hit)' : ''),
    );
    return parsed;
  }

  private async upload(
    document: SourceDocument,
    apiKey: string,
    options: ParseCallOptions,
  ): Promise<string> {
    const bytes = await readFile(document.path);
    const form = new FormData();
    form.append(
      'file',
      new Blob([new Uint8Array(bytes)], { type: document.mimeType }),
      document.fileName,
    );
    form.append('language', this.language);
    form.append('result_type', DOCUMENT_PARSING_CLIENT.DEFAULT_RESULT_TYPE);

    const response = await this.request(
      '/api/parsing/upload',
      apiKey,
      options,
      form,
    );
    const upload = this.validate(uploadResponseSchema, response, 'upload');

    this.logger.info(
      `[DocumentParsingClient] Uploaded ${document.fileName} (job ${upload.id})`,
    );
    return upload.id;
  }

  private async waitForJob(
    jobId: string,
    apiKey: string,
    options: ParseCallOptions,
  ): Promise<void> {
    while (true) {
      const response = await this.request(
        `/api/parsing/job/${encodeURIComponent(jobId)}`,
        apiKey,
        options,
      );
      const job = this.validate(jobStatusSchema, response, 'job status');

      if (job.status === 'SUCCESS') {
        return;
      }

      if (FAILED_JOB_STATUSES.has(job.status)) {
        const detail = job.error_message ? `: ${job.error_message}` : '';
        throw new ParseFailure(
          'parse-failed',
          `Parsing job ${jobId} ended with status ${job.status}${detail}`,
        );
      }

      this.logger.debug(
        `[DocumentParsingClient] Job ${jobId} status: ${job.status}`,
      );
      await sleep(
        Math.min(this.pollIntervalMs, this.remainingMs(options)),
        undefined,
        { signal: options.abortSignal },
      );
    }
  }

  private async fetchResult(
    jobId: string,
    apiKey: string,
    options: ParseCallOptions,
  ): Promise<JobResult> {
    const response = await this.request(
      `/api/parsing/job/${encodeURIComponent(jobId)}/result/json`,
      apiKey,
      options,
    );
    return this.validate(jobResultSchema, response, 'result');
  }

  private request(
    path: string,
    apiKey: string,
    options: ParseCallOptions,
    body?: FormData,
  ): Promise<TransportResponse> {
    return this.transport.fetch(
      `${this.baseUrl}${path}`,
      {
        method: body ? 'POST' : 'GET',
        headers: {
          accept: 'application/json',
          authorization: `Bearer ${apiKey}`,
        },
        body,
      },
      options.certificateMode,
      {
        timeoutMs: this.remainingMs(options),
        abortSignal: options.abortSignal,
      },
    );
  }

  /**
   * @throws NetworkError once the deadline has passed
   */
  private remainingMs(options: ParseCallOptions): number {
    const remaining = options.deadline - Date.now();
    if (remaining <= 0) {
      throw new NetworkError(
        'Parsing service did not finish within the ingestion timeout',
      );
    }
    return remaining;
  }

  private validate<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    response: TransportResponse,
    label: string,
  ): T {
    let payload: unknown;
    try {
      payload = response.json();
    } catch (error) {
      throw new ParseFailure(
        'parse-failed',
        `Parsing service returned a non-JSON ${label} response`,
        { cause: error },
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ParseFailure(
        'parse-failed',
        `Parsing service returned a malformed ${label} response`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  private toParsedDocument(jobId: string, result: JobResult): ParsedDocument {
    const pages = result.pages
      .map((page, index) => ({
        pageNumber: page.page ?? index + 1,
        text: page.md || page.text || '',
      }))
      .filter((page) => page.text.trim().length > 0);

    // Cache hits report job_pages = 0
    const reportedPages = result.job_metadata?.job_pages ?? 0;

    return {
      jobId,
      pages,
      pageCount: reportedPages > 0 ? reportedPages : result.pages.length,
      cacheHit: result.job_metadata?.job_is_cache_hit ?? false,
    };
  }
}
