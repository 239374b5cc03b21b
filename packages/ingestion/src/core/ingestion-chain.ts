import type { LoggerMethods } from '@ragbridge/logger';
import type { IngestionResult, ParseAttempt } from '@ragbridge/model';

import { randomUUID } from 'node:crypto';
import { basename } from 'node:path';

import type { ParseStrategy, SourceDocument } from './parse-strategy';

import { IngestionError } from '../errors/ingestion-error';
import { toParseFailure } from '../errors/parse-failure';
import { resolveMimeType } from '../utils/mime-type';

export interface IngestOptions {
  /** MIME type reported by the uploader; wins over the file extension */
  mimeHint?: string;

  /** Identifier carried into the result (default: random UUID) */
  fileId?: string;

  abortSignal?: AbortSignal;
}

export interface IngestionChainOptions {
  logger: LoggerMethods;

  /** Tried in order until one succeeds */
  strategies: ParseStrategy[];
}

/**
 * IngestionChain - turns one file into content nodes through ordered
 * fallback strategies
 *
 * Strategies run strictly one after another. Every strategy that runs adds
 * one frozen ParseAttempt; strategies that do not apply to the file are
 * skipped silently. The first success ends the chain.
 *
 * Cancellation rethrows the abort reason instead of being recorded as a
 * failed attempt.
 */
export class IngestionChain {
  private readonly logger: LoggerMethods;
  private readonly strategies: readonly ParseStrategy[];

  constructor(options: IngestionChainOptions) {
    this.logger = options.logger;
    this.strategies = [...options.strategies];
  }

  /**
   * @throws IngestionError when every applicable strategy failed
   */
  async ingest(
    filePath: string,
    options: IngestOptions = {},
  ): Promise<IngestionResult> {
    const document: SourceDocument = {
      fileId: options.fileId ?? randomUUID(),
      path: filePath,
      fileName: basename(filePath),
      mimeType: resolveMimeType(filePath, options.mimeHint),
    };
    const { abortSignal } = options;
    const attempts: ParseAttempt[] = [];

    this.logger.info(
      `[IngestionChain] Ingesting ${document.fileName} (${document.mimeType})`,
    );

    for (const strategy of this.strategies) {
      if (!strategy.appliesTo(document)) {
        this.logger.debug(
          `[IngestionChain] Skipping ${strategy.name} for ${document.mimeType}`,
        );
        continue;
      }

      abortSignal?.throwIfAborted();
      const startedAt = Date.now();

      try {
        const output = await strategy.parse(document, { abortSignal });
        const durationMs = Date.now() - startedAt;

        const attempt: ParseAttempt = {
          strategy: strategy.name,
          outcome: 'success',
          extractedText: output.nodes.map((node) => node.text).join('\n\n'),
          durationMs,
        };
        if (output.certificateModes) {
          attempt.certificateModes = Object.freeze([...output.certificateModes]);
        }
        attempts.push(Object.freeze(attempt));

        this.logger.info(
          `[IngestionChain] ${document.fileName} ingested with ${strategy.name} (${output.nodes.length} nodes, ${durationMs}ms)`,
        );

        return {
          fileId: document.fileId,
          finalStrategyUsed: strategy.name,
          content: output.nodes,
          attempts: [...attempts],
          pageCount: output.pageCount,
        };
      } catch (error) {
        if (abortSignal?.aborted) {
          throw abortSignal.reason;
        }

        const failure = toParseFailure(error);
        const attempt: ParseAttempt = {
          strategy: strategy.name,
          outcome: 'failure',
          failureReason: Object.freeze({
            kind: failure.kind,
            message: failure.message,
          }),
          durationMs: Date.now() - startedAt,
        };
        if (failure.certificateModes) {
          attempt.certificateModes = Object.freeze([
            ...failure.certificateModes,
          ]);
        }
        attempts.push(Object.freeze(attempt));

        this.logger.warn(
          `[IngestionChain] ${strategy.name} failed for ${document.fileName} (${failure.kind}): ${failure.message}`,
        );
      }
    }

    const error = new IngestionError(document.fileId, attempts);
    this.logger.error(`[IngestionChain] ${error.getSummary()}`);
    throw error;
  }
}
