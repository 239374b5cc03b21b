import type { LoggerMethods } from '@ragbridge/logger';
import type { CertificateMode } from '@ragbridge/model';

import { CertificateVerificationError } from '@ragbridge/shared';

import type { DocumentParsingClient, ParsedDocument } from '../client/document-parsing-client';
import type {
  ParseStrategy,
  SourceDocument,
  StrategyContext,
  StrategyOutput,
} from '../core/parse-strategy';

import { INGESTION_CHAIN } from '../config/constants';
import { ParseFailure, toParseFailure } from '../errors/parse-failure';

export interface PrimaryServiceStrategyOptions {
  logger: LoggerMethods;
  client: DocumentParsingClient;

  /** Mode of the first attempt (default: 'strict') */
  certificateMode?: CertificateMode;

  /** Budget for the whole strategy, retry included */
  timeoutMs?: number;
}

/**
 * Parses documents with the remote parsing service.
 *
 * A certificate failure under `strict` is retried exactly once against the
 * system trust store. The strategy never escalates to `insecure`; that mode
 * is only used when configured explicitly.
 */
export class PrimaryServiceStrategy implements ParseStrategy {
  readonly name = 'primary-service';

  private readonly logger: LoggerMethods;
  private readonly client: DocumentParsingClient;
  private readonly certificateMode: CertificateMode;
  private readonly timeoutMs: number;

  constructor(options: PrimaryServiceStrategyOptions) {
    this.logger = options.logger;
    this.client = options.client;
    this.certificateMode = options.certificateMode ?? 'strict';
    this.timeoutMs = options.timeoutMs ?? INGESTION_CHAIN.DEFAULT_TIMEOUT_MS;

    if (this.certificateMode === 'insecure') {
      this.logger.warn(
        '[PrimaryServiceStrategy] Certificate verification is disabled by configuration',
      );
    }
  }

  appliesTo(): boolean {
    return true;
  }

  async parse(
    document: SourceDocument,
    context: StrategyContext,
  ): Promise<StrategyOutput> {
    if (!this.client.isConfigured) {
      throw new ParseFailure(
        'configuration',
        'Parsing service API key is not configured',
      );
    }

    const deadline = Date.now() + this.timeoutMs;
    const certificateModes: CertificateMode[] = [];

    const parseWith = (mode: CertificateMode): Promise<ParsedDocument> => {
      certificateModes.push(mode);
      return this.client.parse(document, {
        certificateMode: mode,
        deadline,
        abortSignal: context.abortSignal,
      });
    };

    try {
      let parsed: ParsedDocument;
      try {
        parsed = await parseWith(this.certificateMode);
      } catch (error) {
        if (
          this.certificateMode !== 'strict' ||
          !(error instanceof CertificateVerificationError) ||
          context.abortSignal?.aborted
        ) {
          throw error;
        }

        this.logger.warn(
          `[PrimaryServiceStrategy] Certificate verification failed (${error.message}), retrying with the system trust store`,
        );
        parsed = await parseWith('system-trust-store');
      }

      if (parsed.pages.length === 0) {
        throw new ParseFailure(
          'empty-content',
          `Parsing service returned no text for ${document.fileName}`,
        );
      }

      return {
        nodes: parsed.pages.map((page) => ({
          text: page.text,
          metadata: {
            source: document.path,
            pageNumber: page.pageNumber,
            strategy: this.name,
          },
        })),
        pageCount: parsed.pageCount,
        certificateModes,
      };
    } catch (error) {
      if (context.abortSignal?.aborted) {
        throw error;
      }
      throw toParseFailure(error, certificateModes);
    }
  }
}
