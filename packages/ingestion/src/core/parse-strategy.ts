import type {
  CertificateMode,
  ContentNode,
  ParseStrategyName,
} from '@ragbridge/model';

/**
 * A file queued for ingestion, with its MIME type already resolved
 */
export interface SourceDocument {
  fileId: string;
  path: string;
  fileName: string;
  mimeType: string;
}

export interface StrategyContext {
  abortSignal?: AbortSignal;
}

export interface StrategyOutput {
  nodes: ContentNode[];
  pageCount?: number;

  /**
   * TLS modes tried, in order (primary service only)
   */
  certificateModes?: CertificateMode[];
}

/**
 * One step of the ingestion fallback chain.
 *
 * `parse` either resolves with content or rejects; the chain classifies the
 * rejection into a ParseFailureReason and tries the next strategy.
 */
export interface ParseStrategy {
  readonly name: ParseStrategyName;

  /**
   * Strategies that do not apply to a file are skipped without an attempt
   */
  appliesTo(document: SourceDocument): boolean;

  parse(
    document: SourceDocument,
    context: StrategyContext,
  ): Promise<StrategyOutput>;
}
