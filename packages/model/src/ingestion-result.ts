import type { CertificateMode } from './backend-version';

/**
 * Ingestion strategies, in the order the fallback chain tries them.
 */
export const PARSE_STRATEGIES = [
  'primary-service',
  'alternate-parser',
  'plain-text',
] as const;

export type ParseStrategyName = (typeof PARSE_STRATEGIES)[number];

export type ParseFailureKind =
  | 'certificate-verification-failed'
  | 'network'
  | 'configuration'
  | 'unsupported-type'
  | 'parse-failed'
  | 'decode-failed'
  | 'empty-content';

/**
 * Classified reason a strategy failed
 */
export interface ParseFailureReason {
  kind: ParseFailureKind;
  message: string;
}

/**
 * One strategy run within the fallback chain.
 *
 * Attempts are frozen once recorded; the ordered list of attempts for a file
 * is its audit trail.
 */
export interface ParseAttempt {
  strategy: ParseStrategyName;
  outcome: 'success' | 'failure';

  /** Present when outcome is `failure` */
  failureReason?: ParseFailureReason;

  /** Present when outcome is `success` */
  extractedText?: string;

  durationMs: number;

  /**
   * TLS modes tried by the primary service strategy, in order.
   * Makes the strict → system-trust-store escalation auditable.
   */
  certificateModes?: readonly CertificateMode[];
}

/**
 * Unit of extracted content handed to storage
 */
export interface ContentNode {
  text: string;
  metadata: {
    /** Path of the ingested file */
    source: string;
    /** 1-based page number, when the strategy knows pages */
    pageNumber?: number;
    strategy: ParseStrategyName;
  };
}

/**
 * Outcome of a successful ingestion.
 *
 * Exactly one attempt (the last) has outcome `success`; `content` comes
 * from that attempt only.
 */
export interface IngestionResult {
  fileId: string;
  finalStrategyUsed: ParseStrategyName;
  content: ContentNode[];
  attempts: ParseAttempt[];

  /** Page count reported by the strategy, when known */
  pageCount?: number;
}
