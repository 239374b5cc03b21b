/**
 * Configuration constants for DocumentParsingClient
 */
export const DOCUMENT_PARSING_CLIENT = {
  /**
   * Interval between job status polls in milliseconds
   */
  POLL_INTERVAL_MS: 1000,

  /**
   * Default OCR/parsing language sent with each upload
   */
  DEFAULT_LANGUAGE: 'en',

  /**
   * Result format requested from the service
   */
  DEFAULT_RESULT_TYPE: 'markdown',
} as const;

/**
 * Configuration constants for IngestionChain
 */
export const INGESTION_CHAIN = {
  /**
   * Upper bound for the whole primary-service strategy in milliseconds
   */
  DEFAULT_TIMEOUT_MS: 60000,
} as const;

/**
 * Configuration constants for PdfTextExtractor
 */
export const PDF_TEXT_EXTRACTOR = {
  /**
   * Kill pdftotext/pdfinfo after this many milliseconds
   */
  COMMAND_TIMEOUT_MS: 30000,
} as const;
