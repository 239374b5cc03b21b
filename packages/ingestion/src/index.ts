export { IngestionChain } from './core/ingestion-chain';
export type { IngestOptions, IngestionChainOptions } from './core/ingestion-chain';
export {
  createIngestionChain,
  type IngestionChainConfig,
  type IngestionChainDependencies,
} from './core/create-ingestion-chain';
export type {
  ParseStrategy,
  SourceDocument,
  StrategyContext,
  StrategyOutput,
} from './core/parse-strategy';
export {
  DocumentParsingClient,
  type DocumentParsingClientOptions,
  type ParseCallOptions,
  type ParsedDocument,
  type ParsedPage,
} from './client/document-parsing-client';
export { PrimaryServiceStrategy } from './strategies/primary-service-strategy';
export { AlternateParserStrategy } from './strategies/alternate-parser-strategy';
export { PlainTextStrategy } from './strategies/plain-text-strategy';
export { PdfTextExtractor } from './processors/pdf-text-extractor';
export { DocxTextExtractor } from './processors/docx-text-extractor';
export type {
  ExtractedBlock,
  ExtractedDocument,
  StructuredTextExtractor,
} from './processors/structured-text-extractor';
export { IngestionError } from './errors/ingestion-error';
export { ParseFailure } from './errors/parse-failure';
export { resolveMimeType } from './utils/mime-type';
export { DOCUMENT_PARSING_CLIENT, INGESTION_CHAIN } from './config/constants';
