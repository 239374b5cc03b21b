import type { LoggerMethods } from '@ragbridge/logger';
import type { RagBridgeConfig, SecureTransport } from '@ragbridge/shared';

import { createConsoleLogger } from '@ragbridge/logger';
import { createSecureTransport } from '@ragbridge/shared';

import { DocumentParsingClient } from '../client/document-parsing-client';
import { DocxTextExtractor } from '../processors/docx-text-extractor';
import { PdfTextExtractor } from '../processors/pdf-text-extractor';
import { AlternateParserStrategy } from '../strategies/alternate-parser-strategy';
import { PlainTextStrategy } from '../strategies/plain-text-strategy';
import { PrimaryServiceStrategy } from '../strategies/primary-service-strategy';
import { IngestionChain } from './ingestion-chain';

export type IngestionChainConfig = Pick<
  RagBridgeConfig,
  | 'certificateMode'
  | 'ingestionTimeoutMs'
  | 'parsingServiceUrl'
  | 'parsingApiKey'
  | 'systemCaPath'
  | 'logLevel'
>;

export interface IngestionChainDependencies {
  /**
   * Default: console logger at the configured level
   */
  logger?: LoggerMethods;

  /**
   * Default: transport using the configured system CA path
   */
  transport?: SecureTransport;
}

/**
 * Build the standard chain: primary service, then local PDF/DOCX parsing,
 * then plain text.
 */
export function createIngestionChain(
  config: IngestionChainConfig,
  deps: IngestionChainDependencies = {},
): IngestionChain {
  const logger = deps.logger ?? createConsoleLogger(config.logLevel);
  const transport = deps.transport ?? createSecureTransport(config, logger);

  const client = new DocumentParsingClient({
    logger,
    transport,
    baseUrl: config.parsingServiceUrl,
    apiKey: config.parsingApiKey,
  });

  return new IngestionChain({
    logger,
    strategies: [
      new PrimaryServiceStrategy({
        logger,
        client,
        certificateMode: config.certificateMode,
        timeoutMs: config.ingestionTimeoutMs,
      }),
      new AlternateParserStrategy(logger, [
        new PdfTextExtractor(logger),
        new DocxTextExtractor(logger),
      ]),
      new PlainTextStrategy(),
    ],
  });
}
