import type { LoggerMethods } from '@ragbridge/logger';
import type { ContentNode } from '@ragbridge/model';

import type {
  ParseStrategy,
  SourceDocument,
  StrategyContext,
  StrategyOutput,
} from '../core/parse-strategy';
import type { StructuredTextExtractor } from '../processors/structured-text-extractor';

import { ParseFailure } from '../errors/parse-failure';

/**
 * Local structural parsing for formats that have an extractor (PDF, DOCX).
 * Files of any other type skip this strategy.
 */
export class AlternateParserStrategy implements ParseStrategy {
  readonly name = 'alternate-parser';

  constructor(
    private readonly logger: LoggerMethods,
    private readonly extractors: StructuredTextExtractor[],
  ) {}

  appliesTo(document: SourceDocument): boolean {
    return this.extractors.some((extractor) =>
      extractor.supports(document.mimeType),
    );
  }

  async parse(
    document: SourceDocument,
    context: StrategyContext,
  ): Promise<StrategyOutput> {
    const extractor = this.extractors.find((candidate) =>
      candidate.supports(document.mimeType),
    );
    if (!extractor) {
      throw new ParseFailure(
        'unsupported-type',
        `No local parser for ${document.mimeType}`,
      );
    }

    const extracted = await extractor.extract(document, context.abortSignal);

    const nodes = extracted.blocks
      .filter((block) => block.text.trim().length > 0)
      .map((block): ContentNode => ({
        text: block.text,
        metadata: {
          source: document.path,
          pageNumber: block.pageNumber,
          strategy: this.name,
        },
      }));

    if (nodes.length === 0) {
      throw new ParseFailure(
        'empty-content',
        `No text could be extracted from ${document.fileName}`,
      );
    }

    this.logger.info(
      `[AlternateParserStrategy] Extracted ${nodes.length} blocks from ${document.fileName}`,
    );

    return { nodes, pageCount: extracted.pageCount };
  }
}
