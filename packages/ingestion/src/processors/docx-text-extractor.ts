import type { LoggerMethods } from '@ragbridge/logger';

import mammoth from 'mammoth';

import type { SourceDocument } from '../core/parse-strategy';
import type {
  ExtractedDocument,
  StructuredTextExtractor,
} from './structured-text-extractor';

import { DOCX_MIME_TYPE } from '../utils/mime-type';

/**
 * Extracts raw text from DOCX files with mammoth, one block per paragraph.
 */
export class DocxTextExtractor implements StructuredTextExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  supports(mimeType: string): boolean {
    return mimeType === DOCX_MIME_TYPE;
  }

  async extract(document: SourceDocument): Promise<ExtractedDocument> {
    const result = await mammoth.extractRawText({ path: document.path });

    if (result.messages.length > 0) {
      this.logger.debug(
        `[DocxTextExtractor] ${result.messages.length} conversion message(s) for ${document.fileName}`,
      );
    }

    const blocks = result.value
      .split(/\n\s*\n/)
      .map((paragraph) => paragraph.trim())
      .filter((paragraph) => paragraph.length > 0)
      .map((text) => ({ text }));

    return { blocks };
  }
}
