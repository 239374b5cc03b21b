import type { LoggerMethods } from '@ragbridge/logger';

import { spawnAsync } from '@ragbridge/shared';

import type { SourceDocument } from '../core/parse-strategy';
import type {
  ExtractedDocument,
  StructuredTextExtractor,
} from './structured-text-extractor';

import { PDF_TEXT_EXTRACTOR } from '../config/constants';
import { ParseFailure } from '../errors/parse-failure';
import { PDF_MIME_TYPE } from '../utils/mime-type';

/**
 * Extracts text from PDF pages using the pdftotext command-line tool.
 *
 * Uses the `-layout` flag to preserve the original page layout.
 * A page that fails is logged as a warning and yields no block.
 *
 * ## System Requirements
 * - Poppler utils (`apt-get install poppler-utils`, `brew install poppler`)
 */
export class PdfTextExtractor implements StructuredTextExtractor {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly commandTimeoutMs: number = PDF_TEXT_EXTRACTOR.COMMAND_TIMEOUT_MS,
  ) {}

  supports(mimeType: string): boolean {
    return mimeType === PDF_MIME_TYPE;
  }

  async extract(
    document: SourceDocument,
    abortSignal?: AbortSignal,
  ): Promise<ExtractedDocument> {
    const totalPages = await this.getPageCount(document.path, abortSignal);
    if (totalPages === 0) {
      throw new ParseFailure(
        'parse-failed',
        `pdfinfo could not read ${document.fileName}`,
      );
    }

    const pageTexts = await this.extractText(
      document.path,
      totalPages,
      abortSignal,
    );

    return {
      blocks: [...pageTexts].map(([pageNumber, text]) => ({
        pageNumber,
        text,
      })),
      pageCount: totalPages,
    };
  }

  /**
   * Extract text from all pages of a PDF.
   *
   * @returns Map of 1-based page numbers to extracted text strings
   */
  async extractText(
    pdfPath: string,
    totalPages: number,
    abortSignal?: AbortSignal,
  ): Promise<Map<number, string>> {
    this.logger.info(
      `[PdfTextExtractor] Extracting text from ${totalPages} pages...`,
    );

    const pageTexts = new Map<number, string>();

    for (let page = 1; page <= totalPages; page++) {
      const text = await this.extractPageText(pdfPath, page, abortSignal);
      pageTexts.set(page, text);
    }

    const nonEmptyCount = [...pageTexts.values()].filter(
      (t) => t.trim().length > 0,
    ).length;
    this.logger.info(
      `[PdfTextExtractor] Extracted text from ${nonEmptyCount}/${totalPages} pages`,
    );

    return pageTexts;
  }

  /**
   * Get total page count of a PDF using pdfinfo.
   * Returns 0 when pdfinfo exits with an error.
   */
  async getPageCount(
    pdfPath: string,
    abortSignal?: AbortSignal,
  ): Promise<number> {
    const result = await spawnAsync('pdfinfo', [pdfPath], {
      abortSignal,
      timeoutMs: this.commandTimeoutMs,
    });
    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdfinfo failed: ${result.stderr || 'Unknown error'}`,
      );
      return 0;
    }
    const match = result.stdout.match(/^Pages:\s+(\d+)/m);
    return match ? parseInt(match[1], 10) : 0;
  }

  /**
   * Extract text from a single PDF page using pdftotext.
   * Returns empty string on failure (logged as warning).
   */
  async extractPageText(
    pdfPath: string,
    page: number,
    abortSignal?: AbortSignal,
  ): Promise<string> {
    const result = await spawnAsync(
      'pdftotext',
      [
        '-f',
        page.toString(),
        '-l',
        page.toString(),
        '-layout',
        pdfPath,
        '-',
      ],
      { abortSignal, timeoutMs: this.commandTimeoutMs },
    );

    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdftotext failed for page ${page}: ${result.stderr || 'Unknown error'}`,
      );
      return '';
    }

    // pdftotext ends every page with a form feed
    return result.stdout.replace(/\f+$/, '');
  }
}
