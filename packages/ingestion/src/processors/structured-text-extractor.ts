import type { SourceDocument } from '../core/parse-strategy';

export interface ExtractedBlock {
  text: string;
  pageNumber?: number;
}

export interface ExtractedDocument {
  blocks: ExtractedBlock[];
  pageCount?: number;
}

/**
 * Local, non-networked parser for one family of document formats
 */
export interface StructuredTextExtractor {
  supports(mimeType: string): boolean;
  extract(
    document: SourceDocument,
    abortSignal?: AbortSignal,
  ): Promise<ExtractedDocument>;
}
