import { extname } from 'node:path';

export const PDF_MIME_TYPE = 'application/pdf';
export const DOCX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

const MIME_TYPES_BY_EXTENSION: Readonly<Record<string, string>> = {
  '.pdf': PDF_MIME_TYPE,
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.csv': 'text/csv',
  '.json': 'application/json',
  '.html': 'text/html',
  '.htm': 'text/html',
  '.doc': 'application/msword',
  '.docx': DOCX_MIME_TYPE,
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

/**
 * Resolve a file's MIME type. An explicit hint wins over the extension.
 */
export function resolveMimeType(filePath: string, mimeHint?: string): string {
  const hint = mimeHint?.split(';')[0].trim().toLowerCase();
  if (hint) {
    return hint;
  }

  return (
    MIME_TYPES_BY_EXTENSION[extname(filePath).toLowerCase()] ??
    'application/octet-stream'
  );
}
