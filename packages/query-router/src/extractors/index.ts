export {
  DocumentShredder,
  ShreddingResponseSchema,
  type DocumentSource,
  type ShredFile,
  type ShredRequest,
  type ShreddingResponse,
  type ShreddingResult,
} from './document-shredder';
export { ShreddingError, type ShreddingErrorKind } from './shredding-error';
