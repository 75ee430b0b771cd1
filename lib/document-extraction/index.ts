/**
 * @fileoverview Document extraction module
 *
 * extractPdf is not re-exported: it loads unpdf, which extractDocument
 * imports lazily for PDF uploads only.
 *
 * @module lib/document-extraction
 */

export type {
  ExtractionResult,
  QualityMetrics,
  ExtractionWarning,
  DocumentMetadata,
  SupportedMimeType,
} from './types'
export { SUPPORTED_MIME_TYPES, isSupportedMimeType } from './types'

export { extractDocx } from './docx-extractor'
export { validateExtractionQuality } from './validators'
export { extractDocument } from './extract-document'
