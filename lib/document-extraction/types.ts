/**
 * @fileoverview Document extraction type definitions
 * @module lib/document-extraction/types
 */

export interface ExtractionWarning {
  type: 'docx_warning' | 'embedded_images' | 'low_confidence' | 'short_text'
  message: string
}

export interface QualityMetrics {
  /** Total character count after normalization */
  charCount: number
  /** Estimated word count */
  wordCount: number
  /** Number of pages (PDF only, 1 otherwise) */
  pageCount: number
  /** Extraction confidence 0-1 based on text density */
  confidence: number
  /** Warnings from extraction process */
  warnings: ExtractionWarning[]
}

export interface DocumentMetadata {
  title?: string
  author?: string
  creationDate?: string
  modificationDate?: string
}

export interface ExtractionResult {
  /** Extracted text, NFC-normalized and trimmed */
  text: string
  quality: QualityMetrics
  /** Page count from source document */
  pageCount: number
  /** Document metadata if available */
  metadata: DocumentMetadata
}

/** Upload content types accepted for regulations */
export const SUPPORTED_MIME_TYPES = [
  'application/pdf',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'text/plain',
] as const

export type SupportedMimeType = (typeof SUPPORTED_MIME_TYPES)[number]

export function isSupportedMimeType(mimeType: string): mimeType is SupportedMimeType {
  return SUPPORTED_MIME_TYPES.some((type) => type === mimeType)
}
