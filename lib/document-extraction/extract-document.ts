/**
 * @fileoverview Unified document extraction entry point
 *
 * Single function for extracting text from PDF, Word or plain text uploads
 * with quality metrics and structured output.
 *
 * @module lib/document-extraction/extract-document
 */

import { ValidationError } from '@/lib/errors'
import { extractDocx } from './docx-extractor'
import { validateExtractionQuality } from './validators'
import type { ExtractionResult } from './types'

// ============================================================================
// Main Extraction Function
// ============================================================================

/**
 * Extracts text from a document buffer.
 *
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Invalid or corrupt file
 * @throws ValidationError - Unsupported type or no text
 */
export async function extractDocument(
  buffer: Buffer,
  mimeType: string
): Promise<ExtractionResult> {
  let result: ExtractionResult

  switch (mimeType) {
    case 'application/pdf': {
      // unpdf pulls in PDF.js; load it only for PDFs
      const { extractPdf } = await import('./pdf-extractor')
      result = await extractPdf(buffer, buffer.length)
      break
    }

    case 'application/msword':
    case 'application/vnd.openxmlformats-officedocument.wordprocessingml.document':
      result = await extractDocx(buffer, buffer.length)
      break

    case 'text/plain':
      result = extractPlainText(buffer)
      break

    default:
      throw new ValidationError(`Unsupported file type: ${mimeType}`)
  }

  if (result.text.length === 0) {
    logExtractionMetrics(mimeType, result, 'empty')
    throw new ValidationError('No text could be extracted from this document')
  }

  logExtractionMetrics(mimeType, result, 'success')

  return result
}

// ============================================================================
// Plain Text Extraction
// ============================================================================

function extractPlainText(buffer: Buffer): ExtractionResult {
  // Strip a UTF-8 byte order mark
  const text = buffer.toString('utf-8').replace(/^\uFEFF/, '').normalize('NFC').trim()
  const quality = validateExtractionQuality(text, buffer.length)

  return {
    text,
    quality,
    pageCount: 1,
    metadata: {},
  }
}

// ============================================================================
// Logging
// ============================================================================

function logExtractionMetrics(
  mimeType: string,
  result: ExtractionResult,
  outcome: 'success' | 'empty'
): void {
  const metrics = {
    mimeType,
    outcome,
    charCount: result.quality.charCount,
    wordCount: result.quality.wordCount,
    pageCount: result.pageCount,
    confidence: result.quality.confidence,
    warningCount: result.quality.warnings.length,
    warnings: result.quality.warnings.map(w => w.type),
    hasTitle: !!result.metadata.title,
  }

  console.log('[extraction]', JSON.stringify(metrics))
}
