/**
 * @fileoverview Extraction quality validation utilities
 * @module lib/document-extraction/validators
 */

import type { QualityMetrics, ExtractionWarning } from './types'

const SHORT_TEXT_LENGTH = 200
const MIN_TEXT_TO_SIZE_RATIO = 0.001 // Very low = likely scanned

/**
 * Computes quality metrics for extracted text.
 *
 * Short output and large files with almost no text are flagged; a scanned
 * PDF typically shows up as the latter.
 */
export function validateExtractionQuality(
  text: string,
  fileSize: number
): QualityMetrics {
  const charCount = text.length
  const wordCount = text.split(/\s+/).filter(Boolean).length
  const ratio = fileSize > 0 ? charCount / fileSize : 0
  const warnings: ExtractionWarning[] = []

  if (charCount > 0 && charCount < SHORT_TEXT_LENGTH) {
    warnings.push({
      type: 'short_text',
      message: 'Very little text was extracted; the analysis may be shallow',
    })
  } else if (ratio < MIN_TEXT_TO_SIZE_RATIO && fileSize > 100_000) {
    // Large file with very little text - suspicious
    warnings.push({
      type: 'low_confidence',
      message: 'Document has unusually low text density (scanned pages are not read)',
    })
  }

  // Higher ratio = more confident it's actual text
  const confidence = charCount === 0 ? 0 : Math.min(1, ratio * 100)

  return {
    charCount,
    wordCount,
    pageCount: 1, // Caller should override for PDFs
    confidence,
    warnings,
  }
}
