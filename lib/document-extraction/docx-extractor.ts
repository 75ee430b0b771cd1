/**
 * @fileoverview Word document text extraction with warnings capture
 * @module lib/document-extraction/docx-extractor
 */

import mammoth from 'mammoth'
import { CorruptDocumentError } from '@/lib/errors'
import type { ExtractionResult, ExtractionWarning } from './types'
import { validateExtractionQuality } from './validators'

/**
 * Extracts raw text from a Word document.
 *
 * mammoth reads the OOXML (.docx) format. Legacy binary .doc files are
 * accepted at upload but mammoth cannot open them, so they fail here.
 *
 * @throws CorruptDocumentError - Invalid, corrupt or legacy binary file
 */
export async function extractDocx(
  buffer: Buffer,
  fileSize?: number
): Promise<ExtractionResult> {
  let result: Awaited<ReturnType<typeof mammoth.extractRawText>>
  try {
    result = await mammoth.extractRawText({ buffer })
  } catch {
    throw new CorruptDocumentError(
      'Could not read this Word document. Save it as .docx or PDF and upload it again.'
    )
  }

  const text = result.value.normalize('NFC').trim()
  const quality = validateExtractionQuality(text, fileSize ?? buffer.length)

  // Capture mammoth warnings (embedded objects, images, etc.)
  const docxWarnings: ExtractionWarning[] = result.messages
    .filter((m) => m.type === 'warning')
    .map((m) => ({
      type: 'docx_warning' as const,
      message: m.message,
    }))

  const hasImages = docxWarnings.some(
    (w) => w.message.includes('image') || w.message.includes('picture')
  )

  if (hasImages) {
    docxWarnings.push({
      type: 'embedded_images',
      message: 'Document contains images that may have text',
    })
    quality.confidence = Math.min(quality.confidence, 0.8)
  }

  quality.warnings.push(...docxWarnings)

  return {
    text,
    quality,
    pageCount: 1, // Word documents have no intrinsic pages
    metadata: {}, // mammoth doesn't extract metadata
  }
}
