/**
 * @fileoverview PDF text extraction with error handling
 *
 * Uses unpdf (serverless PDF.js build), loaded on first use.
 *
 * @module lib/document-extraction/pdf-extractor
 */

import { EncryptedDocumentError, CorruptDocumentError } from '@/lib/errors'
import type { DocumentMetadata, ExtractionResult } from './types'
import { validateExtractionQuality } from './validators'

function metadataString(info: Record<string, unknown>, key: string): string | undefined {
  const value = info[key]
  return typeof value === 'string' ? value : undefined
}

/**
 * Extracts text from PDF buffer. Pages are merged in reading order.
 *
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Invalid or corrupt PDF
 */
export async function extractPdf(
  buffer: Buffer,
  fileSize?: number
): Promise<ExtractionResult> {
  const { extractText, getMeta, getDocumentProxy } = await import('unpdf')

  try {
    const pdf = await getDocumentProxy(new Uint8Array(buffer))

    const { totalPages, text: rawText } = await extractText(pdf, { mergePages: true })
    const text = rawText.normalize('NFC').trim()

    const quality = validateExtractionQuality(text, fileSize ?? buffer.length)
    quality.pageCount = totalPages

    let metadata: DocumentMetadata = {}
    try {
      const { info } = await getMeta(pdf)
      metadata = {
        title: metadataString(info, 'Title'),
        author: metadataString(info, 'Author'),
        creationDate: metadataString(info, 'CreationDate'),
        modificationDate: metadataString(info, 'ModDate'),
      }
    } catch (error) {
      console.warn('[extraction] PDF metadata unreadable', {
        message: error instanceof Error ? error.message : String(error),
      })
    }

    await pdf.destroy()

    return {
      text,
      quality,
      pageCount: totalPages,
      metadata,
    }
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error)

    if (
      errorMessage.includes('password') ||
      errorMessage.includes('encrypted')
    ) {
      throw new EncryptedDocumentError()
    }
    if (
      errorMessage.includes('Invalid PDF') ||
      errorMessage.includes('not a PDF')
    ) {
      throw new CorruptDocumentError()
    }
    // Re-throw unknown errors
    throw error
  }
}
