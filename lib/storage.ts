/**
 * @fileoverview Local file storage
 *
 * Uploaded regulations and generated reports live under `STORAGE_DIR`:
 *
 * ```
 * <storage>/uploads/<regulationId>_<fileName>
 * <storage>/reports/report_<regulationId>_<YYYYMMDD_HHMMSS_mmm>.<ext>
 * ```
 *
 * Paths stored in the database are the ones returned here.
 *
 * @module lib/storage
 */

import { createHash } from "node:crypto"
import { mkdir, readFile, rm, stat, writeFile } from "node:fs/promises"
import path from "node:path"
import { getConfig } from "@/lib/config"

export type StorageFolder = "uploads" | "reports"

/**
 * Resolve a path inside a storage folder, creating the folder on first use.
 */
async function folderPath(folder: StorageFolder): Promise<string> {
  const dir = path.join(getConfig().storageDir, folder)
  await mkdir(dir, { recursive: true })
  return dir
}

/**
 * Strip directory components and characters that are unsafe in file names.
 */
export function sanitizeFileName(fileName: string): string {
  const base = path.basename(fileName.replace(/\\/g, "/"))
  const cleaned = base.replace(/[^\w.\- ]+/g, "_").trim()
  return cleaned.length > 0 ? cleaned : "upload"
}

/**
 * Store an uploaded regulation file as `{id}_{fileName}`.
 */
export async function saveUpload(
  regulationId: string,
  fileName: string,
  content: Buffer
): Promise<{ path: string; size: number }> {
  const dir = await folderPath("uploads")
  const filePath = path.join(dir, `${regulationId}_${sanitizeFileName(fileName)}`)
  await writeFile(filePath, content)
  return { path: filePath, size: content.length }
}

/**
 * Write a generated report file.
 */
export async function saveReport(
  fileName: string,
  content: Uint8Array
): Promise<{ path: string; size: number }> {
  const dir = await folderPath("reports")
  const filePath = path.join(dir, sanitizeFileName(fileName))
  await writeFile(filePath, content)
  return { path: filePath, size: content.byteLength }
}

export async function readStoredFile(filePath: string): Promise<Buffer> {
  return readFile(filePath)
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath)
    return info.isFile()
  } catch (error) {
    if (isNotFound(error)) return false
    throw error
  }
}

/**
 * Delete a stored file. Deleting a missing file is not an error.
 */
export async function deleteFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true })
}

/**
 * SHA-256 hex digest, used to detect changed monitor sources.
 */
export function computeContentHash(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex")
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}
