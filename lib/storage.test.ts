import { describe, it, expect } from "vitest"
import path from "node:path"
import { readFile } from "node:fs/promises"
import { getConfig } from "@/lib/config"
import {
  computeContentHash,
  deleteFile,
  fileExists,
  sanitizeFileName,
  saveReport,
  saveUpload,
} from "./storage"

describe("storage", () => {
  it("sanitizes file names", () => {
    expect(sanitizeFileName("../../etc/passwd")).toBe("passwd")
    expect(sanitizeFileName("C:\\docs\\gdpr text.pdf")).toBe("gdpr text.pdf")
    expect(sanitizeFileName("policy<v2>.txt")).toBe("policy_v2_.txt")
    expect(sanitizeFileName("")).toBe("upload")
  })

  it("saves uploads as {id}_{fileName} under the uploads folder", async () => {
    const saved = await saveUpload("abc", "gdpr.txt", Buffer.from("Article 5"))

    expect(saved.path).toBe(path.join(getConfig().storageDir, "uploads", "abc_gdpr.txt"))
    expect(saved.size).toBe(9)
    expect(await readFile(saved.path, "utf-8")).toBe("Article 5")
  })

  it("writes reports and deletes them idempotently", async () => {
    const saved = await saveReport("report_x.pdf", new Uint8Array([37, 80, 68, 70]))

    expect(saved.path).toBe(path.join(getConfig().storageDir, "reports", "report_x.pdf"))
    expect(await fileExists(saved.path)).toBe(true)

    await deleteFile(saved.path)
    await deleteFile(saved.path)
    expect(await fileExists(saved.path)).toBe(false)
  })

  it("hashes content with sha-256", () => {
    expect(computeContentHash("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    )
  })
})
