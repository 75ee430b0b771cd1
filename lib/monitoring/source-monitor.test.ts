import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { eq } from "drizzle-orm"
import { SAMPLE_REGULATION_ANALYSIS } from "@/agents/testing/fixtures"
import { regulations, sourceVersions } from "@/db/schema"
import { computeContentHash } from "@/lib/storage"
import { createTestSource, createTestSourceVersion } from "@/test/factories"
import { testDb } from "@/test/test-db"
import { checkSource, extractTitle, runMonitor } from "./source-monitor"

const { runRegulationAnalystMock, fetchMock } = vi.hoisted(() => ({
  runRegulationAnalystMock: vi.fn(),
  fetchMock: vi.fn(),
}))

vi.mock("@/agents/regulation-analyst", () => ({
  runRegulationAnalyst: runRegulationAnalystMock,
}))

const PAGE = "<html><head><title> Data Act\n amendments </title></head><body>Article 1</body></html>"

function page(body: string, status = 200): Response {
  return new Response(body, { status })
}

describe("extractTitle", () => {
  it("collapses whitespace inside the title", () => {
    expect(extractTitle(PAGE)).toBe("Data Act amendments")
  })

  it("returns null for plain text", () => {
    expect(extractTitle("Article 1. Scope.")).toBeNull()
  })
})

describe("checkSource", () => {
  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock)
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "error").mockImplementation(() => {})
    fetchMock.mockReset()
    runRegulationAnalystMock.mockReset()
    runRegulationAnalystMock.mockResolvedValue({
      analysis: SAMPLE_REGULATION_ANALYSIS,
      usedFallback: false,
      tokenUsage: { inputTokens: 10, outputTokens: 5 },
    })
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it("stores a version and an analysed regulation for new content", async () => {
    const source = await createTestSource({
      name: "eu-data-act",
      jurisdiction: "EU",
      regulationType: "gdpr",
    })
    fetchMock.mockResolvedValueOnce(page(PAGE))

    expect(await checkSource(source)).toBe(true)

    const [version] = await testDb
      .select()
      .from(sourceVersions)
      .where(eq(sourceVersions.sourceId, source.id))
    expect(version.hash).toBe(computeContentHash(PAGE))
    expect(version.title).toBe("Data Act amendments")
    expect(version.snippet).toBe(PAGE.slice(0, 200))

    const [regulation] = await testDb
      .select()
      .from(regulations)
      .where(eq(regulations.sourceId, source.id))
    expect(regulation.fileName).toBe("monitor_eu-data-act.txt")
    expect(regulation.status).toBe("processed")
    expect(regulation.extractedText).toBe(PAGE)
    expect(regulation.analysisResult).toEqual(SAMPLE_REGULATION_ANALYSIS)
    expect(version.regulationId).toBe(regulation.id)

    expect(runRegulationAnalystMock).toHaveBeenCalledWith(
      expect.objectContaining({
        text: PAGE,
        regulationType: "gdpr",
        jurisdiction: "EU",
        agent: "monitorAnalyst",
      })
    )
  })

  it("retries a change whose analysis failed on the next check", async () => {
    const source = await createTestSource()
    runRegulationAnalystMock.mockRejectedValueOnce(new Error("model unavailable"))
    fetchMock.mockResolvedValueOnce(page(PAGE)).mockResolvedValueOnce(page(PAGE))

    expect(await checkSource(source)).toBe(false)
    const versionsAfterFailure = await testDb
      .select()
      .from(sourceVersions)
      .where(eq(sourceVersions.sourceId, source.id))
    expect(versionsAfterFailure).toEqual([])

    expect(await checkSource(source)).toBe(true)
    expect(runRegulationAnalystMock).toHaveBeenCalledTimes(2)

    const stored = await testDb
      .select()
      .from(regulations)
      .where(eq(regulations.sourceId, source.id))
    expect(stored).toHaveLength(1)
    const versions = await testDb
      .select()
      .from(sourceVersions)
      .where(eq(sourceVersions.sourceId, source.id))
    expect(versions.map((v) => v.regulationId)).toEqual([stored[0].id])
  })

  it("sends at most 10 000 characters to the analyst", async () => {
    const source = await createTestSource()
    const long = "x".repeat(12_000)
    fetchMock.mockResolvedValueOnce(page(long))

    await checkSource(source)

    expect(runRegulationAnalystMock.mock.calls[0][0].text).toHaveLength(10_000)
  })

  it("reports no change when the hash matches the latest version", async () => {
    const source = await createTestSource()
    await createTestSourceVersion(source.id, { hash: computeContentHash(PAGE) })
    fetchMock.mockResolvedValueOnce(page(PAGE))

    expect(await checkSource(source)).toBe(false)
    expect(runRegulationAnalystMock).not.toHaveBeenCalled()
  })

  it("treats error responses as no change", async () => {
    const source = await createTestSource()
    fetchMock.mockResolvedValueOnce(page("Service Unavailable", 503))

    expect(await checkSource(source)).toBe(false)

    const versions = await testDb
      .select()
      .from(sourceVersions)
      .where(eq(sourceVersions.sourceId, source.id))
    expect(versions).toEqual([])
  })
})

describe("runMonitor", () => {
  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock)
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "error").mockImplementation(() => {})
    fetchMock.mockReset()
    runRegulationAnalystMock.mockResolvedValue({
      analysis: SAMPLE_REGULATION_ANALYSIS,
      usedFallback: false,
      tokenUsage: { inputTokens: 10, outputTokens: 5 },
    })
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it("checks enabled sources only and counts changes", async () => {
    const changed = await createTestSource()
    await createTestSource({ enabled: false })
    const failing = await createTestSource()

    fetchMock.mockImplementation(async (url: string) =>
      url === changed.url ? page(PAGE) : page("Not Found", 404)
    )

    expect(await runMonitor()).toEqual({ changes: 1, checked: 2 })
    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(fetchMock.mock.calls.map((call) => call[0])).toContain(failing.url)
  })
})
