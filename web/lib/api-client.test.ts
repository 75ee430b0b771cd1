import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import {
  ApiError,
  checkCompliance,
  downloadReportUrl,
  generateReport,
  listRegulations,
  uploadRegulation,
} from "./api-client"

const fetchMock = vi.fn()

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  })
}

describe("api-client", () => {
  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal("fetch", fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it("posts uploads as multipart form data", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        success: true,
        message: "File received. Processing in background.",
        data: { regulation_id: "reg-1", status: "processing" },
      })
    )
    const file = new File(["Article 1"], "act.txt", { type: "text/plain" })

    const result = await uploadRegulation(file, { regulationType: "gdpr", jurisdiction: "EU" })

    expect(result).toEqual({
      data: { regulation_id: "reg-1", status: "processing" },
      message: "File received. Processing in background.",
    })
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe("/upload_regulation")
    expect(init.method).toBe("POST")
    expect(init.body.get("regulation_type")).toBe("gdpr")
    expect(init.body.get("jurisdiction")).toBe("EU")
    expect(init.body.has("effective_date")).toBe(false)
  })

  it("unwraps list payloads", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ success: true, message: "OK", data: { items: [{ id: "a" }], count: 1 } })
    )

    expect(await listRegulations()).toEqual([{ id: "a" }])
  })

  it("sends compliance checks as JSON", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ success: true, message: "Compliance check complete", data: { check_id: "c1" } })
    )

    await checkCompliance("reg-1", ["Encrypt laptops"])

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe("/check_compliance")
    expect(JSON.parse(init.body)).toEqual({
      regulation_id: "reg-1",
      company_policies: ["Encrypt laptops"],
    })
  })

  it("passes the report format in the query", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        success: true,
        message: "Report generated",
        data: { report_id: "r1", file_path: "/tmp/r1.xlsx" },
      })
    )

    const result = await generateReport("reg-1", "xlsx", false)

    expect(fetchMock.mock.calls[0][0]).toBe("/generate_report?format=xlsx")
    expect(result.report_id).toBe("r1")
  })

  it("raises the server's error message", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(
        { success: false, error: { code: "BAD_REQUEST", message: "Regulation not processed yet" } },
        400
      )
    )

    const error = await checkCompliance("reg-1", []).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ApiError)
    expect(error).toMatchObject({
      message: "Regulation not processed yet",
      status: 400,
      code: "BAD_REQUEST",
    })
  })

  it("falls back to the status text for non-JSON errors", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response("upstream down", { status: 502, statusText: "Bad Gateway" })
    )

    await expect(listRegulations()).rejects.toThrow("Bad Gateway")
  })

  it("builds download links", () => {
    expect(downloadReportUrl("r 1")).toBe("/download_report/r%201")
  })
})
