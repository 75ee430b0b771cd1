import { describe, it, expect, vi, beforeEach } from "vitest"
import request from "supertest"
import { SAMPLE_COMPLIANCE_RESULT } from "@/agents/testing/fixtures"
import { listComplianceChecks } from "@/db/queries/compliance-checks"
import { AnalysisFailedError } from "@/lib/errors"
import { createTestCheck, createTestRegulation } from "@/test/factories"
import { createApp } from "../create-app"

const { runComplianceCheckerMock } = vi.hoisted(() => ({
  runComplianceCheckerMock: vi.fn(),
}))

vi.mock("@/agents/compliance-checker", () => ({
  runComplianceChecker: runComplianceCheckerMock,
}))

const app = createApp()

describe("POST /check_compliance", () => {
  beforeEach(() => {
    runComplianceCheckerMock.mockReset()
    runComplianceCheckerMock.mockResolvedValue({
      result: SAMPLE_COMPLIANCE_RESULT,
      usedFallback: false,
      tokenUsage: { inputTokens: 100, outputTokens: 20 },
    })
  })

  it("checks trimmed policies and stores the result", async () => {
    const regulation = await createTestRegulation()

    const res = await request(app)
      .post("/check_compliance")
      .send({
        regulation_id: regulation.id,
        company_policies: ["  Encrypt laptops  ", "", "Report breaches within 72 hours"],
        specific_requirements: ["Art. 3"],
      })

    expect(res.status).toBe(200)
    expect(res.body.message).toBe("Compliance check complete")
    expect(res.body.data).toMatchObject({
      overall_status: "partially_compliant",
      compliance_score: 55,
    })

    expect(runComplianceCheckerMock).toHaveBeenCalledWith(
      expect.objectContaining({
        companyPolicies: ["Encrypt laptops", "Report breaches within 72 hours"],
        regulationType: "gdpr",
        jurisdiction: "EU",
        specificRequirements: ["Art. 3"],
      })
    )

    const [stored] = await listComplianceChecks()
    expect(stored.id).toBe(res.body.data.check_id)
    expect(stored.regulationId).toBe(regulation.id)
    expect(stored.policies).toEqual(["Encrypt laptops", "Report breaches within 72 hours"])
    expect(stored.specificRequirements).toEqual(["Art. 3"])
  })

  it("defaults to no policies", async () => {
    const regulation = await createTestRegulation()

    const res = await request(app).post("/check_compliance").send({ regulation_id: regulation.id })

    expect(res.status).toBe(200)
    expect(runComplianceCheckerMock.mock.calls[0][0].companyPolicies).toEqual([])
  })

  it("returns 404 for an unknown regulation", async () => {
    const res = await request(app)
      .post("/check_compliance")
      .send({ regulation_id: "00000000-0000-4000-8000-000000000000" })

    expect(res.status).toBe(404)
    expect(res.body.error).toEqual({ code: "NOT_FOUND", message: "Regulation not found" })
  })

  it("rejects regulations that are still processing", async () => {
    const regulation = await createTestRegulation({ status: "processing", analysisResult: null })

    const res = await request(app).post("/check_compliance").send({ regulation_id: regulation.id })

    expect(res.status).toBe(400)
    expect(res.body.error).toEqual({ code: "BAD_REQUEST", message: "Regulation not processed yet" })
    expect(runComplianceCheckerMock).not.toHaveBeenCalled()
  })

  it("requires a regulation id", async () => {
    const res = await request(app).post("/check_compliance").send({ company_policies: [] })

    expect(res.status).toBe(400)
    expect(res.body.error.code).toBe("VALIDATION_ERROR")
    expect(res.body.error.details[0].field).toBe("regulation_id")
  })

  it("reports model failures without storing a check", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {})
    const regulation = await createTestRegulation()
    runComplianceCheckerMock.mockRejectedValueOnce(new AnalysisFailedError())

    const res = await request(app).post("/check_compliance").send({ regulation_id: regulation.id })

    expect(res.status).toBe(500)
    expect(res.body.error.code).toBe("ANALYSIS_FAILED")
    expect(await listComplianceChecks()).toHaveLength(0)
  })
})

describe("GET /compliance_checks", () => {
  it("lists stored checks", async () => {
    const regulation = await createTestRegulation()
    const check = await createTestCheck(regulation.id)

    const res = await request(app).get("/compliance_checks")

    expect(res.status).toBe(200)
    expect(res.body.data.count).toBe(1)
    expect(res.body.data.items[0]).toMatchObject({
      id: check.id,
      regulation_id: regulation.id,
      result: { compliance_score: 55 },
    })
  })
})
