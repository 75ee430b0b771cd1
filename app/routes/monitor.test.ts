import { describe, it, expect, vi } from "vitest"
import request from "supertest"
import { listMonitorSources } from "@/db/queries/monitoring"
import { createTestSource } from "@/test/factories"
import { createApp } from "../create-app"

const { runMonitorMock } = vi.hoisted(() => ({ runMonitorMock: vi.fn() }))

vi.mock("@/lib/monitoring", () => ({ runMonitor: runMonitorMock }))

const app = createApp()

describe("POST /monitor/sources", () => {
  it("adds a source from a JSON body", async () => {
    const res = await request(app).post("/monitor/sources").send({
      name: "EU notices",
      url: "https://regulator.example/eu",
      jurisdiction: "EU",
      regulation_type: "gdpr",
      due_days: 30,
    })

    expect(res.status).toBe(200)
    expect(res.body.message).toBe("Source added")

    const [source] = await listMonitorSources()
    expect(source).toMatchObject({
      id: res.body.data.id,
      name: "EU notices",
      url: "https://regulator.example/eu",
      jurisdiction: "EU",
      regulationType: "gdpr",
      dueDays: 30,
      enabled: true,
    })
  })

  it("reads query parameters and applies defaults", async () => {
    const res = await request(app)
      .post("/monitor/sources")
      .query({ name: "Bulletin", url: "https://regulator.example/bulletin", due_days: "7" })

    expect(res.status).toBe(200)
    const [source] = await listMonitorSources()
    expect(source).toMatchObject({
      jurisdiction: "global",
      regulationType: "general",
      dueDays: 7,
    })
  })

  it("rejects an invalid url", async () => {
    const res = await request(app)
      .post("/monitor/sources")
      .send({ name: "Broken", url: "not a url" })

    expect(res.status).toBe(400)
    expect(res.body.error.code).toBe("VALIDATION_ERROR")
    expect(res.body.error.details[0].field).toBe("url")
  })
})

describe("GET /monitor/sources", () => {
  it("lists sources", async () => {
    const source = await createTestSource({ name: "Gazette" })

    const res = await request(app).get("/monitor/sources")

    expect(res.body.data.count).toBe(1)
    expect(res.body.data.items[0]).toMatchObject({
      id: source.id,
      name: "Gazette",
      enabled: true,
      due_days: null,
    })
  })
})

describe("POST /monitor/run", () => {
  it("returns the run summary", async () => {
    runMonitorMock.mockResolvedValueOnce({ changes: 1, checked: 3 })

    const res = await request(app).post("/monitor/run")

    expect(res.status).toBe(200)
    expect(res.body).toEqual({
      success: true,
      message: "Monitor completed",
      data: { changes: 1, checked: 3 },
    })
  })
})
