import { useEffect, useState } from "react"
import { toast } from "sonner"
import type { ReportFormat } from "@/lib/reports/types"
import {
  downloadReportUrl,
  generateProfessionalReport,
  generateReport,
} from "../lib/api-client"

export function ReportsPanel() {
  const [regulationId, setRegulationId] = useState("")
  const [includeRecommendations, setIncludeRecommendations] = useState(true)
  const [format, setFormat] = useState<ReportFormat>("pdf")
  const [busy, setBusy] = useState(false)
  const [previewUrl, setPreviewUrl] = useState<string | null>(null)
  const [downloadUrl, setDownloadUrl] = useState<string | null>(null)

  // Object URLs hold the PDF in memory until revoked
  useEffect(() => {
    return () => {
      if (previewUrl) URL.revokeObjectURL(previewUrl)
    }
  }, [previewUrl])

  async function preview() {
    setBusy(true)
    try {
      const pdf = await generateProfessionalReport(regulationId.trim(), includeRecommendations)
      setPreviewUrl(URL.createObjectURL(pdf))
      toast.success("Report generated")
    } catch (e) {
      toast.error(e instanceof Error ? e.message : "Report generation failed")
    } finally {
      setBusy(false)
    }
  }

  async function generate() {
    setBusy(true)
    try {
      const { report_id } = await generateReport(
        regulationId.trim(),
        format,
        includeRecommendations
      )
      setDownloadUrl(downloadReportUrl(report_id))
      toast.success("Report generated")
    } catch (e) {
      toast.error(e instanceof Error ? e.message : "Report generation failed")
    } finally {
      setBusy(false)
    }
  }

  return (
    <section className="panel">
      <div className="form">
        <label>
          Regulation ID
          <input value={regulationId} onChange={(e) => setRegulationId(e.target.value)} />
        </label>
        <label className="inline">
          <input
            type="checkbox"
            checked={includeRecommendations}
            onChange={(e) => setIncludeRecommendations(e.target.checked)}
          />
          Include recommendations
        </label>
        <label>
          Format
          <select
            value={format}
            onChange={(e) => setFormat(e.target.value === "xlsx" ? "xlsx" : "pdf")}
          >
            <option value="pdf">PDF</option>
            <option value="xlsx">Excel</option>
          </select>
        </label>
        <div className="actions">
          <button type="button" onClick={preview} disabled={busy || !regulationId.trim()}>
            Generate &amp; Preview PDF
          </button>
          <button type="button" onClick={generate} disabled={busy || !regulationId.trim()}>
            Generate report
          </button>
        </div>
      </div>

      {downloadUrl && (
        <p>
          <a href={downloadUrl}>Download report</a>
        </p>
      )}

      {previewUrl && (
        <div className="result">
          <a href={previewUrl} download="compliance_report.pdf">
            Download PDF
          </a>
          <iframe title="Report preview" src={previewUrl} className="preview" />
        </div>
      )}
    </section>
  )
}
