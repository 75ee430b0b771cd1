import { useState, type FormEvent } from "react"
import { toast } from "sonner"
import type { RegulationResponse } from "@/app/serializers"
import { useRegulationStatus } from "../hooks/use-regulation-status"
import { listRegulations, uploadRegulation } from "../lib/api-client"

const ACCEPTED_TYPES = ".pdf,.doc,.docx,.txt"

export function UploadRegulation() {
  const [file, setFile] = useState<File | null>(null)
  const [regulationType, setRegulationType] = useState("gdpr")
  const [jurisdiction, setJurisdiction] = useState("EU")
  const [effectiveDate, setEffectiveDate] = useState("")
  const [uploading, setUploading] = useState(false)
  const [regulationId, setRegulationId] = useState<string | null>(null)
  const [regulations, setRegulations] = useState<RegulationResponse[]>([])
  const { status, regulation, error } = useRegulationStatus(regulationId)

  async function handleSubmit(event: FormEvent) {
    event.preventDefault()
    if (!file) {
      toast.error("Choose a file to upload")
      return
    }

    setUploading(true)
    try {
      const { data, message } = await uploadRegulation(file, {
        regulationType,
        jurisdiction,
        effectiveDate: effectiveDate || undefined,
      })
      setRegulationId(data.regulation_id)
      toast.success(message)
    } catch (e) {
      toast.error(e instanceof Error ? e.message : "Upload failed")
    } finally {
      setUploading(false)
    }
  }

  async function refresh() {
    try {
      setRegulations(await listRegulations())
    } catch (e) {
      toast.error(e instanceof Error ? e.message : "Could not load regulations")
    }
  }

  return (
    <section className="panel">
      <form onSubmit={handleSubmit} className="form">
        <label>
          Regulation document
          <input
            type="file"
            accept={ACCEPTED_TYPES}
            onChange={(e) => setFile(e.target.files?.[0] ?? null)}
          />
        </label>
        <label>
          Regulation type
          <input value={regulationType} onChange={(e) => setRegulationType(e.target.value)} />
        </label>
        <label>
          Jurisdiction
          <input value={jurisdiction} onChange={(e) => setJurisdiction(e.target.value)} />
        </label>
        <label>
          Effective date
          <input
            type="date"
            value={effectiveDate}
            onChange={(e) => setEffectiveDate(e.target.value)}
          />
        </label>
        <button type="submit" disabled={uploading}>
          {uploading ? "Uploading..." : "Upload"}
        </button>
      </form>

      {regulationId && (
        <div className="result" aria-live="polite">
          <p>
            Regulation ID: <code>{regulationId}</code>
          </p>
          <p>Status: {status}</p>
          {status === "error" && regulation?.error_message && (
            <p className="error">{regulation.error_message}</p>
          )}
          {regulation?.analysis_result?.regulation_summary && (
            <p>{regulation.analysis_result.regulation_summary}</p>
          )}
          {error && <p className="error">{error}</p>}
        </div>
      )}

      <button type="button" onClick={refresh}>
        Refresh Regulations
      </button>
      {regulations.length > 0 && (
        <table>
          <thead>
            <tr>
              <th>ID</th>
              <th>File</th>
              <th>Type</th>
              <th>Jurisdiction</th>
              <th>Status</th>
            </tr>
          </thead>
          <tbody>
            {regulations.map((r) => (
              <tr key={r.id}>
                <td>
                  <code>{r.id}</code>
                </td>
                <td>{r.filename}</td>
                <td>{r.regulation_type}</td>
                <td>{r.jurisdiction}</td>
                <td>{r.status}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  )
}
