import { useState, type FormEvent } from "react"
import { toast } from "sonner"
import { checkCompliance, type ComplianceCheckResponse } from "../lib/api-client"
import { parsePolicies } from "../lib/policies"

export function ComplianceCheck() {
  const [regulationId, setRegulationId] = useState("")
  const [policiesText, setPoliciesText] = useState("")
  const [running, setRunning] = useState(false)
  const [result, setResult] = useState<ComplianceCheckResponse | null>(null)

  async function handleSubmit(event: FormEvent) {
    event.preventDefault()
    setRunning(true)
    try {
      setResult(await checkCompliance(regulationId.trim(), parsePolicies(policiesText)))
    } catch (e) {
      setResult(null)
      toast.error(e instanceof Error ? e.message : "Compliance check failed")
    } finally {
      setRunning(false)
    }
  }

  return (
    <section className="panel">
      <form onSubmit={handleSubmit} className="form">
        <label>
          Regulation ID
          <input
            value={regulationId}
            onChange={(e) => setRegulationId(e.target.value)}
            required
          />
        </label>
        <label>
          Company policies (one per line)
          <textarea
            rows={6}
            value={policiesText}
            onChange={(e) => setPoliciesText(e.target.value)}
          />
        </label>
        <button type="submit" disabled={running}>
          {running ? "Checking..." : "Check compliance"}
        </button>
      </form>

      {result && (
        <div className="result">
          <p>
            Score: <strong>{result.compliance_score}</strong> / 100
          </p>
          <p>Status: {result.overall_status}</p>

          {result.gaps.length === 0 ? (
            <p>No gaps detected. Fully compliant!</p>
          ) : (
            <table>
              <thead>
                <tr>
                  <th>Requirement</th>
                  <th>Gap</th>
                  <th>Impact</th>
                </tr>
              </thead>
              <tbody>
                {result.gaps.map((gap) => (
                  <tr key={gap.gap_id}>
                    <td>{gap.requirement}</td>
                    <td>{gap.gap_description}</td>
                    <td>{gap.impact_level}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          )}

          {result.recommendations.length > 0 && (
            <ol>
              {result.recommendations.map((recommendation) => (
                <li key={recommendation}>{recommendation}</li>
              ))}
            </ol>
          )}
        </div>
      )}
    </section>
  )
}
