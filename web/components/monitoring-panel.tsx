import { useState, type FormEvent } from "react"
import { toast } from "sonner"
import type { MonitorSourceResponse } from "@/app/serializers"
import { addMonitorSource, listMonitorSources, runMonitor } from "../lib/api-client"

export function MonitoringPanel() {
  const [name, setName] = useState("")
  const [url, setUrl] = useState("")
  const [jurisdiction, setJurisdiction] = useState("global")
  const [regulationType, setRegulationType] = useState("general")
  const [sources, setSources] = useState<MonitorSourceResponse[]>([])
  const [running, setRunning] = useState(false)

  async function refresh() {
    try {
      setSources(await listMonitorSources())
    } catch (e) {
      toast.error(e instanceof Error ? e.message : "Could not load sources")
    }
  }

  async function handleAdd(event: FormEvent) {
    event.preventDefault()
    try {
      await addMonitorSource({ name, url, jurisdiction, regulation_type: regulationType })
      toast.success("Source added")
      setName("")
      setUrl("")
      await refresh()
    } catch (e) {
      toast.error(e instanceof Error ? e.message : "Could not add source")
    }
  }

  async function handleRun() {
    setRunning(true)
    try {
      const { changes, checked } = await runMonitor()
      toast.success(`Checked ${checked} sources, ${changes} changed`)
    } catch (e) {
      toast.error(e instanceof Error ? e.message : "Monitor run failed")
    } finally {
      setRunning(false)
    }
  }

  return (
    <section className="panel">
      <form onSubmit={handleAdd} className="form">
        <label>
          Name
          <input value={name} onChange={(e) => setName(e.target.value)} required />
        </label>
        <label>
          URL
          <input type="url" value={url} onChange={(e) => setUrl(e.target.value)} required />
        </label>
        <label>
          Jurisdiction
          <input value={jurisdiction} onChange={(e) => setJurisdiction(e.target.value)} />
        </label>
        <label>
          Regulation type
          <input value={regulationType} onChange={(e) => setRegulationType(e.target.value)} />
        </label>
        <button type="submit">Add source</button>
      </form>

      <div className="actions">
        <button type="button" onClick={refresh}>
          Refresh sources
        </button>
        <button type="button" onClick={handleRun} disabled={running}>
          {running ? "Running..." : "Run monitor now"}
        </button>
      </div>

      {sources.length > 0 && (
        <ul>
          {sources.map((source) => (
            <li key={source.id}>
              <strong>{source.name}</strong> <a href={source.url}>{source.url}</a> (
              {source.jurisdiction}, {source.regulation_type})
            </li>
          ))}
        </ul>
      )}
    </section>
  )
}
