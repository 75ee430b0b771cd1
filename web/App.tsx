import { useState } from "react"
import { Toaster } from "sonner"
import { ComplianceCheck } from "./components/compliance-check"
import { MonitoringPanel } from "./components/monitoring-panel"
import { ReportsPanel } from "./components/reports-panel"
import { UploadRegulation } from "./components/upload-regulation"

const TABS = [
  { id: "upload", label: "Upload Regulation", Panel: UploadRegulation },
  { id: "check", label: "Compliance Check", Panel: ComplianceCheck },
  { id: "reports", label: "Reports", Panel: ReportsPanel },
  { id: "monitor", label: "Monitoring", Panel: MonitoringPanel },
] as const

type TabId = (typeof TABS)[number]["id"]

export function App() {
  const [active, setActive] = useState<TabId>("upload")

  return (
    <main className="app">
      <h1>Compliance Officer</h1>
      <nav role="tablist">
        {TABS.map((tab) => (
          <button
            key={tab.id}
            role="tab"
            aria-selected={tab.id === active}
            onClick={() => setActive(tab.id)}
          >
            {tab.label}
          </button>
        ))}
      </nav>
      {TABS.map(({ id, Panel }) => (
        <div key={id} role="tabpanel" hidden={id !== active}>
          <Panel />
        </div>
      ))}
      <Toaster richColors position="top-right" />
    </main>
  )
}
