import { useEffect, useState } from "react"
import type { RegulationResponse } from "@/app/serializers"
import { getRegulation } from "../lib/api-client"

/** Poll interval (ms) while a regulation is being processed */
export const POLL_INTERVAL_MS = 3000

type RegulationStatus = RegulationResponse["status"]

const TERMINAL_STATUSES: RegulationStatus[] = ["processed", "error"]

export interface RegulationStatusState {
  status: RegulationStatus | null
  regulation: RegulationResponse | null
  isPolling: boolean
  error: string | null
}

const IDLE: RegulationStatusState = {
  status: null,
  regulation: null,
  isPolling: false,
  error: null,
}

/**
 * Polls `GET /regulations/:id` until the background analysis finishes.
 * Stops on a terminal status or on a failed request.
 */
export function useRegulationStatus(
  regulationId: string | null,
  intervalMs = POLL_INTERVAL_MS
): RegulationStatusState {
  const [state, setState] = useState<RegulationStatusState>(IDLE)

  useEffect(() => {
    if (!regulationId) {
      setState(IDLE)
      return
    }

    let cancelled = false
    let timer: ReturnType<typeof setTimeout> | undefined

    setState({ ...IDLE, status: "processing", isPolling: true })

    const poll = async () => {
      try {
        const regulation = await getRegulation(regulationId)
        if (cancelled) return

        const done = TERMINAL_STATUSES.includes(regulation.status)
        setState({ status: regulation.status, regulation, isPolling: !done, error: null })
        if (!done) timer = setTimeout(poll, intervalMs)
      } catch (e) {
        if (cancelled) return
        setState((prev) => ({
          ...prev,
          isPolling: false,
          error: e instanceof Error ? e.message : "Unknown error",
        }))
      }
    }

    timer = setTimeout(poll, 0)

    return () => {
      cancelled = true
      if (timer) clearTimeout(timer)
    }
  }, [regulationId, intervalMs])

  return state
}
