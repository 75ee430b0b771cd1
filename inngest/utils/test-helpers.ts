/**
 * @fileoverview Test Utilities for Inngest Functions
 *
 * Mock events and step objects for running function handlers without an
 * Inngest server.
 *
 * @module inngest/utils/test-helpers
 */

import type { InngestEvents } from "../types"

/**
 * Result from a step.run() call, tracked for assertions.
 */
export interface StepResult<T = unknown> {
  name: string
  result: T
  /** Execution order */
  sequence: number
}

export interface MockStep {
  run: <T>(name: string, fn: () => Promise<T> | T) => Promise<T>
}

export interface MockStepController {
  step: MockStep
  getStepResults: () => StepResult[]
  /** Names of the steps that ran, in order */
  getStepNames: () => string[]
  reset: () => void
}

/**
 * Create a typed mock event.
 *
 * @example
 * const event = createMockEvent("regulation/uploaded", testEventData.regulationUploaded())
 */
export function createMockEvent<K extends keyof InngestEvents>(
  name: K,
  data: InngestEvents[K]["data"]
): {
  name: K
  data: InngestEvents[K]["data"]
  ts: number
  id: string
} {
  return {
    name,
    data,
    ts: Date.now(),
    id: crypto.randomUUID(),
  }
}

/**
 * Create a mock step object. run() executes the step immediately and
 * records its result; a throwing step is recorded with no result.
 *
 * @example
 * const { step, getStepNames } = createMockStep()
 * await handler({ event, step })
 * expect(getStepNames()).toEqual(["extract-text", "delete-upload"])
 */
export function createMockStep(): MockStepController {
  const stepResults: StepResult[] = []
  let sequenceCounter = 0

  const step: MockStep = {
    async run<T>(name: string, fn: () => Promise<T> | T): Promise<T> {
      const sequence = sequenceCounter++
      try {
        const result = await fn()
        stepResults.push({ name, result, sequence })
        return result
      } catch (error) {
        stepResults.push({ name, result: undefined, sequence })
        throw error
      }
    },
  }

  return {
    step,
    getStepResults: () => [...stepResults],
    getStepNames: () => stepResults.map((r) => r.name),
    reset: () => {
      stepResults.length = 0
      sequenceCounter = 0
    },
  }
}

/**
 * Assert that a step with the given name was executed.
 */
export function expectStepExecuted(stepResults: StepResult[], expectedName: string): void {
  const found = stepResults.find((r) => r.name === expectedName)
  if (!found) {
    const executedSteps = stepResults.map((r) => r.name).join(", ")
    throw new Error(
      `Expected step "${expectedName}" to be executed. ` +
        `Executed steps: [${executedSteps || "none"}]`
    )
  }
}

/**
 * Test event data with valid defaults.
 */
export const testEventData = {
  regulationUploaded: (
    overrides: Partial<InngestEvents["regulation/uploaded"]["data"]> = {}
  ): InngestEvents["regulation/uploaded"]["data"] => ({
    regulationId: crypto.randomUUID(),
    filePath: "/tmp/uploads/regulation.txt",
    mimeType: "text/plain",
    regulationType: "general",
    jurisdiction: "global",
    ...overrides,
  }),
}
