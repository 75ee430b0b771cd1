/**
 * @fileoverview Compliance checks
 * @module app/routes/compliance
 */

import { Router } from "express"
import { z } from "zod"
import { runComplianceChecker } from "@/agents/compliance-checker"
import { createComplianceCheck, listComplianceChecks } from "@/db/queries/compliance-checks"
import { getRegulationById } from "@/db/queries/regulations"
import { listPayload, reply } from "@/lib/api-utils"
import { createHandler } from "@/lib/api/handler"
import { withBody, withRequest } from "@/lib/api/middleware"
import { BudgetTracker } from "@/lib/ai/budget"
import { BadRequestError, NotFoundError } from "@/lib/errors"
import { serializeComplianceCheck } from "../serializers"

export const complianceCheckRequest = z.object({
  regulation_id: z.string(),
  company_policies: z.array(z.string()).default([]),
  specific_requirements: z.array(z.string()).optional(),
})

export const complianceRouter = Router()

/**
 * POST /check_compliance
 * Runs the compliance checker synchronously and stores the result.
 */
complianceRouter.post(
  "/check_compliance",
  createHandler(withBody(complianceCheckRequest), async ({ body }) => {
    const regulation = await getRegulationById(body.regulation_id)
    if (!regulation) throw new NotFoundError("Regulation not found")
    if (regulation.status !== "processed") {
      throw new BadRequestError("Regulation not processed yet")
    }

    const policies = body.company_policies.map((policy) => policy.trim()).filter(Boolean)
    const budgetTracker = new BudgetTracker()

    const { result } = await runComplianceChecker({
      regulationText: regulation.extractedText ?? "",
      companyPolicies: policies,
      regulationAnalysis: regulation.analysisResult,
      regulationType: regulation.regulationType,
      jurisdiction: regulation.jurisdiction,
      specificRequirements: body.specific_requirements,
      budgetTracker,
    })

    const check = await createComplianceCheck({
      regulationId: regulation.id,
      policies,
      specificRequirements: body.specific_requirements ?? null,
      result,
      tokenUsage: budgetTracker.getUsage().total,
    })

    return reply({ check_id: check.id, ...result }, "Compliance check complete")
  })
)

/**
 * GET /compliance_checks
 */
complianceRouter.get(
  "/compliance_checks",
  createHandler(withRequest, async () => {
    const checks = await listComplianceChecks()
    return listPayload(checks.map(serializeComplianceCheck))
  })
)
