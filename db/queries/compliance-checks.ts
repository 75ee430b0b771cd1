/**
 * @fileoverview Compliance check persistence
 * @module db/queries/compliance-checks
 */

import { asc, desc, eq } from "drizzle-orm"
import { db } from "../client"
import {
  complianceChecks,
  type ComplianceCheck,
  type NewComplianceCheck,
} from "../schema/compliance-checks"
import { isUuid } from "./utils"

export async function createComplianceCheck(
  values: NewComplianceCheck
): Promise<ComplianceCheck> {
  const [check] = await db.insert(complianceChecks).values(values).returning()
  return check
}

/**
 * All checks, newest first.
 */
export async function listComplianceChecks(): Promise<ComplianceCheck[]> {
  return db.select().from(complianceChecks).orderBy(desc(complianceChecks.createdAt))
}

/**
 * Checks of one regulation in the order they were run. Reports rely on this
 * order: the last check with a detailed assessment drives the section view.
 */
export async function getChecksForRegulation(regulationId: string): Promise<ComplianceCheck[]> {
  if (!isUuid(regulationId)) return []

  return db
    .select()
    .from(complianceChecks)
    .where(eq(complianceChecks.regulationId, regulationId))
    .orderBy(asc(complianceChecks.createdAt))
}
