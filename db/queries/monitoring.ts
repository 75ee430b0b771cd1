/**
 * @fileoverview Monitor sources and their observed versions
 * @module db/queries/monitoring
 */

import { asc, desc, eq } from "drizzle-orm"
import { db } from "../client"
import {
  monitorSources,
  sourceVersions,
  type MonitorSource,
  type NewMonitorSource,
  type NewSourceVersion,
  type SourceVersion,
} from "../schema/monitoring"
import { isUuid } from "./utils"

export async function createMonitorSource(values: NewMonitorSource): Promise<MonitorSource> {
  const [source] = await db.insert(monitorSources).values(values).returning()
  return source
}

export async function listMonitorSources(): Promise<MonitorSource[]> {
  return db.select().from(monitorSources).orderBy(asc(monitorSources.createdAt))
}

export async function getMonitorSourceById(sourceId: string): Promise<MonitorSource | null> {
  if (!isUuid(sourceId)) return null

  const [source] = await db
    .select()
    .from(monitorSources)
    .where(eq(monitorSources.id, sourceId))
    .limit(1)

  return source ?? null
}

export async function listEnabledMonitorSources(): Promise<MonitorSource[]> {
  return db
    .select()
    .from(monitorSources)
    .where(eq(monitorSources.enabled, true))
    .orderBy(asc(monitorSources.createdAt))
}

export async function getLatestSourceVersion(sourceId: string): Promise<SourceVersion | null> {
  const [version] = await db
    .select()
    .from(sourceVersions)
    .where(eq(sourceVersions.sourceId, sourceId))
    .orderBy(desc(sourceVersions.fetchedAt))
    .limit(1)

  return version ?? null
}

export async function createSourceVersion(values: NewSourceVersion): Promise<SourceVersion> {
  const [version] = await db.insert(sourceVersions).values(values).returning()
  return version
}
