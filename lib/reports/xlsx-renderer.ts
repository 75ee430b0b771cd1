/**
 * @fileoverview Spreadsheet report renderer (exceljs)
 *
 * @module lib/reports/xlsx-renderer
 */

import ExcelJS from 'exceljs'
import type { ReportContent } from './types'

type Column = { header: string; key: string; width: number }

function addSheet(
  workbook: ExcelJS.Workbook,
  name: string,
  columns: Column[],
  rows: Array<Record<string, string | number | null>>
): void {
  const sheet = workbook.addWorksheet(name)
  sheet.columns = columns
  sheet.getRow(1).font = { bold: true }
  sheet.views = [{ state: 'frozen', ySplit: 1 }]
  for (const row of rows) sheet.addRow(row)
}

export async function renderXlsxReport(content: ReportContent): Promise<Uint8Array> {
  const workbook = new ExcelJS.Workbook()
  workbook.creator = 'compliance-officer'
  workbook.created = new Date(content.generatedAt)

  const { regulation } = content

  addSheet(
    workbook,
    'Regulation',
    [
      { header: 'field', key: 'field', width: 16 },
      { header: 'value', key: 'value', width: 60 },
    ],
    [
      { field: 'id', value: regulation.id },
      { field: 'filename', value: regulation.fileName },
      { field: 'type', value: regulation.regulationType },
      { field: 'jurisdiction', value: regulation.jurisdiction },
      { field: 'uploaded', value: regulation.uploadDate },
    ]
  )

  addSheet(
    workbook,
    'Checks',
    [
      { header: 'check_id', key: 'check_id', width: 38 },
      { header: 'score', key: 'score', width: 10 },
      { header: 'status', key: 'status', width: 22 },
    ],
    content.checks.map((check) => ({
      check_id: check.id,
      score: check.score,
      status: check.status,
    }))
  )

  if (content.options.includeGapAnalysis) {
    addSheet(
      workbook,
      'Gaps',
      [
        { header: 'check_id', key: 'check_id', width: 38 },
        { header: 'requirement', key: 'requirement', width: 40 },
        { header: 'gap', key: 'gap', width: 60 },
        { header: 'impact', key: 'impact', width: 10 },
        { header: 'effort', key: 'effort', width: 10 },
      ],
      content.gapRows.map((row) => ({
        check_id: row.checkId,
        requirement: row.requirement,
        gap: row.gap,
        impact: row.impact,
        effort: row.effort,
      }))
    )
  }

  if (content.recommendations) {
    addSheet(
      workbook,
      'Recommendations',
      [
        { header: '#', key: 'rank', width: 6 },
        { header: 'recommendation', key: 'recommendation', width: 90 },
      ],
      content.recommendations.map((recommendation, index) => ({
        rank: index + 1,
        recommendation,
      }))
    )
  }

  if (content.options.includePolicyMapping) {
    addSheet(
      workbook,
      'Policies',
      [
        { header: 'check_id', key: 'check_id', width: 38 },
        { header: 'policy', key: 'policy', width: 90 },
      ],
      content.checks.flatMap((check) =>
        check.policies.map((policy) => ({ check_id: check.id, policy }))
      )
    )
  }

  const buffer = await workbook.xlsx.writeBuffer()
  return new Uint8Array(buffer)
}
