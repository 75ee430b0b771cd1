import { describe, it, expect } from 'vitest'
import ExcelJS from 'exceljs'
import { buildReportContent } from './content'
import { renderXlsxReport } from './xlsx-renderer'
import {
  DETAILED_CHECK,
  FALLBACK_CHECK,
  GENERATED_AT,
  REPORT_REGULATION,
} from './testing/fixtures'
import { DEFAULT_REPORT_OPTIONS, type ReportOptions } from './types'

async function load(options: ReportOptions): Promise<ExcelJS.Workbook> {
  const content = buildReportContent(
    REPORT_REGULATION,
    [DETAILED_CHECK, FALLBACK_CHECK],
    options,
    GENERATED_AT
  )
  const bytes = await renderXlsxReport(content)
  const data = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(data).set(bytes)

  const workbook = new ExcelJS.Workbook()
  await workbook.xlsx.load(data)
  return workbook
}

function rows(sheet: ExcelJS.Worksheet | undefined): unknown[][] {
  const values: unknown[][] = []
  sheet?.eachRow((row) => {
    const cells: unknown[] = []
    row.eachCell({ includeEmpty: true }, (cell) => {
      cells.push(cell.value)
    })
    values.push(cells)
  })
  return values
}

describe('renderXlsxReport', () => {
  it('writes every sheet by default', async () => {
    const workbook = await load(DEFAULT_REPORT_OPTIONS)

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual([
      'Regulation',
      'Checks',
      'Gaps',
      'Recommendations',
      'Policies',
    ])
  })

  it('fills the regulation and checks sheets', async () => {
    const workbook = await load(DEFAULT_REPORT_OPTIONS)

    expect(rows(workbook.getWorksheet('Regulation'))).toEqual([
      ['field', 'value'],
      ['id', REPORT_REGULATION.id],
      ['filename', 'data-protection.txt'],
      ['type', 'gdpr'],
      ['jurisdiction', 'EU'],
      ['uploaded', '2026-01-02T03:04:05Z'],
    ])
    expect(rows(workbook.getWorksheet('Checks'))).toEqual([
      ['check_id', 'score', 'status'],
      ['check-1', 55, 'partially_compliant'],
      ['check-2', 60, 'partially_compliant'],
    ])
  })

  it('lists gaps and policies per check', async () => {
    const workbook = await load(DEFAULT_REPORT_OPTIONS)

    const gaps = rows(workbook.getWorksheet('Gaps'))
    expect(gaps).toHaveLength(3)
    expect(gaps[2]).toEqual(['check-1', 'Breach notification', 'No breach register', 'medium', 'medium'])

    expect(rows(workbook.getWorksheet('Policies'))).toEqual([
      ['check_id', 'policy'],
      ['check-1', DETAILED_CHECK.policies[0]],
      ['check-1', DETAILED_CHECK.policies[1]],
    ])
  })

  it('omits excluded sheets', async () => {
    const workbook = await load({
      includeRecommendations: false,
      includeGapAnalysis: false,
      includePolicyMapping: false,
    })

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(['Regulation', 'Checks'])
  })
})
