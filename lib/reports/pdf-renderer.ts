/**
 * @fileoverview PDF report renderer
 *
 * Lays out a {@link ReportContent} on A4 pages with pdf-lib's standard
 * Helvetica fonts. Standard fonts only encode WinAnsi, so every string goes
 * through {@link toWinAnsi} before it is measured or drawn.
 *
 * @module lib/reports/pdf-renderer
 */

import {
  PDFDocument,
  PageSizes,
  StandardFonts,
  rgb,
  type PDFFont,
  type PDFPage,
  type RGB,
} from 'pdf-lib'
import { COMPLIANCE_DISCLAIMER } from '@/agents/prompts'
import type { ReportContent } from './types'

const CM = 72 / 2.54

export const PDF_LAYOUT = {
  margin: 2 * CM,
  bodySize: 10,
  headingSize: 12,
  titleSize: 16,
  lineStep: 14,
  footerSize: 8,
  scoreBarWidth: 200,
  scoreBarHeight: 10,
} as const

const COLORS = {
  text: rgb(0.1, 0.1, 0.1),
  muted: rgb(0.45, 0.45, 0.45),
  barTrack: rgb(0.9, 0.9, 0.9),
  good: rgb(0.18, 0.6, 0.32),
  fair: rgb(0.9, 0.6, 0.1),
  poor: rgb(0.8, 0.2, 0.2),
}

// Non-Latin-1 characters that the WinAnsi code page still carries.
const WIN_ANSI_EXTRAS = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ')

const REPLACEMENTS: Record<string, string> = {
  '\t': '    ',
  '\u00ad': '',
  '\u2010': '-',
  '\u2011': '-',
  '\u2212': '-',
  '\u2192': '->',
  '\u2264': '<=',
  '\u2265': '>=',
}

/**
 * Make a single line drawable with a standard font. Unknown characters
 * become "?".
 */
export function toWinAnsi(text: string): string {
  let out = ''
  for (const char of text.normalize('NFC')) {
    const replacement = REPLACEMENTS[char]
    if (replacement !== undefined) {
      out += replacement
      continue
    }
    const code = char.codePointAt(0) ?? 0
    if ((code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff) || WIN_ANSI_EXTRAS.has(char)) {
      out += char
    } else if (code >= 0x20) {
      out += '?'
    }
  }
  return out
}

/**
 * Greedy word wrap. Words wider than the line are split by character.
 */
export function wrapText(
  text: string,
  maxWidth: number,
  measure: (value: string) => number
): string[] {
  const lines: string[] = []
  let current = ''

  const pushWord = (word: string) => {
    let rest = word
    while (measure(rest) > maxWidth && rest.length > 1) {
      let cut = rest.length - 1
      while (cut > 1 && measure(rest.slice(0, cut)) > maxWidth) cut--
      lines.push(rest.slice(0, cut))
      rest = rest.slice(cut)
    }
    current = rest
  }

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (!current) {
      pushWord(word)
      continue
    }
    const candidate = `${current} ${word}`
    if (measure(candidate) <= maxWidth) {
      current = candidate
    } else {
      lines.push(current)
      pushWord(word)
    }
  }

  if (current || lines.length === 0) lines.push(current)
  return lines
}

export function scoreColor(score: number): RGB {
  if (score >= 80) return COLORS.good
  if (score >= 50) return COLORS.fair
  return COLORS.poor
}

interface Fonts {
  regular: PDFFont
  bold: PDFFont
}

interface LineStyle {
  size?: number
  bold?: boolean
  indent?: number
  color?: RGB
}

/** Cursor over a growing list of pages. */
class PdfLayout {
  private page: PDFPage
  private y: number
  private readonly width: number
  private readonly height: number

  constructor(
    private readonly doc: PDFDocument,
    private readonly fonts: Fonts
  ) {
    this.width = PageSizes.A4[0]
    this.height = PageSizes.A4[1]
    this.page = this.addPage()
    this.y = this.top
  }

  private get top(): number {
    return this.height - PDF_LAYOUT.margin
  }

  private get textWidth(): number {
    return this.width - 2 * PDF_LAYOUT.margin
  }

  private addPage(): PDFPage {
    return this.doc.addPage(PageSizes.A4)
  }

  private ensureSpace(height: number): void {
    if (this.y - height < PDF_LAYOUT.margin) {
      this.page = this.addPage()
      this.y = this.top
    }
  }

  text(value: string, style: LineStyle = {}): void {
    const size = style.size ?? PDF_LAYOUT.bodySize
    const font = style.bold ? this.fonts.bold : this.fonts.regular
    const indent = style.indent ?? 0
    const step = Math.max(PDF_LAYOUT.lineStep, size + 4)

    for (const paragraph of value.split('\n')) {
      const lines = wrapText(toWinAnsi(paragraph), this.textWidth - indent, (s) =>
        font.widthOfTextAtSize(s, size)
      )
      for (const line of lines) {
        this.ensureSpace(step)
        this.y -= step
        if (!line) continue
        this.page.drawText(line, {
          x: PDF_LAYOUT.margin + indent,
          y: this.y,
          size,
          font,
          color: style.color ?? COLORS.text,
        })
      }
    }
  }

  bullet(value: string, indent = 0): void {
    this.text(`- ${value}`, { indent: indent + 8 })
  }

  heading(value: string): void {
    this.spacer()
    this.text(value, { size: PDF_LAYOUT.headingSize, bold: true })
  }

  spacer(lines = 0.5): void {
    this.y -= PDF_LAYOUT.lineStep * lines
  }

  scoreBar(score: number): void {
    const { scoreBarWidth, scoreBarHeight } = PDF_LAYOUT
    this.ensureSpace(PDF_LAYOUT.lineStep * 2)
    this.y -= PDF_LAYOUT.lineStep + 4

    const clamped = Math.min(100, Math.max(0, score))
    const x = PDF_LAYOUT.margin
    this.page.drawRectangle({
      x,
      y: this.y,
      width: scoreBarWidth,
      height: scoreBarHeight,
      color: COLORS.barTrack,
    })
    this.page.drawRectangle({
      x,
      y: this.y,
      width: (scoreBarWidth * clamped) / 100,
      height: scoreBarHeight,
      color: scoreColor(clamped),
    })
    this.page.drawText(`Score: ${formatScore(score)} / 100`, {
      x: x + scoreBarWidth + 10,
      y: this.y + 1,
      size: PDF_LAYOUT.bodySize,
      font: this.fonts.bold,
      color: COLORS.text,
    })
  }

  /** Page numbers go on last, once the page count is known. */
  finish(): void {
    const pages = this.doc.getPages()
    pages.forEach((page, index) => {
      const label = `Page ${index + 1} of ${pages.length}`
      const labelWidth = this.fonts.regular.widthOfTextAtSize(label, PDF_LAYOUT.footerSize)
      page.drawText(label, {
        x: this.width - PDF_LAYOUT.margin - labelWidth,
        y: PDF_LAYOUT.margin / 2,
        size: PDF_LAYOUT.footerSize,
        font: this.fonts.regular,
        color: COLORS.muted,
      })
    })
  }
}

function formatScore(score: number): string {
  return Number.isInteger(score) ? String(score) : score.toFixed(1)
}

export async function renderPdfReport(content: ReportContent): Promise<Uint8Array> {
  const doc = await PDFDocument.create()
  doc.setTitle(`${content.title} - ${toWinAnsi(content.regulation.fileName)}`)
  doc.setSubject('Regulatory compliance report')
  doc.setCreator('compliance-officer')

  const fonts = {
    regular: await doc.embedFont(StandardFonts.Helvetica),
    bold: await doc.embedFont(StandardFonts.HelveticaBold),
  }
  const layout = new PdfLayout(doc, fonts)
  const { regulation } = content

  layout.text(content.title, { size: PDF_LAYOUT.titleSize, bold: true })
  layout.text(`Generated: ${content.generatedAt}`, { color: COLORS.muted })

  layout.heading('Regulation Information')
  layout.text(`Regulation ID: ${regulation.id}`)
  layout.text(`File: ${regulation.fileName}`)
  layout.text(`Type: ${regulation.regulationType}`)
  layout.text(`Jurisdiction: ${regulation.jurisdiction}`)
  if (regulation.effectiveDate) layout.text(`Effective date: ${regulation.effectiveDate}`)
  layout.text(`Uploaded: ${regulation.uploadDate}`)

  layout.heading('Executive Summary')
  for (const line of content.executiveSummary) layout.text(line)

  if (content.overview) {
    const { overview } = content
    layout.heading('Document Overview')
    if (overview.documentOverview) layout.text(overview.documentOverview)
    if (overview.detectedFramework) layout.text(`Detected framework: ${overview.detectedFramework}`)
    if (overview.keyRequirements.length > 0) {
      layout.text('Key requirements:', { bold: true })
      for (const requirement of overview.keyRequirements) layout.bullet(requirement)
    }
    if (overview.obligations.length > 0) {
      layout.text('Obligations:', { bold: true })
      for (const obligation of overview.obligations) layout.bullet(obligation)
    }
  }

  layout.heading('Compliance Checks')
  if (content.checks.length === 0) {
    layout.text('No compliance checks have been run for this regulation.')
  }
  for (const check of content.checks) {
    layout.spacer(0.3)
    layout.text(`Check ${check.id}`, { bold: true })
    layout.text(
      `Score: ${check.score === null ? 'N/A' : formatScore(check.score)} | Status: ${check.status}`
    )
    if (check.gaps.length > 0) {
      layout.text('Gaps:')
      for (const gap of check.gaps) layout.bullet(gap)
    }
    if (check.policies.length > 0) {
      layout.text('Policies checked:')
      for (const policy of check.policies) layout.bullet(policy)
    }
  }

  if (content.bestScore !== null) {
    layout.heading('Best Compliance Score')
    layout.scoreBar(content.bestScore)
  }

  if (content.latestAssessment) {
    const { framework, sections } = content.latestAssessment
    layout.heading('Framework Assessment')
    if (framework) layout.text(`Framework: ${framework}`)
    for (const section of sections) {
      layout.bullet(
        `${section.name} | Status: ${section.status} | Score: ${formatScore(section.score)}`
      )
    }
  }

  if (content.recommendations) {
    layout.heading('Recommendations')
    content.recommendations.forEach((recommendation, index) => {
      layout.text(`${index + 1}. ${recommendation}`, { indent: 8 })
    })
  }

  if (content.tailoredSuggestions.length > 0) {
    layout.heading('Tailored Suggestions')
    for (const suggestion of content.tailoredSuggestions) layout.bullet(suggestion)
  }

  layout.spacer()
  layout.text(COMPLIANCE_DISCLAIMER, { color: COLORS.muted, size: PDF_LAYOUT.footerSize + 1 })

  layout.finish()
  return doc.save()
}
