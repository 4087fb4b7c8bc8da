import type { ColumnMap, Dataset, WorkpackContext } from './types'
import { cellText, toDate } from './cells'
import { inclusiveDays } from './hours'

/**
 * A package label such as `"B787-HKG-A06"` carries the aircraft type before the
 * first dash and the check type after the last one. A label with no dash is
 * used whole for both keys.
 */
export function splitWorkpackLabel(label: string): { primary?: string; secondary?: string } {
  const t = label.trim()
  if (!t) return {}
  if (!t.includes('-')) return { primary: t, secondary: t }
  const parts = t.split('-')
  const primary = parts[0].trim()
  const secondary = parts[parts.length - 1].trim()
  return { primary: primary || undefined, secondary: secondary || undefined }
}

// label and dates are identical on every row, so the first row is read
export function readWorkpackContext(dataset: Dataset, columns: ColumnMap): { context: WorkpackContext; warnings: string[] } {
  const warnings: string[] = []
  const context: WorkpackContext = {}
  const first = dataset.rows[0]
  const has = (c?: string): c is string => !!c && dataset.columns.includes(c)

  if (!first) {
    warnings.push('Dataset is empty, no work-package label or dates available')
    return { context, warnings }
  }

  if (has(columns.label)) {
    const label = cellText(first[columns.label])
    if (label) Object.assign(context, { label }, splitWorkpackLabel(label))
  } else if (columns.label) {
    warnings.push(`Label column '${columns.label}' not found, bonus lookup disabled`)
  }

  if (has(columns.startDate) && has(columns.endDate)) {
    const start = toDate(first[columns.startDate])
    const end = toDate(first[columns.endDate])
    if (start && end) {
      context.startDate = start
      context.endDate = end
      context.days = inclusiveDays(start, end)
    } else {
      warnings.push('Could not parse work-package start/end dates')
    }
  }
  return { context, warnings }
}
