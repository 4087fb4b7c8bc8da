import type { CellValue } from './types'
import { parseNumber } from './cells'

const DAY_MS = 24 * 60 * 60 * 1000

export function minutesToHours(v: CellValue | undefined): number {
  const minutes = parseNumber(v)
  return minutes == null ? 0 : minutes / 60
}

// blank cells are "no duration", anything else that fails to parse is worth a diagnostic
export function isUnparseableDuration(v: CellValue | undefined): boolean {
  if (v == null) return false
  if (typeof v === 'string' && !v.trim()) return false
  return parseNumber(v) == null
}

export function hoursToHhmm(hours: number): string {
  if (!(hours >= 0)) return '00:00'
  const total = Math.round(hours * 60)
  const h = Math.floor(total / 60)
  const m = total % 60
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`
}

/** Inclusive day count: a package starting and ending on the same date lasts one day. */
export function inclusiveDays(start: Date, end: Date): number {
  const a = Date.UTC(start.getFullYear(), start.getMonth(), start.getDate())
  const b = Date.UTC(end.getFullYear(), end.getMonth(), end.getDate())
  return Math.round((b - a) / DAY_MS) + 1
}

export function sum(a: number[]): number { return a.reduce((x, y) => x + y, 0) }
