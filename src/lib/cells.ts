import type { CellValue } from './types'

const TRUE_WORDS = new Set(['true', 'yes', 'y', '1'])

export function toCellValue(v: unknown): CellValue {
  if (v == null) return null
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean' || v instanceof Date) return v
  return String(v)
}

export function cellText(v: CellValue | undefined): string {
  if (v == null) return ''
  if (typeof v === 'number' && Number.isNaN(v)) return ''
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? '' : v.toISOString()
  return String(v).trim()
}

/** Strict numeric parse: `'12abc'` is not a number, an empty cell is `null`. */
export function parseNumber(v: CellValue | undefined): number | null {
  if (v == null || typeof v === 'boolean' || v instanceof Date) return null
  if (typeof v === 'number') return Number.isFinite(v) ? v : null
  const s = v.trim()
  if (!s) return null
  const n = Number(s)
  return Number.isFinite(n) ? n : null
}

export function parseFlag(v: CellValue | undefined): boolean {
  if (typeof v === 'boolean') return v
  if (typeof v === 'number') return v === 1
  if (typeof v === 'string') return TRUE_WORDS.has(v.trim().toLowerCase())
  return false
}

export function toDate(v: CellValue | undefined): Date | undefined {
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? undefined : v
  if (typeof v === 'string' && v.trim()) {
    const t = Date.parse(v.trim())
    return Number.isNaN(t) ? undefined : new Date(t)
  }
  return undefined
}
