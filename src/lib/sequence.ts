import type { CellValue } from './types'
import { cellText } from './cells'

export function normalizeSequenceKey(raw: CellValue | undefined): string {
  if (raw instanceof Date || typeof raw === 'boolean') return ''
  return cellText(raw)
}

/** `"4.39"` → `"4"`. Keys are compared upper-cased so config entries are case-insensitive. */
export function sequencePrefix(key: string | number): string {
  return String(key).split('.')[0].trim().toUpperCase()
}

export function isWellFormedSequence(key: string): boolean {
  return /^\d+\.\d+$/.test(key.trim())
}
