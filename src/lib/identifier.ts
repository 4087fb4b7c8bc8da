import type { ExtractionRule } from './types'

/**
 * `paren`:     "24-045-00 (00) - ITEM 1"       → "24-045-00"
 * `delimiter`: "EO-2024-001 / CABIN AIR SYSTEM" → "EO-2024-001"
 * `verbatim`:  the whole title, trimmed
 */
export function extractIdentifier(title: string, rule: ExtractionRule, delimiter = '/'): string {
  const cut = rule === 'paren' ? '(' : rule === 'delimiter' ? delimiter : ''
  if (!cut) return title.trim()
  const at = title.indexOf(cut)
  return (at >= 0 ? title.slice(0, at) : title).trim()
}
