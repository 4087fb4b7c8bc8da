import type { BonusContribution, BonusEntry, BonusResolution, BonusSource, WorkpackContext } from './types'
import { logger, type Logger } from './logger'

export type BonusTable = {
  // secondary (check type) → primary (aircraft type) → accumulated hours
  readonly values: ReadonlyMap<string, ReadonlyMap<string, number>>
  readonly sources: readonly BonusSource[]
}

export function isActiveEntry(e: BonusEntry): boolean {
  return e.active !== false
}

function usable(e: BonusEntry): boolean {
  return isActiveEntry(e) && !!e.primary.trim() && !!e.secondary.trim() && Number.isFinite(e.hours)
}

/**
 * Every source contributes to the same table. Two sources naming the same
 * (primary, secondary) pair add up; neither replaces the other.
 */
export function buildBonusTable(sources: BonusSource[], log: Logger = logger): BonusTable {
  const values = new Map<string, Map<string, number>>()
  let loaded = 0
  let skipped = 0
  for (const source of sources){
    for (const e of source.entries){
      if (!usable(e)) { skipped++; continue }
      const primary = e.primary.trim()
      const secondary = e.secondary.trim()
      let inner = values.get(secondary)
      if (!inner) { inner = new Map(); values.set(secondary, inner) }
      inner.set(primary, (inner.get(primary) ?? 0) + e.hours)
      loaded++
    }
  }
  log.info('bonus', `Loaded bonus table from ${sources.length} source(s)`, { entries: loaded, skipped, secondaryKeys: values.size })
  const copy = sources.map(s => ({ name: s.name, entries: s.entries.map(e => ({ ...e })) }))
  return Object.freeze({ values, sources: copy })
}

export function lookupBonus(table: BonusTable, primary: string | undefined, secondary: string | undefined, log: Logger = logger): number {
  const p = primary?.trim()
  const s = secondary?.trim()
  const hours = p && s ? table.values.get(s)?.get(p) : undefined
  if (hours == null) {
    log.info('bonus', `No bonus hours found for primary='${p ?? ''}', secondary='${s ?? ''}'`)
    return 0
  }
  return hours
}

// audit view only: the total always comes from lookupBonus
export function bonusBreakdown(table: BonusTable, primary: string | undefined, secondary: string | undefined): BonusContribution[] {
  const p = primary?.trim()
  const s = secondary?.trim()
  if (!p || !s) return []
  const out: BonusContribution[] = []
  for (const source of table.sources){
    const matched = source.entries.filter(e => usable(e) && e.primary.trim() === p && e.secondary.trim() === s)
    if (matched.length) out.push({ source: source.name, hours: matched.reduce((a, e) => a + e.hours, 0) })
  }
  return out
}

export type BonusStrategy = {
  readonly name: string
  resolve(context: WorkpackContext): BonusResolution
}

export function noBonus(): BonusStrategy {
  return { name: 'none', resolve: () => ({ total: 0, breakdown: [] }) }
}

export function tableBonus(table: BonusTable, log: Logger = logger): BonusStrategy {
  return {
    name: 'table',
    resolve(context) {
      const total = lookupBonus(table, context.primary, context.secondary, log)
      const breakdown = total ? bonusBreakdown(table, context.primary, context.secondary) : []
      if (total) log.info('bonus', `Work-package bonus +${total} h for primary='${context.primary}', secondary='${context.secondary}'`, { sources: breakdown.length })
      return { total, breakdown }
    },
  }
}
