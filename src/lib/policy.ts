import type { ExtractionRule, PolicyEntry, RowClass } from './types'
import { sequencePrefix } from './sequence'

export type PolicyTable = {
  readonly entries: ReadonlyMap<string, PolicyEntry>
  readonly defaultRule: ExtractionRule
}

export function createPolicyTable(
  entries: Record<string, Partial<PolicyEntry>> = {},
  defaultRule: ExtractionRule = 'delimiter'
): PolicyTable {
  const map = new Map<string, PolicyEntry>()
  for (const [key, e] of Object.entries(entries)){
    map.set(sequencePrefix(key), { policy: e.policy ?? 'include', extraction: e.extraction ?? defaultRule })
  }
  return Object.freeze({ entries: map, defaultRule })
}

export function lookupPolicy(table: PolicyTable, prefix: string): PolicyEntry {
  return table.entries.get(sequencePrefix(prefix)) ?? { policy: 'include', extraction: table.defaultRule }
}

export function classifyRow(sequenceKey: string | number, table: PolicyTable): RowClass {
  const entry = lookupPolicy(table, sequencePrefix(sequenceKey))
  if (entry.policy === 'exclude') return { shouldProcess: false, shouldCheckReference: false, rule: entry.extraction }
  return { shouldProcess: true, shouldCheckReference: entry.policy === 'include', rule: entry.extraction }
}
