import type { WorkpackContext } from './types'
import { sequencePrefix } from './sequence'
import { logger, type Logger } from './logger'

export type CoefficientTable = {
  readonly factors: ReadonlyMap<string, number>
  readonly defaultCoefficient: number
  readonly skipList: readonly string[]
  readonly skipCoefficient: number
}

export function createCoefficientTable(opts: {
  factors?: Record<string, number>
  defaultCoefficient?: number
  skipList?: string[]
  skipCoefficient?: number
} = {}): CoefficientTable {
  const factors = new Map<string, number>()
  for (const [key, f] of Object.entries(opts.factors ?? {})) factors.set(sequencePrefix(key), f)
  return Object.freeze({
    factors,
    defaultCoefficient: opts.defaultCoefficient ?? 1,
    skipList: (opts.skipList ?? []).map(s => s.trim().toLowerCase()).filter(Boolean),
    skipCoefficient: opts.skipCoefficient ?? 1,
  })
}

/**
 * Skip-list entries are matched as case-insensitive substrings of the identifier
 * and win over the prefix factor. Only the major prefix of the key is consulted.
 */
export function resolveSequenceCoefficient(table: CoefficientTable, sequenceKey: string | number, identifier?: string): number {
  if (identifier && table.skipList.length) {
    const id = identifier.toLowerCase()
    if (table.skipList.some(s => id.includes(s))) return table.skipCoefficient
  }
  if (typeof sequenceKey === 'number' && Number.isNaN(sequenceKey)) return table.defaultCoefficient
  return table.factors.get(sequencePrefix(sequenceKey)) ?? table.defaultCoefficient
}

// checkGroup → aircraft → function group → factor
export type TypeCoefficientTable = ReadonlyMap<string, ReadonlyMap<string, ReadonlyMap<string, number>>>

export type TypeCoefficientRow = {
  checkGroup: string
  aircraft: string
  functionGroup: string
  coefficient: number
  active?: boolean
}

export function buildTypeCoefficientTable(rows: TypeCoefficientRow[], log: Logger = logger): TypeCoefficientTable {
  const table = new Map<string, Map<string, Map<string, number>>>()
  let loaded = 0
  let inactive = 0
  for (const r of rows){
    if (r.active === false) { inactive++; continue }
    const group = r.checkGroup.trim()
    const aircraft = r.aircraft.trim()
    const fn = r.functionGroup.trim()
    if (!group || !aircraft || !fn) continue
    if (!Number.isFinite(r.coefficient) || r.coefficient <= 0) {
      log.warn('coefficient', `Invalid type coefficient ${r.coefficient} for ${group}/${aircraft}/${fn}`)
      continue
    }
    let byAircraft = table.get(group)
    if (!byAircraft) { byAircraft = new Map(); table.set(group, byAircraft) }
    let byFn = byAircraft.get(aircraft)
    if (!byFn) { byFn = new Map(); byAircraft.set(aircraft, byFn) }
    byFn.set(fn, r.coefficient)
    loaded++
  }
  log.info('coefficient', `Loaded ${loaded} type coefficient(s)`, { checkGroups: table.size, inactive })
  return table
}

export function lookupTypeCoefficient(
  table: TypeCoefficientTable,
  aircraft: string | undefined,
  checkGroup: string | undefined,
  functionGroup: string | undefined
): number {
  if (!aircraft || !checkGroup || !functionGroup) return 1
  return table.get(checkGroup.trim())?.get(aircraft.trim())?.get(functionGroup.trim()) ?? 1
}

export type CoefficientInput = {
  sequenceKey: string | number
  identifier?: string
  functionGroup?: string
}

export type CoefficientStrategyName = 'none' | 'sequence' | 'type' | 'hybrid'

export type CoefficientStrategy = {
  readonly name: CoefficientStrategyName
  resolve(row: CoefficientInput, context: WorkpackContext): number
}

export function unitCoefficients(): CoefficientStrategy {
  return { name: 'none', resolve: () => 1 }
}

export function sequenceCoefficients(table: CoefficientTable): CoefficientStrategy {
  return { name: 'sequence', resolve: row => resolveSequenceCoefficient(table, row.sequenceKey, row.identifier) }
}

// work-package check type (e.g. "A06") → check group (e.g. "A-CHECK"); unmapped types are their own group
export function checkGroupFor(checkType: string | undefined, checkGroups: Record<string, string>): string | undefined {
  if (!checkType) return undefined
  return checkGroups[checkType] ?? checkType
}

export function typeCoefficients(table: TypeCoefficientTable, checkGroups: Record<string, string> = {}): CoefficientStrategy {
  return {
    name: 'type',
    resolve: (row, context) => lookupTypeCoefficient(table, context.primary, checkGroupFor(context.secondary, checkGroups), row.functionGroup),
  }
}

export function hybridCoefficients(sequence: CoefficientStrategy, type: CoefficientStrategy): CoefficientStrategy {
  return { name: 'hybrid', resolve: (row, context) => sequence.resolve(row, context) * type.resolve(row, context) }
}

export function selectCoefficientStrategy(
  name: CoefficientStrategyName,
  parts: { sequence: CoefficientTable; type?: TypeCoefficientTable; checkGroups?: Record<string, string> }
): CoefficientStrategy {
  const type = typeCoefficients(parts.type ?? new Map(), parts.checkGroups)
  switch (name) {
    case 'none': return unitCoefficients()
    case 'sequence': return sequenceCoefficients(parts.sequence)
    case 'type': return type
    case 'hybrid': return hybridCoefficients(sequenceCoefficients(parts.sequence), type)
  }
}
