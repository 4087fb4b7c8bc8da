import type {
  AggregateResult,
  CellValue,
  CodeBucket,
  CoefficientBucket,
  ColumnMap,
  Dataset,
  Diagnostic,
  LineItem,
  ReferenceSets,
  WorkpackContext,
} from './types'
import { DatasetSchemaError } from './errors'
import { logger, type Logger } from './logger'
import { cellText } from './cells'
import { normalizeSequenceKey, sequencePrefix } from './sequence'
import { classifyRow, type PolicyTable } from './policy'
import { extractIdentifier } from './identifier'
import { hoursToHhmm, minutesToHours, sum } from './hours'
import { readWorkpackContext } from './workpack'
import { inspectRow } from './quality'
import { reconcileIdentifiers } from './reconcile'
import type { CoefficientStrategy } from './coefficient'
import type { BonusStrategy } from './bonus'

export type EngineTables = {
  policies: PolicyTable
  coefficients: CoefficientStrategy
  bonus: BonusStrategy
  reference: ReferenceSets
}

export type EngineOptions = {
  columns: ColumnMap
  secondaryPrefix: string
  highHoursThreshold: number
  delimiter?: string
  classification?: boolean
  workpackDays?: number // overrides the day count derived from start/end dates
  source?: string
  logger?: Logger
}

export function requiredColumns(columns: ColumnMap): string[] {
  return [columns.sequence, columns.title, columns.duration]
}

export function validateDataset(dataset: Dataset, columns: ColumnMap, source = 'dataset'): void {
  const expected = requiredColumns(columns)
  const missing = expected.filter(c => !dataset.columns.includes(c))
  if (missing.length) throw new DatasetSchemaError(source, expected, missing)
}

export function dedupeBySequence<T extends { sequenceKey: string }>(items: T[]): { kept: T[]; dropped: number } {
  const seen = new Set<string>()
  const kept: T[] = []
  for (const it of items){
    if (seen.has(it.sequenceKey)) continue
    seen.add(it.sequenceKey)
    kept.push(it)
  }
  return { kept, dropped: items.length - kept.length }
}

export function summarizeCoefficients(items: LineItem[]): CoefficientBucket[] {
  const map = new Map<number, CoefficientBucket>()
  for (const it of items){
    let b = map.get(it.coefficient)
    if (!b) {
      b = { coefficient: it.coefficient, count: 0, baseHours: 0, adjustedHours: 0 }
      map.set(it.coefficient, b)
    }
    b.count++
    b.baseHours += it.baseHours
    b.adjustedHours += it.adjustedHours
  }
  return [...map.values()].sort((a, b) => a.coefficient - b.coefficient)
}

export function distributeByCode(items: LineItem[], total: number, days?: number): CodeBucket[] {
  const map = new Map<string, number>()
  for (const it of items){
    if (!it.code) continue
    map.set(it.code, (map.get(it.code) ?? 0) + it.adjustedHours)
  }
  return [...map.entries()]
    .map(([code, hours]) => {
      const bucket: CodeBucket = { code, hours, share: total > 0 ? (hours / total) * 100 : 0 }
      if (days && days > 0) bucket.perDay = hours / days
      return bucket
    })
    .sort((a, b) => b.hours - a.hours)
}

type Candidate = {
  sequenceKey: string
  duration: CellValue | undefined
  item: LineItem
}

export function computeWorkpack(dataset: Dataset, tables: EngineTables, options: EngineOptions): AggregateResult {
  const log = options.logger ?? logger
  const { columns } = options
  validateDataset(dataset, columns, options.source)

  const { context, warnings } = readWorkpackContext(dataset, columns)
  const workpack: WorkpackContext = options.workpackDays != null ? { ...context, days: options.workpackDays } : context

  let classify = !!options.classification
  const codeColumn = columns.code
  if (classify && (!codeColumn || !dataset.columns.includes(codeColumn))) {
    classify = false
    warnings.push(codeColumn
      ? `Classification column '${codeColumn}' not found, classification disabled`
      : 'No classification column configured, classification disabled')
  }
  const fnColumn = columns.functionGroup && dataset.columns.includes(columns.functionGroup) ? columns.functionGroup : undefined
  for (const w of warnings) log.warn('engine', w)

  let excluded = 0
  const candidates: Candidate[] = []
  dataset.rows.forEach((raw, row) => {
    const sequenceKey = normalizeSequenceKey(raw[columns.sequence])
    const cls = classifyRow(sequenceKey, tables.policies)
    if (!cls.shouldProcess) { excluded++; return }

    const title = cellText(raw[columns.title])
    const identifier = extractIdentifier(title, cls.rule, options.delimiter)
    const functionGroup = fnColumn ? cellText(raw[fnColumn]) || undefined : undefined
    const baseHours = minutesToHours(raw[columns.duration])
    const coefficient = tables.coefficients.resolve({ sequenceKey, identifier, functionGroup }, workpack)
    const item: LineItem = {
      row,
      sequenceKey,
      prefix: sequencePrefix(sequenceKey),
      title,
      identifier,
      shouldCheckReference: cls.shouldCheckReference,
      baseHours,
      coefficient,
      adjustedHours: baseHours * coefficient,
    }
    if (classify && codeColumn) item.code = cellText(raw[codeColumn]) || undefined
    if (functionGroup) item.functionGroup = functionGroup
    candidates.push({ sequenceKey, duration: raw[columns.duration], item })
  })

  // first occurrence of a sequence key carries its hours; repeats would double-count
  const { kept, dropped } = dedupeBySequence(candidates)
  const items = kept.map(c => c.item)

  const diagnostics: Diagnostic[] = []
  for (const c of kept){
    const it = c.item
    diagnostics.push(...inspectRow({ row: it.row, sequenceKey: it.sequenceKey, title: it.title, duration: c.duration, identifier: it.identifier }))
    if (classify && !it.code) diagnostics.push({ row: it.row, sequenceKey: it.sequenceKey, kind: 'missing-code', message: 'Classification code is empty' })
  }

  const totalBaseHours = sum(items.map(i => i.baseHours))
  const rowAdjustedHours = sum(items.map(i => i.adjustedHours))
  // one constant per work package, added once
  const bonus = tables.bonus.resolve(workpack)
  const totalAdjustedHours = rowAdjustedHours + bonus.total

  const mismatches = reconcileIdentifiers(
    items.filter(i => i.shouldCheckReference).map(i => ({ sequenceKey: i.sequenceKey, identifier: i.identifier })),
    tables.reference,
    options.secondaryPrefix
  )
  const highHours = items.filter(i => i.adjustedHours > options.highHoursThreshold)

  log.info('engine', `Rows ${dataset.rows.length}: processed ${items.length}, excluded ${excluded}, duplicates dropped ${dropped}`, { source: options.source })
  log.info('engine', `Total base ${hoursToHhmm(totalBaseHours)}, adjusted ${hoursToHhmm(totalAdjustedHours)} (bonus ${hoursToHhmm(bonus.total)})`)
  if (mismatches.length) log.info('engine', `${mismatches.length} identifier(s) not found in reference data`)
  if (diagnostics.length) log.debug('engine', `${diagnostics.length} row diagnostic(s)`)

  return {
    workpack,
    items,
    totalBaseHours,
    rowAdjustedHours,
    bonus,
    totalAdjustedHours,
    formatted: {
      totalBase: hoursToHhmm(totalBaseHours),
      totalAdjusted: hoursToHhmm(totalAdjustedHours),
      bonus: hoursToHhmm(bonus.total),
    },
    counts: { input: dataset.rows.length, excluded, deduplicated: dropped, processed: items.length },
    coefficientSummary: summarizeCoefficients(items),
    classification: classify ? distributeByCode(items, rowAdjustedHours, workpack.days) : undefined,
    highHours: { threshold: options.highHoursThreshold, items: highHours },
    mismatches,
    diagnostics,
    warnings,
  }
}
