import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import type { AggregateResult, BonusSource, Dataset, ReferenceSets } from './types'
import { buildTables, columnMap, type Settings } from './settings'
import { buildBonusTable, noBonus, tableBonus } from './bonus'
import { buildTypeCoefficientTable, selectCoefficientStrategy, type TypeCoefficientRow } from './coefficient'
import { computeWorkpack, type EngineOptions, type EngineTables } from './engine'
import { emptyReferenceSets } from './reconcile'
import { readBonusSources, readDataset, readReferenceSets, readTypeCoefficientRows, type WorkbookData } from './xlsx'
import { getErrorMessage } from './errors'
import { logger, type Logger } from './logger'

export type EngineInputs = {
  reference?: ReferenceSets
  bonusSources?: BonusSource[]
  typeRows?: TypeCoefficientRow[]
  workpackDays?: number
  source?: string
}

export function createEngine(settings: Settings, inputs: EngineInputs = {}, log: Logger = logger): { tables: EngineTables; options: EngineOptions } {
  const { policies, coefficients } = buildTables(settings)
  const wantsType = settings.coefficients.strategy === 'type' || settings.coefficients.strategy === 'hybrid'
  const tables: EngineTables = {
    policies,
    coefficients: selectCoefficientStrategy(settings.coefficients.strategy, {
      sequence: coefficients,
      type: wantsType ? buildTypeCoefficientTable(inputs.typeRows ?? [], log) : undefined,
      checkGroups: settings.coefficients.checkGroups,
    }),
    bonus: settings.bonus.enabled && inputs.bonusSources?.length
      ? tableBonus(buildBonusTable(inputs.bonusSources, log), log)
      : noBonus(),
    reference: inputs.reference ?? emptyReferenceSets(),
  }
  const options: EngineOptions = {
    columns: columnMap(settings),
    secondaryPrefix: settings.reference.secondaryPrefix,
    highHoursThreshold: settings.thresholds.highHours,
    delimiter: settings.extraction.delimiter,
    classification: settings.classification.enabled,
    workpackDays: inputs.workpackDays,
    source: inputs.source,
    logger: log,
  }
  return { tables, options }
}

export function processDataset(dataset: Dataset, settings: Settings, inputs: EngineInputs = {}, log: Logger = logger): AggregateResult {
  const { tables, options } = createEngine(settings, inputs, log)
  return computeWorkpack(dataset, tables, options)
}

export type WorkbookSources = {
  input: WorkbookData
  inputName?: string
  reference?: WorkbookData
  bonus?: WorkbookData
  typeCoefficients?: WorkbookData
  workpackDays?: number
}

export function processWorkpackWorkbook(sources: WorkbookSources, settings: Settings, log: Logger = logger): AggregateResult {
  const name = sources.inputName ?? 'input workbook'
  log.info('run', `Processing ${name}`)
  const dataset = readDataset(sources.input)
  log.info('run', `Loaded ${dataset.rows.length} row(s) from ${name}`)
  const wantsType = settings.coefficients.strategy === 'type' || settings.coefficients.strategy === 'hybrid'
  return processDataset(dataset, settings, {
    reference: sources.reference ? readReferenceSets(sources.reference, settings.reference, log) : undefined,
    bonusSources: sources.bonus && settings.bonus.enabled ? readBonusSources(sources.bonus, settings.bonus, log) : undefined,
    typeRows: sources.typeCoefficients && wantsType ? readTypeCoefficientRows(sources.typeCoefficients, settings.coefficients.typeTable, log) : undefined,
    workpackDays: sources.workpackDays,
    source: name,
  }, log)
}

export type WorkbookPaths = {
  input: string
  reference?: string
  bonus?: string
  typeCoefficients?: string
  workpackDays?: number
}

export async function processWorkpackFiles(paths: WorkbookPaths, settings: Settings, log: Logger = logger): Promise<AggregateResult> {
  const read = (p?: string) => (p ? readFile(p) : Promise.resolve(undefined))
  const [input, reference, bonus, typeCoefficients] = await Promise.all([
    readFile(paths.input),
    read(paths.reference),
    read(paths.bonus),
    read(paths.typeCoefficients),
  ])
  try {
    return processWorkpackWorkbook({ input, inputName: basename(paths.input), reference, bonus, typeCoefficients, workpackDays: paths.workpackDays }, settings, log)
  } catch (e) {
    log.error('run', `Error processing ${paths.input}: ${getErrorMessage(e)}`)
    throw e
  }
}
