import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError, getErrorMessage } from './errors'
import { createPolicyTable, type PolicyTable } from './policy'
import { createCoefficientTable, type CoefficientTable } from './coefficient'
import type { ColumnMap } from './types'

const policySchema = z.enum(['include', 'include-no-check', 'exclude'])
const ruleSchema = z.enum(['paren', 'delimiter', 'verbatim'])
const columnName = z.string().trim().min(1)

const sequenceSchema = z.object({
  policy: policySchema.default('include'),
  extraction: ruleSchema.optional(),
  coefficient: z.number().positive().optional(),
})

export const settingsSchema = z.object({
  columns: z.object({
    sequence: columnName.default('Seq. No.'),
    title: columnName.default('Title'),
    duration: columnName.default('Planned Mhrs'),
    code: columnName.default('Special Code'),
    label: columnName.default('A'),
    startDate: columnName.default('Start_date'),
    endDate: columnName.default('End_date'),
    functionGroup: columnName.optional(),
  }).default({}),
  // keyed by major prefix: "2" applies to 2.1, 2.39, ...
  sequences: z.record(z.string(), sequenceSchema).default({}),
  extraction: z.object({
    defaultRule: ruleSchema.default('delimiter'),
    delimiter: z.string().min(1).default('/'),
  }).default({}),
  coefficients: z.object({
    strategy: z.enum(['none', 'sequence', 'type', 'hybrid']).default('sequence'),
    default: z.number().positive().default(1),
    skipList: z.array(z.string().trim().min(1)).default([]),
    skipCoefficient: z.number().positive().default(1),
    checkGroups: z.record(z.string(), z.string()).default({}),
    typeTable: z.object({
      aircraftColumn: columnName.default('AircraftCode'),
      checkGroupColumn: columnName.default('CheckGroup'),
      functionColumn: columnName.default('FuncGroup'),
      coefficientColumn: columnName.default('Coeff'),
      activeColumn: columnName.default('IsActive'),
    }).default({}),
  }).default({}),
  bonus: z.object({
    enabled: z.boolean().default(true),
    primaryColumn: columnName.default('a_type'),
    secondaryColumn: columnName.default('a_check'),
    hoursColumn: columnName.default('bonus_hours'),
    activeColumn: columnName.default('IsActive'),
  }).default({}),
  reference: z.object({
    taskSheet: columnName.default('Task'),
    taskColumn: columnName.default('Task ID'),
    secondarySheet: columnName.default('EO'),
    secondaryColumn: columnName.default('EO ID'),
    secondaryPrefix: z.string().min(1).default('EO'),
  }).default({}),
  classification: z.object({
    enabled: z.boolean().default(false),
  }).default({}),
  thresholds: z.object({
    highHours: z.number().nonnegative().default(10),
  }).default({}),
})

export type Settings = z.infer<typeof settingsSchema>
export type SettingsInput = z.input<typeof settingsSchema>

export function parseSettings(value: unknown): Settings {
  const parsed = settingsSchema.safeParse(value)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError('Invalid settings', issues)
  }
  return parsed.data
}

export async function loadSettings(path: string): Promise<Settings> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (e) {
    throw new ConfigError(`Cannot read settings file ${path}: ${getErrorMessage(e)}`)
  }
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (e) {
    throw new ConfigError(`Settings file ${path} is not valid JSON: ${getErrorMessage(e)}`)
  }
  return parseSettings(json)
}

export function columnMap(settings: Settings): ColumnMap {
  return { ...settings.columns }
}

export function buildTables(settings: Settings): { policies: PolicyTable; coefficients: CoefficientTable } {
  const factors: Record<string, number> = {}
  for (const [prefix, s] of Object.entries(settings.sequences)){
    if (s.coefficient != null) factors[prefix] = s.coefficient
  }
  return {
    policies: createPolicyTable(settings.sequences, settings.extraction.defaultRule),
    coefficients: createCoefficientTable({
      factors,
      defaultCoefficient: settings.coefficients.default,
      skipList: settings.coefficients.skipList,
      skipCoefficient: settings.coefficients.skipCoefficient,
    }),
  }
}
