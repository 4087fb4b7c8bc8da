import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'node:url'
import { buildTables, columnMap, loadSettings, parseSettings } from './settings'
import { ConfigError } from './errors'
import { classifyRow } from './policy'
import { resolveSequenceCoefficient } from './coefficient'

const EXAMPLE = fileURLToPath(new URL('../../config/settings.example.json', import.meta.url))

describe('parseSettings', () => {
  it('fills defaults for an empty document', () => {
    const s = parseSettings({})
    expect(s.columns.sequence).toBe('Seq. No.')
    expect(s.columns.duration).toBe('Planned Mhrs')
    expect(s.extraction).toEqual({ defaultRule: 'delimiter', delimiter: '/' })
    expect(s.coefficients.strategy).toBe('sequence')
    expect(s.reference.secondaryPrefix).toBe('EO')
    expect(s.thresholds.highHours).toBe(10)
    expect(s.classification.enabled).toBe(false)
  })

  it('rejects unknown policies with the offending path', () => {
    let caught: unknown
    try {
      parseSettings({ sequences: { '2': { policy: 'skip' } } })
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(ConfigError)
    if (!(caught instanceof ConfigError)) return
    expect(caught.issues).toHaveLength(1)
    expect(caught.issues[0].startsWith('sequences.2.policy')).toBe(true)
  })

  it('rejects non-positive coefficients', () => {
    expect(() => parseSettings({ coefficients: { default: 0 } })).toThrow(ConfigError)
  })
})

describe('buildTables', () => {
  it('derives policy and coefficient tables from the sequence section', () => {
    const s = parseSettings({
      sequences: {
        '2': { extraction: 'paren', coefficient: 2 },
        '9': { policy: 'exclude' },
      },
      coefficients: { skipList: ['NDT'], skipCoefficient: 1.25 },
    })
    const { policies, coefficients } = buildTables(s)
    expect(classifyRow('2.4', policies)).toEqual({ shouldProcess: true, shouldCheckReference: true, rule: 'paren' })
    expect(classifyRow('9.1', policies).shouldProcess).toBe(false)
    expect(classifyRow('5.1', policies).rule).toBe('delimiter')
    expect(resolveSequenceCoefficient(coefficients, '2.4')).toBe(2)
    expect(resolveSequenceCoefficient(coefficients, '9.1')).toBe(1)
    expect(resolveSequenceCoefficient(coefficients, '2.4', 'NDT-01')).toBe(1.25)
  })

  it('copies the column names', () => {
    const s = parseSettings({ columns: { functionGroup: 'Function' } })
    expect(columnMap(s)).toEqual({
      sequence: 'Seq. No.',
      title: 'Title',
      duration: 'Planned Mhrs',
      code: 'Special Code',
      label: 'A',
      startDate: 'Start_date',
      endDate: 'End_date',
      functionGroup: 'Function',
    })
  })
})

describe('loadSettings', () => {
  it('reads the example settings file', async () => {
    const s = await loadSettings(EXAMPLE)
    expect(s.thresholds.highHours).toBe(12)
    expect(s.sequences['9'].policy).toBe('exclude')
    expect(s.coefficients.checkGroups).toEqual({ A06: 'A-CHECK', C01: 'C-CHECK' })
  })

  it('rejects a missing file', async () => {
    await expect(loadSettings('/nonexistent/settings.json')).rejects.toThrow(ConfigError)
  })
})
