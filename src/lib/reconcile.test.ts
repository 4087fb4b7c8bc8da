import { describe, it, expect } from 'vitest'
import { identifierDomain, reconcileIdentifiers } from './reconcile'
import { countByKind, inspectRow } from './quality'
import type { ReferenceSets } from './types'

describe('reconcileIdentifiers', () => {
  const reference: ReferenceSets = {
    taskIds: new Set(['24-045-00', 'EO-2024-001']),
    secondaryIds: new Set(['EO-2023-009', '05-11-00']),
  }

  it('reports identifiers missing from their own domain, in input order', () => {
    const out = reconcileIdentifiers([
      { sequenceKey: '2.1', identifier: '24-045-00' },
      { sequenceKey: '3.1', identifier: 'EO-2024-001' },
      { sequenceKey: '3.2', identifier: 'EO-2023-009' },
      { sequenceKey: '4.1', identifier: '05-11-00' },
    ], reference, 'EO')
    expect(out).toEqual([
      { sequenceKey: '3.1', identifier: 'EO-2024-001', domain: 'secondary' },
      { sequenceKey: '4.1', identifier: '05-11-00', domain: 'task' },
    ])
  })

  it('never checks a secondary identifier against the task set', () => {
    const out = reconcileIdentifiers([{ sequenceKey: '3.1', identifier: 'EO-2024-001' }], reference, 'EO')
    expect(out.map(m => m.domain)).toEqual(['secondary'])
  })

  it('skips empty identifiers', () => {
    expect(reconcileIdentifiers([{ sequenceKey: '4.2', identifier: '' }], reference, 'EO')).toEqual([])
  })

  it('classifies by case-sensitive prefix', () => {
    expect(identifierDomain('EO-1', 'EO')).toBe('secondary')
    expect(identifierDomain('eo-1', 'EO')).toBe('task')
    expect(identifierDomain('EO-1', '')).toBe('task')
  })
})

describe('inspectRow', () => {
  it('finds nothing wrong with a clean row', () => {
    expect(inspectRow({ row: 0, sequenceKey: '2.1', title: 'T-1 / x', duration: 60, identifier: 'T-1' })).toEqual([])
  })

  it('reports sequence, title and duration problems', () => {
    const out = inspectRow({ row: 3, sequenceKey: '2', title: '', duration: 'abc', identifier: '' })
    expect(out.map(d => d.kind)).toEqual(['bad-sequence', 'empty-title', 'bad-duration'])
    expect(out[2]).toEqual({ row: 3, sequenceKey: '2', kind: 'bad-duration', message: "Duration 'abc' is not a number of minutes, counted as 0" })
  })

  it('reports titles that yield no identifier', () => {
    const out = inspectRow({ row: 1, sequenceKey: '3.1', title: '/x', duration: 30, identifier: '' })
    expect(out).toEqual([{ row: 1, sequenceKey: '3.1', kind: 'empty-identifier', message: "No identifier could be extracted from '/x'" }])
  })

  it('counts diagnostics by kind', () => {
    const out = [
      ...inspectRow({ row: 0, sequenceKey: 'x', title: 'T', duration: 'n/a', identifier: 'T' }),
      ...inspectRow({ row: 1, sequenceKey: 'y', title: 'T', duration: 5, identifier: 'T' }),
    ]
    expect(countByKind(out)).toEqual({ 'bad-sequence': 2, 'bad-duration': 1 })
  })
})
