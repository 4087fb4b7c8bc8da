import { describe, it, expect } from 'vitest'
import { classifyRow, createPolicyTable, lookupPolicy } from './policy'
import { extractIdentifier } from './identifier'
import { isWellFormedSequence, normalizeSequenceKey, sequencePrefix } from './sequence'

describe('sequence keys', () => {
  it('takes the major prefix before the first dot', () => {
    expect(sequencePrefix('4.39')).toBe('4')
    expect(sequencePrefix(12.5)).toBe('12')
    expect(sequencePrefix(' 3 .1')).toBe('3')
    expect(sequencePrefix('ab.1')).toBe('AB')
  })

  it('normalizes cell values to text keys', () => {
    expect(normalizeSequenceKey(4.1)).toBe('4.1')
    expect(normalizeSequenceKey(' 2.10 ')).toBe('2.10')
    expect(normalizeSequenceKey(NaN)).toBe('')
    expect(normalizeSequenceKey(null)).toBe('')
    expect(normalizeSequenceKey(undefined)).toBe('')
  })

  it('recognizes <major>.<minor> keys', () => {
    expect(isWellFormedSequence('2.1')).toBe(true)
    expect(isWellFormedSequence('10.45')).toBe(true)
    expect(isWellFormedSequence('2')).toBe(false)
    expect(isWellFormedSequence('A.1')).toBe(false)
  })
})

describe('row classifier', () => {
  const table = createPolicyTable({
    '1': { policy: 'include-no-check' },
    '2': { policy: 'include', extraction: 'paren' },
    '9': { policy: 'exclude' },
  })

  it('includes and checks mapped prefixes', () => {
    expect(classifyRow('2.1', table)).toEqual({ shouldProcess: true, shouldCheckReference: true, rule: 'paren' })
  })

  it('drops excluded prefixes', () => {
    expect(classifyRow('9.4', table).shouldProcess).toBe(false)
    expect(classifyRow('9.4', table).shouldCheckReference).toBe(false)
  })

  it('processes include-no-check rows without reference checks', () => {
    expect(classifyRow('1.3', table)).toEqual({ shouldProcess: true, shouldCheckReference: false, rule: 'delimiter' })
  })

  it('defaults unmapped prefixes to include with the default rule', () => {
    expect(classifyRow('7.1', table)).toEqual({ shouldProcess: true, shouldCheckReference: true, rule: 'delimiter' })
    expect(lookupPolicy(createPolicyTable({}, 'verbatim'), '5')).toEqual({ policy: 'include', extraction: 'verbatim' })
  })

  it('ignores the minor part and accepts numeric keys', () => {
    expect(classifyRow('2.99', table)).toEqual(classifyRow('2.1', table))
    expect(classifyRow(2.5, table).rule).toBe('paren')
  })

  it('matches configured prefixes case-insensitively', () => {
    const t = createPolicyTable({ ab: { policy: 'exclude' } })
    expect(classifyRow('AB.1', t).shouldProcess).toBe(false)
  })

  it('is frozen after construction', () => {
    expect(Object.isFrozen(table)).toBe(true)
  })
})

describe('identifier extractor', () => {
  it('cuts before the first parenthesis', () => {
    expect(extractIdentifier('24-045-00 (00) - ITEM 1', 'paren')).toBe('24-045-00')
  })

  it('cuts before the first delimiter', () => {
    expect(extractIdentifier('EO-2024-001 / CABIN AIR SYSTEM', 'delimiter')).toBe('EO-2024-001')
    expect(extractIdentifier('T-1 | desc', 'delimiter', '|')).toBe('T-1')
  })

  it('returns the trimmed title when the split character is absent', () => {
    expect(extractIdentifier('  ABC-1  ', 'delimiter')).toBe('ABC-1')
    expect(extractIdentifier('05-10 / X', 'paren')).toBe('05-10 / X')
  })

  it('keeps the whole title for verbatim', () => {
    expect(extractIdentifier('  A (b) / c ', 'verbatim')).toBe('A (b) / c')
    expect(extractIdentifier('', 'verbatim')).toBe('')
  })
})
