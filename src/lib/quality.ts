import type { CellValue, Diagnostic, DiagnosticKind } from './types'
import { isWellFormedSequence } from './sequence'
import { isUnparseableDuration } from './hours'
import { cellText } from './cells'

export type RowFacts = {
  row: number
  sequenceKey: string
  title: string
  duration: CellValue | undefined
  identifier: string
}

export function inspectRow(f: RowFacts): Diagnostic[] {
  const out: Diagnostic[] = []
  const add = (kind: DiagnosticKind, message: string) => out.push({ row: f.row, sequenceKey: f.sequenceKey, kind, message })
  if (!isWellFormedSequence(f.sequenceKey)) add('bad-sequence', `Sequence key '${f.sequenceKey}' is not in <major>.<minor> form`)
  if (!f.title) add('empty-title', 'Title is empty')
  else if (!f.identifier) add('empty-identifier', `No identifier could be extracted from '${f.title}'`)
  if (isUnparseableDuration(f.duration)) add('bad-duration', `Duration '${cellText(f.duration)}' is not a number of minutes, counted as 0`)
  return out
}

export function countByKind(diagnostics: Diagnostic[]): Partial<Record<DiagnosticKind, number>> {
  const out: Partial<Record<DiagnosticKind, number>> = {}
  for (const d of diagnostics) out[d.kind] = (out[d.kind] ?? 0) + 1
  return out
}
