export type CellValue = string | number | boolean | Date | null

export type RawRow = Record<string, CellValue | undefined>

export type Dataset = {
  columns: string[]
  rows: RawRow[]
}

export type ProcessingPolicy = 'include' | 'include-no-check' | 'exclude'

export type ExtractionRule = 'paren' | 'delimiter' | 'verbatim'

export type PolicyEntry = {
  policy: ProcessingPolicy
  extraction: ExtractionRule
}

export type RowClass = {
  shouldProcess: boolean
  shouldCheckReference: boolean
  rule: ExtractionRule
}

export type ColumnMap = {
  sequence: string
  title: string
  duration: string
  code?: string
  label?: string
  startDate?: string
  endDate?: string
  functionGroup?: string
}

export type LineItem = {
  row: number // 0-based position in the input dataset
  sequenceKey: string
  prefix: string
  title: string
  identifier: string
  shouldCheckReference: boolean
  code?: string
  functionGroup?: string
  baseHours: number
  coefficient: number
  adjustedHours: number
}

export type WorkpackContext = {
  label?: string
  primary?: string
  secondary?: string
  startDate?: Date
  endDate?: Date
  days?: number
}

export type BonusEntry = {
  primary: string
  secondary: string
  hours: number
  active?: boolean
}

export type BonusSource = {
  name: string
  entries: BonusEntry[]
}

export type BonusContribution = {
  source: string
  hours: number
}

export type BonusResolution = {
  total: number
  breakdown: BonusContribution[]
}

export type ReferenceSets = {
  taskIds: ReadonlySet<string>
  secondaryIds: ReadonlySet<string>
}

export type IdentifierDomain = 'task' | 'secondary'

export type Mismatch = {
  sequenceKey: string
  identifier: string
  domain: IdentifierDomain
}

export type DiagnosticKind =
  | 'bad-duration'
  | 'bad-sequence'
  | 'empty-title'
  | 'empty-identifier'
  | 'missing-code'

export type Diagnostic = {
  row: number
  sequenceKey: string
  kind: DiagnosticKind
  message: string
}

export type CodeBucket = {
  code: string
  hours: number
  share: number // percent of the rows' adjusted total
  perDay?: number
}

export type CoefficientBucket = {
  coefficient: number
  count: number
  baseHours: number
  adjustedHours: number
}

export type AggregateResult = {
  workpack: WorkpackContext
  items: LineItem[]
  totalBaseHours: number
  rowAdjustedHours: number
  bonus: BonusResolution
  totalAdjustedHours: number
  formatted: { totalBase: string; totalAdjusted: string; bonus: string }
  counts: { input: number; excluded: number; deduplicated: number; processed: number }
  coefficientSummary: CoefficientBucket[]
  classification?: CodeBucket[]
  highHours: { threshold: number; items: LineItem[] }
  mismatches: Mismatch[]
  diagnostics: Diagnostic[]
  warnings: string[]
}
