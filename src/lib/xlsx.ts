import * as XLSX from 'xlsx'
import type { BonusEntry, BonusSource, CellValue, Dataset, RawRow, ReferenceSets } from './types'
import type { TypeCoefficientRow } from './coefficient'
import type { Settings } from './settings'
import { WorkbookError } from './errors'
import { cellText, parseFlag, parseNumber, toCellValue } from './cells'
import { logger, type Logger } from './logger'

export type WorkbookData = Buffer | ArrayBuffer

export function openWorkbook(data: WorkbookData): XLSX.WorkBook {
  return XLSX.read(data, { type: data instanceof ArrayBuffer ? 'array' : 'buffer', cellDates: true })
}

/**
 * Header row = first row with any non-empty cell. Cells below it become records
 * keyed by header text; fully blank rows are dropped.
 */
export function sheetToDataset(ws: XLSX.WorkSheet): Dataset {
  const grid = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, raw: true, defval: null, blankrows: false })
  const headerIdx = grid.findIndex(r => (r || []).some(v => cellText(toCellValue(v)) !== ''))
  if (headerIdx < 0) return { columns: [], rows: [] }
  const columns = (grid[headerIdx] || []).map(v => cellText(toCellValue(v)))
  const rows: RawRow[] = []
  for (let i=headerIdx+1;i<grid.length;i++){
    const r = grid[i] || []
    const rec: RawRow = {}
    let filled = false
    columns.forEach((c, j) => {
      if (!c) return
      const v: CellValue = toCellValue(r[j])
      if (cellText(v) !== '') filled = true
      rec[c] = v
    })
    if (filled) rows.push(rec)
  }
  return { columns: columns.filter(Boolean), rows }
}

export function readDataset(data: WorkbookData, sheetName?: string): Dataset {
  const wb = openWorkbook(data)
  const name = sheetName ?? wb.SheetNames[0]
  const ws = name ? wb.Sheets[name] : undefined
  if (!ws) throw new WorkbookError(sheetName ? `Sheet '${sheetName}' not found in input workbook` : 'Input workbook has no sheets')
  return sheetToDataset(ws)
}

function readIdColumn(wb: XLSX.WorkBook, sheet: string, column: string, log: Logger): Set<string> {
  const ws = wb.Sheets[sheet]
  if (!ws) {
    log.warn('xlsx', `Reference sheet '${sheet}' not found`, { available: wb.SheetNames })
    return new Set()
  }
  const ds = sheetToDataset(ws)
  if (!ds.columns.includes(column)) {
    log.warn('xlsx', `Column '${column}' not found in '${sheet}' sheet`, { available: ds.columns })
    return new Set()
  }
  const ids = new Set<string>()
  for (const r of ds.rows){
    const id = cellText(r[column])
    if (id) ids.add(id)
  }
  log.info('xlsx', `Loaded ${ids.size} ids from '${sheet}' sheet`)
  return ids
}

export function readReferenceSets(data: WorkbookData, reference: Settings['reference'], log: Logger = logger): ReferenceSets {
  const wb = openWorkbook(data)
  return {
    taskIds: readIdColumn(wb, reference.taskSheet, reference.taskColumn, log),
    secondaryIds: readIdColumn(wb, reference.secondarySheet, reference.secondaryColumn, log),
  }
}

// every sheet is an independent source; a sheet missing the key columns is skipped
export function readBonusSources(data: WorkbookData, cols: Settings['bonus'], log: Logger = logger): BonusSource[] {
  const wb = openWorkbook(data)
  const out: BonusSource[] = []
  for (const sheetName of wb.SheetNames){
    const ds = sheetToDataset(wb.Sheets[sheetName])
    const missing = [cols.primaryColumn, cols.secondaryColumn, cols.hoursColumn].filter(c => !ds.columns.includes(c))
    if (missing.length) {
      log.warn('xlsx', `Bonus sheet '${sheetName}' skipped, missing columns: ${missing.join(', ')}`)
      continue
    }
    const hasActive = ds.columns.includes(cols.activeColumn)
    const entries: BonusEntry[] = []
    for (const r of ds.rows){
      const hours = parseNumber(r[cols.hoursColumn])
      if (hours == null) continue
      entries.push({
        primary: cellText(r[cols.primaryColumn]),
        secondary: cellText(r[cols.secondaryColumn]),
        hours,
        active: hasActive ? parseFlag(r[cols.activeColumn]) : undefined,
      })
    }
    log.debug('xlsx', `Bonus sheet '${sheetName}': ${entries.length} row(s)`)
    out.push({ name: sheetName, entries })
  }
  return out
}

export function readTypeCoefficientRows(
  data: WorkbookData,
  cols: Settings['coefficients']['typeTable'],
  log: Logger = logger
): TypeCoefficientRow[] {
  const wb = openWorkbook(data)
  const out: TypeCoefficientRow[] = []
  for (const sheetName of wb.SheetNames){
    const ds = sheetToDataset(wb.Sheets[sheetName])
    const missing = [cols.aircraftColumn, cols.checkGroupColumn, cols.functionColumn, cols.coefficientColumn].filter(c => !ds.columns.includes(c))
    if (missing.length) {
      log.warn('xlsx', `Coefficient sheet '${sheetName}' skipped, missing columns: ${missing.join(', ')}`)
      continue
    }
    const hasActive = ds.columns.includes(cols.activeColumn)
    for (const r of ds.rows){
      const coefficient = parseNumber(r[cols.coefficientColumn])
      if (coefficient == null) continue
      out.push({
        aircraft: cellText(r[cols.aircraftColumn]),
        checkGroup: cellText(r[cols.checkGroupColumn]),
        functionGroup: cellText(r[cols.functionColumn]),
        coefficient,
        active: hasActive ? parseFlag(r[cols.activeColumn]) : undefined,
      })
    }
  }
  return out
}
