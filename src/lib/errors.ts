export class WorkpackError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class DatasetSchemaError extends WorkpackError {
  constructor(readonly source: string, readonly expected: string[], readonly missing: string[]) {
    super(`Missing required columns in ${source}. Expected: ${expected.join(', ')}; missing: ${missing.join(', ')}`)
  }
}

export class ConfigError extends WorkpackError {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message)
  }
}

export class WorkbookError extends WorkpackError {}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
