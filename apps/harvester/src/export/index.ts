import type { ILogger } from '@plugindex/logger'
import { createWorkflowLogger } from '../config/structured-log.js'
import { ExportError, formatErrorForLog } from '../errors.js'
import type { ExtensionRecord } from '../marketplace/types.js'
import { writeExtensionsCsv } from './csv.js'
import { writeExtensionsSqlite } from './sqlite.js'

export interface ExportTargets {
  csvPath: string
  sqlitePath: string
  table?: string
}

export type ExportStepResult =
  | { ok: true; path: string; rows: number }
  | { ok: false; path: string; error: ExportError }

export interface ExportSummary {
  csv: ExportStepResult
  sqlite: ExportStepResult
  ok: boolean
}

function toExportError(target: 'csv' | 'sqlite', path: string, error: unknown): ExportError {
  return error instanceof ExportError ? error : new ExportError(target, path, error)
}

/**
 * Write records to CSV and SQLite. The two steps are independent: a failure
 * in one is reported in the summary and does not skip the other.
 */
export async function exportRecords(
  records: readonly ExtensionRecord[],
  targets: ExportTargets,
  logger: ILogger
): Promise<ExportSummary> {
  const log = createWorkflowLogger(logger, { workflow: 'process', stage: 'export' })

  let csv: ExportStepResult
  try {
    const rows = await writeExtensionsCsv(records, targets.csvPath)
    csv = { ok: true, path: targets.csvPath, rows }
    log.info('EXPORT_CSV_OK', { path: targets.csvPath, rows })
  } catch (error) {
    csv = { ok: false, path: targets.csvPath, error: toExportError('csv', targets.csvPath, error) }
    log.error('EXPORT_CSV_FAILED', { path: targets.csvPath, ...formatErrorForLog(error) }, error)
  }

  let sqlite: ExportStepResult
  try {
    const rows = writeExtensionsSqlite(records, targets.sqlitePath, { table: targets.table })
    sqlite = { ok: true, path: targets.sqlitePath, rows }
    log.info('EXPORT_SQLITE_OK', { path: targets.sqlitePath, table: targets.table, rows })
  } catch (error) {
    sqlite = {
      ok: false,
      path: targets.sqlitePath,
      error: toExportError('sqlite', targets.sqlitePath, error),
    }
    log.error('EXPORT_SQLITE_FAILED', { path: targets.sqlitePath, ...formatErrorForLog(error) }, error)
  }

  return { csv, sqlite, ok: csv.ok && sqlite.ok }
}
