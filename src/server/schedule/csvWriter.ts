import { promises as fs } from 'fs'
import type { ScheduleTable } from '@/types'
import { ExportError } from '@/lib/errors'

export const CSV_LINE_TERMINATOR = '\r\n'

function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

/**
 * 表をCSV文字列に変換（各行の末尾に CRLF）
 */
export function stringifyCsv(rows: ScheduleTable): string {
  return rows
    .map((row) => row.map(escapeCsvValue).join(',') + CSV_LINE_TERMINATOR)
    .join('')
}

export async function writeScheduleCsv(filePath: string, rows: ScheduleTable): Promise<void> {
  try {
    await fs.writeFile(filePath, stringifyCsv(rows), 'utf-8')
  } catch (error) {
    throw new ExportError(
      filePath,
      `Failed to write schedule CSV: ${filePath}`,
      error instanceof Error ? error : undefined
    )
  }
  console.log(`[ScheduleExport] Wrote ${rows.length} rows to ${filePath}`)
}
