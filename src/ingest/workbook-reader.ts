import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';

import { describeError, FatalInputError } from '../core/errors.js';
import type { RawCell, RawRow, SourceRow } from '../core/record.js';

/** Tabular source collaborator: yields numbered raw rows or throws `FatalInputError`. */
export interface TabularSourceReader {
  readRows(): Promise<SourceRow[]>;
}

export interface WorkbookReaderOptions {
  /** Sheet to read; defaults to `Tests`, falling back to the first sheet when absent. */
  sheet?: string;
}

/** Reads one worksheet of an `.xlsx`, `.xls`, or `.csv` file. */
export class WorkbookReader implements TabularSourceReader {
  constructor(
    private readonly filePath: string,
    private readonly options: WorkbookReaderOptions = {}
  ) {}

  async readRows(): Promise<SourceRow[]> {
    let data: Buffer;
    try {
      data = await readFile(this.filePath);
    } catch (error) {
      throw new FatalInputError('SOURCE_UNREADABLE', `Cannot read ${this.filePath}: ${describeError(error)}`);
    }

    return readWorkbookRows(data, this.options.sheet ?? 'Tests', this.filePath);
  }
}

/** Fixed row list, for callers that already hold rows in memory. */
export class StaticRowReader implements TabularSourceReader {
  constructor(private readonly rows: readonly RawRow[]) {}

  async readRows(): Promise<SourceRow[]> {
    return toSourceRows(this.rows);
  }
}

/** Number header-less rows as if they sat below a header row. */
export function toSourceRows(rows: readonly RawRow[]): SourceRow[] {
  return rows.map((cells, index) => ({ row: index + 2, cells: { ...cells } }));
}

/**
 * Parse workbook bytes and return the rows of one sheet keyed by header.
 * Empty cells are reported as `null`; rows with every cell empty are dropped
 * but still count toward the row numbers of the rows after them.
 */
export function readWorkbookRows(data: Uint8Array, sheetName: string, sourceName = 'workbook'): SourceRow[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
  } catch (error) {
    throw new FatalInputError('SOURCE_UNREADABLE', `Cannot parse ${sourceName}: ${describeError(error)}`);
  }

  const sheet = workbook.Sheets[sheetName] ?? firstSheet(workbook, sheetName, sourceName);
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null, raw: true });

  return rows
    .map((row, index): SourceRow => ({ row: sheetRowNumber(row, index), cells: toRawRow(row) }))
    .filter((row) => Object.values(row.cells).some((cell) => cell !== null));
}

/** Only a single-sheet workbook may stand in for a missing named sheet. */
function firstSheet(workbook: XLSX.WorkBook, sheetName: string, sourceName: string): XLSX.WorkSheet {
  const [onlyName] = workbook.SheetNames;
  const only = onlyName === undefined ? undefined : workbook.Sheets[onlyName];
  if (workbook.SheetNames.length !== 1 || !only) {
    throw new FatalInputError(
      'SOURCE_UNREADABLE',
      `Sheet '${sheetName}' not found in ${sourceName} (sheets: ${workbook.SheetNames.join(', ') || 'none'}).`
    );
  }
  return only;
}

/** SheetJS tags each row object with its 0-based sheet row as `__rowNum__`. */
function sheetRowNumber(row: Record<string, unknown>, index: number): number {
  const rowNum = row['__rowNum__'];
  return typeof rowNum === 'number' ? rowNum + 1 : index + 2;
}

function toRawRow(row: Record<string, unknown>): RawRow {
  const result: RawRow = {};
  for (const [column, value] of Object.entries(row)) {
    result[column.trim()] = toRawCell(value);
  }
  return result;
}

function toRawCell(value: unknown): RawCell {
  if (typeof value === 'string') {
    return value.trim() === '' ? null : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  return null;
}
