import { isValid, parse as parseDate, parseISO } from 'date-fns';

import type { Diagnostic } from '../core/diagnostics.js';
import { FatalInputError, RecoverableRowError } from '../core/errors.js';
import type { CampaignRecord, FieldType, FieldValue, RawCell, SourceRow } from '../core/record.js';

/** Normalizer settings taken from the campaign configuration. */
export interface NormalizeOptions {
  identifierField: string;
  orderingField?: string;
  groupField?: string;
  /** Declared coercions; undeclared columns pass through. */
  fieldTypes?: Record<string, FieldType>;
  missingTokens?: readonly string[];
  /** date-fns pattern tried after ISO parsing fails. */
  dateFormat?: string;
}

/** A source row excluded from the record set. */
export interface SkippedRow {
  row: number;
  code: string;
  reason: string;
}

export interface NormalizeResult {
  records: CampaignRecord[];
  skippedRows: SkippedRow[];
  diagnostics: Diagnostic[];
}

/** Outcome of coercing one cell. */
type Coercion = { ok: true; value: FieldValue } | { ok: false; reason: string };

/** Days between the spreadsheet epoch (1899-12-30) and the Unix epoch. */
const SPREADSHEET_EPOCH_OFFSET_DAYS = 25569;
const MS_PER_DAY = 86_400_000;

/**
 * Convert raw source rows into canonical records.
 * Rows without an identifier are skipped; unparseable optional fields become
 * missing. Duplicate identifiers are fatal.
 */
export function normalizeRecords(rows: readonly SourceRow[], options: NormalizeOptions): NormalizeResult {
  const missingTokens = new Set((options.missingTokens ?? ['']).map((token) => token.trim().toLowerCase()));
  const fieldTypes = options.fieldTypes ?? {};
  const records: CampaignRecord[] = [];
  const skippedRows: SkippedRow[] = [];
  const diagnostics: Diagnostic[] = [];
  const firstRowById = new Map<string, number>();

  for (const { row: rowNumber, cells: raw } of rows) {
    const identifier = readIdentifier(raw[options.identifierField], missingTokens);
    if (identifier === undefined) {
      const error = new RecoverableRowError(
        'ROW_MISSING_IDENTIFIER',
        rowNumber,
        `Row ${rowNumber} has no value in identifier column '${options.identifierField}' and was skipped.`
      );
      skippedRows.push({ row: rowNumber, code: error.code, reason: error.message });
      diagnostics.push({ code: error.code, severity: 'warning', message: error.message, row: rowNumber });
      continue;
    }

    const previousRow = firstRowById.get(identifier);
    if (previousRow !== undefined) {
      throw new FatalInputError(
        'DUPLICATE_IDENTIFIER',
        `Identifier '${identifier}' appears on rows ${previousRow} and ${rowNumber}.`
      );
    }
    firstRowById.set(identifier, rowNumber);

    const fields = new Map<string, FieldValue>();
    for (const [column, cell] of Object.entries(raw)) {
      if (column === options.identifierField) {
        fields.set(column, identifier);
        continue;
      }

      const declared = fieldTypes[column];
      const coercion = declared
        ? coerceCell(cell, declared, missingTokens, options.dateFormat)
        : passthroughCell(cell, missingTokens);

      if (coercion.ok) {
        fields.set(column, coercion.value);
        continue;
      }

      const error = new RecoverableRowError('FIELD_COERCION_FAILED', rowNumber, coercion.reason, column);
      fields.set(column, null);
      diagnostics.push({
        code: error.code,
        severity: 'warning',
        message: `Row ${rowNumber} (${identifier}) field '${column}': ${error.message}; treated as missing.`,
        sectionId: identifier,
        row: rowNumber
      });
    }

    const record: CampaignRecord = { identifier, fields, sourceRow: rowNumber };
    const orderingKey = options.orderingField ? toOrderingKey(fields.get(options.orderingField)) : undefined;
    if (orderingKey !== undefined) {
      record.orderingKey = orderingKey;
    }
    const group = options.groupField ? toGroupLabel(fields.get(options.groupField)) : undefined;
    if (group !== undefined) {
      record.group = group;
    }
    records.push(record);
  }

  return { records, skippedRows, diagnostics };
}

/** Coerce one cell to a declared type. */
export function coerceCell(
  cell: RawCell | undefined,
  type: FieldType,
  missingTokens: ReadonlySet<string>,
  dateFormat?: string
): Coercion {
  if (cell === undefined || cell === null || isMissingToken(cell, missingTokens)) {
    return { ok: true, value: null };
  }

  switch (type) {
    case 'number':
      return coerceNumber(cell);
    case 'date':
      return coerceDate(cell, dateFormat);
    case 'text':
      return { ok: true, value: cellToText(cell) };
  }
}

function passthroughCell(cell: RawCell | undefined, missingTokens: ReadonlySet<string>): Coercion {
  if (cell === undefined || cell === null || isMissingToken(cell, missingTokens)) {
    return { ok: true, value: null };
  }
  if (typeof cell === 'number' || cell instanceof Date) {
    return { ok: true, value: cell };
  }
  return { ok: true, value: cellToText(cell) };
}

function coerceNumber(cell: RawCell): Coercion {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? { ok: true, value: cell } : { ok: false, reason: 'not a finite number' };
  }
  if (typeof cell === 'string') {
    const parsed = Number(cell.trim());
    if (Number.isFinite(parsed)) {
      return { ok: true, value: parsed };
    }
  }
  return { ok: false, reason: `'${cellToText(cell)}' is not a number` };
}

function coerceDate(cell: RawCell, dateFormat: string | undefined): Coercion {
  if (cell instanceof Date) {
    return isValid(cell) ? { ok: true, value: cell } : { ok: false, reason: 'invalid date' };
  }
  if (typeof cell === 'number' && Number.isFinite(cell)) {
    return { ok: true, value: new Date(Math.round((cell - SPREADSHEET_EPOCH_OFFSET_DAYS) * MS_PER_DAY)) };
  }
  if (typeof cell === 'string') {
    const trimmed = cell.trim();
    const iso = parseISO(trimmed);
    if (isValid(iso)) {
      return { ok: true, value: iso };
    }
    if (dateFormat) {
      const formatted = parseDate(trimmed, dateFormat, new Date(0));
      if (isValid(formatted)) {
        return { ok: true, value: formatted };
      }
    }
  }
  return { ok: false, reason: `'${cellToText(cell)}' is not a date` };
}

/** Identifiers accept trimmed text or numbers; anything else skips the row. */
function readIdentifier(cell: RawCell | undefined, missingTokens: ReadonlySet<string>): string | undefined {
  if (typeof cell === 'number' && Number.isFinite(cell)) {
    return String(cell);
  }
  if (typeof cell !== 'string') {
    return undefined;
  }

  const trimmed = cell.trim();
  if (trimmed === '' || missingTokens.has(trimmed.toLowerCase())) {
    return undefined;
  }
  return trimmed;
}

function isMissingToken(cell: RawCell, missingTokens: ReadonlySet<string>): boolean {
  return typeof cell === 'string' && missingTokens.has(cell.trim().toLowerCase());
}

function cellToText(cell: RawCell): string {
  if (cell instanceof Date) {
    return isValid(cell) ? cell.toISOString() : '';
  }
  if (typeof cell === 'string') {
    return cell.trim();
  }
  return String(cell);
}

/** Dates order by instant; text that reads as a number orders as that number. */
function toOrderingKey(value: FieldValue | undefined): number | string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (value instanceof Date) {
    return value.getTime();
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    const numeric = Number(trimmed);
    return trimmed !== '' && Number.isFinite(numeric) ? numeric : value;
  }
  return value;
}

function toGroupLabel(value: FieldValue | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const label = value instanceof Date ? value.toISOString() : String(value).trim();
  return label === '' ? undefined : label;
}
