import { format as formatDate, isValid } from 'date-fns';

import type { FieldSpec } from '../config/campaign-config.js';
import type { FieldValue } from '../core/record.js';

/** Value formatting settings shared by section and summary rendering. */
export interface ValueFormat {
  missingToken: string;
  precision: number;
  dateFormat: string;
}

/** Table header color used across all generated documents. */
export const HEADER_COLOR_NAME = 'headerblue';
export const HEADER_COLOR_HEX = '002060';

const LATEX_ESCAPES: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '&': '\\&',
  '%': '\\%',
  $: '\\$',
  '#': '\\#',
  _: '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}'
};

/** Escape LaTeX special characters in one pass. */
export function escapeLatex(text: string): string {
  return text.replace(/[\\&%$#_{}~^]/g, (char) => LATEX_ESCAPES[char] ?? char);
}

/**
 * Characters that survive no quoting inside a file argument: `%` ends the
 * line, `#` is doubled by `\detokenize`, braces and backslashes read as markup.
 */
const UNQUOTABLE_PATH_CHARS = /[%#{}\\\r\n]/;

export function isGraphicsPathSafe(filePath: string): boolean {
  return !UNQUOTABLE_PATH_CHARS.test(filePath);
}

/** File argument for `\includegraphics`; `_`, `&`, `$`, `^` and `~` stay literal. */
export function graphicsPath(filePath: string): string {
  return `\\detokenize{${filePath}}`;
}

/** Reduce text to characters safe inside `\label{}` and `\ref{}`. */
export function toLabelKey(text: string): string {
  const key = text
    .trim()
    .replace(/[^A-Za-z0-9.:-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return key === '' ? 'item' : key;
}

/**
 * Format one field value as escaped LaTeX text.
 * Numbers use the field precision (falling back to the default), dates the
 * configured pattern, and missing values the missing token.
 */
export function formatFieldValue(
  value: FieldValue | undefined,
  spec: FieldSpec | undefined,
  valueFormat: ValueFormat
): string {
  if (value === null || value === undefined) {
    return escapeLatex(valueFormat.missingToken);
  }

  let text: string;
  if (typeof value === 'number') {
    text = value.toFixed(spec?.precision ?? valueFormat.precision);
  } else if (value instanceof Date) {
    if (!isValid(value)) {
      return escapeLatex(valueFormat.missingToken);
    }
    text = formatDate(value, valueFormat.dateFormat);
  } else {
    text = value;
  }

  return spec?.unit ? `${escapeLatex(text)}~${escapeLatex(spec.unit)}` : escapeLatex(text);
}

/** White bold header cell on the shared header color. */
export function headerCell(text: string): string {
  return `\\textcolor{white}{\\textbf{${escapeLatex(text)}}}`;
}

/** One table row terminated with a rule. */
export function tableRow(cells: readonly string[]): string {
  return `${cells.join(' & ')} \\\\ \\hline`;
}

