import path from 'node:path';

import { AmbiguousFigureError } from '../core/errors.js';

/** Name-matching tolerances for one campaign. */
export interface FigureNameOptions {
  /** Accepted extensions, lower-case with leading dot. */
  extensions: readonly string[];
  /** Trailing suffixes ignored when comparing stems. */
  suffixes: readonly string[];
}

/** Values substituted into figure file-name and caption patterns. */
export interface FigurePatternTokens {
  identifier: string;
  category: string;
  group?: string;
  /** File name of a group-scope figure. */
  file?: string;
}

/** A file name split into comparable parts. */
export interface FigureNameKey {
  /** Separator-normalized stem with original case. */
  stem: string;
  /** `stem` case-folded; equality here means "same figure". */
  foldedStem: string;
  /** Lower-cased extension including the dot. */
  extension: string;
}

/** Substitute `{identifier}`, `{category}`, `{group}` and `{file}` into a pattern. */
export function expandFigurePattern(pattern: string, tokens: FigurePatternTokens): string {
  return pattern.replace(/\{(identifier|category|group|file)\}/g, (_match, token: string) => {
    if (token === 'identifier') {
      return tokens.identifier;
    }
    if (token === 'category') {
      return tokens.category;
    }
    if (token === 'file') {
      return tokens.file ?? '';
    }
    return tokens.group ?? '';
  });
}

/**
 * Normalize a stem for comparison: trim, collapse whitespace/underscore/hyphen
 * runs to one `_`, drop leading and trailing separators, then strip configured
 * suffixes that follow a separator (repeatedly, compared case-insensitively).
 */
export function normalizeFigureStem(stem: string, suffixes: readonly string[] = []): string {
  let normalized = collapseSeparators(stem);
  const normalizedSuffixes = suffixes.map((suffix) => collapseSeparators(suffix).toLowerCase()).filter(Boolean);

  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const suffix of normalizedSuffixes) {
      const boundary = `_${suffix}`;
      if (normalized.length > boundary.length && normalized.toLowerCase().endsWith(boundary)) {
        normalized = trimSeparators(normalized.slice(0, -boundary.length));
        stripped = true;
      }
    }
  }

  return normalized;
}

/**
 * Comparable key for a file name, or `undefined` when its extension is not
 * accepted.
 */
export function figureNameKey(fileName: string, options: FigureNameOptions): FigureNameKey | undefined {
  const extension = path.extname(fileName).toLowerCase();
  if (!options.extensions.includes(extension)) {
    return undefined;
  }

  const stem = normalizeFigureStem(fileName.slice(0, fileName.length - extension.length), options.suffixes);
  if (stem === '') {
    return undefined;
  }
  return { stem, foldedStem: stem.toLowerCase(), extension };
}

/**
 * Pick the listed file that stands for `expectedName`.
 * Returns `undefined` when nothing matches. With several matches, an
 * exact-case stem wins, then the expected extension; anything still tied
 * throws `AmbiguousFigureError`.
 */
export function selectFigureCandidate(
  category: string,
  expectedName: string,
  files: readonly string[],
  options: FigureNameOptions
): string | undefined {
  if (files.includes(expectedName)) {
    return expectedName;
  }

  const expectedExtension = path.extname(expectedName).toLowerCase();
  const expected = figureNameKey(expectedName, {
    ...options,
    extensions: [...options.extensions, expectedExtension]
  });
  if (!expected) {
    return undefined;
  }

  const candidates = files
    .map((fileName) => ({ fileName, key: figureNameKey(fileName, options) }))
    .filter(
      (entry): entry is { fileName: string; key: FigureNameKey } =>
        entry.key !== undefined && entry.key.foldedStem === expected.foldedStem
    )
    .sort((left, right) => (left.fileName < right.fileName ? -1 : left.fileName > right.fileName ? 1 : 0));

  if (candidates.length <= 1) {
    return candidates[0]?.fileName;
  }

  const exactCase = candidates.filter((entry) => entry.key.stem === expected.stem);
  if (exactCase.length === 1) {
    return exactCase[0]?.fileName;
  }

  const sameExtension = exactCase.filter((entry) => entry.key.extension === expected.extension);
  if (sameExtension.length === 1) {
    return sameExtension[0]?.fileName;
  }

  throw new AmbiguousFigureError(
    category,
    expectedName,
    candidates.map((entry) => entry.fileName)
  );
}

function collapseSeparators(value: string): string {
  return trimSeparators(value.trim().replace(/[\s_-]+/g, '_'));
}

function trimSeparators(value: string): string {
  return value.replace(/^_+|_+$/g, '');
}
