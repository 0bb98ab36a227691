/** Fatal input problems: unreadable source, duplicate identifiers. Aborts the run before output. */
export class FatalInputError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'FatalInputError';
    this.code = code;
  }
}

/** Invalid campaign configuration, or configuration that does not fit the record set. */
export class ConfigurationError extends Error {
  readonly code: string;
  readonly filePath?: string;

  constructor(code: string, message: string, filePath?: string) {
    super(filePath ? `Configuration error in ${filePath}: ${message}` : message);
    this.name = 'ConfigurationError';
    this.code = code;
    this.filePath = filePath;
  }
}

/** A row or field that was dropped or defaulted. Never thrown past the normalizer. */
export class RecoverableRowError extends Error {
  readonly code: string;
  readonly row: number;
  readonly field?: string;

  constructor(code: string, row: number, message: string, field?: string) {
    super(message);
    this.name = 'RecoverableRowError';
    this.code = code;
    this.row = row;
    this.field = field;
  }
}

/** More than one figure file matched an expected name and none is an exact-case match. */
export class AmbiguousFigureError extends Error {
  readonly category: string;
  readonly expectedName: string;
  readonly candidates: string[];

  constructor(category: string, expectedName: string, candidates: string[]) {
    super(`Ambiguous '${category}' figure for '${expectedName}': ${candidates.join(', ')}`);
    this.name = 'AmbiguousFigureError';
    this.category = category;
    this.expectedName = expectedName;
    this.candidates = candidates;
  }
}

/** One artifact failed to typeset (non-zero exit, timeout, or spawn failure). */
export class ArtifactCompilationError extends Error {
  readonly markupPath: string;
  readonly exitCode: number | null;
  readonly timedOut: boolean;
  readonly log: string;

  constructor(markupPath: string, exitCode: number | null, timedOut: boolean, log: string) {
    super(
      timedOut
        ? `Compilation of ${markupPath} timed out`
        : `Compilation of ${markupPath} failed with exit code ${exitCode ?? 'unknown'}`
    );
    this.name = 'ArtifactCompilationError';
    this.markupPath = markupPath;
    this.exitCode = exitCode;
    this.timedOut = timedOut;
    this.log = log;
  }
}

/** A write failed while composing the document tree. */
export class CompositionError extends Error {
  readonly filePath: string;
  readonly writtenFiles: string[];

  constructor(filePath: string, writtenFiles: string[], cause: unknown) {
    super(`Failed to write ${filePath}: ${describeError(cause)}`, { cause });
    this.name = 'CompositionError';
    this.filePath = filePath;
    this.writtenFiles = writtenFiles;
  }
}

/** Readable message for anything caught from a rejected promise or thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
