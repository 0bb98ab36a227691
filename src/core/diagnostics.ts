/** Severity classes used by every pipeline stage. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Canonical diagnostic object collected into the run summary. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Outline section the diagnostic belongs to, when it has one. */
  sectionId?: string;
  /** Row number the tabular source shows; the header is row 1. */
  row?: number;
  /** Figure category for figure-resolution diagnostics. */
  category?: string;
}

/**
 * Diagnostic accumulator keyed by section identifier.
 * Per-section tasks push into their own bucket so interleaved async work keeps
 * a stable per-section ordering; run-level entries go to the shared bucket.
 */
export class DiagnosticCollector {
  private readonly runLevel: Diagnostic[] = [];
  private readonly bySection = new Map<string, Diagnostic[]>();

  /** Record one diagnostic, routing it by `sectionId` when present. */
  add(diagnostic: Diagnostic): void {
    if (diagnostic.sectionId === undefined) {
      this.runLevel.push(diagnostic);
      return;
    }

    const bucket = this.bySection.get(diagnostic.sectionId);
    if (bucket) {
      bucket.push(diagnostic);
    } else {
      this.bySection.set(diagnostic.sectionId, [diagnostic]);
    }
  }

  addAll(diagnostics: readonly Diagnostic[]): void {
    for (const diagnostic of diagnostics) {
      this.add(diagnostic);
    }
  }

  /**
   * Flatten to one list: run-level entries first, then sections in the order
   * given by `sectionOrder` (sections not listed follow in first-seen order).
   */
  toArray(sectionOrder: readonly string[] = []): Diagnostic[] {
    const ordered: Diagnostic[] = [...this.runLevel];
    const seen = new Set<string>();

    for (const sectionId of sectionOrder) {
      const bucket = this.bySection.get(sectionId);
      if (bucket && !seen.has(sectionId)) {
        ordered.push(...bucket);
        seen.add(sectionId);
      }
    }

    for (const [sectionId, bucket] of this.bySection) {
      if (!seen.has(sectionId)) {
        ordered.push(...bucket);
      }
    }

    return ordered;
  }

  /** Per-section view used by the run summary. */
  toRecord(): Record<string, Diagnostic[]> {
    const result: Record<string, Diagnostic[]> = {};
    for (const [sectionId, bucket] of this.bySection) {
      result[sectionId] = [...bucket];
    }
    return result;
  }
}

