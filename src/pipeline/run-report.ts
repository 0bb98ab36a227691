import type { Diagnostic } from '../core/diagnostics.js';
import type { RunSummary } from './run.js';

/** Count keyed by diagnostic code or severity. */
export type DiagnosticHistogram = Record<string, number>;

/** Format a compact markdown summary of one run for quick triage. */
export function formatRunSummaryMarkdown(summary: RunSummary): string {
  const lines: string[] = [
    '# Campaign Report Run',
    '',
    `Status: ${summary.status}`,
    `Last stage: ${summary.stage}`,
    `Records: ${summary.recordCount}`,
    `Sections: ${summary.outline.length}`,
    `Skipped rows: ${summary.skippedRows.length}`,
    `Figure warnings: ${summary.figureWarnings.length}`,
    `Failed artifacts: ${summary.failedArtifacts.length}`,
    `Orphaned artifacts: ${summary.orphanedArtifacts.length}`
  ];

  if (summary.fatalError) {
    lines.push('', `Fatal error (${summary.fatalError.code}): ${summary.fatalError.message}`);
  }

  if (summary.skippedRows.length > 0) {
    lines.push('', '## Skipped Rows', '', '| Row | Code | Reason |', '|---|---|---|');
    for (const skipped of summary.skippedRows) {
      lines.push(`| ${skipped.row} | ${skipped.code} | ${escapeMarkdownTable(skipped.reason)} |`);
    }
  }

  if (summary.failedArtifacts.length > 0) {
    lines.push('', '## Failed Artifacts', '', '| Artifact | Section | Exit | Timed out | Attempts |', '|---|---|---|---|---|');
    for (const failed of summary.failedArtifacts) {
      lines.push(
        `| ${escapeMarkdownTable(failed.markupPath)} | ${failed.sectionId ?? '-'} | ${failed.exitCode ?? 'n/a'} | ${
          failed.timedOut ? 'yes' : 'no'
        } | ${failed.attempts} |`
      );
    }
  }

  if (summary.orphanedArtifacts.length > 0) {
    lines.push('', '## Orphaned Artifacts', '');
    for (const orphan of summary.orphanedArtifacts) {
      lines.push(`- ${orphan}`);
    }
  }

  lines.push('', '## Diagnostics', '');
  if (summary.diagnostics.length === 0) {
    lines.push('- none');
  } else {
    lines.push('| Severity | Code | Section | Message |', '|---|---|---|---|');
    for (const diagnostic of summary.diagnostics) {
      lines.push(
        `| ${diagnostic.severity} | ${diagnostic.code} | ${diagnostic.sectionId ?? '-'} | ${escapeMarkdownTable(
          diagnostic.message
        )} |`
      );
    }
  }

  lines.push('');
  appendHistogramSection(lines, 'Diagnostic Codes', buildCodeHistogram(summary.diagnostics));
  lines.push('');
  appendHistogramSection(lines, 'Diagnostic Severities', buildSeverityHistogram(summary.diagnostics));

  return `${lines.join('\n')}\n`;
}

/** Serialize a run summary to deterministic JSON text. */
export function formatRunSummaryJson(summary: RunSummary): string {
  return `${JSON.stringify(summary, null, 2)}\n`;
}

/** Build a diagnostic code histogram from a list of diagnostics. */
export function buildCodeHistogram(diagnostics: readonly Diagnostic[]): DiagnosticHistogram {
  const histogram: DiagnosticHistogram = {};
  for (const diagnostic of diagnostics) {
    histogram[diagnostic.code] = (histogram[diagnostic.code] ?? 0) + 1;
  }
  return histogram;
}

/** Build a severity histogram from a list of diagnostics. */
export function buildSeverityHistogram(diagnostics: readonly Diagnostic[]): DiagnosticHistogram {
  const histogram: DiagnosticHistogram = {};
  for (const diagnostic of diagnostics) {
    histogram[diagnostic.severity] = (histogram[diagnostic.severity] ?? 0) + 1;
  }
  return histogram;
}

/** Escape markdown table delimiters in free-form diagnostic text. */
function escapeMarkdownTable(value: string): string {
  return value.replaceAll('|', '\\|').replaceAll('\n', ' ');
}

/** Append a markdown histogram section sorted by descending count then key name. */
function appendHistogramSection(lines: string[], title: string, histogram: DiagnosticHistogram): void {
  lines.push(`### ${title}`);
  lines.push('');

  const entries = Object.entries(histogram).sort((left, right) => {
    if (right[1] !== left[1]) {
      return right[1] - left[1];
    }
    return left[0].localeCompare(right[0]);
  });

  if (entries.length === 0) {
    lines.push('- none');
    return;
  }

  lines.push('| Key | Count |');
  lines.push('|---|---|');
  for (const [key, count] of entries) {
    lines.push(`| ${escapeMarkdownTable(key)} | ${count} |`);
  }
}
