import type { FieldSpec } from '../config/campaign-config.js';
import type { CampaignRecord, FigureReference, RecordSection } from '../core/record.js';
import {
  escapeLatex,
  formatFieldValue,
  graphicsPath,
  HEADER_COLOR_NAME,
  headerCell,
  tableRow,
  toLabelKey,
  type ValueFormat
} from './latex.js';

/** Field-to-markup mapping for record sections. */
export interface SectionTemplate extends ValueFormat {
  /** Fields in table order; empty means every record column except the identifier. */
  fields: readonly FieldSpec[];
  identifierField?: string;
}

/** Inputs for rendering one record section. */
export interface SectionRenderInput {
  section: RecordSection;
  figures: readonly FigureReference[];
  /** Compiled summary PDF, relative to the master document. */
  summaryPdfPath?: string;
}

/**
 * Render one record section to a LaTeX fragment.
 * Output depends only on the inputs, so re-rendering is byte-identical.
 */
export function renderSection(input: SectionRenderInput, template: SectionTemplate): string {
  const { section } = input;
  const label = toLabelKey(section.id);
  const lines: string[] = [
    `\\subsection{${escapeLatex(section.title)}}`,
    `\\label{sec:${label}}`,
    '',
    ...renderFieldTable(section.record, template, label)
  ];

  if (input.summaryPdfPath !== undefined) {
    lines.push('', ...renderSummaryInclude(input.summaryPdfPath));
  }

  for (const figure of input.figures) {
    const block = renderFigure(figure, label);
    if (block.length > 0) {
      lines.push('', ...block);
    }
  }

  return `${lines.join('\n')}\n`;
}

/** Effective field list: the template's, or every non-identifier column. */
export function resolveFieldSpecs(
  record: CampaignRecord,
  template: Pick<SectionTemplate, 'fields' | 'identifierField'>
): FieldSpec[] {
  if (template.fields.length > 0) {
    return [...template.fields];
  }
  return [...record.fields.keys()]
    .filter((name) => name !== template.identifierField)
    .map((name) => ({ name, label: name }));
}

function renderFieldTable(record: CampaignRecord, template: SectionTemplate, label: string): string[] {
  const rows = resolveFieldSpecs(record, template).map((spec) =>
    tableRow([escapeLatex(spec.label), formatFieldValue(record.fields.get(spec.name), spec, template)])
  );

  return [
    '\\begin{table}[H]',
    '    \\centering',
    `    \\caption{${escapeLatex(record.identifier)} Field Values}`,
    `    \\label{tab:${label}-fields}`,
    '    \\begin{tabularx}{\\linewidth}{|p{5cm}|X|}',
    '    \\hline',
    `    \\rowcolor{${HEADER_COLOR_NAME}}`,
    `    ${tableRow([headerCell('Field'), headerCell('Value')])}`,
    ...rows.map((row) => `    ${row}`),
    '    \\end{tabularx}',
    '\\end{table}'
  ];
}

/** Guarded include: the summary PDF is absent when its compile failed. */
function renderSummaryInclude(pdfPath: string): string[] {
  return [
    `\\IfFileExists{${pdfPath}}{%`,
    '  \\clearpage',
    `  \\includepdf[pages=-, pagecommand={\\thispagestyle{empty}}, fitpaper=true]{${pdfPath}}`,
    '  \\clearpage',
    '}{\\textit{Summary table unavailable.}}'
  ];
}

/**
 * Group-level figures: one `\subsection` per category, figures in the given
 * order, labelled by group, category and position.
 */
export function renderGroupFigures(group: string, figures: readonly FigureReference[]): string[] {
  const groupKey = toLabelKey(group);
  const byCategory = new Map<string, FigureReference[]>();
  for (const figure of figures) {
    const bucket = byCategory.get(figure.category) ?? [];
    bucket.push(figure);
    byCategory.set(figure.category, bucket);
  }

  const lines: string[] = [];
  for (const [category, bucket] of byCategory) {
    lines.push(`\\subsection{${escapeLatex(category)}}`);
    bucket.forEach((figure, index) => {
      lines.push(...renderFigure(figure, `group-${groupKey}-${index + 1}`));
    });
  }
  return lines;
}

function renderFigure(figure: FigureReference, label: string): string[] {
  const { slot } = figure;
  if (slot.status !== 'resolved' && slot.status !== 'placeholder') {
    return [];
  }

  const caption =
    slot.status === 'placeholder'
      ? `${escapeLatex(figure.caption)} (figure ${slot.reason === 'ambiguous' ? 'ambiguous' : 'not available'})`
      : escapeLatex(figure.caption);

  return [
    '\\begin{figure}[H]',
    '    \\centering',
    `    \\includegraphics[width=\\textwidth]{${graphicsPath(slot.path)}}`,
    `    \\caption{${caption}}`,
    `    \\label{fig:${label}-${toLabelKey(figure.category)}}`,
    '\\end{figure}'
  ];
}
