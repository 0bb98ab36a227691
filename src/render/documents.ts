import type { FigureReference, FrontMatterSection, RecordSection } from '../core/record.js';
import {
  escapeLatex,
  formatFieldValue,
  graphicsPath,
  HEADER_COLOR_HEX,
  HEADER_COLOR_NAME,
  headerCell,
  tableRow,
  toLabelKey
} from './latex.js';
import { renderGroupFigures, resolveFieldSpecs, type SectionTemplate } from './section.js';

/** Campaign values substituted into front matter and the master preamble. */
export interface DocumentContext {
  project: string;
  title: string;
  recordCount: number;
}

/** One `\input` line of the master, in outline order. */
export type MasterEntry =
  | { kind: 'front-matter'; title: string; inputPath: string }
  | { kind: 'record'; group?: string; inputPath: string };

export interface MasterOptions extends DocumentContext {
  entries: readonly MasterEntry[];
  /** Header logo relative to the master document. */
  headerLogo?: string;
  /** Heading used for records without a group. */
  ungroupedHeading?: string;
  /** Group-scope figures by group label, written after the group's last record. */
  groupFigures?: ReadonlyMap<string, readonly FigureReference[]>;
}

const MASTER_PACKAGES = [
  'graphicx',
  'longtable',
  'float',
  '[a4paper, margin=1in]{geometry}',
  'tocbibind',
  'pdflscape',
  'tabularx',
  'fancyhdr',
  '[table]{xcolor}',
  'pdfpages',
  'hyperref'
];

const SUMMARY_PACKAGES = [
  '[margin=2in]{geometry}',
  'graphicx',
  'longtable',
  'tabularx',
  '[table]{xcolor}',
  'float',
  'pdfpages'
];

/** Front-matter body with `{project}`, `{title}`, and `{recordCount}` substituted, escaped. */
export function renderFrontMatter(section: FrontMatterSection, context: DocumentContext): string {
  const body = section.body.replace(/\{(project|title|recordCount)\}/g, (_match, token: string) => {
    if (token === 'project') {
      return context.project;
    }
    if (token === 'title') {
      return context.title;
    }
    return String(context.recordCount);
  });

  const paragraphs = body
    .split('\n')
    .map((line) => escapeLatex(line.trim()))
    .join('\n');
  return `${paragraphs}\n`;
}

/**
 * Standalone A3 landscape document holding one record's summary table:
 * identifier first, then every template field as a column.
 */
export function renderSummaryDocument(section: RecordSection, template: SectionTemplate): string {
  const specs = resolveFieldSpecs(section.record, template);
  const columnFormat = specs.length > 0 ? `|p{3cm}|${'X|'.repeat(specs.length)}` : '|p{3cm}|';
  const header = tableRow([headerCell('Identifier'), ...specs.map((spec) => headerCell(spec.label))]);
  const values = tableRow([
    escapeLatex(section.record.identifier),
    ...specs.map((spec) => formatFieldValue(section.record.fields.get(spec.name), spec, template))
  ]);

  return [
    '\\documentclass[a3paper,landscape]{article}',
    ...SUMMARY_PACKAGES.map(usePackage),
    `\\definecolor{${HEADER_COLOR_NAME}}{HTML}{${HEADER_COLOR_HEX}}`,
    '\\pagestyle{empty}',
    '\\begin{document}',
    '\\noindent',
    '\\renewcommand{\\arraystretch}{1.3}',
    '\\setlength{\\tabcolsep}{6pt}',
    '\\begin{table}[H]',
    '    \\centering',
    `    \\caption{${escapeLatex(section.record.identifier)} Results Table}`,
    `    \\label{tab:${toLabelKey(section.id)}-results}`,
    `    \\begin{tabularx}{\\linewidth}{${columnFormat}}`,
    '    \\hline',
    `    \\rowcolor{${HEADER_COLOR_NAME}}`,
    `    ${header}`,
    `    ${values}`,
    '    \\end{tabularx}',
    '\\end{table}',
    '\\end{document}',
    ''
  ].join('\n');
}

/**
 * Master document: preamble, title page, contents lists, front matter, then
 * record sections under one `\section` per group, each group closed by its
 * group-scope figures.
 */
export function renderMasterDocument(options: MasterOptions): string {
  const title = escapeLatex(options.title);
  const project = escapeLatex(options.project);
  const lines: string[] = [
    '\\documentclass{article}',
    ...MASTER_PACKAGES.map(usePackage),
    '',
    `\\definecolor{${HEADER_COLOR_NAME}}{HTML}{${HEADER_COLOR_HEX}}`,
    '',
    `\\title{${title}}`,
    `\\author{${project}}`,
    '\\date{\\today}',
    '',
    '\\pagestyle{fancy}',
    '\\fancyhf{}',
    `\\fancyhead[L]{${title} | ${project}}`
  ];

  if (options.headerLogo !== undefined) {
    lines.push(`\\fancyhead[R]{\\includegraphics[height=0.8cm]{${graphicsPath(options.headerLogo)}}}`);
  }

  lines.push(
    '\\renewcommand{\\headrulewidth}{0.2pt}',
    '\\setlength{\\headsep}{35pt}',
    '\\fancyfoot[C]{\\thepage}',
    '\\renewcommand{\\footrulewidth}{0pt}',
    '',
    '\\hypersetup{',
    '    colorlinks=true,',
    '    linkcolor=blue,',
    '    urlcolor=cyan,',
    `    pdftitle={${title}},`,
    '    bookmarks=true',
    '}',
    '',
    '\\begin{document}',
    '',
    '\\maketitle',
    '\\tableofcontents',
    '\\newpage',
    '\\listoftables',
    '\\newpage',
    '\\listoffigures',
    ''
  );

  let currentGroup: string | undefined;
  let currentLabel: string | undefined;
  let inRecords = false;
  const closeGroup = (): void => {
    if (currentLabel === undefined) {
      return;
    }
    const figures = options.groupFigures?.get(currentLabel) ?? [];
    if (figures.length > 0) {
      lines.push(...renderGroupFigures(currentLabel, figures), '\\clearpage');
    }
  };

  for (const entry of options.entries) {
    if (entry.kind === 'front-matter') {
      lines.push(
        '\\newpage',
        `\\section*{${escapeLatex(entry.title)}}`,
        `\\addcontentsline{toc}{section}{${escapeLatex(entry.title)}}`,
        `\\input{${entry.inputPath}}`,
        ''
      );
      continue;
    }

    const group = entry.group ?? options.ungroupedHeading ?? 'Test Locations';
    if (!inRecords || group !== currentGroup) {
      closeGroup();
      lines.push('\\clearpage', `\\section{${escapeLatex(group)}}`);
      currentGroup = group;
      currentLabel = entry.group;
      inRecords = true;
    }
    lines.push(`\\input{${entry.inputPath}}`, '\\clearpage');
  }
  closeGroup();

  lines.push('', '\\end{document}', '');
  return lines.join('\n');
}

function usePackage(spec: string): string {
  return spec.includes('{') ? `\\usepackage${spec}` : `\\usepackage{${spec}}`;
}
