import { describe, expect, it } from 'vitest';

import type { FieldValue, FigureReference, FrontMatterSection, RecordSection } from '../../src/core/record.js';
import { renderFrontMatter, renderMasterDocument, renderSummaryDocument } from '../../src/render/documents.js';
import { escapeLatex, formatFieldValue, toLabelKey } from '../../src/render/latex.js';
import { renderSection, type SectionTemplate } from '../../src/render/section.js';

const TEMPLATE: SectionTemplate = {
  fields: [
    { name: 'Depth', label: 'Depth (m)', precision: 1, unit: 'm' },
    { name: 'Operator', label: 'Operator' }
  ],
  identifierField: 'Id',
  missingToken: 'N/A',
  precision: 2,
  dateFormat: 'yyyy-MM-dd'
};

function recordSection(identifier: string, values: Record<string, FieldValue>): RecordSection {
  const fields = new Map<string, FieldValue>([['Id', identifier], ...Object.entries(values)]);
  return { kind: 'record', id: identifier, title: identifier, slug: identifier, record: { identifier, fields, sourceRow: 1 } };
}

describe('latex helpers', () => {
  it('escapes every special character once', () => {
    expect(escapeLatex('50% of $x_1 & {y} #2 ~ ^ \\')).toBe(
      '50\\% of \\$x\\_1 \\& \\{y\\} \\#2 \\textasciitilde{} \\textasciicircum{} \\textbackslash{}'
    );
  });

  it('derives label keys', () => {
    expect(toLabelKey('Site 1_North')).toBe('Site-1-North');
    expect(toLabelKey('__')).toBe('item');
  });

  it('formats numbers, dates and missing values', () => {
    const format = { missingToken: 'N/A', precision: 2, dateFormat: 'yyyy-MM-dd' };

    expect(formatFieldValue(3.14159, undefined, format)).toBe('3.14');
    expect(formatFieldValue(3.14159, { name: 'x', label: 'x', precision: 0, unit: '%' }, format)).toBe('3~\\%');
    expect(formatFieldValue(new Date(2024, 0, 9), undefined, format)).toBe('2024-01-09');
    expect(formatFieldValue(null, undefined, format)).toBe('N/A');
    expect(formatFieldValue(undefined, undefined, { ...format, missingToken: '--_--' })).toBe('--\\_--');
    expect(formatFieldValue('a&b', undefined, format)).toBe('a\\&b');
  });
});

describe('section renderer', () => {
  const section = recordSection('A_1', { Depth: 12.345, Operator: null });
  const figures: FigureReference[] = [
    {
      category: 'Map',
      caption: 'A_1 Map',
      slot: { status: 'resolved', path: '../figures/A_1_Map.png', fileName: 'A_1_Map.png' }
    },
    { category: 'Overlay', caption: 'A_1 Overlay', slot: { status: 'placeholder', path: 'missing.png', reason: 'ambiguous' } },
    { category: 'Photo', caption: 'A_1 Photo', slot: { status: 'disabled' } },
    { category: 'Core', caption: 'A_1 Core', slot: { status: 'omitted', reason: 'missing' } }
  ];

  it('renders the field table, summary include and figure blocks', () => {
    const markup = renderSection({ section, figures, summaryPdfPath: 'Matter/A_1/summary_A_1.pdf' }, TEMPLATE);

    expect(markup).toBe(
      [
        '\\subsection{A\\_1}',
        '\\label{sec:A-1}',
        '',
        '\\begin{table}[H]',
        '    \\centering',
        '    \\caption{A\\_1 Field Values}',
        '    \\label{tab:A-1-fields}',
        '    \\begin{tabularx}{\\linewidth}{|p{5cm}|X|}',
        '    \\hline',
        '    \\rowcolor{headerblue}',
        '    \\textcolor{white}{\\textbf{Field}} & \\textcolor{white}{\\textbf{Value}} \\\\ \\hline',
        '    Depth (m) & 12.3~m \\\\ \\hline',
        '    Operator & N/A \\\\ \\hline',
        '    \\end{tabularx}',
        '\\end{table}',
        '',
        '\\IfFileExists{Matter/A_1/summary_A_1.pdf}{%',
        '  \\clearpage',
        '  \\includepdf[pages=-, pagecommand={\\thispagestyle{empty}}, fitpaper=true]{Matter/A_1/summary_A_1.pdf}',
        '  \\clearpage',
        '}{\\textit{Summary table unavailable.}}',
        '',
        '\\begin{figure}[H]',
        '    \\centering',
        '    \\includegraphics[width=\\textwidth]{\\detokenize{../figures/A_1_Map.png}}',
        '    \\caption{A\\_1 Map}',
        '    \\label{fig:A-1-Map}',
        '\\end{figure}',
        '',
        '\\begin{figure}[H]',
        '    \\centering',
        '    \\includegraphics[width=\\textwidth]{\\detokenize{missing.png}}',
        '    \\caption{A\\_1 Overlay (figure ambiguous)}',
        '    \\label{fig:A-1-Overlay}',
        '\\end{figure}',
        ''
      ].join('\n')
    );
  });

  it('renders byte-identical output for identical input', () => {
    const first = renderSection({ section, figures }, TEMPLATE);
    const second = renderSection({ section: recordSection('A_1', { Depth: 12.345, Operator: null }), figures }, TEMPLATE);
    expect(second).toBe(first);
  });

  it('falls back to every non-identifier column without configured fields', () => {
    const markup = renderSection(
      { section: recordSection('B', { Depth: 4, Notes: 'dry' }), figures: [] },
      { ...TEMPLATE, fields: [] }
    );

    expect(markup).toContain('    Depth & 4.00 \\\\ \\hline\n    Notes & dry \\\\ \\hline\n');
    expect(markup).not.toContain('    Id & ');
  });
});

describe('document renderers', () => {
  it('substitutes campaign values into front matter', () => {
    const section: FrontMatterSection = {
      kind: 'front-matter',
      id: 'intro',
      title: 'Intro',
      slug: 'intro',
      body: 'Report for {project} & {title}.\n  {recordCount} locations  '
    };

    expect(renderFrontMatter(section, { project: 'North_1', title: 'Soil', recordCount: 3 })).toBe(
      'Report for North\\_1 \\& Soil.\n3 locations\n'
    );
  });

  it('renders a standalone summary table', () => {
    const lines = renderSummaryDocument(recordSection('A', { Depth: 2, Operator: 'Kim' }), TEMPLATE).split('\n');

    expect(lines[0]).toBe('\\documentclass[a3paper,landscape]{article}');
    expect(lines).toContain('\\definecolor{headerblue}{HTML}{002060}');
    expect(lines).toContain('    \\caption{A Results Table}');
    expect(lines).toContain('    \\begin{tabularx}{\\linewidth}{|p{3cm}|X|X|}');
    expect(lines).toContain(
      '    \\textcolor{white}{\\textbf{Identifier}} & \\textcolor{white}{\\textbf{Depth (m)}} & \\textcolor{white}{\\textbf{Operator}} \\\\ \\hline'
    );
    expect(lines).toContain('    A & 2.0~m & Kim \\\\ \\hline');
  });

  it('renders the master with group headings in outline order', () => {
    const master = renderMasterDocument({
      project: 'North',
      title: 'Soil & Water',
      recordCount: 3,
      headerLogo: 'assets/logo.png',
      entries: [
        { kind: 'front-matter', title: 'Executive Summary', inputPath: 'Matter/executive-summary.tex' },
        { kind: 'record', group: 'Soil', inputPath: 'Matter/Soil/A/section_A.tex' },
        { kind: 'record', group: 'Soil', inputPath: 'Matter/Soil/B/section_B.tex' },
        { kind: 'record', group: 'Water', inputPath: 'Matter/Water/C/section_C.tex' }
      ]
    });
    const lines = master.split('\n');

    expect(lines).toContain('\\title{Soil \\& Water}');
    expect(lines).toContain('\\fancyhead[R]{\\includegraphics[height=0.8cm]{\\detokenize{assets/logo.png}}}');
    expect(lines.slice(lines.indexOf('\\listoffigures'))).toEqual([
      '\\listoffigures',
      '',
      '\\newpage',
      '\\section*{Executive Summary}',
      '\\addcontentsline{toc}{section}{Executive Summary}',
      '\\input{Matter/executive-summary.tex}',
      '',
      '\\clearpage',
      '\\section{Soil}',
      '\\input{Matter/Soil/A/section_A.tex}',
      '\\clearpage',
      '\\input{Matter/Soil/B/section_B.tex}',
      '\\clearpage',
      '\\clearpage',
      '\\section{Water}',
      '\\input{Matter/Water/C/section_C.tex}',
      '\\clearpage',
      '',
      '\\end{document}',
      ''
    ]);
  });

  it('uses one heading for ungrouped records', () => {
    const master = renderMasterDocument({
      project: 'North',
      title: 'Report',
      recordCount: 2,
      entries: [
        { kind: 'record', inputPath: 'Matter/A/section_A.tex' },
        { kind: 'record', inputPath: 'Matter/B/section_B.tex' }
      ]
    });

    expect(master.split('\n').filter((line) => line.startsWith('\\section{'))).toEqual(['\\section{Test Locations}']);
    expect(master).not.toContain('\\fancyhead[R]');
  });

  it('closes each group with its group-scope figures', () => {
    const plot = (fileName: string): FigureReference => ({
      category: 'Plots',
      caption: `Soil Plots: ${fileName}`,
      slot: { status: 'resolved', path: `../figures/plots/${fileName}`, fileName }
    });
    const master = renderMasterDocument({
      project: 'North',
      title: 'Report',
      recordCount: 2,
      entries: [
        { kind: 'record', group: 'Soil', inputPath: 'Matter/Soil/A/section_A.tex' },
        { kind: 'record', group: 'Water', inputPath: 'Matter/Water/C/section_C.tex' }
      ],
      groupFigures: new Map([['Soil', [plot('Soil_depth.png'), plot('Soil_moisture.png')]]])
    });
    const lines = master.split('\n');

    expect(lines.slice(lines.indexOf('\\section{Soil}'), lines.indexOf('\\section{Water}'))).toEqual([
      '\\section{Soil}',
      '\\input{Matter/Soil/A/section_A.tex}',
      '\\clearpage',
      '\\subsection{Plots}',
      '\\begin{figure}[H]',
      '    \\centering',
      '    \\includegraphics[width=\\textwidth]{\\detokenize{../figures/plots/Soil_depth.png}}',
      '    \\caption{Soil Plots: Soil\\_depth.png}',
      '    \\label{fig:group-Soil-1-Plots}',
      '\\end{figure}',
      '\\begin{figure}[H]',
      '    \\centering',
      '    \\includegraphics[width=\\textwidth]{\\detokenize{../figures/plots/Soil_moisture.png}}',
      '    \\caption{Soil Plots: Soil\\_moisture.png}',
      '    \\label{fig:group-Soil-2-Plots}',
      '\\end{figure}',
      '\\clearpage',
      '\\clearpage'
    ]);
    expect(lines.filter((line) => line === '\\subsection{Plots}')).toHaveLength(1);
  });
});
