import { mkdir, mkdtemp, readFile, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { DocumentComposer, type ComposedFile } from '../../src/compose/composer.js';
import { planLayout, toMarkupPath, type DocumentLayout } from '../../src/compose/layout.js';
import { CompositionError } from '../../src/core/errors.js';
import type { FieldValue } from '../../src/core/record.js';
import { buildOutline } from '../../src/outline/outline.js';

async function createLayout(): Promise<DocumentLayout> {
  const tempDir = await mkdtemp(path.join(os.tmpdir(), 'campaign-compose-'));
  const fields = new Map<string, FieldValue>([['Order', 1]]);
  const outline = buildOutline(
    [{ identifier: 'Site 1', fields, orderingKey: 1, group: 'Soil', sourceRow: 1 }],
    {
      orderingField: 'Order',
      groupField: 'Type',
      frontMatter: [{ id: 'executive-summary', title: 'Executive Summary', body: '' }]
    }
  );
  return planLayout(outline, { master: path.join(tempDir, 'out', 'report.tex'), matterDir: 'Matter' });
}

function filesFor(layout: DocumentLayout): ComposedFile[] {
  const [front, record] = layout.sections;
  if (!front || !record?.summaryFile) {
    throw new Error('unexpected layout');
  }
  return [
    { kind: 'front-matter', sectionId: front.section.id, path: front.markupFile, content: 'front\n' },
    { kind: 'section', sectionId: record.section.id, path: record.markupFile, content: 'section\n' },
    { kind: 'summary', sectionId: record.section.id, path: record.summaryFile, content: 'summary\n' },
    { kind: 'master', path: layout.masterFile, content: 'master\n' }
  ];
}

describe('document layout', () => {
  it('mirrors the outline under the matter directory', async () => {
    const layout = await createLayout();
    const [front, record] = layout.sections;

    expect(layout.masterPdf).toBe(layout.masterFile.replace(/\.tex$/, '.pdf'));
    expect(toMarkupPath(layout, front?.markupFile ?? '')).toBe('Matter/executive-summary.tex');
    expect(toMarkupPath(layout, record?.markupFile ?? '')).toBe('Matter/Soil/Site_1/section_Site_1.tex');
    expect(toMarkupPath(layout, record?.summaryPdf ?? '')).toBe('Matter/Soil/Site_1/summary_Site_1.pdf');
  });
});

describe('document composer', () => {
  it('writes every file and flags stale section output', async () => {
    const layout = await createLayout();
    const staleDir = path.join(layout.matterDir, 'Old');
    await mkdir(staleDir, { recursive: true });
    await writeFile(path.join(staleDir, 'section_Old.tex'), 'old\n', 'utf8');

    const result = await new DocumentComposer(layout, { staleOutput: 'flag' }).compose(filesFor(layout));

    expect(result.artifacts.map((artifact) => artifact.kind)).toEqual(['front-matter', 'section', 'summary', 'master']);
    expect(await readFile(layout.masterFile, 'utf8')).toBe('master\n');
    expect(result.orphaned).toEqual([staleDir]);
    expect(result.diagnostics).toEqual([
      {
        code: 'ORPHANED_ARTIFACT',
        severity: 'warning',
        message: `Section output ${staleDir} is not part of this run and was left in place.`
      }
    ]);
    expect((await stat(staleDir)).isDirectory()).toBe(true);
  });

  it('removes stale section output under the delete policy', async () => {
    const layout = await createLayout();
    const staleDir = path.join(layout.matterDir, 'Old');
    await mkdir(staleDir, { recursive: true });
    await writeFile(path.join(staleDir, 'section_Old.tex'), 'old\n', 'utf8');

    const result = await new DocumentComposer(layout, { staleOutput: 'delete' }).compose(filesFor(layout));

    expect(result.orphaned).toEqual([]);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['STALE_OUTPUT_REMOVED']);
    await expect(stat(staleDir)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('overwrites output from a previous run without flagging it', async () => {
    const layout = await createLayout();
    const composer = new DocumentComposer(layout, { staleOutput: 'flag' });

    await composer.compose(filesFor(layout));
    const second = await composer.compose(filesFor(layout));

    expect(second.diagnostics).toEqual([]);
    expect(second.artifacts).toHaveLength(4);
  });

  it('reports the files written before a failed write and cleans up', async () => {
    const layout = await createLayout();
    await mkdir(layout.masterFile, { recursive: true });
    const files = filesFor(layout);

    const error = await new DocumentComposer(layout, { staleOutput: 'flag' })
      .compose(files)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CompositionError);
    expect(error).toMatchObject({
      filePath: layout.masterFile,
      writtenFiles: files.slice(0, 3).map((file) => file.path)
    });
    expect(await readFile(files[1]?.path ?? '', 'utf8')).toBe('section\n');
    await expect(stat(`${layout.masterFile}.${process.pid}.tmp`)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
