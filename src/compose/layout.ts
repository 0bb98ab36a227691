import path from 'node:path';

import type { Outline, Section } from '../core/record.js';

/** Where one outline section's files live. All paths are absolute. */
export interface SectionLayout {
  section: Section;
  directory: string;
  markupFile: string;
  /** Standalone summary document; record sections only. */
  summaryFile?: string;
  summaryPdf?: string;
}

/** Output tree for one run, in outline order. */
export interface DocumentLayout {
  /** Directory of the master document; markup paths are relative to it. */
  rootDir: string;
  matterDir: string;
  masterFile: string;
  masterPdf: string;
  sections: SectionLayout[];
}

export interface LayoutOptions {
  /** Absolute path of the master markup file. */
  master: string;
  /** Matter directory, relative to the master's directory. */
  matterDir: string;
}

/**
 * Compute the output tree mirroring the outline:
 * `<matter>/<slug>.tex` for front matter and
 * `<matter>/[<group>/]<slug>/section_<slug>.tex` (+ summary) for records.
 */
export function planLayout(outline: Outline, options: LayoutOptions): DocumentLayout {
  const rootDir = path.dirname(options.master);
  const matterDir = path.resolve(rootDir, options.matterDir);

  const sections = outline.sections.map((section): SectionLayout => {
    if (section.kind === 'front-matter') {
      return { section, directory: matterDir, markupFile: path.join(matterDir, `${section.slug}.tex`) };
    }

    const directory = section.groupSlug
      ? path.join(matterDir, section.groupSlug, section.slug)
      : path.join(matterDir, section.slug);
    return {
      section,
      directory,
      markupFile: path.join(directory, `section_${section.slug}.tex`),
      summaryFile: path.join(directory, `summary_${section.slug}.tex`),
      summaryPdf: path.join(directory, `summary_${section.slug}.pdf`)
    };
  });

  return {
    rootDir,
    matterDir,
    masterFile: options.master,
    masterPdf: replaceExtension(options.master, '.pdf'),
    sections
  };
}

/** Path of `absolutePath` relative to the master document, with forward slashes. */
export function toMarkupPath(layout: DocumentLayout, absolutePath: string): string {
  return path.relative(layout.rootDir, absolutePath).split(path.sep).join('/');
}

/** Swap a file's extension, appending when it has none. */
export function replaceExtension(filePath: string, extension: string): string {
  const current = path.extname(filePath);
  return current ? `${filePath.slice(0, -current.length)}${extension}` : `${filePath}${extension}`;
}
