import path from 'node:path';

import type { FigureCategoryConfig, FigureMatchingConfig } from '../config/campaign-config.js';
import type { Diagnostic } from '../core/diagnostics.js';
import { AmbiguousFigureError } from '../core/errors.js';
import type { FigureReference, FigureSlot, RecordSection, UnresolvedReason } from '../core/record.js';
import { isGraphicsPathSafe } from '../render/latex.js';
import { expandFigurePattern, figureNameKey, selectFigureCandidate } from './figure-names.js';
import type { FigureStore } from './figure-store.js';

export interface FigureResolverOptions {
  /** Directory that category directories and the placeholder resolve against. */
  rootDir: string;
  /** Directory of the master document; markup paths are written relative to it. */
  masterDir: string;
  categories: readonly FigureCategoryConfig[];
  matching: FigureMatchingConfig;
  /** Placeholder image, relative to `rootDir`. Without one, unresolved slots are omitted. */
  placeholder?: string;
}

/** Figures for one record plus the warnings raised while resolving them. */
export interface FigureResolution {
  references: FigureReference[];
  diagnostics: Diagnostic[];
}

/** Cell values that switch a category off for one record. */
const DISABLED_VALUES = new Set(['no', 'false', '0', 'n']);

/**
 * Maps records to figure files by naming convention.
 * Lookups only read the store, so one resolver can serve concurrent sections;
 * directory listings are cached for the resolver's lifetime.
 */
export class FigureResolver {
  private readonly listings = new Map<string, Promise<string[]>>();

  constructor(
    private readonly store: FigureStore,
    private readonly options: FigureResolverOptions
  ) {}

  /** Resolve every configured category for one record section. */
  async resolve(section: RecordSection): Promise<FigureResolution> {
    const references: FigureReference[] = [];
    const diagnostics: Diagnostic[] = [];

    for (const category of this.options.categories) {
      if (category.scope === 'group') {
        continue;
      }
      const tokens = { identifier: section.record.identifier, category: category.category, group: section.group };
      const caption = expandFigurePattern(category.caption, tokens);

      if (isDisabled(section, category)) {
        references.push({ category: category.category, caption, slot: { status: 'disabled' } });
        continue;
      }

      const expectedName = expandFigurePattern(category.pattern, tokens);
      const directory = path.resolve(this.options.rootDir, category.directory);
      const slot = await this.resolveSlot(section, category.category, directory, expectedName, diagnostics);
      references.push({ category: category.category, caption, slot });
    }

    return { references, diagnostics };
  }

  /**
   * Every group-scope image for one group: accepted extensions whose name
   * contains the category's expanded pattern, in code-unit order.
   */
  async resolveGroup(group: string): Promise<FigureResolution> {
    const references: FigureReference[] = [];
    const diagnostics: Diagnostic[] = [];

    for (const category of this.options.categories) {
      if (category.scope !== 'group') {
        continue;
      }
      const tokens = { identifier: '', category: category.category, group };
      const needle = expandFigurePattern(category.pattern, tokens);
      const directory = path.resolve(this.options.rootDir, category.directory);
      const matches = (await this.list(directory))
        .filter((fileName) => fileName.includes(needle) && figureNameKey(fileName, this.options.matching) !== undefined)
        .sort();

      for (const fileName of matches) {
        const markupPath = this.markupPath(path.join(directory, fileName));
        if (!isGraphicsPathSafe(markupPath)) {
          diagnostics.push(unusableName(category.category, markupPath));
          continue;
        }
        references.push({
          category: category.category,
          caption: expandFigurePattern(category.caption, { ...tokens, file: fileName }),
          slot: { status: 'resolved', path: markupPath, fileName }
        });
      }
    }

    return { references, diagnostics };
  }

  private async resolveSlot(
    section: RecordSection,
    category: string,
    directory: string,
    expectedName: string,
    diagnostics: Diagnostic[]
  ): Promise<FigureSlot> {
    if (await this.store.exists(directory, expectedName)) {
      return this.resolved(section, category, directory, expectedName, diagnostics);
    }

    let match: string | undefined;
    try {
      match = selectFigureCandidate(category, expectedName, await this.list(directory), this.options.matching);
    } catch (error) {
      if (!(error instanceof AmbiguousFigureError)) {
        throw error;
      }
      diagnostics.push({
        code: 'FIGURE_AMBIGUOUS',
        severity: 'warning',
        message: error.message,
        sectionId: section.id,
        category
      });
      return this.unresolved('ambiguous');
    }

    if (match !== undefined) {
      diagnostics.push({
        code: 'FIGURE_NEAR_MATCH',
        severity: 'info',
        message: `Using '${match}' for expected '${category}' figure '${expectedName}'.`,
        sectionId: section.id,
        category
      });
      return this.resolved(section, category, directory, match, diagnostics);
    }

    diagnostics.push({
      code: 'FIGURE_MISSING',
      severity: 'warning',
      message: `No '${category}' figure '${expectedName}' in ${directory}.`,
      sectionId: section.id,
      category
    });
    return this.unresolved('missing');
  }

  private resolved(
    section: RecordSection,
    category: string,
    directory: string,
    fileName: string,
    diagnostics: Diagnostic[]
  ): FigureSlot {
    const markupPath = this.markupPath(path.join(directory, fileName));
    if (!isGraphicsPathSafe(markupPath)) {
      diagnostics.push({ ...unusableName(category, markupPath), sectionId: section.id });
      return this.unresolved('unusable');
    }
    return { status: 'resolved', path: markupPath, fileName };
  }

  private unresolved(reason: UnresolvedReason): FigureSlot {
    if (this.options.placeholder === undefined) {
      return { status: 'omitted', reason };
    }
    return {
      status: 'placeholder',
      path: this.markupPath(path.resolve(this.options.rootDir, this.options.placeholder)),
      reason
    };
  }

  /** Path relative to the master document, with forward slashes for LaTeX. */
  private markupPath(absolutePath: string): string {
    return path.relative(this.options.masterDir, absolutePath).split(path.sep).join('/');
  }

  private list(directory: string): Promise<string[]> {
    let listing = this.listings.get(directory);
    if (!listing) {
      listing = this.store.list(directory);
      this.listings.set(directory, listing);
    }
    return listing;
  }
}

function unusableName(category: string, markupPath: string): Diagnostic {
  return {
    code: 'FIGURE_UNUSABLE_NAME',
    severity: 'warning',
    message: `'${category}' figure path '${markupPath}' contains %, #, braces or a backslash and cannot be included.`,
    category
  };
}

function isDisabled(section: RecordSection, category: FigureCategoryConfig): boolean {
  if (category.enabledField === undefined) {
    return false;
  }
  const value = section.record.fields.get(category.enabledField);
  if (value === null || value === undefined || value instanceof Date) {
    return false;
  }
  return DISABLED_VALUES.has(String(value).trim().toLowerCase());
}
