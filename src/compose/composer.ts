import { mkdir, readdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'winston';

import type { StaleOutputPolicy } from '../config/campaign-config.js';
import type { Diagnostic } from '../core/diagnostics.js';
import { CompositionError } from '../core/errors.js';
import type { ArtifactKind, DocumentArtifact } from '../core/record.js';
import { isMissingPathError } from '../figures/figure-store.js';
import type { DocumentLayout } from './layout.js';

/** One rendered file waiting to be written. */
export interface ComposedFile {
  kind: ArtifactKind;
  sectionId?: string;
  path: string;
  content: string;
}

export interface ComposeOptions {
  staleOutput: StaleOutputPolicy;
  logger?: Logger;
}

export interface CompositionResult {
  artifacts: DocumentArtifact[];
  /** Directories holding section output this outline did not produce. */
  orphaned: string[];
  diagnostics: Diagnostic[];
}

const SECTION_FILE_PATTERN = /^section_.+\.tex$/;

/**
 * Writes rendered fragments into the layout's directory tree.
 * Directories are created once up front; each file is written to a temporary
 * sibling and renamed, and the temporary file is removed if the write fails.
 */
export class DocumentComposer {
  constructor(
    private readonly layout: DocumentLayout,
    private readonly options: ComposeOptions
  ) {}

  /**
   * Write `files` in order. Throws `CompositionError` on the first failed write;
   * files written before it stay on disk.
   */
  async compose(files: readonly ComposedFile[]): Promise<CompositionResult> {
    await this.createDirectories(files);

    const { orphaned, diagnostics } = await this.handleStaleOutput(files);
    const artifacts: DocumentArtifact[] = [];
    const written: string[] = [];

    for (const file of files) {
      await writeAtomically(file.path, file.content, written);
      written.push(file.path);
      const artifact: DocumentArtifact = { kind: file.kind, path: file.path };
      if (file.sectionId !== undefined) {
        artifact.sectionId = file.sectionId;
      }
      artifacts.push(artifact);
    }

    this.options.logger?.info(`Wrote ${artifacts.length} markup files under ${this.layout.rootDir}`);
    return { artifacts, orphaned, diagnostics };
  }

  private async createDirectories(files: readonly ComposedFile[]): Promise<void> {
    const directories = new Set<string>([this.layout.rootDir, this.layout.matterDir]);
    for (const file of files) {
      directories.add(path.dirname(file.path));
    }

    for (const directory of [...directories].sort()) {
      try {
        await mkdir(directory, { recursive: true });
      } catch (error) {
        throw new CompositionError(directory, [], error);
      }
    }
  }

  /** Flag (or delete) section files from earlier runs that this outline no longer produces. */
  private async handleStaleOutput(
    files: readonly ComposedFile[]
  ): Promise<{ orphaned: string[]; diagnostics: Diagnostic[] }> {
    const expected = new Set(files.map((file) => path.resolve(file.path)));
    const expectedDirectories = [...expected].map((filePath) => path.dirname(filePath));
    const stale = (await findSectionFiles(this.layout.matterDir)).filter((filePath) => !expected.has(filePath));

    const orphanPaths = new Set<string>();
    for (const filePath of stale) {
      const directory = path.dirname(filePath);
      const holdsCurrentOutput = expectedDirectories.some(
        (expectedDir) => expectedDir === directory || expectedDir.startsWith(`${directory}${path.sep}`)
      );
      orphanPaths.add(holdsCurrentOutput || directory === this.layout.matterDir ? filePath : directory);
    }

    const orphaned: string[] = [];
    const diagnostics: Diagnostic[] = [];
    for (const orphanPath of orphanPaths) {
      if (this.options.staleOutput === 'delete') {
        await rm(orphanPath, { recursive: true, force: true });
        diagnostics.push({
          code: 'STALE_OUTPUT_REMOVED',
          severity: 'info',
          message: `Removed stale section output ${orphanPath}.`
        });
        continue;
      }

      orphaned.push(orphanPath);
      diagnostics.push({
        code: 'ORPHANED_ARTIFACT',
        severity: 'warning',
        message: `Section output ${orphanPath} is not part of this run and was left in place.`
      });
    }

    return { orphaned, diagnostics };
  }
}

/** Write through a temporary sibling so a failed write never leaves a truncated file. */
async function writeAtomically(filePath: string, content: string, written: readonly string[]): Promise<void> {
  const temporaryPath = `${filePath}.${process.pid}.tmp`;
  try {
    await writeFile(temporaryPath, content, 'utf8');
    await rename(temporaryPath, filePath);
  } catch (error) {
    await rm(temporaryPath, { force: true });
    throw new CompositionError(filePath, [...written], error);
  }
}

/** Recursively collect `section_*.tex` files below `rootDir`, sorted. */
async function findSectionFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isMissingPathError(error)) {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }

      if (SECTION_FILE_PATTERN.test(entry.name)) {
        matches.push(path.resolve(fullPath));
      }
    }
  }

  await walk(rootDir);
  return matches.sort();
}
