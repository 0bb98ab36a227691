import path from 'node:path';

import type { FigureStore } from '../figures/figure-store.js';

/** In-process figure store keyed by absolute directory, for tests and dry runs. */
export class InMemoryFigureStore implements FigureStore {
  private readonly directories = new Map<string, Set<string>>();
  /** Directories passed to `list`, in call order. */
  readonly listCalls: string[] = [];

  constructor(files: Record<string, readonly string[]> = {}) {
    for (const [directory, names] of Object.entries(files)) {
      for (const name of names) {
        this.add(directory, name);
      }
    }
  }

  add(directory: string, fileName: string): this {
    const key = path.resolve(directory);
    const names = this.directories.get(key) ?? new Set<string>();
    names.add(fileName);
    this.directories.set(key, names);
    return this;
  }

  async exists(directory: string, fileName: string): Promise<boolean> {
    return this.directories.get(path.resolve(directory))?.has(fileName) ?? false;
  }

  async list(directory: string): Promise<string[]> {
    this.listCalls.push(directory);
    return [...(this.directories.get(path.resolve(directory)) ?? [])].sort();
  }
}
