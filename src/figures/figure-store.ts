import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

/** Read-only view of the directories holding pre-rendered figures. */
export interface FigureStore {
  exists(directory: string, fileName: string): Promise<boolean>;
  /** File names directly under `directory`; a missing directory lists as empty. */
  list(directory: string): Promise<string[]>;
}

/** Figure store backed by the local file system. */
export class FileSystemFigureStore implements FigureStore {
  async exists(directory: string, fileName: string): Promise<boolean> {
    try {
      const stats = await stat(path.join(directory, fileName));
      return stats.isFile();
    } catch (error) {
      if (isMissingPathError(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(directory: string): Promise<string[]> {
    try {
      const entries = await readdir(directory, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isMissingPathError(error)) {
        return [];
      }
      throw error;
    }
  }
}

/** True for ENOENT/ENOTDIR errors raised by `node:fs`. */
export function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}
