import path from 'path';
import fs from 'fs/promises';
import { EnumerationError, errorMessage } from '../utils/errors.js';
import { byName, normalizeExtensions, TaskSource, WorkItem } from './types.js';

/**
 * Lists the contract files of a local folder (non-recursive).
 */
export class LocalFolderSource implements TaskSource {
  private folder: string;
  private extensions: Set<string>;

  constructor(folder: string, allowedExtensions: readonly string[]) {
    this.folder = folder;
    this.extensions = normalizeExtensions(allowedExtensions);
  }

  get description(): string {
    return `Local folder: ${this.folder}`;
  }

  async list(): Promise<WorkItem[]> {
    const absolute = path.resolve(this.folder);

    const stat = await fs.stat(absolute).catch((error: unknown) => {
      throw new EnumerationError(`Folder not found: ${this.folder}`, { cause: error });
    });
    if (!stat.isDirectory()) {
      throw new EnumerationError(`Not a folder: ${this.folder}`);
    }

    const entries = await fs.readdir(absolute, { withFileTypes: true }).catch((error: unknown) => {
      throw new EnumerationError(
        `Could not read folder ${this.folder}: ${errorMessage(error)}`,
        { cause: error }
      );
    });

    const items: WorkItem[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) continue;

      const extension = path.extname(entry.name).toLowerCase();
      if (!this.extensions.has(extension)) continue;

      items.push({
        name: entry.name,
        extension,
        location: { kind: 'local', path: path.join(absolute, entry.name) },
      });
    }

    return items.sort(byName);
  }
}
