import path from 'path';
import { EnumerationError, errorMessage } from '../utils/errors.js';
import { byName, normalizeExtensions, TaskSource, WorkItem } from './types.js';

/**
 * The part of @azure/storage-blob's ContainerClient used for listing
 */
export interface ListableContainer {
  readonly containerName: string;
  exists(): Promise<boolean>;
  listBlobsFlat(): AsyncIterable<{ name: string }>;
  getBlobClient(blobName: string): { readonly url: string };
}

/**
 * Lists the contract blobs of an Azure Blob Storage container.
 * Virtual folders are kept in the item name ("2024/amendment.pdf").
 */
export class BlobContainerSource implements TaskSource {
  private container: ListableContainer;
  private extensions: Set<string>;

  constructor(container: ListableContainer, allowedExtensions: readonly string[]) {
    this.container = container;
    this.extensions = normalizeExtensions(allowedExtensions);
  }

  get description(): string {
    return `Blob container: ${this.container.containerName}`;
  }

  async list(): Promise<WorkItem[]> {
    const containerName = this.container.containerName;
    const items: WorkItem[] = [];

    try {
      if (!(await this.container.exists())) {
        throw new EnumerationError(`Container not found: ${containerName}`);
      }

      for await (const blob of this.container.listBlobsFlat()) {
        const extension = path.posix.extname(blob.name).toLowerCase();
        if (!this.extensions.has(extension)) continue;

        items.push({
          name: blob.name,
          extension,
          location: {
            kind: 'blob',
            container: containerName,
            blobName: blob.name,
            url: this.container.getBlobClient(blob.name).url,
          },
        });
      }
    } catch (error) {
      if (error instanceof EnumerationError) {
        throw error;
      }
      throw new EnumerationError(
        `Error accessing blob container ${containerName}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return items.sort(byName);
  }
}
