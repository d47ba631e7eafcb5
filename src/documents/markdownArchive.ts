import path from 'path';
import type { BlobServiceClient } from '@azure/storage-blob';

/**
 * Destination for markdown copies of extracted document text
 */
export interface MarkdownStore {
  save(name: string, content: string): Promise<void>;
}

/**
 * "contracts/supply.pdf" → "contracts/supply.md"
 */
export function markdownNameFor(sourceName: string): string {
  const parsed = path.posix.parse(sourceName);
  return path.posix.join(parsed.dir, `${parsed.name}.md`);
}

export function buildMarkdown(text: string, sourceName: string, extractedAt: Date): string {
  return (
    '# Extracted Text\n\n' +
    `**Source File:** ${sourceName}\n\n` +
    `**Extraction Date:** ${extractedAt.toISOString()}\n\n` +
    `---\n\n${text}`
  );
}

/**
 * Uploads markdown copies into a blob container, creating it on first use
 */
export class BlobMarkdownStore implements MarkdownStore {
  private client: BlobServiceClient;
  private containerName: string;
  private ready: Promise<unknown> | null = null;

  constructor(client: BlobServiceClient, containerName: string) {
    this.client = client;
    this.containerName = containerName;
  }

  async save(name: string, content: string): Promise<void> {
    const container = this.client.getContainerClient(this.containerName);
    if (!this.ready) {
      this.ready = container.createIfNotExists().catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    await this.ready;

    await container.getBlockBlobClient(name).upload(content, Buffer.byteLength(content), {
      blobHTTPHeaders: { blobContentType: 'text/markdown; charset=utf-8' },
    });
  }
}
