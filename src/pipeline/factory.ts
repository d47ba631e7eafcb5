import { AzureConfig } from '../config/azure.js';
import { DocumentIntelligenceConfig } from '../config/documentIntelligence.js';
import type { ExtractionConfig } from '../config/extraction.js';
import { StorageConfig } from '../config/storage.js';
import { AzureChatClient } from '../core/AzureChatClient.js';
import { MetadataExtractor } from '../core/MetadataExtractor.js';
import { AzureBlobDownloader, DocumentReader } from '../documents/documentReader.js';
import { DocumentIntelligenceOcr, PdfOcr } from '../documents/ocrReader.js';
import { BlobMarkdownStore } from '../documents/markdownArchive.js';
import { BlobContainerSource } from '../sources/BlobContainerSource.js';
import { LocalFolderSource } from '../sources/LocalFolderSource.js';
import type { TaskSource } from '../sources/types.js';
import { EnumerationError } from '../utils/errors.js';

export type SourceKind = 'blob' | 'local';

/**
 * Build the task source for a batch
 */
export function createTaskSource(kind: SourceKind, location: string, config: ExtractionConfig): TaskSource {
  if (kind === 'local') {
    return new LocalFolderSource(location, config.allowedExtensions);
  }

  if (!StorageConfig.isConfigured()) {
    throw new EnumerationError(
      'Azure Blob Storage not configured. Set STORAGE_ACCOUNT_NAME (or AZURE_STORAGE_CONNECTION_STRING) in .env'
    );
  }
  const container = StorageConfig.getClient().getContainerClient(location);
  return new BlobContainerSource(container, config.allowedExtensions);
}

/**
 * PDF OCR when Document Intelligence is configured and not switched off
 */
export function createPdfOcr(config: ExtractionConfig, env: NodeJS.ProcessEnv = process.env): PdfOcr | undefined {
  if (!config.useOcrForPdfs || !DocumentIntelligenceConfig.isConfigured(env)) {
    return undefined;
  }
  return new DocumentIntelligenceOcr(DocumentIntelligenceConfig.getClient(env));
}

/**
 * Build the metadata extractor wired to Azure OpenAI (and blob storage and
 * Document Intelligence when they are configured)
 */
export function createMetadataExtractor(config: ExtractionConfig): MetadataExtractor {
  const chat = new AzureChatClient(AzureConfig.getClient(), AzureConfig.getDeployment());
  const blobClient = StorageConfig.isConfigured() ? StorageConfig.getClient() : undefined;
  const reader = new DocumentReader(blobClient ? new AzureBlobDownloader(blobClient) : undefined, {
    ocr: createPdfOcr(config),
    ocrFromBlobUrl: config.ocrFromBlobUrl,
  });

  return new MetadataExtractor({
    chat,
    reader,
    settings: config,
    markdownStore: blobClient ? new BlobMarkdownStore(blobClient, config.markdownContainer) : undefined,
  });
}
