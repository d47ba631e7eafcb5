import { BlobServiceClient } from '@azure/storage-blob';
import { DefaultAzureCredential } from '@azure/identity';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

dotenv.config();

/**
 * Azure Blob Storage Configuration
 *
 * Connects with AZURE_STORAGE_CONNECTION_STRING when set, otherwise with
 * STORAGE_ACCOUNT_NAME and DefaultAzureCredential.
 */
export class StorageConfig {
  private static client: BlobServiceClient | null = null;

  static isConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
    return Boolean(env.AZURE_STORAGE_CONNECTION_STRING || env.STORAGE_ACCOUNT_NAME);
  }

  static getAccountName(env: NodeJS.ProcessEnv = process.env): string | undefined {
    return env.STORAGE_ACCOUNT_NAME || undefined;
  }

  /**
   * Get or create the blob service client
   */
  static getClient(env: NodeJS.ProcessEnv = process.env): BlobServiceClient {
    if (this.client) {
      return this.client;
    }

    const connectionString = env.AZURE_STORAGE_CONNECTION_STRING;
    const accountName = env.STORAGE_ACCOUNT_NAME;

    if (connectionString) {
      this.client = BlobServiceClient.fromConnectionString(connectionString);
    } else if (accountName) {
      this.client = new BlobServiceClient(
        `https://${accountName}.blob.core.windows.net`,
        new DefaultAzureCredential()
      );
    } else {
      throw new ConfigurationError(
        'Azure Blob Storage not configured. ' +
          'Please set STORAGE_ACCOUNT_NAME (or AZURE_STORAGE_CONNECTION_STRING) in .env'
      );
    }

    logger.info('Blob storage client initialized', {
      account: this.client.accountName,
      auth: connectionString ? 'connection-string' : 'entra-id',
    });

    return this.client;
  }

  static resetClient(): void {
    dotenv.config({ override: true });
    this.client = null;
  }
}
