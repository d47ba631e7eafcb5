import DocumentIntelligence, { DocumentIntelligenceClient } from '@azure-rest/ai-document-intelligence';
import { DefaultAzureCredential } from '@azure/identity';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

dotenv.config();

/**
 * Azure Document Intelligence Configuration
 *
 * OCR for PDFs. Uses DOCUMENT_INTELLIGENCE_KEY when set, otherwise
 * DefaultAzureCredential. Without DOCUMENT_INTELLIGENCE_ENDPOINT, PDFs are
 * read from their text layer only.
 */
export class DocumentIntelligenceConfig {
  private static client: DocumentIntelligenceClient | null = null;

  static isConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
    return Boolean(env.DOCUMENT_INTELLIGENCE_ENDPOINT);
  }

  static getClient(env: NodeJS.ProcessEnv = process.env): DocumentIntelligenceClient {
    if (this.client) {
      return this.client;
    }

    const endpoint = env.DOCUMENT_INTELLIGENCE_ENDPOINT;
    if (!endpoint) {
      throw new ConfigurationError(
        'Azure Document Intelligence not configured. Please set DOCUMENT_INTELLIGENCE_ENDPOINT in .env'
      );
    }

    const key = env.DOCUMENT_INTELLIGENCE_KEY;
    this.client = key
      ? DocumentIntelligence(endpoint, { key })
      : DocumentIntelligence(endpoint, new DefaultAzureCredential());

    logger.info('Document Intelligence client initialized', {
      endpoint,
      auth: key ? 'api-key' : 'entra-id',
    });

    return this.client;
  }

  static resetClient(): void {
    dotenv.config({ override: true });
    this.client = null;
  }
}
