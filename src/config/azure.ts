import { AzureOpenAI } from 'openai';
import { DefaultAzureCredential, getBearerTokenProvider } from '@azure/identity';
import dotenv from 'dotenv';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { loadExtractionConfig } from './extraction.js';

dotenv.config();

const COGNITIVE_SERVICES_SCOPE = 'https://cognitiveservices.azure.com/.default';
const DEFAULT_API_VERSION = '2025-01-01-preview';
const DEFAULT_DEPLOYMENT = 'gpt-4o';

export interface AzureOpenAISettings {
  endpoint: string;
  deployment: string;
  apiVersion: string;
  /** When absent, Entra ID (DefaultAzureCredential) is used */
  apiKey?: string;
  timeoutMs: number;
}

/**
 * Azure OpenAI Configuration
 *
 * Manages the connection to the Azure OpenAI chat deployment. Authenticates
 * with AZURE_OPENAI_API_KEY when set, otherwise with a bearer token from
 * DefaultAzureCredential (managed identity, az login, environment).
 */
export class AzureConfig {
  private static client: AzureOpenAI | null = null;

  /**
   * Get required environment variables
   */
  static getConfig(env: NodeJS.ProcessEnv = process.env): AzureOpenAISettings {
    const endpoint = env.AZURE_OPENAI_ENDPOINT;

    if (!endpoint) {
      throw new ConfigurationError(
        'Missing required Azure OpenAI configuration. ' +
          'Please ensure AZURE_OPENAI_ENDPOINT is set in .env ' +
          '(and AZURE_OPENAI_DEPLOYMENT / AZURE_OPENAI_API_KEY where needed)'
      );
    }

    return {
      endpoint,
      deployment: env.AZURE_OPENAI_DEPLOYMENT || DEFAULT_DEPLOYMENT,
      apiVersion: env.AZURE_OPENAI_API_VERSION || DEFAULT_API_VERSION,
      apiKey: env.AZURE_OPENAI_API_KEY || undefined,
      timeoutMs: loadExtractionConfig(env).requestTimeoutMs,
    };
  }

  /**
   * Reset cached client (useful when environment variables change)
   */
  static resetClient(): void {
    dotenv.config({ override: true });
    this.client = null;
  }

  /**
   * Get or create the Azure OpenAI client.
   * SDK-level retries are disabled: the concurrent runner owns the retry budget.
   */
  static getClient(): AzureOpenAI {
    if (!this.client) {
      const config = this.getConfig();

      this.client = config.apiKey
        ? new AzureOpenAI({
            endpoint: config.endpoint,
            apiKey: config.apiKey,
            apiVersion: config.apiVersion,
            deployment: config.deployment,
            timeout: config.timeoutMs,
            maxRetries: 0,
          })
        : new AzureOpenAI({
            endpoint: config.endpoint,
            azureADTokenProvider: getBearerTokenProvider(
              new DefaultAzureCredential(),
              COGNITIVE_SERVICES_SCOPE
            ),
            apiVersion: config.apiVersion,
            deployment: config.deployment,
            timeout: config.timeoutMs,
            maxRetries: 0,
          });

      logger.info('Azure OpenAI client initialized', {
        endpoint: config.endpoint,
        deployment: config.deployment,
        apiVersion: config.apiVersion,
        auth: config.apiKey ? 'api-key' : 'entra-id',
      });
    }

    return this.client;
  }

  /**
   * Get the deployment name
   */
  static getDeployment(): string {
    return this.getConfig().deployment;
  }

  /**
   * Validate Azure configuration without creating client
   */
  static validate(env: NodeJS.ProcessEnv = process.env): boolean {
    try {
      this.getConfig(env);
      return true;
    } catch (error) {
      logger.error('Azure OpenAI configuration invalid', {
        error: errorMessage(error),
      });
      return false;
    }
  }
}
