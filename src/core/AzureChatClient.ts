import OpenAI, { AzureOpenAI } from 'openai';
import { errorMessage, ExtractionResponseError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
  /** Ask for a JSON object response */
  json: boolean;
  maxCompletionTokens: number;
}

/**
 * Minimal chat completion contract used by the metadata extractor
 */
export interface ChatClient {
  complete(request: ChatRequest): Promise<string>;
}

/**
 * Azure OpenAI Chat Client
 *
 * One chat completion per call. Rate-limit and timeout errors are rethrown
 * untouched so the concurrent runner can classify them and back off.
 */
export class AzureChatClient implements ChatClient {
  private client: AzureOpenAI;
  private deployment: string;
  private logger = createLogger('AzureChatClient');

  constructor(client: AzureOpenAI, deployment: string) {
    this.client = client;
    this.deployment = deployment;
  }

  async complete(request: ChatRequest): Promise<string> {
    const messages = request.messages.map((message) =>
      message.role === 'system'
        ? { role: 'system' as const, content: message.content }
        : { role: 'user' as const, content: message.content }
    );

    try {
      const completion = await this.client.chat.completions.create({
        model: this.deployment,
        messages,
        response_format: request.json ? { type: 'json_object' } : undefined,
        max_completion_tokens: request.maxCompletionTokens,
      });

      const choice = completion.choices[0];
      if (choice?.finish_reason === 'length') {
        throw new ExtractionResponseError(
          `Response truncated - hit token limit (${completion.usage?.completion_tokens ?? 'unknown'} tokens)`
        );
      }

      const content = choice?.message?.content;
      if (!content) {
        throw new ExtractionResponseError('No content in response');
      }

      return content;
    } catch (error) {
      if (error instanceof OpenAI.RateLimitError) {
        this.logger.warn('Rate limit hit', {
          error: error.message,
          retryAfter: error.headers?.['retry-after'],
          remainingRequests: error.headers?.['x-ratelimit-remaining-requests'],
          remainingTokens: error.headers?.['x-ratelimit-remaining-tokens'],
        });
      } else if (!(error instanceof ExtractionResponseError)) {
        this.logger.error('API call failed', {
          error: errorMessage(error),
        });
      }
      throw error;
    }
  }
}
