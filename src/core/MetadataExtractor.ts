import path from 'path';
import { classifyFailure } from '../concurrent/retryPolicy.js';
import { AttemptOutcome, fatal, PayloadSummary, success } from '../concurrent/types.js';
import type { ExtractionConfig } from '../config/extraction.js';
import type { TextReader } from '../documents/documentReader.js';
import { buildMarkdown, MarkdownStore, markdownNameFor } from '../documents/markdownArchive.js';
import {
  analyzeFieldQuality,
  Confidence,
  ContractMetadata,
  ExtractionMethod,
  fieldValuesFrom,
  validateCriticalFields,
} from '../jobs/extract-contract-metadata/fields.js';
import {
  DIRECT_EXTRACTION_PROMPT,
  DIRECT_TEXT_LIMIT,
  ENGLISH_EXTRACTION_PROMPT,
  ENGLISH_TEXT_LIMIT,
  renderPrompt,
  SYSTEM_PROMPT,
  TRANSLATION_PROMPT,
  TRANSLATION_SYSTEM_PROMPT,
  TRANSLATION_TEXT_LIMIT,
} from '../jobs/extract-contract-metadata/prompt.js';
import {
  CONTRACT_METADATA_SCHEMA_ID,
  contractMetadataSchema,
} from '../jobs/extract-contract-metadata/schema.js';
import type { WorkItem } from '../sources/types.js';
import {
  DocumentReadError,
  errorMessage,
  ExtractionResponseError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { extractJsonFromResponse, validator } from '../utils/validators.js';
import type { ChatClient } from './AzureChatClient.js';

export type StrategySettings = Pick<
  ExtractionConfig,
  'useTwoCallForPdfs' | 'alwaysUseTwoCall' | 'translateOnLowConfidence' | 'saveMarkdown'
>;

export interface MetadataExtractorDeps {
  chat: ChatClient;
  reader: TextReader;
  settings: StrategySettings;
  /** Receives markdown copies of blob documents when saveMarkdown is on */
  markdownStore?: MarkdownStore;
  now?: () => Date;
}

const DIRECT_MAX_TOKENS = 1000;
const TRANSLATION_MAX_TOKENS = 16000;
const ENGLISH_MAX_TOKENS = 1500;

function readString(source: object, key: string): string | null {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : null;
}

function isConfidence(value: string | null): value is Confidence {
  return value === 'high' || value === 'medium' || value === 'low';
}

/**
 * Metadata Extractor
 *
 * Extraction operation for one contract. Reads the document, prompts the
 * deployment directly or through an English translation, and falls back to
 * translation when the direct answer is low confidence or misses critical
 * fields. Always resolves to a tagged outcome.
 */
export class MetadataExtractor {
  private chat: ChatClient;
  private reader: TextReader;
  private settings: StrategySettings;
  private markdownStore?: MarkdownStore;
  private now: () => Date;
  private logger = createLogger('MetadataExtractor');

  constructor(deps: MetadataExtractorDeps) {
    this.chat = deps.chat;
    this.reader = deps.reader;
    this.settings = deps.settings;
    this.markdownStore = deps.markdownStore;
    this.now = deps.now ?? (() => new Date());
  }

  async extract(item: WorkItem): Promise<AttemptOutcome<ContractMetadata>> {
    try {
      const text = await this.reader.read(item);
      await this.archiveText(item, text);

      if (this.usesTwoCall(item)) {
        const english = await this.translate(text);
        return success(await this.extractFromEnglish(english, item, 'two_call_translation'));
      }

      const direct = await this.extractDirect(text, item);
      return success(await this.applyFallback(direct, text, item));
    } catch (error) {
      if (error instanceof DocumentReadError || error instanceof ExtractionResponseError) {
        return fatal(error.message);
      }
      return classifyFailure(error);
    }
  }

  usesTwoCall(item: WorkItem): boolean {
    return (
      this.settings.alwaysUseTwoCall ||
      (item.extension === '.pdf' && this.settings.useTwoCallForPdfs)
    );
  }

  /**
   * A direct answer is weak when the model reports low confidence or leaves a
   * critical field empty.
   */
  needsTranslationFallback(metadata: ContractMetadata): boolean {
    return metadata.confidence === 'low' || validateCriticalFields(metadata.fields).length > 0;
  }

  private async applyFallback(
    direct: ContractMetadata,
    text: string,
    item: WorkItem
  ): Promise<ContractMetadata> {
    if (!this.settings.translateOnLowConfidence || !this.needsTranslationFallback(direct)) {
      return direct;
    }

    this.logger.info(`Weak direct extraction for ${item.name}, re-extracting from translation`, {
      confidence: direct.confidence,
      missing: validateCriticalFields(direct.fields),
    });

    let translated: ContractMetadata;
    try {
      const english = await this.translate(text);
      translated = await this.extractFromEnglish(english, item, 'low_confidence_translation');
    } catch (error) {
      if (classifyFailure(error).status === 'retryable') {
        throw error;
      }
      return this.withNote(direct, `Translation fallback failed: ${errorMessage(error)}`);
    }

    const directMissing = validateCriticalFields(direct.fields).length;
    const translatedMissing = validateCriticalFields(translated.fields).length;
    if (translatedMissing <= directMissing) {
      return translated;
    }
    return this.withNote(direct, 'Translation fallback produced fewer critical fields; kept direct extraction');
  }

  private async extractDirect(text: string, item: WorkItem): Promise<ContractMetadata> {
    const content = await this.chat.complete({
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: renderPrompt(DIRECT_EXTRACTION_PROMPT, {
            fileName: path.posix.basename(item.name),
            contractText: text.slice(0, DIRECT_TEXT_LIMIT),
          }),
        },
      ],
      json: true,
      maxCompletionTokens: DIRECT_MAX_TOKENS,
    });
    return this.parseMetadata(content, item, 'direct');
  }

  private async translate(text: string): Promise<string> {
    return this.chat.complete({
      messages: [
        { role: 'system', content: TRANSLATION_SYSTEM_PROMPT },
        {
          role: 'user',
          content: renderPrompt(TRANSLATION_PROMPT, {
            contractText: text.slice(0, TRANSLATION_TEXT_LIMIT),
          }),
        },
      ],
      json: false,
      maxCompletionTokens: TRANSLATION_MAX_TOKENS,
    });
  }

  private async extractFromEnglish(
    english: string,
    item: WorkItem,
    method: ExtractionMethod
  ): Promise<ContractMetadata> {
    const content = await this.chat.complete({
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: renderPrompt(ENGLISH_EXTRACTION_PROMPT, {
            fileName: path.posix.basename(item.name),
            contractText: english.slice(0, ENGLISH_TEXT_LIMIT),
          }),
        },
      ],
      json: true,
      maxCompletionTokens: ENGLISH_MAX_TOKENS,
    });
    return this.parseMetadata(content, item, method);
  }

  /**
   * Parse and validate the model's JSON answer
   */
  parseMetadata(content: string, item: WorkItem, method: ExtractionMethod): ContractMetadata {
    const parsed = this.parseJson(content);

    const result = validator.validate(CONTRACT_METADATA_SCHEMA_ID, contractMetadataSchema, parsed);
    if (!result.valid || typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ExtractionResponseError(
        `Invalid metadata response: ${validator.formatErrors(result.errors)}`
      );
    }

    const fields = fieldValuesFrom((field) => readString(parsed, field));
    // Always the real file name, never the model's reading of the title
    fields['Original File Name'] = path.posix.basename(item.name);

    const confidence = readString(parsed, 'confidence');

    return {
      fields,
      sourceLanguage: readString(parsed, 'source_language') || 'unknown',
      confidence: isConfidence(confidence) ? confidence : 'medium',
      notes: readString(parsed, 'extraction_notes') ?? '',
      extractionTimestamp: this.now().toISOString(),
      extractionMethod: method,
    };
  }

  private parseJson(content: string): unknown {
    try {
      return extractJsonFromResponse(content);
    } catch (error) {
      throw new ExtractionResponseError(`JSON parse error: ${errorMessage(error)}`, { cause: error });
    }
  }

  private withNote(metadata: ContractMetadata, note: string): ContractMetadata {
    return {
      ...metadata,
      notes: metadata.notes ? `${metadata.notes}; ${note}` : note,
    };
  }

  private async archiveText(item: WorkItem, text: string): Promise<void> {
    if (!this.settings.saveMarkdown || !this.markdownStore || item.location.kind !== 'blob') {
      return;
    }

    try {
      await this.markdownStore.save(
        markdownNameFor(item.name),
        buildMarkdown(text, item.name, this.now())
      );
    } catch (error) {
      this.logger.warn(`Could not save markdown for ${item.name}`, { error: errorMessage(error) });
    }
  }
}

/**
 * Progress-stream summary of an extraction: language and confidence, plus the
 * contract name and missing fields for low/medium confidence results.
 */
export function describeMetadata(metadata: ContractMetadata): PayloadSummary {
  const summary = `${metadata.sourceLanguage.toUpperCase()}, ${metadata.confidence}`;
  if (metadata.confidence === 'high') {
    return { summary };
  }

  const details = [`📋 Contract: ${metadata.fields['Contract Name'] ?? 'N/A'}`];
  const issues = analyzeFieldQuality(metadata.fields);
  if (issues.length > 0) {
    details.push(`⚠️  Quality Issues: ${issues.join(', ')}`);
  }
  return { summary, details };
}
