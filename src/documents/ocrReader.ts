import {
  DocumentIntelligenceClient,
  getLongRunningPoller,
  isUnexpected,
} from '@azure-rest/ai-document-intelligence';
import { errorMessage } from '../utils/errors.js';

export const OCR_MODEL_ID = 'prebuilt-read';

/**
 * PDF bytes to upload, or a URL the OCR service fetches itself
 */
export type OcrSource = { data: Buffer } | { url: string };

/**
 * Recognizes the text of a PDF
 */
export interface PdfOcr {
  readText(source: OcrSource): Promise<string>;
}

/**
 * Non-2xx answer of the analyze call. `status` is numeric so that a 429 is
 * classified as a rate limit.
 */
export class DocumentIntelligenceError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'DocumentIntelligenceError';
    this.status = status;
  }
}

function property(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Text of a finished analyze operation: page lines joined by newlines, or
 * the flat `content` when the result has no lines.
 */
export function readAnalyzedText(body: unknown): string {
  const result = property(body, 'analyzeResult');

  const lines = list(property(result, 'pages'))
    .flatMap((page) => list(property(page, 'lines')))
    .map((line) => property(line, 'content'))
    .filter((content): content is string => typeof content === 'string');

  if (lines.length > 0) {
    return lines.join('\n');
  }

  const content = property(result, 'content');
  return typeof content === 'string' ? content : '';
}

/**
 * OCR through the Document Intelligence prebuilt-read model
 */
export class DocumentIntelligenceOcr implements PdfOcr {
  private client: DocumentIntelligenceClient;
  private modelId: string;

  constructor(client: DocumentIntelligenceClient, modelId: string = OCR_MODEL_ID) {
    this.client = client;
    this.modelId = modelId;
  }

  async readText(source: OcrSource): Promise<string> {
    const body = 'url' in source ? { urlSource: source.url } : { base64Source: source.data.toString('base64') };

    const initial = await this.client
      .path('/documentModels/{modelId}:analyze', this.modelId)
      .post({ contentType: 'application/json', body });

    if (isUnexpected(initial)) {
      throw new DocumentIntelligenceError(
        `Document Intelligence returned ${initial.status}: ${errorMessage(property(initial.body, 'error'))}`,
        Number(initial.status)
      );
    }

    const completed = await getLongRunningPoller(this.client, initial).pollUntilDone();
    if (property(completed.body, 'status') === 'failed') {
      throw new Error(`Document Intelligence analysis failed: ${errorMessage(property(completed.body, 'error'))}`);
    }

    return readAnalyzedText(completed.body);
  }
}
