import dotenv from 'dotenv';

dotenv.config();

/**
 * Extraction run settings, read from the environment (.env supported)
 */
export interface ExtractionConfig {
  /** Concurrent workers (W) */
  maxWorkers: number;
  /** Retries after the first attempt (R); up to R+1 attempts per document */
  maxRetries: number;
  /** Base backoff in milliseconds (D); the n-th retry waits D * 2^(n-1) */
  retryDelayMs: number;
  /** Timeout for one model call in milliseconds */
  requestTimeoutMs: number;
  /** Translate PDFs to English before extracting (OCR text benefits most) */
  useTwoCallForPdfs: boolean;
  /** Translate every document before extracting */
  alwaysUseTwoCall: boolean;
  /** Re-extract from a translation when the direct answer is weak */
  translateOnLowConfidence: boolean;
  /** Read PDFs with Document Intelligence OCR when it is configured */
  useOcrForPdfs: boolean;
  /** Let the OCR service fetch blob PDFs by URL instead of uploading their bytes */
  ocrFromBlobUrl: boolean;
  /** Upload extracted text of blob documents as markdown */
  saveMarkdown: boolean;
  markdownContainer: string;
  /** File extensions picked up by the task sources */
  allowedExtensions: string[];
}

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  maxWorkers: 10,
  maxRetries: 3,
  retryDelayMs: 2000,
  requestTimeoutMs: 120000,
  useTwoCallForPdfs: true,
  alwaysUseTwoCall: false,
  translateOnLowConfidence: true,
  useOcrForPdfs: true,
  ocrFromBlobUrl: true,
  saveMarkdown: true,
  markdownContainer: 'extracted-markdown',
  allowedExtensions: ['.txt', '.docx', '.pdf'],
};

function toInt(value: string | undefined, fallback: number, min: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function toFloat(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no') {
    return false;
  }
  return fallback;
}

/**
 * Build the run settings from environment variables.
 * RETRY_DELAY is given in seconds, as in the .env files.
 */
export function loadExtractionConfig(env: NodeJS.ProcessEnv = process.env): ExtractionConfig {
  const defaults = DEFAULT_EXTRACTION_CONFIG;
  return {
    maxWorkers: toInt(env.MAX_WORKERS, defaults.maxWorkers, 1),
    maxRetries: toInt(env.MAX_RETRIES, defaults.maxRetries, 0),
    retryDelayMs: Math.round(toFloat(env.RETRY_DELAY, defaults.retryDelayMs / 1000) * 1000),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, defaults.requestTimeoutMs, 1),
    useTwoCallForPdfs: toBool(env.USE_TWO_CALL_FOR_PDFS, defaults.useTwoCallForPdfs),
    alwaysUseTwoCall: toBool(env.ALWAYS_USE_TWO_CALL, defaults.alwaysUseTwoCall),
    translateOnLowConfidence: toBool(env.TRANSLATE_ON_LOW_CONFIDENCE, defaults.translateOnLowConfidence),
    useOcrForPdfs: toBool(env.USE_OCR_FOR_PDFS, defaults.useOcrForPdfs),
    ocrFromBlobUrl: toBool(env.OCR_FROM_BLOB_URL, defaults.ocrFromBlobUrl),
    saveMarkdown: toBool(env.SAVE_MARKDOWN, defaults.saveMarkdown),
    markdownContainer: env.MARKDOWN_CONTAINER || defaults.markdownContainer,
    allowedExtensions: [...defaults.allowedExtensions],
  };
}
