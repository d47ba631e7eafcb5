import fs from 'fs/promises';
import type { BlobServiceClient } from '@azure/storage-blob';
import mammoth from 'mammoth';
import { PDFParse } from 'pdf-parse';
import { classifyFailure } from '../concurrent/retryPolicy.js';
import type { WorkItem } from '../sources/types.js';
import { DocumentReadError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { OcrSource, PdfOcr } from './ocrReader.js';

/**
 * Fetches the raw bytes of a blob document
 */
export interface BlobDownloader {
  download(container: string, blobName: string): Promise<Buffer>;
}

export class AzureBlobDownloader implements BlobDownloader {
  private client: BlobServiceClient;

  constructor(client: BlobServiceClient) {
    this.client = client;
  }

  async download(container: string, blobName: string): Promise<Buffer> {
    return this.client.getContainerClient(container).getBlobClient(blobName).downloadToBuffer();
  }
}

/**
 * Turns a work item into plain text
 */
export interface TextReader {
  read(item: WorkItem): Promise<string>;
}

export interface DocumentReaderOptions {
  /** OCR for PDFs; the text layer is used when absent or when OCR fails */
  ocr?: PdfOcr;
  /** Hand blob PDFs to the OCR service by URL instead of uploading bytes */
  ocrFromBlobUrl?: boolean;
}

/**
 * Document Reader
 *
 * Turns a work item into plain text: .txt as UTF-8, .docx through mammoth,
 * .pdf through OCR when configured and pdf-parse (text layer) otherwise.
 * Failures are DocumentReadError and are never retried, except an OCR rate
 * limit, which propagates so the runner can back off.
 */
export class DocumentReader implements TextReader {
  private blobs?: BlobDownloader;
  private ocr?: PdfOcr;
  private ocrFromBlobUrl: boolean;
  private logger = createLogger('DocumentReader');

  constructor(blobs?: BlobDownloader, options: DocumentReaderOptions = {}) {
    this.blobs = blobs;
    this.ocr = options.ocr;
    this.ocrFromBlobUrl = options.ocrFromBlobUrl ?? true;
  }

  async read(item: WorkItem): Promise<string> {
    const text =
      this.ocr && item.extension === '.pdf' ? await this.readPdf(item, this.ocr) : await this.readFile(item);

    if (text.trim().length === 0) {
      throw new DocumentReadError(`Read error: no extractable text in ${item.name}`);
    }
    return text;
  }

  private async readFile(item: WorkItem): Promise<string> {
    return extractText(await this.load(item), item.extension);
  }

  private async readPdf(item: WorkItem, ocr: PdfOcr): Promise<string> {
    const location = item.location;

    if (location.kind === 'blob' && this.ocrFromBlobUrl) {
      return (await this.recognize(item, ocr, { url: location.url })) ?? this.readFile(item);
    }

    const data = await this.load(item);
    return (await this.recognize(item, ocr, { data })) ?? extractText(data, item.extension);
  }

  /**
   * OCR text, or null to fall back to the PDF text layer
   */
  private async recognize(item: WorkItem, ocr: PdfOcr, source: OcrSource): Promise<string | null> {
    try {
      const text = await ocr.readText(source);
      if (text.trim().length > 0) {
        return text;
      }
      this.logger.warn(`OCR found no text in ${item.name}, using the PDF text layer`);
    } catch (error) {
      if (classifyFailure(error).status === 'retryable') {
        throw error;
      }
      this.logger.warn(`OCR failed for ${item.name}, using the PDF text layer`, {
        error: errorMessage(error),
      });
    }
    return null;
  }

  private async load(item: WorkItem): Promise<Buffer> {
    const location = item.location;

    if (location.kind === 'local') {
      try {
        return await fs.readFile(location.path);
      } catch (error) {
        throw new DocumentReadError(`Read error: ${errorMessage(error)}`, { cause: error });
      }
    }

    if (!this.blobs) {
      throw new DocumentReadError('Read error: blob storage not configured');
    }
    try {
      return await this.blobs.download(location.container, location.blobName);
    } catch (error) {
      throw new DocumentReadError(`Download error: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Extract plain text from document bytes by extension
 */
export async function extractText(data: Buffer, extension: string): Promise<string> {
  const ext = extension.toLowerCase();

  try {
    switch (ext) {
      case '.txt':
        return new TextDecoder('utf-8', { fatal: true }).decode(data);

      case '.docx': {
        const result = await mammoth.extractRawText({ buffer: data });
        return result.value;
      }

      case '.pdf': {
        const parser = new PDFParse({ data });
        try {
          const parsed = await parser.getText();
          return parsed.text ?? '';
        } finally {
          await parser.destroy();
        }
      }

      default:
        throw new DocumentReadError(`Unsupported file format: ${ext || '(none)'}`);
    }
  } catch (error) {
    if (error instanceof DocumentReadError) {
      throw error;
    }
    throw new DocumentReadError(`Read error: ${errorMessage(error)}`, { cause: error });
  }
}
