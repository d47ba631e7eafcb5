import { randomUUID } from 'crypto';
import { ConcurrentRunner } from '../concurrent/ConcurrentRunner.js';
import { ProgressListener } from '../concurrent/ProgressTracker.js';
import { ExtractFn, ExtractionResult } from '../concurrent/types.js';
import type { ExtractionConfig } from '../config/extraction.js';
import { describeMetadata } from '../core/MetadataExtractor.js';
import { formatSummary, RunSummary, summarizeResults, writeCsv } from '../core/ResultWriter.js';
import type { ContractMetadata } from '../jobs/extract-contract-metadata/fields.js';
import type { TaskSource } from '../sources/types.js';
import { BatchLogger } from '../utils/logger.js';

export interface BatchPipelineOptions {
  source: TaskSource;
  extract: ExtractFn<ContractMetadata>;
  config: Pick<ExtractionConfig, 'maxWorkers' | 'maxRetries' | 'retryDelayMs'>;
  /** Model/deployment label shown in the banner */
  modelLabel?: string;
  parallel?: boolean;
  output?: (line: string) => void;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: ProgressListener;
}

export interface BatchReport {
  results: ExtractionResult<ContractMetadata>[];
  summary: RunSummary;
  /** Absolute CSV path, null when nothing was found to process */
  csvPath: string | null;
}

/**
 * Batch Pipeline
 *
 * Task source → concurrent runner → CSV. Enumeration errors propagate to the
 * caller before any extraction starts; per-document failures become rows.
 */
export class BatchPipeline {
  private options: BatchPipelineOptions;
  private output: (line: string) => void;
  private logger: BatchLogger;

  constructor(options: BatchPipelineOptions) {
    this.options = options;
    this.output = options.output ?? ((line: string) => console.log(line));
    this.logger = new BatchLogger(randomUUID().slice(0, 8), 'BatchPipeline');
  }

  async run(outputCsv: string): Promise<BatchReport> {
    const { source, config } = this.options;
    const parallel = this.options.parallel ?? true;

    this.logger.started({ source: source.description, outputCsv });

    try {
      const items = await source.list();

      if (items.length === 0) {
        this.logger.warn('No contract files found', { source: source.description });
        this.output(`⚠️ No contract files found (${source.description})`);
        return { results: [], summary: summarizeResults([]), csvPath: null };
      }

      this.printBanner(items.length, outputCsv, parallel);

      const runner = new ConcurrentRunner<ContractMetadata>({
        maxWorkers: config.maxWorkers,
        maxRetries: config.maxRetries,
        retryDelayMs: config.retryDelayMs,
        parallel,
        describe: describeMetadata,
        output: this.output,
        sleep: this.options.sleep,
        onProgress: this.options.onProgress,
        logger: this.logger,
      });

      const results = await runner.run(items, this.options.extract);
      const csvPath = await writeCsv(outputCsv, results);
      const summary = summarizeResults(results);

      for (const line of formatSummary(summary, csvPath)) {
        this.output(line);
      }

      this.logger.completed({ ...summary, csvPath });
      return { results, summary, csvPath };
    } catch (error) {
      this.logger.failed(error);
      throw error;
    }
  }

  private printBanner(count: number, outputCsv: string, parallel: boolean): void {
    const { config, source } = this.options;
    const lines = [
      '',
      '='.repeat(80),
      '🌍 Contract Metadata Extraction',
      '='.repeat(80),
      `📦 Source: ${source.description}`,
      `📊 Files Found: ${count}`,
      '📄 Formats: .txt, .docx, .pdf',
    ];
    if (this.options.modelLabel) {
      lines.push(`🤖 Model: ${this.options.modelLabel}`);
    }
    lines.push(
      parallel && count > 1
        ? `⚡ Parallel Mode: ${config.maxWorkers} concurrent workers`
        : '🐢 Sequential Mode: One at a time',
      `💾 Output: ${outputCsv}`,
      '='.repeat(80),
      ''
    );
    for (const line of lines) {
      this.output(line);
    }
  }
}
