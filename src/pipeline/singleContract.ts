import fs from 'fs/promises';
import path from 'path';
import { ConcurrentRunner } from '../concurrent/ConcurrentRunner.js';
import { ExtractFn } from '../concurrent/types.js';
import type { ExtractionConfig } from '../config/extraction.js';
import { describeMetadata } from '../core/MetadataExtractor.js';
import type { ContractMetadata } from '../jobs/extract-contract-metadata/fields.js';
import type { WorkItem } from '../sources/types.js';

export interface SingleContractOptions {
  extract: ExtractFn<ContractMetadata>;
  config: Pick<ExtractionConfig, 'maxRetries' | 'retryDelayMs'>;
  /** Directory receiving <stem>_metadata.json (default: cwd) */
  outputDir?: string;
  output?: (line: string) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface SingleContractReport {
  metadata: ContractMetadata | null;
  jsonPath: string | null;
  error?: string;
}

/**
 * Extract one local file with the same retry policy as a batch, print the
 * metadata and save it as <stem>_metadata.json.
 */
export async function runSingleContract(
  filePath: string,
  options: SingleContractOptions
): Promise<SingleContractReport> {
  const output = options.output ?? ((line: string) => console.log(line));
  const absolute = path.resolve(filePath);

  const stat = await fs.stat(absolute).catch(() => null);
  if (!stat || !stat.isFile()) {
    output(`❌ File not found: ${filePath}`);
    return { metadata: null, jsonPath: null, error: `File not found: ${filePath}` };
  }

  const parsed = path.parse(absolute);
  const item: WorkItem = {
    name: parsed.base,
    extension: parsed.ext.toLowerCase(),
    location: { kind: 'local', path: absolute },
  };

  output('');
  output('🔍 Testing Metadata Extraction');
  output(`📄 File: ${item.name}`);
  output('');

  const runner = new ConcurrentRunner<ContractMetadata>({
    maxWorkers: 1,
    maxRetries: options.config.maxRetries,
    retryDelayMs: options.config.retryDelayMs,
    parallel: false,
    describe: describeMetadata,
    output,
    sleep: options.sleep,
  });
  const [result] = await runner.run([item], options.extract);

  if (!result || result.status === 'failed') {
    const reason = result ? result.reason : 'No result';
    output(`❌ Extraction Failed: ${reason}`);
    return { metadata: null, jsonPath: null, error: reason };
  }

  const document = {
    ...result.payload.fields,
    source_language: result.payload.sourceLanguage,
    confidence: result.payload.confidence,
    extraction_notes: result.payload.notes,
    extraction_timestamp: result.payload.extractionTimestamp,
    extraction_method: result.payload.extractionMethod,
    file_name: item.name,
  };
  const json = JSON.stringify(document, null, 2);

  output('✅ Extraction Successful!');
  output('');
  output(json);

  const jsonPath = path.join(path.resolve(options.outputDir ?? process.cwd()), `${parsed.name}_metadata.json`);
  await fs.writeFile(jsonPath, json, 'utf-8');
  output('');
  output(`💾 Saved to: ${jsonPath}`);

  return { metadata: result.payload, jsonPath };
}
