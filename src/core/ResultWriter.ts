import fs from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { ExtractionResult } from '../concurrent/types.js';
import {
  Confidence,
  CONTRACT_FIELDS,
  ContractMetadata,
} from '../jobs/extract-contract-metadata/fields.js';

export const CSV_COLUMNS = [
  'Folder Path',
  'File Name',
  'Status',
  'Source Language',
  'Extraction Timestamp',
  ...CONTRACT_FIELDS,
  'Confidence',
  'Notes',
  'Extraction Method',
  'Attempts',
  'Error',
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];
export type CsvRow = Partial<Record<CsvColumn, string | number | null>>;

/** Rough token count per document used for the cost estimate */
const AVG_TOKENS_PER_DOCUMENT = 2000;
/** USD per million input tokens */
const COST_PER_MILLION_TOKENS = 0.15;

/**
 * Split "contracts/2024/supply.pdf" into folder and file name
 */
export function splitItemName(name: string): { folderPath: string; fileName: string } {
  const normalized = name.replace(/\\/g, '/');
  const slash = normalized.lastIndexOf('/');
  if (slash < 0) {
    return { folderPath: '', fileName: name };
  }
  return { folderPath: normalized.slice(0, slash), fileName: normalized.slice(slash + 1) };
}

/**
 * Map one final result to a CSV row
 */
export function toCsvRow(result: ExtractionResult<ContractMetadata>): CsvRow {
  const { folderPath, fileName } = splitItemName(result.item.name);

  if (result.status === 'failed') {
    return {
      'Folder Path': folderPath,
      'File Name': fileName,
      Status: 'failed',
      Attempts: result.attempts,
      Error: result.reason,
    };
  }

  const metadata = result.payload;
  return {
    'Folder Path': folderPath,
    'File Name': fileName,
    Status: 'success',
    'Source Language': metadata.sourceLanguage,
    'Extraction Timestamp': metadata.extractionTimestamp,
    ...metadata.fields,
    Confidence: metadata.confidence,
    Notes: metadata.notes,
    'Extraction Method': metadata.extractionMethod,
    Attempts: result.attempts,
  };
}

export function toCsv(results: readonly ExtractionResult<ContractMetadata>[]): string {
  return stringify(results.map(toCsvRow), {
    header: true,
    columns: [...CSV_COLUMNS],
  });
}

export async function writeCsv(
  outputPath: string,
  results: readonly ExtractionResult<ContractMetadata>[]
): Promise<string> {
  const absolute = path.resolve(outputPath);
  await fs.mkdir(path.dirname(absolute), { recursive: true });
  await fs.writeFile(absolute, toCsv(results), 'utf-8');
  return absolute;
}

/**
 * Run Summary
 */
export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** Detected source language → document count, in first-seen order */
  languages: Record<string, number>;
  confidences: Record<Confidence, number>;
  estimatedTokens: number;
  estimatedCostUsd: number;
}

export function summarizeResults(results: readonly ExtractionResult<ContractMetadata>[]): RunSummary {
  const languages: Record<string, number> = {};
  const confidences: Record<Confidence, number> = { high: 0, medium: 0, low: 0 };
  let succeeded = 0;

  for (const result of results) {
    if (result.status !== 'succeeded') continue;
    succeeded++;
    const language = result.payload.sourceLanguage;
    languages[language] = (languages[language] ?? 0) + 1;
    confidences[result.payload.confidence]++;
  }

  const estimatedTokens = succeeded * AVG_TOKENS_PER_DOCUMENT;
  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    languages,
    confidences,
    estimatedTokens,
    estimatedCostUsd: (estimatedTokens / 1_000_000) * COST_PER_MILLION_TOKENS,
  };
}

export function formatSummary(summary: RunSummary, outputPath: string): string[] {
  const lines = [
    '',
    '='.repeat(80),
    '✅ Extraction Complete!',
    '='.repeat(80),
    `📊 Total Files: ${summary.total}`,
    `✅ Successful: ${summary.succeeded}`,
    `❌ Failed: ${summary.failed}`,
    `💾 Output: ${outputPath}`,
  ];

  if (summary.succeeded > 0) {
    lines.push('', '🌍 Languages Detected:');
    for (const [language, count] of Object.entries(summary.languages)) {
      lines.push(`   ${language.toUpperCase()}: ${count} contracts`);
    }

    lines.push('', '📈 Confidence Distribution:');
    for (const [confidence, count] of Object.entries(summary.confidences)) {
      lines.push(`   ${confidence.charAt(0).toUpperCase()}${confidence.slice(1)}: ${count} contracts`);
    }

    lines.push(
      '',
      '💰 Cost Estimate:',
      `   Total Tokens: ~${summary.estimatedTokens.toLocaleString('en-US')}`,
      `   Estimated Cost: $${summary.estimatedCostUsd.toFixed(2)}`
    );
  }

  lines.push('', '💡 Next Steps:', `   1. Open ${outputPath} in a spreadsheet`);
  lines.push("   2. Review contracts with 'low' or 'medium' confidence");
  lines.push('   3. Verify company names and dates');
  lines.push('', '='.repeat(80), '');
  return lines;
}
