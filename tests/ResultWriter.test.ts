import fs from 'fs/promises';
import path from 'path';
import type { ExtractionResult } from '../src/concurrent/types.js';
import {
  CSV_COLUMNS,
  formatSummary,
  splitItemName,
  summarizeResults,
  toCsv,
  writeCsv,
} from '../src/core/ResultWriter.js';
import type { ContractMetadata } from '../src/jobs/extract-contract-metadata/fields.js';
import { blobItem, localItem, makeTempDir, sampleMetadata } from './helpers.js';

const succeeded: ExtractionResult<ContractMetadata> = {
  status: 'succeeded',
  item: blobItem('2024/q1/avtal.txt'),
  payload: sampleMetadata({ notes: 'Dates inferred, see clause 4' }),
  attempts: 2,
};

const failed: ExtractionResult<ContractMetadata> = {
  status: 'failed',
  item: localItem('broken.pdf'),
  reason: 'Read error: bad XRef, stream',
  attempts: 1,
};

describe('splitItemName', () => {
  it('should split blob names into folder and file', () => {
    expect(splitItemName('2024/q1/supply.pdf')).toEqual({ folderPath: '2024/q1', fileName: 'supply.pdf' });
    expect(splitItemName('supply.pdf')).toEqual({ folderPath: '', fileName: 'supply.pdf' });
    expect(splitItemName('archive\\nda.docx')).toEqual({ folderPath: 'archive', fileName: 'nda.docx' });
  });
});

describe('toCsv', () => {
  it('should write a header and one row per result', () => {
    const lines = toCsv([succeeded, failed]).split('\n');

    expect(lines[0]).toBe(CSV_COLUMNS.join(','));
    expect(lines[1]).toBe(
      [
        '2024/q1',
        'avtal.txt',
        'success',
        'sv',
        '2025-03-01T10:00:00.000Z',
        'avtal.txt',
        'Nordic Freight AB',
        'Example Holdings Sp. z o.o.',
        'Master Agreement',
        'Fixed',
        '04/01/2024',
        '03/31/2027',
        'Sweden',
        'Net 30',
        'Master Agreement_Nordic Freight AB_04/01/2024',
        'Operations and Logistics',
        '',
        'high',
        '"Dates inferred, see clause 4"',
        'direct',
        '2',
        '',
      ].join(',')
    );
    expect(lines[2]).toBe(
      ['', 'broken.pdf', 'failed', ...Array<string>(17).fill(''), '1', '"Read error: bad XRef, stream"'].join(',')
    );
    expect(lines).toHaveLength(4);
    expect(lines[3]).toBe('');
  });

  it('should write only the header for no results', () => {
    expect(toCsv([])).toBe(`${CSV_COLUMNS.join(',')}\n`);
  });
});

describe('writeCsv', () => {
  it('should create the parent folder and return the absolute path', async () => {
    const folder = await makeTempDir();
    try {
      const target = path.join(folder, 'out', 'contract_metadata.csv');

      const written = await writeCsv(target, [succeeded]);

      expect(written).toBe(target);
      await expect(fs.readFile(target, 'utf-8')).resolves.toBe(toCsv([succeeded]));
    } finally {
      await fs.rm(folder, { recursive: true, force: true });
    }
  });
});

describe('summarizeResults', () => {
  it('should count outcomes, languages and confidence', () => {
    const summary = summarizeResults([
      succeeded,
      { ...succeeded, payload: sampleMetadata({ confidence: 'medium' }) },
      { ...succeeded, payload: sampleMetadata({ sourceLanguage: 'pl', confidence: 'low' }) },
      failed,
    ]);

    expect(summary).toEqual({
      total: 4,
      succeeded: 3,
      failed: 1,
      languages: { sv: 2, pl: 1 },
      confidences: { high: 1, medium: 1, low: 1 },
      estimatedTokens: 6000,
      estimatedCostUsd: expect.closeTo(0.0009, 10),
    });
  });
});

describe('formatSummary', () => {
  it('should print totals, languages, confidence and cost', () => {
    const lines = formatSummary(summarizeResults([succeeded, failed]), '/tmp/contract_metadata.csv');

    expect(lines.slice(0, 8)).toEqual([
      '',
      '='.repeat(80),
      '✅ Extraction Complete!',
      '='.repeat(80),
      '📊 Total Files: 2',
      '✅ Successful: 1',
      '❌ Failed: 1',
      '💾 Output: /tmp/contract_metadata.csv',
    ]);
    expect(lines).toContain('   SV: 1 contracts');
    expect(lines).toContain('   High: 1 contracts');
    expect(lines).toContain('   Low: 0 contracts');
    expect(lines).toContain('   Total Tokens: ~2,000');
    expect(lines).toContain('   Estimated Cost: $0.00');
  });

  it('should skip the breakdown when nothing succeeded', () => {
    const lines = formatSummary(summarizeResults([failed]), 'out.csv');

    expect(lines).not.toContain('🌍 Languages Detected:');
    expect(lines).not.toContain('💰 Cost Estimate:');
    expect(lines).toContain('   1. Open out.csv in a spreadsheet');
  });
});
