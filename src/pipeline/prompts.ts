import type { SourceKind } from './factory.js';

export const DEFAULT_CONTAINER = 'documents';
export const DEFAULT_FOLDER = 'sample_contracts';
export const DEFAULT_OUTPUT_CSV = 'contract_metadata.csv';

export interface BatchRequest {
  source: SourceKind;
  location: string;
  outputCsv: string;
}

export type AskFn = (question: string) => Promise<string>;

/**
 * Interactive batch setup: source kind, location, output CSV.
 * Empty answers take the defaults; anything but "2" selects blob storage.
 */
export async function promptForBatch(ask: AskFn, output: (line: string) => void): Promise<BatchRequest> {
  output('Select source:');
  output('  1. Azure Blob Storage (recommended)');
  output('  2. Local folder');
  const choice = (await ask('\nEnter choice (1 or 2, default=1): ')).trim();
  const source: SourceKind = choice === '2' ? 'local' : 'blob';

  const location =
    source === 'local'
      ? (await ask(`Enter folder path with contracts (or press Enter for '${DEFAULT_FOLDER}'): `)).trim() ||
        DEFAULT_FOLDER
      : (await ask(`Enter Azure Blob Storage container name (or press Enter for '${DEFAULT_CONTAINER}'): `)).trim() ||
        DEFAULT_CONTAINER;

  const outputCsv =
    (await ask(`Enter output CSV name (or press Enter for '${DEFAULT_OUTPUT_CSV}'): `)).trim() ||
    DEFAULT_OUTPUT_CSV;

  return { source, location, outputCsv };
}
