import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { ChatClient, ChatRequest } from '../src/core/AzureChatClient.js';
import type { ContractMetadata } from '../src/jobs/extract-contract-metadata/fields.js';
import type { WorkItem } from '../src/sources/types.js';

export function localItem(name: string, filePath = `/contracts/${name}`): WorkItem {
  return {
    name,
    extension: path.extname(name).toLowerCase(),
    location: { kind: 'local', path: filePath },
  };
}

export const ACCOUNT_URL = 'https://contractsacct.blob.core.windows.net';

export function blobItem(blobName: string, container = 'documents'): WorkItem {
  return {
    name: blobName,
    extension: path.posix.extname(blobName).toLowerCase(),
    location: { kind: 'blob', container, blobName, url: `${ACCOUNT_URL}/${container}/${blobName}` },
  };
}

/**
 * Output sink that keeps every printed line
 */
export function captureOutput(): { lines: string[]; output: (line: string) => void } {
  const lines: string[] = [];
  return { lines, output: (line: string) => lines.push(line) };
}

export function instantSleep(): jest.Mock<Promise<void>, [number]> {
  return jest.fn<Promise<void>, [number]>(async () => undefined);
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'contract-extractor-'));
}

/**
 * A complete model answer: every field filled, high confidence
 */
export function modelAnswer(overrides: Record<string, string | null> = {}): Record<string, string | null> {
  return {
    'Original File Name': 'avtal.txt',
    'Counterparty Legal Entity Name': 'Nordic Freight AB',
    'Internal Contracting Entity': 'Example Holdings Sp. z o.o.',
    'Contract Type': 'Master Agreement',
    'Term Type': 'Fixed',
    'Effective Date': '04/01/2024',
    'Expiration Date': '03/31/2027',
    'Governing Law': 'Sweden',
    'Payment Term': 'Net 30',
    'Contract Name': 'Master Agreement_Nordic Freight AB_04/01/2024',
    'Scope Category level 1': 'Operations and Logistics',
    'Related Master Agreement': null,
    source_language: 'sv',
    confidence: 'high',
    extraction_notes: '',
    ...overrides,
  };
}

export function sampleMetadata(overrides: Partial<ContractMetadata> = {}): ContractMetadata {
  return {
    fields: {
      'Original File Name': 'avtal.txt',
      'Counterparty Legal Entity Name': 'Nordic Freight AB',
      'Internal Contracting Entity': 'Example Holdings Sp. z o.o.',
      'Contract Type': 'Master Agreement',
      'Term Type': 'Fixed',
      'Effective Date': '04/01/2024',
      'Expiration Date': '03/31/2027',
      'Governing Law': 'Sweden',
      'Payment Term': 'Net 30',
      'Contract Name': 'Master Agreement_Nordic Freight AB_04/01/2024',
      'Scope Category level 1': 'Operations and Logistics',
      'Related Master Agreement': null,
    },
    sourceLanguage: 'sv',
    confidence: 'high',
    notes: '',
    extractionTimestamp: '2025-03-01T10:00:00.000Z',
    extractionMethod: 'direct',
    ...overrides,
  };
}

/**
 * Chat client answering from a queue of replies (an Error is thrown)
 */
export class FakeChatClient implements ChatClient {
  requests: ChatRequest[] = [];
  private replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  async complete(request: ChatRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('No reply queued');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export function userMessage(request: ChatRequest | undefined): string {
  const message = request?.messages.find((entry) => entry.role === 'user');
  return message ? message.content : '';
}
