#!/usr/bin/env node

import readline from 'readline/promises';
import { AzureConfig } from './config/azure.js';
import { DocumentIntelligenceConfig } from './config/documentIntelligence.js';
import { loadExtractionConfig } from './config/extraction.js';
import { StorageConfig } from './config/storage.js';
import { createMetadataExtractor, createTaskSource } from './pipeline/factory.js';
import { BatchPipeline } from './pipeline/BatchPipeline.js';
import { promptForBatch } from './pipeline/prompts.js';
import { runSingleContract } from './pipeline/singleContract.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

/**
 * CLI for multilingual contract metadata extraction
 *
 * Usage:
 *   contract-extractor              - Interactive batch run (blob container or local folder)
 *   contract-extractor <file>       - Extract a single local contract to JSON
 *   contract-extractor check        - Check configuration
 *   contract-extractor help         - Show this message
 */

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Contract Metadata Extraction

Extracts CLM metadata from multilingual contracts with Azure OpenAI

Usage:
  contract-extractor              Interactive batch run, writes a CSV
  contract-extractor <file>       Extract one .txt, .docx or .pdf file to <name>_metadata.json
  contract-extractor check        Check configuration
  contract-extractor help         Show this message

Environment (.env):
  AZURE_OPENAI_ENDPOINT           Azure OpenAI endpoint (required)
  AZURE_OPENAI_DEPLOYMENT         Chat deployment (default: gpt-4o)
  AZURE_OPENAI_API_KEY            API key (optional, Entra ID otherwise)
  STORAGE_ACCOUNT_NAME            Blob storage account (for blob sources)
  DOCUMENT_INTELLIGENCE_ENDPOINT  Document Intelligence endpoint (OCR for PDFs, optional)
  USE_OCR_FOR_PDFS                Read PDFs with OCR when configured (default: true)
  MAX_WORKERS                     Concurrent workers (default: 10)
  MAX_RETRIES                     Retries after a rate limit (default: 3)
  RETRY_DELAY                     Base retry delay in seconds (default: 2)
`);
}

/**
 * Check configuration without calling any service
 */
function checkConfiguration(): void {
  console.log('\n🧪 Checking configuration...\n');

  const azureOk = AzureConfig.validate();
  console.log(azureOk ? '✅ Azure OpenAI configuration valid' : '❌ Azure OpenAI configuration invalid');

  if (StorageConfig.isConfigured()) {
    console.log(`✅ Blob storage configured (${StorageConfig.getAccountName() ?? 'connection string'})`);
  } else {
    console.log('⚠️  Blob storage not configured (local folders only)');
  }

  const config = loadExtractionConfig();
  if (DocumentIntelligenceConfig.isConfigured() && config.useOcrForPdfs) {
    console.log('✅ Document Intelligence OCR enabled for PDFs');
  } else {
    console.log('⚠️  PDF OCR off (PDF text layer only)');
  }

  console.log(
    `\n⚙️  Workers: ${config.maxWorkers}, retries: ${config.maxRetries}, retry delay: ${config.retryDelayMs / 1000}s`
  );

  if (!azureOk) {
    console.log('\n❌ Please check your .env file.');
    process.exit(1);
  }
}

async function runInteractive(): Promise<void> {
  const config = loadExtractionConfig();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  const request = await promptForBatch(
    (question) => rl.question(question),
    (line) => console.log(line)
  ).finally(() => rl.close());

  const extractor = createMetadataExtractor(config);
  const pipeline = new BatchPipeline({
    source: createTaskSource(request.source, request.location, config),
    extract: (item) => extractor.extract(item),
    config,
    modelLabel: AzureConfig.getDeployment(),
  });

  await pipeline.run(request.outputCsv);
}

async function runSingle(filePath: string): Promise<void> {
  const config = loadExtractionConfig();
  const extractor = createMetadataExtractor(config);

  const report = await runSingleContract(filePath, {
    extract: (item) => extractor.extract(item),
    config,
  });

  if (!report.metadata) {
    process.exit(1);
  }
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === 'help' || command === '--help' || command === '-h') {
    printHelp();
    return;
  }

  if (command === 'check') {
    checkConfiguration();
    return;
  }

  try {
    if (command) {
      await runSingle(command);
    } else {
      await runInteractive();
    }
  } catch (error) {
    logger.error('Command failed', error);
    console.error('\n❌ Command failed:', errorMessage(error));
    process.exit(1);
  }
}

// Run CLI
main();
