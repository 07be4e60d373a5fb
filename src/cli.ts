#!/usr/bin/env node

import path from 'path';
import { parseExtractArgs, parseParseArgs } from './cli/args.js';
import { formatRunReport } from './concurrent/report.js';
import { loadPromptTemplate } from './concurrent/prompt.js';
import { RunCoordinator } from './concurrent/RunCoordinator.js';
import type { InputRecord } from './concurrent/types.js';
import { DatabaseConfig } from './config/database.js';
import { PipelineConfig } from './config/pipeline.js';
import { ProvidersConfig } from './config/providers.js';
import { ProviderRegistry } from './core/providers/index.js';
import { describeError } from './core/errors.js';
import { ExtractionParser } from './parse/ExtractionParser.js';
import { TableAssembler } from './parse/TableAssembler.js';
import { writeTables } from './parse/TableWriter.js';
import { logger } from './utils/logger.js';
import { RecordLoader, sampleRecords, type IdentityEntry } from './utils/recordLoader.js';

/**
 * CLI for Complaint Incident Extraction
 *
 * Usage:
 *   npm run dev extract [options]            - Run enabled providers over the input records
 *   npm run dev parse <provider-dir>         - Parse a provider's outputs into tables
 *   npm run dev providers                    - Show the provider table
 *   npm run dev test-connections             - Check provider credentials and the database
 */

const COMMANDS = ['extract', 'parse', 'providers', 'test-connections', 'help'];

/**
 * Run extraction across every enabled provider
 */
async function runExtraction(args: string[]): Promise<void> {
  const options = parseExtractArgs(args);
  const settings = PipelineConfig.getConfig();

  let definitions = ProvidersConfig.getDefinitions();
  if (options.providers && options.providers.length > 0) {
    definitions = ProvidersConfig.selectEnabled(definitions, options.providers);
  }

  const columns = { idColumn: settings.idColumn, contentColumn: settings.contentColumn };
  let records: InputRecord[] = options.query
    ? await RecordLoader.loadFromQuery(options.query, columns)
    : await RecordLoader.loadFromFile(options.input ?? settings.inputPath, columns);

  const sampleSize = options.sample ?? settings.sampleSize;
  if (sampleSize !== undefined) {
    records = sampleRecords(records, sampleSize);
    console.log(`🎲 Sampled ${records.length} records`);
  }

  const promptTemplate = await loadPromptTemplate(options.prompt ?? settings.promptPath);
  const concurrencyLimit = options.concurrency ?? settings.concurrencyLimit;
  const registry = new ProviderRegistry(definitions);

  console.log(`\n${'='.repeat(70)}`);
  console.log('Multi-Provider Extraction');
  console.log('='.repeat(70));
  console.log(`Total records: ${records.length}`);
  console.log(`Concurrency: ${concurrencyLimit} requests per provider`);
  console.log(`Active providers: ${registry.enabled().map((definition) => definition.name).join(', ') || 'none'}`);
  console.log(`${'='.repeat(70)}\n`);

  const coordinator = new RunCoordinator(registry, {
    outputRoot: options.out ?? settings.outputRoot,
    promptTemplate,
    concurrencyLimit,
  });
  const result = await coordinator.run(records);

  console.log(formatRunReport(result));
}

/**
 * Parse one provider's output directory into the emitted tables
 */
async function runParse(args: string[]): Promise<void> {
  const options = parseParseArgs(args);
  const settings = PipelineConfig.getConfig();
  const outputDir = options.out ?? settings.outputRoot;

  const identityPath = options.identity ?? settings.identityPath;
  let identity = new Map<string, IdentityEntry>();
  try {
    identity = await RecordLoader.loadIdentityMapping(identityPath);
  } catch (error) {
    logger.warn(`Identity mapping unavailable, document and case ids will be empty: ${describeError(error)}`);
  }

  const parser = new ExtractionParser();
  const { tables, failures } = await parser.parseDirectory(options.providerDir);
  const assembled = new TableAssembler(identity).assemble(tables);
  const written = await writeTables(outputDir, assembled, failures);

  console.log(`\n✅ Parsed ${path.resolve(options.providerDir)}`);
  console.log(`Incidents: ${assembled.incidents.length}`);
  console.log(`Plaintiffs: ${assembled.plaintiffs.length}`);
  console.log(`Defendants: ${assembled.defendants.length}`);
  console.log(`Harms: ${assembled.harms.length}`);
  console.log(`Failed documents: ${failures.length}`);
  console.log('\nArtifacts:');
  for (const filePath of written) {
    console.log(`  - ${filePath}`);
  }
  console.log('');
}

function listProviders(): void {
  const definitions = ProvidersConfig.getDefinitions();

  console.log('\n📋 Providers:\n');
  for (const definition of definitions) {
    const status = definition.enabled ? '✅ enabled ' : '⏸️  disabled';
    console.log(`  ${status}  ${definition.name.padEnd(10)} ${definition.clientType.padEnd(10)} ${definition.model} (max ${definition.maxTokens} tokens)`);
  }
  console.log('');
}

async function testConnections(): Promise<void> {
  console.log('\n🧪 Testing connections...\n');

  let allOk = true;
  const registry = new ProviderRegistry(ProvidersConfig.getDefinitions());
  const enabled = registry.enabled();

  if (enabled.length === 0) {
    console.log('❌ No provider enabled. Set ENABLED_PROVIDERS or PROVIDERS_FILE.\n');
    allOk = false;
  }

  for (const definition of enabled) {
    if (!registry.validate(definition.name)) {
      allOk = false;
    }
  }

  if (DatabaseConfig.isConfigured()) {
    console.log('\nTesting PostgreSQL connection...');
    if (!(await DatabaseConfig.testConnection())) {
      allOk = false;
    }
  } else {
    console.log('\n⚠️  PostgreSQL not configured (optional record source)');
  }

  if (allOk) {
    console.log('\n✅ All required connections successful!');
  } else {
    console.log('\n❌ Some required connections failed. Please check your .env file.');
    process.exitCode = 1;
  }
}

function printHelp(): void {
  console.log(`
Complaint Incident Extraction

Runs complaint documents through several text-generation providers and turns
their JSON output into incident, plaintiff, defendant and harm tables.

USAGE:
  npm run dev <command> [options]

COMMANDS:
  extract                        Run every enabled provider over the input records
    --input <path>               CSV or JSON record file (default: INPUT_PATH)
    --query <sql>                Read records with a SELECT instead of a file
    --prompt <path>              Prompt template with {complaint_text} (default: PROMPT_PATH)
    --out <dir>                  Output root (default: OUTPUT_ROOT)
    --providers <a,b>            Only run these providers
    --concurrency <n>            Requests in flight per provider (default: 15)
    --sample <n>                 Random sample of n records
  parse <provider-dir>           Parse a provider's output files into CSV tables
    --identity <path>            CSV with file_id, document_id, case_id
    --out <dir>                  Where to write the tables (default: OUTPUT_ROOT)
  providers                      Show the provider table
  test-connections               Check provider credentials and the database
  help                           Show this help message

EXAMPLES:
  npm run dev extract --providers openai,claude --sample 25
  npm run dev parse data/openai_extracted_text --out data/tables
  npm run dev providers

ENVIRONMENT:
  Configuration is loaded from .env file (see .env.example)
    - OPENAI_API_KEY, ANTHROPIC_API_KEY, GOOGLE_API_KEY, HUGGINGFACE_API_KEY
    - ENABLED_PROVIDERS, PROVIDERS_FILE, <PROVIDER>_MODEL, <PROVIDER>_MAX_TOKENS
    - INPUT_PATH, PROMPT_PATH, OUTPUT_ROOT, CONCURRENCY_LIMIT, SAMPLE_SIZE
    - PGHOST, PGUSER, PGPASSWORD, PGDATABASE, PGPORT (optional)
`);
}

/**
 * Main CLI entry point
 */
async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help') {
    printHelp();
    return;
  }

  const command = args[0];
  const rest = args.slice(1);

  try {
    switch (command) {
      case 'extract':
        await runExtraction(rest);
        break;

      case 'parse':
        await runParse(rest);
        break;

      case 'providers':
        listProviders();
        break;

      case 'test-connections':
        await testConnections();
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Valid commands: ${COMMANDS.join(', ')}`);
        printHelp();
        process.exitCode = 1;
    }

    await DatabaseConfig.close();
  } catch (error) {
    logger.error('Command failed', error);
    console.error('\n❌ Command failed:', describeError(error));
    await DatabaseConfig.close();
    process.exit(1);
  }
}

// Run CLI
await main();
