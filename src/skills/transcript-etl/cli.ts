#!/usr/bin/env node
import 'dotenv/config';
import { TranscriptEtl } from './index.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import { loadConfig } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { errorMessage, isConfigurationLevelError } from '../../utils/errors.js';
import type { EtlResult, EtlRunConfig } from './types.js';

interface CliArgs {
  input?: string;
  config?: string;
  outputCsv?: string;
  concurrency?: number;
  format?: string;
  dryRun?: boolean;
  check?: boolean;
  help?: boolean;
}

const DEFAULT_CONFIG = 'configs/student.yml';

const HELP = `
Transcript ETL - Extract structured survey records from chat transcripts

Usage:
  npm run etl -- --input <chats.csv> [options]

Options:
  --input <path>         Chat export CSV (required)
  --config <path>        Extraction config YAML (default: ${DEFAULT_CONFIG})
  --output-csv <path>    Write records to CSV instead of the SQLite record store
  --concurrency <n>      Max concurrent LLM calls (default: MAX_CONCURRENT_REQUESTS)
  --format <fmt>         Output format: table or json (default: table)
  --dry-run              Compile the config and print the first prompt without calling the LLM
  --check                Verify the LLM provider and extraction log, then exit
  --help                 Show this help message

Examples:
  npm run etl -- --input data/chats.csv --dry-run
  npm run etl -- --input data/chats.csv --output-csv output/students.csv
  npm run etl -- --input data/chats.csv --config configs/employer.yml --concurrency 8
`;

const parseArgs = (): CliArgs => {
  const args: CliArgs = {};
  const argv = process.argv.slice(2);

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
        args.input = argv[++i];
        break;
      case '--config':
        args.config = argv[++i];
        break;
      case '--output-csv':
        args.outputCsv = argv[++i];
        break;
      case '--concurrency':
        args.concurrency = Number(argv[++i]);
        break;
      case '--format':
        args.format = argv[++i];
        break;
      case '--dry-run':
        args.dryRun = true;
        break;
      case '--check':
        args.check = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        console.error(`Warning: ignoring unknown argument ${arg}`);
    }
  }

  return args;
};

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.log(HELP);
  process.exit(1);
}

const printFailures = (result: EtlResult) => {
  if (result.failures.length === 0) return;

  const maxId = Math.max(7, ...result.failures.map(f => f.itemId.length));
  const maxKind = Math.max(4, ...result.failures.map(f => f.kind.length));
  const header = `${'Chat ID'.padEnd(maxId)} | ${'Kind'.padEnd(maxKind)} | Tries | Message`;
  const separator = '-'.repeat(header.length + 40);

  console.log(`\nFailures (${result.failures.length}):\n`);
  console.log(separator);
  console.log(header);
  console.log(separator);
  for (const failure of result.failures) {
    console.log(
      `${failure.itemId.padEnd(maxId)} | ${failure.kind.padEnd(maxKind)} | ${String(failure.attempts).padEnd(5)} | ${failure.message}`
    );
  }
  console.log(separator);
};

const printSummary = (result: EtlResult) => {
  const { summary } = result;
  console.log(`\nSummary (${result.configName}, run ${result.runId}):`);
  console.log(`  Total:     ${summary.total}`);
  console.log(`  Succeeded: ${summary.succeeded}`);
  console.log(`  Failed:    ${summary.failed}`);
  console.log(`  Stored:    ${summary.stored}${result.target ? ` (${result.target})` : ''}`);
  const kinds = Object.entries(summary.byKind);
  if (kinds.length > 0) {
    console.log('\nFailures by kind:');
    for (const [kind, count] of kinds) {
      console.log(`  ${kind}: ${count}`);
    }
  }
};

const main = async (): Promise<void> => {
  const args = parseArgs();

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  const format = args.format ?? 'table';
  if (format !== 'table' && format !== 'json') {
    fail(`--format must be table or json, got ${format}`);
  }

  let etl: TranscriptEtl;
  let concurrency: number;
  try {
    const settings = loadConfig();
    concurrency = args.concurrency ?? settings.extraction.maxConcurrentRequests;
    etl = new TranscriptEtl(settings);
  } catch (error) {
    logger.error({ error }, 'Invalid runtime configuration');
    console.error('Error:', errorMessage(error));
    process.exit(1);
  }

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    fail(`--concurrency must be a positive integer, got ${String(args.concurrency)}`);
  }

  if (args.check) {
    const status = await etl.testConnections();
    console.log(JSON.stringify(status, null, 2));
    etl.close();
    process.exit(status.llm && status.extractionLog !== false ? 0 : 1);
  }

  if (!args.input) {
    fail('--input is required');
  }

  const config: EtlRunConfig = {
    input: args.input,
    configPath: args.config ?? DEFAULT_CONFIG,
    outputCsv: args.outputCsv,
    concurrency,
    format,
    dryRun: args.dryRun ?? false,
  };

  const controller = new AbortController();
  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn('Interrupt received, finishing in-flight chats; press Ctrl+C again to quit');
    controller.abort();
  });

  const progressReporter = new ProgressReporter(config.format !== 'json');

  try {
    logger.info({ input: config.input, config: config.configPath, dryRun: config.dryRun }, 'Starting transcript ETL');

    const result = await etl.run(config, progressReporter, controller.signal);

    if (config.format === 'json') {
      console.log(JSON.stringify(result, null, 2));
    } else if (config.dryRun) {
      console.log(`\nConfig ${result.configName} compiled; ${result.summary.total} chats read.`);
      console.log(result.previewPrompt ? `\nFirst prompt:\n\n${result.previewPrompt}` : '\nNo chats to preview.');
    } else {
      printFailures(result);
      printSummary(result);
    }
  } catch (error) {
    progressReporter.error(errorMessage(error));
    if (isConfigurationLevelError(error)) {
      logger.error({ error }, 'Run aborted before extraction');
    } else {
      logger.error({ error }, 'Transcript ETL failed');
    }
    process.exitCode = 1;
  } finally {
    etl.close();
  }
};

main().catch(error => {
  logger.fatal({ error }, 'Unexpected failure');
  process.exit(1);
});
