import { loadConfig, type ConfigInput } from './config';
import { ConfigError } from './errors';
import { BatchRunner, type BatchResult, type FileResult } from './services/batch-runner';
import { configuredLevel, logger } from './services/logger';
import { loadSettingsFile } from './services/settings-validator';
import { DEFAULT_SETTINGS } from './types';

export type OutputFormat = 'table' | 'json';

export interface CliArgs {
  input?: string;
  output?: string;
  maxPages?: number;
  concurrency?: number;
  settings?: string;
  noNative?: boolean;
  format?: OutputFormat;
  help?: boolean;
}

export const HELP = `
PDF Heading Outline - Extract TITLE/H1/H2/H3 outlines from a folder of PDFs

Usage:
  outline-pdfs [options]

Options:
  --input <dir>        Folder containing PDF files (default: $INPUT_DIR or ./input)
  --output <dir>       Folder for <name>.json outlines (default: $OUTPUT_DIR or ./output)
  --max-pages <n>      Reject documents with more pages (default: 50)
  --concurrency <n>    Documents processed in parallel (default: 4)
  --settings <file>    JSON file with heuristic settings
  --no-native          Ignore embedded bookmarks, always use layout analysis
  --format <fmt>       Report format: table or json (default: table)
  --help               Show this help message

Examples:
  outline-pdfs --input ./pdfs --output ./outlines
  outline-pdfs --input ./pdfs --max-pages 200 --format json
`;

function parseFormat(value: string | undefined): OutputFormat {
  if (value === 'table' || value === 'json') return value;
  throw new ConfigError(`Invalid --format: ${value ?? '(missing)'}`);
}

function parseCount(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (!value || !Number.isInteger(n)) {
    throw new ConfigError(`Invalid ${flag}: ${value ?? '(missing)'}`);
  }
  return n;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
        args.input = argv[++i];
        break;
      case '--output':
        args.output = argv[++i];
        break;
      case '--max-pages':
        args.maxPages = parseCount(arg, argv[++i]);
        break;
      case '--concurrency':
        args.concurrency = parseCount(arg, argv[++i]);
        break;
      case '--settings':
        args.settings = argv[++i];
        break;
      case '--no-native':
        args.noNative = true;
        break;
      case '--format':
        args.format = parseFormat(argv[++i]);
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  return args;
}

export function toConfigOverrides(args: CliArgs): ConfigInput {
  return {
    inputDir: args.input,
    outputDir: args.output,
    maxPages: args.maxPages,
    concurrency: args.concurrency,
    settingsPath: args.settings,
    nativeOutline: args.noNative ? false : undefined,
  };
}

function details(file: FileResult): string {
  switch (file.status) {
    case 'processed':
      return `${file.source ?? ''} ${file.headings ?? 0} headings`;
    case 'rejected':
    case 'failed':
      return file.error ?? '';
  }
}

export function formatTable(files: FileResult[]): string {
  const maxName = Math.max(20, ...files.map((f) => f.name.length));
  const header = `${'File'.padEnd(maxName)} | Status    | Details`;
  const separator = '-'.repeat(header.length);

  const rows = files.map((file) => `${file.name.padEnd(maxName)} | ${file.status.padEnd(9)} | ${details(file)}`);
  return [separator, header, separator, ...rows, separator].join('\n');
}

export function formatSummary(result: BatchResult): string {
  const { summary } = result;
  return [
    'Summary:',
    `  Total:     ${summary.total}`,
    `  Processed: ${summary.processed}`,
    `  Rejected:  ${summary.rejected}`,
    `  Failed:    ${summary.failed}`,
  ].join('\n');
}

/** Runs the batch described by argv and env; resolves to the process exit code. */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv,
  runner: BatchRunner = new BatchRunner()
): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      console.log(HELP);
      return 0;
    }

    const config = loadConfig(env, toConfigOverrides(args));
    logger.level = configuredLevel(config);

    const loaded = config.settingsPath ? await loadSettingsFile(config.settingsPath) : DEFAULT_SETTINGS;
    const settings = config.nativeOutline ? loaded : { ...loaded, preferNativeOutline: false };

    logger.info({ inputDir: config.inputDir, outputDir: config.outputDir, maxPages: config.maxPages }, 'Starting batch');

    const result = await runner.run({
      inputDir: config.inputDir,
      outputDir: config.outputDir,
      maxPages: config.maxPages,
      concurrency: config.concurrency,
      settings,
    });

    if (args.format === 'json') {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`\nOutline Results (${result.files.length} files):\n`);
      console.log(formatTable(result.files));
      console.log(`\n${formatSummary(result)}`);
    }

    return result.summary.failed > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      console.log(HELP);
      return 1;
    }
    logger.error({ error }, 'Batch failed');
    console.error('Error:', error instanceof Error ? error.message : error);
    return 1;
  }
}
