import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { formatSummary, formatTable, parseArgs, runCli, toConfigOverrides } from '../src/cli';
import { ConfigError, PageLimitExceededError, PdfLoadError } from '../src/errors';
import { BatchRunner, type OutlineExtractor } from '../src/services/batch-runner';
import { logger } from '../src/services/logger';

const extractor: OutlineExtractor = async (path, opts) => {
  switch (basename(path)) {
    case 'big.pdf':
      throw new PageLimitExceededError(80, opts.maxPages);
    case 'broken.pdf':
      throw new PdfLoadError('Invalid PDF structure');
    default:
      return { source: opts.settings?.preferNativeOutline ? 'native' : 'layout', outline: { title: '', nodes: [] } };
  }
};

describe('parseArgs', () => {
  it('reads every option', () => {
    expect(
      parseArgs([
        '--input',
        './pdfs',
        '--output',
        './out',
        '--max-pages',
        '20',
        '--concurrency',
        '3',
        '--settings',
        './s.json',
        '--no-native',
        '--format',
        'json',
      ])
    ).toEqual({
      input: './pdfs',
      output: './out',
      maxPages: 20,
      concurrency: 3,
      settings: './s.json',
      noNative: true,
      format: 'json',
    });
  });

  it('rejects unknown options and malformed values', () => {
    expect(() => parseArgs(['--verbose'])).toThrow(ConfigError);
    expect(() => parseArgs(['--format', 'xml'])).toThrow('Invalid --format: xml');
    expect(() => parseArgs(['--max-pages', 'ten'])).toThrow('Invalid --max-pages: ten');
    expect(() => parseArgs(['--concurrency'])).toThrow('Invalid --concurrency: (missing)');
  });

  it('maps only the flags that were given onto configuration overrides', () => {
    expect(toConfigOverrides({ output: './out', noNative: true })).toEqual({
      inputDir: undefined,
      outputDir: './out',
      maxPages: undefined,
      concurrency: undefined,
      settingsPath: undefined,
      nativeOutline: false,
    });
  });
});

describe('report formatting', () => {
  it('prints one row per file', () => {
    const table = formatTable([
      { name: 'report.pdf', path: '/in/report.pdf', status: 'processed', source: 'native', headings: 4 },
      { name: 'big.pdf', path: '/in/big.pdf', status: 'rejected', error: 'Document has 80 pages, limit is 50' },
    ]);

    expect(table.split('\n')).toEqual([
      '-'.repeat(42),
      'File                 | Status    | Details',
      '-'.repeat(42),
      'report.pdf           | processed | native 4 headings',
      'big.pdf              | rejected  | Document has 80 pages, limit is 50',
      '-'.repeat(42),
    ]);
  });

  it('summarises the batch', () => {
    expect(
      formatSummary({ files: [], summary: { total: 3, processed: 1, rejected: 1, failed: 1 } }).split('\n')
    ).toEqual(['Summary:', '  Total:     3', '  Processed: 1', '  Rejected:  1', '  Failed:    1']);
  });
});

describe('runCli', () => {
  let root: string;
  let input: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'outline-cli-'));
    input = join(root, 'input');
    await mkdir(input);
    env = { NODE_ENV: 'test', INPUT_DIR: input, OUTPUT_DIR: join(root, 'output') };
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    logger.level = 'silent';
    await rm(root, { recursive: true, force: true });
  });

  const runner = (): BatchRunner => new BatchRunner(extractor);

  it('prints help and exits cleanly', async () => {
    expect(await runCli(['--help'], env, runner())).toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Usage:'));
  });

  it('exits with 0 when documents are only rejected', async () => {
    await writeFile(join(input, 'report.pdf'), '');
    await writeFile(join(input, 'big.pdf'), '');

    expect(await runCli([], env, runner())).toBe(0);
  });

  it('exits with 1 when a document failed', async () => {
    await writeFile(join(input, 'report.pdf'), '');
    await writeFile(join(input, 'broken.pdf'), '');

    expect(await runCli([], env, runner())).toBe(1);
  });

  it('exits with 1 on invalid configuration', async () => {
    expect(await runCli(['--concurrency', '0'], env, runner())).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('concurrency'));
  });

  it('logs at the configured level', async () => {
    expect(await runCli([], { ...env, NODE_ENV: 'production', LOG_LEVEL: 'error' }, runner())).toBe(0);
    expect(logger.level).toBe('error');
  });

  it('stays silent under test whatever the log level', async () => {
    await runCli([], { ...env, LOG_LEVEL: 'debug' }, runner());
    expect(logger.level).toBe('silent');
  });

  it('rejects an unknown log level before running', async () => {
    const run = vi.spyOn(BatchRunner.prototype, 'run');
    expect(await runCli([], { ...env, LOG_LEVEL: 'verbose' }, runner())).toBe(1);
    expect(run).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('logLevel'));
  });

  it('turns off bookmarks with --no-native', async () => {
    await writeFile(join(input, 'report.pdf'), '');

    await runCli(['--no-native', '--format', 'json'], env, runner());

    const printed = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(printed.files[0]).toMatchObject({ name: 'report.pdf', status: 'processed', source: 'layout' });
  });

  it('loads heuristic settings from a file', async () => {
    await writeFile(join(input, 'report.pdf'), '');
    const settingsPath = join(root, 'settings.json');
    await writeFile(settingsPath, JSON.stringify({ preferNativeOutline: false }));

    await runCli(['--settings', settingsPath, '--format', 'json'], env, runner());

    const printed = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(printed.files[0].source).toBe('layout');
  });
});
