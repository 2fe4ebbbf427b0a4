import { mkdir, readdir, rm, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';

import { ConfigError, PageLimitExceededError } from '../errors';
import { extractOutlineFromFile, type ExtractOptions } from '../pdf/pipeline';
import { serializeOutline, toOutlineDocument } from '../pdf/flatten';
import type { OutlineResult, OutlineSource } from '../pdf/types';
import type { OutlineSettings } from '../types';
import { logger } from './logger';

export interface BatchConfig {
  inputDir: string;
  outputDir: string;
  maxPages: number;
  concurrency: number;
  settings: OutlineSettings;
}

export interface FileInfo {
  path: string;
  name: string;
}

export interface FileResult extends FileInfo {
  status: 'processed' | 'rejected' | 'failed';
  outputPath?: string;
  source?: OutlineSource;
  title?: string;
  headings?: number;
  error?: string;
}

export interface BatchResult {
  files: FileResult[];
  summary: {
    total: number;
    processed: number;
    rejected: number;
    failed: number;
  };
}

export type OutlineExtractor = (path: string, opts: ExtractOptions) => Promise<OutlineResult>;

const PDF_EXTENSION = '.pdf';

// Runs fn over items with at most `limit` in flight; results keep input order.
async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i]);
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export class BatchRunner {
  constructor(private extractor: OutlineExtractor = extractOutlineFromFile) {}

  async run(config: BatchConfig): Promise<BatchResult> {
    const files = await this.scanFolder(config.inputDir);
    logger.info({ inputDir: config.inputDir, files: files.length }, 'Found PDF files');

    await mkdir(config.outputDir, { recursive: true });

    const results = await mapWithConcurrency(files, config.concurrency, (file) => this.processFile(file, config));

    const summary = {
      total: results.length,
      processed: results.filter((r) => r.status === 'processed').length,
      rejected: results.filter((r) => r.status === 'rejected').length,
      failed: results.filter((r) => r.status === 'failed').length,
    };
    logger.info(summary, 'Batch complete');

    return { files: results, summary };
  }

  private async processFile(file: FileInfo, config: BatchConfig): Promise<FileResult> {
    const started = Date.now();
    logger.info({ file: file.name }, 'Processing PDF');
    const outputPath = join(config.outputDir, `${basename(file.name, extname(file.name))}.json`);

    try {
      const result = await this.extractor(file.path, {
        maxPages: config.maxPages,
        settings: config.settings,
      });
      const doc = toOutlineDocument(result.outline);
      await writeFile(outputPath, serializeOutline(doc), 'utf8');

      logger.info(
        { file: file.name, source: result.source, headings: doc.outline.length, ms: Date.now() - started },
        'Outline written'
      );
      return {
        ...file,
        status: 'processed',
        outputPath,
        source: result.source,
        title: doc.title,
        headings: doc.outline.length,
      };
    } catch (error) {
      // An outline left by an earlier run no longer describes this file.
      await rm(outputPath, { force: true }).catch((rmError: unknown) => {
        logger.warn({ file: file.name, outputPath, error: rmError }, 'Could not remove stale outline');
      });
      if (error instanceof PageLimitExceededError) {
        logger.warn({ file: file.name, pageCount: error.pageCount, maxPages: error.maxPages }, 'Rejected: page limit exceeded');
        return { ...file, status: 'rejected', error: error.message };
      }
      logger.error({ file: file.name, error }, 'Failed to extract outline');
      return { ...file, status: 'failed', error: error instanceof Error ? error.message : 'Unknown error' };
    }
  }

  private async scanFolder(folder: string): Promise<FileInfo[]> {
    const entries = await readdir(folder, { withFileTypes: true }).catch((error: unknown) => {
      throw new ConfigError(`Input directory not readable: ${folder}`, error);
    });

    const files: FileInfo[] = [];
    for (const entry of entries) {
      if (entry.isFile() && extname(entry.name).toLowerCase() === PDF_EXTENSION) {
        files.push({ path: join(folder, entry.name), name: entry.name });
      }
    }
    return files.sort((a, b) => a.name.localeCompare(b.name));
  }
}
