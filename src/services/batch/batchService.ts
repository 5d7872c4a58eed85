/**
 * Batch Service
 * Runs the watermark service over a single file or every image in a directory
 */

import fs from 'fs/promises';
import { BatchSummary, WatermarkOptions, WatermarkResult } from '../../types';
import { AppLogger, logger as defaultLogger } from '../../utils/logger';
import { WatermarkService, watermarkService } from '../watermark/watermarkService';
import {
  listImageFiles,
  outputDirForDirectory,
  outputDirForFile,
  outputPathFor,
} from './directoryWalker';

export interface BatchDeps {
  watermarker?: WatermarkService;
  logger?: AppLogger;
  cwd?: () => string;
}

export class BatchService {
  private watermarker: WatermarkService;
  private logger: AppLogger;
  private cwd: () => string;

  constructor(deps: BatchDeps = {}) {
    this.watermarker = deps.watermarker ?? watermarkService;
    this.logger = deps.logger ?? defaultLogger;
    this.cwd = deps.cwd ?? (() => process.cwd());
  }

  async processFile(inputFile: string, options: WatermarkOptions): Promise<BatchSummary> {
    const outputDir = outputDirForFile(inputFile, this.cwd());
    await fs.mkdir(outputDir, { recursive: true });

    const result = await this.watermarker.watermarkFile(
      inputFile,
      outputPathFor(inputFile, outputDir),
      options
    );
    return summarize(outputDir, [result]);
  }

  async processDirectory(inputDir: string, options: WatermarkOptions): Promise<BatchSummary> {
    const outputDir = outputDirForDirectory(inputDir);
    await fs.mkdir(outputDir, { recursive: true });

    const images = await listImageFiles(inputDir);
    if (images.length === 0) {
      this.logger.warn('No supported images found', { inputDir });
      return summarize(outputDir, []);
    }

    this.logger.info('Found images', { count: images.length, outputDir });

    const results: WatermarkResult[] = [];
    for (const image of images) {
      results.push(await this.watermarker.watermarkFile(image, outputPathFor(image, outputDir), options));
    }
    return summarize(outputDir, results);
  }
}

function summarize(outputDir: string, results: WatermarkResult[]): BatchSummary {
  const summary: BatchSummary = { outputDir, processed: [], failed: [] };
  for (const result of results) {
    if (result.status === 'ok') {
      summary.processed.push(result.output);
    } else {
      summary.failed.push({ path: result.source, error: result.error });
    }
  }
  return summary;
}

export const batchService = new BatchService();
