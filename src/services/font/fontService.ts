/**
 * Font Service
 * Picks the face used for the stamp: preferred font file, alternate font
 * file, then the renderer's built-in family
 */

import fs from 'fs/promises';
import path from 'path';
import { config } from '../../config';
import { FontLoadError } from '../../utils/errors';
import { FallbackProvider, resolveWithFallbacks } from '../../utils/fallback';
import { AppLogger, logger as defaultLogger } from '../../utils/logger';

export interface FontFace {
  family: string;
  /** Absolute path to a font file, absent for the built-in family */
  file?: string;
  source: 'preferred' | 'alternate' | 'builtin';
}

export interface FontCandidates {
  family: string;
  preferredFile: string;
  alternateFile: string;
  builtinFamily: string;
}

export class FontService {
  private candidates: FontCandidates;
  private logger: AppLogger;
  private cwd: () => string;

  constructor(
    candidates: FontCandidates = config.fonts,
    options: { logger?: AppLogger; cwd?: () => string } = {}
  ) {
    this.candidates = candidates;
    this.logger = options.logger ?? defaultLogger;
    this.cwd = options.cwd ?? (() => process.cwd());
  }

  async resolveFont(): Promise<FontFace> {
    const { family, preferredFile, alternateFile, builtinFamily } = this.candidates;

    const providers: FallbackProvider<FontFace>[] = [
      {
        name: 'preferred',
        attempt: async () => ({ family, file: await this.loadable(preferredFile), source: 'preferred' }),
      },
      {
        name: 'alternate',
        attempt: async () => ({ family, file: await this.loadable(alternateFile), source: 'alternate' }),
      },
      {
        name: 'builtin',
        attempt: async () => ({ family: builtinFamily, source: 'builtin' }),
      },
    ];

    const { value } = await resolveWithFallbacks(providers, { what: 'font', logger: this.logger });
    this.logger.debug('Font resolved', { family: value.family, file: value.file, source: value.source });
    return value;
  }

  private async loadable(fontFile: string): Promise<string> {
    const absolute = path.resolve(this.cwd(), fontFile);
    try {
      await fs.access(absolute, fs.constants.R_OK);
    } catch (error) {
      throw new FontLoadError(absolute, { error });
    }
    return absolute;
  }
}

export const fontService = new FontService();
