/**
 * Date Resolver Service
 * Capture date for the stamp: EXIF tag, then file mtime, then the clock
 */

import fs from 'fs/promises';
import { DateStamp } from '../../types';
import { MetadataError } from '../../utils/errors';
import {
  DateTags,
  formatLocalDate,
  parseExifDateTime,
  pickDateTag,
  readExifDateTags,
} from '../../utils/exif';
import { FallbackProvider, resolveWithFallbacks } from '../../utils/fallback';
import { AppLogger, logger as defaultLogger } from '../../utils/logger';

export interface DateResolverDeps {
  readDateTags?: (imagePath: string) => Promise<DateTags>;
  getModifiedTime?: (imagePath: string) => Promise<Date>;
  now?: () => Date;
  logger?: AppLogger;
}

async function statModifiedTime(imagePath: string): Promise<Date> {
  const stats = await fs.stat(imagePath);
  return stats.mtime;
}

export class DateResolverService {
  private readDateTags: (imagePath: string) => Promise<DateTags>;
  private getModifiedTime: (imagePath: string) => Promise<Date>;
  private now: () => Date;
  private logger: AppLogger;

  constructor(deps: DateResolverDeps = {}) {
    this.readDateTags = deps.readDateTags ?? readExifDateTags;
    this.getModifiedTime = deps.getModifiedTime ?? statModifiedTime;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Resolve the YYYY-MM-DD stamp for an image. Never throws.
   */
  async resolveDate(imagePath: string): Promise<DateStamp> {
    const providers: FallbackProvider<DateStamp>[] = [
      { name: 'exif', attempt: () => this.fromMetadata(imagePath) },
      {
        name: 'mtime',
        attempt: async () => formatLocalDate(await this.getModifiedTime(imagePath)),
      },
      { name: 'now', attempt: async () => formatLocalDate(this.now()) },
    ];

    const { value, provider } = await resolveWithFallbacks(providers, {
      what: 'capture date',
      logger: this.logger,
      context: { imagePath },
    });

    this.logger.debug('Capture date resolved', { imagePath, date: value, source: provider });
    return value;
  }

  private async fromMetadata(imagePath: string): Promise<DateStamp | null> {
    let tags: DateTags;
    try {
      tags = await this.readDateTags(imagePath);
    } catch (error) {
      throw new MetadataError(imagePath, error);
    }

    // Only the first present tag counts; an unparseable one is not retried
    // against the lower-priority tags.
    const picked = pickDateTag(tags);
    if (!picked) return null;
    return parseExifDateTime(picked.value);
  }
}

export const dateResolverService = new DateResolverService();
