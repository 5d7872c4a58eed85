/**
 * EXIF reading from real files written by sharp
 */

import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { DateResolverService } from '../services/date/dateResolverService';
import { readExifDateTags } from '../utils/exif';
import { createFakeLogger, makeTempDir, removeDir, writeSolidImage } from './helpers';

describe('EXIF from image files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reads DateTimeOriginal written into a JPEG', async () => {
    const file = path.join(dir, 'camera.jpg');
    await sharp({ create: { width: 16, height: 16, channels: 3, background: { r: 0, g: 0, b: 0 } } })
      .withExif({ IFD2: { DateTimeOriginal: '2023:05:17 10:22:31' } })
      .jpeg()
      .toFile(file);

    await expect(readExifDateTags(file)).resolves.toMatchObject({ DateTimeOriginal: '2023:05:17 10:22:31' });

    const resolver = new DateResolverService({ logger: createFakeLogger() });
    await expect(resolver.resolveDate(file)).resolves.toBe('2023-05-17');
  });

  it('falls back to the modification date for a JPEG without EXIF', async () => {
    const file = path.join(dir, 'plain.jpg');
    await writeSolidImage(file, 16, 16);
    const mtime = new Date(2024, 0, 2, 12, 0, 0);
    await fs.utimes(file, mtime, mtime);

    await expect(readExifDateTags(file)).resolves.toEqual({});

    const logger = createFakeLogger();
    const resolver = new DateResolverService({ logger });
    await expect(resolver.resolveDate(file)).resolves.toBe('2024-01-02');
    expect(logger.warn).not.toHaveBeenCalled();
  });
});
