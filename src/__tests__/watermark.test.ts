/**
 * Watermark service tests
 * Real decode/composite/encode through sharp; text comes from a block rasterizer
 */

import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { DateResolverService } from '../services/date/dateResolverService';
import { FontService } from '../services/font/fontService';
import { WatermarkService } from '../services/watermark/watermarkService';
import { WatermarkOptions } from '../types';
import {
  BlockRasterizer,
  createFakeLogger,
  makeTempDir,
  pixelAt,
  removeDir,
  writeSolidImage,
} from './helpers';

const RED = [255, 0, 0];
const BLACK = [0, 0, 0];
const WHITE = [255, 255, 255];

async function sha256(file: string): Promise<string> {
  return crypto.createHash('sha256').update(await fs.readFile(file)).digest('hex');
}

describe('WatermarkService', () => {
  let dir: string;
  let logger: ReturnType<typeof createFakeLogger>;
  let rasterizer: BlockRasterizer;
  let service: WatermarkService;

  const options: WatermarkOptions = { fontSize: 24, color: 'red', position: 'bottom-right' };

  beforeEach(async () => {
    dir = await makeTempDir();
    logger = createFakeLogger();
    rasterizer = new BlockRasterizer(40, 10);
    service = new WatermarkService({
      dateResolver: new DateResolverService({
        readDateTags: async () => ({ DateTimeOriginal: '2023:05:17 10:22:31' }),
        logger,
      }),
      fonts: new FontService(
        {
          family: 'Arial',
          preferredFile: '/nonexistent/preferred.ttf',
          alternateFile: '/nonexistent/alternate.ttf',
          builtinFamily: 'sans',
        },
        { logger }
      ),
      rasterizer,
      logger,
    });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('draws the shadow then the foreground at the anchor', async () => {
    const source = path.join(dir, 'a.png');
    const output = path.join(dir, 'a_watermark.png');
    await writeSolidImage(source, 100, 50);

    const result = await service.watermarkFile(source, output, options);

    expect(result).toEqual({ status: 'ok', source, output, date: '2023-05-17' });
    // bottom-right: x = 100 - 40 - 10, y = 50 - 10 - 10
    await expect(pixelAt(output, 50, 30)).resolves.toEqual(RED);
    await expect(pixelAt(output, 89, 39)).resolves.toEqual(RED);
    // shadow only, offset by 2px
    await expect(pixelAt(output, 91, 41)).resolves.toEqual(BLACK);
    await expect(pixelAt(output, 52, 41)).resolves.toEqual(BLACK);
    await expect(pixelAt(output, 10, 10)).resolves.toEqual(WHITE);
    await expect(pixelAt(output, 92, 42)).resolves.toEqual(WHITE);
  });

  it('renders the date text with the resolved font, size and colours', async () => {
    const source = path.join(dir, 'a.png');
    await writeSolidImage(source, 100, 50);

    await service.watermarkFile(source, path.join(dir, 'out.png'), { ...options, fontSize: 31 });

    const font = { family: 'sans', source: 'builtin' };
    expect(rasterizer.calls).toEqual([
      { text: '2023-05-17', font, fontSize: 31, color: 'red' },
      { text: '2023-05-17', font, fontSize: 31, color: 'black' },
    ]);
  });

  it('keeps the output in plain RGB with the source dimensions', async () => {
    const source = path.join(dir, 'a.png');
    const output = path.join(dir, 'out.png');
    await writeSolidImage(source, 100, 50);

    await service.watermarkFile(source, output, options);

    const meta = await sharp(output).metadata();
    expect(meta.width).toBe(100);
    expect(meta.height).toBe(50);
    expect(meta.channels).toBe(3);
  });

  it('writes JPEG for a JPEG source', async () => {
    const source = path.join(dir, 'photo.JPG');
    const output = path.join(dir, 'photo_watermark.JPG');
    await writeSolidImage(source, 120, 80);

    const result = await service.watermarkFile(source, output, { ...options, position: 'top-left' });

    expect(result.status).toBe('ok');
    const meta = await sharp(output).metadata();
    expect(meta.format).toBe('jpeg');
  });

  it('never modifies the source file', async () => {
    const source = path.join(dir, 'a.jpg');
    await writeSolidImage(source, 64, 48);
    const before = await sha256(source);

    await service.watermarkFile(source, path.join(dir, 'a_watermark.jpg'), options);

    await expect(sha256(source)).resolves.toBe(before);
  });

  it('refuses to write over the source', async () => {
    const source = path.join(dir, 'a.png');
    await writeSolidImage(source, 20, 20);
    const before = await sha256(source);

    const result = await service.watermarkFile(source, source, options);

    expect(result.status).toBe('failed');
    await expect(sha256(source)).resolves.toBe(before);
  });

  it('clips text that is larger than the image', async () => {
    const source = path.join(dir, 'tiny.png');
    const output = path.join(dir, 'tiny_watermark.png');
    await writeSolidImage(source, 30, 20);

    const result = await service.watermarkFile(source, output, options);

    // text box lands at (-20, 0), shadow at (-18, 2)
    expect(result.status).toBe('ok');
    await expect(pixelAt(output, 0, 0)).resolves.toEqual(RED);
    await expect(pixelAt(output, 19, 9)).resolves.toEqual(RED);
    await expect(pixelAt(output, 21, 11)).resolves.toEqual(BLACK);
    await expect(pixelAt(output, 25, 15)).resolves.toEqual(WHITE);
  });

  it('reports a corrupt file as a failure and logs it with its path', async () => {
    const source = path.join(dir, 'broken.jpg');
    const output = path.join(dir, 'broken_watermark.jpg');
    await fs.writeFile(source, 'not an image at all');

    const result = await service.watermarkFile(source, output, options);

    expect(result.status).toBe('failed');
    expect(logger.error).toHaveBeenCalledWith('Failed to watermark image', expect.any(Error), {
      path: source,
    });
    await expect(fs.access(output)).rejects.toThrow();
  });
});
