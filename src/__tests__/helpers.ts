/**
 * Shared test fixtures: temp dirs, generated images, fake logger and rasterizer
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { FontFace } from '../services/font/fontService';
import { RasterizedText, TextRasterizer } from '../services/font/textRasterizer';
import { AppLogger } from '../utils/logger';

export async function makeTempDir(prefix = 'datestamp-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeSolidImage(
  filePath: string,
  width: number,
  height: number,
  background = { r: 255, g: 255, b: 255 }
): Promise<void> {
  const ext = path.extname(filePath).toLowerCase();
  const image = sharp({ create: { width, height, channels: 3, background } });
  if (ext === '.png') {
    await image.png().toFile(filePath);
  } else {
    await image.jpeg({ quality: 95 }).toFile(filePath);
  }
}

export function createFakeLogger(): jest.Mocked<AppLogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/**
 * Rasterizer stand-in: a solid block, black for "black" and pure red otherwise
 */
export class BlockRasterizer implements TextRasterizer {
  calls: Array<{ text: string; font: FontFace; fontSize: number; color: string }> = [];

  constructor(private width = 40, private height = 10) {}

  async rasterize(text: string, font: FontFace, fontSize: number, color: string): Promise<RasterizedText> {
    this.calls.push({ text, font, fontSize, color });
    const background = color === 'black'
      ? { r: 0, g: 0, b: 0, alpha: 1 }
      : { r: 255, g: 0, b: 0, alpha: 1 };
    const png = await sharp({
      create: { width: this.width, height: this.height, channels: 4, background },
    })
      .png()
      .toBuffer();
    return { png, width: this.width, height: this.height };
  }
}

export async function pixelAt(
  filePath: string,
  x: number,
  y: number
): Promise<number[]> {
  const { data, info } = await sharp(filePath).raw().toBuffer({ resolveWithObject: true });
  const offset = (y * info.width + x) * info.channels;
  return Array.from(data.subarray(offset, offset + 3));
}
