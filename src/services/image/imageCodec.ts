/**
 * Image Codec
 * Decodes photos to 8-bit RGB/RGBA pixel buffers and encodes them back by
 * file extension. sharp handles JPEG, PNG and TIFF; BMP goes through jimp.
 */

import fs from 'fs/promises';
import path from 'path';
import Jimp from 'jimp';
import sharp from 'sharp';
import { Size } from '../../types';
import { ProcessingError } from '../../utils/errors';

export type ColorChannels = 3 | 4;

export interface DecodedImage extends Size {
  data: Buffer;
  channels: ColorChannels;
}

export interface EncodeOptions {
  quality: number;
  /** Drop alpha when the buffer has more channels than this */
  channels: ColorChannels;
}

const BMP_EXTENSIONS = new Set(['.bmp']);
const JPEG_EXTENSIONS = new Set(['.jpg', '.jpeg']);
const TIFF_EXTENSIONS = new Set(['.tif', '.tiff']);

export function toColorChannels(channels: number): ColorChannels {
  if (channels === 3 || channels === 4) return channels;
  throw new ProcessingError(`Unexpected channel count: ${channels}`);
}

/**
 * 8-bit RGB, or RGB with alpha, is drawn on as-is. Anything else (greyscale,
 * CMYK, 16-bit, grey with alpha) is converted to plain RGB first.
 */
export function isPlainColor(meta: sharp.Metadata): boolean {
  const rgbSpace = meta.space === 'srgb';
  const rgbChannels = meta.channels === 3 || (meta.channels === 4 && meta.hasAlpha === true);
  return rgbSpace && rgbChannels && meta.depth === 'uchar';
}

async function readBmpAsPng(imagePath: string): Promise<Buffer> {
  const bitmap = await Jimp.read(imagePath);
  return bitmap.getBufferAsync('image/png');
}

export async function decodeImage(imagePath: string): Promise<DecodedImage> {
  const isBmp = BMP_EXTENSIONS.has(path.extname(imagePath).toLowerCase());
  const input = isBmp ? await readBmpAsPng(imagePath) : imagePath;

  const meta = await sharp(input).metadata();
  const pipeline = sharp(input);
  // jimp always yields RGBA; BMP photos are treated as plain RGB
  if (isBmp || !isPlainColor(meta)) {
    pipeline.toColourspace('srgb').removeAlpha();
  }

  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return {
    data,
    width: info.width,
    height: info.height,
    channels: toColorChannels(info.channels),
  };
}

export function rawPipeline(image: DecodedImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

/**
 * Write the pixels in the format named by the output extension
 */
export async function encodeImage(
  image: DecodedImage,
  outputPath: string,
  options: EncodeOptions
): Promise<void> {
  const ext = path.extname(outputPath).toLowerCase();
  const pipeline = rawPipeline(image);
  if (image.channels > options.channels) {
    pipeline.removeAlpha();
  }

  if (JPEG_EXTENSIONS.has(ext)) {
    await pipeline.jpeg({ quality: options.quality }).toFile(outputPath);
    return;
  }
  if (ext === '.png') {
    await pipeline.png().toFile(outputPath);
    return;
  }
  if (TIFF_EXTENSIONS.has(ext)) {
    await pipeline.tiff({ quality: options.quality }).toFile(outputPath);
    return;
  }
  if (BMP_EXTENSIONS.has(ext)) {
    const png = await pipeline.png().toBuffer();
    const bitmap = await Jimp.read(png);
    await fs.writeFile(outputPath, await bitmap.getBufferAsync('image/bmp'));
    return;
  }

  throw new ProcessingError(`Unsupported output format: ${ext || '(none)'}`, { outputPath });
}
