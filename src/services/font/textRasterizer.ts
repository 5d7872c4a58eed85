/**
 * Text Rasterizer
 * Renders the stamp text to a transparent PNG through sharp's Pango text input;
 * the rendered size is the measured text box.
 */

import sharp from 'sharp';
import { ProcessingError } from '../../utils/errors';
import { FontFace } from './fontService';

export interface RasterizedText {
  png: Buffer;
  width: number;
  height: number;
}

export interface TextRasterizer {
  rasterize(text: string, font: FontFace, fontSize: number, color: string): Promise<RasterizedText>;
}

const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;
const RGB_COLOR = /^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/i;
const NAMED_COLOR = /^[a-z]+$/i;

/**
 * Normalize a user colour to something Pango markup accepts: a name or #hex.
 */
export function normalizeColor(input: string): string {
  const color = input.trim();

  if (HEX_COLOR.test(color)) return color.toLowerCase();

  const rgb = RGB_COLOR.exec(color);
  if (rgb) {
    const channels = rgb.slice(1).map((part) => parseInt(part, 10));
    if (channels.some((value) => value > 255)) {
      throw new ProcessingError(`Unsupported color: ${input}`);
    }
    return `#${channels.map((value) => value.toString(16).padStart(2, '0')).join('')}`;
  }

  if (NAMED_COLOR.test(color)) return color.toLowerCase();

  throw new ProcessingError(`Unsupported color: ${input}`);
}

function escapeMarkup(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export class SharpTextRasterizer implements TextRasterizer {
  async rasterize(text: string, font: FontFace, fontSize: number, color: string): Promise<RasterizedText> {
    const foreground = normalizeColor(color);

    // dpi 72: one point per pixel, so the Pango size is the pixel size
    const { data, info } = await sharp({
      text: {
        text: `<span foreground="${foreground}">${escapeMarkup(text)}</span>`,
        font: `${font.family} ${fontSize}`,
        fontfile: font.file,
        dpi: 72,
        rgba: true,
      },
    })
      .png()
      .toBuffer({ resolveWithObject: true });

    return { png: data, width: info.width, height: info.height };
  }
}

export const textRasterizer = new SharpTextRasterizer();
