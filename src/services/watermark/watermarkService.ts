/**
 * Watermark Service
 * Draws the capture-date stamp with a drop shadow onto a copy of a photo
 */

import path from 'path';
import sharp from 'sharp';
import { config } from '../../config';
import { Point, WatermarkOptions, WatermarkResult } from '../../types';
import { ProcessingError } from '../../utils/errors';
import { AppLogger, errorMessage, logger as defaultLogger } from '../../utils/logger';
import { DateResolverService, dateResolverService } from '../date/dateResolverService';
import { FontService, fontService } from '../font/fontService';
import { RasterizedText, TextRasterizer, textRasterizer } from '../font/textRasterizer';
import {
  DecodedImage,
  decodeImage,
  encodeImage,
  rawPipeline,
  toColorChannels,
} from '../image/imageCodec';
import { clipOverlay, computeTextPosition } from '../layout/layoutService';

export interface WatermarkSettings {
  margin: number;
  shadowOffset: number;
  shadowColor: string;
  quality: number;
}

export interface WatermarkDeps {
  dateResolver?: DateResolverService;
  fonts?: FontService;
  rasterizer?: TextRasterizer;
  logger?: AppLogger;
  settings?: Partial<WatermarkSettings>;
}

export class WatermarkService {
  private dateResolver: DateResolverService;
  private fonts: FontService;
  private rasterizer: TextRasterizer;
  private logger: AppLogger;
  private settings: WatermarkSettings;

  constructor(deps: WatermarkDeps = {}) {
    this.dateResolver = deps.dateResolver ?? dateResolverService;
    this.fonts = deps.fonts ?? fontService;
    this.rasterizer = deps.rasterizer ?? textRasterizer;
    this.logger = deps.logger ?? defaultLogger;
    this.settings = {
      margin: config.margin,
      shadowOffset: config.shadowOffset,
      shadowColor: config.shadowColor,
      quality: config.quality,
      ...deps.settings,
    };
  }

  /**
   * Stamp `sourcePath` and write the result to `outputPath`. Failures are
   * logged and returned, never thrown, so a batch can carry on.
   */
  async watermarkFile(
    sourcePath: string,
    outputPath: string,
    options: WatermarkOptions
  ): Promise<WatermarkResult> {
    try {
      const date = await this.render(sourcePath, outputPath, options);

      this.logger.info('Image watermarked', {
        source: path.basename(sourcePath),
        output: path.basename(outputPath),
        date,
      });

      return { status: 'ok', source: sourcePath, output: outputPath, date };
    } catch (error) {
      this.logger.error('Failed to watermark image', error, { path: sourcePath });
      return { status: 'failed', source: sourcePath, output: outputPath, error: errorMessage(error) };
    }
  }

  private async render(sourcePath: string, outputPath: string, options: WatermarkOptions): Promise<string> {
    if (path.resolve(sourcePath) === path.resolve(outputPath)) {
      throw new ProcessingError('Output path would overwrite the source image', { sourcePath });
    }

    const image = await decodeImage(sourcePath);
    const date = await this.dateResolver.resolveDate(sourcePath);
    const font = await this.fonts.resolveFont();

    const foreground = await this.rasterizer.rasterize(date, font, options.fontSize, options.color);
    const shadow = await this.rasterizer.rasterize(date, font, options.fontSize, this.settings.shadowColor);

    const at = computeTextPosition(image, foreground, options.position, this.settings.margin);
    const offset = this.settings.shadowOffset;

    const overlays: sharp.OverlayOptions[] = [];
    // Shadow first so the foreground lands on top of it
    const shadowOverlay = await this.placeOverlay(image, shadow, { x: at.x + offset, y: at.y + offset });
    if (shadowOverlay) overlays.push(shadowOverlay);
    const foregroundOverlay = await this.placeOverlay(image, foreground, at);
    if (foregroundOverlay) overlays.push(foregroundOverlay);

    const { data, info } = await rawPipeline(image)
      .composite(overlays)
      .raw()
      .toBuffer({ resolveWithObject: true });

    await encodeImage(
      { data, width: info.width, height: info.height, channels: toColorChannels(info.channels) },
      outputPath,
      { quality: this.settings.quality, channels: image.channels }
    );

    return date;
  }

  /**
   * Overlay for one text layer, cropped to the part that falls on the image
   */
  private async placeOverlay(
    image: DecodedImage,
    text: RasterizedText,
    origin: Point
  ): Promise<sharp.OverlayOptions | null> {
    const clipped = clipOverlay(image, text, origin);
    if (!clipped) return null;

    const fits =
      clipped.extract.left === 0 &&
      clipped.extract.top === 0 &&
      clipped.extract.width === text.width &&
      clipped.extract.height === text.height;

    const input = fits ? text.png : await sharp(text.png).extract(clipped.extract).png().toBuffer();
    return { input, left: clipped.left, top: clipped.top };
  }
}

export const watermarkService = new WatermarkService();
