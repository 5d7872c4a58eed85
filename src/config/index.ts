/**
 * Centralized Configuration
 */

import dotenv from 'dotenv';
import { AnchorPosition, toAnchorPosition } from '../types';

// Load environment variables
dotenv.config();

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface Config {
  logLevel: LogLevelSetting;

  // CLI defaults
  defaults: {
    fontSize: number;
    color: string;
    position: AnchorPosition;
  };

  // Fonts, tried in order: preferred file, alternate file, built-in family
  fonts: {
    family: string;
    preferredFile: string;
    alternateFile: string;
    builtinFamily: string;
  };

  // Drawing
  margin: number; // px from any edge the anchor touches
  shadowOffset: number; // px, both axes
  shadowColor: string;

  // Output
  quality: number; // JPEG/TIFF, 1-100
  outputSuffix: string;
}

function parseLogLevel(value: string | undefined): LogLevelSetting {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export const config: Config = {
  logLevel: parseLogLevel(process.env.LOG_LEVEL),

  defaults: {
    fontSize: parsePositiveInt(process.env.WATERMARK_FONT_SIZE, 24),
    color: process.env.WATERMARK_COLOR || 'white',
    position: toAnchorPosition(process.env.WATERMARK_POSITION || 'bottom-right'),
  },

  fonts: {
    family: process.env.WATERMARK_FONT_FAMILY || 'Arial',
    preferredFile: process.env.WATERMARK_FONT_FILE || '/System/Library/Fonts/Arial.ttf',
    alternateFile: process.env.WATERMARK_FALLBACK_FONT_FILE || 'arial.ttf',
    builtinFamily: 'sans',
  },

  margin: 10,
  shadowOffset: 2,
  shadowColor: 'black',

  quality: Math.min(100, parsePositiveInt(process.env.WATERMARK_QUALITY, 95)),
  outputSuffix: '_watermark',
};
