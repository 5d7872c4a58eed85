/**
 * Directory Walker
 * Image discovery and output path naming
 */

import fs from 'fs/promises';
import path from 'path';
import { config } from '../../config';

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.bmp', '.tiff', '.tif'];

/**
 * Extension match ignoring case, so `.JPG` and `.Jpg` both count
 */
export function isSupportedImage(filePath: string): boolean {
  return IMAGE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

/**
 * Regular image files directly inside `dir`, sorted by name
 */
export async function listImageFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSupportedImage(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}

function stripTrailingSeparators(p: string): string {
  const stripped = p.replace(/[\\/]+$/, '');
  return stripped || p;
}

/**
 * Sibling output directory for a directory input: `photos/` -> `photos_watermark`
 */
export function outputDirForDirectory(inputDir: string, suffix: string = config.outputSuffix): string {
  return `${stripTrailingSeparators(inputDir)}${suffix}`;
}

/**
 * Output directory for a single-file input, named after its parent directory.
 * A bare file name (or `./name`) uses the working directory's name, relative
 * to the working directory.
 */
export function outputDirForFile(
  inputFile: string,
  cwd: string = process.cwd(),
  suffix: string = config.outputSuffix
): string {
  const parent = path.dirname(inputFile);
  if (parent === '.' || parent === '') {
    return `${path.basename(cwd)}${suffix}`;
  }
  return `${stripTrailingSeparators(parent)}${suffix}`;
}

/**
 * `<outputDir>/<stem>_watermark<ext>`, keeping the original extension case
 */
export function outputPathFor(
  sourcePath: string,
  outputDir: string,
  suffix: string = config.outputSuffix
): string {
  const { name, ext } = path.parse(sourcePath);
  return path.join(outputDir, `${name}${suffix}${ext}`);
}
