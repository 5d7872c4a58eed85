/**
 * EXIF date tag extraction
 */

import exifr from 'exifr';

/**
 * Capture-date tags in the order they are consulted. exifr names IFD0
 * DateTime "ModifyDate" and DateTimeDigitized "CreateDate".
 */
export const DATE_TAG_PRIORITY = [
  { tag: 'DateTime', key: 'ModifyDate' },
  { tag: 'DateTimeOriginal', key: 'DateTimeOriginal' },
  { tag: 'DateTimeDigitized', key: 'CreateDate' },
] as const;

export type DateTagName = (typeof DATE_TAG_PRIORITY)[number]['tag'];

export type DateTags = Partial<Record<DateTagName, string>>;

/**
 * Read the raw date tag strings ("YYYY:MM:DD HH:MM:SS") from an image.
 * Throws when the file cannot be read or parsed; an image without EXIF
 * yields an empty object.
 */
export async function readExifDateTags(imagePath: string): Promise<DateTags> {
  const parsed: unknown = await exifr.parse(imagePath, {
    pick: DATE_TAG_PRIORITY.map((entry) => entry.key),
    reviveValues: false,
  });

  const tags: DateTags = {};
  if (!parsed || typeof parsed !== 'object') return tags;

  const record = new Map(Object.entries(parsed));
  for (const { tag, key } of DATE_TAG_PRIORITY) {
    const value = record.get(key);
    if (typeof value === 'string') {
      tags[tag] = value;
    }
  }
  return tags;
}

/**
 * First non-empty tag in priority order
 */
export function pickDateTag(tags: DateTags): { tag: DateTagName; value: string } | null {
  for (const { tag } of DATE_TAG_PRIORITY) {
    const value = tags[tag]?.trim();
    if (value) return { tag, value };
  }
  return null;
}

const EXIF_DATETIME = /^(\d{4}):(\d{1,2}):(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

/**
 * Parse "YYYY:MM:DD HH:MM:SS" into a YYYY-MM-DD stamp. Returns null for
 * anything that is not a real calendar date and time.
 */
export function parseExifDateTime(value: string): string | null {
  const match = EXIF_DATETIME.exec(value.trim());
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map((part) => parseInt(part, 10));
  if (hour > 23 || minute > 59 || second > 59) return null;

  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return formatDateParts(year, month, day);
}

export function formatDateParts(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Local calendar date of a timestamp
 */
export function formatLocalDate(date: Date): string {
  return formatDateParts(date.getFullYear(), date.getMonth() + 1, date.getDate());
}
