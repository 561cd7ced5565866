import dayjs, { type Dayjs } from 'dayjs';

const PRERELEASE_MARKERS = ['preview', 'alpha', 'beta'];
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

export interface VersionClassification {
  veryOld: string[];
  old: string[];
  preview: string[];
}

export function isPreviewVersion(identifier: string): boolean {
  const lower = identifier.toLowerCase();
  return PRERELEASE_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Date portion of an API version (`2023-06-01-preview` -> 2023-06-01).
 * `null` for anything that is not a real calendar date.
 */
export function parseVersionDate(identifier: string): Dayjs | null {
  const match = DATE_PREFIX.exec(identifier);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = dayjs(`${year}-${month}-${day}`);
  // dayjs rolls 2023-02-30 over into March; reject it instead
  if (!date.isValid() || date.format('YYYY-MM-DD') !== `${year}-${month}-${day}`) {
    return null;
  }
  return date;
}

export function sortVersionsDescending(identifiers: Iterable<string>): string[] {
  return [...identifiers].sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));
}

/**
 * Bucket API versions by age relative to `now`. Preview status is a separate
 * axis, so a preview version can also appear in `old` or `veryOld`.
 */
export function classifyVersions(
  identifiers: Iterable<string>,
  now: Date | Dayjs = new Date()
): VersionClassification {
  const today = dayjs(now).startOf('day');
  const oneYearAgo = today.subtract(1, 'year');
  const twoYearsAgo = today.subtract(2, 'year');
  const result: VersionClassification = { veryOld: [], old: [], preview: [] };

  for (const identifier of identifiers) {
    const date = parseVersionDate(identifier);
    if (date) {
      if (date.isBefore(twoYearsAgo)) {
        result.veryOld.push(identifier);
      } else if (date.isBefore(oneYearAgo)) {
        result.old.push(identifier);
      }
    }
    if (isPreviewVersion(identifier)) {
      result.preview.push(identifier);
    }
  }

  return result;
}
