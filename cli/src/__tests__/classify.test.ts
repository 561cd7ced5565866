import { describe, it, expect } from 'vitest';
import {
  classifyVersions,
  isPreviewVersion,
  parseVersionDate,
  sortVersionsDescending,
} from '../lib/audit/classify.js';

const NOW = new Date(2025, 6, 1);

describe('parseVersionDate', () => {
  it('should read the date portion of a plain version', () => {
    expect(parseVersionDate('2023-01-01')?.format('YYYY-MM-DD')).toBe('2023-01-01');
  });

  it('should ignore a pre-release suffix', () => {
    expect(parseVersionDate('2023-06-01-preview')?.format('YYYY-MM-DD')).toBe('2023-06-01');
  });

  it('should reject impossible dates', () => {
    expect(parseVersionDate('2023-02-30')).toBeNull();
  });

  it('should reject identifiers without a date', () => {
    expect(parseVersionDate('latest')).toBeNull();
  });
});

describe('isPreviewVersion', () => {
  it('should detect preview, alpha and beta markers', () => {
    expect(isPreviewVersion('2023-06-01-preview')).toBe(true);
    expect(isPreviewVersion('2022-01-01-beta')).toBe(true);
    expect(isPreviewVersion('2021-03-01-alpha')).toBe(true);
    expect(isPreviewVersion('2024-01-01-PrivatePreview')).toBe(true);
  });

  it('should not flag stable versions', () => {
    expect(isPreviewVersion('2024-01-01')).toBe(false);
  });
});

describe('sortVersionsDescending', () => {
  it('should order newest first', () => {
    expect(sortVersionsDescending(['2023-01-01', '2024-01-01', '2023-06-01-preview'])).toEqual([
      '2024-01-01',
      '2023-06-01-preview',
      '2023-01-01',
    ]);
  });
});

describe('classifyVersions', () => {
  it('should put versions older than two years in veryOld only', () => {
    const result = classifyVersions(['2021-01-01'], NOW);

    expect(result.veryOld).toEqual(['2021-01-01']);
    expect(result.old).toEqual([]);
    expect(result.preview).toEqual([]);
  });

  it('should put versions between one and two years old in old only', () => {
    const result = classifyVersions(['2024-01-01', '2023-07-01'], NOW);

    expect(result.old).toEqual(['2024-01-01', '2023-07-01']);
    expect(result.veryOld).toEqual([]);
  });

  it('should leave versions from the last year unclassified', () => {
    const result = classifyVersions(['2025-01-15', '2024-07-01'], NOW);

    expect(result).toEqual({ veryOld: [], old: [], preview: [] });
  });

  it('should flag preview versions in addition to their age bucket', () => {
    const result = classifyVersions(['2023-06-01-preview', '2025-05-01-preview'], NOW);

    expect(result.preview).toEqual(['2023-06-01-preview', '2025-05-01-preview']);
    expect(result.veryOld).toEqual(['2023-06-01-preview']);
    expect(result.old).toEqual([]);
  });

  it('should classify a mixed set', () => {
    const result = classifyVersions(['2024-01-01', '2023-06-01-preview', '2021-01-01'], NOW);

    expect(result.veryOld).toEqual(['2023-06-01-preview', '2021-01-01']);
    expect(result.old).toEqual(['2024-01-01']);
    expect(result.preview).toEqual(['2023-06-01-preview']);
  });

  it('should skip age buckets for identifiers without a date', () => {
    const result = classifyVersions(['beta'], NOW);

    expect(result).toEqual({ veryOld: [], old: [], preview: ['beta'] });
  });
});
