import { describe, it, expect } from 'vitest';
import {
  MIN_REASONABLE_YEAR,
  isEmptyYear,
  parseYear,
  isReasonableYear,
  collectValidYears,
  rankYears,
  getMostCommonYear,
} from '../../../src/main/utils/yearUtils';
import type { Track } from '../../../src/shared/types';

function track(id: string, year?: string): Track {
  return { id, artist: 'Artist', album: 'Album', year };
}

describe('yearUtils', () => {
  describe('isEmptyYear', () => {
    it('should treat missing, blank and "0" as empty', () => {
      expect(isEmptyYear(undefined)).toBe(true);
      expect(isEmptyYear(null)).toBe(true);
      expect(isEmptyYear('')).toBe(true);
      expect(isEmptyYear('   ')).toBe(true);
      expect(isEmptyYear(' 0 ')).toBe(true);
    });

    it('should treat real values as present', () => {
      expect(isEmptyYear('1999')).toBe(false);
      expect(isEmptyYear('00')).toBe(false);
    });
  });

  describe('parseYear', () => {
    it('should parse four-digit years', () => {
      expect(parseYear('1999')).toBe(1999);
      expect(parseYear(' 2005 ')).toBe(2005);
    });

    it('should reject anything else', () => {
      expect(parseYear('85')).toBeNull();
      expect(parseYear('19999')).toBeNull();
      expect(parseYear('199x')).toBeNull();
      expect(parseYear('0')).toBeNull();
      expect(parseYear(undefined)).toBeNull();
    });
  });

  describe('isReasonableYear', () => {
    const now = new Date(2025, 5, 1);

    it('should accept years from 1900 to next year', () => {
      expect(isReasonableYear(String(MIN_REASONABLE_YEAR), now)).toBe(true);
      expect(isReasonableYear('2026', now)).toBe(true);
    });

    it('should reject years outside the range', () => {
      expect(isReasonableYear('1899', now)).toBe(false);
      expect(isReasonableYear('2027', now)).toBe(false);
      expect(isReasonableYear('soon', now)).toBe(false);
    });
  });

  describe('collectValidYears', () => {
    it('should skip empty years and trim the rest', () => {
      const tracks = [track('1', ' 1999 '), track('2', ''), track('3', '0'), track('4')];
      expect(collectValidYears(tracks)).toEqual(['1999']);
    });
  });

  describe('rankYears', () => {
    it('should order by count and keep first-seen order for ties', () => {
      expect(rankYears(['2000', '1999', '2000', '1999', '1998'])).toEqual([
        { year: '2000', count: 2 },
        { year: '1999', count: 2 },
        { year: '1998', count: 1 },
      ]);
    });

    it('should return an empty list for no years', () => {
      expect(rankYears([])).toEqual([]);
    });
  });

  describe('getMostCommonYear', () => {
    it('should return the most frequent year', () => {
      const tracks = [track('1', '1999'), track('2', ''), track('3', '2001'), track('4', '2001'), track('5')];
      expect(getMostCommonYear(tracks)).toBe('2001');
    });

    it('should return null when no track has a year', () => {
      expect(getMostCommonYear([track('1'), track('2', '0')])).toBeNull();
    });
  });
});
