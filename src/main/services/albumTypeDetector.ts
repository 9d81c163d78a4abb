/**
 * Album Type Detection
 *
 * Classifies an album name as normal, special (B-sides, demos, vault
 * releases), compilation (greatest hits, anthologies) or reissue
 * (remasters, anniversary editions). Publishing metadata for these albums
 * tends to carry the compilation or reissue year instead of the original
 * release year, so the fallback engine treats them with suspicion.
 *
 * Pattern lists live in ../data/albumTypePatterns.json and are checked in
 * order: special, then compilation, then reissue. Within a list the first
 * matching pattern is the one reported.
 */

import patterns from '../data/albumTypePatterns.json';
import type { AlbumType, AlbumTypeInfo, YearHandlingStrategy } from '../../shared/types';

// ─── Pattern Sets ────────────────────────────────────────────────────────────

interface PatternSet {
  type: Exclude<AlbumType, 'normal'>;
  strategy: YearHandlingStrategy;
  patterns: readonly CompiledPattern[];
}

interface CompiledPattern {
  /** Pattern as written in the pattern list */
  source: string;
  regex: RegExp;
}

const NORMAL_ALBUM: AlbumTypeInfo = {
  type: 'normal',
  detectedPattern: null,
  strategy: 'normal',
};

/**
 * Normalizes text for pattern matching: lowercase, hyphens and
 * underscores to spaces, bracket characters to spaces, single spaces.
 */
export function normalizeForMatching(text: string): string {
  return text
    .toLowerCase()
    .replace(/[-_]/g, ' ')
    .replace(/[()[\]{}]/g, ' ')
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(' ');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compile(list: readonly string[]): CompiledPattern[] {
  return list.map((source) => ({
    source,
    regex: new RegExp(`\\b${escapeRegExp(normalizeForMatching(source))}\\b`),
  }));
}

const PATTERN_SETS: readonly PatternSet[] = [
  { type: 'special', strategy: 'mark_and_skip', patterns: compile(patterns.special) },
  { type: 'compilation', strategy: 'mark_and_skip', patterns: compile(patterns.compilation) },
  { type: 'reissue', strategy: 'mark_and_update', patterns: compile(patterns.reissue) },
];

// ─── Detection ───────────────────────────────────────────────────────────────

/**
 * Detects the album type from its name.
 *
 * @example
 * detectAlbumType('Blue Stahli B-Sides')  // { type: 'special', detectedPattern: 'b-sides', strategy: 'mark_and_skip' }
 * detectAlbumType('Greatest Hits')        // { type: 'compilation', detectedPattern: 'greatest hits', ... }
 * detectAlbumType('Normal Album')         // { type: 'normal', detectedPattern: null, strategy: 'normal' }
 */
export function detectAlbumType(albumName: string): AlbumTypeInfo {
  if (!albumName) {
    return { ...NORMAL_ALBUM };
  }

  const normalized = normalizeForMatching(albumName);

  for (const set of PATTERN_SETS) {
    const match = set.patterns.find((pattern) => pattern.regex.test(normalized));
    if (match) {
      return { type: set.type, detectedPattern: match.source, strategy: set.strategy };
    }
  }

  return { ...NORMAL_ALBUM };
}

/**
 * True when the album is anything but a normal studio album.
 */
export function isSpecialAlbumType(albumName: string): boolean {
  return detectAlbumType(albumName).type !== 'normal';
}

/** Short description for log lines, e.g. `compilation ("greatest hits")` */
export function getDetectionSummary(albumName: string): string {
  const info = detectAlbumType(albumName);
  return info.detectedPattern ? `${info.type} ("${info.detectedPattern}")` : info.type;
}
