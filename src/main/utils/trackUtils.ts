/**
 * Track Utilities
 *
 * Status normalization, album grouping keys and album-name cleaning for
 * tracks read from the host music application.
 */

import type { Track, TrackStatus } from '../../shared/types';

// ─── Track Status ────────────────────────────────────────────────────────────

/** Four-character host constants that sometimes arrive instead of status strings */
const STATUS_CONSTANTS: ReadonlyArray<[string, TrackStatus]> = [
  ['ksub', 'subscription'],
  ['kpre', 'prerelease'],
  ['kloc', 'local only'],
  ['kpur', 'purchased'],
  ['kmat', 'matched'],
  ['kupl', 'uploaded'],
  ['kdwn', 'downloaded'],
];

/**
 * Normalizes a raw status for comparison: trimmed, lower-cased, with raw
 * host constants such as `«constant ****kSub»` mapped to their names.
 * @param status - Raw status value
 * @returns Normalized status ('' when absent)
 */
export function normalizeTrackStatus(status: string | undefined | null): string {
  if (!status) return '';
  const normalized = status.trim().toLowerCase();

  if (normalized.includes('constant')) {
    const mapped = STATUS_CONSTANTS.find(([code]) => normalized.includes(code));
    if (mapped) return mapped[1];
  }

  return normalized;
}

/** Subscription tracks are the only candidates for year updates */
export function isSubscriptionTrack(track: Track): boolean {
  return normalizeTrackStatus(track.status) === 'subscription';
}

/** Prerelease tracks are read-only in the host application */
export function isPrereleaseTrack(track: Track): boolean {
  return normalizeTrackStatus(track.status) === 'prerelease';
}

// ─── Artist Normalization ────────────────────────────────────────────────────

/** Collaboration separators, tried in order */
const COLLABORATION_SEPARATORS = [
  ' & ',
  ' feat. ',
  ' feat ',
  ' ft. ',
  ' ft ',
  ' vs. ',
  ' vs ',
  ' with ',
  ' and ',
  ' x ',
  ' X ',
];

/**
 * Reduces a collaboration credit to its main artist so that every track of
 * an album groups together.
 *
 * @example
 * normalizeCollaborationArtist('Drake feat. Rihanna') // 'Drake'
 * normalizeCollaborationArtist('Daft Punk & Pharrell') // 'Daft Punk'
 */
export function normalizeCollaborationArtist(artist: string): string {
  const separator = COLLABORATION_SEPARATORS.find((sep) => artist.includes(sep));
  if (!separator) return artist;
  return artist.split(separator, 1)[0].trim();
}

/**
 * The artist an album is grouped and looked up under: the album artist,
 * or the normalized track artist when the album artist is blank.
 */
export function getAlbumArtist(track: Track): string {
  const albumArtist = track.albumArtist?.trim();
  if (albumArtist) return albumArtist;
  return normalizeCollaborationArtist(track.artist.trim());
}

// ─── Album Name Cleaning ─────────────────────────────────────────────────────

const OPENERS = new Set(['(', '[']);
const CLOSERS = new Set([')', ']']);

/**
 * Finds the index of the bracket that closes the one at `start`,
 * counting nested brackets. Returns -1 when unbalanced.
 */
function findClosingBracket(text: string, start: number): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    if (OPENERS.has(text[i])) depth++;
    else if (CLOSERS.has(text[i])) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Removes every parenthesised or bracketed segment that contains one of
 * the keywords (case-insensitive), then collapses whitespace.
 *
 * @example
 * cleanAlbumName('Abbey Road (Remastered 2009)', ['remaster']) // 'Abbey Road'
 * cleanAlbumName('Live (Reissue (2024))', ['reissue'])         // 'Live'
 */
export function cleanAlbumName(album: string, keywords: readonly string[]): string {
  if (!album || keywords.length === 0) return album.trim();

  const lowered = keywords.map((keyword) => keyword.toLowerCase());
  let result = '';
  let i = 0;

  while (i < album.length) {
    if (!OPENERS.has(album[i])) {
      result += album[i];
      i++;
      continue;
    }

    const end = findClosingBracket(album, i);
    if (end === -1) {
      result += album.slice(i);
      break;
    }

    const segment = album.slice(i + 1, end).toLowerCase();
    if (!lowered.some((keyword) => segment.includes(keyword))) {
      result += album.slice(i, end + 1);
    }
    i = end + 1;
  }

  return result.replace(/\s+/g, ' ').trim();
}
