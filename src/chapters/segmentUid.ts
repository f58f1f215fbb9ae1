import type { SegmentUidFormat } from './types';

/**
 * Normalizes a segment UID to lower-case hex with no separators.
 * Hex UIDs lose their whitespace; ascii UIDs become the hex code of each character.
 */
export function normalizeSegmentUid(value: string, format: SegmentUidFormat): string {
  if (format === 'ascii') {
    return Array.from(value.trim())
      .map((char) => (char.codePointAt(0) ?? 0).toString(16))
      .join('');
  }
  return value.replace(/\s+/g, '').toLowerCase();
}
