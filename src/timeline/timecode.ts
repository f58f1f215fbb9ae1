import { MalformedTimecodeError } from '../utils/errors';

/**
 * A non-negative duration or instant, counted in whole nanoseconds.
 * The text form used by Matroska chapter files is HH:MM:SS.nnnnnnnnn.
 */
export type Timecode = bigint;

export const ZERO_TIMECODE: Timecode = 0n;

const NS_PER_SECOND = 1_000_000_000n;
const NS_PER_MINUTE = 60n * NS_PER_SECOND;
const NS_PER_HOUR = 60n * NS_PER_MINUTE;

const TIMECODE_PATTERN = /^(\d+):(\d{1,2}):(\d{1,2})(?:\.(\d{0,9}))?$/;

/**
 * Parses "HH:MM:SS[.fraction]" into nanoseconds.
 * Up to nine fractional digits are accepted and right-padded.
 */
export function parseTimecode(text: string): Timecode {
  const match = text.trim().match(TIMECODE_PATTERN);
  if (!match?.[1] || !match[2] || !match[3]) {
    throw new MalformedTimecodeError(text);
  }

  const hours = BigInt(match[1]);
  const minutes = BigInt(match[2]);
  const seconds = BigInt(match[3]);
  const fraction = BigInt((match[4] ?? '').padEnd(9, '0'));

  if (minutes >= 60n || seconds >= 60n) {
    throw new MalformedTimecodeError(text);
  }

  return hours * NS_PER_HOUR + minutes * NS_PER_MINUTE + seconds * NS_PER_SECOND + fraction;
}

/**
 * Formats nanoseconds as HH:MM:SS.nnnnnnnnn (hours widen past 99)
 */
export function formatTimecode(value: Timecode): string {
  if (value < 0n) {
    throw new MalformedTimecodeError(value.toString());
  }

  const hours = value / NS_PER_HOUR;
  const minutes = (value % NS_PER_HOUR) / NS_PER_MINUTE;
  const seconds = (value % NS_PER_MINUTE) / NS_PER_SECOND;
  const fraction = value % NS_PER_SECOND;

  return (
    `${hours.toString().padStart(2, '0')}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${seconds.toString().padStart(2, '0')}.` +
    `${fraction.toString().padStart(9, '0')}`
  );
}

/**
 * Exact addition. Carry from nanoseconds through seconds and minutes
 * into hours falls out of the integer representation.
 */
export function addTimecodes(a: Timecode, b: Timecode): Timecode {
  return a + b;
}

/**
 * Difference a - b, clamped at zero
 */
export function subtractTimecodes(a: Timecode, b: Timecode): Timecode {
  return a > b ? a - b : ZERO_TIMECODE;
}

export function compareTimecodes(a: Timecode, b: Timecode): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function isZeroTimecode(value: Timecode): boolean {
  return value === ZERO_TIMECODE;
}

/**
 * Builds a timecode from a nanosecond count as reported by mkvmerge
 */
export function timecodeFromNanoseconds(nanoseconds: number | bigint): Timecode {
  if (typeof nanoseconds === 'bigint') {
    if (nanoseconds < 0n) throw new MalformedTimecodeError(nanoseconds.toString());
    return nanoseconds;
  }
  if (!Number.isFinite(nanoseconds) || nanoseconds < 0) {
    throw new MalformedTimecodeError(String(nanoseconds));
  }
  return BigInt(Math.round(nanoseconds));
}
