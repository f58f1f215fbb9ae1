import { describe, it, expect } from 'vitest';
import {
  parseTimecode,
  formatTimecode,
  addTimecodes,
  subtractTimecodes,
  compareTimecodes,
  timecodeFromNanoseconds,
  ZERO_TIMECODE,
} from './timecode';
import { MalformedTimecodeError } from '../utils/errors';

describe('parseTimecode', () => {
  it('should parse a full nanosecond timecode', () => {
    expect(parseTimecode('00:00:00.000000000')).toBe(0n);
    expect(parseTimecode('00:00:01.000000000')).toBe(1_000_000_000n);
    expect(parseTimecode('01:02:03.000000004')).toBe(3_723_000_000_004n);
  });

  it('should right-pad short fractions', () => {
    expect(parseTimecode('00:00:01.5')).toBe(1_500_000_000n);
    expect(parseTimecode('00:00:00.042')).toBe(42_000_000n);
  });

  it('should accept a timecode without fraction', () => {
    expect(parseTimecode('00:01:00')).toBe(60_000_000_000n);
  });

  it('should accept hours wider than two digits', () => {
    expect(parseTimecode('123:00:00.000000000')).toBe(123n * 3_600_000_000_000n);
  });

  it('should throw on invalid format', () => {
    expect(() => parseTimecode('invalid')).toThrow(MalformedTimecodeError);
    expect(() => parseTimecode('00:00')).toThrow(MalformedTimecodeError);
    expect(() => parseTimecode('00:60:00.000000000')).toThrow(MalformedTimecodeError);
    expect(() => parseTimecode('00:00:00.0000000001')).toThrow(MalformedTimecodeError);
  });
});

describe('formatTimecode', () => {
  it('should always emit nine fractional digits', () => {
    expect(formatTimecode(0n)).toBe('00:00:00.000000000');
    expect(formatTimecode(1_500_000_000n)).toBe('00:00:01.500000000');
    expect(formatTimecode(3_723_000_000_004n)).toBe('01:02:03.000000004');
  });

  it('should widen hours past 99', () => {
    expect(formatTimecode(100n * 3_600_000_000_000n)).toBe('100:00:00.000000000');
  });

  it('should round-trip parsed values', () => {
    for (const text of ['00:00:00.000000001', '00:59:59.999999999', '12:34:56.789012345']) {
      expect(formatTimecode(parseTimecode(text))).toBe(text);
    }
  });
});

describe('addTimecodes', () => {
  it('should carry nanoseconds into seconds', () => {
    const sum = addTimecodes(parseTimecode('00:00:00.600000000'), parseTimecode('00:00:00.400000001'));
    expect(formatTimecode(sum)).toBe('00:00:01.000000001');
  });

  it('should carry seconds into minutes and minutes into hours', () => {
    const sum = addTimecodes(parseTimecode('00:59:59.500000000'), parseTimecode('00:00:00.500000000'));
    expect(formatTimecode(sum)).toBe('01:00:00.000000000');
  });

  it('should treat zero as identity', () => {
    const t = parseTimecode('00:23:41.041000000');
    expect(addTimecodes(t, ZERO_TIMECODE)).toBe(t);
    expect(addTimecodes(ZERO_TIMECODE, t)).toBe(t);
  });

  it('should be commutative and associative', () => {
    const a = parseTimecode('00:00:59.999999999');
    const b = parseTimecode('00:59:00.000000001');
    const c = parseTimecode('02:00:30.500000000');

    expect(addTimecodes(a, b)).toBe(addTimecodes(b, a));
    expect(addTimecodes(addTimecodes(a, b), c)).toBe(addTimecodes(a, addTimecodes(b, c)));
    expect(formatTimecode(addTimecodes(addTimecodes(a, b), c))).toBe('03:00:30.500000000');
  });
});

describe('subtractTimecodes', () => {
  it('should subtract and clamp at zero', () => {
    expect(subtractTimecodes(parseTimecode('00:02:00'), parseTimecode('00:00:30'))).toBe(
      parseTimecode('00:01:30')
    );
    expect(subtractTimecodes(parseTimecode('00:00:01'), parseTimecode('00:00:02'))).toBe(0n);
  });
});

describe('compareTimecodes', () => {
  it('should order timecodes', () => {
    expect(compareTimecodes(1n, 2n)).toBe(-1);
    expect(compareTimecodes(2n, 1n)).toBe(1);
    expect(compareTimecodes(2n, 2n)).toBe(0);
  });
});

describe('timecodeFromNanoseconds', () => {
  it('should accept numbers and bigints', () => {
    expect(timecodeFromNanoseconds(1_420_000_000)).toBe(1_420_000_000n);
    expect(timecodeFromNanoseconds(5n)).toBe(5n);
  });

  it('should reject negative values', () => {
    expect(() => timecodeFromNanoseconds(-1)).toThrow(MalformedTimecodeError);
  });
});
