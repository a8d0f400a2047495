import { describe, it, expect } from 'vitest';
import { StageParseError } from '../src/core/errors.js';
import { NULL_INT, durationFrom, intFrom } from '../src/core/nullable.js';
import { Minute, Second } from '../src/utils/duration.js';
import { formatStages, parseStages, totalStagesDuration } from '../src/utils/stages.js';

describe('parseStages', () => {
  it('reads a duration without a target', () => {
    expect(parseStages('1s')).toEqual([{ duration: durationFrom(Second), target: NULL_INT }]);
  });

  it('reads a duration with a target', () => {
    expect(parseStages('1s:100')).toEqual([{ duration: durationFrom(Second), target: intFrom(100) }]);
  });

  it('reads several stages in order', () => {
    expect(parseStages('1s,2s:100')).toEqual([
      { duration: durationFrom(Second), target: NULL_INT },
      { duration: durationFrom(2 * Second), target: intFrom(100) },
    ]);
  });

  it('returns no stages for an empty string', () => {
    expect(parseStages('')).toEqual([]);
  });

  it('treats a trailing colon as an open target', () => {
    expect(parseStages('1s:')).toEqual([{ duration: durationFrom(Second), target: NULL_INT }]);
  });

  it('rejects a bad duration', () => {
    expect(() => parseStages('abc:10')).toThrow(StageParseError);
    expect(() => parseStages('abc:10')).toThrow('invalid stage "abc:10": invalid duration "abc"');
  });

  it('rejects a bad target', () => {
    expect(() => parseStages('1s:ten')).toThrow('invalid stage "1s:ten": invalid target "ten"');
    expect(() => parseStages('1s:1.5')).toThrow('invalid stage "1s:1.5": invalid target "1.5"');
  });

  it('names only the failing segment', () => {
    expect(() => parseStages('1s,2x')).toThrow('invalid stage "2x": invalid duration "2x"');
  });
});

describe('formatStages', () => {
  it('writes the text form back', () => {
    expect(formatStages(parseStages('30s:10,1m,10s:0'))).toBe('30s:10,1m0s,10s:0');
  });
});

describe('totalStagesDuration', () => {
  it('adds up stage durations', () => {
    expect(totalStagesDuration(parseStages('30s:10,1m,10s:0'))).toBe(100 * Second);
    expect(totalStagesDuration(parseStages('1m,1m'))).toBe(2 * Minute);
  });

  it('is zero without stages', () => {
    expect(totalStagesDuration(undefined)).toBe(0);
  });
});
