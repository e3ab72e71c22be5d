import { describe, it, expect } from 'vitest';

import { normalizeColumns, normalizeSamples, parseFiniteNumber, parseKineticsText } from '../kinetics-data';
import { ParseError } from '../kinetics-errors';
import { EXAMPLE_DATA } from '../kinetics-constants';

// Runs fn and returns the ParseError it throws
function catchParseError(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('expected a ParseError');
}

describe('parseFiniteNumber', () => {
  it('accepts padded decimals and exponents', () => {
    expect(parseFiniteNumber(' 0.25 ')).toBe(0.25);
    expect(parseFiniteNumber('1e-3')).toBe(0.001);
    expect(parseFiniteNumber(42)).toBe(42);
  });

  it('rejects blanks, text and non-finite values', () => {
    expect(parseFiniteNumber('')).toBeNull();
    expect(parseFiniteNumber('   ')).toBeNull();
    expect(parseFiniteNumber('abc')).toBeNull();
    expect(parseFiniteNumber('Infinity')).toBeNull();
    expect(parseFiniteNumber(NaN)).toBeNull();
  });
});

describe('normalizeSamples', () => {
  it('sorts samples ascending by time', () => {
    const samples = normalizeSamples([['20', '0.5'], ['0', '1'], ['10', '0.7']]);
    expect(samples).toEqual([
      { time: 0, concentration: 1 },
      { time: 10, concentration: 0.7 },
      { time: 20, concentration: 0.5 },
    ]);
  });

  it('keeps repeated times in input order', () => {
    const samples = normalizeSamples([[5, 0.3], [0, 1], [5, 0.2]]);
    expect(samples.map(s => s.concentration)).toEqual([1, 0.3, 0.2]);
  });

  it('rejects the whole batch on a non-numeric field and names the row', () => {
    const error = catchParseError(() => normalizeSamples([['0', '1'], ['10', 'abc'], ['20', '0.3']]));
    expect(error.kind).toBe('InvalidNumber');
    expect(error.row).toBe(1);
    expect(error.raw).toBe('abc');
    expect(error.message).toBe('Row 2: "abc" is not a valid concentration.');
  });

  it('treats an empty field as malformed', () => {
    const error = catchParseError(() => normalizeSamples([['', '1']]));
    expect(error.kind).toBe('InvalidNumber');
    expect(error.row).toBe(0);
  });

  it('rejects negative times', () => {
    const error = catchParseError(() => normalizeSamples([['0', '1'], ['-5', '0.9']]));
    expect(error.kind).toBe('NegativeTime');
    expect(error.row).toBe(1);
    expect(error.raw).toBe('-5');
  });

  it('keeps zero and negative concentrations for the evaluator to filter', () => {
    const samples = normalizeSamples([['0', '0'], ['1', '-0.1']]);
    expect(samples).toHaveLength(2);
  });
});

describe('normalizeColumns', () => {
  it('zips equal-length columns', () => {
    const samples = normalizeColumns([10, 0], [0.5, 1]);
    expect(samples).toEqual([
      { time: 0, concentration: 1 },
      { time: 10, concentration: 0.5 },
    ]);
  });

  it('fails on a column length mismatch', () => {
    const error = catchParseError(() => normalizeColumns([0, 10, 20], [1, 0.5]));
    expect(error.kind).toBe('ColumnMismatch');
    expect(error.row).toBeUndefined();
  });
});

describe('parseKineticsText', () => {
  it('parses the example data and drops its header row', () => {
    const samples = parseKineticsText(EXAMPLE_DATA);
    expect(samples).toHaveLength(6);
    expect(samples[0]).toEqual({ time: 0, concentration: 1 });
    expect(samples[5]).toEqual({ time: 50, concentration: 0.368 });
  });

  it('reads tab separated rows', () => {
    const samples = parseKineticsText('0\t1\n10\t0.5', 'tab');
    expect(samples).toEqual([
      { time: 0, concentration: 1 },
      { time: 10, concentration: 0.5 },
    ]);
  });

  it('folds runs of spaces and skips blank lines', () => {
    const samples = parseKineticsText('  0   1.0\n\n10  0.5  \n', 'whitespace');
    expect(samples).toEqual([
      { time: 0, concentration: 1 },
      { time: 10, concentration: 0.5 },
    ]);
  });

  it('reports rows with the wrong number of columns', () => {
    const error = catchParseError(() => parseKineticsText('0,1\n10,0.5,3', 'comma'));
    expect(error.kind).toBe('ColumnCount');
    expect(error.row).toBe(1);
    expect(error.raw).toBe('10,0.5,3');
  });

  it('reports a single column of numbers as a column count error', () => {
    const error = catchParseError(() => parseKineticsText('1\n2\n3'));
    expect(error.kind).toBe('ColumnCount');
    expect(error.row).toBe(0);
  });

  it('rejects a malformed value after the first row', () => {
    const error = catchParseError(() => parseKineticsText('0,1\n10,x\n20,0.3', 'comma'));
    expect(error.kind).toBe('InvalidNumber');
    expect(error.row).toBe(1);
    expect(error.raw).toBe('x');
  });

  it('reports unterminated quotes as malformed text', () => {
    const error = catchParseError(() => parseKineticsText('0,"1\n10,0.5', 'comma'));
    expect(error.kind).toBe('MalformedText');
    expect(error.message).toBe('Could not read the data: Quoted field unterminated');
  });

  it('rejects a row of empty fields instead of skipping it', () => {
    const error = catchParseError(() => parseKineticsText('0,1\n,\n10,0.5', 'comma'));
    expect(error.kind).toBe('InvalidNumber');
    expect(error.row).toBe(1);
    expect(error.raw).toBe('');
  });

  it('skips lines holding only spaces', () => {
    expect(parseKineticsText('0,1\n   \n10,0.5', 'comma')).toHaveLength(2);
  });

  it('does not take a first row without words for a header', () => {
    const error = catchParseError(() => parseKineticsText('#,#\n0,1\n10,0.5', 'comma'));
    expect(error.kind).toBe('InvalidNumber');
    expect(error.row).toBe(0);
    expect(error.raw).toBe('#');
  });

  it('returns an empty set for empty text', () => {
    expect(parseKineticsText('', 'comma')).toEqual([]);
  });
});
