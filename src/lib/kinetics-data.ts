import Papa from 'papaparse';
import { ParseError } from './kinetics-errors';
import type { Delimiter, RawField, RawPair, Sample, SampleSet } from './kinetics-types';

const DELIMITER_CHARS: Record<Delimiter, string> = {
  auto: '', // papaparse guesses from the first rows
  comma: ',',
  tab: '\t',
  whitespace: '\t', // runs of blanks are folded into single tabs first
};

/** Parses a number field, returning null for blanks and anything not finite. */
export function parseFiniteNumber(value: RawField): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Validates raw (time, concentration) pairs and returns them sorted by time.
 * A single bad field rejects the whole batch.
 */
export function normalizeSamples(rawPairs: ReadonlyArray<RawPair>): SampleSet {
  const samples: Sample[] = rawPairs.map(([rawTime, rawConc], row) => {
    const time = parseFiniteNumber(rawTime);
    if (time === null) {
      throw new ParseError('InvalidNumber', `Row ${row + 1}: "${String(rawTime)}" is not a valid time.`, row, String(rawTime));
    }
    if (time < 0) {
      throw new ParseError('NegativeTime', `Row ${row + 1}: time cannot be negative (${String(rawTime)}).`, row, String(rawTime));
    }
    const concentration = parseFiniteNumber(rawConc);
    if (concentration === null) {
      throw new ParseError('InvalidNumber', `Row ${row + 1}: "${String(rawConc)}" is not a valid concentration.`, row, String(rawConc));
    }
    return { time, concentration };
  });

  // Array.prototype.sort is stable, so repeated times keep their input order
  return samples.sort((a, b) => a.time - b.time);
}

export function normalizeColumns(times: ReadonlyArray<RawField>, concentrations: ReadonlyArray<RawField>): SampleSet {
  if (times.length !== concentrations.length) {
    throw new ParseError(
      'ColumnMismatch',
      `Time and concentration columns differ in length (${times.length} vs ${concentrations.length}).`
    );
  }
  return normalizeSamples(times.map((t, i): RawPair => [t, concentrations[i]]));
}

function foldWhitespace(text: string): string {
  return text
    .split(/\r?\n/)
    .map(line => line.trim().split(/\s+/).join('\t'))
    .join('\n');
}

// Only lines with nothing but blanks are skipped; a bare "," still reaches validation
function dropBlankLines(text: string): string {
  return text
    .split(/\r?\n/)
    .filter(line => line.trim() !== '')
    .join('\n');
}

// A header needs a word in it, so a row of stray symbols is still reported
function isHeaderRow(fields: string[]): boolean {
  return fields.every(field => parseFiniteNumber(field) === null)
    && fields.some(field => /[a-z]/i.test(field));
}

/**
 * Parses pasted two-column text (time, concentration) into a SampleSet.
 * A leading row of words without any numeric field is taken as a header and dropped.
 */
export function parseKineticsText(text: string, delimiter: Delimiter = 'auto'): SampleSet {
  const input = dropBlankLines(delimiter === 'whitespace' ? foldWhitespace(text) : text);
  const result = Papa.parse<string[]>(input, {
    delimiter: DELIMITER_CHARS[delimiter],
    skipEmptyLines: true,
  });

  // Single-column input trips the delimiter guess; the column count check below reports it better
  const fatal = result.errors.find(e => e.code !== 'UndetectableDelimiter');
  if (fatal) {
    throw new ParseError('MalformedText', `Could not read the data: ${fatal.message}`, fatal.row);
  }

  let rows = result.data;
  if (rows.length > 0 && isHeaderRow(rows[0])) {
    rows = rows.slice(1);
  }

  const usedDelimiter = result.meta.delimiter || ',';
  const pairs = rows.map((fields, row): RawPair => {
    if (fields.length !== 2) {
      const raw = fields.join(usedDelimiter);
      throw new ParseError(
        'ColumnCount',
        `Row ${row + 1}: expected 2 columns (time, concentration) but found ${fields.length}.`,
        row,
        raw
      );
    }
    return [fields[0], fields[1]];
  });

  return normalizeSamples(pairs);
}
