/**
 * Manifest parser.
 *
 * Splits a manifest into records. Returns results per line and never
 * throws for a malformed line; only failing to read the file itself
 * is an exception.
 *
 * Line rules:
 * - blank or whitespace-only lines are dropped
 * - columns are separated by single spaces, so the `md5sum` two-space
 *   convention yields an empty middle column
 * - no space at all, or more than two non-empty fields, is a parse failure
 * - digest is the first column, filename the last non-empty column after it
 * - a line whose digest or filename comes out empty is dropped
 *
 * Filenames containing spaces are not supported: they read as extra fields.
 * A line that is not valid UTF-8 is a parse failure.
 */

import { readFile } from 'node:fs/promises';
import { ManifestUnavailableError, errorMessage } from '../errors.js';
import type { ManifestLine } from './types.js';

const FIELD_DELIMITER = ' ';
const EXPECTED_FIELDS = 2;
const LINE_FEED = 0x0a;

const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const lossyDecoder = new TextDecoder('utf-8');

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Parse a single manifest line.
 *
 * @param line - Line content without its terminator
 * @param lineNumber - 1-based position in the manifest
 * @returns The parsed line, or null if the line is dropped
 */
export function parseManifestLine(line: string, lineNumber: number): ManifestLine | null {
  if (line.trim() === '') {
    return null;
  }

  const columns = line.split(FIELD_DELIMITER);
  const fields = columns.filter((column) => column !== '');

  if (columns.length < EXPECTED_FIELDS || fields.length > EXPECTED_FIELDS) {
    return {
      success: false,
      error: {
        kind: 'parse-failure',
        lineNumber,
        line,
        message: `expected ${EXPECTED_FIELDS} space-separated fields, found ${fields.length}`,
      },
    };
  }

  const checksum = columns[0] ?? '';
  const file = columns.slice(1).filter((column) => column !== '').pop() ?? '';

  if (checksum === '' || file === '') {
    return null;
  }

  return { success: true, record: { file, checksum }, lineNumber };
}

/**
 * Parse manifest text into its retained lines, in order.
 */
export function parseManifestContent(content: string): ManifestLine[] {
  const parsed: ManifestLine[] = [];
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const entry = parseManifestLine(stripCarriageReturn(lines[i] ?? ''), i + 1);
    if (entry) parsed.push(entry);
  }

  return parsed;
}

/**
 * Parse raw manifest bytes, decoding each line separately so one badly
 * encoded line fails on its own.
 */
export function parseManifestBytes(bytes: Uint8Array): ManifestLine[] {
  const parsed: ManifestLine[] = [];
  let start = 0;
  let lineNumber = 0;

  while (start <= bytes.length) {
    const newline = bytes.indexOf(LINE_FEED, start);
    const end = newline === -1 ? bytes.length : newline;
    lineNumber++;

    const entry = parseEncodedLine(bytes.subarray(start, end), lineNumber);
    if (entry) parsed.push(entry);
    start = end + 1;
  }

  return parsed;
}

function parseEncodedLine(raw: Uint8Array, lineNumber: number): ManifestLine | null {
  let line: string;
  try {
    line = strictDecoder.decode(raw);
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    return {
      success: false,
      error: {
        kind: 'parse-failure',
        lineNumber,
        line: stripCarriageReturn(lossyDecoder.decode(raw)),
        message: 'line is not valid UTF-8',
      },
    };
  }
  return parseManifestLine(stripCarriageReturn(line), lineNumber);
}

/**
 * Read and parse a manifest file.
 *
 * @throws ManifestUnavailableError if the file cannot be read
 */
export async function parseManifest(manifestPath: string): Promise<ManifestLine[]> {
  let content: Buffer;
  try {
    content = await readFile(manifestPath);
  } catch (err) {
    throw new ManifestUnavailableError(
      manifestPath,
      `Unable to read manifest ${manifestPath}: ${errorMessage(err)}`,
      err
    );
  }
  return parseManifestBytes(content);
}
