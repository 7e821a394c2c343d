import { describe, it, expect } from 'vitest';
import {
  EXIT_CODES,
  VERIFICATION_STATUSES,
  StatusTally,
  reduceStatus,
  statusOfEntry,
  statusOfVerifyResult,
  worseStatus,
} from '../status/verification-status.js';
import type { VerificationStatus } from '../status/verification-status.js';
import type { ManifestEntryResult } from '../manifest/types.js';

const match: ManifestEntryResult = {
  success: true,
  result: { file: 'a.txt', result: { success: true, outcome: { kind: 'match' } } },
};

const mismatch: ManifestEntryResult = {
  success: true,
  result: {
    file: 'b.txt',
    result: { success: true, outcome: { kind: 'mismatch', expected: 'aaa', actual: 'bbb' } },
  },
};

const hashFailure: ManifestEntryResult = {
  success: true,
  result: {
    file: 'c.txt',
    result: {
      success: false,
      error: { kind: 'hash-failure', path: '/tmp/c.txt', message: 'Failed to read', code: 'ENOENT' },
    },
  },
};

const parseFailure: ManifestEntryResult = {
  success: false,
  error: { kind: 'parse-failure', lineNumber: 4, line: 'junk', message: 'expected 2 space-separated fields, found 1' },
};

async function* stream(entries: ManifestEntryResult[]): AsyncGenerator<ManifestEntryResult> {
  for (const entry of entries) {
    yield entry;
  }
}

describe('EXIT_CODES', () => {
  it('maps ok, mismatch and error to 0, 1 and 2', () => {
    expect(EXIT_CODES).toEqual({ ok: 0, mismatch: 1, error: 2 });
  });
});

describe('worseStatus', () => {
  it('keeps the more severe status', () => {
    expect(worseStatus('ok', 'mismatch')).toBe('mismatch');
    expect(worseStatus('mismatch', 'ok')).toBe('mismatch');
    expect(worseStatus('mismatch', 'error')).toBe('error');
    expect(worseStatus('error', 'mismatch')).toBe('error');
  });

  it('treats ok as the identity', () => {
    for (const status of VERIFICATION_STATUSES) {
      expect(worseStatus('ok', status)).toBe(status);
      expect(worseStatus(status, 'ok')).toBe(status);
    }
  });

  it('is associative', () => {
    const all: VerificationStatus[] = [...VERIFICATION_STATUSES];
    for (const a of all) {
      for (const b of all) {
        for (const c of all) {
          expect(worseStatus(worseStatus(a, b), c)).toBe(worseStatus(a, worseStatus(b, c)));
        }
      }
    }
  });
});

describe('statusOfEntry', () => {
  it('classifies each kind of element', () => {
    expect(statusOfEntry(match)).toBe('ok');
    expect(statusOfEntry(mismatch)).toBe('mismatch');
    expect(statusOfEntry(hashFailure)).toBe('error');
    expect(statusOfEntry(parseFailure)).toBe('error');
  });
});

describe('statusOfVerifyResult', () => {
  it('classifies single-file results', () => {
    expect(statusOfVerifyResult({ success: true, outcome: { kind: 'match' } })).toBe('ok');
    expect(
      statusOfVerifyResult({ success: true, outcome: { kind: 'mismatch', expected: 'a', actual: 'b' } })
    ).toBe('mismatch');
    expect(
      statusOfVerifyResult({ success: false, error: { kind: 'hash-failure', path: 'x', message: 'gone' } })
    ).toBe('error');
  });
});

describe('reduceStatus', () => {
  it('is ok for an empty stream', async () => {
    expect(await reduceStatus([])).toBe('ok');
  });

  it('is ok when everything matches', async () => {
    expect(await reduceStatus([match, match])).toBe('ok');
  });

  it('is mismatch with mismatches and no errors', async () => {
    expect(await reduceStatus([match, mismatch, match])).toBe('mismatch');
  });

  it('lets errors win over mismatches regardless of order', async () => {
    expect(await reduceStatus([hashFailure, mismatch])).toBe('error');
    expect(await reduceStatus([mismatch, parseFailure])).toBe('error');
  });

  it('folds async iterables', async () => {
    expect(await reduceStatus(stream([match, mismatch]))).toBe('mismatch');
  });
});

describe('StatusTally', () => {
  it('counts each element and tracks the worst status', () => {
    const tally = new StatusTally();
    expect(tally.status).toBe('ok');

    expect(tally.add(match)).toBe('ok');
    expect(tally.add(mismatch)).toBe('mismatch');
    expect(tally.status).toBe('mismatch');
    expect(tally.add(parseFailure)).toBe('error');
    expect(tally.add(hashFailure)).toBe('error');
    expect(tally.add(match)).toBe('ok');

    expect(tally.matched).toBe(2);
    expect(tally.mismatched).toBe(1);
    expect(tally.failed).toBe(2);
    expect(tally.total).toBe(5);
    expect(tally.status).toBe('error');
  });
});
