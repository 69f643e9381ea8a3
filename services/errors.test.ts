import { describe, it, expect } from 'vitest';
import { Effect } from 'effect';
import {
  ConfigValidationError,
  DetectorError,
  ErrorCollector,
  HashInputError,
  WeakSaltWarning,
} from './errors';
import { isRecoverable, runPromise, runSyncResult, serializeError } from './runtime';

/**
 * SERVICE ERROR TESTS
 *
 * Recoverable errors are collected and the run goes on; the rest stop it.
 */

describe('Service errors', () => {
  it('marks warnings and detector failures as recoverable', () => {
    expect(isRecoverable(new WeakSaltWarning({ message: 'fallback salt' }))).toBe(true);
    expect(isRecoverable(new DetectorError({ message: 'offline', detectorName: 'ner' }))).toBe(true);
  });

  it('marks contract and config violations as unrecoverable', () => {
    expect(isRecoverable(new HashInputError({ message: 'empty' }))).toBe(false);
    expect(
      isRecoverable(new ConfigValidationError({ message: 'bad', source: 'rulebook', issues: [] }))
    ).toBe(false);
  });

  it('serializes with tag, recoverability and timestamp', () => {
    const json = serializeError(new DetectorError({ message: 'offline', detectorName: 'ner' }));

    expect(json).toMatchObject({
      _tag: 'DetectorError',
      message: 'offline',
      detectorName: 'ner',
      recoverable: true,
    });
    expect(typeof json.timestamp).toBe('string');
  });
});

describe('ErrorCollector', () => {
  it('accumulates errors and reports unrecoverable ones', () => {
    const collector = new ErrorCollector();
    collector.add(new WeakSaltWarning({ message: 'fallback salt' }));

    expect(collector.count()).toBe(1);
    expect(collector.hasUnrecoverableErrors()).toBe(false);

    collector.add(new HashInputError({ message: 'empty' }));
    expect(collector.hasUnrecoverableErrors()).toBe(true);
    expect(collector.toJSON().map((e) => e._tag)).toEqual(['WeakSaltWarning', 'HashInputError']);

    collector.clear();
    expect(collector.hasErrors()).toBe(false);
  });

  it('returns a copy from getAll', () => {
    const collector = new ErrorCollector();
    collector.add(new WeakSaltWarning({ message: 'fallback salt' }));
    collector.getAll().pop();

    expect(collector.count()).toBe(1);
  });
});

describe('Runtime helpers', () => {
  it('wraps success and failure without throwing', async () => {
    const ok = await runPromise(Effect.succeed(42));
    const failed = await runPromise(
      Effect.fail(new DetectorError({ message: 'offline', detectorName: 'ner' }))
    );

    expect(ok).toEqual({ success: true, data: 42 });
    expect(failed.success).toBe(false);
    if (!failed.success) {
      expect(failed.error.detectorName).toBe('ner');
    }
  });

  it('runs synchronous programs to a result', () => {
    expect(runSyncResult(Effect.succeed('done'))).toEqual({ success: true, data: 'done' });
  });
});
