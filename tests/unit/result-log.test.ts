import { describe, it, expect } from 'vitest';
import { ResultLog } from '../../src/runner/result-log.js';
import type { TestOutcome, TestResult } from '../../src/types.js';

function result(name: string, outcome: TestOutcome): TestResult {
  return {
    category: 'CREATE',
    name,
    method: 'POST',
    path: '/tasks',
    actualStatus: outcome === 'PASS' ? 201 : 0,
    expectedStatus: 201,
    outcome,
    durationMs: 1,
    error: outcome === 'PASS' ? '' : 'failed',
  };
}

describe('ResultLog', () => {
  it('keeps results in insertion order, duplicates included', () => {
    const log = new ResultLog();
    log.append(result('first', 'PASS'));
    log.append(result('second', 'FAIL'));
    log.append(result('first', 'PASS'));

    expect(log.entries().map((r) => r.name)).toEqual([
      'first',
      'second',
      'first',
    ]);
    expect(log.size).toBe(3);
  });

  it('does not expose its internal array', () => {
    const log = new ResultLog();
    log.append(result('only', 'PASS'));

    const entries = log.entries();
    expect(entries).not.toBe(log.entries());
    expect(Object.isFrozen(entries[0])).toBe(true);
  });

  it('stores a copy of the appended result', () => {
    const log = new ResultLog();
    const original = { ...result('copy', 'PASS') };
    log.append(original);

    expect(log.entries()[0]).not.toBe(original);
    expect(log.entries()[0]).toEqual(original);
  });

  it('counts outcomes', () => {
    const log = new ResultLog();
    log.append(result('a', 'PASS'));
    log.append(result('b', 'FAIL'));
    log.append(result('c', 'SKIP'));
    log.append(result('d', 'PASS'));

    expect(log.counts()).toEqual({ passed: 2, failed: 1, skipped: 1 });
  });

  it('treats SKIP as a failure of the run', () => {
    const log = new ResultLog();
    log.append(result('a', 'PASS'));
    expect(log.hasFailures()).toBe(false);

    log.append(result('b', 'SKIP'));
    expect(log.hasFailures()).toBe(true);
  });
});
