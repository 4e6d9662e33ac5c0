import type { OutcomeCounts, TestResult } from '../types.js';

/**
 * Append-only record of results in execution order.
 */
export class ResultLog {
  private results: TestResult[] = [];

  append(result: TestResult): void {
    this.results.push(Object.freeze({ ...result }));
  }

  entries(): readonly TestResult[] {
    return this.results.slice();
  }

  get size(): number {
    return this.results.length;
  }

  hasFailures(): boolean {
    return this.results.some((r) => r.outcome !== 'PASS');
  }

  counts(): OutcomeCounts {
    return countOutcomes(this.results);
  }
}

export function countOutcomes(results: readonly TestResult[]): OutcomeCounts {
  return {
    passed: results.filter((r) => r.outcome === 'PASS').length,
    failed: results.filter((r) => r.outcome === 'FAIL').length,
    skipped: results.filter((r) => r.outcome === 'SKIP').length,
  };
}
