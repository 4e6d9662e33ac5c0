import type { OutputSink, TestCase, TestResult } from '../types.js';
import { InvalidTestCaseError } from '../errors.js';
import { formatResultTrace } from '../utils/trace-formatter.js';
import { ResultLog } from './result-log.js';

export interface TestRunnerOptions {
  verbose?: boolean;
  output?: OutputSink;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

export class TestRunner {
  readonly log = new ResultLog();
  private verbose: boolean;
  private output: OutputSink;
  private now: () => number;

  constructor(options: TestRunnerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.output = options.output ?? ((line) => console.log(line));
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Run one test case and record its result. Never throws for a failing
   * action; the failure is recorded as a FAIL with status 0.
   */
  async execute(testCase: TestCase): Promise<TestResult> {
    validateTestCase(testCase);

    const startTime = this.now();
    let result: TestResult;

    try {
      const invocation = await testCase.action();
      const passed = invocation.statusCode === testCase.expectedStatus;

      result = {
        ...caseFields(testCase),
        actualStatus: invocation.statusCode,
        outcome: passed ? 'PASS' : 'FAIL',
        durationMs: this.elapsedSince(startTime),
        error: passed
          ? ''
          : `Expected ${testCase.expectedStatus}, got ${invocation.statusCode}`,
      };
    } catch (error) {
      const durationMs = this.elapsedSince(startTime);
      const errorMessage =
        error instanceof Error ? error.message : String(error);

      result = {
        ...caseFields(testCase),
        actualStatus: 0,
        outcome: 'FAIL',
        durationMs,
        error: errorMessage || 'Unknown error',
      };
    }

    return this.record(result);
  }

  /**
   * Record a case as skipped without running its action.
   */
  skip(testCase: TestCase, reason: string): TestResult {
    validateTestCase(testCase);

    return this.record({
      ...caseFields(testCase),
      actualStatus: 0,
      outcome: 'SKIP',
      durationMs: 0,
      error: reason,
    });
  }

  get results(): readonly TestResult[] {
    return this.log.entries();
  }

  private record(result: TestResult): TestResult {
    this.log.append(result);
    const recorded = Object.freeze({ ...result });

    if (this.verbose) {
      for (const line of formatResultTrace(recorded)) {
        this.output(line);
      }
    }

    return recorded;
  }

  private elapsedSince(startTime: number): number {
    return Math.max(0, this.now() - startTime);
  }
}

function caseFields(
  testCase: TestCase,
): Pick<
  TestResult,
  'category' | 'name' | 'method' | 'path' | 'expectedStatus'
> {
  return {
    category: testCase.category,
    name: testCase.name,
    method: testCase.method,
    path: testCase.path,
    expectedStatus: testCase.expectedStatus,
  };
}

export function validateTestCase(testCase: TestCase): void {
  const { expectedStatus } = testCase;
  if (
    !Number.isInteger(expectedStatus) ||
    expectedStatus < 100 ||
    expectedStatus > 599
  ) {
    throw new InvalidTestCaseError(
      `Invalid expected status ${expectedStatus} for "${testCase.name}": ` +
        'must be an integer in [100, 599]',
    );
  }
}
