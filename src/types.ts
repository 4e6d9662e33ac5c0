export type TestOutcome = 'PASS' | 'FAIL' | 'SKIP';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * What an HTTP action yields: the response status and, for create calls,
 * the decoded task identifier.
 */
export interface Invocation {
  statusCode: number;
  id?: number;
}

export type TestAction = () => Promise<Invocation>;

export interface TestCase {
  category: string;
  name: string;
  method: HttpMethod;
  path: string;
  expectedStatus: number;
  action: TestAction;
}

export interface TestResult {
  readonly category: string;
  readonly name: string;
  readonly method: HttpMethod;
  readonly path: string;
  /** 0 when no response was received. */
  readonly actualStatus: number;
  readonly expectedStatus: number;
  readonly outcome: TestOutcome;
  readonly durationMs: number;
  readonly error: string;
}

export interface OutcomeCounts {
  passed: number;
  failed: number;
  skipped: number;
}

export interface ReportStatistics extends OutcomeCounts {
  total: number;
  successRate: number;
  totalDurationMs: number;
  averageDurationMs: number;
}

export type OutputSink = (line: string) => void;
