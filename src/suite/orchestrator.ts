import type { TaskApi } from '../http/task-client.js';
import { TestRunner } from '../runner/test-runner.js';
import type { OutputSink, TestResult } from '../types.js';
import {
  ScenarioContext,
  buildCreateCases,
  buildDependentCases,
  type TaskSlot,
} from './scenario.js';

export type SuiteStatus = 'completed' | 'dependency-failure';

export interface SuiteOptions {
  api: TaskApi;
  verbose?: boolean;
  output?: OutputSink;
  /**
   * Record the cases blocked by a failed create step as SKIP results.
   * By default they are left out of the log.
   */
  recordSkipped?: boolean;
  now?: () => number;
}

export interface SuiteOutcome {
  status: SuiteStatus;
  results: readonly TestResult[];
  /** Slots whose create case did not yield an id. */
  missingSlots: TaskSlot[];
  exitCode: 0 | 1;
}

/**
 * Probe the service, then run the create cases followed by every case that
 * depends on the created tasks. Rejects with EnvironmentError when the
 * probe fails; per-case failures are recorded, never thrown.
 */
export async function runSuite(options: SuiteOptions): Promise<SuiteOutcome> {
  const { api } = options;
  const output = options.output ?? ((line: string) => console.log(line));

  await api.probe();
  output('✓ Server is reachable');
  if (!options.verbose) {
    output('Running tests...');
  }

  const runner = new TestRunner({
    verbose: options.verbose,
    output,
    now: options.now,
  });
  const context = new ScenarioContext();

  for (const testCase of buildCreateCases(api, context)) {
    await runner.execute(testCase);
  }

  const primary = context.get('A');
  const disposable = context.get('B');

  if (primary === undefined || disposable === undefined) {
    const missingSlots = context.missingSlots();
    const slots = missingSlots.join(' and ');
    const reason = `Task creation did not return an id for slot ${slots}`;

    output(`⚠ Skipping remaining tests: ${reason}`);

    if (options.recordSkipped) {
      const blocked = buildDependentCases(api, {
        primary: primary ?? '{A}',
        disposable: disposable ?? '{B}',
      });
      for (const testCase of blocked) {
        runner.skip(testCase, reason);
      }
    }

    return {
      status: 'dependency-failure',
      results: runner.results,
      missingSlots,
      exitCode: 1,
    };
  }

  for (const testCase of buildDependentCases(api, { primary, disposable })) {
    await runner.execute(testCase);
  }

  const results = runner.results;
  return {
    status: 'completed',
    results,
    missingSlots: [],
    exitCode: results.length > 0 && !runner.log.hasFailures() ? 0 : 1,
  };
}
