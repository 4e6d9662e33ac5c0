import { describe, it, expect } from 'vitest';
import { runSuite } from '../../src/suite/orchestrator.js';
import { EnvironmentError } from '../../src/errors.js';
import { renderReport } from '../../src/report/report-renderer.js';
import { PlainTableRenderer } from '../../src/report/table.js';
import { FakeTaskApi, connectionRefused } from '../helpers/fake-task-api.js';

function collect(): { lines: string[]; output: (line: string) => void } {
  const lines: string[] = [];
  return { lines, output: (line) => lines.push(line) };
}

describe('runSuite', () => {
  it('runs all 18 cases in order and exits 0 against a healthy service', async () => {
    const api = new FakeTaskApi();
    const { output } = collect();

    const outcome = await runSuite({ api, output });

    expect(outcome.status).toBe('completed');
    expect(outcome.exitCode).toBe(0);
    expect(outcome.missingSlots).toEqual([]);
    const requests = outcome.results.map(
      (r) => `${r.method} ${r.path} ${r.expectedStatus}`,
    );
    expect(requests).toEqual([
      'POST /tasks 201',
      'POST /tasks 201',
      'POST /tasks 400',
      'POST /tasks 400',
      'POST /tasks 400',
      'GET /tasks 200',
      'GET /tasks/1 200',
      'GET /tasks/9999 404',
      'GET /tasks/abc 400',
      'PUT /tasks/1 200',
      'PUT /tasks/1 200',
      'PUT /tasks/1 400',
      'PUT /tasks/1 400',
      'PUT /tasks/9999 404',
      'DELETE /tasks/2 204',
      'GET /tasks/2 404',
      'DELETE /tasks/9999 404',
      'DELETE /tasks/abc 400',
    ]);
    expect(outcome.results.every((r) => r.outcome === 'PASS')).toBe(true);
  });

  it('probes the service before running any case', async () => {
    const api = new FakeTaskApi();

    await runSuite({ api, output: collect().output });

    expect(api.calls[0]).toBe('PROBE');
    expect(api.calls.filter((c) => c === 'PROBE')).toHaveLength(1);
  });

  it('aborts with EnvironmentError and runs nothing when the probe fails', async () => {
    const api = new FakeTaskApi();
    api.reachable = false;

    await expect(runSuite({ api, output: collect().output })).rejects.toThrow(
      EnvironmentError,
    );
    expect(api.calls).toEqual(['PROBE']);
  });

  it('continues after a failing case and exits 1', async () => {
    const api = new FakeTaskApi().respondNext('GET /tasks/9999', 500);

    const outcome = await runSuite({ api, output: collect().output });

    expect(outcome.status).toBe('completed');
    expect(outcome.results).toHaveLength(18);
    expect(outcome.exitCode).toBe(1);
    const failed = outcome.results.filter((r) => r.outcome === 'FAIL');
    expect(failed.map((r) => [r.name, r.error])).toEqual([
      ['Get non-existent task', 'Expected 404, got 500'],
    ]);
  });

  it('records transport failures as status 0 and keeps going', async () => {
    const api = new FakeTaskApi().respondNext(
      'GET /tasks',
      connectionRefused('GET', '/tasks'),
    );

    const outcome = await runSuite({ api, output: collect().output });

    const list = outcome.results[5];
    expect(list.name).toBe('Get all tasks');
    expect(list.actualStatus).toBe(0);
    expect(list.outcome).toBe('FAIL');
    expect(list.error).toBe('GET /tasks: connect ECONNREFUSED 127.0.0.1:8080');
    expect(outcome.results).toHaveLength(18);
  });

  it('omits dependent cases when a create case yields no id', async () => {
    const api = new FakeTaskApi().respondNext('POST /tasks', 500);
    const { lines, output } = collect();

    const outcome = await runSuite({ api, output });

    expect(outcome.status).toBe('dependency-failure');
    expect(outcome.missingSlots).toEqual(['A']);
    expect(outcome.results).toHaveLength(5);
    expect(outcome.results.every((r) => r.category === 'CREATE')).toBe(true);
    expect(outcome.exitCode).toBe(1);
    expect(lines).toContain(
      '⚠ Skipping remaining tests: Task creation did not return an id for slot A',
    );
    expect(api.calls).not.toContain('GET /tasks');
  });

  it('names both slots when neither create case succeeds', async () => {
    const api = new FakeTaskApi()
      .respondNext('POST /tasks', connectionRefused('POST', '/tasks'))
      .respondNext('POST /tasks', 503);

    const outcome = await runSuite({ api, output: collect().output });

    expect(outcome.missingSlots).toEqual(['A', 'B']);
    expect(outcome.results).toHaveLength(5);
  });

  it('fails the dependency when a 201 carries no id', async () => {
    const api = new FakeTaskApi()
      .respondNext('POST /tasks', { statusCode: 201 })
      .respondNext('POST /tasks', { statusCode: 201 });

    const outcome = await runSuite({ api, output: collect().output });

    expect(outcome.status).toBe('dependency-failure');
    expect(outcome.missingSlots).toEqual(['A', 'B']);
    expect(outcome.exitCode).toBe(1);
    const creates = outcome.results.slice(0, 2);
    expect(creates.map((r) => [r.outcome, r.actualStatus, r.error])).toEqual([
      ['FAIL', 0, 'POST /tasks: response body has no positive integer "id"'],
      ['FAIL', 0, 'POST /tasks: response body has no positive integer "id"'],
    ]);

    const report = renderReport(outcome.results, new PlainTableRenderer(), {
      blockedSlots: outcome.missingSlots,
    });
    const lines = report.split('\n');
    expect(lines).toContain(
      'DEPENDENCY FAILURE: dependent tests were not run ' +
        '(no task id for slot A and B)',
    );
    expect(lines).toContain('2 TEST(S) FAILED');
    expect(report).not.toContain('ALL TESTS PASSED!');
  });

  it('never reports a pass when only the second create lacks an id', async () => {
    const api = new FakeTaskApi()
      .respondNext('POST /tasks', { statusCode: 201, id: 5 })
      .respondNext('POST /tasks', { statusCode: 201 });

    const outcome = await runSuite({ api, output: collect().output });

    expect(outcome.missingSlots).toEqual(['B']);
    expect(outcome.results.map((r) => r.outcome)).toEqual([
      'PASS',
      'FAIL',
      'PASS',
      'PASS',
      'PASS',
    ]);
    const report = renderReport(outcome.results, new PlainTableRenderer(), {
      blockedSlots: outcome.missingSlots,
    });
    expect(report).toContain('1 TEST(S) FAILED');
    expect(report).not.toContain('ALL TESTS PASSED!');
  });

  it('records blocked cases as SKIP when asked to', async () => {
    const api = new FakeTaskApi()
      .respondNext('POST /tasks', { statusCode: 201, id: 7 })
      .respondNext('POST /tasks', 500);

    const outcome = await runSuite({
      api,
      output: collect().output,
      recordSkipped: true,
    });

    expect(outcome.results).toHaveLength(18);
    const skippedCases = outcome.results.slice(5);
    expect(skippedCases.every((r) => r.outcome === 'SKIP')).toBe(true);
    expect(skippedCases[1].path).toBe('/tasks/7');
    expect(skippedCases[9].path).toBe('/tasks/{B}');
    expect(skippedCases[0].error).toBe(
      'Task creation did not return an id for slot B',
    );
    expect(api.calls).not.toContain('GET /tasks');
  });

  it('announces the run after the reachability line in summary mode', async () => {
    const { lines, output } = collect();

    await runSuite({ api: new FakeTaskApi(), output });

    expect(lines).toEqual(['✓ Server is reachable', 'Running tests...']);
  });

  it('prints live traces in verbose mode', async () => {
    const api = new FakeTaskApi();
    const { lines, output } = collect();

    await runSuite({ api, output, verbose: true });

    expect(lines[0]).toBe('✓ Server is reachable');
    expect(lines).not.toContain('Running tests...');
    expect(lines.filter((l) => l.startsWith('✓ PASS '))).toHaveLength(18);
    expect(lines).toContain('✓ PASS DELETE - Verify task deleted');
  });
});
