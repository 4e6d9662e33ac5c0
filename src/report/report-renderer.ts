import type { ReportStatistics, TestResult } from '../types.js';
import { EmptyResultLogError } from '../errors.js';
import { countOutcomes } from '../runner/result-log.js';
import { formatDuration, outcomeLabel } from '../utils/trace-formatter.js';
import type { TableCell, TableRenderer } from './table.js';

export const REPORT_WIDTH = 120;

export const TABLE_HEADERS = [
  '#',
  'Category',
  'Test Name',
  'Method',
  'Endpoint',
  'Status',
  'Code',
  'Time(ms)',
];

export function computeStatistics(
  results: readonly TestResult[],
): ReportStatistics {
  if (results.length === 0) {
    throw new EmptyResultLogError();
  }

  const total = results.length;
  const { passed, failed, skipped } = countOutcomes(results);
  const totalDurationMs = results.reduce((sum, r) => sum + r.durationMs, 0);

  return {
    total,
    passed,
    failed,
    skipped,
    successRate: (passed / total) * 100,
    totalDurationMs,
    averageDurationMs: totalDurationMs / total,
  };
}

export function buildTableRows(results: readonly TestResult[]): TableCell[][] {
  return results.map((result, i) => [
    i + 1,
    result.category,
    result.name,
    result.method,
    result.path,
    outcomeLabel(result.outcome),
    `${result.actualStatus}/${result.expectedStatus}`,
    formatDuration(result.durationMs),
  ]);
}

export interface ReportOptions {
  /** Slots whose create case yielded no id, blocking the dependent cases. */
  blockedSlots?: readonly string[];
}

/**
 * Render the final report: results table, statistics block and a triage
 * list of failed and skipped cases. The input is only read.
 */
export function renderReport(
  results: readonly TestResult[],
  table: TableRenderer,
  options: ReportOptions = {},
): string {
  if (results.length === 0) {
    return 'No tests were run.';
  }

  const rule = '='.repeat(REPORT_WIDTH);
  const stats = computeStatistics(results);

  const lines = [
    '',
    rule,
    'TEST RESULTS SUMMARY',
    rule,
    table.render(TABLE_HEADERS, buildTableRows(results)),
    '',
    rule,
    'STATISTICS',
    rule,
    ...formatStatistics(stats),
    rule,
    '',
  ];

  const blocked = options.blockedSlots ?? [];
  if (blocked.length > 0) {
    lines.push(
      'DEPENDENCY FAILURE: dependent tests were not run ' +
        `(no task id for slot ${blocked.join(' and ')})`,
    );
  }

  if (stats.failed === 0 && stats.skipped === 0) {
    if (blocked.length === 0) {
      lines.push('ALL TESTS PASSED!');
    }
    return lines.join('\n');
  }

  if (stats.failed > 0) {
    lines.push(`${stats.failed} TEST(S) FAILED`);
  }
  if (stats.skipped > 0) {
    lines.push(`${stats.skipped} TEST(S) SKIPPED`);
  }

  lines.push(...formatTriageList('Failed tests:', results, 'FAIL'));
  lines.push(...formatTriageList('Skipped tests:', results, 'SKIP'));

  return lines.join('\n');
}

export function formatStatistics(stats: ReportStatistics): string[] {
  const rows: [string, string][] = [
    ['Total Tests', String(stats.total)],
    ['Passed', String(stats.passed)],
    ['Failed', String(stats.failed)],
  ];

  if (stats.skipped > 0) {
    rows.push(['Skipped', String(stats.skipped)]);
  }

  rows.push(
    ['Success Rate', `${stats.successRate.toFixed(1)}%`],
    ['Total Duration', `${formatDuration(stats.totalDurationMs)}ms`],
    ['Average Duration', `${formatDuration(stats.averageDurationMs)}ms`],
  );

  return rows.map(([label, value]) => `  ${label.padEnd(20)} ${value}`);
}

function formatTriageList(
  title: string,
  results: readonly TestResult[],
  outcome: 'FAIL' | 'SKIP',
): string[] {
  const lines: string[] = [];

  results.forEach((result, i) => {
    if (result.outcome !== outcome) return;
    lines.push(`  ${i + 1}. ${result.category} - ${result.name}`);
    if (result.error) {
      lines.push(`     Error: ${result.error}`);
    }
  });

  return lines.length > 0 ? ['', title, ...lines] : [];
}
