/**
 * Live trace blocks printed in verbose mode, one per executed test case.
 */
import type { TestOutcome, TestResult } from '../types.js';

export const RULE_WIDTH = 70;

const OUTCOME_LABELS: Record<TestOutcome, string> = {
  PASS: '✓ PASS',
  FAIL: '✗ FAIL',
  SKIP: '- SKIP',
};

export function outcomeLabel(outcome: TestOutcome): string {
  return OUTCOME_LABELS[outcome];
}

export function formatDuration(durationMs: number): string {
  return durationMs.toFixed(2);
}

export function formatResultTrace(result: TestResult): string[] {
  const rule = '='.repeat(RULE_WIDTH);
  const lines = [
    '',
    rule,
    `${outcomeLabel(result.outcome)} ${result.category} - ${result.name}`,
    `  Method:   ${result.method} ${result.path}`,
    `  Expected: ${result.expectedStatus}, Got: ${result.actualStatus}`,
  ];

  if (result.error) {
    lines.push(`  Error:    ${result.error}`);
  }

  lines.push(`  Duration: ${formatDuration(result.durationMs)}ms`, rule);
  return lines;
}
