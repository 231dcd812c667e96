import { TIMED_OUT, type AttemptOutcome, type ExecutionResult, type SuccessCriterion } from '../types/shared.js';
import { describeCriterion } from './task.js';

/**
 * Decides whether stderr holds real errors. A line counts when it matches an
 * error pattern and no ignore pattern; a zero exit with only ignorable or
 * unmatched stderr (installer chatter, warnings) is still a candidate success.
 */
export interface StderrPolicy {
  errorPatterns: RegExp[];
  ignorePatterns: RegExp[];
}

export const DEFAULT_STDERR_POLICY: StderrPolicy = {
  errorPatterns: [
    /Traceback \(most recent call last\)/,
    /^\s*[A-Za-z_][\w.]*(Error|Exception):/,
    /\bFATAL\b/,
    /^panic:/,
    /Segmentation fault/,
  ],
  // only lines that lead with a warning category, optionally after `file:line:`
  ignorePatterns: [
    /^\s*(?:\S+:\d+:\s*)?[A-Za-z_][\w.]*Warning:/,
    /^\s*WARNING\b/,
  ],
};

export interface Analysis {
  outcome: AttemptOutcome;
  reason: string;
  feedback: string;
}

export function stderrHasErrors(stderr: string, policy: StderrPolicy = DEFAULT_STDERR_POLICY): boolean {
  return stderr.split('\n').some(line =>
    !policy.ignorePatterns.some(p => p.test(line))
    && policy.errorPatterns.some(p => p.test(line)));
}

export function meetsCriterion(stdout: string, criterion: SuccessCriterion): boolean {
  switch (criterion.kind) {
    case 'exit-zero':
      return true;
    case 'stdout-equals':
      return stdout.replace(/\n+$/, '') === criterion.value.replace(/\n+$/, '');
    case 'stdout-contains':
      return stdout.includes(criterion.value);
    case 'stdout-matches':
      return new RegExp(criterion.pattern, 'm').test(stdout);
  }
}

export function formatExecutionReport(headline: string, result: ExecutionResult): string {
  const exit = result.exitStatus === TIMED_OUT
    ? `timed out after ${result.durationMs}ms`
    : String(result.exitStatus);
  return [
    headline,
    '--- EXIT STATUS ---',
    exit,
    '--- STDOUT ---',
    result.stdout.trimEnd() || '(empty)',
    '--- STDERR ---',
    result.stderr.trimEnd() || '(empty)',
    '--- END REPORT ---',
  ].join('\n');
}

export function classifyResult(
  result: ExecutionResult,
  criterion: SuccessCriterion,
  policy: StderrPolicy = DEFAULT_STDERR_POLICY,
): Analysis {
  let outcome: AttemptOutcome;
  let reason: string;

  if (result.exitStatus === TIMED_OUT) {
    outcome = 'program_failure';
    reason = `Timed out after ${result.durationMs}ms`;
  } else if (result.exitStatus !== 0) {
    outcome = 'program_failure';
    reason = `Exited with status ${result.exitStatus}`;
  } else if (stderrHasErrors(result.stderr, policy)) {
    outcome = 'program_failure';
    reason = 'Exited with status 0 but reported errors on stderr';
  } else if (!meetsCriterion(result.stdout, criterion)) {
    outcome = 'criterion_not_met';
    reason = `Exited with status 0 but the output did not satisfy: ${describeCriterion(criterion)}`;
  } else {
    outcome = 'success';
    reason = `Succeeded: ${describeCriterion(criterion)}`;
  }

  return { outcome, reason, feedback: formatExecutionReport(reason, result) };
}
