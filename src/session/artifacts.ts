import { mkdirSync, writeFileSync } from 'fs';
import { join, dirname } from 'path';
import { resolveInside } from '../sandbox/workspace.js';
import type { Attempt, SessionSnapshot } from '../types/shared.js';

export function attemptDirName(index: number): string {
  return `attempt_${String(index).padStart(2, '0')}`;
}

/**
 * Writes one attempt for later inspection:
 *   <runDir>/attempt_NN/code/<program files>
 *   <runDir>/attempt_NN/execution_report.txt
 */
export function writeAttemptArtifacts(runDir: string, attempt: Attempt): string {
  const dir = join(runDir, attemptDirName(attempt.index));
  const codeDir = join(dir, 'code');
  mkdirSync(codeDir, { recursive: true });

  for (const [relPath, content] of Object.entries(attempt.program.files)) {
    const full = resolveInside(codeDir, relPath);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content, 'utf-8');
  }

  const report = [
    `Attempt: ${attempt.index}`,
    `Outcome: ${attempt.outcome}`,
    `Duration: ${attempt.result.durationMs}ms`,
    `Truncated: stdout=${attempt.result.truncated.stdout} stderr=${attempt.result.truncated.stderr}`,
    '',
    attempt.feedback,
    '',
  ].join('\n');
  writeFileSync(join(dir, 'execution_report.txt'), report, 'utf-8');
  return dir;
}

export function writeSessionSummary(runDir: string, session: SessionSnapshot): void {
  mkdirSync(runDir, { recursive: true });
  writeFileSync(join(runDir, 'session.json'), JSON.stringify(session, null, 2));
}
