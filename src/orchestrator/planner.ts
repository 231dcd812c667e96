import type { GenerationRequest } from '../generator/types.js';
import type { Task } from '../types/shared.js';
import type { Session } from './session.js';
import { describeCriterion } from './task.js';

export function buildTaskPrompt(task: Task): string {
  const sections = [task.objective];
  if (task.constraints.length > 0) {
    sections.push(`Constraints:\n${task.constraints.map(c => `- ${c}`).join('\n')}`);
  }
  sections.push(`Success criterion: ${describeCriterion(task.successCriterion)}`);
  return sections.join('\n\n');
}

/** The next generation request: task prompt plus whatever the last attempt taught us. */
export function planNextRequest(session: Session, command: readonly string[]): GenerationRequest {
  const last = session.attempts[session.attempts.length - 1];
  return {
    prompt: buildTaskPrompt(session.task),
    priorFeedback: last ? last.feedback : null,
    previousProgram: last?.program,
    command,
  };
}
