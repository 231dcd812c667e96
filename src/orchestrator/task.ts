import { z } from 'zod';
import type { SuccessCriterion, Task } from '../types/shared.js';

const SuccessCriterionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('exit-zero') }),
  z.object({ kind: z.literal('stdout-equals'), value: z.string() }),
  z.object({ kind: z.literal('stdout-contains'), value: z.string().min(1) }),
  z.object({
    kind: z.literal('stdout-matches'),
    pattern: z.string().min(1).refine(isValidRegExp, { message: 'Invalid regular expression' }),
  }),
]);

const TaskInputSchema = z.object({
  objective: z.string().trim().min(1, 'Objective must not be empty'),
  constraints: z.array(z.string()).default([]),
  command: z.array(z.string()).min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  successCriterion: SuccessCriterionSchema.default({ kind: 'exit-zero' }),
});

export type TaskInput = z.input<typeof TaskInputSchema>;

function isValidRegExp(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/** Validates the input and returns a frozen Task. Throws a ZodError on bad input. */
export function createTask(input: TaskInput): Task {
  const parsed = TaskInputSchema.parse(input);
  return Object.freeze({
    objective: parsed.objective,
    constraints: Object.freeze([...parsed.constraints]),
    command: parsed.command && Object.freeze([...parsed.command]),
    timeoutMs: parsed.timeoutMs,
    successCriterion: Object.freeze(parsed.successCriterion),
  });
}

export function describeCriterion(c: SuccessCriterion): string {
  switch (c.kind) {
    case 'exit-zero': return 'the command exits with status 0';
    case 'stdout-equals': return `stdout equals ${JSON.stringify(c.value)}`;
    case 'stdout-contains': return `stdout contains ${JSON.stringify(c.value)}`;
    case 'stdout-matches': return `stdout matches /${c.pattern}/`;
  }
}
