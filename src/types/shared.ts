export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/** Exit status reported when the sandbox killed the instance for running too long. */
export const TIMED_OUT = 'timed_out' as const;
export type ExitStatus = number | typeof TIMED_OUT;

/** Relative path inside the workspace → file content. */
export type ProgramFiles = Record<string, string>;

export type SuccessCriterion =
  | { kind: 'exit-zero' }
  | { kind: 'stdout-equals'; value: string }
  | { kind: 'stdout-contains'; value: string }
  | { kind: 'stdout-matches'; pattern: string };

export interface Task {
  readonly objective: string;
  readonly constraints: readonly string[];
  readonly command?: readonly string[];   // overrides sandbox.command
  readonly timeoutMs?: number;            // overrides sandbox.timeoutMs
  readonly successCriterion: SuccessCriterion;
}

export interface ExecutionResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitStatus: ExitStatus;
  readonly durationMs: number;
  readonly truncated: { readonly stdout: boolean; readonly stderr: boolean };
}

export interface GeneratedProgram {
  readonly files: ProgramFiles;
}

export type AttemptOutcome = 'success' | 'program_failure' | 'criterion_not_met';

export interface Attempt {
  readonly index: number;                 // 1-based
  readonly program: GeneratedProgram;
  readonly result: ExecutionResult;
  readonly outcome: AttemptOutcome;
  readonly feedback: string;
}

export const OrchestratorStates = [
  'planning', 'generating', 'executing', 'analyzing',
  'retrying', 'succeeded', 'aborted',
] as const;
export type OrchestratorState = typeof OrchestratorStates[number];

export type Verdict = 'succeeded' | 'failed' | 'aborted';

export type AbortReason = 'max_attempts' | 'infrastructure' | 'cancelled';

export interface SessionSnapshot {
  id: string;
  task: Task;
  state: OrchestratorState;
  attempts: Attempt[];
  maxAttempts: number;
  verdict?: Verdict;
  reason?: AbortReason;
  error?: string;
  lastFeedback?: string;
  started_at: string;
  finished_at?: string;
}

// LLM types shared by the adapters and the code generator
export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type LLMEvent =
  | { type: 'text_delta'; content: string }
  | { type: 'done'; usage?: { input_tokens: number; output_tokens: number } }
  | { type: 'error'; error: string };
