import { randomBytes } from 'crypto';
import {
  ExecutionCancelledError, GenerationError, describeError, isInfrastructureError,
} from '../errors.js';
import { createLogger } from '../log.js';
import type { CodeGenerator, GenerationRequest } from '../generator/types.js';
import type {
  Attempt, ExecutionResult, GeneratedProgram, OrchestratorState, ProgramFiles, SessionSnapshot, Task,
} from '../types/shared.js';
import { DEFAULT_STDERR_POLICY, classifyResult, type StderrPolicy } from './analyzer.js';
import { planNextRequest } from './planner.js';
import { Session } from './session.js';

const log = createLogger('ORCHESTRATOR');

/** What the loop needs from a sandbox; `Sandbox` satisfies it. */
export interface ProgramRunner {
  run(
    programFiles: ProgramFiles,
    command: readonly string[],
    timeoutMs: number,
    opts?: { signal?: AbortSignal },
  ): Promise<ExecutionResult>;
}

export interface OrchestratorOptions {
  generator: CodeGenerator;
  sandbox: ProgramRunner;
  command: readonly string[];
  timeoutMs: number;
  maxAttempts: number;
  /** Extra immediate tries when the generator itself fails. */
  generationRetries: number;
  /** Extra tries of the same program when the execution environment fails. */
  infraRetries: number;
  stderrPolicy?: StderrPolicy;
  onAttempt?: (attempt: Attempt, session: SessionSnapshot) => void | Promise<void>;
  onTransition?: (from: OrchestratorState, to: OrchestratorState, sessionId: string) => void;
}

export interface SolveOptions {
  signal?: AbortSignal;
  sessionId?: string;
}

/**
 * The generate → execute → analyze loop. Each session runs its attempts one
 * after another; separate sessions may share one Orchestrator concurrently.
 */
export class Orchestrator {
  constructor(private opts: OrchestratorOptions) {
    if (opts.generationRetries < 0 || opts.infraRetries < 0) {
      throw new Error('Retry budgets must not be negative');
    }
  }

  async solve(task: Task, solveOpts: SolveOptions = {}): Promise<SessionSnapshot> {
    const { signal } = solveOpts;
    const id = solveOpts.sessionId ?? randomBytes(6).toString('hex');
    const session = new Session(id, task, this.opts.maxAttempts, (from, to) => {
      log.debug(`[${id}] ${from} -> ${to}`);
      try {
        this.opts.onTransition?.(from, to, id);
      } catch (e) {
        log.warn(`[${id}] onTransition hook failed for ${from} -> ${to}`, describeError(e));
      }
    });
    const command = task.command ?? this.opts.command;
    const timeoutMs = task.timeoutMs ?? this.opts.timeoutMs;

    log.info(`[${id}] Solving: ${task.objective.slice(0, 100)}${task.objective.length > 100 ? '...' : ''}`);

    // planning
    let request = planNextRequest(session, command);
    session.transition('generating');

    while (!session.finished) {
      const index = session.attemptCount + 1;

      let program: GeneratedProgram;
      try {
        program = await this.generate(request, index, signal);
      } catch (e) {
        if (e instanceof ExecutionCancelledError) {
          session.finish('aborted', { reason: 'cancelled' });
        } else {
          log.error(`[${id}] Code generation failed for good`, describeError(e));
          session.finish('failed', { error: describeError(e) });
        }
        break;
      }

      session.transition('executing');
      let result: ExecutionResult;
      try {
        result = await this.execute(program, command, timeoutMs, index, signal);
      } catch (e) {
        if (e instanceof ExecutionCancelledError) {
          session.finish('aborted', { reason: 'cancelled' });
        } else {
          log.error(`[${id}] Execution environment failed`, describeError(e));
          session.finish('aborted', { reason: 'infrastructure', error: describeError(e) });
        }
        break;
      }

      session.transition('analyzing');
      const analysis = classifyResult(result, task.successCriterion, this.opts.stderrPolicy ?? DEFAULT_STDERR_POLICY);
      const attempt: Attempt = {
        index,
        program,
        result,
        outcome: analysis.outcome,
        feedback: analysis.feedback,
      };
      session.record(attempt);
      log.info(`[${id}] Attempt ${index}/${this.opts.maxAttempts}: ${analysis.reason}`);
      await this.notifyAttempt(attempt, session);

      if (analysis.outcome === 'success') {
        session.finish('succeeded');
      } else if (session.exhausted) {
        session.finish('aborted', { reason: 'max_attempts' });
      } else if (signal?.aborted) {
        session.finish('aborted', { reason: 'cancelled' });
      } else {
        session.transition('retrying');
        request = planNextRequest(session, command);
        session.transition('generating');
      }
    }

    const snapshot = session.snapshot();
    log.info(`[${id}] Finished: ${snapshot.verdict}${snapshot.reason ? ` (${snapshot.reason})` : ''} after ${snapshot.attempts.length} attempt(s)`);
    return snapshot;
  }

  private async generate(request: GenerationRequest, index: number, signal?: AbortSignal): Promise<GeneratedProgram> {
    const tries = this.opts.generationRetries + 1;
    for (let i = 1; ; i++) {
      if (signal?.aborted) throw new ExecutionCancelledError();
      try {
        return await this.opts.generator.generate(request, signal);
      } catch (e) {
        if (signal?.aborted) throw new ExecutionCancelledError();
        const err = e instanceof GenerationError
          ? e
          : new GenerationError(describeError(e), { cause: e });
        if (i >= tries) throw err;
        log.warn(`Attempt ${index}: generation try ${i}/${tries} failed, retrying`, err.message);
      }
    }
  }

  private async execute(
    program: GeneratedProgram,
    command: readonly string[],
    timeoutMs: number,
    index: number,
    signal?: AbortSignal,
  ): Promise<ExecutionResult> {
    const tries = this.opts.infraRetries + 1;
    for (let i = 1; ; i++) {
      try {
        return await this.opts.sandbox.run(program.files, command, timeoutMs, { signal });
      } catch (e) {
        if (e instanceof ExecutionCancelledError || signal?.aborted) throw new ExecutionCancelledError();
        // only environment faults are worth a second try with the same program
        if (!isInfrastructureError(e) || i >= tries) throw e;
        log.warn(`Attempt ${index}: sandbox try ${i}/${tries} failed, retrying`, describeError(e));
      }
    }
  }

  private async notifyAttempt(attempt: Attempt, session: Session): Promise<void> {
    if (!this.opts.onAttempt) return;
    try {
      await this.opts.onAttempt(attempt, session.snapshot());
    } catch (e) {
      log.warn(`onAttempt hook failed for attempt ${attempt.index}`, describeError(e));
    }
  }
}
