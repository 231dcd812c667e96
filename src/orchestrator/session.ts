import type {
  AbortReason, Attempt, OrchestratorState, SessionSnapshot, Task, Verdict,
} from '../types/shared.js';
import { assertTransition, isTerminal } from './states.js';

export type TransitionListener = (from: OrchestratorState, to: OrchestratorState) => void;

export interface FinishDetails {
  reason?: AbortReason;
  error?: string;
}

/**
 * Mutable state of one task-solving run. Only the Orchestrator drives it;
 * everyone else reads snapshots.
 */
export class Session {
  private current: OrchestratorState = 'planning';
  private history: Attempt[] = [];
  private verdict?: Verdict;
  private details: FinishDetails = {};
  private readonly startedAt = new Date().toISOString();
  private finishedAt?: string;

  constructor(
    readonly id: string,
    readonly task: Task,
    readonly maxAttempts: number,
    private onTransition?: TransitionListener,
  ) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
  }

  get state(): OrchestratorState {
    return this.current;
  }

  get attempts(): readonly Attempt[] {
    return this.history;
  }

  get attemptCount(): number {
    return this.history.length;
  }

  get exhausted(): boolean {
    return this.history.length >= this.maxAttempts;
  }

  get finished(): boolean {
    return this.verdict !== undefined;
  }

  transition(to: OrchestratorState): void {
    const from = this.current;
    assertTransition(from, to);
    this.current = to;
    this.onTransition?.(from, to);
  }

  record(attempt: Attempt): void {
    if (this.exhausted) {
      throw new Error(`Attempt budget of ${this.maxAttempts} already used`);
    }
    if (attempt.index !== this.history.length + 1) {
      throw new Error(`Expected attempt ${this.history.length + 1}, got ${attempt.index}`);
    }
    this.history.push(Object.freeze(attempt));
  }

  /** Sets the verdict (once) and moves to the matching terminal state. */
  finish(verdict: Verdict, details: FinishDetails = {}): void {
    if (this.verdict !== undefined) {
      throw new Error(`Session ${this.id} already finished as ${this.verdict}`);
    }
    const terminal: OrchestratorState = verdict === 'succeeded' ? 'succeeded' : 'aborted';
    if (!isTerminal(this.current)) this.transition(terminal);
    this.verdict = verdict;
    this.details = details;
    this.finishedAt = new Date().toISOString();
  }

  snapshot(): SessionSnapshot {
    const last = this.history[this.history.length - 1];
    return {
      id: this.id,
      task: this.task,
      state: this.current,
      attempts: [...this.history],
      maxAttempts: this.maxAttempts,
      verdict: this.verdict,
      reason: this.details.reason,
      error: this.details.error,
      lastFeedback: last?.feedback,
      started_at: this.startedAt,
      finished_at: this.finishedAt,
    };
  }
}
