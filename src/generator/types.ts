import type { GeneratedProgram } from '../types/shared.js';

export interface GenerationRequest {
  prompt: string;
  /** Execution feedback from the last attempt; null on the first. */
  priorFeedback: string | null;
  previousProgram?: GeneratedProgram;
  /** The command the program will be run with, for the generator's context. */
  command: readonly string[];
}

/**
 * Any backend that turns a prompt (plus feedback from the last run) into
 * program files. Throwing means the backend itself failed.
 */
export interface CodeGenerator {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedProgram>;
}
