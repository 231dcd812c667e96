import type { OrchestratorState } from '../types/shared.js';

export const TRANSITIONS: Readonly<Record<OrchestratorState, readonly OrchestratorState[]>> = {
  planning: ['generating', 'aborted'],
  generating: ['executing', 'aborted'],
  executing: ['analyzing', 'aborted'],
  analyzing: ['succeeded', 'retrying', 'aborted'],
  retrying: ['generating', 'aborted'],
  succeeded: [],
  aborted: [],
};

export function isTerminal(state: OrchestratorState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: OrchestratorState, to: OrchestratorState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: OrchestratorState, to: OrchestratorState): void {
  if (!canTransition(from, to)) {
    throw new Error(`Illegal state transition: ${from} -> ${to}`);
  }
}
