/** The workspace directory could not be created, written or cleaned. */
export class WorkspaceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WorkspaceError';
  }
}

export class ImageBuildError extends Error {
  constructor(
    readonly tag: string,
    readonly log: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to build image ${tag}`, options);
    this.name = 'ImageBuildError';
  }
}

/** The container runtime could not create or start an instance. */
export class InstanceStartError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InstanceStartError';
  }
}

/** The code-generation backend itself failed, as opposed to the code it produced. */
export class GenerationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export class ExecutionCancelledError extends Error {
  constructor(message = 'Execution cancelled') {
    super(message);
    this.name = 'ExecutionCancelledError';
  }
}

export type InfrastructureError = WorkspaceError | ImageBuildError | InstanceStartError;

export function isInfrastructureError(e: unknown): e is InfrastructureError {
  return e instanceof WorkspaceError
    || e instanceof ImageBuildError
    || e instanceof InstanceStartError;
}

export function describeError(e: unknown): string {
  if (e instanceof Error) {
    return `${e.name}: ${e.message}`;
  }
  return String(e);
}
