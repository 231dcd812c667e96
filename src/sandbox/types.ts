import type { ImageDescriptor } from './recipe.js';

export interface InstanceSpec {
  image: string;
  command: readonly string[];
  workspacePath: string;          // host directory
  mountPath: string;              // where it appears inside the instance; also the working dir
  memory: string;
  cpus: number;
  pidsLimit: number;
}

export interface OutputSinks {
  stdout(chunk: Buffer): void;
  stderr(chunk: Buffer): void;
}

/** One created (not yet started) isolated instance. */
export interface InstanceHandle {
  id: string;
  /** Attaches the sinks, then starts the command. */
  start(sinks: OutputSinks): Promise<void>;
  /** Resolves with the exit code once the command has ended and its output is flushed. */
  wait(): Promise<number>;
  /** Forcible termination; a no-op if the instance already stopped. */
  kill(): Promise<void>;
  /** Stops if needed and deletes the instance; a no-op if it is already gone. */
  remove(): Promise<void>;
}

export interface ImageRuntime {
  imageExists(tag: string): Promise<boolean>;
  /** Rejects with ImageBuildError carrying the build log. */
  buildImage(descriptor: ImageDescriptor): Promise<{ log: string }>;
}

export interface ContainerRuntime extends ImageRuntime {
  createInstance(spec: InstanceSpec): Promise<InstanceHandle>;
}
