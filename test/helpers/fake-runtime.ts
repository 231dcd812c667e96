import { ImageBuildError } from '../../src/errors.js';
import type { ImageDescriptor } from '../../src/sandbox/recipe.js';
import type {
  ContainerRuntime, InstanceHandle, InstanceSpec, OutputSinks,
} from '../../src/sandbox/types.js';

export interface FakeScript {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  delayMs?: number;
  /** Never exits on its own; only kill/remove end it. */
  hang?: boolean;
}

export type Behaviour = (spec: InstanceSpec) => FakeScript;

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => { resolve = r; });
  return { promise, resolve };
}

export const KILLED_EXIT_CODE = 137;

export class FakeInstance implements InstanceHandle {
  started = false;
  killed = false;
  removed = false;
  private exit = deferred<number>();

  constructor(
    readonly id: string,
    readonly spec: InstanceSpec,
    private script: FakeScript,
    private runtime: FakeRuntime,
  ) {}

  async start(sinks: OutputSinks): Promise<void> {
    if (this.runtime.failStart) throw new Error('OCI runtime create failed');
    this.runtime.events.push(`start:${this.id}`);
    this.started = true;
    if (this.script.stdout) sinks.stdout(Buffer.from(this.script.stdout));
    if (this.script.stderr) sinks.stderr(Buffer.from(this.script.stderr));
    if (!this.script.hang) {
      setTimeout(() => this.exit.resolve(this.script.exitCode ?? 0), this.script.delayMs ?? 0);
    }
  }

  wait(): Promise<number> {
    return this.exit.promise;
  }

  async kill(): Promise<void> {
    this.runtime.events.push(`kill:${this.id}`);
    this.killed = true;
    this.exit.resolve(KILLED_EXIT_CODE);
  }

  async remove(): Promise<void> {
    this.runtime.events.push(`remove:${this.id}`);
    if (this.runtime.failRemove) throw new Error('removal of container is already in progress');
    this.removed = true;
    this.exit.resolve(KILLED_EXIT_CODE);
  }
}

/** In-process stand-in for the Docker daemon. */
export class FakeRuntime implements ContainerRuntime {
  events: string[] = [];
  instances: FakeInstance[] = [];
  images = new Set<string>();
  existsCalls = 0;
  buildCalls = 0;
  buildGate: Promise<void> = Promise.resolve();
  buildFailures = 0;
  createFailures = 0;
  failStart = false;
  failRemove = false;

  constructor(private behaviour: Behaviour = () => ({})) {}

  async imageExists(tag: string): Promise<boolean> {
    this.existsCalls++;
    return this.images.has(tag);
  }

  async buildImage(descriptor: ImageDescriptor): Promise<{ log: string }> {
    this.buildCalls++;
    this.events.push(`build:${descriptor.tag}`);
    await this.buildGate;
    if (this.buildFailures > 0) {
      this.buildFailures--;
      throw new ImageBuildError(descriptor.tag, 'Step 1/3 : FROM python:3.12-slim\nerror: boom');
    }
    this.images.add(descriptor.tag);
    return { log: 'Successfully built' };
  }

  async createInstance(spec: InstanceSpec): Promise<InstanceHandle> {
    if (this.createFailures > 0) {
      this.createFailures--;
      throw new Error('Cannot connect to the Docker daemon');
    }
    const instance = new FakeInstance(`fake-${this.instances.length + 1}`, spec, this.behaviour(spec), this);
    this.events.push(`create:${instance.id}`);
    this.instances.push(instance);
    return instance;
  }
}
