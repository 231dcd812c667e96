import {
  ExecutionCancelledError, InstanceStartError, describeError,
} from '../errors.js';
import { createLogger } from '../log.js';
import { TIMED_OUT, type ExecutionResult, type ExitStatus, type ProgramFiles } from '../types/shared.js';
import type { SandboxSettings } from '../config/index.js';
import { ImageCache } from './image-cache.js';
import { OutputBuffer } from './output.js';
import { imageDescriptor, type ImageDescriptor } from './recipe.js';
import { Workspace } from './workspace.js';
import type { ContainerRuntime, InstanceHandle } from './types.js';

const log = createLogger('SANDBOX');

export const MOUNT_PATH = '/app';

export interface SandboxOptions {
  runtime: ContainerRuntime;
  image: ImageDescriptor;
  /** Defaults to the process-wide cache of `runtime`. */
  images?: ImageCache;
  outputCapBytes: number;
  memory: string;
  cpus: number;
  pidsLimit: number;
  workspaceRoot?: string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

type Interruption = 'timeout' | 'cancelled';

/**
 * Runs one program in a fresh workspace and a fresh isolated instance.
 *
 * Program failures come back as data in the ExecutionResult; only
 * environment faults throw (WorkspaceError, ImageBuildError,
 * InstanceStartError), plus ExecutionCancelledError when the signal fires.
 * Whatever happens, the instance is removed and then the workspace deleted
 * before `run` settles.
 */
export class Sandbox {
  private images: ImageCache;

  constructor(private opts: SandboxOptions) {
    this.images = opts.images ?? ImageCache.shared(opts.runtime);
  }

  static fromSettings(runtime: ContainerRuntime, settings: SandboxSettings, images?: ImageCache): Sandbox {
    return new Sandbox({
      runtime,
      images,
      image: imageDescriptor(settings.image, settings.recipeDir),
      outputCapBytes: settings.outputCapBytes,
      memory: settings.memory,
      cpus: settings.cpus,
      pidsLimit: settings.pidsLimit,
    });
  }

  async run(
    programFiles: ProgramFiles,
    command: readonly string[],
    timeoutMs: number,
    opts: RunOptions = {},
  ): Promise<ExecutionResult> {
    if (opts.signal?.aborted) throw new ExecutionCancelledError();

    const workspace = await Workspace.create(programFiles, { root: this.opts.workspaceRoot });
    log.debug(`Workspace ${workspace.path} ready (${Object.keys(programFiles).length} files)`);

    const throwIfCancelled = () => {
      if (opts.signal?.aborted) throw new ExecutionCancelledError();
    };

    let instance: InstanceHandle | undefined;
    try {
      throwIfCancelled();
      const image = await this.images.ensure(this.opts.image);
      throwIfCancelled();
      instance = await this.createInstance(image.tag, command, workspace.path);
      // never start untrusted code once the caller has given up
      throwIfCancelled();
      return await this.execute(instance, timeoutMs, opts.signal);
    } finally {
      await this.teardown(instance, workspace);
    }
  }

  private async createInstance(image: string, command: readonly string[], workspacePath: string): Promise<InstanceHandle> {
    try {
      return await this.opts.runtime.createInstance({
        image,
        command,
        workspacePath,
        mountPath: MOUNT_PATH,
        memory: this.opts.memory,
        cpus: this.opts.cpus,
        pidsLimit: this.opts.pidsLimit,
      });
    } catch (e) {
      throw new InstanceStartError(`Failed to create instance from ${image}`, { cause: e });
    }
  }

  private async execute(instance: InstanceHandle, timeoutMs: number, signal?: AbortSignal): Promise<ExecutionResult> {
    const stdout = new OutputBuffer(this.opts.outputCapBytes);
    const stderr = new OutputBuffer(this.opts.outputCapBytes);

    const startedAt = Date.now();
    try {
      await instance.start({
        stdout: chunk => stdout.push(chunk),
        stderr: chunk => stderr.push(chunk),
      });
    } catch (e) {
      throw new InstanceStartError(`Failed to start instance ${instance.id}`, { cause: e });
    }

    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;
    const interrupted = new Promise<Interruption>(resolve => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
      onAbort = () => resolve('cancelled');
      if (signal?.aborted) resolve('cancelled');
      else signal?.addEventListener('abort', onAbort, { once: true });
    });

    const exited = instance.wait().then(
      code => ({ kind: 'exited' as const, code }),
      (e: unknown) => ({ kind: 'lost' as const, error: e }),
    );

    const finish = (exitStatus: ExitStatus, durationMs: number): ExecutionResult => Object.freeze({
      stdout: stdout.text(),
      stderr: stderr.text(),
      exitStatus,
      durationMs,
      truncated: Object.freeze({ stdout: stdout.truncated, stderr: stderr.truncated }),
    });

    try {
      const outcome = await Promise.race([exited, interrupted.then(kind => ({ kind }))]);
      const durationMs = Date.now() - startedAt;

      if (outcome.kind === 'exited') {
        log.debug(`Instance ${instance.id} exited with ${outcome.code} after ${durationMs}ms`);
        return finish(outcome.code, durationMs);
      }
      if (outcome.kind === 'lost') {
        throw new InstanceStartError(`Instance ${instance.id} failed while running`, { cause: outcome.error });
      }

      log.warn(`Killing instance ${instance.id}: ${outcome.kind}`);
      await this.forceStop(instance);
      if (outcome.kind === 'cancelled') throw new ExecutionCancelledError();
      return finish(TIMED_OUT, durationMs);
    } finally {
      clearTimeout(timer);
      if (onAbort) signal?.removeEventListener('abort', onAbort);
    }
  }

  private async forceStop(instance: InstanceHandle): Promise<void> {
    try {
      await instance.kill();
    } catch (e) {
      // remove({ force }) during teardown still takes it down
      log.warn(`Kill of ${instance.id} failed`, describeError(e));
    }
  }

  private async teardown(instance: InstanceHandle | undefined, workspace: Workspace): Promise<void> {
    if (instance) {
      try {
        await instance.remove();
      } catch (e) {
        log.error(`Failed to remove instance ${instance.id}`, describeError(e));
      }
    }
    try {
      await workspace.destroy();
    } catch (e) {
      log.error(`Failed to delete workspace ${workspace.path}`, describeError(e));
    }
  }
}
