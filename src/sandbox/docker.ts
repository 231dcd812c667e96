import Dockerode from 'dockerode';
import { platform } from 'os';
import { readdirSync } from 'fs';
import { Writable } from 'stream';
import { ImageBuildError, describeError } from '../errors.js';
import { createLogger } from '../log.js';
import type { ImageDescriptor } from './recipe.js';
import type { ContainerRuntime, InstanceHandle, InstanceSpec, OutputSinks } from './types.js';

const log = createLogger('DOCKER');

const FLUSH_GRACE_MS = 1000;

export function parseMemory(mem: string): number {
  const match = mem.match(/^(\d+)([gmk]?)$/i);
  if (!match) return 512 * 1024 * 1024;
  const num = parseInt(match[1]);
  switch (match[2]?.toLowerCase()) {
    case 'g': return num * 1024 * 1024 * 1024;
    case 'm': return num * 1024 * 1024;
    case 'k': return num * 1024;
    default: return num;
  }
}

function statusCodeOf(e: unknown): number | undefined {
  if (typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number') {
    return e.statusCode;
  }
  return undefined;
}

interface BuildEvent {
  stream?: string;
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
}

function sinkStream(write: (chunk: Buffer) => void): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      write(chunk);
      callback();
    },
  });
}

export class DockerRuntime implements ContainerRuntime {
  private docker: Dockerode;

  constructor(docker?: Dockerode) {
    this.docker = docker ?? new Dockerode();
  }

  buildContainerOptions(spec: InstanceSpec): Dockerode.ContainerCreateOptions {
    const opts: Dockerode.ContainerCreateOptions = {
      Image: spec.image,
      Cmd: [...spec.command],
      WorkingDir: spec.mountPath,
      Tty: false,
      OpenStdin: false,
      AttachStdout: true,
      AttachStderr: true,
      NetworkDisabled: true,
      Labels: { 'codeloop.sandbox': 'true' },
      HostConfig: {
        Binds: [`${spec.workspacePath}:${spec.mountPath}:rw`],
        NetworkMode: 'none',
        CapDrop: ['ALL'],
        SecurityOpt: ['no-new-privileges'],
        Memory: parseMemory(spec.memory),
        NanoCpus: Math.floor(spec.cpus * 1e9),
        PidsLimit: spec.pidsLimit,
      },
    };

    // Files the program writes into the bind mount must stay removable by us
    if (platform() === 'linux') {
      opts.User = `${process.getuid?.() ?? 1000}:${process.getgid?.() ?? 1000}`;
    }

    return opts;
  }

  async imageExists(tag: string): Promise<boolean> {
    try {
      await this.docker.getImage(tag).inspect();
      return true;
    } catch (e) {
      if (statusCodeOf(e) === 404) return false;
      throw e;
    }
  }

  async buildImage(descriptor: ImageDescriptor): Promise<{ log: string }> {
    const lines: string[] = [];
    let failure: string | undefined;

    try {
      const src = readdirSync(descriptor.contextDir);
      const stream = await this.docker.buildImage(
        { context: descriptor.contextDir, src },
        { t: descriptor.tag, dockerfile: descriptor.dockerfile },
      );
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(
          stream,
          (err: Error | null) => {
            if (err) reject(err);
            else resolve();
          },
          (event: BuildEvent) => {
            if (event.stream) lines.push(event.stream.trimEnd());
            else if (event.status) lines.push(event.status);
            if (event.error) {
              failure = event.errorDetail?.message ?? event.error;
              lines.push(event.error);
            }
          },
        );
      });
    } catch (e) {
      throw new ImageBuildError(descriptor.tag, lines.join('\n'), { cause: e });
    }

    if (failure !== undefined) {
      throw new ImageBuildError(descriptor.tag, lines.join('\n'), { cause: new Error(failure) });
    }
    log.info(`Built image ${descriptor.tag}`);
    return { log: lines.join('\n') };
  }

  async createInstance(spec: InstanceSpec): Promise<InstanceHandle> {
    const container = await this.docker.createContainer(this.buildContainerOptions(spec));
    const modem = this.docker.modem;
    let drained: Promise<void> = Promise.resolve();

    return {
      id: container.id,
      async start(sinks: OutputSinks) {
        const stream = await container.attach({ stream: true, stdout: true, stderr: true });
        drained = new Promise<void>(resolve => {
          stream.on('end', () => resolve());
          stream.on('close', () => resolve());
          stream.on('error', (err: Error) => {
            log.warn(`Output stream of ${container.id} failed`, describeError(err));
            resolve();
          });
        });
        modem.demuxStream(stream, sinkStream(sinks.stdout), sinkStream(sinks.stderr));
        await container.start();
      },
      async wait() {
        const result = await container.wait();
        // the attach stream can trail the exit by a few chunks
        let grace: NodeJS.Timeout | undefined;
        await Promise.race([
          drained,
          new Promise<void>(resolve => { grace = setTimeout(resolve, FLUSH_GRACE_MS); }),
        ]);
        clearTimeout(grace);
        const code: unknown = result?.StatusCode;
        return typeof code === 'number' ? code : -1;
      },
      async kill() {
        try {
          await container.kill({ signal: 'SIGKILL' });
        } catch (e) {
          const status = statusCodeOf(e);
          if (status !== 304 && status !== 404 && status !== 409) throw e;
        }
      },
      async remove() {
        try {
          await container.remove({ force: true, v: true });
        } catch (e) {
          if (statusCodeOf(e) !== 404) throw e;
        }
      },
    };
  }
}
