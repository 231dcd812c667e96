import { mkdtemp, mkdir, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join, dirname, resolve, relative, isAbsolute, sep } from 'path';
import { WorkspaceError, describeError } from '../errors.js';
import { createLogger } from '../log.js';
import type { ProgramFiles } from '../types/shared.js';

const log = createLogger('WORKSPACE');

export const WORKSPACE_PREFIX = 'codeloop-ws-';

export interface WorkspaceOptions {
  root?: string;          // parent directory, defaults to the OS temp dir
}

/** Why `relPath` cannot be placed under `root`, or undefined when it can. */
export function pathViolation(root: string, relPath: string): string | undefined {
  if (!relPath || isAbsolute(relPath)) {
    return `File path must be relative: "${relPath}"`;
  }
  const rel = relative(root, resolve(root, relPath));
  if (!rel || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return `File path escapes the workspace: "${relPath}"`;
  }
  return undefined;
}

/** Resolves `relPath` under `root`, rejecting absolute paths and `..` escapes. */
export function resolveInside(root: string, relPath: string): string {
  const violation = pathViolation(root, relPath);
  if (violation) throw new WorkspaceError(violation);
  return resolve(root, relPath);
}

/**
 * A uniquely named scratch directory owned by one sandbox run.
 * `destroy()` may be called any number of times; only the first removes anything.
 */
export class Workspace {
  private removed = false;

  private constructor(readonly path: string) {}

  static async create(files: ProgramFiles, opts: WorkspaceOptions = {}): Promise<Workspace> {
    let path: string;
    try {
      path = await mkdtemp(join(opts.root ?? tmpdir(), WORKSPACE_PREFIX));
    } catch (e) {
      throw new WorkspaceError('Failed to create workspace directory', { cause: e });
    }

    const workspace = new Workspace(path);
    try {
      await workspace.write(files);
    } catch (e) {
      await workspace.destroy().catch((cleanupErr: unknown) => {
        log.warn(`Could not remove partially written workspace ${path}`, describeError(cleanupErr));
      });
      throw e instanceof WorkspaceError
        ? e
        : new WorkspaceError(`Failed to write files into ${path}`, { cause: e });
    }
    return workspace;
  }

  get destroyed(): boolean {
    return this.removed;
  }

  private async write(files: ProgramFiles): Promise<void> {
    for (const [relPath, content] of Object.entries(files)) {
      const full = resolveInside(this.path, relPath);
      await mkdir(dirname(full), { recursive: true });
      await writeFile(full, content, 'utf-8');
    }
  }

  async destroy(): Promise<void> {
    if (this.removed) return;
    try {
      await rm(this.path, { recursive: true, force: true });
    } catch (e) {
      throw new WorkspaceError(`Failed to remove workspace ${this.path}`, { cause: e });
    }
    this.removed = true;
  }
}
