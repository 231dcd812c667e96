import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Sandbox, MOUNT_PATH, type SandboxOptions } from '../src/sandbox/sandbox.js';
import { ImageCache } from '../src/sandbox/image-cache.js';
import { imageDescriptor } from '../src/sandbox/recipe.js';
import { truncationMarker } from '../src/sandbox/output.js';
import {
  ExecutionCancelledError, ImageBuildError, InstanceStartError, WorkspaceError,
} from '../src/errors.js';
import { TIMED_OUT } from '../src/types/shared.js';
import { FakeRuntime, deferred, type Behaviour } from './helpers/fake-runtime.js';

const runsPython: Behaviour = spec => {
  const source = readFileSync(join(spec.workspacePath, 'main.py'), 'utf-8');
  if (source.includes('print("ok")')) return { stdout: 'ok\n', exitCode: 0 };
  if (source.includes('sleep')) return { hang: true };
  return {
    stderr: 'Traceback (most recent call last):\n  File "/app/main.py", line 1, in <module>\nValueError: bad\n',
    exitCode: 1,
  };
};

describe('Sandbox', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'codeloop-sandbox-test-'));
  });

  function makeSandbox(runtime: FakeRuntime, overrides: Partial<SandboxOptions> = {}): Sandbox {
    return new Sandbox({
      runtime,
      images: new ImageCache(runtime),
      image: imageDescriptor('codeloop-test', '/recipes/python'),
      outputCapBytes: 1024,
      memory: '256m',
      cpus: 1,
      pidsLimit: 64,
      workspaceRoot: root,
      ...overrides,
    });
  }

  it('runs a program and reports its output and exit status', async () => {
    const runtime = new FakeRuntime(runsPython);
    const result = await makeSandbox(runtime).run({ 'main.py': 'print("ok")\n' }, ['python3', 'main.py'], 5000);

    expect(result.exitStatus).toBe(0);
    expect(result.stdout).toBe('ok\n');
    expect(result.stderr).toBe('');
    expect(result.truncated).toEqual({ stdout: false, stderr: false });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('mounts the workspace at the fixed path with the requested command', async () => {
    const runtime = new FakeRuntime(runsPython);
    await makeSandbox(runtime).run({ 'main.py': 'print("ok")\n' }, ['python3', 'main.py'], 5000);

    const spec = runtime.instances[0].spec;
    expect(spec.mountPath).toBe(MOUNT_PATH);
    expect(spec.command).toEqual(['python3', 'main.py']);
    expect(spec.image).toBe('codeloop-test');
    expect(spec.workspacePath.startsWith(root)).toBe(true);
  });

  it('removes the instance and then the workspace after a successful run', async () => {
    const runtime = new FakeRuntime(runsPython);
    await makeSandbox(runtime).run({ 'main.py': 'print("ok")\n' }, ['python3', 'main.py'], 5000);

    expect(runtime.events).toEqual(['build:codeloop-test', 'create:fake-1', 'start:fake-1', 'remove:fake-1']);
    expect(existsSync(runtime.instances[0].spec.workspacePath)).toBe(false);
    expect(readdirSync(root)).toEqual([]);
  });

  it('returns program failures as data', async () => {
    const runtime = new FakeRuntime(runsPython);
    const result = await makeSandbox(runtime).run({ 'main.py': 'raise ValueError("bad")\n' }, ['python3', 'main.py'], 5000);

    expect(result.exitStatus).toBe(1);
    expect(result.stderr).toContain('ValueError: bad');
    expect(readdirSync(root)).toEqual([]);
  });

  it('kills a program that outlives the timeout and reports the sentinel', async () => {
    const runtime = new FakeRuntime(runsPython);
    const result = await makeSandbox(runtime).run({ 'main.py': 'import time; time.sleep(60)\n' }, ['python3', 'main.py'], 150);

    expect(result.exitStatus).toBe(TIMED_OUT);
    expect(result.durationMs).toBeGreaterThanOrEqual(100);
    expect(result.durationMs).toBeLessThan(1000);
    expect(runtime.instances[0].killed).toBe(true);
    expect(runtime.events.slice(-2)).toEqual(['kill:fake-1', 'remove:fake-1']);
    expect(readdirSync(root)).toEqual([]);
  });

  it('caps captured output and marks the truncation', async () => {
    const runtime = new FakeRuntime(() => ({ stdout: '0123456789abc', exitCode: 0 }));
    const result = await makeSandbox(runtime, { outputCapBytes: 8 }).run({ 'main.py': '' }, ['python3', 'main.py'], 5000);

    expect(result.stdout).toBe('01234567' + truncationMarker(8));
    expect(result.truncated).toEqual({ stdout: true, stderr: false });
  });

  it('raises InstanceStartError and still deletes the workspace when the instance cannot be created', async () => {
    const runtime = new FakeRuntime();
    runtime.createFailures = 1;

    await expect(makeSandbox(runtime).run({ 'main.py': '' }, ['python3', 'main.py'], 5000))
      .rejects.toBeInstanceOf(InstanceStartError);
    expect(readdirSync(root)).toEqual([]);
  });

  it('removes a created instance whose start fails', async () => {
    const runtime = new FakeRuntime();
    runtime.failStart = true;

    await expect(makeSandbox(runtime).run({ 'main.py': '' }, ['python3', 'main.py'], 5000))
      .rejects.toBeInstanceOf(InstanceStartError);
    expect(runtime.events).toEqual(['build:codeloop-test', 'create:fake-1', 'remove:fake-1']);
    expect(readdirSync(root)).toEqual([]);
  });

  it('keeps the captured result when instance removal fails, and still deletes the workspace', async () => {
    const runtime = new FakeRuntime(runsPython);
    runtime.failRemove = true;

    const result = await makeSandbox(runtime).run({ 'main.py': 'print("ok")\n' }, ['python3', 'main.py'], 5000);
    expect(result.stdout).toBe('ok\n');
    expect(readdirSync(root)).toEqual([]);
  });

  it('raises ImageBuildError without creating an instance when the build fails', async () => {
    const runtime = new FakeRuntime();
    runtime.buildFailures = 1;

    await expect(makeSandbox(runtime).run({ 'main.py': '' }, ['python3', 'main.py'], 5000))
      .rejects.toBeInstanceOf(ImageBuildError);
    expect(runtime.instances).toHaveLength(0);
    expect(readdirSync(root)).toEqual([]);
  });

  it('rejects file paths that escape the workspace', async () => {
    const runtime = new FakeRuntime();

    await expect(makeSandbox(runtime).run({ '../evil.py': 'x' }, ['python3', 'main.py'], 5000))
      .rejects.toBeInstanceOf(WorkspaceError);
    expect(runtime.events).toEqual([]);
    expect(readdirSync(root)).toEqual([]);
  });

  it('kills the instance and cleans up when cancelled mid-run', async () => {
    const runtime = new FakeRuntime(() => ({ hang: true }));
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    await expect(makeSandbox(runtime).run({ 'main.py': '' }, ['python3', 'main.py'], 10_000, { signal: controller.signal }))
      .rejects.toBeInstanceOf(ExecutionCancelledError);
    expect(runtime.instances[0].killed).toBe(true);
    expect(runtime.instances[0].removed).toBe(true);
    expect(readdirSync(root)).toEqual([]);
  });

  it('never starts the program when cancelled during the image build', async () => {
    const runtime = new FakeRuntime(() => ({ stdout: 'ok\n', exitCode: 0 }));
    const gate = deferred();
    runtime.buildGate = gate.promise;
    const controller = new AbortController();

    const running = makeSandbox(runtime).run({ 'main.py': '' }, ['python3', 'main.py'], 5000, { signal: controller.signal });
    await vi.waitFor(() => expect(runtime.buildCalls).toBe(1));
    controller.abort();
    gate.resolve();

    await expect(running).rejects.toBeInstanceOf(ExecutionCancelledError);
    expect(runtime.events).toEqual(['build:codeloop-test']);
    expect(runtime.instances).toHaveLength(0);
    expect(readdirSync(root)).toEqual([]);
  });

  it('does nothing when the signal is already aborted', async () => {
    const runtime = new FakeRuntime();
    const controller = new AbortController();
    controller.abort();

    await expect(makeSandbox(runtime).run({ 'main.py': '' }, ['python3', 'main.py'], 5000, { signal: controller.signal }))
      .rejects.toBeInstanceOf(ExecutionCancelledError);
    expect(runtime.events).toEqual([]);
    expect(readdirSync(root)).toEqual([]);
  });

  it('gives concurrent runs separate workspaces and instances', async () => {
    const runtime = new FakeRuntime(() => ({ stdout: 'x', exitCode: 0, delayMs: 20 }));
    const sandbox = makeSandbox(runtime);

    await Promise.all([1, 2, 3].map(() => sandbox.run({ 'main.py': '' }, ['python3', 'main.py'], 5000)));

    const paths = new Set(runtime.instances.map(i => i.spec.workspacePath));
    expect(paths.size).toBe(3);
    expect(runtime.buildCalls).toBe(1);
    expect(readdirSync(root)).toEqual([]);
  });
});
