#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import { join } from 'path';
import { homedir } from 'os';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { loadConfig, parseCommand, type Config } from '../config/index.js';
import { describeError } from '../errors.js';
import { createLLMAdapter } from '../llm/factory.js';
import { LlmCodeGenerator } from '../generator/llm-generator.js';
import { Orchestrator } from '../orchestrator/orchestrator.js';
import { createTask } from '../orchestrator/task.js';
import { DockerRuntime } from '../sandbox/docker.js';
import { ImageCache } from '../sandbox/image-cache.js';
import { imageDescriptor } from '../sandbox/recipe.js';
import { Sandbox } from '../sandbox/sandbox.js';
import { SessionStore } from '../session/store.js';
import { writeAttemptArtifacts, writeSessionSummary } from '../session/artifacts.js';
import { EXIT_FAILURE, EXIT_SUCCESS, type SessionSnapshot, type SuccessCriterion } from '../types/shared.js';

export interface RunCommandOptions {
  command?: string;
  timeout?: number;
  maxAttempts?: number;
  expect?: string;
  expectPattern?: string;
  image?: string;
  constraint?: string[];
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function criterionFromOptions(opts: RunCommandOptions): SuccessCriterion {
  if (opts.expect !== undefined && opts.expectPattern !== undefined) {
    throw new InvalidArgumentError('Use either --expect or --expect-pattern, not both.');
  }
  if (opts.expect !== undefined) return { kind: 'stdout-equals', value: opts.expect };
  if (opts.expectPattern !== undefined) return { kind: 'stdout-matches', pattern: opts.expectPattern };
  return { kind: 'exit-zero' };
}

export function formatSummary(session: SessionSnapshot): string {
  const lines = [
    `Session:  ${session.id}`,
    `Verdict:  ${session.verdict ?? 'unfinished'}${session.reason ? ` (${session.reason})` : ''}`,
    `Attempts: ${session.attempts.length}/${session.maxAttempts}`,
  ];
  if (session.error) lines.push(`Error:    ${session.error}`);
  if (session.verdict !== 'succeeded' && session.lastFeedback) {
    lines.push('', 'Last feedback:', session.lastFeedback);
  }
  return lines.join('\n');
}

function storeFor(cfg: Config): SessionStore {
  return new SessionStore(join(cfg.home, 'sessions.json'));
}

async function runTask(objectiveParts: string[], opts: RunCommandOptions): Promise<number> {
  const cfg = loadConfig();
  const settings = opts.image ? { ...cfg.sandbox, image: opts.image } : cfg.sandbox;
  const store = storeFor(cfg);

  const task = createTask({
    objective: objectiveParts.join(' '),
    constraints: opts.constraint ?? [],
    command: parseCommand(opts.command),
    timeoutMs: opts.timeout,
    successCriterion: criterionFromOptions(opts),
  });

  const sandbox = Sandbox.fromSettings(new DockerRuntime(), settings);
  const controller = new AbortController();
  const onSigint = () => {
    console.error('\nCancelling; cleaning up the sandbox...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let runDir = '';
  const orchestrator = new Orchestrator({
    generator: new LlmCodeGenerator(createLLMAdapter(cfg.llm)),
    sandbox,
    command: settings.command,
    timeoutMs: settings.timeoutMs,
    maxAttempts: opts.maxAttempts ?? cfg.agent.maxAttempts,
    generationRetries: cfg.agent.generationRetries,
    infraRetries: cfg.agent.infraRetries,
    onAttempt: (attempt, snapshot) => {
      runDir = join(cfg.home, 'runs', snapshot.id);
      writeAttemptArtifacts(runDir, attempt);
      store.save(snapshot);
    },
  });

  try {
    const session = await orchestrator.solve(task, { signal: controller.signal });
    store.save(session);
    runDir = join(cfg.home, 'runs', session.id);
    writeSessionSummary(runDir, session);
    console.log(formatSummary(session));
    console.log(`Artifacts: ${runDir}`);
    return session.verdict === 'succeeded' ? EXIT_SUCCESS : EXIT_FAILURE;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

const program = new Command();

program
  .name('codeloop')
  .description('Generate a program, run it in a disposable Docker sandbox, and retry with feedback until it works')
  .version('0.1.0');

program
  .command('run')
  .description('Solve a task described in natural language')
  .argument('<objective...>', 'What the program should do')
  .option('--command <cmd>', 'Command to run inside the sandbox (JSON array or space-separated)')
  .option('--timeout <ms>', 'Per-execution timeout in milliseconds', positiveInt)
  .option('--max-attempts <n>', 'Maximum generate/execute attempts', positiveInt)
  .option('--expect <stdout>', 'Succeed only when stdout equals this text')
  .option('--expect-pattern <regex>', 'Succeed only when stdout matches this regular expression')
  .option('--constraint <text>', 'Extra requirement for the generated code (repeatable)', collect)
  .option('--image <tag>', 'Override the execution image tag')
  .action(async (objectiveParts: string[], opts: RunCommandOptions) => {
    process.exitCode = await runTask(objectiveParts, opts);
  });

program
  .command('build-image')
  .description('Build the execution image if it does not exist yet')
  .action(async () => {
    const cfg = loadConfig();
    const runtime = new DockerRuntime();
    const handle = await ImageCache.shared(runtime).ensure(imageDescriptor(cfg.sandbox.image, cfg.sandbox.recipeDir));
    console.log(handle.built ? `Built ${handle.tag}` : `${handle.tag} already exists`);
  });

program
  .command('status')
  .description('Show a session and its attempts')
  .argument('<id>', 'Session ID')
  .action((id: string) => {
    const session = storeFor(loadConfig()).get(id);
    if (!session) {
      console.error(`Session ${id} not found`);
      process.exitCode = EXIT_FAILURE;
      return;
    }
    console.log(formatSummary(session));
    for (const a of session.attempts) {
      console.log(`  #${a.index}  ${a.outcome.padEnd(18)}  exit=${a.result.exitStatus}  ${a.result.durationMs}ms`);
    }
  });

program
  .command('list')
  .description('List recorded sessions')
  .action(() => {
    for (const s of storeFor(loadConfig()).list()) {
      const verdict = s.verdict ?? s.state;
      console.log(`${s.id}  ${verdict.padEnd(10)}  ${s.attempts.length}/${s.maxAttempts}  ${s.task.objective.slice(0, 60)}`);
    }
  });

export { program };

function isMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMain()) {
  // Load .env from the current directory, then ~/.codeloop
  loadDotenv({ path: ['.env', join(homedir(), '.codeloop', '.env')] });
  program.parseAsync().catch((e: unknown) => {
    console.error(describeError(e));
    process.exitCode = EXIT_FAILURE;
  });
}
