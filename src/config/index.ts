import { z } from 'zod';
import { join } from 'path';
import { homedir } from 'os';
import { DEFAULT_IMAGE_TAG, DEFAULT_RECIPE_DIR } from '../sandbox/recipe.js';

const ConfigSchema = z.object({
  home: z.string().default(join(homedir(), '.codeloop')),
  llm: z.object({
    provider: z.enum(['openai', 'anthropic', 'ollama']).default('openai'),
    model: z.string().default('gpt-4o'),
    apiKey: z.string().default(''),
    baseUrl: z.string().url().optional(),
  }),
  sandbox: z.object({
    image: z.string().min(1).default(DEFAULT_IMAGE_TAG),
    recipeDir: z.string().default(DEFAULT_RECIPE_DIR),
    command: z.array(z.string()).nonempty().default(['python3', 'main.py']),
    timeoutMs: z.number().int().positive().default(30_000),
    outputCapBytes: z.number().int().positive().default(64 * 1024),
    memory: z.string().regex(/^\d+[gmk]?$/i).default('512m'),
    cpus: z.number().positive().default(1),
    pidsLimit: z.number().int().positive().default(256),
  }),
  agent: z.object({
    maxAttempts: z.number().int().positive().default(5),
    generationRetries: z.number().int().nonnegative().default(2),
    infraRetries: z.number().int().nonnegative().default(2),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SandboxSettings = Config['sandbox'];
export type AgentSettings = Config['agent'];

type Env = Record<string, string | undefined>;

/** Accepts a JSON array (`["bash","-c","..."]`) or a whitespace-separated command line. */
export function parseCommand(raw: string | undefined): string[] | undefined {
  if (!raw || !raw.trim()) return undefined;
  const trimmed = raw.trim();
  if (trimmed.startsWith('[')) {
    return z.array(z.string()).parse(JSON.parse(trimmed));
  }
  return trimmed.split(/\s+/);
}

function num(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

export function loadConfig(env: Env = process.env): Config {
  return ConfigSchema.parse({
    home: env.CODELOOP_HOME || undefined,
    llm: {
      provider: env.LLM_PROVIDER || undefined,
      model: env.LLM_MODEL || undefined,
      apiKey: env.LLM_API_KEY || undefined,
      baseUrl: env.LLM_BASE_URL || undefined,
    },
    sandbox: {
      image: env.CODELOOP_IMAGE || undefined,
      recipeDir: env.CODELOOP_IMAGE_RECIPE || undefined,
      command: parseCommand(env.CODELOOP_COMMAND),
      timeoutMs: num(env.CODELOOP_TIMEOUT_MS),
      outputCapBytes: num(env.CODELOOP_OUTPUT_CAP),
      memory: env.CODELOOP_MEMORY || undefined,
      cpus: num(env.CODELOOP_CPUS),
      pidsLimit: num(env.CODELOOP_PIDS_LIMIT),
    },
    agent: {
      maxAttempts: num(env.CODELOOP_MAX_ATTEMPTS),
      generationRetries: num(env.CODELOOP_GENERATION_RETRIES),
      infraRetries: num(env.CODELOOP_INFRA_RETRIES),
    },
  });
}
