import { z } from 'zod';
import { resolve } from 'path';
import { GenerationError, describeError } from '../errors.js';
import { createLogger } from '../log.js';
import { MOUNT_PATH } from '../sandbox/sandbox.js';
import { pathViolation } from '../sandbox/workspace.js';
import type { LLMAdapter } from '../llm/types.js';
import type { GeneratedProgram, Message, ProgramFiles } from '../types/shared.js';
import { SYSTEM_PROMPT, buildGenerationPrompt } from './prompts.js';
import type { CodeGenerator, GenerationRequest } from './types.js';

const log = createLogger('GENERATOR');

const GeneratedFilesSchema = z.object({
  files: z.array(z.object({
    relative_path: z.string().min(1),
    content: z.string(),
  })).min(1),
});

/** Pulls the JSON object out of a reply that may be wrapped in markdown fences or prose. */
export function extractJson(text: string): string {
  const fenced = text.match(/```(?:json)?\s*\n([\s\S]*?)\n?```/);
  if (fenced) return fenced[1].trim();
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) return text.slice(start, end + 1);
  return text.trim();
}

export function parseGeneratedFiles(text: string): ProgramFiles {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJson(text));
  } catch (e) {
    throw new GenerationError('Model reply was not valid JSON', { cause: e });
  }
  const parsed = GeneratedFilesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GenerationError(`Model reply did not match the file schema: ${parsed.error.message}`);
  }
  // a path the workspace would refuse is the model's mistake, not the sandbox's
  const root = resolve(MOUNT_PATH);
  const files: ProgramFiles = {};
  for (const f of parsed.data.files) {
    const violation = pathViolation(root, f.relative_path);
    if (violation) throw new GenerationError(`Model reply has an unusable file path. ${violation}`);
    files[f.relative_path] = f.content;
  }
  return files;
}

export class LlmCodeGenerator implements CodeGenerator {
  constructor(private llm: LLMAdapter) {}

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedProgram> {
    const messages: Message[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildGenerationPrompt(request) },
    ];
    log.debug(`Sending ${request.priorFeedback === null ? 'initial' : 'refinement'} prompt to ${this.llm.provider}`, messages[1].content);

    let text = '';
    try {
      for await (const event of this.llm.chat(messages, { signal })) {
        if (event.type === 'text_delta') {
          text += event.content;
        } else if (event.type === 'error') {
          throw new GenerationError(event.error);
        } else if (event.type === 'done' && event.usage) {
          log.debug(`Usage: ${JSON.stringify(event.usage)}`);
        }
      }
    } catch (e) {
      if (e instanceof GenerationError) throw e;
      throw new GenerationError(`LLM call failed: ${describeError(e)}`, { cause: e });
    }

    const files = parseGeneratedFiles(text);
    log.info(`Received ${Object.keys(files).length} file(s) from ${this.llm.provider}`);
    return { files };
  }
}
