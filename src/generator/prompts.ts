import type { GenerationRequest } from './types.js';

export const SYSTEM_PROMPT = `You are an expert Python developer writing programs that run unattended inside an isolated Linux container.

<env>
Working directory: /app (your files are written here before the run)
Network: none; only the standard library and pytest are installed
Python: 3.12
</env>

Reply with a single JSON object and nothing else:
{"files": [{"relative_path": "main.py", "content": "..."}]}

Paths are relative to /app. Always return the complete set of files, not a diff.`;

function formatCommand(command: readonly string[]): string {
  return command.map(arg => (/\s/.test(arg) ? JSON.stringify(arg) : arg)).join(' ');
}

export function buildInitialPrompt(req: GenerationRequest): string {
  return `Write a program for the following task.

--- TASK ---
${req.prompt}
--- END TASK ---

The following command will be run from /app to execute your code:
--- COMMAND ---
${formatCommand(req.command)}
--- END COMMAND ---`;
}

export function buildRefinementPrompt(req: GenerationRequest): string {
  const previous = req.previousProgram
    ? Object.entries(req.previousProgram.files)
      .map(([path, content]) => `### ${path}\n${content}`)
      .join('\n\n')
    : '(none)';

  return `Your previous attempt at this task had problems.

--- TASK ---
${req.prompt}
--- END TASK ---

The command used for execution was:
--- COMMAND ---
${formatCommand(req.command)}
--- END COMMAND ---

You previously generated these files:
--- PREVIOUS FILES ---
${previous}
--- END PREVIOUS FILES ---

Running the command produced:
--- EXECUTION FEEDBACK ---
${req.priorFeedback ?? ''}
--- END EXECUTION FEEDBACK ---

Fix the code and return a new, complete version of all the files.`;
}

export function buildGenerationPrompt(req: GenerationRequest): string {
  return req.priorFeedback === null ? buildInitialPrompt(req) : buildRefinementPrompt(req);
}
