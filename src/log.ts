const MAX_DATA_LINES = 20;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function formatLogLines(scope: string, message: string, data?: unknown, now = new Date()): string[] {
  const timestamp = now.toISOString().split('T')[1].split('.')[0];
  const lines = [`[${timestamp}] [${scope}] ${message}`];
  if (data !== undefined) {
    const str = typeof data === 'string' ? data : JSON.stringify(data);
    const dataLines = str.split('\n');
    for (const line of dataLines.slice(0, MAX_DATA_LINES)) lines.push(`  ${line}`);
    if (dataLines.length > MAX_DATA_LINES) {
      lines.push(`  ... (${dataLines.length - MAX_DATA_LINES} more lines)`);
    }
  }
  return lines;
}

// stdout is left to CLI output; all diagnostics go to stderr
export function createLogger(scope: string): Logger {
  const write = (level: string, message: string, data?: unknown) => {
    const prefix = level === 'INFO' ? scope : `${scope}:${level}`;
    for (const line of formatLogLines(prefix, message, data)) console.error(line);
  };
  return {
    debug(message, data) {
      if (process.env.CODELOOP_DEBUG) write('DEBUG', message, data);
    },
    info(message, data) { write('INFO', message, data); },
    warn(message, data) { write('WARN', message, data); },
    error(message, data) { write('ERROR', message, data); },
  };
}
