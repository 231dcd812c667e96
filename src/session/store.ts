import { readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { describeError } from '../errors.js';
import { createLogger } from '../log.js';
import type { SessionSnapshot } from '../types/shared.js';

const log = createLogger('STORE');

/** Keeps the latest snapshot of every session in one JSON file. */
export class SessionStore {
  private sessions: Map<string, SessionSnapshot> = new Map();
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.load();
  }

  private load(): void {
    let data: string;
    try {
      data = readFileSync(this.filePath, 'utf-8');
    } catch {
      // File doesn't exist yet, start empty
      return;
    }
    let arr: SessionSnapshot[];
    try {
      arr = JSON.parse(data);
    } catch (e) {
      log.warn(`Ignoring unreadable session file ${this.filePath}`, describeError(e));
      return;
    }
    if (!Array.isArray(arr)) {
      log.warn(`Ignoring session file ${this.filePath}: expected a JSON array`);
      return;
    }
    for (const s of arr) this.sessions.set(s.id, s);
  }

  private persist(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify([...this.sessions.values()], null, 2));
  }

  save(snapshot: SessionSnapshot): void {
    this.sessions.set(snapshot.id, snapshot);
    this.persist();
  }

  get(id: string): SessionSnapshot | undefined {
    return this.sessions.get(id);
  }

  list(): SessionSnapshot[] {
    return [...this.sessions.values()];
  }
}
