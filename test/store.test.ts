import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { SessionStore } from '../src/session/store.js';
import { Session } from '../src/orchestrator/session.js';
import { createTask } from '../src/orchestrator/task.js';

describe('SessionStore', () => {
  let file: string;

  beforeEach(() => {
    file = join(mkdtempSync(join(tmpdir(), 'codeloop-store-test-')), 'nested', 'sessions.json');
  });

  it('starts empty when the file does not exist', () => {
    expect(new SessionStore(file).list()).toEqual([]);
  });

  it('starts empty when the file is corrupt', () => {
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, '[{"id": "s1", ');
    expect(new SessionStore(file).list()).toEqual([]);

    writeFileSync(file, '{"id": "s1"}');
    expect(new SessionStore(file).list()).toEqual([]);
  });

  it('persists snapshots across instances', () => {
    const snapshot = new Session('s1', createTask({ objective: 'Print ok' }), 3).snapshot();
    new SessionStore(file).save(snapshot);

    const reopened = new SessionStore(file);
    expect(reopened.get('s1')).toEqual(snapshot);
    expect(reopened.get('missing')).toBeUndefined();
  });

  it('keeps only the latest snapshot of a session', () => {
    const store = new SessionStore(file);
    const session = new Session('s1', createTask({ objective: 'Print ok' }), 3);
    store.save(session.snapshot());
    session.transition('generating');
    store.save(session.snapshot());

    expect(store.list()).toHaveLength(1);
    expect(store.get('s1')?.state).toBe('generating');
    expect(JSON.parse(readFileSync(file, 'utf-8'))).toHaveLength(1);
  });
});
