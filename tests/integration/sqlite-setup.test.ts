import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { DatabaseManager, SCHEMA_VERSION } from '../../src/infrastructure/sqlite/DatabaseManager.js';

const nameRows = z.array(z.object({ name: z.string() }));

describe('DatabaseManager', () => {
  const tmpDir = path.join(os.tmpdir(), `zoom-connector-test-${Date.now()}`);
  const dbPath = path.join(tmpDir, 'state', 'connector.db');

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should create the state directory with WAL mode and all tables', () => {
    const mgr = new DatabaseManager(dbPath);
    const db = mgr.getDb();

    expect(fs.existsSync(dbPath)).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');

    const tables = nameRows.parse(db.prepare(
      "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name"
    ).all()).map((r) => r.name);
    expect(tables).toEqual(['checkpoints', 'document_keys', 'schema_meta', 'secrets']);

    expect(db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").pluck().get()).toBe(SCHEMA_VERSION);
    mgr.close();
  });

  it('should set busy_timeout', () => {
    const mgr = new DatabaseManager(dbPath);
    const timeout = mgr.getDb().pragma('busy_timeout', { simple: true });
    expect(Number(timeout)).toBeGreaterThanOrEqual(5000);
    mgr.close();
  });

  it('should reopen an existing database', () => {
    new DatabaseManager(dbPath).close();
    const mgr = new DatabaseManager(dbPath);
    expect(mgr.getDb().prepare('SELECT COUNT(*) FROM document_keys').pluck().get()).toBe(0);
    mgr.close();
  });
});
