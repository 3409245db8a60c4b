/**
 * @fileoverview Durable record store on SQLite.
 *
 * One database file holds three tables: `memories` (append-only records with
 * access bookkeeping), `user_preferences` (keyed, upserted) and `facts`.
 * Tags and metadata are JSON columns. The schema is created by numbered
 * migrations, each applied in its own transaction.
 *
 * @module mnemos/memory/backends/sqlite-store
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { UniqueId } from '../../types/core.types.js';
import { createTimestamp, createUniqueId } from '../../types/core.types.js';
import { MemoryTypeSchema } from '../../types/memory.types.js';
import type {
  Fact,
  FactDraft,
  MemoryDraft,
  MemoryRecord,
  MemoryType,
  Preference,
} from '../../types/memory.types.js';
import type { RecordStore } from './types.js';

// ============ Schema ============

export interface Migration {
  readonly version: number;
  readonly name: string;
  up(db: Database.Database): void;
}

export const MIGRATIONS: ReadonlyArray<Migration> = [
  {
    version: 1,
    name: 'initial-schema',
    up(db) {
      db.exec(`
        CREATE TABLE memories (
          id            INTEGER PRIMARY KEY AUTOINCREMENT,
          content       TEXT    NOT NULL,
          memory_type   TEXT    NOT NULL,
          importance    REAL    NOT NULL,
          tags          TEXT    NOT NULL DEFAULT '[]',
          created_at    INTEGER NOT NULL,
          last_accessed INTEGER NOT NULL,
          access_count  INTEGER NOT NULL DEFAULT 0,
          metadata      TEXT    NOT NULL DEFAULT '{}'
        );
        CREATE INDEX idx_memories_type ON memories(memory_type);

        CREATE TABLE user_preferences (
          key        TEXT PRIMARY KEY,
          value      TEXT    NOT NULL,
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );
      `);
    },
  },
  {
    version: 2,
    name: 'facts',
    up(db) {
      db.exec(`
        CREATE TABLE facts (
          id         INTEGER PRIMARY KEY AUTOINCREMENT,
          content    TEXT    NOT NULL,
          category   TEXT,
          confidence REAL    NOT NULL,
          source     TEXT,
          created_at INTEGER NOT NULL,
          verified   INTEGER NOT NULL DEFAULT 0
        );
        CREATE INDEX idx_facts_category ON facts(category);
      `);
    },
  },
];

/**
 * Applies every migration newer than the recorded schema version.
 */
export function runMigrations(
  db: Database.Database,
  migrations: ReadonlyArray<Migration> = MIGRATIONS,
): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);

  const current = getSchemaVersion(db);
  const record = db.prepare<[number, string, number]>(
    'INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)',
  );

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (migration.version <= current) continue;

    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name, Date.now());
    })();
  }
}

export function getSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { v: number }>('SELECT COALESCE(MAX(version), 0) AS v FROM _migrations')
    .get();
  return row?.v ?? 0;
}

// ============ Rows ============

interface MemoryRow {
  id: number;
  content: string;
  memory_type: string;
  importance: number;
  tags: string;
  created_at: number;
  last_accessed: number;
  access_count: number;
  metadata: string;
}

interface PreferenceRow {
  key: string;
  value: string;
  created_at: number;
  updated_at: number;
}

interface FactRow {
  id: number;
  content: string;
  category: string | null;
  confidence: number;
  source: string | null;
  created_at: number;
  verified: number;
}

const TagsColumn = z.array(z.string()).catch([]);
const MetadataColumn = z.record(z.unknown()).catch({});
const MemoryTypeColumn = MemoryTypeSchema.catch('fact');

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function toRecord(row: MemoryRow): MemoryRecord {
  return {
    id: createUniqueId(String(row.id)),
    content: row.content,
    memoryType: MemoryTypeColumn.parse(row.memory_type),
    importance: row.importance,
    tags: TagsColumn.parse(parseJson(row.tags)),
    createdAt: createTimestamp(row.created_at),
    lastAccessed: createTimestamp(row.last_accessed),
    accessCount: row.access_count,
    metadata: MetadataColumn.parse(parseJson(row.metadata)),
  };
}

function toPreference(row: PreferenceRow): Preference {
  return {
    key: row.key,
    value: row.value,
    createdAt: createTimestamp(row.created_at),
    updatedAt: createTimestamp(row.updated_at),
  };
}

function toFact(row: FactRow): Fact {
  return {
    id: createUniqueId(String(row.id)),
    content: row.content,
    category: row.category,
    confidence: row.confidence,
    source: row.source,
    createdAt: createTimestamp(row.created_at),
    verified: row.verified !== 0,
  };
}

/** Row ids are integers; anything else cannot name a row. */
function rowId(id: UniqueId): number | null {
  const n = Number(id);
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}

function prepareStatements(db: Database.Database) {
  return {
    insertMemory: db.prepare<[string, string, number, string, number, number, string]>(
      `INSERT INTO memories (content, memory_type, importance, tags, created_at, last_accessed, metadata)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    ),
    getMemory: db.prepare<[number], MemoryRow>('SELECT * FROM memories WHERE id = ?'),
    listMemories: db.prepare<[], MemoryRow>('SELECT * FROM memories ORDER BY id ASC'),
    touchMemory: db.prepare<[number, number]>(
      'UPDATE memories SET last_accessed = ?, access_count = access_count + 1 WHERE id = ?',
    ),
    upsertPreference: db.prepare<[string, string, number, number]>(
      `INSERT INTO user_preferences (key, value, created_at, updated_at) VALUES (?, ?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
    ),
    getPreference: db.prepare<[string], PreferenceRow>(
      'SELECT key, value, created_at, updated_at FROM user_preferences WHERE key = ?',
    ),
    insertFact: db.prepare<[string, string | null, number, string | null, number]>(
      'INSERT INTO facts (content, category, confidence, source, created_at) VALUES (?, ?, ?, ?, ?)',
    ),
    getFact: db.prepare<[number], FactRow>('SELECT * FROM facts WHERE id = ?'),
    factsByCategory: db.prepare<[string], FactRow>(
      'SELECT * FROM facts WHERE category = ? ORDER BY confidence DESC, id ASC',
    ),
    countByType: db.prepare<[], { memory_type: string; count: number }>(
      'SELECT memory_type, COUNT(*) AS count FROM memories GROUP BY memory_type',
    ),
    countPreferences: db.prepare<[], { count: number }>(
      'SELECT COUNT(*) AS count FROM user_preferences',
    ),
    countFacts: db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM facts'),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

// ============ Store ============

export class SqliteRecordStore implements RecordStore {
  readonly name = 'sqlite';

  private readonly statements: Statements;

  constructor(private readonly db: Database.Database) {
    runMigrations(db);

    this.statements = prepareStatements(db);
  }

  async insert(draft: MemoryDraft): Promise<MemoryRecord> {
    const now = Date.now();
    const info = this.statements.insertMemory.run(
      draft.content,
      draft.memoryType,
      draft.importance,
      JSON.stringify(draft.tags),
      now,
      now,
      JSON.stringify(draft.metadata),
    );

    return {
      id: createUniqueId(String(info.lastInsertRowid)),
      content: draft.content,
      memoryType: draft.memoryType,
      importance: draft.importance,
      tags: [...draft.tags],
      createdAt: createTimestamp(now),
      lastAccessed: createTimestamp(now),
      accessCount: 0,
      metadata: { ...draft.metadata },
    };
  }

  async get(id: UniqueId): Promise<MemoryRecord | null> {
    const n = rowId(id);
    if (n === null) return null;
    const row = this.statements.getMemory.get(n);
    return row ? toRecord(row) : null;
  }

  async list(): Promise<MemoryRecord[]> {
    return this.statements.listMemories.all().map(toRecord);
  }

  async getMany(ids: ReadonlyArray<UniqueId>): Promise<MemoryRecord[]> {
    const found: MemoryRecord[] = [];
    for (const id of ids) {
      const record = await this.get(id);
      if (record) found.push(record);
    }
    return found;
  }

  async touch(id: UniqueId): Promise<void> {
    const n = rowId(id);
    if (n !== null) {
      this.statements.touchMemory.run(Date.now(), n);
    }
  }

  async upsertPreference(key: string, value: string): Promise<Preference> {
    const now = Date.now();
    this.statements.upsertPreference.run(key, value, now, now);
    const row = this.statements.getPreference.get(key);
    if (!row) {
      throw new Error(`Preference '${key}' missing after upsert`);
    }
    return toPreference(row);
  }

  async getPreference(key: string): Promise<Preference | null> {
    const row = this.statements.getPreference.get(key);
    return row ? toPreference(row) : null;
  }

  async insertFact(draft: FactDraft): Promise<Fact> {
    const info = this.statements.insertFact.run(
      draft.content,
      draft.category,
      draft.confidence,
      draft.source,
      Date.now(),
    );
    const row = this.statements.getFact.get(Number(info.lastInsertRowid));
    if (!row) {
      throw new Error('Fact missing after insert');
    }
    return toFact(row);
  }

  async factsByCategory(category: string): Promise<Fact[]> {
    return this.statements.factsByCategory.all(category).map(toFact);
  }

  async countByType(): Promise<Partial<Record<MemoryType, number>>> {
    const counts: Partial<Record<MemoryType, number>> = {};
    for (const row of this.statements.countByType.all()) {
      const type = MemoryTypeColumn.parse(row.memory_type);
      counts[type] = (counts[type] ?? 0) + row.count;
    }
    return counts;
  }

  async countPreferences(): Promise<number> {
    return this.statements.countPreferences.get()?.count ?? 0;
  }

  async countFacts(): Promise<number> {
    return this.statements.countFacts.get()?.count ?? 0;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

// ============ Opening ============

export interface SqliteStoreOptions {
  /** Database file, or `':memory:'` for a private in-memory database */
  readonly path: string;
}

function applyPragmas(db: Database.Database, inMemory: boolean): void {
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  db.pragma('temp_store = MEMORY');
}

/**
 * Opens (creating if needed) a SQLite database and wraps it in a store.
 * The parent directory of a file path is created when missing.
 */
export function openSqliteStore(options: SqliteStoreOptions): SqliteRecordStore {
  const inMemory = options.path === ':memory:';

  if (!inMemory) {
    fs.mkdirSync(path.dirname(options.path), { recursive: true });
  }

  const db = new Database(options.path);
  applyPragmas(db, inMemory);
  return new SqliteRecordStore(db);
}
