import path from "node:path";
import fs from "node:fs";
import initSqlJs from "sql.js";
import type { BindParams, Database as SqlJsRawDatabase, SqlValue } from "sql.js";

const SQL = await initSqlJs();

export const SCHEMA_VERSION = 1;
export const DB_FILE_NAME = "images.db";

export class SchemaMismatchError extends Error {
  constructor(
    public readonly found: number,
    public readonly expected: number
  ) {
    super(
      `Database schema version mismatch: found v${found}, expected v${expected}. Delete the output directory and extract again.`
    );
    this.name = "SchemaMismatchError";
  }
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (version INTEGER NOT NULL);

CREATE TABLE IF NOT EXISTS analysis (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  data TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS images (
  file_name TEXT PRIMARY KEY,
  page_index INTEGER NOT NULL,
  index_in_page INTEGER NOT NULL,
  width INTEGER NOT NULL,
  height INTEGER NOT NULL,
  format TEXT NOT NULL CHECK (format IN ('png', 'jpeg', 'webp')),
  size_bytes INTEGER NOT NULL,
  content_hash TEXT NOT NULL,
  bbox TEXT NOT NULL,
  extraction_method TEXT NOT NULL CHECK (extraction_method IN (
    'page_render', 'object_extraction', 'backup_page_render', 'backup_object_extraction'
  ))
);

CREATE INDEX IF NOT EXISTS images_page ON images (page_index, index_in_page);
`;

export type Row = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// sql.js wrapper: prepare/run/get/all over an in-memory database that is
// written back to disk after every change
// ---------------------------------------------------------------------------

export class SqlJsDatabase {
  private db: SqlJsRawDatabase;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
    if (fs.existsSync(dbPath)) {
      const buffer = fs.readFileSync(dbPath);
      this.db = new SQL.Database(buffer);
    } else {
      this.db = new SQL.Database();
    }
  }

  prepare(sql: string) {
    const self = this;
    return {
      run(...params: SqlValue[]) {
        self.db.run(sql, params);
        const changes = self.db.getRowsModified();
        self.persist();
        return { changes };
      },
      get(...params: SqlValue[]): Row | undefined {
        return self.query(sql, params, 1)[0];
      },
      all(...params: SqlValue[]): Row[] {
        return self.query(sql, params);
      },
    };
  }

  exec(sql: string): void {
    this.db.exec(sql);
    this.persist();
  }

  close(): void {
    this.persist();
    this.db.close();
  }

  private query(sql: string, params: BindParams, limit = Infinity): Row[] {
    const stmt = this.db.prepare(sql);
    try {
      if (Array.isArray(params) && params.length > 0) {
        stmt.bind(params);
      }
      const rows: Row[] = [];
      while (rows.length < limit && stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  private persist(): void {
    const data = this.db.export();
    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.dbPath, Buffer.from(data));
  }
}

// ---------------------------------------------------------------------------
// Connection pool, one database per output directory
// ---------------------------------------------------------------------------

const connections = new Map<string, SqlJsDatabase>();

export function getDb(outputDir: string): SqlJsDatabase {
  const key = path.resolve(outputDir);
  const existing = connections.get(key);
  if (existing) return existing;

  const db = new SqlJsDatabase(path.join(key, DB_FILE_NAME));
  initSchema(db);
  connections.set(key, db);
  return db;
}

function initSchema(db: SqlJsDatabase): void {
  const hasVersionTable = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
    .get();

  if (!hasVersionTable) {
    // Fresh DB: create everything
    db.exec(SCHEMA_SQL);
    db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);
    return;
  }

  // Existing DB: version must match exactly
  const row = db.prepare("SELECT version FROM schema_version LIMIT 1").get();
  const existing = typeof row?.version === "number" ? row.version : 0;

  if (existing !== SCHEMA_VERSION) {
    db.close();
    throw new SchemaMismatchError(existing, SCHEMA_VERSION);
  }
}

export function closeDb(outputDir: string): void {
  const key = path.resolve(outputDir);
  const db = connections.get(key);
  if (db) {
    db.close();
    connections.delete(key);
  }
}

export function closeAllDbs(): void {
  for (const [key, db] of connections) {
    db.close();
    connections.delete(key);
  }
}
