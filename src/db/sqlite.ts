import sqlite3 from "sqlite3";
import path from "node:path";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { AsyncLocalStorage } from "node:async_hooks";
import { logger } from "../logger.js";

let db: sqlite3.Database | null = null;

// One connection: writes and transactions take turns on this queue.
let writeQueue: Promise<void> = Promise.resolve();
const inTransaction = new AsyncLocalStorage<true>();

function enqueue<T>(task: () => Promise<T>): Promise<T> {
  const result = writeQueue.then(task);
  writeQueue = result.then(
    () => undefined,
    () => undefined
  );
  return result;
}

function open(dbFile: string): Promise<sqlite3.Database> {
  return new Promise((resolve, reject) => {
    const handle: sqlite3.Database = new sqlite3.Database(dbFile, (err) =>
      err ? reject(err) : resolve(handle)
    );
  });
}

export async function initDb(dbFile: string): Promise<sqlite3.Database> {
  if (dbFile !== ":memory:") {
    const dir = path.dirname(dbFile);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  db = await open(dbFile);

  await exec("PRAGMA foreign_keys = ON;");
  if (dbFile !== ":memory:") await exec("PRAGMA journal_mode = WAL;");

  const exists = await tableExists("cards");
  if (!exists) {
    const schemaPath = locateSchemaPath();
    await exec(fs.readFileSync(schemaPath, "utf8"));
    logger.info(`Applied schema from ${schemaPath}`);
  } else {
    logger.info(`SQLite ready at ${dbFile} (schema already present)`);
  }

  return db;
}

export function getDb(): sqlite3.Database {
  if (!db) throw new Error("DB not initialized");
  return db;
}

export function closeDb(): Promise<void> {
  const handle = db;
  db = null;
  if (!handle) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    handle.close((err) => (err ? reject(err) : resolve()));
  });
}

export function exec(sql: string): Promise<void> {
  const handle = getDb();
  return new Promise<void>((resolve, reject) => {
    handle.exec(sql, (err) => (err ? reject(err) : resolve()));
  });
}

export function run(
  sql: string,
  params: readonly unknown[] = []
): Promise<{ lastID: number; changes: number }> {
  if (inTransaction.getStore()) return runNow(sql, params);
  return enqueue(() => runNow(sql, params));
}

function runNow(
  sql: string,
  params: readonly unknown[]
): Promise<{ lastID: number; changes: number }> {
  const handle = getDb();
  return new Promise((resolve, reject) => {
    handle.run(
      sql,
      params,
      function (this: sqlite3.RunResult, err: Error | null): void {
        if (err) {
          reject(err);
          return;
        }
        resolve({ lastID: this.lastID, changes: this.changes });
      }
    );
  });
}

export function get<T>(
  sql: string,
  params: readonly unknown[] = []
): Promise<T | undefined> {
  const handle = getDb();
  return new Promise<T | undefined>((resolve, reject) => {
    handle.get(sql, params, (err: Error | null, row: T | undefined) =>
      err ? reject(err) : resolve(row)
    );
  });
}

export function all<T>(sql: string, params: readonly unknown[] = []): Promise<T[]> {
  const handle = getDb();
  return new Promise<T[]>((resolve, reject) => {
    handle.all(sql, params, (err: Error | null, rows: T[]) =>
      err ? reject(err) : resolve(rows)
    );
  });
}

/**
 * Run `work` inside BEGIN/COMMIT, rolling back when it throws.
 * Concurrent callers wait their turn; a nested call joins the outer transaction.
 */
export function transaction<T>(work: () => Promise<T>): Promise<T> {
  if (inTransaction.getStore()) return work();
  return enqueue(() =>
    inTransaction.run(true, async () => {
      await runNow("BEGIN", []);
      try {
        const result = await work();
        await runNow("COMMIT", []);
        return result;
      } catch (e) {
        await runNow("ROLLBACK", []);
        throw e;
      }
    })
  );
}

async function tableExists(name: string): Promise<boolean> {
  const row = await get<{ name: string }>(
    `SELECT name FROM sqlite_master WHERE type='table' AND name=? LIMIT 1`,
    [name]
  );
  return !!row;
}

function locateSchemaPath(): string {
  // Prefer the file beside this module (src/db in dev, dist/db when copied)
  const here = path.dirname(fileURLToPath(import.meta.url));
  const besideModule = path.resolve(here, "schema.sql");
  if (fs.existsSync(besideModule)) return besideModule;

  const devCandidate = path.resolve(process.cwd(), "src", "db", "schema.sql");
  if (fs.existsSync(devCandidate)) return devCandidate;

  throw new Error("schema.sql not found in dist/db or src/db");
}
