import initSqlJs, { type Database as SqlJsDatabase } from "sql.js";
import fs from "fs";
import path from "path";
import type { SnapshotEntry, SnapshotStorage } from "./types.js";

/**
 * SQLite-backed snapshot storage.
 * Runs on sql.js (WASM). Without a `dbPath` the
 * database lives only in memory.
 */
export class SqliteSnapshotStorage implements SnapshotStorage {
  private db: SqlJsDatabase | null = null;
  private readonly dbPath?: string;

  constructor(dbPath?: string) {
    this.dbPath = dbPath;
  }

  /**
   * Open (or create) the database. Must be called before any operations.
   */
  async init(): Promise<void> {
    if (this.db) return;

    const SQL = await initSqlJs();

    if (this.dbPath && fs.existsSync(this.dbPath)) {
      this.db = new SQL.Database(fs.readFileSync(this.dbPath));
    } else {
      if (this.dbPath) fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      this.db = new SQL.Database();
    }

    this.db.run(`
      CREATE TABLE IF NOT EXISTS snapshots (
        sequence INTEGER PRIMARY KEY,
        created_at TEXT NOT NULL,
        blob TEXT NOT NULL
      )
    `);
  }

  async write(sequence: number, blob: string, takenAt: string = new Date().toISOString()): Promise<void> {
    const db = this.requireDb();
    db.run(`INSERT OR REPLACE INTO snapshots (sequence, created_at, blob) VALUES (?, ?, ?)`, [sequence, takenAt, blob]);
    this.persist();
  }

  async read(sequence: number): Promise<string | null> {
    const stmt = this.requireDb().prepare(`SELECT blob FROM snapshots WHERE sequence = ?`);
    try {
      stmt.bind([sequence]);
      if (!stmt.step()) return null;
      const value = stmt.get()[0];
      return typeof value === "string" ? value : null;
    } finally {
      stmt.free();
    }
  }

  async list(): Promise<SnapshotEntry[]> {
    const stmt = this.requireDb().prepare(`SELECT sequence, created_at FROM snapshots ORDER BY sequence ASC`);
    const entries: SnapshotEntry[] = [];
    try {
      while (stmt.step()) {
        const [sequence, createdAt] = stmt.get();
        if (typeof sequence === "number" && typeof createdAt === "string") {
          entries.push({ sequence, createdAt });
        }
      }
    } finally {
      stmt.free();
    }
    return entries;
  }

  async remove(sequence: number): Promise<void> {
    this.requireDb().run(`DELETE FROM snapshots WHERE sequence = ?`, [sequence]);
    this.persist();
  }

  /**
   * Close the database connection.
   */
  close(): void {
    if (!this.db) return;
    this.persist();
    this.db.close();
    this.db = null;
  }

  /** Persist the in-memory database to disk. */
  private persist(): void {
    if (!this.dbPath || !this.db) return;
    fs.writeFileSync(this.dbPath, Buffer.from(this.db.export()));
  }

  private requireDb(): SqlJsDatabase {
    if (!this.db) throw new Error("SqliteSnapshotStorage used before init()");
    return this.db;
  }
}

const FILE_PATTERN = /^snapshot_(\d{10})\.json$/;

/** One JSON file per snapshot under a directory, like a backup folder. */
export class DirectorySnapshotStorage implements SnapshotStorage {
  constructor(private readonly dir: string) {}

  async write(sequence: number, blob: string, takenAt?: string): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    const target = this.fileFor(sequence);
    const tmp = `${target}.tmp`;
    await fs.promises.writeFile(tmp, blob, "utf-8");
    await fs.promises.rename(tmp, target);
    if (takenAt) {
      const time = new Date(takenAt);
      await fs.promises.utimes(target, time, time);
    }
  }

  async read(sequence: number): Promise<string | null> {
    try {
      return await fs.promises.readFile(this.fileFor(sequence), "utf-8");
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  async list(): Promise<SnapshotEntry[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.dir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }

    const entries: SnapshotEntry[] = [];
    for (const name of names) {
      const match = FILE_PATTERN.exec(name);
      if (!match) continue;
      const stat = await fs.promises.stat(path.join(this.dir, name));
      entries.push({ sequence: Number(match[1]), createdAt: stat.mtime.toISOString() });
    }
    return entries.sort((a, b) => a.sequence - b.sequence);
  }

  async remove(sequence: number): Promise<void> {
    await fs.promises.rm(this.fileFor(sequence), { force: true });
  }

  private fileFor(sequence: number): string {
    return path.join(this.dir, `snapshot_${String(sequence).padStart(10, "0")}.json`);
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
