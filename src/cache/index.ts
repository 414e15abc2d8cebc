import path from "path";
import Database from "better-sqlite3";
import { ensureDir, resolveCacheDir } from "../platform/persistence";

type CacheRow = { value: string };

export function cacheDbPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveCacheDir(env), "cache.db");
}

/** Key-value store backed by a single SQLite table. */
export class Cache {
  readonly dbPath: string;
  private readonly db: Database.Database;

  constructor(dbPath: string = cacheDbPath()) {
    this.dbPath = dbPath;
    ensureDir(path.dirname(dbPath));
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  get(key: string): string | undefined {
    const row = this.db.prepare<[string], CacheRow>("SELECT value FROM cache WHERE key = ?").get(key);
    return row?.value;
  }

  set(key: string, value: string): void {
    this.db.prepare("INSERT OR REPLACE INTO cache (key, value) VALUES (?, ?)").run(key, value);
  }

  delete(key: string): boolean {
    return this.db.prepare("DELETE FROM cache WHERE key = ?").run(key).changes > 0;
  }

  clear(): number {
    return this.db.prepare("DELETE FROM cache").run().changes;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

export function withCache<T>(run: (cache: Cache) => T, dbPath?: string): T {
  const cache = new Cache(dbPath);
  try {
    return run(cache);
  } finally {
    cache.close();
  }
}
