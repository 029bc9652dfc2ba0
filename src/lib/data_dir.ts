import fs from "node:fs";
import path from "node:path";

export const DATABASE_FILE = "domesday.sqlite";

/**
 * DATA_DIR holds the SQLite file when no database path is given.
 * - default: "data"
 * - tests:   a temp dir, or ":memory:" databases
 */
export function resolveDataDir(): string {
  const raw = (process.env.DATA_DIR ?? "").trim();
  return raw.length > 0 ? raw : "data";
}

export function ensureDataDir(dir: string = resolveDataDir()): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function defaultDatabasePath(): string {
  return path.join(resolveDataDir(), DATABASE_FILE);
}

/** Create the parent directory of a file-backed database. */
export function prepareDatabasePath(location: string): string {
  if (location !== ":memory:") ensureDataDir(path.dirname(location));
  return location;
}
