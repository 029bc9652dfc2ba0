import "dotenv/config";
import { defaultDatabasePath } from "./lib/data_dir.js";

export type AppConfig = {
  // SQLite file the loader writes to
  DATABASE_PATH: string;

  // Fail on decimal cells that do not parse (default keeps their text)
  STRICT_COERCION: boolean;
};

function str(name: string, def?: string): string {
  const v = process.env[name]?.trim();
  if (v && v.length > 0) return v;
  if (def !== undefined) return def;
  throw new Error(`Missing env ${name}`);
}

function bool(name: string, def: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return def;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  throw new Error(`Invalid env ${name}=${process.env[name]}`);
}

export function loadConfig(): AppConfig {
  return {
    DATABASE_PATH: str("DATABASE_PATH", defaultDatabasePath()),
    STRICT_COERCION: bool("STRICT_COERCION", false),
  };
}
