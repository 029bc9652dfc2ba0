import { loadConfig } from "../config.js";
import { logger } from "../logger.js";
import { LandholderStore, type LoadSummary } from "../services/landholderStore.js";
import { parseCsvRows } from "../utils/csv.js";
import { readSource, type TextSource } from "../utils/io.js";

export type LoadArgs = {
  csv?: TextSource;
  database?: string;
  strict?: boolean;
};

export async function loadCmd(args: LoadArgs = {}): Promise<LoadSummary> {
  const cfg = loadConfig();
  const database = args.database ?? cfg.DATABASE_PATH;
  const strictCoercion = args.strict ?? cfg.STRICT_COERCION;

  const source = typeof args.csv === "string" ? args.csv : args.csv ? "stream" : "stdin";
  logger.info({ source, database, strictCoercion }, "load: start");

  const rows = parseCsvRows(await readSource(args.csv));
  const store = new LandholderStore(database, { strictCoercion });
  try {
    return store.bulkLoad(rows);
  } finally {
    store.close();
  }
}
