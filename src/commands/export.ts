import { loadConfig } from "../config.js";
import { logger } from "../logger.js";
import { loadArqueroExporter } from "../services/exporter.js";
import { LandholderStore } from "../services/landholderStore.js";
import { writeText } from "../utils/io.js";

export type ExportArgs = {
  database?: string;
  out?: string;
};

/** Write the landholder table, decimal columns as numbers, as CSV. */
export async function exportCmd(args: ExportArgs = {}): Promise<number> {
  const database = args.database ?? loadConfig().DATABASE_PATH;
  // Fail before touching the database when arquero is missing.
  const exporter = await loadArqueroExporter();

  const store = new LandholderStore(database);
  let csv: string;
  let rows: number;
  try {
    const frame = store.exportFrame(exporter);
    csv = frame.toCSV();
    rows = frame.numRows();
  } finally {
    store.close();
  }

  if (args.out) {
    await writeText(args.out, csv + "\n");
  } else {
    process.stdout.write(csv + "\n");
  }
  logger.info({ database, out: args.out ?? "stdout", rows }, "export: done");
  return rows;
}
