#!/usr/bin/env node
import { Command } from "commander";
import { loadCmd } from "./commands/load.js";
import { initCmd } from "./commands/init.js";
import { exportCmd } from "./commands/export.js";
import { logger } from "./logger.js";

const program = new Command();

program
  .name("domesday-loader")
  .description("Load the PASE Domesday landholder extract into SQLite")
  .version("0.1.0");

program
  .command("load", { isDefault: true })
  .description("Create the schema and load a CSV extract (stdin when no file is given)")
  .argument("[csv]", "CSV file, or - for stdin")
  .argument("[database]", "SQLite file (default: DATABASE_PATH)")
  .option("--strict", "reject decimal cells that do not parse")
  .action(async (csv: string | undefined, database: string | undefined, opts: { strict?: boolean }) => {
    await loadCmd({ csv, database, strict: opts.strict });
  });

program
  .command("init")
  .description("Create the schema only")
  .argument("[database]", "SQLite file (default: DATABASE_PATH)")
  .action(async (database: string | undefined) => initCmd(database));

program
  .command("export")
  .description("Write the table as CSV with numeric holdings (needs arquero)")
  .argument("[database]", "SQLite file (default: DATABASE_PATH)")
  .option("-o, --out <file>", "output file (default: stdout)")
  .action(async (database: string | undefined, opts: { out?: string }) => {
    await exportCmd({ database, out: opts.out });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error(err, "command failed");
  process.exitCode = 1;
});
