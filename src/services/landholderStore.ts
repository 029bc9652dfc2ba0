import Database from "better-sqlite3";
import { ExactDecimal } from "../lib/decimal.js";
import { prepareDatabasePath } from "../lib/data_dir.js";
import { logger } from "../logger.js";
import { StorageFailureError, errorMessage } from "../errors.js";
import { LANDHOLDER_FIELDS } from "./fieldCleaner.js";
import {
  holdingText,
  landholderFromRow,
  type CoercionOptions,
  type Holding,
  type Landholder,
} from "./landholder.js";
import { isRepairNeeded, repairRow } from "./rowRepair.js";
import type { LandholderExporter } from "./exporter.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS landholders (
    name              TEXT,
    gender            TEXT,
    pase_name         TEXT NOT NULL PRIMARY KEY,
    description       TEXT NOT NULL,
    -- TEXT_DECIMAL has TEXT affinity, so SQLite keeps the digits as written.
    holder_1066       TEXT_DECIMAL NOT NULL,
    lord_1066         TEXT_DECIMAL NOT NULL,
    demesne_1086      TEXT_DECIMAL NOT NULL,
    subtenanted_1086  TEXT_DECIMAL NOT NULL,
    subtenant_1086    TEXT_DECIMAL NOT NULL,
    editor            TEXT,
    editorial_status  TEXT NOT NULL
);

CREATE VIRTUAL TABLE IF NOT EXISTS fts_landholders USING fts5 (
    name,
    pase_name,
    description,
    content='landholders'
);

CREATE INDEX IF NOT EXISTS idx_landholders_gender ON landholders(gender);
`;

const COLUMNS = LANDHOLDER_FIELDS.join(", ");

const UPSERT = `
INSERT INTO landholders (${COLUMNS})
VALUES (${LANDHOLDER_FIELDS.map((f) => `@${f}`).join(", ")})
ON CONFLICT (pase_name) DO UPDATE SET
  ${LANDHOLDER_FIELDS.filter((f) => f !== "pase_name")
    .map((f) => `${f} = excluded.${f}`)
    .join(",\n  ")}
`;

const REBUILD_SEARCH_INDEX = `INSERT INTO fts_landholders(fts_landholders) VALUES ('rebuild')`;

export type StoredLandholderRow = {
  name: string | null;
  gender: string | null;
  pase_name: string;
  description: string;
  holder_1066: string;
  lord_1066: string;
  demesne_1086: string;
  subtenanted_1086: string;
  subtenant_1086: string;
  editor: string | null;
  editorial_status: string;
};

export type LoadSummary = {
  rowsRead: number;
  rowsRepaired: number;
  storedRows: number;
};

export type StoreOptions = CoercionOptions;

export function encodeHolding(value: Holding): string {
  return holdingText(value);
}

/** Inverse of encodeHolding; text that never parsed comes back unchanged. */
export function decodeHolding(stored: string): Holding {
  return ExactDecimal.parse(stored) ?? stored;
}

export function encodeLandholder(record: Landholder): StoredLandholderRow {
  return {
    name: record.name,
    gender: record.gender,
    pase_name: record.pase_name,
    description: record.description,
    holder_1066: encodeHolding(record.holder_1066),
    lord_1066: encodeHolding(record.lord_1066),
    demesne_1086: encodeHolding(record.demesne_1086),
    subtenanted_1086: encodeHolding(record.subtenanted_1086),
    subtenant_1086: encodeHolding(record.subtenant_1086),
    editor: record.editor,
    editorial_status: record.editorial_status,
  };
}

export function decodeLandholder(row: StoredLandholderRow): Landholder {
  return Object.freeze({
    name: row.name,
    gender: row.gender,
    pase_name: row.pase_name,
    description: row.description,
    holder_1066: decodeHolding(row.holder_1066),
    lord_1066: decodeHolding(row.lord_1066),
    demesne_1086: decodeHolding(row.demesne_1086),
    subtenanted_1086: decodeHolding(row.subtenanted_1086),
    subtenant_1086: decodeHolding(row.subtenant_1086),
    editor: row.editor,
    editorial_status: row.editorial_status,
  });
}

function storageFailure(action: string, err: unknown): StorageFailureError {
  return new StorageFailureError(`${action}: ${errorMessage(err)}`, { cause: err });
}

function openDatabase(location: string): Database.Database {
  try {
    return new Database(prepareDatabasePath(location));
  } catch (err) {
    throw storageFailure(`cannot open database ${location}`, err);
  }
}

/**
 * SQLite store for landholder records.
 *
 * Opening a store creates the schema, so a constructed store is always ready
 * for bulkLoad. Callers own the connection and must close() it.
 */
export class LandholderStore {
  readonly connection: Database.Database;
  readonly location: string;
  private readonly options: StoreOptions;

  constructor(location: string, options: StoreOptions = {}) {
    this.location = location;
    this.options = options;
    this.connection = openDatabase(location);
    try {
      this.createSchema();
    } catch (err) {
      this.connection.close();
      throw err;
    }
  }

  createSchema(): void {
    try {
      this.connection.exec(SCHEMA);
    } catch (err) {
      throw storageFailure("schema creation failed", err);
    }
  }

  /**
   * Repair, parse and upsert every row in one transaction, then rebuild the
   * search index. Any failure rolls the whole load back.
   */
  bulkLoad(rows: Iterable<readonly string[]>): LoadSummary {
    const upsert = this.connection.prepare<StoredLandholderRow>(UPSERT);
    const rebuild = this.connection.prepare(REBUILD_SEARCH_INDEX);

    const load = this.connection.transaction((input: Iterable<readonly string[]>): LoadSummary => {
      let rowsRead = 0;
      let rowsRepaired = 0;
      for (const raw of input) {
        rowsRead += 1;
        if (isRepairNeeded(raw)) {
          rowsRepaired += 1;
          logger.warn({ row: rowsRead, fields: raw.length }, "load: rejoining split description");
        }
        const record = landholderFromRow(repairRow(raw, rowsRead), this.options, rowsRead);
        try {
          upsert.run(encodeLandholder(record));
        } catch (err) {
          throw storageFailure(`row ${rowsRead}: write failed`, err);
        }
      }
      rebuild.run();
      return { rowsRead, rowsRepaired, storedRows: this.count() };
    });

    const summary = load(rows);
    logger.info(summary, "load: committed");
    return summary;
  }

  count(): number {
    const row = this.connection.prepare<[], { n: number }>("SELECT count(*) AS n FROM landholders").get();
    return row?.n ?? 0;
  }

  /** Every stored record, in first-insertion order. */
  records(): Landholder[] {
    return this.connection
      .prepare<[], StoredLandholderRow>(`SELECT ${COLUMNS} FROM landholders ORDER BY rowid`)
      .all()
      .map(decodeLandholder);
  }

  exportFrame<TFrame>(exporter: LandholderExporter<TFrame>): TFrame {
    return exporter.export(this.records());
  }

  close(): void {
    if (this.connection.open) this.connection.close();
  }
}
