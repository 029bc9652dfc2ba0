import { UnsupportedExportError, errorMessage } from "../errors.js";
import { ExactDecimal } from "../lib/decimal.js";
import { FIELD_KINDS, LANDHOLDER_FIELDS, type LandholderField } from "./fieldCleaner.js";
import type { Landholder, LandholderValue } from "./landholder.js";

/** Turns stored records into an analysis frame of some library's making. */
export interface LandholderExporter<TFrame> {
  export(records: readonly Landholder[]): TFrame;
}

type Arquero = typeof import("arquero");
export type LandholderFrame = ReturnType<Arquero["table"]>;
export type ArqueroImporter = () => Promise<Arquero>;

type FrameCell = string | number | null;

function frameCell(field: LandholderField, value: LandholderValue): FrameCell {
  if (value instanceof ExactDecimal) return value.toNumber();
  // Decimal cells kept as text under lenient coercion have no numeric value.
  if (FIELD_KINDS[field] === "decimal") return value === null ? null : ExactDecimal.parse(value)?.toNumber() ?? null;
  return value;
}

export class ArqueroExporter implements LandholderExporter<LandholderFrame> {
  constructor(private readonly aq: Arquero) {}

  export(records: readonly Landholder[]): LandholderFrame {
    const columns: Record<string, FrameCell[]> = {};
    for (const field of LANDHOLDER_FIELDS) {
      columns[field] = records.map((record) => frameCell(field, record[field]));
    }
    return this.aq.table(columns, [...LANDHOLDER_FIELDS]);
  }
}

/**
 * arquero is an optional dependency; without it exports are unsupported and
 * say so.
 */
export async function loadArqueroExporter(
  importer: ArqueroImporter = () => import("arquero")
): Promise<ArqueroExporter> {
  let aq: Arquero;
  try {
    aq = await importer();
  } catch (err) {
    throw new UnsupportedExportError(`export needs the optional "arquero" package: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return new ArqueroExporter(aq);
}
