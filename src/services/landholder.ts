import { ExactDecimal } from "../lib/decimal.js";
import { FieldCoercionError, MalformedRowError } from "../errors.js";
import {
  FIELD_COUNT,
  LANDHOLDER_FIELDS,
  cleanField,
  type HoldingField,
  type LandholderField,
} from "./fieldCleaner.js";

/**
 * Hides held, as an exact decimal. Under lenient coercion a cell that does not
 * parse keeps its cleaned text instead.
 */
export type Holding = ExactDecimal | string;

export type Landholder = Readonly<{
  name: string | null;
  gender: string | null;
  pase_name: string;
  description: string;
  holder_1066: Holding;
  lord_1066: Holding;
  demesne_1086: Holding;
  subtenanted_1086: Holding;
  subtenant_1086: Holding;
  editor: string | null;
  editorial_status: string;
}>;

export type LandholderValue = Landholder[LandholderField];

export type CoercionOptions = {
  /** Fail on a decimal cell that does not parse instead of keeping its text. */
  strictCoercion?: boolean;
};

export function coerceHolding(
  field: HoldingField,
  value: string,
  options: CoercionOptions = {},
  rowNumber?: number
): Holding {
  const parsed = ExactDecimal.parse(value);
  if (parsed) return parsed;
  if (options.strictCoercion) throw new FieldCoercionError(field, value, rowNumber);
  return value;
}

export function holdingText(value: Holding): string {
  return typeof value === "string" ? value : value.toString();
}

/** Build a record from exactly FIELD_COUNT raw cells, in field order. */
export function landholderFromRow(
  row: readonly string[],
  options: CoercionOptions = {},
  rowNumber?: number
): Landholder {
  if (row.length !== FIELD_COUNT) {
    throw new MalformedRowError(`expected ${FIELD_COUNT} fields, got ${row.length}`, row.length, rowNumber);
  }

  const raw = (field: LandholderField): string => row[LANDHOLDER_FIELDS.indexOf(field)] ?? "";
  const optionalText = (field: LandholderField): string | null => cleanField(field, raw(field));
  // Required text keeps the literal cell when its rule would drop it.
  const text = (field: LandholderField): string => cleanField(field, raw(field)) ?? raw(field);
  const holding = (field: HoldingField): Holding => coerceHolding(field, text(field), options, rowNumber);

  return Object.freeze({
    name: optionalText("name"),
    gender: optionalText("gender"),
    pase_name: text("pase_name"),
    description: text("description"),
    holder_1066: holding("holder_1066"),
    lord_1066: holding("lord_1066"),
    demesne_1086: holding("demesne_1086"),
    subtenanted_1086: holding("subtenanted_1086"),
    subtenant_1086: holding("subtenant_1086"),
    editor: optionalText("editor"),
    editorial_status: text("editorial_status"),
  });
}
