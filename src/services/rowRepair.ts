import { MalformedRowError } from "../errors.js";
import { FIELD_COUNT } from "./fieldCleaner.js";

const DESCRIPTION_INDEX = 3;
// Fields after the description: five holdings, editor, editorial status.
const TRAILING_FIELDS = FIELD_COUNT - DESCRIPTION_INDEX - 1;

export const FIELD_DELIMITER = ",";

export function isRepairNeeded(row: readonly string[]): boolean {
  return row.length > FIELD_COUNT;
}

/**
 * Rejoin a description that was split on unescaped commas.
 *
 * Descriptions are the only free-text column the extract leaves unquoted, so
 * any excess cells sit between the first three fields and the last seven.
 */
export function repairRow(row: readonly string[], rowNumber?: number): string[] {
  if (row.length < FIELD_COUNT) {
    throw new MalformedRowError(`expected ${FIELD_COUNT} fields, got ${row.length}`, row.length, rowNumber);
  }
  const description = row.slice(DESCRIPTION_INDEX, row.length - TRAILING_FIELDS).join(FIELD_DELIMITER);
  return [
    ...row.slice(0, DESCRIPTION_INDEX),
    description,
    ...row.slice(row.length - TRAILING_FIELDS),
  ];
}
