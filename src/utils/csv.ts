import Papa from "papaparse";
import { MalformedRowError } from "../errors.js";
import { FIELD_DELIMITER } from "../services/rowRepair.js";

const QUOTE = `"`;

type ReaderState = "startField" | "inField" | "quoted" | "quoteInQuoted";

/**
 * Character-level reader for text papaparse rejects. A quote opens a quoted
 * cell only at the start of a cell; elsewhere it is literal. Text after a
 * closing quote stays in the same cell. Only a quote still open at the end of
 * input is an error.
 */
export function readLenientRows(text: string): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let state: ReaderState = "startField";
  let sawQuote = false;
  let line = 1;
  let recordLine = 1;

  const pushField = () => {
    current.push(field);
    field = "";
  };
  const pushRow = () => {
    pushField();
    // A blank line reads as one unquoted empty cell.
    const blank = current.length === 1 && current[0] === "" && !sawQuote;
    if (!blank) rows.push(current);
    current = [];
    sawQuote = false;
    state = "startField";
  };

  for (let i = 0; i < text.length; i++) {
    const c = text.charAt(i);
    const newline = c === "\n" || c === "\r";
    const crlf = c === "\r" && text.charAt(i + 1) === "\n";
    if (crlf) i++;

    if (state === "quoted") {
      if (c === QUOTE) state = "quoteInQuoted";
      else field += crlf ? "\r\n" : c;
      if (newline) line++;
      continue;
    }

    if (newline) {
      pushRow();
      line++;
      recordLine = line;
      continue;
    }

    if (c === FIELD_DELIMITER) {
      pushField();
      state = "startField";
    } else if (state === "startField" && c === QUOTE) {
      sawQuote = true;
      state = "quoted";
    } else if (state === "quoteInQuoted" && c === QUOTE) {
      field += QUOTE;
      state = "quoted";
    } else {
      field += c;
      state = "inField";
    }
  }

  if (state === "quoted") {
    throw new MalformedRowError("unterminated quoted field", current.length + 1, undefined, recordLine);
  }
  if (field !== "" || current.length > 0 || sawQuote) pushRow();
  return rows;
}

/**
 * Split headerless CSV text into raw rows. Rows keep whatever width the text
 * gives them; narrowing to a record is the loader's job. Text papaparse
 * flags (stray or unterminated quotes) is read again by readLenientRows.
 */
export function parseCsvRows(text: string): string[][] {
  const parsed = Papa.parse<string[]>(text, {
    delimiter: FIELD_DELIMITER,
    header: false,
    skipEmptyLines: true,
  });
  return parsed.errors.length > 0 ? readLenientRows(text) : parsed.data;
}
