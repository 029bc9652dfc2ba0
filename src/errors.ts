export class LoaderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

function located(message: string, rowNumber?: number, lineNumber?: number): string {
  if (rowNumber !== undefined) return `row ${rowNumber}: ${message}`;
  if (lineNumber !== undefined) return `line ${lineNumber}: ${message}`;
  return message;
}

/**
 * A CSV row that cannot be reduced to a full landholder record. rowNumber
 * counts records fed to the loader; lineNumber is the input line the record
 * starts on, when the reader knows it.
 */
export class MalformedRowError extends LoaderError {
  readonly rowNumber?: number;
  readonly lineNumber?: number;
  readonly fieldCount: number;

  constructor(message: string, fieldCount: number, rowNumber?: number, lineNumber?: number) {
    super(located(message, rowNumber, lineNumber));
    this.fieldCount = fieldCount;
    this.rowNumber = rowNumber;
    this.lineNumber = lineNumber;
  }
}

/** Raised only under strict coercion, when a decimal field does not parse. */
export class FieldCoercionError extends LoaderError {
  readonly field: string;
  readonly value: string;
  readonly rowNumber?: number;

  constructor(field: string, value: string, rowNumber?: number) {
    super(located(`${field}: cannot read ${JSON.stringify(value)} as a decimal`, rowNumber));
    this.field = field;
    this.value = value;
    this.rowNumber = rowNumber;
  }
}

export class UnsupportedExportError extends LoaderError {}

export class StorageFailureError extends LoaderError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
