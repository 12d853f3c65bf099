export type IngestionErrorCode = "unrecognized_format" | "row_extraction" | "no_valid_records";

export class IngestionError extends Error {
  constructor(public readonly code: IngestionErrorCode, message: string) {
    super(message);
    this.name = "IngestionError";
  }
}

export class UnrecognizedFormatError extends IngestionError {
  constructor(public readonly columns: string[]) {
    super("unrecognized_format", `Unrecognized export format; columns: ${columns.join(", ") || "(none)"}`);
    this.name = "UnrecognizedFormatError";
  }
}

export class RowExtractionError extends IngestionError {
  constructor(public readonly rowIndex: number, message: string) {
    super("row_extraction", `Row ${rowIndex}: ${message}`);
    this.name = "RowExtractionError";
  }
}

export class EmptyResultError extends IngestionError {
  constructor(
    public readonly format: string,
    public readonly rowsTotal: number
  ) {
    super("no_valid_records", `No valid records could be extracted from ${rowsTotal} ${format} row(s)`);
    this.name = "EmptyResultError";
  }
}
