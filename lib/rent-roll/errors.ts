export type StructureField = "unit" | "code";

/** A required column could not be located. Fatal for the run. */
export class StructureDetectionError extends Error {
  readonly field: StructureField;

  constructor(field: StructureField, message: string) {
    super(message);
    this.name = "StructureDetectionError";
    this.field = field;
  }
}

/** The uploaded file could not be opened as a workbook, or has no worksheet. */
export class WorkbookLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WorkbookLoadError";
  }
}
