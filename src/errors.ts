export class ClozeDrillError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Bad command-line arguments; reported with the usage line.
export class UsageError extends ClozeDrillError {}

// The practice text could not be read or has an unsupported format.
export class SourceReadError extends ClozeDrillError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.source = source;
  }
}
