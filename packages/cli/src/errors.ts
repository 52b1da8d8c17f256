/**
 * Error kinds reported by notes-toolkit commands.
 * The dispatcher turns any ToolkitError into a message on stderr and exit code 1.
 */
export class ToolkitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ToolkitError";
  }
}

/** No table (or other required element) was found in the input */
export class NotFoundError extends ToolkitError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** A table row's cell count differs from the header's */
export class MalformedTableError extends ToolkitError {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(message);
    this.name = "MalformedTableError";
  }
}

/** A column order is not a permutation of the table's columns */
export class InvalidPermutationError extends ToolkitError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPermutationError";
  }
}

/** A file could not be read, decoded or written */
export class IOError extends ToolkitError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "IOError";
  }
}

/** Command-line arguments that do not fit the command */
export class UsageError extends ToolkitError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
