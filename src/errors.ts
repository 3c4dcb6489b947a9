/**
 * Error handling for run reconciliation
 *
 * Fatal errors (missing inputs, unknown reference names, malformed tables)
 * are thrown from this hierarchy. Per-record problems never throw; they are
 * collected into reports instead.
 */

/**
 * Base error class for all reconciliation errors
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "ReconcileError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or values
 */
export class ValidationError extends ReconcileError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends ReconcileError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * A hit table lacks one of the required columns
 *
 * Fatal: the table cannot be interpreted at all.
 */
export class MissingColumnError extends ParseError {
  constructor(
    public readonly column: string,
    public readonly available: readonly string[] = [],
    lineNumber?: number
  ) {
    super(
      `Missing required column '${column}'`,
      "DSV",
      lineNumber,
      available.length > 0 ? `Columns present: ${available.join(", ")}` : undefined
    );
    this.name = "MissingColumnError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends ReconcileError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    const suggestion =
      msg.includes("header") || msg.includes("magic")
        ? `. File may be corrupted or not actually ${format} compressed`
        : msg.includes("unexpected end") || msg.includes("truncated")
          ? ". File appears to be truncated or incomplete"
          : "";

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with system error context
 */
export class FileError extends ReconcileError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "rename" | "list",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc")) {
      return "No space left on device";
    }
    return undefined;
  }

  override toString(): string {
    return `${super.toString()}\nFile: ${this.filePath}`;
  }
}

/**
 * Configuration errors: the run cannot start with what it was given
 */
export class ConfigurationError extends ReconcileError {
  constructor(message: string, code = "CONFIGURATION_ERROR", context?: string) {
    super(message, code, undefined, context);
    this.name = "ConfigurationError";
  }
}

/**
 * A required input file does not exist
 */
export class MissingInputError extends ConfigurationError {
  constructor(
    public readonly role: string,
    public readonly filePath: string
  ) {
    super(`Missing ${role} input: ${filePath}`, "MISSING_INPUT");
    this.name = "MissingInputError";
  }
}

/**
 * The requested reference name is absent from the loaded FASTA
 */
export class ReferenceNotFoundError extends ConfigurationError {
  constructor(
    public readonly referenceName: string,
    public readonly available: readonly string[]
  ) {
    const listed = available.length > 0 ? [...available].sort().join(", ") : "<none>";
    super(
      `Reference '${referenceName}' not found. Available headers: ${listed}`,
      "REFERENCE_NOT_FOUND"
    );
    this.name = "ReferenceNotFoundError";
  }
}

/**
 * Whether an error aborts a run as a configuration problem
 */
export function isConfigurationFailure(error: unknown): error is ReconcileError {
  return (
    error instanceof ConfigurationError ||
    error instanceof MissingColumnError ||
    error instanceof ParseError ||
    error instanceof FileError ||
    error instanceof ValidationError ||
    error instanceof CompressionError
  );
}
