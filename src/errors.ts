import { inspect } from "node:util";

export interface ReleaseNotesErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  statusCode?: number;
  originalError?: ReleaseNotesErrorDetails;
}

/**
 * Base class for every error raised while fetching, extracting or writing release notes.
 */
export class ReleaseNotesError extends Error {
  /** A specific error code (e.g., ERR_TIMEOUT, ERR_HTTP_ERROR). */
  public readonly code?: string;
  /** The original error object, if available. */
  public readonly originalError?: Error;
  /** HTTP status code, if relevant. */
  public readonly statusCode?: number;

  constructor(message: string, code?: string, originalError?: Error, statusCode?: number) {
    super(message);
    this.name = "ReleaseNotesError";
    this.code = code;
    this.originalError = originalError;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns a plain object representation with only useful metadata for logging.
   */
  toObject(): ReleaseNotesErrorDetails {
    const descriptor: ReleaseNotesErrorDetails = {
      name: this.name,
      message: this.message,
    };

    if (this.code !== undefined) {
      descriptor.code = this.code;
    }

    if (this.statusCode !== undefined) {
      descriptor.statusCode = this.statusCode;
    }

    const original = serializeUnknownError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): ReleaseNotesErrorDetails {
    return this.toObject();
  }

  /**
   * Makes `console.error` display the cleaned payload without stack noise.
   */
  [inspect.custom](): ReleaseNotesErrorDetails {
    return this.toObject();
  }
}

/** The page could not be fetched: network failure, timeout or non-success status. */
export class TransportError extends ReleaseNotesError {
  constructor(message: string, code = "ERR_FETCH_FAILED", originalError?: Error, statusCode?: number) {
    super(message, code, originalError, statusCode);
    this.name = "TransportError";
  }
}

/** Something unexpected happened while walking the parsed tree. */
export class ParseError extends ReleaseNotesError {
  constructor(message: string, originalError?: Error) {
    super(message, "ERR_PARSE_FAILED", originalError);
    this.name = "ParseError";
  }
}

export class OutputWriteError extends ReleaseNotesError {
  constructor(
    message: string,
    public readonly path: string,
    originalError?: Error
  ) {
    super(message, "ERR_OUTPUT_WRITE", originalError);
    this.name = "OutputWriteError";
  }
}

export class DependencyError extends ReleaseNotesError {
  constructor(public readonly missingPackages: string[]) {
    super(`Required packages not installed: ${missingPackages.join(", ")}`, "ERR_MISSING_DEPENDENCY");
    this.name = "DependencyError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function readProperty(value: object, key: string): unknown {
  return Reflect.get(value, key);
}

function serializeUnknownError(error: unknown): ReleaseNotesErrorDetails | undefined {
  if (!error) {
    return undefined;
  }

  if (error instanceof ReleaseNotesError) {
    return error.toObject();
  }

  if (typeof error === "object") {
    const name = readProperty(error, "name");
    const message = readProperty(error, "message");
    const descriptor: ReleaseNotesErrorDetails = {
      name: typeof name === "string" && name ? name : "Error",
      message: typeof message === "string" ? message : String(error),
    };

    const withCode = readProperty(error, "code");
    if (typeof withCode === "string" || typeof withCode === "number") {
      descriptor.code = withCode;
    }

    const withStatus = readProperty(error, "statusCode") ?? readProperty(error, "status");
    if (typeof withStatus === "number") {
      descriptor.statusCode = withStatus;
    }

    const nestedDescriptor = serializeUnknownError(readProperty(error, "originalError"));
    if (nestedDescriptor) {
      descriptor.originalError = nestedDescriptor;
    }

    return descriptor;
  }

  return {
    name: "Error",
    message: typeof error === "string" ? error : String(error),
  };
}
