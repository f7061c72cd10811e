import type { ZodIssue } from "zod";
import type { TimeEntry } from "./models";

/**
 * Base class for every error raised by the Toggl client.
 */
export class TogglError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TogglError";
  }
}

/**
 * The request never produced an HTTP response (connection refused, DNS failure, aborted body read).
 */
export class TogglTransportError extends TogglError {
  constructor(
    public readonly url: string,
    cause: unknown
  ) {
    super(`Request to ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "TogglTransportError";
  }
}

/**
 * The server answered with a status outside [200, 400).
 *
 * The raw body is kept as-is; call `parseBody()` to read the API's error payload.
 */
export class TogglHttpError extends TogglError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string
  ) {
    super(`${status} ${statusText}`.trim());
    this.name = "TogglHttpError";
  }

  parseBody(): unknown {
    try {
      return JSON.parse(this.body);
    } catch (err) {
      throw new TogglDecodeError("Error body is not valid JSON", this.body, { cause: err });
    }
  }
}

/**
 * A payload did not match the expected shape, or a timestamp matched none of the accepted formats.
 */
export class TogglDecodeError extends TogglError {
  public readonly issues: ZodIssue[];

  constructor(
    message: string,
    public readonly fragment: string,
    options?: { cause?: unknown; issues?: ZodIssue[] }
  ) {
    super(message, { cause: options?.cause });
    this.name = "TogglDecodeError";
    this.issues = options?.issues ?? [];
  }
}

/**
 * A replacement entry was created but the entry it replaces could not be deleted.
 * `entry` is the new, running entry.
 */
export class TogglPartialFailureError extends TogglError {
  constructor(
    public readonly entry: TimeEntry,
    cause: unknown
  ) {
    super(`old entry not deleted: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "TogglPartialFailureError";
  }
}

export class TogglPreconditionError extends TogglError {
  constructor(message: string) {
    super(message);
    this.name = "TogglPreconditionError";
  }
}
