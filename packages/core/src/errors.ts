/**
 * Error taxonomy shared by the core and the CLI.
 *
 * Everything the engine raises on purpose extends `KeysyncError`, so the CLI
 * can tell an expected failure (print one line, exit 1) from a bug.
 */

export class KeysyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A required setting is missing or invalid. */
export class ConfigurationError extends KeysyncError {}

/** An input file, the local database or a remote collection path is absent. */
export class NotFoundError extends KeysyncError {}

/** A format cannot be inferred, or structured input lacks a required element. */
export class FormatError extends KeysyncError {}

/** A reconciliation precondition failed (conflict abort, nothing to apply). */
export class ReconcileError extends KeysyncError {}

const BODY_PREVIEW_LENGTH = 200;

/** Non-2xx response from the Zotero Web API. Never retried. */
export class RemoteAPIError extends KeysyncError {
  readonly status: number;
  readonly reason: string;
  readonly body: string;

  constructor(status: number, reason: string, body: string) {
    super(`Zotero API error ${status} ${reason}: ${body.slice(0, BODY_PREVIEW_LENGTH)}`);
    this.status = status;
    this.reason = reason;
    this.body = body;
  }
}

export class RequestTimeoutError extends KeysyncError {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms: ${url}`);
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

export class ConnectionError extends KeysyncError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not connect to ${url}: ${detail}`);
    this.url = url;
    this.cause = cause;
  }
}
