/** Optional knobs attached to {@link SnapshotCacheError} instances. */
export interface SnapshotCacheErrorOptions {
  hint?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Base error emitted by the snapshot cache. */
export class SnapshotCacheError extends Error {
  readonly hint: string | undefined;
  readonly details: Record<string, unknown> | undefined;

  constructor(
    readonly code: string,
    message: string,
    options: SnapshotCacheErrorOptions = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SnapshotCacheError";
    this.hint = options.hint;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when a group key never received a snapshot. */
export class SnapshotNotFoundError extends SnapshotCacheError {
  constructor(readonly key: string) {
    super("E-XDS-NOT_FOUND", `no snapshot found for group '${key}'`, {
      hint: "set a snapshot for the group before reading it",
      details: { key },
    });
    this.name = "SnapshotNotFoundError";
  }
}

/**
 * Raised for malformed inputs: unknown categories, empty group keys,
 * duplicate resource names or a resolver that could not derive a key.
 */
export class InvalidRequestError extends SnapshotCacheError {
  constructor(message: string, options: SnapshotCacheErrorOptions = {}) {
    super("E-XDS-INVALID", message, options);
    this.name = "InvalidRequestError";
  }
}

/** Raised when a consumer aborts while waiting on a watch channel. */
export class WatchAbortedError extends SnapshotCacheError {
  constructor(readonly watchId: number) {
    super("E-XDS-ABORTED", `receive on watch ${watchId} aborted`, {
      hint: "watch_aborted",
      details: { watchId },
    });
    this.name = "WatchAbortedError";
  }
}
