/**
 * Error taxonomy surfaced by console operations.
 *
 * Every store-level failure leaves the storage accessor as one of these, after
 * the transaction has been rolled back and the connection released.
 */

export type ConsoleErrorKind = "constraint_violation" | "storage_error" | "validation_error" | "not_found";

export abstract class ConsoleError extends Error {
  abstract readonly kind: ConsoleErrorKind;
}

/** A uniqueness, NOT NULL or foreign-key rule of the store was broken. */
export class ConstraintViolation extends ConsoleError {
  readonly kind = "constraint_violation";

  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConstraintViolation";
  }
}

/** Connection or query failure that is not a constraint violation. */
export class StorageError extends ConsoleError {
  readonly kind = "storage_error";

  constructor(
    message: string,
    public readonly code: string | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** Input rejected before it reached the store. */
export class ValidationError extends ConsoleError {
  readonly kind = "validation_error";

  constructor(
    message: string,
    public readonly fields: string[] = [],
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ConsoleError {
  readonly kind = "not_found";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export function isConsoleError(err: unknown): err is ConsoleError {
  return err instanceof ConsoleError;
}

/**
 * Find the SQLite result code on an error or anywhere along its cause chain.
 * Drizzle may wrap driver errors, so the code is not always on the outer error.
 */
export function findSqliteCode(err: unknown): string | null {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string" && current.code.startsWith("SQLITE_")) {
      return current.code;
    }
    current = current.cause;
  }
  return null;
}

/** Innermost message along the cause chain (the driver's own wording). */
function rootMessage(err: unknown): string {
  let message = err instanceof Error ? err.message : String(err);
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    message = current.message;
    current = current.cause;
  }
  return message;
}

/** Map anything thrown by the store onto the console error taxonomy. */
export function toConsoleError(err: unknown): ConsoleError {
  if (isConsoleError(err)) return err;
  const code = findSqliteCode(err);
  const message = rootMessage(err);
  if (code?.startsWith("SQLITE_CONSTRAINT")) {
    return new ConstraintViolation(message, code, { cause: err });
  }
  return new StorageError(message, code, { cause: err });
}
