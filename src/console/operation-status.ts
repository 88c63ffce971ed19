import { logger } from "../config/logger.js";
import { type ConsoleErrorKind, isConsoleError, toConsoleError, ValidationError } from "../domain/errors.js";

export interface OperationFailure {
  ok: false;
  kind: ConsoleErrorKind;
  message: string;
  /** Offending fields, for validation failures. */
  fields?: string[];
}

export type OperationSuccess<D extends object> = { ok: true; message: string } & D;

/** What every console operation hands back to the presentation layer. */
export type OperationStatus<D extends object = Record<never, never>> = OperationSuccess<D> | OperationFailure;

/** A failure after part of the operation was already written; D names what was. */
export type PartialFailure<D extends object> = OperationFailure & D;

export function success<D extends object>(message: string, data: D): OperationSuccess<D> {
  return { ok: true, message, ...data };
}

export function failure(err: unknown): OperationFailure {
  if (!isConsoleError(err)) {
    logger.error("Unexpected console failure", {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  }
  const mapped = toConsoleError(err);
  const status: OperationFailure = { ok: false, kind: mapped.kind, message: mapped.message };
  if (mapped instanceof ValidationError && mapped.fields.length > 0) {
    status.fields = [...mapped.fields];
  }
  return status;
}

export function partialFailure<D extends object>(err: unknown, written: D): PartialFailure<D> {
  return { ...failure(err), ...written };
}
