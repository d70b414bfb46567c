/**
 * Tool Result Envelopes
 *
 * Every tool result goes back to the model as one JSON document, success
 * or failure, so it can read the error kind and field issues and retry.
 */

import { ValidationError, WaypointError, type ValidationIssue } from "../errors.js";

export type OkEnvelope<T = unknown> = { ok: true; data: T };

export interface ErrorDetail {
  kind: string;
  message: string;
  issues?: ValidationIssue[];
}

export type ErrEnvelope = { ok: false; error: ErrorDetail };

export type ToolEnvelope = OkEnvelope | ErrEnvelope;

export const ok = <T>(data: T): OkEnvelope<T> => ({ ok: true, data });

/**
 * Known failures keep their kind and message. Anything else is reported
 * as InternalError with its message; the caller logs the stack.
 */
export function fail(error: unknown): ErrEnvelope {
  if (error instanceof WaypointError) {
    const detail: ErrorDetail = { kind: error.kind, message: error.message };
    if (error instanceof ValidationError) detail.issues = error.issues;
    return { ok: false, error: detail };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { ok: false, error: { kind: "InternalError", message } };
}

export function isExpectedFailure(error: unknown): boolean {
  return error instanceof WaypointError;
}

export function serialize(envelope: ToolEnvelope): string {
  return JSON.stringify(envelope);
}
