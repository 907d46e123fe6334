/**
 * Error taxonomy shared by the REST API and the MCP tools.
 *
 * Each surface translates these through describeError() so that a note
 * that is missing or locked reads the same way on both.
 */

/** The Keep session could not be established (missing or rejected credentials). */
export class KeepAuthError extends Error {
  override readonly name = "KeepAuthError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** Any other failure reported by the Keep service, including sync failures. */
export class KeepApiError extends Error {
  override readonly name = "KeepApiError";

  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class NoteNotFoundError extends Error {
  override readonly name = "NoteNotFoundError";

  constructor(readonly noteId: string) {
    super(`Note with ID ${noteId} not found`);
  }
}

export class NoteForbiddenError extends Error {
  override readonly name = "NoteForbiddenError";

  constructor(
    readonly noteId: string,
    ownershipLabel: string,
  ) {
    super(
      `Note with ID ${noteId} cannot be modified (missing ${ownershipLabel} label and UNSAFE_MODE is not enabled)`,
    );
  }
}

/** The request asks for a change the note cannot take, such as replacing a checklist's text. */
export class InvalidNoteUpdateError extends Error {
  override readonly name = "InvalidNoteUpdateError";

  constructor(
    readonly noteId: string,
    reason: string,
  ) {
    super(`Note with ID ${noteId} cannot be updated: ${reason}`);
  }
}

export type ErrorCode =
  | "invalid_request"
  | "not_found"
  | "forbidden"
  | "auth_error"
  | "upstream_error"
  | "internal_error";

export interface ErrorDescription {
  status: number;
  code: ErrorCode;
  message: string;
}

export function describeError(error: unknown): ErrorDescription {
  const message = error instanceof Error ? error.message : "Unknown error";

  if (error instanceof NoteNotFoundError) {
    return { status: 404, code: "not_found", message };
  }
  if (error instanceof InvalidNoteUpdateError) {
    return { status: 400, code: "invalid_request", message };
  }
  if (error instanceof NoteForbiddenError) {
    return { status: 403, code: "forbidden", message };
  }
  if (error instanceof KeepAuthError) {
    return { status: 500, code: "auth_error", message };
  }
  if (error instanceof KeepApiError) {
    return { status: 500, code: "upstream_error", message };
  }
  return { status: 500, code: "internal_error", message };
}
