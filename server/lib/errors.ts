export type TicketErrorCode =
  | "InvalidTicketType"
  | "InvalidPayload"
  | "Forbidden"
  | "WorkflowNotInitialized"
  | "UnknownDepartment"
  | "WorkflowBuildFailed"
  | "UnbuildableWorkflow"
  | "InvalidTransition"
  | "NotFound"
  | "ExternalSyncTransient";

const HTTP_STATUS: Record<TicketErrorCode, number> = {
  InvalidTicketType: 400,
  InvalidPayload: 400,
  Forbidden: 403,
  NotFound: 404,
  UnknownDepartment: 404,
  WorkflowNotInitialized: 409,
  InvalidTransition: 409,
  WorkflowBuildFailed: 422,
  UnbuildableWorkflow: 422,
  ExternalSyncTransient: 503,
};

/**
 * Operational error raised by the workflow engine. Authorization failures
 * (`Forbidden`) are kept apart from validation failures so callers can tell
 * "not permitted" from "malformed request".
 */
export class TicketError extends Error {
  readonly code: TicketErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: TicketErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TicketError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, TicketError.prototype);
  }

  get httpStatus(): number {
    return HTTP_STATUS[this.code];
  }

  static notFound(what: string, id: string | number): TicketError {
    return new TicketError("NotFound", `${what} ${id} not found`, { id });
  }

  static forbidden(message: string, details?: Record<string, unknown>): TicketError {
    return new TicketError("Forbidden", message, details);
  }

  static invalidPayload(message: string, details?: Record<string, unknown>): TicketError {
    return new TicketError("InvalidPayload", message, details);
  }

  static invalidTransition(message: string, details?: Record<string, unknown>): TicketError {
    return new TicketError("InvalidTransition", message, details);
  }
}

export function isTicketError(error: unknown, code?: TicketErrorCode): error is TicketError {
  return error instanceof TicketError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
