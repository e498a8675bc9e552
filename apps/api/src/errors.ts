export type StatusErrorCode =
  | "csrf_missing"
  | "csrf_invalid"
  | "invalid_status"
  | "illegal_transition"
  | "not_found";

const HTTP_STATUS: Record<StatusErrorCode, number> = {
  csrf_missing: 400,
  csrf_invalid: 400,
  invalid_status: 400,
  illegal_transition: 409,
  not_found: 404,
};

export class StatusChangeError extends Error {
  readonly code: StatusErrorCode;
  readonly statusCode: number;

  constructor(code: StatusErrorCode, message?: string) {
    super(message ?? code);
    this.name = "StatusChangeError";
    this.code = code;
    this.statusCode = HTTP_STATUS[code];
  }

  get isCsrfFailure() {
    return this.code === "csrf_missing" || this.code === "csrf_invalid";
  }
}
