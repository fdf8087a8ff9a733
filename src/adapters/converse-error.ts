import { categoryOf } from "../types/index.js";
import type { AdapterFault, ErrorCategory, ErrorCode } from "../types/index.js";

export class ConverseError extends Error implements AdapterFault {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly payload: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    payload: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "ConverseError";
    this.code = code;
    this.category = categoryOf(code);
    this.payload = payload;
  }
}

export function isAdapterFault(err: unknown): err is AdapterFault {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    "category" in err &&
    "message" in err
  );
}
