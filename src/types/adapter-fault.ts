export type ErrorCode =
  | "MULTIPLE_SYSTEM_TURNS"
  | "SYSTEM_CONTENT_MISMATCH"
  | "UNSUPPORTED_ROLE"
  | "UNSUPPORTED_CONTENT"
  | "MALFORMED_IMAGE_URL"
  | "INVALID_BASE64"
  | "UNSUPPORTED_MIME_TYPE"
  | "UNEXPECTED_OUTPUT";

export type ErrorCategory = "validation" | "format-resolution" | "protocol-shape";

export interface AdapterFault {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  /** The offending field or value, for diagnostics */
  payload?: Record<string, unknown>;
}

export function categoryOf(code: ErrorCode): ErrorCategory {
  switch (code) {
    case "UNSUPPORTED_MIME_TYPE": return "format-resolution";
    case "UNEXPECTED_OUTPUT": return "protocol-shape";
    default: return "validation";
  }
}
