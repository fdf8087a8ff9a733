import { isAdapterFault } from "../adapters/converse-error.js";
import type { ContentResponse } from "../types/index.js";

export interface AuditEntry {
  timestamp: string;
  model: string;
  outcome: "ok" | "error";
  /** Fault code for adapter errors; the error's name for transport errors */
  error_code?: string;
  stop_reason?: string;
  input_tokens: number;
  output_tokens: number;
  duration_ms: number;
}

export interface AuditLoggerOptions {
  /** Override the write sink. Defaults to process.stdout JSON lines. */
  write?: (entry: AuditEntry) => void;
}

function errorCode(err: unknown): string {
  if (isAdapterFault(err)) return err.code;
  if (err instanceof Error) return err.name;
  return "UNKNOWN";
}

export class AuditLogger {
  private readonly write: (entry: AuditEntry) => void;

  constructor(options: AuditLoggerOptions = {}) {
    this.write = options.write ?? ((entry) => process.stdout.write(JSON.stringify(entry) + "\n"));
  }

  log(entry: AuditEntry): void {
    this.write(entry);
  }

  buildEntry(params: {
    model: string;
    response?: ContentResponse;
    error?: unknown;
    startedAt: number;
  }): AuditEntry {
    const choice = params.response?.choices[0];
    const failed = params.error !== undefined;

    return {
      timestamp: new Date().toISOString(),
      model: params.model,
      outcome: failed ? "error" : "ok",
      ...(failed ? { error_code: errorCode(params.error) } : {}),
      ...(choice ? { stop_reason: choice.stopReason } : {}),
      input_tokens: choice?.generationInfo.input_tokens ?? 0,
      output_tokens: choice?.generationInfo.output_tokens ?? 0,
      duration_ms: Date.now() - params.startedAt,
    };
  }
}
