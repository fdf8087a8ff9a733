export interface CallOptions {
  model: string;
  /** Values <= 0 fall back to the adapter default */
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  stopWords?: string[];
  /** Forwarded to the transport; aborting rejects the pending call */
  signal?: AbortSignal;
}
