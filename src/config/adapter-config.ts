export interface AdapterConfig {
  schema_version: 1;
  /** AWS region hosting the runtime endpoint */
  region: string;
  /** Model invoked when a call does not name one */
  model_id: string;
  /** Shared-credentials profile; the default chain applies when omitted */
  profile?: string;
  /** SDK-level attempts per call. Retrying is the transport's concern. */
  max_attempts?: number;
}
