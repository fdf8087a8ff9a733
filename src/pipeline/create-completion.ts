import type { IAdapter } from "../adapters/index.js";
import type { AuditLogger } from "../observability/index.js";
import type { CallOptions, ContentResponse, MessageContent } from "../types/index.js";

export interface CompletionOptions {
  auditLogger?: AuditLogger;
}

/**
 * Runs one completion: transformRequest → execute → transformResponse.
 *
 * The request is fully translated before anything is sent, so a translation
 * error means the provider was never called. Errors from any stage reject
 * unchanged; nothing is retried here.
 */
export async function createCompletion<TRequest, TResponse>(
  adapter: IAdapter<TRequest, TResponse>,
  modelId: string,
  messages: MessageContent[],
  options: CallOptions,
  completionOptions: CompletionOptions = {},
): Promise<ContentResponse> {
  const { auditLogger } = completionOptions;
  const startedAt = Date.now();

  try {
    const providerRequest = adapter.transformRequest(modelId, messages, options);
    const providerResponse = await adapter.execute(providerRequest, options.signal);
    const response = adapter.transformResponse(providerResponse);
    auditLogger?.log(auditLogger.buildEntry({ model: modelId, response, startedAt }));
    return response;
  } catch (err) {
    auditLogger?.log(auditLogger.buildEntry({ model: modelId, error: err, startedAt }));
    throw err;
  }
}
