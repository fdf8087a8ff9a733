import type { CallOptions, ContentResponse, MessageContent } from "../types/index.js";

/**
 * The three-method contract a provider adapter implements.
 * createCompletion only ever calls this interface, never a concrete adapter.
 */
export interface IAdapter<TRequest = unknown, TResponse = unknown> {
  /**
   * Maps generic turns into the provider's native request.
   * Throws a ConverseError at the first turn or part it cannot represent;
   * no partial request is ever produced.
   */
  transformRequest(modelId: string, messages: MessageContent[], options: CallOptions): TRequest;

  /**
   * Sends the native request over the transport. No retry or timeout is
   * applied here; transport errors reject unchanged.
   */
  execute(providerRequest: TRequest, signal?: AbortSignal): Promise<TResponse>;

  /** Flattens the native response into the generic single-choice response. */
  transformResponse(providerResponse: TResponse): ContentResponse;
}
