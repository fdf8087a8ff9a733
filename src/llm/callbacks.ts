import type { ContentResponse, MessageContent } from "../types/index.js";

/** Lifecycle hooks around a generateContent call. Every hook is optional. */
export interface CallbacksHandler {
  handleGenerateContentStart?(messages: MessageContent[]): void;
  handleGenerateContentEnd?(response: ContentResponse): void;
  handleError?(err: unknown): void;
}
