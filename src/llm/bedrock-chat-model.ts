import { BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";
import type { BedrockRuntimeClientConfig } from "@aws-sdk/client-bedrock-runtime";
import { BedrockAdapter, ConverseError, bedrockTransport, clientConfigFrom } from "../adapters/index.js";
import type { ConverseTransport } from "../adapters/index.js";
import type { AdapterConfig } from "../config/index.js";
import type { AuditLogger } from "../observability/index.js";
import { createCompletion } from "../pipeline/index.js";
import { textMessage } from "../types/index.js";
import type { CallOptions, ContentResponse, MessageContent } from "../types/index.js";
import type { CallbacksHandler } from "./callbacks.js";

export const DEFAULT_MODEL_ID = "amazon.titan-text-lite-v1";

export interface BedrockChatModelOptions {
  modelId?: string;
  /** Takes precedence over client and clientConfig */
  transport?: ConverseTransport;
  client?: BedrockRuntimeClient;
  /** Used only when neither transport nor client is given */
  clientConfig?: BedrockRuntimeClientConfig;
  callbacks?: CallbacksHandler;
  auditLogger?: AuditLogger;
}

export type GenerateOptions = Partial<CallOptions>;

export class BedrockChatModel {
  readonly modelId: string;
  private readonly adapter: BedrockAdapter;
  private readonly callbacks?: CallbacksHandler;
  private readonly auditLogger?: AuditLogger;

  constructor(options: BedrockChatModelOptions = {}) {
    this.modelId = options.modelId ?? DEFAULT_MODEL_ID;
    const transport =
      options.transport ??
      bedrockTransport(options.client ?? new BedrockRuntimeClient(options.clientConfig ?? {}));
    this.adapter = new BedrockAdapter(transport);
    this.callbacks = options.callbacks;
    this.auditLogger = options.auditLogger;
  }

  async generateContent(messages: MessageContent[], options: GenerateOptions = {}): Promise<ContentResponse> {
    this.callbacks?.handleGenerateContentStart?.(messages);

    const callOptions: CallOptions = { ...options, model: options.model ?? this.modelId };

    let response: ContentResponse;
    try {
      response = await createCompletion(this.adapter, callOptions.model, messages, callOptions, {
        auditLogger: this.auditLogger,
      });
    } catch (err) {
      this.callbacks?.handleError?.(err);
      throw err;
    }

    this.callbacks?.handleGenerateContentEnd?.(response);
    return response;
  }

  /** Sends `prompt` as a single human turn and returns the reply text. */
  async call(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const response = await this.generateContent([textMessage("human", prompt)], options);
    const [choice] = response.choices;
    if (choice === undefined) {
      throw new ConverseError("UNEXPECTED_OUTPUT", "empty response: no choices returned");
    }
    return choice.content;
  }
}

export function createBedrockChatModel(
  config: AdapterConfig,
  options: Omit<BedrockChatModelOptions, "modelId" | "clientConfig"> = {},
): BedrockChatModel {
  return new BedrockChatModel({
    ...options,
    modelId: config.model_id,
    clientConfig: clientConfigFrom(config),
  });
}
