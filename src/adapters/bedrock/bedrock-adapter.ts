import type { ConverseCommandInput, ConverseCommandOutput } from "@aws-sdk/client-bedrock-runtime";
import type { IAdapter } from "../i-adapter.js";
import type { ConverseTransport } from "./transport.js";
import type { CallOptions, ContentResponse, MessageContent } from "../../types/index.js";
import { buildConverseInput } from "./message-translator.js";
import { assembleResponse } from "./response-assembler.js";

export class BedrockAdapter implements IAdapter<ConverseCommandInput, ConverseCommandOutput> {
  private readonly transport: ConverseTransport;

  constructor(transport: ConverseTransport) {
    this.transport = transport;
  }

  transformRequest(
    modelId: string,
    messages: MessageContent[],
    options: CallOptions,
  ): ConverseCommandInput {
    return buildConverseInput(modelId, messages, options);
  }

  async execute(providerRequest: ConverseCommandInput, signal?: AbortSignal): Promise<ConverseCommandOutput> {
    return this.transport(providerRequest, signal);
  }

  transformResponse(providerResponse: ConverseCommandOutput): ContentResponse {
    return assembleResponse(providerResponse);
  }
}
