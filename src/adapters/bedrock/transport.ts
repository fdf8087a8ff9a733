import { BedrockRuntimeClient, ConverseCommand } from "@aws-sdk/client-bedrock-runtime";
import type {
  BedrockRuntimeClientConfig,
  ConverseCommandInput,
  ConverseCommandOutput,
} from "@aws-sdk/client-bedrock-runtime";
import type { AdapterConfig } from "../../config/index.js";

/** One Converse round trip. Errors and aborts reject with the SDK's own error. */
export type ConverseTransport = (
  input: ConverseCommandInput,
  signal?: AbortSignal,
) => Promise<ConverseCommandOutput>;

export function bedrockTransport(client: BedrockRuntimeClient): ConverseTransport {
  return (input, signal) => client.send(new ConverseCommand(input), { abortSignal: signal });
}

export function clientConfigFrom(config: AdapterConfig): BedrockRuntimeClientConfig {
  const clientConfig: BedrockRuntimeClientConfig = { region: config.region };
  if (config.profile !== undefined) {
    clientConfig.profile = config.profile;
  }
  if (config.max_attempts !== undefined) {
    clientConfig.maxAttempts = config.max_attempts;
  }
  return clientConfig;
}
