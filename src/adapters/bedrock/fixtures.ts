import type { ContentBlock, ConverseCommandOutput } from "@aws-sdk/client-bedrock-runtime";

// Test-only builders for Converse responses.

export function messageResponse(
  content: ContentBlock[],
  overrides: Partial<ConverseCommandOutput> = {},
): ConverseCommandOutput {
  return {
    $metadata: { httpStatusCode: 200, requestId: "test-request" },
    output: { message: { role: "assistant", content } },
    stopReason: "end_turn",
    usage: { inputTokens: 25, outputTokens: 11, totalTokens: 36 },
    metrics: { latencyMs: 120 },
    ...overrides,
  };
}

export const HELLO_WORLD_RESPONSE = messageResponse([{ text: "Hello" }, { text: "World" }]);
