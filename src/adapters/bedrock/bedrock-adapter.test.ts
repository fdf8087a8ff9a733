import { describe, it, expect, vi } from "vitest";
import { BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";
import type { ConverseCommandInput, ConverseCommandOutput } from "@aws-sdk/client-bedrock-runtime";
import { BedrockAdapter } from "./bedrock-adapter.js";
import { bedrockTransport, clientConfigFrom } from "./transport.js";
import type { ConverseTransport } from "./transport.js";
import { HELLO_WORLD_RESPONSE } from "./fixtures.js";
import { textMessage } from "../../types/index.js";

const MODEL = "amazon.titan-text-lite-v1";

function makeTransport(output: ConverseCommandOutput = HELLO_WORLD_RESPONSE) {
  return vi.fn<ConverseTransport>().mockResolvedValue(output);
}

// ---------------------------------------------------------------------------
// transformRequest
// ---------------------------------------------------------------------------
describe("BedrockAdapter.transformRequest", () => {
  it("builds a Converse input for the given model", () => {
    const adapter = new BedrockAdapter(makeTransport());
    const input = adapter.transformRequest(
      MODEL,
      [textMessage("system", "Be kind."), textMessage("human", "Hello")],
      { model: MODEL, maxTokens: 64 },
    );
    expect(input).toEqual({
      modelId: MODEL,
      system: [{ text: "Be kind." }],
      messages: [{ role: "user", content: [{ text: "Hello" }] }],
      inferenceConfig: { maxTokens: 64, topP: 0, temperature: 0 },
    });
  });
});

// ---------------------------------------------------------------------------
// execute
// ---------------------------------------------------------------------------
describe("BedrockAdapter.execute", () => {
  it("sends the request through the transport with the caller's signal", async () => {
    const transport = makeTransport();
    const adapter = new BedrockAdapter(transport);
    const controller = new AbortController();
    const request: ConverseCommandInput = { modelId: MODEL, messages: [] };

    const result = await adapter.execute(request, controller.signal);

    expect(result).toBe(HELLO_WORLD_RESPONSE);
    expect(transport).toHaveBeenCalledTimes(1);
    expect(transport).toHaveBeenCalledWith(request, controller.signal);
  });

  it("propagates transport errors unchanged and does not retry", async () => {
    const failure = new Error("ThrottlingException: Too many requests");
    const transport = vi.fn<ConverseTransport>().mockRejectedValue(failure);
    const adapter = new BedrockAdapter(transport);

    await expect(adapter.execute({ modelId: MODEL })).rejects.toBe(failure);
    expect(transport).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// transformResponse
// ---------------------------------------------------------------------------
describe("BedrockAdapter.transformResponse", () => {
  it("assembles a single choice", () => {
    const adapter = new BedrockAdapter(makeTransport());
    expect(adapter.transformResponse(HELLO_WORLD_RESPONSE)).toEqual({
      choices: [
        {
          content: "Hello\nWorld",
          stopReason: "end_turn",
          generationInfo: { input_tokens: 25, output_tokens: 11 },
        },
      ],
    });
  });
});

// ---------------------------------------------------------------------------
// SDK binding
// ---------------------------------------------------------------------------
describe("bedrockTransport", () => {
  it("sends the input through the client's middleware stack", async () => {
    const client = new BedrockRuntimeClient({
      region: "us-east-1",
      credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
    });
    const seen: unknown[] = [];
    client.middlewareStack.add(
      () => async (args) => {
        seen.push(args.input);
        return { output: HELLO_WORLD_RESPONSE, response: {} };
      },
      { step: "initialize", name: "stubConverse" },
    );
    const input: ConverseCommandInput = { modelId: MODEL, messages: [] };

    const result = await bedrockTransport(client)(input, new AbortController().signal);

    expect(result).toBe(HELLO_WORLD_RESPONSE);
    expect(seen).toEqual([input]);
  });
});

describe("clientConfigFrom", () => {
  it("maps region only when optional settings are absent", () => {
    expect(clientConfigFrom({ schema_version: 1, region: "eu-west-1", model_id: MODEL })).toEqual({
      region: "eu-west-1",
    });
  });

  it("maps profile and max_attempts", () => {
    expect(
      clientConfigFrom({
        schema_version: 1,
        region: "us-west-2",
        model_id: MODEL,
        profile: "dev",
        max_attempts: 1,
      }),
    ).toEqual({ region: "us-west-2", profile: "dev", maxAttempts: 1 });
  });
});
