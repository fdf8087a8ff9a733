import { bench, describe } from "vitest";
import { buildConverseInput } from "./message-translator.js";
import { assembleResponse } from "./response-assembler.js";
import { messageResponse } from "./fixtures.js";
import { textMessage } from "../../types/index.js";
import type { MessageContent } from "../../types/index.js";

const MODEL = "anthropic.claude-3-haiku-20240307-v1:0";

const CONVERSATION: MessageContent[] = [
  textMessage("system", "You are a concise assistant."),
  ...Array.from({ length: 20 }, (_, i) => textMessage(i % 2 === 0 ? "human" : "ai", `turn ${i}`)),
  {
    role: "human",
    parts: [
      { type: "text", text: "What is in these?" },
      { type: "image_url", url: "data:image/png;base64,iVBORw0KGgo=" },
      { type: "binary", mimeType: "application/pdf", filename: "brief", data: new Uint8Array(4096) },
    ],
  },
];

const RESPONSE = messageResponse(Array.from({ length: 10 }, (_, i) => ({ text: `line ${i}` })));

describe("translation — performance baseline", () => {
  bench(
    "buildConverseInput (22 turns, mixed content)",
    () => {
      buildConverseInput(MODEL, CONVERSATION, { model: MODEL });
    },
    { time: 1000 },
  );

  bench(
    "assembleResponse (10 text blocks)",
    () => {
      assembleResponse(RESPONSE);
    },
    { time: 1000 },
  );
});
