import { describe, it, expect, expectTypeOf } from "vitest";
import { textMessage, textPart } from "./chat-message.js";
import type { ChatMessageType, ContentPart, MessageContent } from "./chat-message.js";

describe("MessageContent type shape", () => {
  it("requires role and parts", () => {
    expectTypeOf<MessageContent>().toHaveProperty("role").toEqualTypeOf<ChatMessageType>();
    expectTypeOf<MessageContent>().toHaveProperty("parts").toEqualTypeOf<ContentPart[]>();
  });

  it("content part discriminant is a closed union", () => {
    expectTypeOf<ContentPart["type"]>().toEqualTypeOf<"text" | "binary" | "image_url">();
  });

  it("binary data is raw bytes", () => {
    expectTypeOf<Extract<ContentPart, { type: "binary" }>["data"]>().toEqualTypeOf<Uint8Array>();
  });
});

describe("textMessage", () => {
  it("wraps text in a single text part", () => {
    expect(textMessage("human", "Hi")).toEqual({
      role: "human",
      parts: [{ type: "text", text: "Hi" }],
    });
  });

  it("textPart builds a text variant", () => {
    expect(textPart("x")).toEqual({ type: "text", text: "x" });
  });
});
