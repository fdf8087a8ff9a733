export type ChatMessageType = "system" | "human" | "ai" | "generic" | "tool" | "function";

export interface TextContent {
  type: "text";
  text: string;
}

export interface BinaryContent {
  type: "binary";
  mimeType: string;
  filename: string;
  data: Uint8Array;
}

/** Inline image carried as a `data:<mime>;[base64,]<payload>` URL */
export interface ImageURLContent {
  type: "image_url";
  url: string;
}

export type ContentPart = TextContent | BinaryContent | ImageURLContent;

export interface MessageContent {
  role: ChatMessageType;
  parts: ContentPart[];
}

export function textPart(text: string): TextContent {
  return { type: "text", text };
}

export function textMessage(role: ChatMessageType, text: string): MessageContent {
  return { role, parts: [textPart(text)] };
}
