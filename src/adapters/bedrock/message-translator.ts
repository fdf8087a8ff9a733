import { ConversationRole } from "@aws-sdk/client-bedrock-runtime";
import type {
  ContentBlock,
  ConverseCommandInput,
  InferenceConfiguration,
  Message,
  SystemContentBlock,
} from "@aws-sdk/client-bedrock-runtime";
import { ConverseError } from "../converse-error.js";
import { lookupDocumentFormat, lookupImageFormat } from "./format-resolution.js";
import type {
  BinaryContent,
  CallOptions,
  ChatMessageType,
  ContentPart,
  ImageURLContent,
  MessageContent,
} from "../../types/index.js";

export const DEFAULT_MAX_TOKENS = 512;
export const MAX_INT32 = 2_147_483_647;

const DATA_URL_PREFIX = "data:";
const BASE64_MARKER = "base64,";
const STRICT_BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;
const LINE_BREAKS = /[\r\n]/g;

// ---------------------------------------------------------------------------
// Inference parameters
// ---------------------------------------------------------------------------

/** Integer token budget in int32 range; non-finite or non-positive values take the default. */
export function resolveMaxTokens(maxTokens: number | undefined, defaultValue = DEFAULT_MAX_TOKENS): number {
  if (maxTokens === undefined || !Number.isFinite(maxTokens)) {
    return defaultValue;
  }
  const whole = Math.trunc(maxTokens);
  if (whole <= 0) {
    return defaultValue;
  }
  return Math.min(whole, MAX_INT32);
}

// topP and temperature are always sent; unset means 0.
function buildInferenceConfig(options: CallOptions): InferenceConfiguration {
  return {
    maxTokens: resolveMaxTokens(options.maxTokens),
    topP: options.topP ?? 0,
    temperature: options.temperature ?? 0,
    stopSequences: options.stopWords,
  };
}

// ---------------------------------------------------------------------------
// System preamble
// ---------------------------------------------------------------------------

export interface PartitionedMessages {
  system: MessageContent[];
  other: MessageContent[];
}

export function partitionMessages(messages: MessageContent[]): PartitionedMessages {
  const partitioned: PartitionedMessages = { system: [], other: [] };
  for (const message of messages) {
    if (message.role === "system") {
      partitioned.system.push(message);
    } else {
      partitioned.other.push(message);
    }
  }
  return partitioned;
}

export function processSystemMessages(messages: MessageContent[]): SystemContentBlock[] | undefined {
  const [systemMessage] = messages;
  if (systemMessage === undefined) {
    return undefined;
  }

  if (messages.length > 1) {
    throw new ConverseError(
      "MULTIPLE_SYSTEM_TURNS",
      `expected at most one system message, got ${messages.length}`,
      { count: messages.length },
    );
  }

  const [part] = systemMessage.parts;
  if (systemMessage.parts.length !== 1 || part?.type !== "text") {
    throw new ConverseError(
      "SYSTEM_CONTENT_MISMATCH",
      `expected system message to be a single text part, got ${describeParts(systemMessage.parts)}`,
      { parts: systemMessage.parts.map((p) => p.type) },
    );
  }

  return [{ text: part.text }];
}

// ---------------------------------------------------------------------------
// Conversation turns
// ---------------------------------------------------------------------------

export function toConversationRole(role: ChatMessageType): ConversationRole {
  switch (role) {
    case "human": return ConversationRole.USER;
    case "ai": return ConversationRole.ASSISTANT;
    default:
      throw new ConverseError("UNSUPPORTED_ROLE", `unsupported role: ${String(role)}`, { role });
  }
}

export function processMessages(messages: MessageContent[]): Message[] {
  return messages.map((message) => ({
    role: toConversationRole(message.role),
    content: message.parts.map(toContentBlock),
  }));
}

export function toContentBlock(part: ContentPart): ContentBlock {
  switch (part.type) {
    case "text":
      return { text: part.text };
    case "binary":
      return binaryToContentBlock(part);
    case "image_url":
      return imageUrlToContentBlock(part);
    default: {
      const unhandled: never = part;
      throw unsupportedContent(unhandled);
    }
  }
}

function unsupportedContent(part: unknown): ConverseError {
  const kind =
    typeof part === "object" && part !== null && "type" in part ? String(part.type) : typeof part;
  return new ConverseError("UNSUPPORTED_CONTENT", `unsupported content type: ${kind}`, { type: kind });
}

function binaryToContentBlock(part: BinaryContent): ContentBlock {
  const imageFormat = lookupImageFormat(part.mimeType);
  if (imageFormat !== undefined) {
    return { image: { format: imageFormat, source: { bytes: part.data } } };
  }

  const documentFormat = lookupDocumentFormat(part.mimeType);
  if (documentFormat !== undefined) {
    return {
      document: { name: part.filename, format: documentFormat, source: { bytes: part.data } },
    };
  }

  throw new ConverseError(
    "UNSUPPORTED_MIME_TYPE",
    `unsupported content type: ${part.mimeType}`,
    { mimeType: part.mimeType, filename: part.filename },
  );
}

function imageUrlToContentBlock(part: ImageURLContent): ContentBlock {
  const segments = part.url.split(";");
  const [header, payload] = segments;
  if (segments.length !== 2 || header === undefined || payload === undefined) {
    throw malformedImageUrl(part.url);
  }

  if (!header.startsWith(DATA_URL_PREFIX)) {
    throw malformedImageUrl(part.url);
  }

  const mimeType = header.slice(DATA_URL_PREFIX.length);
  const imageFormat = lookupImageFormat(mimeType);
  if (imageFormat === undefined) {
    throw new ConverseError("UNSUPPORTED_MIME_TYPE", `unsupported mime type: ${mimeType}`, { mimeType });
  }

  const bytes = payload.startsWith(BASE64_MARKER)
    ? decodeBase64(payload.slice(BASE64_MARKER.length), mimeType)
    : new TextEncoder().encode(payload);

  return { image: { format: imageFormat, source: { bytes } } };
}

function malformedImageUrl(url: string): ConverseError {
  return new ConverseError("MALFORMED_IMAGE_URL", `unsupported image url: ${preview(url)}`, {
    url: preview(url),
  });
}

// Buffer.from(…, "base64") skips characters it does not recognise, so the
// alphabet and padding are checked up front. Line breaks are allowed.
function decodeBase64(payload: string, mimeType: string): Uint8Array {
  const encoded = payload.replace(LINE_BREAKS, "");
  if (encoded.length % 4 !== 0 || !STRICT_BASE64.test(encoded)) {
    throw new ConverseError(
      "INVALID_BASE64",
      `illegal base64 data in ${mimeType} image url`,
      { mimeType, length: encoded.length },
    );
  }
  return Uint8Array.from(Buffer.from(encoded, "base64"));
}

function preview(value: string): string {
  return value.length > 64 ? `${value.slice(0, 64)}...` : value;
}

function describeParts(parts: ContentPart[]): string {
  return parts.length === 0 ? "no parts" : parts.map((p) => p.type).join(", ");
}

// ---------------------------------------------------------------------------
// Request assembly
// ---------------------------------------------------------------------------

export function buildConverseInput(
  modelId: string,
  messages: MessageContent[],
  options: CallOptions,
): ConverseCommandInput {
  const { system, other } = partitionMessages(messages);
  const systemPrompt = processSystemMessages(system);

  const input: ConverseCommandInput = {
    modelId,
    messages: processMessages(other),
    inferenceConfig: buildInferenceConfig(options),
  };

  if (systemPrompt) {
    input.system = systemPrompt;
  }

  return input;
}
