import type { ConverseCommandOutput, ConverseOutput } from "@aws-sdk/client-bedrock-runtime";
import { ConverseError } from "../converse-error.js";
import type { ContentResponse } from "../../types/index.js";

export const OUTPUT_SEPARATOR = "\n";

function describeOutput(output: ConverseOutput | undefined): string {
  if (output === undefined) return "none";
  return output.$unknown?.[0] ?? "unknown";
}

/**
 * Flattens a Converse response into a single choice.
 *
 * Text blocks are kept as-is. Image blocks with inline bytes are decoded as
 * UTF-8 text and appended alongside them; every other block kind (tool use,
 * reasoning, citations, ...) is skipped rather than rejected.
 */
export function assembleResponse(output: ConverseCommandOutput): ContentResponse {
  const message = output.output?.message;
  if (message === undefined) {
    const variant = describeOutput(output.output);
    throw new ConverseError("UNEXPECTED_OUTPUT", `unexpected output type: ${variant}`, { variant });
  }

  const decoder = new TextDecoder();
  const outputContents: string[] = [];
  for (const block of message.content ?? []) {
    if (block.text !== undefined) {
      outputContents.push(block.text);
      continue;
    }
    // TODO: surface images as structured attachments once ContentChoice can carry them
    const imageBytes = block.image?.source?.bytes;
    if (imageBytes !== undefined) {
      outputContents.push(decoder.decode(imageBytes));
    }
  }

  return {
    choices: [
      {
        content: outputContents.join(OUTPUT_SEPARATOR),
        stopReason: output.stopReason ?? "",
        generationInfo: {
          input_tokens: output.usage?.inputTokens ?? 0,
          output_tokens: output.usage?.outputTokens ?? 0,
        },
      },
    ],
  };
}
