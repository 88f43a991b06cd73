import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/**
 * The text handed back to the model for a tool result: the first content item
 * when it is text, otherwise the whole content serialized as JSON.
 */
export function toolResultText(result: CallToolResult): string {
  const first = result.content[0];
  if (first !== undefined && first.type === "text") {
    return first.text;
  }
  return JSON.stringify(result.content);
}
