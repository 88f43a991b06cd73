import { AIMessageChunk, MessageContent } from "@langchain/core/messages";
import { ModelStreamEvent } from "../types";
import { ToolCallAccumulator } from "./tool-call.accumulator";

/**
 * Pulls the text fragments out of a chunk's content. Plain string content is
 * used as is; in array content only `text` and `text_delta` parts carry text.
 */
export function extractText(content: MessageContent): string {
  if (typeof content === "string") return content;
  let text = "";
  for (const part of content) {
    if ((part.type === "text" || part.type === "text_delta") && "text" in part && typeof part.text === "string") {
      text += part.text;
    }
  }
  return text;
}

/**
 * Turns model stream chunks into client stream events and keeps track of the
 * tool calls the model asked for.
 */
export class StreamTranslator {
  private readonly accumulator = new ToolCallAccumulator();
  private text = "";

  translate(chunk: AIMessageChunk): ModelStreamEvent[] {
    const events: ModelStreamEvent[] = [];

    const text = extractText(chunk.content);
    if (text.length > 0) {
      // A text block after a tool-use block means the tool block has ended.
      const closed = this.accumulator.close();
      if (closed) events.push({ type: 'tool_call', tool: closed });
      this.text += text;
      events.push({ type: 'text_delta', content: text });
    }

    for (const toolChunk of chunk.tool_call_chunks ?? []) {
      if (toolChunk.id && toolChunk.name) {
        const closed = this.accumulator.start(toolChunk.id, toolChunk.name);
        if (closed) events.push({ type: 'tool_call', tool: closed });
        events.push({ type: 'tool_start', tool: { id: toolChunk.id, name: toolChunk.name } });
      }

      const fragment = toolChunk.args ?? "";
      const toolId = this.accumulator.currentToolId;
      if (fragment.length > 0 && toolId !== undefined && this.accumulator.append(fragment)) {
        events.push({ type: 'tool_input_delta', content: fragment, toolId });
      }
    }

    return events;
  }

  /** Call once the stream is exhausted; emits the call of a still-open block. */
  end(): ModelStreamEvent[] {
    const closed = this.accumulator.close();
    return closed ? [{ type: 'tool_call', tool: closed }] : [];
  }

  get accumulatedText(): string {
    return this.text;
  }
}
