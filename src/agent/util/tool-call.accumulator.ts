import { ToolCall } from "../types";

interface OpenBlock {
  id: string;
  name: string;
  buffer: string;
}

/**
 * Parses the argument text of a finished tool-use block. Anything that is not
 * a JSON object (empty text, malformed JSON, arrays, scalars) becomes `{}`.
 */
export function parseToolInput(text: string): Record<string, unknown> {
  if (text.trim().length === 0) return {};
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return {};
  }
  return isPlainObject(value) ? value : {};
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reassembles tool calls from the fragments of a streamed model response.
 *
 * Argument fragments are buffered per block and only parsed when the block
 * closes, since a partial JSON document is never valid on its own.
 */
export class ToolCallAccumulator {
  private open: OpenBlock | null = null;
  private readonly completed: ToolCall[] = [];

  /** Opens a tool-use block. Returns the call it closed, if one was open. */
  start(id: string, name: string): ToolCall | undefined {
    const closed = this.close();
    this.open = { id, name, buffer: "" };
    return closed;
  }

  /**
   * Adds argument text to the open block. Returns false when there is no
   * block to receive it.
   */
  append(fragment: string): boolean {
    if (!this.open) return false;
    this.open.buffer += fragment;
    return true;
  }

  /** Closes the open block, if any, and returns its completed call. */
  close(): ToolCall | undefined {
    const block = this.open;
    if (!block) return undefined;
    this.open = null;

    const call: ToolCall = { id: block.id, name: block.name, input: parseToolInput(block.buffer) };
    this.completed.push(call);
    return call;
  }

  /** Closes whatever is open and returns every call in the order it started. */
  finish(): ToolCall[] {
    this.close();
    return [...this.completed];
  }

  get currentToolId(): string | undefined {
    return this.open?.id;
  }
}
