export interface ToolUseEvent {
  name: string;
  id: string;
}

/** A tool invocation reassembled from the model stream. */
export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

// Gets emitted at the beginning of a tool-use block in the model stream
export type ToolStartEvent = {
  type: 'tool_start';
  tool: ToolUseEvent;
}

// Stream of the model's input to a tool
export type ToolInputEvent = {
  type: 'tool_input_delta';
  content: string;
  toolId: string;
}

// A tool-use block is complete and its arguments are parsed
export type ToolEvent = {
  type: 'tool_call';
  tool: ToolCall;
}

// The tool call is being sent to the tool provider
export type ToolExecutionEvent = {
  type: 'tool_execution';
  tool: ToolCall;
}

// The tool provider answered a tool call
export type ToolResultEvent = {
  type: 'tool_result';
  tool: ToolUseEvent;
  content: string;
  isError: boolean;
}

// Progress markers between model calls
export type StatusEvent = {
  type: 'status';
  status: 'thinking' | 'processing_tool_result';
}

// The full answer to a query
export type MessageEvent = {
  type: 'text';
  content: string;
}

// Stream of text chunks
export type TextStreamEvent = {
  type: 'text_delta';
  content: string;
}

/** What the model stream itself produces. */
export type ModelStreamEvent = TextStreamEvent | ToolStartEvent | ToolInputEvent | ToolEvent;

export type StreamEvent = ModelStreamEvent | ToolExecutionEvent | ToolResultEvent | StatusEvent | MessageEvent;
