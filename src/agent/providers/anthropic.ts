import { ChatAnthropic } from "@langchain/anthropic";
import { AIMessageChunk, BaseMessage } from "@langchain/core/messages";
import { Tool } from "@modelcontextprotocol/sdk/types.js";
import { AppConfig } from "../../config";

/** A tool as the Messages API expects it. */
export type AnthropicToolSpec = {
  name: string;
  description: string;
  input_schema: Tool["inputSchema"];
};

/** Anything that can stream a reply to a conversation. */
export interface ChatModel {
  stream(messages: BaseMessage[], options?: { signal?: AbortSignal }): Promise<AsyncIterable<AIMessageChunk>>;
}

export interface ModelFactory {
  /** Model for the first call of a query, with the provider's tools offered. */
  withTools(tools: AnthropicToolSpec[]): ChatModel;
  /** Model for follow-up calls after a tool result, with no tools offered. */
  plain(): ChatModel;
}

export function toAnthropicTools(tools: Tool[]): AnthropicToolSpec[] {
  return tools.map(tool => ({
    name: tool.name,
    description: tool.description ?? "",
    input_schema: tool.inputSchema,
  }));
}

export class AnthropicModels implements ModelFactory {
  constructor(private readonly config: AppConfig["anthropic"]) {}

  private createModel(): ChatAnthropic {
    return new ChatAnthropic({
      apiKey: this.config.apiKey,
      model: this.config.model,
      maxTokens: this.config.maxTokens,
      streaming: true,
    });
  }

  withTools(tools: AnthropicToolSpec[]): ChatModel {
    const model = this.createModel();
    return tools.length > 0 ? model.bindTools(tools) : model;
  }

  plain(): ChatModel {
    return this.createModel();
  }
}
