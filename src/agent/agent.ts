import { AIMessage, HumanMessage } from "@langchain/core/messages";
import { ILogger } from "../logger";
import { describeError, isAbortError } from "../errors";
import { ToolProvider } from "./mcp.client";
import { AnthropicToolSpec, ChatModel, ModelFactory, toAnthropicTools } from "./providers/anthropic";
import { ConversationState } from "./state/conversation.state";
import { StreamTranslator } from "./util/stream.translator";
import { toolResultText } from "./util/tool-result";
import { ModelStreamEvent, StreamEvent, ToolCall } from "./types";

export interface StreamOptions {
  signal?: AbortSignal;
}

function throwIfAborted(signal?: AbortSignal) {
  if (signal?.aborted) {
    const error = new Error('Aborted');
    error.name = 'AbortError';
    throw error;
  }
}

/**
 * Answers one query at a time: asks the model with the provider's tools on
 * offer, runs each tool it calls and asks again with the tool's result.
 */
export class ChatAgent {
  constructor(
    private readonly toolProvider: ToolProvider,
    private readonly models: ModelFactory,
    private readonly logger: ILogger,
    private readonly state: ConversationState = new ConversationState()
  ) {}

  get conversationState(): ConversationState {
    return this.state;
  }

  public async* streamResponse(query: string, options: StreamOptions = {}): AsyncGenerator<StreamEvent> {
    const { signal } = options;
    const queryId = this.state.beginQuery();
    await this.logger.info('QUERY', 'Processing query', { queryId, queryLength: query.length });

    this.state.addMessage(new HumanMessage({ content: query }));

    // Tools are listed again for every query so the model sees the provider's current set.
    const tools: AnthropicToolSpec[] = toAnthropicTools(await this.toolProvider.getTools());
    throwIfAborted(signal);

    yield { type: 'status', status: 'thinking' };

    const translator = new StreamTranslator();
    const toolCalls: ToolCall[] = [];
    for await (const event of this.streamModel(this.models.withTools(tools), translator, signal)) {
      if (event.type === 'tool_call') {
        toolCalls.push(event.tool);
      }
      yield event;
    }

    const accumulatedText = translator.accumulatedText;
    const finalParts: string[] = accumulatedText ? [accumulatedText] : [];
    await this.logger.debug('QUERY', 'First response complete', {
      queryId,
      textLength: accumulatedText.length,
      toolCalls: toolCalls.map(call => call.name)
    });

    for (const call of toolCalls) {
      throwIfAborted(signal);
      yield { type: 'tool_execution', tool: call };

      const result = await this.toolProvider.executeTool(call.name, call.input, { signal });
      const resultText = toolResultText(result);
      await this.logger.info('TOOL', 'Tool returned', {
        queryId,
        name: call.name,
        isError: result.isError === true,
        resultLength: resultText.length
      });
      yield {
        type: 'tool_result',
        tool: { id: call.id, name: call.name },
        content: resultText,
        isError: result.isError === true
      };

      this.state.addMessage(new AIMessage({ content: accumulatedText || `I'll use the ${call.name} tool.` }));
      this.state.addMessage(new HumanMessage({ content: resultText }));

      yield { type: 'status', status: 'processing_tool_result' };

      const followUp = new StreamTranslator();
      yield* this.streamModel(this.models.plain(), followUp, signal);
      if (followUp.accumulatedText) {
        finalParts.push(followUp.accumulatedText);
      }
    }

    throwIfAborted(signal);
    const answer = finalParts.join("\n");
    await this.logger.info('QUERY', 'Query complete', { queryId, answerLength: answer.length });
    yield { type: 'text', content: answer };
  }

  /** Streams one model call over the current conversation. */
  private async* streamModel(model: ChatModel, translator: StreamTranslator, signal?: AbortSignal): AsyncGenerator<ModelStreamEvent> {
    this.state.clearBuffers();
    let chunkCount = 0;

    try {
      const stream = await model.stream(this.state.getMessages(), { signal });
      for await (const chunk of stream) {
        throwIfAborted(signal);
        chunkCount++;
        for (const event of translator.translate(chunk)) {
          this.record(event);
          yield event;
        }
      }
      // The consumer may have been interrupted while handling the last chunk.
      throwIfAborted(signal);
      for (const event of translator.end()) {
        yield event;
      }
    } catch (error) {
      if (isAbortError(error)) {
        await this.logger.info('STREAM', 'Stream aborted', { chunkCount });
        throw error;
      }
      await this.logger.error('STREAM', 'Error in stream processing', {
        error: describeError(error),
        chunkCount
      });
      throw error;
    }

    await this.logger.debug('STREAM', 'Stream completed', { chunkCount });
  }

  private record(event: ModelStreamEvent) {
    if (event.type === 'text_delta') {
      this.state.addTextDelta(event.content);
    } else if (event.type === 'tool_input_delta') {
      this.state.addToolCallDelta(event.content);
    }
  }
}
