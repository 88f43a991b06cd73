import { BaseMessage } from '@langchain/core/messages';
import { v4 } from 'uuid';

export interface ConversationDebugState {
  queryId: string | null;
  messages: { id: string; type: string; content: BaseMessage['content'] }[];
  currentResponseBuffer: string;
  currentToolCallBuffer: string;
}

/**
 * Messages of the query in flight, plus the text and tool-argument fragments
 * received so far. Nothing survives past the next query.
 */
export class ConversationState {
  private queryId: string | null = null;
  private messages: BaseMessage[] = [];

  private currentResponseBuffer = "";
  private currentToolCallBuffer = "";

  /** Starts a fresh conversation and returns its id. */
  public beginQuery(): string {
    this.clearMessages();
    this.queryId = v4();
    return this.queryId;
  }

  public addMessage(message: BaseMessage): void {
    if (message.id === undefined) {
      message.id = v4();
    }
    if (!this.messages.some(existing => existing.id === message.id)) {
      this.messages.push(message);
    }
  }

  public addTextDelta(delta: string): void {
    this.currentResponseBuffer += delta;
  }

  public addToolCallDelta(delta: string): void {
    this.currentToolCallBuffer += delta;
  }

  public clearBuffers(): void {
    this.currentResponseBuffer = "";
    this.currentToolCallBuffer = "";
  }

  public getMessages(): BaseMessage[] {
    return [...this.messages];
  }

  public clearMessages(): void {
    this.messages = [];
    this.queryId = null;
    this.clearBuffers();
  }

  public getDebugState(): ConversationDebugState {
    return {
      queryId: this.queryId,
      messages: this.messages.map(message => ({
        id: message.id ?? "",
        type: message.getType(),
        content: message.content,
      })),
      currentResponseBuffer: this.currentResponseBuffer,
      currentToolCallBuffer: this.currentToolCallBuffer,
    };
  }
}
