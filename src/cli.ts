#!/usr/bin/env node
import readline from 'readline';
import { AppConfig, loadConfigFromEnvironment } from './config';
import { ILogger, Logger } from './logger';
import { describeError, errorStack, isAbortError } from './errors';
import { MCPClient, ToolProviderConnection } from './agent/mcp.client';
import { AnthropicModels, ModelFactory } from './agent/providers/anthropic';
import { ChatAgent } from './agent/agent';
import { StreamEvent } from './agent/types';
import { DebugServer } from './debug-server';
import { Typewriter } from './ui/typewriter';

export const YELLOW = '\x1b[33m';
export const BLUE = '\x1b[34m';
export const RESET = '\x1b[0m';

export const PROMPT = '\nQuery: ';

export function colorize(color: string, text: string, enabled: boolean): string {
  return enabled ? `${color}${text}${RESET}` : text;
}

function isTTY(stream: NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}
const QUIT_COMMAND = 'quit';

export interface CLIOptions {
  config: AppConfig;
  logger: ILogger;
  toolProvider: ToolProviderConnection;
  models: ModelFactory;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class CLI {
  private readonly config: AppConfig;
  private readonly logger: ILogger;
  private readonly toolProvider: ToolProviderConnection;
  private readonly agent: ChatAgent;
  private readonly typewriter: Typewriter;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly useColor: boolean;
  private debugServer: DebugServer | null = null;

  private rl: readline.Interface | null = null;
  private readonly inputQueue: string[] = [];
  private isProcessingInput = false;
  private inputClosed = false;
  private currentAbortController: AbortController | null = null;
  private finishLoop: (() => void) | null = null;

  constructor(options: CLIOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.toolProvider = options.toolProvider;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.useColor = isTTY(this.output);
    this.agent = new ChatAgent(this.toolProvider, options.models, this.logger);
    this.typewriter = new Typewriter(this.output, this.config.streamDelayMs);
  }

  /** Starts the tool provider, lists its tools and, when logging is on, the debug API. */
  public async init(): Promise<void> {
    await this.logger.info('INIT', 'Connecting to tool provider', { server: this.config.server });
    await this.toolProvider.connect(this.config.server);

    const tools = await this.toolProvider.getTools();
    this.output.write(`\nConnected to server with tools: ${JSON.stringify(tools.map(tool => tool.name))}\n`);
    await this.logger.info('INIT', 'Tool provider ready', { tools: tools.map(tool => tool.name) });

    if (this.logger.isActive()) {
      this.debugServer = new DebugServer(this.agent.conversationState, this.logger);
      const port = await this.debugServer.start(this.config.debugServerPort);
      this.output.write(`${this.paint(BLUE, 'Debugger API up and running!')}\n`);
      this.output.write(`${this.paint(BLUE, `  State: http://localhost:${port}/state`)}\n`);
      this.output.write(`${this.paint(BLUE, `  Logs:  http://localhost:${port}/logs`)}\n`);
    }
  }

  /** Reads queries until `quit`, end of input or an idle Ctrl+C. */
  public chatLoop(): Promise<void> {
    this.output.write('\nMCP Client Started!\n');
    this.output.write(`Type your queries or '${QUIT_COMMAND}' to exit.\n`);

    const finished = new Promise<void>(resolve => {
      this.finishLoop = resolve;
    });

    const rl = readline.createInterface({ input: this.input, output: this.output });
    this.rl = rl;
    rl.setPrompt(PROMPT);

    rl.on('line', (line) => {
      this.inputQueue.push(line);
      void this.logger.debug('QUEUE', 'Input queued', { queueLength: this.inputQueue.length });
      setImmediate(() => {
        this.processNextInput().catch((error: unknown) => {
          void this.logger.error('PROCESS', 'Failed to process input', { error: errorStack(error) });
        });
      });
    });

    rl.on('SIGINT', () => this.interrupt());

    rl.on('close', () => {
      void this.logger.info('READLINE', 'Input closed');
      this.inputClosed = true;
      this.maybeFinish();
    });

    rl.prompt();
    return finished;
  }

  /** Ctrl+C: aborts the running query, or ends the loop when idle. */
  public interrupt(): void {
    if (this.currentAbortController) {
      void this.logger.info('INTERRUPT', 'Aborting current query');
      this.currentAbortController.abort();
    } else {
      this.output.write('\n');
      this.quit();
    }
  }

  private async processNextInput(): Promise<void> {
    if (this.isProcessingInput || this.inputQueue.length === 0) return;

    this.isProcessingInput = true;
    try {
      const line = this.inputQueue.shift();
      if (line === undefined) return;
      const query = line.trim();

      if (query.toLowerCase() === QUIT_COMMAND) {
        this.quit();
        return;
      }
      if (query.length > 0) {
        await this.handleLine(query);
      }
      if (!this.inputClosed) {
        this.rl?.prompt();
      }
    } finally {
      this.isProcessingInput = false;
      if (this.inputQueue.length > 0) {
        setImmediate(() => {
          this.processNextInput().catch((error: unknown) => {
            void this.logger.error('PROCESS', 'Failed to process input', { error: errorStack(error) });
          });
        });
      } else {
        this.maybeFinish();
      }
    }
  }

  private async handleLine(query: string): Promise<void> {
    const controller = new AbortController();
    this.currentAbortController = controller;
    try {
      const response = await this.processQuery(query, controller.signal);
      this.output.write(`\n${response}\n`);
    } catch (error) {
      if (controller.signal.aborted || isAbortError(error)) {
        await this.logger.info('INTERRUPT', 'Query aborted');
        this.output.write('\nInterrupted.\n');
      } else {
        await this.logger.error('HANDLE', 'Error processing query', { error: errorStack(error) });
        this.output.write(`${this.paint(YELLOW, `\nError: ${describeError(error)}`)}\n`);
      }
    } finally {
      this.currentAbortController = null;
    }
  }

  /**
   * Runs one query through the agent, rendering its progress as it streams.
   * Returns the final answer.
   */
  public async processQuery(query: string, signal?: AbortSignal): Promise<string> {
    let answer = '';
    for await (const event of this.agent.streamResponse(query, { signal })) {
      if (event.type === 'text') {
        answer = event.content;
      } else {
        await this.render(event, signal);
      }
    }
    this.output.write('\n\n');
    return answer;
  }

  private async render(event: Exclude<StreamEvent, { type: 'text' }>, signal?: AbortSignal): Promise<void> {
    switch (event.type) {
      case 'status':
        if (event.status === 'thinking') {
          this.output.write('\n🤖 Claude is thinking...\n');
        } else {
          this.output.write('\n🤖 Processing tool result...\n');
        }
        this.output.write('\n💬 ');
        break;
      case 'text_delta':
        await this.typewriter.print(event.content, signal);
        break;
      case 'tool_execution':
        this.output.write(`\n\n${this.paint(BLUE, `🔧 Calling tool ${event.tool.name} ${JSON.stringify(event.tool.input)}...`)}\n`);
        break;
      case 'tool_result':
        this.output.write(`\n${this.paint(BLUE, `🔧 Tool ${event.tool.name} returned: `)}\n${event.content}\n`);
        break;
      case 'tool_start':
      case 'tool_input_delta':
      case 'tool_call':
        await this.logger.debug('STREAM', 'Tool stream event', { eventType: event.type });
        break;
    }
  }

  private paint(color: string, text: string): string {
    return colorize(color, text, this.useColor);
  }

  private quit() {
    this.inputQueue.length = 0;
    this.currentAbortController?.abort();
    if (!this.inputClosed) {
      this.rl?.close();
    }
  }

  private maybeFinish() {
    if (this.inputClosed && !this.isProcessingInput && this.inputQueue.length === 0 && this.finishLoop) {
      const finish = this.finishLoop;
      this.finishLoop = null;
      finish();
    }
  }

  public async cleanup(): Promise<void> {
    await this.logger.info('CLEANUP', 'Starting cleanup');
    this.currentAbortController?.abort();
    if (!this.inputClosed) {
      this.rl?.close();
    }
    this.rl = null;

    await this.toolProvider.disconnect();

    if (this.debugServer) {
      try {
        await this.debugServer.stop();
      } catch (error) {
        await this.logger.warn('CLEANUP', 'Error stopping debug server', { error: describeError(error) });
      }
      this.debugServer = null;
    }
    await this.logger.info('CLEANUP', 'Cleanup complete');
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfigFromEnvironment(argv);
  } catch (error) {
    console.error(colorize(YELLOW, describeError(error), isTTY(process.stderr)));
    return 1;
  }

  const logger = await Logger.init(config.logLevel);
  await logger.info('STARTUP', 'Starting main process', { model: config.anthropic.model });

  const cli = new CLI({
    config,
    logger,
    toolProvider: new MCPClient(logger),
    models: new AnthropicModels(config.anthropic),
  });

  let exitCode = 0;
  try {
    await cli.init();
    await cli.chatLoop();
  } catch (error) {
    await logger.error('STARTUP', 'Error in main process', { error: errorStack(error) });
    console.error(colorize(YELLOW, `Error: ${describeError(error)}`, isTTY(process.stderr)));
    exitCode = 1;
  } finally {
    await cli.cleanup();
    await logger.shutdown();
  }
  return exitCode;
}

/**
 * Last stop for errors nothing else caught: prints them and, once the logger is
 * up, records them in the log and flushes it.
 */
export async function reportFatalError(category: string, message: string, error: unknown): Promise<void> {
  console.error(`[ERROR] ${message}:`, error);
  let logger: Logger;
  try {
    logger = Logger.getInstance();
  } catch {
    // Failed before the logger was initialised; the console line is all there is.
    return;
  }
  await logger.error(category, message, { error: errorStack(error) });
  await logger.shutdown();
}

if (require.main === module) {
  process.on('uncaughtException', (error) => {
    void reportFatalError('UNCAUGHT', 'Uncaught exception', error).finally(() => process.exit(1));
  });
  process.on('unhandledRejection', (error) => {
    void reportFatalError('UNHANDLED', 'Unhandled rejection', error).finally(() => process.exit(1));
  });

  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error('[ERROR] Main process error:', error);
      process.exit(1);
    }
  );
}
