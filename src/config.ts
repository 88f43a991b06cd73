import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";
import { LogLevel, parseLogLevel } from "./logger";

export const DEFAULT_MODEL = "claude-sonnet-4-20250514";
export const DEFAULT_SERVER_COMMAND = "uvx";
export const DEFAULT_SERVER_ARGS = "mcp-server-fetch --ignore-robots-txt";

const splitArgs = (value: string): string[] => value.split(/\s+/).filter(arg => arg.length > 0);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().trim().min(1),
  ANTHROPIC_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  MCP_SERVER_COMMAND: z.string().trim().min(1).default(DEFAULT_SERVER_COMMAND),
  MCP_SERVER_ARGS: z.string().default(DEFAULT_SERVER_ARGS),
  MCP_PROXY_URL: z.string().trim().url().optional(),
  STREAM_DELAY_MS: z.coerce.number().int().nonnegative().default(10),
  DEBUG: z.string().optional(),
  DEBUG_SERVER_PORT: z.coerce.number().int().min(0).max(65535).default(3005),
});

export interface ServerConfig {
  command: string;
  args: string[];
}

export interface AppConfig {
  anthropic: {
    apiKey: string;
    model: string;
    maxTokens: number;
  };
  server: ServerConfig;
  streamDelayMs: number;
  logLevel: LogLevel | false;
  debugServerPort: number;
}

/**
 * Builds the runtime configuration from the environment.
 *
 * `argv` holds the arguments after the script name; when present the first one
 * replaces the tool-provider command and the rest its arguments.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = []): AppConfig {
  // Empty strings count as unset so that `FOO=` in .env falls back to the default.
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    ));
  }
  const vars = parsed.data;

  const [commandOverride, ...argsOverride] = argv;
  const server: ServerConfig = commandOverride
    ? { command: commandOverride, args: argsOverride }
    : { command: vars.MCP_SERVER_COMMAND, args: splitArgs(vars.MCP_SERVER_ARGS) };
  if (vars.MCP_PROXY_URL) {
    server.args.push("--proxy-url", vars.MCP_PROXY_URL);
  }

  return {
    anthropic: {
      apiKey: vars.ANTHROPIC_API_KEY,
      model: vars.ANTHROPIC_MODEL,
      maxTokens: vars.ANTHROPIC_MAX_TOKENS,
    },
    server,
    streamDelayMs: vars.STREAM_DELAY_MS,
    logLevel: parseLogLevel(vars.DEBUG),
    debugServerPort: vars.DEBUG_SERVER_PORT,
  };
}

/** Reads `.env` into `process.env` (existing variables win), then loads the config. */
export function loadConfigFromEnvironment(argv: string[] = process.argv.slice(2)): AppConfig {
  dotenv.config();
  return loadConfig(process.env, argv);
}
