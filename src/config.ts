/**
 * Centralized Configuration Module
 *
 * Loads and validates all settings from environment variables (and `.env`).
 */
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { McpServerConfigSchema, type McpServerConfig, type SchemaErrorPolicy } from './mcp-client/types.js';
import { DEFAULT_SYSTEM_PROMPT } from './conversation/prompts.js';

type Env = Record<string, string | undefined>;

/**
 * Interface that defines the configuration object structure.
 */
export interface Config {
  /** Credential for the model endpoint. Required. */
  apiKey: string;

  /** Base URL of the OpenAI-compatible API. */
  apiUrl: string;

  /** Model used for the conversation. */
  model: string;

  temperature: number;

  /** Maximum number of tokens per model response. */
  maxTokens: number;

  /** Timeout for each model request (ms). */
  modelTimeoutMs: number;

  /** Tool server launched over stdio. */
  server: McpServerConfig;

  /** Timeout for each tool call (ms). */
  toolTimeoutMs: number;

  /** Tool rounds allowed per query. */
  maxIterations: number;

  /** What to do with a tool whose schema cannot be translated. */
  schemaErrorPolicy: SchemaErrorPolicy;

  systemPrompt: string;

  /** Extra instructions appended to the system context. */
  instructions: string;

  /** Print each tool call in the chat. */
  showToolCalls: boolean;

  /** SQLite file for the tool-call audit log; unset disables it. */
  auditDbPath?: string;
}

const ConfigSchema = z.object({
  apiKey: z.string().min(1, 'BRIDGE_API_KEY (or OPENAI_API_KEY) is not set'),
  apiUrl: z.string().url(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
  modelTimeoutMs: z.number().int().positive(),
  server: McpServerConfigSchema,
  toolTimeoutMs: z.number().int().positive(),
  maxIterations: z.number().int().positive(),
  schemaErrorPolicy: z.enum(['fail', 'skip']),
  systemPrompt: z.string().min(1),
  instructions: z.string(),
  showToolCalls: z.boolean(),
  auditDbPath: z.string().min(1).optional(),
});

/**
 * Load `.env` into process.env. Variables already set win.
 */
export function loadDotenv(): void {
  const result = dotenv.config();
  // A missing .env file is normal; only report other failures
  if (result.error && !('code' in result.error && result.error.code === 'ENOENT')) {
    console.error('[CONFIG] Warning: dotenv.config() failed:', result.error.message);
  }
}

/**
 * Helper function to read and convert a numeric environment variable.
 * @param env - The environment to read from.
 * @param envVar - The environment variable name.
 * @param defaultValue - Used when the variable is not defined or invalid.
 */
function getNumericEnv(env: Env, envVar: string, defaultValue: number): number {
  const value = env[envVar];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getBooleanEnv(env: Env, envVar: string, defaultValue: boolean): boolean {
  const value = env[envVar];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse server arguments.
 * Format: BRIDGE_SERVER_ARGS='["server.py","--verbose"]'
 * Or a simpler format: BRIDGE_SERVER_ARGS='server.py --verbose'
 */
export function parseServerArgs(value: string | undefined): string[] {
  if (!value || !value.trim()) {
    return [];
  }

  if (value.trim().startsWith('[')) {
    let json: unknown;
    try {
      json = JSON.parse(value);
    } catch (err) {
      throw new ConfigError('BRIDGE_SERVER_ARGS is not valid JSON', err);
    }
    const parsed = z.array(z.string()).safeParse(json);
    if (!parsed.success) {
      throw new ConfigError('BRIDGE_SERVER_ARGS must be a JSON array of strings');
    }
    return parsed.data;
  }

  return value.split(/\s+/).filter(arg => arg.length > 0);
}

/**
 * Resolve the server command from CLI arguments. A lone script path is run
 * with the interpreter its extension implies.
 */
export function resolveServerCommand(
  argv: string[],
  fallback: Pick<McpServerConfig, 'command' | 'args'>
): Pick<McpServerConfig, 'command' | 'args'> {
  if (argv.length === 0) {
    return fallback;
  }

  const [first, ...rest] = argv;
  if (rest.length === 0 && first.endsWith('.py')) {
    return { command: 'python', args: [first] };
  }
  if (rest.length === 0 && /\.(c|m)?js$/.test(first)) {
    return { command: 'node', args: [first] };
  }
  return { command: first, args: rest };
}

/**
 * Read, validate, and build the configuration object.
 * @throws ConfigError when a required value is missing or invalid.
 */
export function loadConfig(env: Env = process.env, argv: string[] = []): Readonly<Config> {
  const server = resolveServerCommand(argv, {
    command: env.BRIDGE_SERVER_COMMAND || 'node',
    args: parseServerArgs(env.BRIDGE_SERVER_ARGS),
  });

  const candidate = {
    apiKey: env.BRIDGE_API_KEY || env.OPENAI_API_KEY || '',
    apiUrl: env.BRIDGE_API_URL || 'https://api.openai.com/v1',
    model: env.BRIDGE_MODEL || 'gpt-4o-mini',
    temperature: getNumericEnv(env, 'BRIDGE_TEMPERATURE', 0.2),
    maxTokens: getNumericEnv(env, 'BRIDGE_MAX_TOKENS', 1024),
    modelTimeoutMs: getNumericEnv(env, 'BRIDGE_MODEL_TIMEOUT', 60000),
    server: {
      name: env.BRIDGE_SERVER_NAME || 'tool-server',
      command: server.command,
      args: server.args,
      cwd: env.BRIDGE_SERVER_CWD || undefined,
      timeout: getNumericEnv(env, 'BRIDGE_CONNECT_TIMEOUT', 30000),
    },
    toolTimeoutMs: getNumericEnv(env, 'BRIDGE_TOOL_TIMEOUT', 60000),
    maxIterations: getNumericEnv(env, 'BRIDGE_MAX_ITERATIONS', 10),
    schemaErrorPolicy: env.BRIDGE_SCHEMA_ERROR_POLICY || 'fail',
    systemPrompt: env.BRIDGE_SYSTEM_PROMPT || DEFAULT_SYSTEM_PROMPT,
    instructions: env.BRIDGE_INSTRUCTIONS || '',
    showToolCalls: getBooleanEnv(env, 'BRIDGE_SHOW_TOOL_CALLS', true),
    auditDbPath: env.BRIDGE_AUDIT_DB || undefined,
  };

  const parsed = ConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, parsed.error);
  }

  // Freeze the object to make it immutable during the application lifecycle.
  return Object.freeze(parsed.data);
}
