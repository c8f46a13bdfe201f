/**
 * Tool Server Session
 *
 * Owns one MCP client connection: handshake, tool/resource discovery,
 * tool invocation, resource reads and teardown.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ConnectionError, InvocationError, NotConnectedError, errorMessage } from '../errors.js';
import type {
  JsonSchema,
  McpServerConfig,
  ResourceDescriptor,
  SessionState,
  ToolDescriptor,
  ToolInvocationResult,
  ToolServerSessionEvent,
  ToolServerSessionEventHandler,
  ToolServerSessionOptions,
  TransportFactory,
} from './types.js';

const CLIENT_INFO = { name: 'mcp-chat-bridge', version: '1.0.0' };

const stdioTransport: TransportFactory = (config) =>
  new StdioClientTransport({
    command: config.command,
    args: config.args,
    env: config.env,
    cwd: config.cwd,
  });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an advertised input schema into the fields the translator reads
 */
function toJsonSchema(value: unknown): JsonSchema | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  const schema: JsonSchema = {};
  if (value.type !== undefined) schema.type = value.type;
  if (typeof value.description === 'string') schema.description = value.description;
  if (value.required !== undefined) schema.required = value.required;
  if (Array.isArray(value.enum)) schema.enum = value.enum;

  const items = toJsonSchema(value.items);
  if (items) schema.items = items;

  if (isRecord(value.properties)) {
    schema.properties = Object.fromEntries(
      Object.entries(value.properties).map(([name, prop]): [string, JsonSchema] => [name, toJsonSchema(prop) ?? {}])
    );
  }

  return schema;
}

/**
 * Text blocks are returned as-is; anything else is rendered as JSON
 */
function renderContent(content: unknown): string {
  if (!Array.isArray(content)) {
    return content === undefined ? '' : JSON.stringify(content);
  }

  return content
    .map((block: unknown) =>
      isRecord(block) && block.type === 'text' && typeof block.text === 'string'
        ? block.text
        : JSON.stringify(block)
    )
    .join('\n');
}

/**
 * Manages a single connection to an MCP server
 */
export class ToolServerSession {
  private client: Client | null = null;
  private transport: Transport | null = null;
  private state: SessionState = 'disconnected';
  private tools: ToolDescriptor[] = [];
  private resources: ResourceDescriptor[] = [];
  private eventHandlers: Set<ToolServerSessionEventHandler> = new Set();
  private readonly transportFactory: TransportFactory;

  constructor(
    private readonly config: McpServerConfig,
    private readonly options: ToolServerSessionOptions = {}
  ) {
    this.transportFactory = options.transportFactory ?? stdioTransport;
  }

  get serverName(): string {
    return this.config.name;
  }

  get sessionState(): SessionState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  /**
   * Tools advertised at connect time
   */
  listTools(): ToolDescriptor[] {
    return [...this.tools];
  }

  /**
   * Resources advertised at connect time
   */
  listResources(): ResourceDescriptor[] {
    return [...this.resources];
  }

  addEventListener(handler: ToolServerSessionEventHandler): void {
    this.eventHandlers.add(handler);
  }

  removeEventListener(handler: ToolServerSessionEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  private emit(event: ToolServerSessionEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err) {
        console.error(`[ToolServerSession] Event handler error:`, err);
      }
    }
  }

  /**
   * Connect, run the initialize handshake, then list tools and resources.
   * On failure the session is closed and cannot be reused.
   */
  async connect(): Promise<void> {
    if (this.state !== 'disconnected') {
      throw new ConnectionError(`Session to ${this.config.name} is ${this.state}; open a new session instead`);
    }

    this.state = 'connecting';

    try {
      console.error(`[ToolServerSession] Connecting to ${this.config.name}...`);
      console.error(`[ToolServerSession] Command: ${[this.config.command, ...this.config.args].join(' ')}`);

      this.transport = this.transportFactory(this.config);
      const client = new Client(CLIENT_INFO, { capabilities: {} });
      this.client = client;

      await this.withConnectTimeout(client.connect(this.transport));

      this.tools = await this.discoverTools(client);
      this.resources = await this.discoverResources(client);

      this.state = 'ready';
      console.error(
        `[ToolServerSession] Connected to ${this.config.name} with ${this.tools.length} tools and ${this.resources.length} resources`
      );
      this.emit({
        type: 'connected',
        serverName: this.config.name,
        toolCount: this.tools.length,
        resourceCount: this.resources.length,
      });
    } catch (err) {
      console.error(`[ToolServerSession] Failed to connect to ${this.config.name}:`, errorMessage(err));
      await this.close();
      throw new ConnectionError(`Failed to connect to ${this.config.name}: ${errorMessage(err)}`, err);
    }
  }

  private async withConnectTimeout<T>(promise: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Connection timeout')), this.config.timeout);
    });

    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async discoverTools(client: Client): Promise<ToolDescriptor[]> {
    const tools: ToolDescriptor[] = [];
    let cursor: string | undefined;

    do {
      const response = await client.listTools(cursor ? { cursor } : undefined);
      for (const tool of response.tools) {
        tools.push({
          name: tool.name,
          description: tool.description,
          inputSchema: toJsonSchema(tool.inputSchema),
        });
      }
      cursor = response.nextCursor;
    } while (cursor);

    return tools;
  }

  private async discoverResources(client: Client): Promise<ResourceDescriptor[]> {
    if (!client.getServerCapabilities()?.resources) {
      console.error(`[ToolServerSession] ${this.config.name} does not expose resources`);
      return [];
    }

    const resources: ResourceDescriptor[] = [];
    let cursor: string | undefined;

    do {
      const response = await client.listResources(cursor ? { cursor } : undefined);
      for (const resource of response.resources) {
        resources.push({
          uri: resource.uri,
          name: resource.name,
          description: resource.description,
          mimeType: resource.mimeType,
        });
      }
      cursor = response.nextCursor;
    } while (cursor);

    return resources;
  }

  private requireClient(operation: string): Client {
    if (this.state !== 'ready' || !this.client) {
      throw new NotConnectedError(operation, this.state);
    }
    return this.client;
  }

  /**
   * Call a tool. A tool-level failure comes back with `isError: true`;
   * a failed request throws InvocationError. Never retried.
   */
  async invoke(toolName: string, args: Record<string, unknown>): Promise<ToolInvocationResult> {
    const client = this.requireClient(`invoke '${toolName}'`);
    const startTime = Date.now();

    console.error(`[ToolServerSession] Executing tool ${toolName} on ${this.config.name}`);
    console.error(`[ToolServerSession] Arguments:`, JSON.stringify(args));

    try {
      const response = await client.callTool(
        { name: toolName, arguments: args },
        undefined,
        this.options.toolTimeoutMs ? { timeout: this.options.toolTimeoutMs } : undefined
      );

      const result: ToolInvocationResult = {
        content: renderContent(response.content),
        isError: response.isError === true,
      };
      const durationMs = Date.now() - startTime;

      console.error(`[ToolServerSession] Tool ${toolName} executed in ${durationMs}ms`);
      this.emit({
        type: 'toolInvoked',
        serverName: this.config.name,
        toolName,
        arguments: args,
        result,
        durationMs,
      });

      return result;
    } catch (err) {
      const recoverable = err instanceof McpError && err.code === ErrorCode.InvalidParams;
      const error = new InvocationError(`Tool '${toolName}' failed: ${errorMessage(err)}`, toolName, recoverable, err);

      console.error(`[ToolServerSession] Tool execution failed:`, error.message);
      this.emit({
        type: 'toolInvoked',
        serverName: this.config.name,
        toolName,
        arguments: args,
        error,
        durationMs: Date.now() - startTime,
      });

      throw error;
    }
  }

  /**
   * Read a resource as text. Binary contents become a placeholder line.
   */
  async readResource(uri: string): Promise<string> {
    const client = this.requireClient(`read resource ${uri}`);
    const response = await client.readResource({ uri });

    return response.contents
      .map(content =>
        'text' in content && typeof content.text === 'string'
          ? content.text
          : `[binary content: ${content.mimeType ?? 'application/octet-stream'}]`
      )
      .join('\n');
  }

  /**
   * Tear down the client and transport. Safe to call in any state, any
   * number of times.
   */
  async close(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }

    const wasOpen = this.state !== 'disconnected';
    const client = this.client;
    const transport = this.transport;

    this.state = 'closed';
    this.client = null;
    this.transport = null;
    this.tools = [];
    this.resources = [];

    if (!wasOpen) {
      return;
    }

    console.error(`[ToolServerSession] Disconnecting from ${this.config.name}...`);

    try {
      if (client) {
        await client.close();
      } else if (transport) {
        await transport.close();
      }
    } catch (err) {
      console.error(`[ToolServerSession] Error during disconnect:`, err);
    }

    this.emit({ type: 'closed', serverName: this.config.name });
    console.error(`[ToolServerSession] Disconnected from ${this.config.name}`);
  }
}

/**
 * Open a session, hand it to `fn`, and close it on every exit path
 */
export async function withToolServerSession<T>(
  config: McpServerConfig,
  fn: (session: ToolServerSession) => Promise<T>,
  options: ToolServerSessionOptions = {}
): Promise<T> {
  const session = new ToolServerSession(config, options);
  try {
    await session.connect();
    return await fn(session);
  } finally {
    await session.close();
  }
}

export default ToolServerSession;
