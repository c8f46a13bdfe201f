/**
 * Wires the session, model, orchestrator and shell together for one run.
 */

import type { Config } from './config.js';
import { ConversationOrchestrator } from './conversation/ConversationOrchestrator.js';
import { OpenAIModelBackend, type ModelBackend } from './conversation/ModelBackend.js';
import { ToolCallAuditLog } from './db/auditLog.js';
import { errorMessage } from './errors.js';
import { ToolServerSession, type ToolServerSessionOptions } from './mcp-client/index.js';
import { InteractiveShell, formatToolCall, type ShellIO } from './shell/InteractiveShell.js';

export interface RunOverrides {
  /** Transport and timeouts for the tool server session */
  session?: ToolServerSessionOptions;
  model?: ModelBackend;
  io?: ShellIO;
}

/**
 * Connect, chat until the user quits, and always close the session.
 * Resolves to the process exit code.
 */
export async function run(config: Readonly<Config>, overrides: RunOverrides = {}): Promise<number> {
  const session = new ToolServerSession(config.server, {
    toolTimeoutMs: config.toolTimeoutMs,
    ...overrides.session,
  });
  const output = overrides.io?.output ?? process.stdout;
  const print = (text: string) => output.write(`${text}\n`);
  let auditLog: ToolCallAuditLog | null = null;

  try {
    if (config.auditDbPath) {
      auditLog = new ToolCallAuditLog(config.auditDbPath);
      auditLog.attach(session);
    }

    print('🔌 Connecting to MCP server...');
    await session.connect();

    print('\n✅ Connected successfully!');
    print(`Available tools: ${session.listTools().map(t => t.name).join(', ') || '(none)'}`);
    print(`Available resources: ${session.listResources().map(r => r.name).join(', ') || '(none)'}`);

    const model =
      overrides.model ??
      new OpenAIModelBackend({
        apiKey: config.apiKey,
        baseURL: config.apiUrl,
        model: config.model,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        timeoutMs: config.modelTimeoutMs,
      });

    const orchestrator = new ConversationOrchestrator(session, model, {
      systemPrompt: config.systemPrompt,
      instructions: config.instructions,
      maxIterations: config.maxIterations,
      schemaErrorPolicy: config.schemaErrorPolicy,
      onToolCall: config.showToolCalls ? (call, result) => print(formatToolCall(call, result)) : undefined,
    });
    await orchestrator.prepare();

    await new InteractiveShell(orchestrator, overrides.io).run();
    return 0;
  } catch (err) {
    console.error(`❌ Error: ${errorMessage(err)}`);
    return 1;
  } finally {
    await session.close();
    auditLog?.close();
  }
}
