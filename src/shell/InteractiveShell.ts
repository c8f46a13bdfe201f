/**
 * Interactive Shell
 *
 * Line-oriented chat loop on top of the orchestrator. A failed turn is
 * reported and the loop keeps reading; quitting or an interrupt ends `run()`
 * so the caller can close the session.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { ConversationOrchestrator } from '../conversation/ConversationOrchestrator.js';
import type { FunctionCallRequest } from '../conversation/ConversationState.js';
import { errorMessage } from '../errors.js';
import type { ToolInvocationResult } from '../mcp-client/types.js';

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(['quit', 'exit', 'q']);

export type ShellOrchestrator = Pick<ConversationOrchestrator, 'answer' | 'reset' | 'describeTools'>;

export interface ShellIO {
  input: Readable;
  output: Writable;
}

export function formatToolCall(call: FunctionCallRequest, result: ToolInvocationResult): string {
  return [
    `\n🔧 Calling tool: ${call.name}`,
    `   Arguments: ${JSON.stringify(call.arguments)}`,
    `   ${result.isError ? 'Error' : 'Result'}: ${result.content}`,
  ].join('\n');
}

export class InteractiveShell {
  private readonly io: ShellIO;
  private rl: Interface | null = null;
  private interrupted = false;

  constructor(
    private readonly orchestrator: ShellOrchestrator,
    io?: ShellIO
  ) {
    this.io = io ?? { input: process.stdin, output: process.stdout };
  }

  write(text: string): void {
    this.io.output.write(`${text}\n`);
  }

  /**
   * Read and answer lines until a quit command, end of input or SIGINT
   */
  async run(): Promise<void> {
    const rl = createInterface({ input: this.io.input, output: this.io.output });
    this.rl = rl;
    this.interrupted = false;
    let inputClosed = false;
    rl.once('close', () => {
      inputClosed = true;
    });

    const onInterrupt = () => this.interrupt();
    rl.on('SIGINT', onInterrupt);
    process.on('SIGINT', onInterrupt);

    this.write("\n💬 MCP Chat (type 'quit' to exit, '/tools' to list tools, '/reset' to start over)");
    this.write('='.repeat(50));

    try {
      rl.setPrompt('\nYou: ');
      rl.prompt();

      for await (const raw of rl) {
        const line = raw.trim();

        if (EXIT_COMMANDS.has(line.toLowerCase())) {
          this.write('Goodbye!');
          break;
        }

        if (line) {
          await this.handleLine(line);
        }
        if (this.interrupted) break;
        if (!inputClosed) rl.prompt();
      }
    } finally {
      process.off('SIGINT', onInterrupt);
      rl.close();
      this.rl = null;
    }
  }

  /**
   * Stop reading input; `run()` then resolves
   */
  interrupt(): void {
    if (!this.rl || this.interrupted) return;
    this.interrupted = true;
    this.write('\n\nGoodbye!');
    this.rl.close();
  }

  private async handleLine(line: string): Promise<void> {
    if (line === '/reset') {
      this.orchestrator.reset();
      this.write('Conversation cleared.');
      return;
    }

    if (line === '/tools') {
      this.write(this.orchestrator.describeTools());
      return;
    }

    try {
      const answer = await this.orchestrator.answer(line);
      this.write(`\nAssistant: ${answer}`);
    } catch (err) {
      console.error('[InteractiveShell] Turn failed:', err);
      this.write(`\n❌ Error: ${errorMessage(err)}`);
    }
  }
}
