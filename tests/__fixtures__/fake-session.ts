// Test fixture: in-memory stand-in for a connected ToolServerSession

import { vi } from 'vitest';
import type { ToolSession } from '../../src/conversation/ConversationOrchestrator.js';
import type {
  ResourceDescriptor,
  ToolDescriptor,
  ToolInvocationResult,
} from '../../src/mcp-client/index.js';

export const ADD_NUMBER_TOOL: ToolDescriptor = {
  name: 'add_number',
  description: 'Add two numbers together',
  inputSchema: {
    type: 'object',
    properties: { a: { type: 'number' }, b: { type: 'number' } },
    required: ['a', 'b'],
  },
};

export class FakeToolSession implements ToolSession {
  readonly invoke = vi.fn(
    async (_name: string, _args: Record<string, unknown>): Promise<ToolInvocationResult> => ({
      content: '',
      isError: false,
    })
  );

  readonly readResource = vi.fn(async (uri: string): Promise<string> => {
    const content = this.resourceContents.get(uri);
    if (content === undefined) {
      throw new Error(`no such resource: ${uri}`);
    }
    return content;
  });

  constructor(
    private readonly tools: ToolDescriptor[] = [ADD_NUMBER_TOOL],
    private readonly resources: ResourceDescriptor[] = [],
    private readonly resourceContents: Map<string, string> = new Map()
  ) {}

  listTools(): ToolDescriptor[] {
    return [...this.tools];
  }

  listResources(): ResourceDescriptor[] {
    return [...this.resources];
  }
}
