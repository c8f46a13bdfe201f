import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ToolCallAuditLog, type ToolCallLog } from '../src/db/auditLog.js';
import { ToolServerSession } from '../src/mcp-client/index.js';
import { DEMO_SERVER_CONFIG, linkDemoServer } from './__fixtures__/demo-server.js';

function entry(overrides: Partial<ToolCallLog>): ToolCallLog {
  return {
    id: 'id-1',
    timestamp: '2024-01-01T00:00:00.000Z',
    server_name: 'demo-server',
    tool_name: 'add_number',
    arguments: '{}',
    output: null,
    error: null,
    is_error: 0,
    duration_ms: 10,
    ...overrides,
  };
}

describe('ToolCallAuditLog', () => {
  let log: ToolCallAuditLog;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    log = new ToolCallAuditLog(':memory:');
  });

  afterEach(() => {
    log.close();
    vi.restoreAllMocks();
  });

  it('returns recent calls newest first', () => {
    log.logToolCall(entry({ id: 'a', timestamp: '2024-01-01T00:00:01.000Z' }));
    log.logToolCall(entry({ id: 'b', timestamp: '2024-01-01T00:00:03.000Z' }));
    log.logToolCall(entry({ id: 'c', timestamp: '2024-01-01T00:00:02.000Z' }));

    expect(log.getRecentToolCalls().map(row => row.id)).toEqual(['b', 'c', 'a']);
    expect(log.getRecentToolCalls(1, 1).map(row => row.id)).toEqual(['c']);
  });

  it('aggregates stats per tool', () => {
    log.logToolCall(entry({ id: 'a', tool_name: 'add_number', duration_ms: 10 }));
    log.logToolCall(entry({ id: 'b', tool_name: 'add_number', duration_ms: 30 }));
    log.logToolCall(entry({ id: 'c', tool_name: 'divide', duration_ms: 50, is_error: 1 }));

    expect(log.getStats()).toEqual({
      total: 3,
      errors: 1,
      avgDuration: 30,
      toolStats: [
        { tool_name: 'add_number', count: 2, avg_duration: 20 },
        { tool_name: 'divide', count: 1, avg_duration: 50 },
      ],
    });
  });

  it('reports zeroed stats when empty', () => {
    expect(log.getStats()).toEqual({ total: 0, errors: 0, avgDuration: 0, toolStats: [] });
  });

  it('prunes all but the most recent entries', () => {
    log.logToolCall(entry({ id: 'a', timestamp: '2024-01-01T00:00:01.000Z' }));
    log.logToolCall(entry({ id: 'b', timestamp: '2024-01-01T00:00:02.000Z' }));
    log.logToolCall(entry({ id: 'c', timestamp: '2024-01-01T00:00:03.000Z' }));

    log.prune(2);

    expect(log.getRecentToolCalls().map(row => row.id)).toEqual(['c', 'b']);
  });

  it('clears all entries', () => {
    log.logToolCall(entry({ id: 'a' }));

    log.clear();

    expect(log.getStats().total).toBe(0);
  });

  it('records invocations of an attached session', async () => {
    const session = new ToolServerSession(DEMO_SERVER_CONFIG, { transportFactory: await linkDemoServer() });
    await session.connect();
    const detach = log.attach(session);

    await session.invoke('add_number', { a: 2, b: 3 });
    await session.invoke('divide', { a: 1, b: 0 });
    await session.invoke('flaky', {}).catch(() => undefined);
    detach();
    await session.invoke('add_number', { a: 1, b: 1 });
    await session.close();

    const rows = log.getRecentToolCalls().reverse();
    expect(rows).toHaveLength(3);
    expect(rows[0]).toMatchObject({
      server_name: 'demo-server',
      tool_name: 'add_number',
      arguments: '{"a":2,"b":3}',
      output: '5',
      error: null,
      is_error: 0,
    });
    expect(rows[1]).toMatchObject({ tool_name: 'divide', output: 'Cannot divide by zero', is_error: 1 });
    expect(rows[2]).toMatchObject({ tool_name: 'flaky', output: null, is_error: 1 });
    expect(rows[2].error).toContain('backend offline');
  });
});
