import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import type { ToolServerSession } from '../mcp-client/ToolServerSession.js';
import type { ToolServerSessionEvent } from '../mcp-client/types.js';

export interface ToolCallLog {
  id: string;
  timestamp: string;
  server_name: string;
  tool_name: string;
  arguments: string; // JSON
  output: string | null;
  error: string | null;
  is_error: number; // 0 | 1
  duration_ms: number;
}

export interface ToolCallStats {
  total: number;
  errors: number;
  avgDuration: number;
  toolStats: Array<{ tool_name: string; count: number; avg_duration: number }>;
}

/**
 * Records every tool invocation of a session in SQLite.
 * Conversation text is never written.
 */
export class ToolCallAuditLog {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(path.resolve(dbPath));
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        console.error(`[AuditLog] Created data directory: ${dir}`);
      }
    }

    try {
      this.db = new Database(dbPath);
      this.initSchema();
      console.error(`[AuditLog] Recording tool calls in ${dbPath}`);
    } catch (e) {
      console.error(`[AuditLog] Failed to initialize database: ${e}`);
      throw e;
    }
  }

  private initSchema() {
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tool_calls (
        id TEXT PRIMARY KEY,
        timestamp TEXT NOT NULL,
        server_name TEXT NOT NULL,
        tool_name TEXT NOT NULL,
        arguments TEXT,
        output TEXT,
        error TEXT,
        is_error INTEGER NOT NULL DEFAULT 0,
        duration_ms INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_tool_calls_timestamp ON tool_calls(timestamp);
    `);
  }

  /**
   * Subscribe to a session's invocation events. Returns the unsubscribe hook.
   */
  attach(session: Pick<ToolServerSession, 'addEventListener' | 'removeEventListener'>): () => void {
    const handler = (event: ToolServerSessionEvent) => {
      if (event.type !== 'toolInvoked') return;
      this.logToolCall({
        id: randomUUID(),
        timestamp: new Date().toISOString(),
        server_name: event.serverName,
        tool_name: event.toolName,
        arguments: JSON.stringify(event.arguments),
        output: event.result ? event.result.content : null,
        error: event.error ? event.error.message : null,
        is_error: event.error || event.result?.isError ? 1 : 0,
        duration_ms: event.durationMs,
      });
    };

    session.addEventListener(handler);
    return () => session.removeEventListener(handler);
  }

  public logToolCall(entry: ToolCallLog) {
    const stmt = this.db.prepare(`
      INSERT INTO tool_calls (id, timestamp, server_name, tool_name, arguments, output, error, is_error, duration_ms)
      VALUES (@id, @timestamp, @server_name, @tool_name, @arguments, @output, @error, @is_error, @duration_ms)
    `);
    stmt.run(entry);
  }

  public getRecentToolCalls(limit: number = 50, offset: number = 0): ToolCallLog[] {
    const stmt = this.db.prepare<[number, number], ToolCallLog>(`
      SELECT * FROM tool_calls ORDER BY timestamp DESC, rowid DESC LIMIT ? OFFSET ?
    `);
    return stmt.all(limit, offset);
  }

  public getStats(): ToolCallStats {
    const total = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM tool_calls').get();
    const errors = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM tool_calls WHERE is_error = 1')
      .get();
    const avgDuration = this.db
      .prepare<[], { avg: number | null }>('SELECT AVG(duration_ms) as avg FROM tool_calls')
      .get();

    const toolStats = this.db
      .prepare<[], { tool_name: string; count: number; avg_duration: number }>(`
        SELECT tool_name, COUNT(*) as count, AVG(duration_ms) as avg_duration
        FROM tool_calls
        GROUP BY tool_name
        ORDER BY tool_name
      `)
      .all();

    return {
      total: total?.count ?? 0,
      errors: errors?.count ?? 0,
      avgDuration: avgDuration?.avg ?? 0,
      toolStats,
    };
  }

  /**
   * Keep only the most recent `limit` entries
   */
  public prune(limit: number) {
    this.db
      .prepare(`
        DELETE FROM tool_calls
        WHERE id NOT IN (
          SELECT id FROM tool_calls ORDER BY timestamp DESC, rowid DESC LIMIT ?
        )
      `)
      .run(limit);
  }

  public clear() {
    this.db.exec('DELETE FROM tool_calls');
  }

  public close() {
    this.db.close();
  }
}
