/**
 * MCP Client Types
 *
 * Type definitions for the tool-server session, the descriptors it
 * advertises and the function declarations the model is given.
 */

import { z } from 'zod';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

// ============================================================================
// MCP SERVER CONFIGURATION
// ============================================================================

/**
 * Configuration for launching an MCP server over stdio
 */
export interface McpServerConfig {
  /** Display name used in logs */
  name: string;

  /** Command to execute (e.g., 'node', 'python', 'npx') */
  command: string;

  /** Arguments to pass to the command */
  args: string[];

  /** Optional environment variables for the process */
  env?: Record<string, string>;

  /** Optional working directory */
  cwd?: string;

  /** Handshake timeout in milliseconds */
  timeout: number;
}

export const McpServerConfigSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().optional(),
  timeout: z.number().positive().default(30000),
});

/**
 * Builds the transport for a session. Defaults to a stdio child process;
 * tests hand in one end of an in-memory pair.
 */
export type TransportFactory = (config: McpServerConfig) => Transport;

export interface ToolServerSessionOptions {
  transportFactory?: TransportFactory;

  /** Per-call timeout passed to the SDK for tools/call */
  toolTimeoutMs?: number;
}

// ============================================================================
// DESCRIPTORS
// ============================================================================

/**
 * JSON Schema fragment as advertised by a tool server
 */
export interface JsonSchema {
  type?: unknown;
  properties?: Record<string, JsonSchema>;
  required?: unknown;
  items?: JsonSchema;
  enum?: unknown[];
  description?: string;
  [key: string]: unknown;
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema?: JsonSchema;
}

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

// ============================================================================
// FUNCTION DECLARATIONS (OpenAI tool format)
// ============================================================================

export const PARAMETER_KINDS = ['string', 'number', 'integer', 'boolean', 'object', 'array'] as const;

/** Closed set of parameter types a function declaration may carry */
export type ParameterKind = (typeof PARAMETER_KINDS)[number];

export interface ParameterSchema {
  type: ParameterKind;
  description: string;
  items?: ParameterSchema;
  enum?: unknown[];
}

export interface FunctionParameters {
  type: 'object';
  properties: Record<string, ParameterSchema>;
  required: string[];
}

export interface FunctionDeclaration {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: FunctionParameters;
  };
}

export type SchemaErrorPolicy = 'fail' | 'skip';

// ============================================================================
// TOOL EXECUTION
// ============================================================================

export interface ToolInvocationResult {
  /** Text rendering of the tool's content blocks */
  content: string;

  /** The server reported a tool-level failure */
  isError: boolean;
}

// ============================================================================
// CONNECTION STATE
// ============================================================================

export type SessionState = 'disconnected' | 'connecting' | 'ready' | 'closed';

// ============================================================================
// EVENT TYPES
// ============================================================================

export type ToolServerSessionEvent =
  | { type: 'connected'; serverName: string; toolCount: number; resourceCount: number }
  | { type: 'closed'; serverName: string }
  | {
      type: 'toolInvoked';
      serverName: string;
      toolName: string;
      arguments: Record<string, unknown>;
      result?: ToolInvocationResult;
      error?: Error;
      durationMs: number;
    };

export type ToolServerSessionEventHandler = (event: ToolServerSessionEvent) => void;
