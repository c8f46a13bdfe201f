/**
 * MCP Client Module
 *
 * Session lifecycle, schema translation and resource aggregation for a
 * single MCP tool server.
 */

// Core classes
export { ToolServerSession, withToolServerSession } from './ToolServerSession.js';
export { ToolSchemaTranslator } from './ToolSchemaTranslator.js';
export { aggregateResources } from './ResourceAggregator.js';
export type { AggregateOptions, ResourceFetcher } from './ResourceAggregator.js';

// Types
export type {
  // Configuration
  McpServerConfig,
  ToolServerSessionOptions,
  TransportFactory,

  // Descriptors
  JsonSchema,
  ToolDescriptor,
  ResourceDescriptor,

  // Function declarations
  ParameterKind,
  ParameterSchema,
  FunctionParameters,
  FunctionDeclaration,
  SchemaErrorPolicy,

  // Execution
  ToolInvocationResult,

  // Connection
  SessionState,

  // Events
  ToolServerSessionEvent,
  ToolServerSessionEventHandler,
} from './types.js';

// Schema validation
export { McpServerConfigSchema, PARAMETER_KINDS } from './types.js';
