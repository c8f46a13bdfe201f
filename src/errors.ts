/**
 * Error taxonomy for the bridge.
 *
 * Every failure that crosses a component boundary is a BridgeError carrying a
 * stable `code`, so callers can branch on the kind without string matching.
 */

export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'BridgeError';
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/** The tool-server handshake or initial listing did not complete. */
export class ConnectionError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class NotConnectedError extends BridgeError {
  constructor(operation: string, state: string) {
    super(`Cannot ${operation}: session is ${state}`, 'NOT_CONNECTED');
    this.name = 'NotConnectedError';
  }
}

/** A tool's parameter schema cannot be expressed as a function declaration. */
export class SchemaError extends BridgeError {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly parameter?: string,
  ) {
    super(message, 'SCHEMA_ERROR');
    this.name = 'SchemaError';
  }
}

export class UnknownToolError extends BridgeError {
  constructor(public readonly toolName: string) {
    super(`Model requested unknown tool '${toolName}'`, 'UNKNOWN_TOOL');
    this.name = 'UnknownToolError';
  }
}

/**
 * A tool call failed before the server produced a result.
 *
 * `recoverable` is true when the server rejected the call itself (for example
 * argument validation), so the model can be told and may retry.
 */
export class InvocationError extends BridgeError {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly recoverable: boolean,
    cause?: unknown,
  ) {
    super(message, 'INVOCATION_ERROR', cause);
    this.name = 'InvocationError';
  }
}

export class OrchestrationError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ORCHESTRATION_ERROR', cause);
    this.name = 'OrchestrationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
