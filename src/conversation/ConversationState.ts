/**
 * Conversation State
 *
 * The transcript the model sees, held as an immutable value. Each helper
 * returns a new state, so a failed turn leaves the last committed state
 * untouched.
 */

import type { FunctionDeclaration } from '../mcp-client/types.js';

export interface FunctionCallRequest {
  /** Backend-assigned id; the result must echo it */
  callId: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ConversationTurn =
  | { kind: 'user'; text: string }
  | { kind: 'model-text'; text: string }
  | ({ kind: 'function-call' } & FunctionCallRequest)
  | { kind: 'function-result'; callId: string; name: string; result: string; isError: boolean };

export interface ConversationState {
  readonly systemContext: string;
  readonly declarations: readonly FunctionDeclaration[];
  readonly turns: readonly ConversationTurn[];
}

/**
 * What the model sent back for one request
 */
export interface ModelResponse {
  text: string | null;
  functionCalls: FunctionCallRequest[];
}

export function createConversation(
  systemContext: string,
  declarations: readonly FunctionDeclaration[]
): ConversationState {
  return { systemContext, declarations, turns: [] };
}

export function appendTurns(state: ConversationState, ...turns: ConversationTurn[]): ConversationState {
  return { ...state, turns: [...state.turns, ...turns] };
}

export function appendUserMessage(state: ConversationState, text: string): ConversationState {
  return appendTurns(state, { kind: 'user', text });
}

/**
 * Record a model response: its text (if any) followed by every call it made
 */
export function appendModelResponse(state: ConversationState, response: ModelResponse): ConversationState {
  const turns: ConversationTurn[] = [];
  if (response.text) {
    turns.push({ kind: 'model-text', text: response.text });
  }
  for (const call of response.functionCalls) {
    turns.push({ kind: 'function-call', ...call });
  }
  return appendTurns(state, ...turns);
}

export function appendFunctionResult(
  state: ConversationState,
  call: FunctionCallRequest,
  result: string,
  isError = false
): ConversationState {
  return appendTurns(state, {
    kind: 'function-result',
    callId: call.callId,
    name: call.name,
    result,
    isError,
  });
}

export function clearTurns(state: ConversationState): ConversationState {
  return { ...state, turns: [] };
}

export function knownToolNames(state: ConversationState): Set<string> {
  return new Set(state.declarations.map(declaration => declaration.function.name));
}
