/**
 * Model backend: the language model behind the conversation.
 *
 * OpenAIModelBackend speaks the chat completions API with function tools, so
 * any OpenAI-compatible endpoint works (set BRIDGE_API_URL).
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionAssistantMessageParam,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { z } from 'zod';
import type { FunctionDeclaration } from '../mcp-client/types.js';
import type { ConversationState, FunctionCallRequest, ModelResponse } from './ConversationState.js';

export interface ModelBackend {
  /** Send the whole transcript and return the model's next response */
  complete(state: ConversationState): Promise<ModelResponse>;
}

export interface OpenAIModelBackendOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

const ArgumentsSchema = z.record(z.string(), z.unknown());

export function toChatTools(declarations: readonly FunctionDeclaration[]): ChatCompletionTool[] {
  return declarations.map((declaration): ChatCompletionTool => ({
    type: 'function',
    function: {
      name: declaration.function.name,
      description: declaration.function.description,
      parameters: {
        type: 'object',
        properties: declaration.function.parameters.properties,
        required: declaration.function.parameters.required,
      },
    },
  }));
}

/**
 * Render the transcript as chat messages. Calls from one model response
 * share a single assistant message, as the API requires.
 */
export function toChatMessages(state: ConversationState): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];
  if (state.systemContext) {
    messages.push({ role: 'system', content: state.systemContext });
  }

  let assistant: ChatCompletionAssistantMessageParam | null = null;

  for (const turn of state.turns) {
    switch (turn.kind) {
      case 'user':
        assistant = null;
        messages.push({ role: 'user', content: turn.text });
        break;
      case 'model-text':
        assistant = { role: 'assistant', content: turn.text };
        messages.push(assistant);
        break;
      case 'function-call': {
        if (!assistant) {
          assistant = { role: 'assistant', content: null };
          messages.push(assistant);
        }
        assistant.tool_calls = [
          ...(assistant.tool_calls ?? []),
          {
            id: turn.callId,
            type: 'function',
            function: { name: turn.name, arguments: JSON.stringify(turn.arguments) },
          },
        ];
        break;
      }
      case 'function-result':
        assistant = null;
        messages.push({ role: 'tool', tool_call_id: turn.callId, content: turn.result });
        break;
    }
  }

  return messages;
}

function parseArguments(toolName: string, raw: string): Record<string, unknown> {
  if (!raw.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Model sent malformed arguments for '${toolName}': ${raw}`);
  }

  const result = ArgumentsSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Model sent non-object arguments for '${toolName}': ${raw}`);
  }
  return result.data;
}

export function parseChatResponse(message: ChatCompletionMessage): ModelResponse {
  const functionCalls: FunctionCallRequest[] = (message.tool_calls ?? []).map(call => ({
    callId: call.id,
    name: call.function.name,
    arguments: parseArguments(call.function.name, call.function.arguments),
  }));

  return { text: message.content, functionCalls };
}

/** The slice of the OpenAI client the backend calls */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export class OpenAIModelBackend implements ModelBackend {
  private readonly client: ChatCompletionsClient;

  constructor(private readonly options: OpenAIModelBackendOptions, client?: ChatCompletionsClient) {
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
      });
  }

  async complete(state: ConversationState): Promise<ModelResponse> {
    const tools = toChatTools(state.declarations);

    console.error(`[OpenAIModelBackend] Calling API: model=${this.options.model}, messages=${state.turns.length}, tools=${tools.length}`);

    const completion = await this.client.chat.completions.create({
      model: this.options.model,
      messages: toChatMessages(state),
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens,
      ...(tools.length > 0 ? { tools, tool_choice: 'auto' as const } : {}),
    });

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new Error('Model returned no choices');
    }

    return parseChatResponse(message);
  }
}
