/**
 * Conversation Orchestrator
 *
 * Runs one user query through the model, dispatching every function call the
 * model makes to the tool server and feeding results back until the model
 * answers in plain text.
 */

import {
  InvocationError,
  OrchestrationError,
  UnknownToolError,
  errorMessage,
} from '../errors.js';
import {
  ToolSchemaTranslator,
  aggregateResources,
  type SchemaErrorPolicy,
  type ToolInvocationResult,
  type ToolServerSession,
} from '../mcp-client/index.js';
import {
  appendFunctionResult,
  appendModelResponse,
  appendUserMessage,
  clearTurns,
  createConversation,
  knownToolNames,
  type ConversationState,
  type FunctionCallRequest,
  type ModelResponse,
} from './ConversationState.js';
import type { ModelBackend } from './ModelBackend.js';
import { DEFAULT_SYSTEM_PROMPT, buildSystemContext } from './prompts.js';

/** The parts of a session the orchestrator drives */
export type ToolSession = Pick<ToolServerSession, 'listTools' | 'listResources' | 'invoke' | 'readResource'>;

export type ToolCallObserver = (call: FunctionCallRequest, result: ToolInvocationResult) => void;

export interface OrchestratorOptions {
  systemPrompt?: string;
  instructions?: string;
  /** Tool rounds allowed per query before the turn is aborted */
  maxIterations?: number;
  schemaErrorPolicy?: SchemaErrorPolicy;
  onToolCall?: ToolCallObserver;
}

const DEFAULT_MAX_ITERATIONS = 10;

export class ConversationOrchestrator {
  private state: ConversationState | null = null;
  private readonly maxIterations: number;

  constructor(
    private readonly session: ToolSession,
    private readonly model: ModelBackend,
    private readonly options: OrchestratorOptions = {}
  ) {
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  /**
   * Translate the tools, read the resources and build the system context.
   * Runs on the first `answer` if not called before.
   */
  async prepare(): Promise<ConversationState> {
    const tools = this.session.listTools();
    const declarations = ToolSchemaTranslator.translateAll(tools, this.options.schemaErrorPolicy);
    const exposed = new Set(declarations.map(d => d.function.name));

    const resources = await aggregateResources(this.session.listResources(), uri =>
      this.session.readResource(uri)
    );

    const systemContext = buildSystemContext({
      preamble: this.options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
      resources,
      toolGuidance: ToolSchemaTranslator.describeTools(tools.filter(tool => exposed.has(tool.name))),
      instructions: this.options.instructions,
    });

    console.error(`[Orchestrator] Prepared context with ${declarations.length} tools`);

    this.state = createConversation(systemContext, declarations);
    return this.state;
  }

  /**
   * Answer one query. The transcript is committed only if the turn succeeds.
   */
  async answer(query: string): Promise<string> {
    const initial = this.state ?? (await this.prepare());
    const known = knownToolNames(initial);

    let state = appendUserMessage(initial, query);
    let response = await this.requestModel(state);
    let rounds = 0;

    while (response.functionCalls.length > 0) {
      rounds++;
      if (rounds > this.maxIterations) {
        throw new OrchestrationError(`Model still requesting tools after ${this.maxIterations} rounds`);
      }

      state = appendModelResponse(state, response);
      // One at a time, in the order the model listed them. Call ids are not
      // trusted to be unique across rounds.
      for (const call of response.functionCalls) {
        state = await this.dispatch(state, call, known);
      }

      response = await this.requestModel(state);
    }

    this.state = appendModelResponse(state, response);
    return response.text ?? '';
  }

  private async requestModel(state: ConversationState): Promise<ModelResponse> {
    try {
      return await this.model.complete(state);
    } catch (err) {
      throw new OrchestrationError(`Model request failed: ${errorMessage(err)}`, err);
    }
  }

  private async dispatch(
    state: ConversationState,
    call: FunctionCallRequest,
    known: Set<string>
  ): Promise<ConversationState> {
    if (!known.has(call.name)) {
      throw new UnknownToolError(call.name);
    }

    console.error(`[Orchestrator] Calling tool: ${call.name}`);

    let result: ToolInvocationResult;
    try {
      result = await this.session.invoke(call.name, call.arguments);
    } catch (err) {
      if (!(err instanceof InvocationError && err.recoverable)) {
        throw new OrchestrationError(`Tool '${call.name}' could not be executed: ${errorMessage(err)}`, err);
      }
      result = { content: err.message, isError: true };
    }

    this.options.onToolCall?.(call, result);

    const content = result.isError ? `Error: ${result.content}` : result.content;
    return appendFunctionResult(state, call, content, result.isError);
  }

  /**
   * Drop the transcript, keeping the prepared context
   */
  reset(): void {
    if (this.state) {
      this.state = clearTurns(this.state);
    }
  }

  getState(): ConversationState | null {
    return this.state;
  }

  /**
   * Summaries of the tools the model can call. Before `prepare` every
   * advertised tool is listed.
   */
  describeTools(): string {
    const state = this.state;
    const known = state ? knownToolNames(state) : null;
    const tools = this.session.listTools().filter(tool => !known || known.has(tool.name));
    if (tools.length === 0) {
      return 'No tools available.';
    }
    return tools.map(tool => ToolSchemaTranslator.summarizeTool(tool)).join('\n');
  }
}
