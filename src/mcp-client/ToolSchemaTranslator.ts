/**
 * Tool Schema Translator
 *
 * Converts MCP tool descriptors into the function declarations an
 * OpenAI-compatible model accepts, and renders tool summaries for prompts.
 */

import { SchemaError } from '../errors.js';
import {
  PARAMETER_KINDS,
  type FunctionDeclaration,
  type JsonSchema,
  type ParameterKind,
  type ParameterSchema,
  type SchemaErrorPolicy,
  type ToolDescriptor,
} from './types.js';

function isParameterKind(value: unknown): value is ParameterKind {
  return typeof value === 'string' && PARAMETER_KINDS.some(kind => kind === value);
}

/**
 * Translates MCP tool definitions to function declarations
 */
export class ToolSchemaTranslator {
  /**
   * Convert an MCP tool to an OpenAI function declaration.
   * A tool without `inputSchema` or `properties` takes no parameters.
   */
  static translate(tool: ToolDescriptor): FunctionDeclaration {
    const schema = tool.inputSchema;
    // fromEntries keeps names like __proto__ as own properties
    const properties: Record<string, ParameterSchema> = Object.fromEntries(
      Object.entries(schema?.properties ?? {}).map(([name, prop]): [string, ParameterSchema] => [
        name,
        this.translateParameter(tool.name, name, prop),
      ])
    );

    return {
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description ?? '',
        parameters: {
          type: 'object',
          properties,
          required: this.requiredList(schema),
        },
      },
    };
  }

  /**
   * Convert a tool list. Under the 'skip' policy a tool whose schema cannot be
   * translated is left out with a warning; under 'fail' the error is thrown.
   */
  static translateAll(
    tools: ToolDescriptor[],
    policy: SchemaErrorPolicy = 'fail'
  ): FunctionDeclaration[] {
    const declarations: FunctionDeclaration[] = [];
    const seen = new Set<string>();

    for (const tool of tools) {
      if (seen.has(tool.name)) {
        throw new SchemaError(`Duplicate tool name '${tool.name}'`, tool.name);
      }
      seen.add(tool.name);

      try {
        declarations.push(this.translate(tool));
      } catch (err) {
        if (policy === 'skip' && err instanceof SchemaError) {
          console.error(`[ToolSchemaTranslator] Skipping tool '${tool.name}': ${err.message}`);
          continue;
        }
        throw err;
      }
    }

    return declarations;
  }

  private static translateParameter(
    toolName: string,
    paramName: string,
    prop: JsonSchema
  ): ParameterSchema {
    const sourceType = prop.type ?? 'string';
    if (!isParameterKind(sourceType)) {
      throw new SchemaError(
        `Tool '${toolName}' parameter '${paramName}' has unsupported type ${JSON.stringify(sourceType)}`,
        toolName,
        paramName
      );
    }

    const translated: ParameterSchema = {
      type: sourceType,
      description: typeof prop.description === 'string' ? prop.description : '',
    };

    if (sourceType === 'array' && prop.items) {
      translated.items = this.translateParameter(toolName, `${paramName}[]`, prop.items);
    }
    if (Array.isArray(prop.enum)) {
      translated.enum = [...prop.enum];
    }

    return translated;
  }

  private static requiredList(schema: JsonSchema | undefined): string[] {
    const required = schema?.required;
    if (!Array.isArray(required)) {
      return [];
    }
    return required.filter((name): name is string => typeof name === 'string');
  }

  /**
   * Usage guidance lines for the system context, one per tool
   */
  static describeTools(tools: ToolDescriptor[]): string {
    return tools
      .map(tool => (tool.description ? `- ${tool.name}: ${tool.description}` : `- ${tool.name}`))
      .join('\n');
  }

  /**
   * Generate a human-readable description of a tool's parameters
   */
  static describeParameters(schema: JsonSchema | undefined): string {
    if (!schema?.properties || Object.keys(schema.properties).length === 0) {
      return '  (no parameters)';
    }

    const required = new Set(this.requiredList(schema));
    const params: string[] = [];

    for (const [name, prop] of Object.entries(schema.properties)) {
      const type = typeof prop.type === 'string' ? prop.type : 'string';
      const reqStr = required.has(name) ? '(required)' : '(optional)';
      const desc = typeof prop.description === 'string' ? prop.description : '';

      params.push(`  - ${name}: ${type} ${reqStr}${desc ? ` - ${desc}` : ''}`);
    }

    return params.join('\n');
  }

  /**
   * Create a tool summary for the shell's tool listing
   */
  static summarizeTool(tool: ToolDescriptor): string {
    return `${tool.name}${tool.description ? ` - ${tool.description}` : ''}\n${this.describeParameters(tool.inputSchema)}`;
  }
}

export default ToolSchemaTranslator;
