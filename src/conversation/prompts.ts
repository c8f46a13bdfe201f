export const DEFAULT_SYSTEM_PROMPT = `You are a helpful assistant connected to a tool server.
You can call the server's tools and you have its resources as reference material.
Always provide helpful, natural responses.`;

export const TOOL_USAGE_NOTE = `When a request needs one of these tools, call it instead of guessing the result.
If a tool reports an error, explain it or correct the arguments and try again.`;

export interface SystemContextParts {
  preamble: string;
  /** Output of aggregateResources; may be empty */
  resources: string;
  /** Output of ToolSchemaTranslator.describeTools; may be empty */
  toolGuidance: string;
  instructions?: string;
}

export function buildSystemContext(parts: SystemContextParts): string {
  const resources = parts.resources.trimEnd();
  const sections = [
    parts.preamble.trim(),
    `Available resources:${resources ? resources : '\n(none)'}`,
    `Available tools:\n${parts.toolGuidance || '(none)'}`,
    TOOL_USAGE_NOTE,
  ];

  if (parts.instructions?.trim()) {
    sections.push(parts.instructions.trim());
  }

  return sections.join('\n\n');
}
