import type { ToolDefinition } from '@almanac/tools';

export interface PromptContext {
  tools: ToolDefinition[];
  /** Appended verbatim after the built-in sections */
  extraInstructions?: string;
}

export function buildSystemPrompt(context: PromptContext): string {
  const sections: string[] = [];

  sections.push(`You are a helpful research assistant. You answer questions about places, current weather, encyclopedic topics and arithmetic.`);

  if (context.tools.length > 0) {
    const toolLines = context.tools.map((t) => `- **${t.name}**: ${t.description}`).join('\n');
    sections.push(`## Tools

${toolLines}

Call a tool whenever the answer depends on live data, a lookup or a calculation; do not guess coordinates, temperatures or article contents.
To get the weather for a city, look up its coordinates first, then ask for the weather at those coordinates.
You may call several tools in one turn when the calls do not depend on each other.`);
  }

  sections.push(`## Tool Errors

A tool result of the form {"error": "..."} or a text starting with "Error" means the call failed.
Explain the failure to the user in plain words, naming what could not be found, instead of retrying the same call.`);

  sections.push(`## Answer Style

Answer in a few sentences. Quote the figures the tools returned, with units.`);

  if (context.extraInstructions) {
    sections.push(context.extraInstructions);
  }

  return sections.join('\n\n');
}
