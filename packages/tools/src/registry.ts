import { ConfigError, createLogger, errorMessage } from '@almanac/shared';
import type { AgentTool, ToolContext, ToolDefinition, ToolResult } from './base.js';
import { createErrorPayloadResult } from './base.js';
import type { HttpClientOptions } from './http.js';
import { GeocodingTool } from './geocoding.js';
import { WeatherTool } from './weather.js';
import { WikipediaTool } from './wikipedia.js';
import { CalculatorTool } from './calculator/calculator.js';

const log = createLogger('tools:registry');

export interface ToolRegistryConfig {
  enableGeocoding?: boolean;
  enableWeather?: boolean;
  enableWikipedia?: boolean;
  enableCalculator?: boolean;
  /** Shared by every tool that calls an upstream API */
  http?: HttpClientOptions;
  /** Endpoint overrides, e.g. for a local mirror */
  endpoints?: {
    geocoding?: string;
    weather?: string;
    wikipedia?: string;
  };
}

/**
 * Name → tool map handed to the model client and the agent loop.
 * Sealed once an agent is built; registration afterwards fails.
 */
export class ToolRegistry {
  private tools = new Map<string, AgentTool>();
  private sealed = false;

  constructor(tools: AgentTool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: AgentTool): void {
    const { name } = tool.definition;
    if (this.sealed) {
      throw new ConfigError(`Cannot register tool ${name}: registry is sealed`);
    }
    if (this.tools.has(name)) {
      throw new ConfigError(`Duplicate tool name: ${name}`);
    }
    this.tools.set(name, tool);
  }

  /** Freeze the tool set; called when an agent takes ownership of the registry */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Execute a tool by name. Never throws: failures come back as error results. */
  async execute(name: string, params: Record<string, unknown>, context: ToolContext = {}): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      log.warn(`Unknown tool requested: ${name}`);
      return createErrorPayloadResult(
        `Unknown tool: ${name}. Available tools: ${this.listTools().join(', ')}`,
        { errorCode: 'UNKNOWN_TOOL' },
      );
    }

    const startTime = Date.now();
    try {
      const result = await tool.execute(params, context);
      const elapsed = Date.now() - startTime;
      log.info(`Tool ${name} completed in ${elapsed}ms (${result.type})`, result.metadata?.['errorCode'] ? { errorCode: result.metadata['errorCode'] } : undefined);
      return result;
    } catch (err) {
      const elapsed = Date.now() - startTime;
      log.error(`Tool ${name} failed after ${elapsed}ms: ${errorMessage(err)}`);
      return createErrorPayloadResult(`Tool execution failed: ${errorMessage(err)}`, { errorCode: 'UNEXPECTED' });
    }
  }

  /** Get all tool definitions for LLM function calling */
  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.definition);
  }

  /** List registered tool names */
  listTools(): string[] {
    return Array.from(this.tools.keys());
  }
}

/** Registry with the geocoding, weather, Wikipedia and calculator tools */
export function createToolRegistry(config: ToolRegistryConfig = {}): ToolRegistry {
  const registry = new ToolRegistry();
  const http = config.http ?? {};

  if (config.enableGeocoding !== false) {
    registry.register(new GeocodingTool({ ...http, endpoint: config.endpoints?.geocoding }));
  }
  if (config.enableWeather !== false) {
    registry.register(new WeatherTool({ ...http, endpoint: config.endpoints?.weather }));
  }
  if (config.enableWikipedia !== false) {
    registry.register(new WikipediaTool({ ...http, endpoint: config.endpoints?.wikipedia }));
  }
  if (config.enableCalculator !== false) {
    registry.register(new CalculatorTool());
  }

  log.info(`Initialized with ${registry.listTools().length} tools: ${registry.listTools().join(', ')}`);
  return registry;
}
