import { NotFoundError, SchemaError, formatZodIssues } from '@almanac/shared';
import type { AgentTool, ToolContext, ToolResult } from './base.js';
import { createToolResult, failureResult, parseToolInput } from './base.js';
import { fetchJson, type HttpClientOptions } from './http.js';
import { type ArticleSummary, WikipediaInput, WikipediaPage, WikipediaQueryResponse } from './schemas.js';

export const WIKIPEDIA_API_URL = 'https://en.wikipedia.org/w/api.php';

export interface WikipediaToolConfig extends HttpClientOptions {
  endpoint?: string;
}

export class WikipediaTool implements AgentTool {
  definition = {
    name: 'search_wikipedia',
    description: 'Looks up a topic or article title on Wikipedia and returns a JSON object with the article title, a plain-text summary of its introduction, and its URL.',
    input_schema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Topic or article title, e.g. "Artificial intelligence"' },
      },
      required: ['query'],
    },
  };

  constructor(private readonly config: WikipediaToolConfig = {}) {}

  async execute(params: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    const input = parseToolInput(this.definition.name, WikipediaInput, params);
    if (!input.ok) return input.result;

    try {
      const article = await this.summary(input.value.query, context.signal);
      return createToolResult(JSON.stringify(article), { service: 'wikipedia' });
    } catch (err) {
      return failureResult(err, 'Wikipedia search');
    }
  }

  /** Introductory section of the article, as plain text, following redirects */
  async summary(query: string, signal?: AbortSignal): Promise<ArticleSummary> {
    const data = await fetchJson(
      {
        service: 'Wikipedia API',
        url: this.config.endpoint ?? WIKIPEDIA_API_URL,
        params: {
          action: 'query',
          format: 'json',
          titles: query,
          prop: 'extracts|info',
          exintro: 1,
          explaintext: 1,
          inprop: 'url',
          redirects: 1,
        },
        signal,
      },
      this.config,
    );

    const response = WikipediaQueryResponse.safeParse(data);
    if (!response.success) {
      throw new SchemaError(`Failed to validate Wikipedia article schema: ${formatZodIssues(response.error)}`);
    }

    const page = Object.values(response.data.query?.pages ?? {})[0];
    if (page === undefined || 'missing' in page || 'invalid' in page) {
      throw new NotFoundError(`No Wikipedia article found for query: ${query}`);
    }

    const parsed = WikipediaPage.safeParse(page);
    if (!parsed.success) {
      throw new SchemaError(`Failed to validate Wikipedia article schema: ${formatZodIssues(parsed.error)}`);
    }

    return {
      title: parsed.data.title,
      summary: parsed.data.extract,
      url: parsed.data.fullurl,
    };
  }
}
