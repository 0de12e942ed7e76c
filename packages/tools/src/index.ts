/**
 * @almanac/tools - Lookup and compute tools the agent can call
 */

// Base types
export type { ToolDefinition, ToolResult, AgentTool, ToolContext } from './base.js';
export {
  createToolResult,
  createErrorResult,
  createErrorPayloadResult,
  errorPayload,
  failureResult,
  parseToolInput,
} from './base.js';

// HTTP
export { fetchJson, buildUrl, type FetchFn, type HttpClientOptions, type JsonRequest } from './http.js';

// Schemas
export { Coordinates, GeocodedPlace, WeatherSnapshot, ArticleSummary } from './schemas.js';

// Tools
export { GeocodingTool, GEOCODING_API_URL, type GeocodingToolConfig } from './geocoding.js';
export { WeatherTool, WEATHER_API_URL, type WeatherToolConfig } from './weather.js';
export { describeWeatherCode } from './weather-codes.js';
export { WikipediaTool, WIKIPEDIA_API_URL, type WikipediaToolConfig } from './wikipedia.js';
export { CalculatorTool } from './calculator/calculator.js';
export {
  parseExpression,
  evaluate,
  evaluateExpression,
  formatNumber,
  tokenize,
  ExpressionSyntaxError,
  UndefinedSymbolError,
  EvaluationError,
  type Expr,
  type BinaryOperator,
} from './calculator/expression.js';

// Registry
export { ToolRegistry, createToolRegistry, type ToolRegistryConfig } from './registry.js';
