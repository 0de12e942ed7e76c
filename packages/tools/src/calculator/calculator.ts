import { errorMessage } from '@almanac/shared';
import type { AgentTool, ToolContext, ToolResult } from '../base.js';
import { createErrorResult, createToolResult } from '../base.js';
import { CalculateInput } from '../schemas.js';
import {
  EvaluationError,
  ExpressionSyntaxError,
  UndefinedSymbolError,
  evaluateExpression,
  formatNumber,
} from './expression.js';

/**
 * Unlike the lookup tools, failures here are plain `Error: ...` strings.
 */
export class CalculatorTool implements AgentTool {
  definition = {
    name: 'calculate',
    description: 'Evaluates an arithmetic expression such as "2 + 2 * 3" and returns the numeric result. Supports + - * / // % ^ (or **), parentheses, the constants pi and e, and the functions sqrt, abs, round, floor, ceil, exp, ln, log, sin, cos, tan, min, max.',
    input_schema: {
      type: 'object',
      properties: {
        expression: { type: 'string', description: 'The arithmetic expression to evaluate' },
      },
      required: ['expression'],
    },
  };

  async execute(params: Record<string, unknown>, _context: ToolContext): Promise<ToolResult> {
    const input = CalculateInput.safeParse(params);
    if (!input.success) {
      return createErrorResult('Error: Missing required parameter: expression', { errorCode: 'INVALID_ARGUMENTS' });
    }
    return this.calculate(input.data.expression);
  }

  calculate(expression: string): ToolResult {
    try {
      return createToolResult(formatNumber(evaluateExpression(expression)));
    } catch (err) {
      if (err instanceof ExpressionSyntaxError) {
        return createErrorResult(`Error: Invalid mathematical expression: ${err.message}`, { errorCode: 'SYNTAX' });
      }
      if (err instanceof UndefinedSymbolError) {
        return createErrorResult(`Error: Undefined symbol '${err.symbol}' in expression.`, { errorCode: 'UNDEFINED_SYMBOL' });
      }
      if (err instanceof EvaluationError) {
        return createErrorResult(`Error during calculation: ${err.message}`, { errorCode: 'EVALUATION' });
      }
      return createErrorResult(`Error during calculation: ${errorMessage(err)}`, { errorCode: 'UNEXPECTED' });
    }
  }
}
