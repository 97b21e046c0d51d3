// src/services/tool/calculator.tool.ts

import { Logger } from '../base/types';
import { AgentTool, CALCULATOR_TOOL } from './tool.types';
import { DivisionByZeroError, ExpressionSyntaxError, evaluateExpression } from './arithmetic';
import { logToolUsage } from './tool.logger';
import { errorMessage } from '../../utils/errors';

const ALLOWED_EXPRESSION = /^[\d\s+\-*/().%]+$/;

export function calculate(expression: string): string {
    if (!ALLOWED_EXPRESSION.test(expression)) {
        return `Invalid expression: ${expression}. Only basic math operations are allowed.`;
    }

    try {
        const value = evaluateExpression(expression.trim());
        return `Result: ${value}`;
    } catch (error) {
        if (error instanceof DivisionByZeroError) {
            return 'Error: Division by zero';
        }
        if (error instanceof ExpressionSyntaxError) {
            return `Error: Invalid syntax in expression '${expression}'`;
        }
        return `Error evaluating expression: ${errorMessage(error)}`;
    }
}

export function createCalculatorTool(logger: Logger): AgentTool {
    return {
        name: CALCULATOR_TOOL,
        description:
            'Evaluate a mathematical expression. Use this tool for ALL calculations. ' +
            'Supports +, -, *, /, //, %, ** and parentheses (e.g. "2 + 2", "10 * 5 / 2").',
        parameters: {
            type: 'object',
            properties: {
                expression: {
                    type: 'string',
                    description: 'The arithmetic expression to evaluate, using numbers only.',
                },
            },
            required: ['expression'],
        },
        async invoke(args: Record<string, unknown>): Promise<string> {
            const expression = typeof args.expression === 'string' ? args.expression : String(args.expression ?? '');
            const output = calculate(expression);
            logToolUsage(logger, CALCULATOR_TOOL, expression, output);
            return output;
        },
    };
}
