// src/services/tool/arithmetic.ts

/**
 * Recursive-descent evaluator for plain arithmetic. It only understands
 * numbers, parentheses and the operators below; there is no name lookup and
 * no code execution path.
 *
 *   expression := additive
 *   additive   := term (('+' | '-') term)*
 *   term       := unary (('*' | '/' | '//' | '%') unary)*
 *   unary      := ('+' | '-') unary | power
 *   power      := primary ('**' unary)?
 *   primary    := NUMBER | '(' expression ')'
 */

export class CalculatorError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CalculatorError';
    }
}

export class DivisionByZeroError extends CalculatorError {
    constructor() {
        super('Division by zero');
        this.name = 'DivisionByZeroError';
    }
}

export class ExpressionSyntaxError extends CalculatorError {
    constructor(message: string) {
        super(message);
        this.name = 'ExpressionSyntaxError';
    }
}

type Operator = '+' | '-' | '*' | '/' | '//' | '%' | '**';

type Token =
    | { kind: 'number'; value: number; position: number }
    | { kind: 'operator'; value: Operator; position: number }
    | { kind: 'paren'; value: '(' | ')'; position: number };

const NUMBER_PATTERN = /\d+\.?\d*|\.\d+/y;

export function tokenize(expression: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;

    while (i < expression.length) {
        const char = expression[i];

        if (/\s/.test(char)) {
            i += 1;
            continue;
        }

        if (/[\d.]/.test(char)) {
            NUMBER_PATTERN.lastIndex = i;
            const match = NUMBER_PATTERN.exec(expression);
            if (!match) {
                throw new ExpressionSyntaxError(`Unexpected '${char}' at position ${i}`);
            }
            const value = Number(match[0]);
            if (/^\d+$/.test(match[0]) && !Number.isSafeInteger(value)) {
                throw new CalculatorError(`Operand ${match[0]} is too large to compute exactly`);
            }
            tokens.push({ kind: 'number', value, position: i });
            i += match[0].length;
            continue;
        }

        if (char === '(' || char === ')') {
            tokens.push({ kind: 'paren', value: char, position: i });
            i += 1;
            continue;
        }

        if (char === '*' || char === '/') {
            const doubled = expression[i + 1] === char;
            const value: Operator = doubled ? (char === '*' ? '**' : '//') : char;
            tokens.push({ kind: 'operator', value, position: i });
            i += doubled ? 2 : 1;
            continue;
        }

        if (char === '+' || char === '-' || char === '%') {
            tokens.push({ kind: 'operator', value: char, position: i });
            i += 1;
            continue;
        }

        throw new ExpressionSyntaxError(`Unexpected '${char}' at position ${i}`);
    }

    return tokens;
}

class Parser {
    private index = 0;

    constructor(private readonly tokens: Token[]) {}

    public parse(): number {
        if (this.tokens.length === 0) {
            throw new ExpressionSyntaxError('Empty expression');
        }
        const value = this.additive();
        const trailing = this.peek();
        if (trailing) {
            throw new ExpressionSyntaxError(`Unexpected token at position ${trailing.position}`);
        }
        return value;
    }

    private peek(): Token | undefined {
        return this.tokens[this.index];
    }

    private takeOperator(...accepted: Operator[]): Operator | null {
        const token = this.peek();
        if (token?.kind === 'operator' && accepted.includes(token.value)) {
            this.index += 1;
            return token.value;
        }
        return null;
    }

    private additive(): number {
        let value = this.term();
        for (let op = this.takeOperator('+', '-'); op; op = this.takeOperator('+', '-')) {
            const right = this.term();
            value = op === '+' ? value + right : value - right;
        }
        return value;
    }

    private term(): number {
        let value = this.unary();
        for (let op = this.takeOperator('*', '/', '//', '%'); op; op = this.takeOperator('*', '/', '//', '%')) {
            const right = this.unary();
            value = applyMultiplicative(op, value, right);
        }
        return value;
    }

    private unary(): number {
        const sign = this.takeOperator('+', '-');
        if (sign) {
            const operand = this.unary();
            return sign === '-' ? -operand : operand;
        }
        return this.power();
    }

    private power(): number {
        const base = this.primary();
        if (this.takeOperator('**')) {
            // right-associative; the exponent may carry its own sign
            const exponent = this.unary();
            if (base === 0 && exponent < 0) {
                throw new DivisionByZeroError();
            }
            return base ** exponent;
        }
        return base;
    }

    private primary(): number {
        const token = this.peek();
        if (!token) {
            throw new ExpressionSyntaxError('Unexpected end of expression');
        }
        if (token.kind === 'number') {
            this.index += 1;
            return token.value;
        }
        if (token.kind === 'paren' && token.value === '(') {
            this.index += 1;
            const value = this.additive();
            const closing = this.peek();
            if (!closing || closing.kind !== 'paren' || closing.value !== ')') {
                throw new ExpressionSyntaxError('Missing closing parenthesis');
            }
            this.index += 1;
            return value;
        }
        throw new ExpressionSyntaxError(`Unexpected token at position ${token.position}`);
    }
}

function applyMultiplicative(op: Operator, left: number, right: number): number {
    if (op === '*') return left * right;
    if (right === 0) throw new DivisionByZeroError();
    switch (op) {
        case '/':
            return left / right;
        case '//':
            return Math.floor(left / right);
        case '%':
            // result takes the sign of the divisor
            return left - right * Math.floor(left / right);
        default:
            throw new ExpressionSyntaxError(`Unsupported operator '${op}'`);
    }
}

export function evaluateExpression(expression: string): number {
    const value = new Parser(tokenize(expression)).parse();
    if (Number.isNaN(value)) {
        throw new CalculatorError('result is not a real number');
    }
    if (!Number.isFinite(value)) {
        throw new CalculatorError('result is too large');
    }
    return value;
}
