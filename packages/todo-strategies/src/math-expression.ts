/**
 * Arithmetic expression extraction and evaluation.
 *
 * Supports + - * / // % ** (and ^ as power), unary signs, decimals and
 * parentheses. Nothing is ever passed to a JS evaluator.
 */

export class ExpressionSyntaxError extends Error {
  constructor(expression: string, reason: string) {
    super(`Cannot evaluate expression '${expression}': ${reason}`);
    this.name = 'ExpressionSyntaxError';
  }
}

type Token =
  | { type: 'number'; value: number }
  | { type: 'op'; value: '+' | '-' | '*' | '/' | '//' | '%' | '**' }
  | { type: 'paren'; value: '(' | ')' };

const EXPRESSION_RUN = /[\d.+\-*/%^()\s]+/g;
const OPERATOR_AFTER_OPERAND = /[\d)]\s*[+\-*/%^]/;

/**
 * Finds candidate expressions in free text: maximal runs of digits,
 * operators and parentheses that contain at least one binary operator.
 */
export function extractExpressions(content: string): string[] {
  const found: string[] = [];
  for (const match of content.matchAll(EXPRESSION_RUN)) {
    const candidate = match[0].trim();
    if (/\d/.test(candidate) && OPERATOR_AFTER_OPERAND.test(candidate)) {
      found.push(candidate);
    }
  }
  return [...new Set(found)];
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  const source = expression.replace(/\s+/g, '').replace(/\^/g, '**');
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/[\d.]/.test(ch)) {
      let j = i;
      while (j < source.length && /[\d.]/.test(source.charAt(j))) {
        j++;
      }
      const literal = source.slice(i, j);
      const value = Number(literal);
      if (!Number.isFinite(value) || literal === '.') {
        throw new ExpressionSyntaxError(expression, `bad number '${literal}'`);
      }
      tokens.push({ type: 'number', value });
      i = j;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: 'paren', value: ch });
      i++;
      continue;
    }

    const pair = source.slice(i, i + 2);
    if (pair === '**' || pair === '//') {
      tokens.push({ type: 'op', value: pair });
      i += 2;
      continue;
    }

    if (ch === '+' || ch === '-' || ch === '*' || ch === '/' || ch === '%') {
      tokens.push({ type: 'op', value: ch });
      i++;
      continue;
    }

    throw new ExpressionSyntaxError(expression, `unexpected character '${ch}'`);
  }

  return tokens;
}

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly expression: string,
  ) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new ExpressionSyntaxError(this.expression, 'empty expression');
    }
    const value = this.parseSum();
    if (this.pos < this.tokens.length) {
      throw new ExpressionSyntaxError(this.expression, 'unexpected trailing input');
    }
    return value;
  }

  private peekOp(): string | undefined {
    const token = this.tokens[this.pos];
    return token?.type === 'op' ? token.value : undefined;
  }

  private parseSum(): number {
    let value = this.parseProduct();
    let op = this.peekOp();
    while (op === '+' || op === '-') {
      this.pos++;
      const rhs = this.parseProduct();
      value = op === '+' ? value + rhs : value - rhs;
      op = this.peekOp();
    }
    return value;
  }

  private parseProduct(): number {
    let value = this.parseUnary();
    let op = this.peekOp();
    while (op === '*' || op === '/' || op === '//' || op === '%') {
      this.pos++;
      const rhs = this.parseUnary();
      if (op !== '*' && rhs === 0) {
        throw new ExpressionSyntaxError(this.expression, 'division by zero');
      }
      if (op === '*') {
        value = value * rhs;
      } else if (op === '/') {
        value = value / rhs;
      } else if (op === '//') {
        value = Math.floor(value / rhs);
      } else {
        // Result takes the sign of the divisor
        value = ((value % rhs) + rhs) % rhs;
      }
      op = this.peekOp();
    }
    return value;
  }

  private parseUnary(): number {
    const op = this.peekOp();
    if (op === '-' || op === '+') {
      this.pos++;
      const operand = this.parseUnary();
      return op === '-' ? -operand : operand;
    }
    return this.parsePower();
  }

  private parsePower(): number {
    const base = this.parsePrimary();
    if (this.peekOp() === '**') {
      this.pos++;
      // Right-associative, and binds tighter than a unary minus on its left
      return base ** this.parseUnary();
    }
    return base;
  }

  private parsePrimary(): number {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new ExpressionSyntaxError(this.expression, 'unexpected end of input');
    }
    if (token.type === 'number') {
      this.pos++;
      return token.value;
    }
    if (token.type === 'paren' && token.value === '(') {
      this.pos++;
      const value = this.parseSum();
      const closing = this.tokens[this.pos];
      if (closing?.type !== 'paren' || closing.value !== ')') {
        throw new ExpressionSyntaxError(this.expression, 'missing closing parenthesis');
      }
      this.pos++;
      return value;
    }
    throw new ExpressionSyntaxError(this.expression, `unexpected '${token.value}'`);
  }
}

export function evaluateExpression(expression: string): number {
  const value = new Parser(tokenize(expression), expression).parse();
  if (!Number.isFinite(value)) {
    throw new ExpressionSyntaxError(expression, 'result is not a finite number');
  }
  return value;
}
