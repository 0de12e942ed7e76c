/**
 * Arithmetic over a restricted grammar. Text is tokenized and parsed into a
 * small AST which is then evaluated; nothing is handed to a language evaluator.
 *
 *   expression := term (('+' | '-') term)*
 *   term       := unary (('*' | '/' | '//' | '%') unary)*
 *   unary      := ('+' | '-') unary | power
 *   power      := primary (('^' | '**') unary)?
 *   primary    := number | identifier | identifier '(' arguments ')' | '(' expression ')'
 *
 * Exponentiation is right-associative and binds tighter than unary minus,
 * so `-2^2` is -4 and `2^-1` is 0.5.
 */

export type BinaryOperator = '+' | '-' | '*' | '/' | '//' | '%' | '^';

export type Expr =
  | { kind: 'number'; value: number }
  | { kind: 'identifier'; name: string }
  | { kind: 'unary'; op: '+' | '-'; operand: Expr }
  | { kind: 'binary'; op: BinaryOperator; left: Expr; right: Expr }
  | { kind: 'call'; name: string; args: Expr[] };

export class ExpressionSyntaxError extends Error {
  constructor(message: string, public readonly position?: number) {
    super(message);
    this.name = 'ExpressionSyntaxError';
  }
}

export class UndefinedSymbolError extends Error {
  constructor(public readonly symbol: string) {
    super(`Undefined symbol '${symbol}'`);
    this.name = 'UndefinedSymbolError';
  }
}

/** Well-formed expression whose value cannot be computed (division by zero, overflow) */
export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

const MAX_EXPRESSION_LENGTH = 1_000;
const MAX_NESTING_DEPTH = 64;

// ─── Tokenizer ───

type Token =
  | { type: 'number'; value: number; pos: number }
  | { type: 'identifier'; name: string; pos: number }
  | { type: 'operator'; op: '+' | '-' | '*' | '/' | '//' | '%' | '^' | '**'; pos: number }
  | { type: 'lparen' | 'rparen' | 'comma' | 'eof'; pos: number };

const NUMBER_RE = /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENTIFIER_RE = /[A-Za-z_][A-Za-z0-9_]*/y;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (/[\d.]/.test(ch)) {
      NUMBER_RE.lastIndex = i;
      const match = NUMBER_RE.exec(source);
      if (!match) throw new ExpressionSyntaxError(`malformed number at position ${i}`, i);
      const value = Number(match[0]);
      if (!Number.isFinite(value)) throw new ExpressionSyntaxError(`number out of range at position ${i}`, i);
      tokens.push({ type: 'number', value, pos: i });
      i += match[0].length;
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      IDENTIFIER_RE.lastIndex = i;
      const match = IDENTIFIER_RE.exec(source);
      if (!match) throw new ExpressionSyntaxError(`unexpected character '${ch}' at position ${i}`, i);
      tokens.push({ type: 'identifier', name: match[0], pos: i });
      i += match[0].length;
      continue;
    }

    const two = source.slice(i, i + 2);
    if (two === '**' || two === '//') {
      tokens.push({ type: 'operator', op: two, pos: i });
      i += 2;
      continue;
    }

    switch (ch) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '%':
      case '^':
        tokens.push({ type: 'operator', op: ch, pos: i });
        break;
      case '(':
        tokens.push({ type: 'lparen', pos: i });
        break;
      case ')':
        tokens.push({ type: 'rparen', pos: i });
        break;
      case ',':
        tokens.push({ type: 'comma', pos: i });
        break;
      default:
        throw new ExpressionSyntaxError(`unexpected character '${ch}' at position ${i}`, i);
    }
    i++;
  }

  tokens.push({ type: 'eof', pos: source.length });
  return tokens;
}

// ─── Parser ───

class Parser {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Expr {
    const expr = this.expression();
    const next = this.peek();
    if (next.type !== 'eof') {
      throw new ExpressionSyntaxError(`unexpected ${describe(next)} at position ${next.pos}`, next.pos);
    }
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private isOperator(...ops: string[]): boolean {
    const token = this.peek();
    return token.type === 'operator' && ops.includes(token.op);
  }

  private expression(): Expr {
    this.depth++;
    if (this.depth > MAX_NESTING_DEPTH) {
      throw new ExpressionSyntaxError('expression is nested too deeply');
    }

    let left = this.term();
    while (this.isOperator('+', '-')) {
      const op = this.operator();
      left = { kind: 'binary', op: op === '+' ? '+' : '-', left, right: this.term() };
    }

    this.depth--;
    return left;
  }

  private term(): Expr {
    let left = this.unary();
    while (this.isOperator('*', '/', '//', '%')) {
      const op = this.operator();
      const right = this.unary();
      switch (op) {
        case '*':
        case '/':
        case '//':
        case '%':
          left = { kind: 'binary', op, left, right };
          break;
        default:
          throw new ExpressionSyntaxError(`unexpected operator '${op}'`);
      }
    }
    return left;
  }

  private unary(): Expr {
    if (this.isOperator('+', '-')) {
      const op = this.operator();
      this.depth++;
      if (this.depth > MAX_NESTING_DEPTH) {
        throw new ExpressionSyntaxError('expression is nested too deeply');
      }
      const operand = this.unary();
      this.depth--;
      return { kind: 'unary', op: op === '-' ? '-' : '+', operand };
    }
    return this.power();
  }

  private power(): Expr {
    const base = this.primary();
    if (this.isOperator('^', '**')) {
      this.next();
      return { kind: 'binary', op: '^', left: base, right: this.unary() };
    }
    return base;
  }

  private primary(): Expr {
    const token = this.next();

    switch (token.type) {
      case 'number':
        return { kind: 'number', value: token.value };

      case 'identifier': {
        if (this.peek().type !== 'lparen') {
          return { kind: 'identifier', name: token.name };
        }
        this.next();
        const args: Expr[] = [];
        if (this.peek().type !== 'rparen') {
          args.push(this.expression());
          while (this.peek().type === 'comma') {
            this.next();
            args.push(this.expression());
          }
        }
        this.expect('rparen', `')' to close call to ${token.name}`);
        return { kind: 'call', name: token.name, args };
      }

      case 'lparen': {
        const inner = this.expression();
        this.expect('rparen', "')'");
        return inner;
      }

      default:
        throw new ExpressionSyntaxError(
          token.type === 'eof'
            ? 'unexpected end of expression'
            : `unexpected ${describe(token)} at position ${token.pos}`,
          token.pos,
        );
    }
  }

  private operator(): string {
    const token = this.next();
    if (token.type !== 'operator') {
      throw new ExpressionSyntaxError(`expected an operator at position ${token.pos}`, token.pos);
    }
    return token.op;
  }

  private expect(type: Token['type'], what: string): void {
    const token = this.next();
    if (token.type !== type) {
      throw new ExpressionSyntaxError(
        token.type === 'eof' ? `expected ${what} before end of expression` : `expected ${what} at position ${token.pos}`,
        token.pos,
      );
    }
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case 'number': return `number ${token.value}`;
    case 'identifier': return `name '${token.name}'`;
    case 'operator': return `operator '${token.op}'`;
    case 'lparen': return "'('";
    case 'rparen': return "')'";
    case 'comma': return "','";
    case 'eof': return 'end of expression';
  }
}

export function parseExpression(source: string): Expr {
  if (source.length > MAX_EXPRESSION_LENGTH) {
    throw new ExpressionSyntaxError(`expression is longer than ${MAX_EXPRESSION_LENGTH} characters`);
  }
  return new Parser(tokenize(source)).parse();
}

// ─── Evaluator ───

const CONSTANTS: Record<string, number> = {
  pi: Math.PI,
  e: Math.E,
};

interface MathFunction {
  minArgs: number;
  maxArgs: number;
  apply(args: number[]): number;
}

const unaryFn = (fn: (x: number) => number): MathFunction => ({
  minArgs: 1,
  maxArgs: 1,
  apply: ([x]) => fn(x),
});

const FUNCTIONS: Record<string, MathFunction> = {
  sqrt: unaryFn(Math.sqrt),
  abs: unaryFn(Math.abs),
  round: unaryFn(Math.round),
  floor: unaryFn(Math.floor),
  ceil: unaryFn(Math.ceil),
  exp: unaryFn(Math.exp),
  ln: unaryFn(Math.log),
  log: unaryFn(Math.log10),
  sin: unaryFn(Math.sin),
  cos: unaryFn(Math.cos),
  tan: unaryFn(Math.tan),
  min: { minArgs: 1, maxArgs: Infinity, apply: (args) => Math.min(...args) },
  max: { minArgs: 1, maxArgs: Infinity, apply: (args) => Math.max(...args) },
};

function lookup<T>(table: Record<string, T>, name: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, name) ? table[name] : undefined;
}

function applyBinary(op: BinaryOperator, a: number, b: number): number {
  switch (op) {
    case '+': return a + b;
    case '-': return a - b;
    case '*': return a * b;
    case '^': return a ** b;
    case '/':
      if (b === 0) throw new EvaluationError('division by zero');
      return a / b;
    case '//':
      if (b === 0) throw new EvaluationError('integer division by zero');
      return Math.floor(a / b);
    case '%':
      if (b === 0) throw new EvaluationError('modulo by zero');
      // sign follows the divisor
      return a - b * Math.floor(a / b);
  }
}

export function evaluate(expr: Expr): number {
  switch (expr.kind) {
    case 'number':
      return expr.value;

    case 'identifier': {
      const value = lookup(CONSTANTS, expr.name);
      if (value === undefined) throw new UndefinedSymbolError(expr.name);
      return value;
    }

    case 'unary': {
      const operand = evaluate(expr.operand);
      return expr.op === '-' ? -operand : operand;
    }

    case 'binary':
      return applyBinary(expr.op, evaluate(expr.left), evaluate(expr.right));

    case 'call': {
      const fn = lookup(FUNCTIONS, expr.name);
      if (!fn) throw new UndefinedSymbolError(expr.name);
      if (expr.args.length < fn.minArgs || expr.args.length > fn.maxArgs) {
        const expected = fn.minArgs === fn.maxArgs ? `${fn.minArgs}` : `at least ${fn.minArgs}`;
        throw new ExpressionSyntaxError(
          `${expr.name} expects ${expected} argument${fn.minArgs === 1 && fn.maxArgs === 1 ? '' : 's'}, got ${expr.args.length}`,
        );
      }
      return fn.apply(expr.args.map(evaluate));
    }
  }
}

/** Parse and evaluate; the result is always a finite number */
export function evaluateExpression(source: string): number {
  const value = evaluate(parseExpression(source));
  if (!Number.isFinite(value)) {
    throw new EvaluationError('result is not a finite number');
  }
  return value;
}

export function formatNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}
