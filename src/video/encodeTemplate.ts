import { TemplateError } from '../utils/errors';
import type { MediaDetails } from './types';

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'name'; value: string }
  | { kind: 'operator'; value: string };

const TOKEN_PATTERN = /\s*(?:(\d+(?:\.\d+)?|\.\d+)|([A-Za-z_]\w*)|([-+*/()]))/y;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  TOKEN_PATTERN.lastIndex = 0;

  while (TOKEN_PATTERN.lastIndex < expression.length) {
    if (expression.slice(TOKEN_PATTERN.lastIndex).trim() === '') break;

    const start = TOKEN_PATTERN.lastIndex;
    const match = TOKEN_PATTERN.exec(expression);
    if (!match) {
      throw new TemplateError(`Unexpected character in "${expression}" at ${start}`);
    }

    if (match[1] !== undefined) tokens.push({ kind: 'number', value: parseFloat(match[1]) });
    else if (match[2] !== undefined) tokens.push({ kind: 'name', value: match[2] });
    else if (match[3] !== undefined) tokens.push({ kind: 'operator', value: match[3] });
  }

  return tokens;
}

/**
 * Recursive-descent evaluator for `+ - * / ( )` over numbers and named variables
 */
class ExpressionParser {
  private position = 0;

  constructor(
    private source: string,
    private tokens: Token[],
    private lookup: (name: string) => number
  ) {}

  parse(): number {
    const value = this.expression();
    if (this.position < this.tokens.length) {
      throw new TemplateError(`Unexpected trailing input in "${this.source}"`);
    }
    return value;
  }

  private expression(): number {
    let value = this.term();
    while (this.peekOperator('+') || this.peekOperator('-')) {
      const operator = this.next();
      const right = this.term();
      value = operator.value === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.factor();
    while (this.peekOperator('*') || this.peekOperator('/')) {
      const operator = this.next();
      const right = this.factor();
      if (operator.value === '/') {
        if (right === 0) throw new TemplateError(`Division by zero in "${this.source}"`);
        value /= right;
      } else {
        value *= right;
      }
    }
    return value;
  }

  private factor(): number {
    const token = this.next();

    if (token.kind === 'number') return token.value;
    if (token.kind === 'name') return this.lookup(token.value);
    if (token.value === '-') return -this.factor();
    if (token.value === '+') return this.factor();
    if (token.value === '(') {
      const value = this.expression();
      if (!this.peekOperator(')')) {
        throw new TemplateError(`Missing ")" in "${this.source}"`);
      }
      this.next();
      return value;
    }

    throw new TemplateError(`Unexpected "${token.value}" in "${this.source}"`);
  }

  private peekOperator(value: string): boolean {
    const token = this.tokens[this.position];
    return token?.kind === 'operator' && token.value === value;
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new TemplateError(`Unexpected end of "${this.source}"`);
    }
    this.position++;
    return token;
  }
}

export function evaluateExpression(expression: string, lookup: (name: string) => number): number {
  return new ExpressionParser(expression, tokenize(expression), lookup).parse();
}

function variableName(reference: string): string {
  return reference.startsWith('var_') ? reference.slice('var_'.length) : reference;
}

/**
 * Resolves the probed details plus every configured expression, e.g.
 * `{ minrate: 'bitrate*0.9' }`. Results are rounded to integers.
 */
export function resolveTemplateVars(
  details: MediaDetails,
  expressions: Record<string, string>
): Record<string, number> {
  const resolved: Record<string, number> = {
    bitrate: details.bitrate,
    size: details.size,
    duration: details.duration,
  };

  const resolve = (name: string, stack: string[]): number => {
    const known = resolved[name];
    if (known !== undefined) return known;

    const expression = expressions[name];
    if (expression === undefined) {
      throw new TemplateError(`Unknown template variable: ${name}`);
    }
    if (stack.includes(name)) {
      throw new TemplateError(`Circular template variable: ${[...stack, name].join(' -> ')}`);
    }

    const value = Math.round(
      evaluateExpression(expression, (reference) => resolve(variableName(reference), [...stack, name]))
    );
    resolved[name] = value;
    return value;
  };

  for (const name of Object.keys(expressions)) {
    resolve(name, []);
  }

  return resolved;
}

/**
 * Substitutes `{var_name}` placeholders and splits the result into arguments
 */
export function renderTemplate(template: string, vars: Record<string, number>): string[] {
  const rendered = template.replace(/\{var_(\w+)\}/g, (_placeholder, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      throw new TemplateError(`Unknown template variable: ${name}`);
    }
    return String(value);
  });

  return rendered.split(/\s+/).filter(Boolean);
}
