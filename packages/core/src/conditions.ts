import { isRecord } from '@trellis/shared';

/**
 * Condition expressions for `custom` edges.
 *
 * Grammar:
 *
 *   expression := or
 *   or         := and (('||' | 'or') and)*
 *   and        := unary (('&&' | 'and') unary)*
 *   unary      := ('!' | 'not') unary | comparison
 *   comparison := primary (('==' | '!=' | '<' | '<=' | '>' | '>=') primary)?
 *   primary    := number | string | 'true' | 'false' | 'null' | path | '(' expression ')'
 *   path       := identifier ('.' identifier)*
 *
 * Paths rooted at `context` or `outcome` read that scope; any other path reads
 * the context. `==` and `!=` are strict, ordering operators only compare numbers.
 */

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type ConditionExpression =
  | { kind: 'literal'; value: string | number | boolean | null }
  | { kind: 'path'; segments: string[] }
  | { kind: 'not'; operand: ConditionExpression }
  | { kind: 'logical'; operator: 'and' | 'or'; left: ConditionExpression; right: ConditionExpression }
  | { kind: 'comparison'; operator: ComparisonOperator; left: ConditionExpression; right: ConditionExpression };

export type ConditionScope = {
  context: Readonly<Record<string, unknown>>;
  outcome: {
    status: 'succeeded' | 'failed';
    error: string | null;
    output: Readonly<Record<string, unknown>>;
  };
};

type TokenType = 'number' | 'string' | 'identifier' | 'operator' | 'lparen' | 'rparen' | 'dot' | 'eof';

type Token = {
  type: TokenType;
  lexeme: string;
  literal?: string | number;
  index: number;
};

export class ConditionSyntaxError extends Error {
  readonly index: number;

  constructor(message: string, index: number) {
    super(`${message} (at offset ${index})`);
    this.name = 'ConditionSyntaxError';
    this.index = index;
  }
}

const twoCharOperators = new Set(['==', '!=', '<=', '>=', '&&', '||']);
const oneCharOperators = new Set(['<', '>', '!']);
const comparisonOperators: readonly ComparisonOperator[] = ['==', '!=', '<', '<=', '>', '>='];

function isComparisonOperator(value: string): value is ComparisonOperator {
  return comparisonOperators.some(operator => operator === value);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

function scanTokens(source: string): Token[] {
  const tokens: Token[] = [];
  let current = 0;

  while (current < source.length) {
    const start = current;
    const ch = source[current];

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      current += 1;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'lparen' : 'rparen', lexeme: ch, index: start });
      current += 1;
      continue;
    }

    if (ch === '.' && !isDigit(source[current + 1] ?? '')) {
      tokens.push({ type: 'dot', lexeme: ch, index: start });
      current += 1;
      continue;
    }

    const pair = source.slice(current, current + 2);
    if (twoCharOperators.has(pair)) {
      tokens.push({ type: 'operator', lexeme: pair, index: start });
      current += 2;
      continue;
    }

    if (oneCharOperators.has(ch)) {
      tokens.push({ type: 'operator', lexeme: ch, index: start });
      current += 1;
      continue;
    }

    if (ch === '"' || ch === "'") {
      current += 1;
      let value = '';
      let closed = false;
      while (current < source.length) {
        const next = source[current];
        if (next === '\\' && current + 1 < source.length) {
          value += source[current + 1];
          current += 2;
          continue;
        }
        if (next === ch) {
          closed = true;
          current += 1;
          break;
        }
        value += next;
        current += 1;
      }
      if (!closed) {
        throw new ConditionSyntaxError('Unterminated string literal', start);
      }
      tokens.push({ type: 'string', lexeme: source.slice(start, current), literal: value, index: start });
      continue;
    }

    if (isDigit(ch) || (ch === '-' && isDigit(source[current + 1] ?? '')) || (ch === '.' && isDigit(source[current + 1] ?? ''))) {
      current += 1;
      while (current < source.length && (isDigit(source[current]) || source[current] === '.')) {
        current += 1;
      }
      const lexeme = source.slice(start, current);
      const literal = Number(lexeme);
      if (!Number.isFinite(literal)) {
        throw new ConditionSyntaxError(`Invalid number "${lexeme}"`, start);
      }
      tokens.push({ type: 'number', lexeme, literal, index: start });
      continue;
    }

    if (isIdentifierStart(ch)) {
      current += 1;
      while (current < source.length && isIdentifierPart(source[current])) {
        current += 1;
      }
      tokens.push({ type: 'identifier', lexeme: source.slice(start, current), index: start });
      continue;
    }

    throw new ConditionSyntaxError(`Unexpected character "${ch}"`, start);
  }

  tokens.push({ type: 'eof', lexeme: '', index: source.length });
  return tokens;
}

class ConditionParser {
  private current = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ConditionExpression {
    if (this.peek().type === 'eof') {
      throw new ConditionSyntaxError('Expected an expression', this.peek().index);
    }

    const expression = this.parseOr();
    const trailing = this.peek();
    if (trailing.type !== 'eof') {
      throw new ConditionSyntaxError(`Unexpected token "${trailing.lexeme}"`, trailing.index);
    }
    return expression;
  }

  private parseOr(): ConditionExpression {
    let left = this.parseAnd();
    while (this.matchOperator('||') || this.matchKeyword('or')) {
      left = { kind: 'logical', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionExpression {
    let left = this.parseUnary();
    while (this.matchOperator('&&') || this.matchKeyword('and')) {
      left = { kind: 'logical', operator: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ConditionExpression {
    if (this.matchOperator('!') || this.matchKeyword('not')) {
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ConditionExpression {
    const left = this.parsePrimary();
    const next = this.peek();
    const operator = next.lexeme;
    if (next.type === 'operator' && isComparisonOperator(operator)) {
      this.current += 1;
      const right = this.parsePrimary();
      return { kind: 'comparison', operator, left, right };
    }
    return left;
  }

  private parsePrimary(): ConditionExpression {
    const token = this.advance();
    switch (token.type) {
      case 'number':
      case 'string':
        return { kind: 'literal', value: token.literal ?? null };
      case 'lparen': {
        const inner = this.parseOr();
        const closing = this.advance();
        if (closing.type !== 'rparen') {
          throw new ConditionSyntaxError('Expected ")"', closing.index);
        }
        return inner;
      }
      case 'identifier':
        return this.parseIdentifier(token);
      default:
        throw new ConditionSyntaxError(
          token.type === 'eof' ? 'Unexpected end of expression' : `Unexpected token "${token.lexeme}"`,
          token.index,
        );
    }
  }

  private parseIdentifier(token: Token): ConditionExpression {
    switch (token.lexeme) {
      case 'true':
        return { kind: 'literal', value: true };
      case 'false':
        return { kind: 'literal', value: false };
      case 'null':
        return { kind: 'literal', value: null };
      case 'and':
      case 'or':
      case 'not':
        throw new ConditionSyntaxError(`Unexpected keyword "${token.lexeme}"`, token.index);
    }

    const segments = [token.lexeme];
    while (this.peek().type === 'dot') {
      this.current += 1;
      const segment = this.advance();
      if (segment.type !== 'identifier') {
        throw new ConditionSyntaxError('Expected a property name after "."', segment.index);
      }
      segments.push(segment.lexeme);
    }
    return { kind: 'path', segments };
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private advance(): Token {
    const token = this.tokens[this.current];
    if (token.type !== 'eof') {
      this.current += 1;
    }
    return token;
  }

  private matchOperator(lexeme: string): boolean {
    const token = this.peek();
    if (token.type === 'operator' && token.lexeme === lexeme) {
      this.current += 1;
      return true;
    }
    return false;
  }

  private matchKeyword(keyword: string): boolean {
    const token = this.peek();
    if (token.type === 'identifier' && token.lexeme === keyword) {
      this.current += 1;
      return true;
    }
    return false;
  }
}

export function parseCondition(source: string): ConditionExpression {
  return new ConditionParser(scanTokens(source)).parse();
}

function resolveField(root: unknown, segments: readonly string[]): unknown {
  let current: unknown = root;
  for (const part of segments) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function resolvePath(segments: readonly string[], scope: ConditionScope): unknown {
  const [root, ...rest] = segments;
  if (root === 'context') {
    return resolveField(scope.context, rest);
  }
  if (root === 'outcome') {
    return resolveField(scope.outcome, rest);
  }
  return resolveField(scope.context, segments);
}

function compare(operator: ComparisonOperator, left: unknown, right: unknown): boolean {
  switch (operator) {
    case '==': return left === right;
    case '!=': return left !== right;
    case '>': return typeof left === 'number' && typeof right === 'number' && left > right;
    case '<': return typeof left === 'number' && typeof right === 'number' && left < right;
    case '>=': return typeof left === 'number' && typeof right === 'number' && left >= right;
    case '<=': return typeof left === 'number' && typeof right === 'number' && left <= right;
  }
}

export function evaluateExpression(expression: ConditionExpression, scope: ConditionScope): unknown {
  switch (expression.kind) {
    case 'literal':
      return expression.value;
    case 'path':
      return resolvePath(expression.segments, scope);
    case 'not':
      return !evaluateExpression(expression.operand, scope);
    case 'logical': {
      const left = Boolean(evaluateExpression(expression.left, scope));
      if (expression.operator === 'and') {
        return left && Boolean(evaluateExpression(expression.right, scope));
      }
      return left || Boolean(evaluateExpression(expression.right, scope));
    }
    case 'comparison':
      return compare(
        expression.operator,
        evaluateExpression(expression.left, scope),
        evaluateExpression(expression.right, scope),
      );
  }
}

export function evaluateCondition(source: string, scope: ConditionScope): boolean {
  return Boolean(evaluateExpression(parseCondition(source), scope));
}
