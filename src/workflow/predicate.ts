/**
 * Restricted expression language for routing and loop conditions.
 *
 * Grammar (lowest to highest precedence):
 *
 *   or       := and (("or" | "||") and)*
 *   and      := not (("and" | "&&") not)*
 *   not      := ("not" | "!") not | compare
 *   compare  := additive (("==" | "!=" | "<" | "<=" | ">" | ">=") additive)?
 *   additive := term (("+" | "-") term)*
 *   term     := unary (("*" | "/" | "%") unary)*
 *   unary    := "-" unary | primary
 *   primary  := NUMBER | STRING | true | false | null | PATH | "(" or ")"
 *
 * Paths are dot-separated identifiers, optionally prefixed with `state.`.
 * A path that is absent at evaluation time yields null.
 */
import { PredicateError } from './errors.js';
import { getPath, stripStatePrefix } from './template.js';

type TokenKind = 'number' | 'string' | 'ident' | 'op' | 'lparen' | 'rparen' | 'eof';

interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

export type BinaryOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | '+' | '-' | '*' | '/' | '%';

export type Expression =
  | { type: 'literal'; value: string | number | boolean | null }
  | { type: 'path'; path: string }
  | { type: 'not'; operand: Expression }
  | { type: 'negate'; operand: Expression }
  | { type: 'logical'; operator: 'and' | 'or'; left: Expression; right: Expression }
  | { type: 'binary'; operator: BinaryOperator; left: Expression; right: Expression };

const FORBIDDEN_WORDS = new Set(['import', 'exec', 'eval', 'lambda', 'constructor', 'prototype']);
const OPERATORS = ['==', '!=', '<=', '>=', '&&', '||', '<', '>', '+', '-', '*', '/', '%', '!'];
const COMPARISONS = new Set(['==', '!=', '<', '<=', '>', '>=']);

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source.charAt(index);

    if (/\s/.test(char)) {
      index++;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ kind: char === '(' ? 'lparen' : 'rparen', text: char, position: index });
      index++;
      continue;
    }

    if (char === '"' || char === "'") {
      let end = index + 1;
      let text = '';
      while (end < source.length && source.charAt(end) !== char) {
        if (source.charAt(end) === '\\' && end + 1 < source.length) {
          end++;
        }
        text += source.charAt(end);
        end++;
      }
      if (end >= source.length) {
        throw new PredicateError(`Unterminated string starting at ${index}`, source);
      }
      tokens.push({ kind: 'string', text, position: index });
      index = end + 1;
      continue;
    }

    const number = /^\d+(\.\d+)?/.exec(source.slice(index));
    if (number) {
      tokens.push({ kind: 'number', text: number[0], position: index });
      index += number[0].length;
      continue;
    }

    const ident = /^[a-zA-Z_][a-zA-Z0-9_]*(\.[a-zA-Z_0-9][a-zA-Z0-9_]*)*/.exec(source.slice(index));
    if (ident) {
      const text = ident[0];
      if (text.includes('__') || text.split('.').some((part) => FORBIDDEN_WORDS.has(part))) {
        throw new PredicateError(`Forbidden identifier '${text}'`, source);
      }
      tokens.push({ kind: 'ident', text, position: index });
      index += text.length;
      continue;
    }

    const operator = OPERATORS.find((candidate) => source.startsWith(candidate, index));
    if (operator) {
      tokens.push({ kind: 'op', text: operator, position: index });
      index += operator.length;
      continue;
    }

    throw new PredicateError(`Unexpected character '${char}' at ${index}`, source);
  }

  tokens.push({ kind: 'eof', text: '', position: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string,
  ) {}

  parse(): Expression {
    const expression = this.parseOr();
    const next = this.peek();
    if (next.kind !== 'eof') {
      throw new PredicateError(`Unexpected '${next.text}' at ${next.position}`, this.source);
    }
    return expression;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { kind: 'eof', text: '', position: this.source.length };
  }

  private advance(): Token {
    const token = this.peek();
    this.index++;
    return token;
  }

  private matchWord(...words: string[]): string | undefined {
    const token = this.peek();
    if ((token.kind === 'ident' || token.kind === 'op') && words.includes(token.text)) {
      this.index++;
      return token.text;
    }
    return undefined;
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.matchWord('or', '||')) {
      left = { type: 'logical', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.matchWord('and', '&&')) {
      left = { type: 'logical', operator: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expression {
    if (this.matchWord('not', '!')) {
      return { type: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    const left = this.parseAdditive();
    const token = this.peek();
    if (token.kind === 'op' && COMPARISONS.has(token.text)) {
      this.advance();
      const operator = toBinaryOperator(token.text, this.source);
      return { type: 'binary', operator, left, right: this.parseAdditive() };
    }
    return left;
  }

  private parseAdditive(): Expression {
    let left = this.parseTerm();
    for (let op = this.matchWord('+', '-'); op; op = this.matchWord('+', '-')) {
      left = { type: 'binary', operator: toBinaryOperator(op, this.source), left, right: this.parseTerm() };
    }
    return left;
  }

  private parseTerm(): Expression {
    let left = this.parseUnary();
    for (let op = this.matchWord('*', '/', '%'); op; op = this.matchWord('*', '/', '%')) {
      left = { type: 'binary', operator: toBinaryOperator(op, this.source), left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.matchWord('-')) {
      return { type: 'negate', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.advance();
    switch (token.kind) {
      case 'number':
        return { type: 'literal', value: Number(token.text) };
      case 'string':
        return { type: 'literal', value: token.text };
      case 'lparen': {
        const inner = this.parseOr();
        if (this.advance().kind !== 'rparen') {
          throw new PredicateError(`Missing ')' for '(' at ${token.position}`, this.source);
        }
        return inner;
      }
      case 'ident':
        if (token.text === 'true' || token.text === 'True') return { type: 'literal', value: true };
        if (token.text === 'false' || token.text === 'False') return { type: 'literal', value: false };
        if (token.text === 'null' || token.text === 'None') return { type: 'literal', value: null };
        if (token.text === 'and' || token.text === 'or' || token.text === 'not') {
          break;
        }
        return { type: 'path', path: stripStatePrefix(token.text) };
      default:
        break;
    }
    const shown = token.kind === 'eof' ? 'end of expression' : `'${token.text}'`;
    throw new PredicateError(`Unexpected ${shown} at ${token.position}`, this.source);
  }
}

function toBinaryOperator(text: string, source: string): BinaryOperator {
  switch (text) {
    case '==':
    case '!=':
    case '<':
    case '<=':
    case '>':
    case '>=':
    case '+':
    case '-':
    case '*':
    case '/':
    case '%':
      return text;
    default:
      throw new PredicateError(`Unknown operator '${text}'`, source);
  }
}

export interface Predicate {
  source: string;
  expression: Expression;
  /** State paths the expression reads, without any `state.` prefix. */
  paths: string[];
}

function collectPaths(expression: Expression, into: Set<string>): void {
  switch (expression.type) {
    case 'path':
      into.add(expression.path);
      return;
    case 'not':
    case 'negate':
      collectPaths(expression.operand, into);
      return;
    case 'logical':
    case 'binary':
      collectPaths(expression.left, into);
      collectPaths(expression.right, into);
      return;
    case 'literal':
      return;
  }
}

export function parsePredicate(source: string): Predicate {
  const expression = new Parser(tokenize(source), source).parse();
  const paths = new Set<string>();
  collectPaths(expression, paths);
  return { source, expression, paths: [...paths] };
}

export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object' && value !== null) return Object.keys(value).length > 0;
  return Boolean(value);
}

function compare(operator: BinaryOperator, left: unknown, right: unknown): boolean {
  switch (operator) {
    case '==':
      return left === right;
    case '!=':
      return left !== right;
    default:
      break;
  }
  // Ordering across different types is false rather than an error.
  let order: number;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left - right;
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    return false;
  }
  switch (operator) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    default:
      return false;
  }
}

function arithmetic(operator: BinaryOperator, left: unknown, right: unknown, source: string): number | string {
  if (operator === '+' && typeof left === 'string' && typeof right === 'string') {
    return left + right;
  }
  if (typeof left !== 'number' || typeof right !== 'number') {
    throw new PredicateError(`Operator '${operator}' needs numeric operands`, source);
  }
  switch (operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
    case '%':
      if (right === 0) {
        throw new PredicateError('Division by zero', source);
      }
      return operator === '/' ? left / right : left % right;
    default:
      throw new PredicateError(`Unknown operator '${operator}'`, source);
  }
}

function evaluateExpression(expression: Expression, state: Record<string, unknown>, source: string): unknown {
  switch (expression.type) {
    case 'literal':
      return expression.value;
    case 'path': {
      const lookup = getPath(state, expression.path);
      return lookup.found ? lookup.value : null;
    }
    case 'not':
      return !isTruthy(evaluateExpression(expression.operand, state, source));
    case 'negate': {
      const value = evaluateExpression(expression.operand, state, source);
      if (typeof value !== 'number') {
        throw new PredicateError(`Unary '-' needs a numeric operand`, source);
      }
      return -value;
    }
    case 'logical': {
      const left = isTruthy(evaluateExpression(expression.left, state, source));
      if (expression.operator === 'and') {
        return left && isTruthy(evaluateExpression(expression.right, state, source));
      }
      return left || isTruthy(evaluateExpression(expression.right, state, source));
    }
    case 'binary': {
      const left = evaluateExpression(expression.left, state, source);
      const right = evaluateExpression(expression.right, state, source);
      if (COMPARISONS.has(expression.operator)) {
        return compare(expression.operator, left, right);
      }
      return arithmetic(expression.operator, left, right, source);
    }
  }
}

export function evaluatePredicate(predicate: Predicate, state: Record<string, unknown>): boolean {
  return isTruthy(evaluateExpression(predicate.expression, state, predicate.source));
}
