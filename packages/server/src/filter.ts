import { TableSyncError } from '@tablesync/core';

export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le';

export type FilterValue = string | number | boolean | null;

export type Operand =
  | { kind: 'field'; name: string }
  | { kind: 'literal'; value: FilterValue }
  /** Unquoted ISO-8601 timestamp, in ms */
  | { kind: 'datetime'; value: number };

export type FilterNode =
  | { kind: 'and' | 'or'; left: FilterNode; right: FilterNode }
  | { kind: 'not'; operand: FilterNode }
  | { kind: 'compare'; operator: ComparisonOperator; left: Operand; right: Operand };

export interface OrderByClause {
  field: string;
  descending: boolean;
}

/**
 * A `$filter` or `$orderby` value that could not be parsed
 */
export class FilterSyntaxError extends TableSyncError {
  readonly position: number;

  constructor(message: string, position: number) {
    super({ code: 'TS_H601', message, context: { position } });
    this.name = 'FilterSyntaxError';
    this.position = position;
  }
}

type Token =
  | { type: 'lparen' | 'rparen'; position: number }
  | { type: 'word'; text: string; position: number }
  | { type: 'string'; value: string; position: number }
  | { type: 'number'; value: number; position: number }
  | { type: 'datetime'; value: number; position: number };

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['eq', 'ne', 'gt', 'ge', 'lt', 'le']);
const FIELD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const DATETIME_PATTERN =
  /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:\d{2})/y;
const NUMBER_PATTERN = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const WORD_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;

function isComparisonOperator(text: string): text is ComparisonOperator {
  return COMPARISON_OPERATORS.has(text);
}

function matchAt(pattern: RegExp, input: string, position: number): string | null {
  pattern.lastIndex = position;
  const match = pattern.exec(input);
  return match ? match[0] : null;
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'lparen' : 'rparen', position: i });
      i++;
      continue;
    }

    if (ch === "'") {
      const start = i;
      let value = '';
      i++;
      for (;;) {
        if (i >= input.length) {
          throw new FilterSyntaxError('Unterminated string literal', start);
        }
        const c = input.charAt(i);
        if (c === "'") {
          // '' escapes a quote
          if (input.charAt(i + 1) === "'") {
            value += "'";
            i += 2;
            continue;
          }
          i++;
          break;
        }
        value += c;
        i++;
      }
      tokens.push({ type: 'string', value, position: start });
      continue;
    }

    const datetime = matchAt(DATETIME_PATTERN, input, i);
    if (datetime) {
      const ms = Date.parse(datetime);
      if (Number.isNaN(ms)) {
        throw new FilterSyntaxError(`Invalid timestamp "${datetime}"`, i);
      }
      tokens.push({ type: 'datetime', value: ms, position: i });
      i += datetime.length;
      continue;
    }

    const number = matchAt(NUMBER_PATTERN, input, i);
    if (number) {
      tokens.push({ type: 'number', value: Number(number), position: i });
      i += number.length;
      continue;
    }

    const word = matchAt(WORD_PATTERN, input, i);
    if (word) {
      tokens.push({ type: 'word', text: word, position: i });
      i += word.length;
      continue;
    }

    throw new FilterSyntaxError(`Unexpected character "${ch}"`, i);
  }

  return tokens;
}

/**
 * Recursive descent over:
 *
 * ```
 * or      := and ('or' and)*
 * and     := unary ('and' unary)*
 * unary   := 'not' unary | '(' or ')' | compare
 * compare := operand op operand
 * ```
 */
class FilterParser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly length: number
  ) {}

  parse(): FilterNode {
    const node = this.parseOr();
    const extra = this.tokens[this.index];
    if (extra) {
      throw new FilterSyntaxError('Unexpected token after the end of the expression', extra.position);
    }
    return node;
  }

  private parseOr(): FilterNode {
    let left = this.parseAnd();
    while (this.acceptWord('or')) {
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): FilterNode {
    let left = this.parseUnary();
    while (this.acceptWord('and')) {
      left = { kind: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): FilterNode {
    if (this.acceptWord('not')) {
      return { kind: 'not', operand: this.parseUnary() };
    }

    const token = this.tokens[this.index];
    if (token?.type === 'lparen') {
      this.index++;
      const inner = this.parseOr();
      const closing = this.tokens[this.index];
      if (closing?.type !== 'rparen') {
        throw new FilterSyntaxError('Missing closing parenthesis', closing?.position ?? this.length);
      }
      this.index++;
      return inner;
    }

    return this.parseComparison();
  }

  private parseComparison(): FilterNode {
    const left = this.parseOperand();

    const token = this.tokens[this.index];
    if (token?.type !== 'word' || !isComparisonOperator(token.text)) {
      throw new FilterSyntaxError('Expected a comparison operator', token?.position ?? this.length);
    }
    this.index++;

    return { kind: 'compare', operator: token.text, left, right: this.parseOperand() };
  }

  private parseOperand(): Operand {
    const token = this.tokens[this.index];
    if (!token) {
      throw new FilterSyntaxError('Unexpected end of expression', this.length);
    }
    this.index++;

    switch (token.type) {
      case 'string':
      case 'number':
        return { kind: 'literal', value: token.value };
      case 'datetime':
        return { kind: 'datetime', value: token.value };
      case 'word':
        if (token.text === 'true' || token.text === 'false') {
          return { kind: 'literal', value: token.text === 'true' };
        }
        if (token.text === 'null') {
          return { kind: 'literal', value: null };
        }
        if (isComparisonOperator(token.text) || ['and', 'or', 'not'].includes(token.text)) {
          throw new FilterSyntaxError(`Unexpected keyword "${token.text}"`, token.position);
        }
        return { kind: 'field', name: token.text };
      default:
        throw new FilterSyntaxError('Expected a field or a value', token.position);
    }
  }

  private acceptWord(text: string): boolean {
    const token = this.tokens[this.index];
    if (token?.type === 'word' && token.text === text) {
      this.index++;
      return true;
    }
    return false;
  }
}

/**
 * Parse a `$filter` expression.
 *
 * @example
 * ```typescript
 * parseFilter("(updatedAt gt 2024-05-01T10:00:00.000Z) or (updatedAt eq 2024-05-01T10:00:00.000Z and id gt 'a')");
 * ```
 */
export function parseFilter(input: string): FilterNode {
  const tokens = tokenize(input);
  if (tokens.length === 0) {
    throw new FilterSyntaxError('Empty filter expression', 0);
  }
  return new FilterParser(tokens, input.length).parse();
}

/**
 * Parse an `$orderby` value: comma-separated fields, each optionally
 * followed by `asc` or `desc`
 */
export function parseOrderBy(input: string): OrderByClause[] {
  const clauses: OrderByClause[] = [];
  let position = 0;

  for (const part of input.split(',')) {
    const words = part.trim().split(/\s+/);
    const [field = '', direction, ...rest] = words;

    if (!FIELD_PATTERN.test(field) || rest.length > 0) {
      throw new FilterSyntaxError(`Invalid $orderby clause "${part.trim()}"`, position);
    }
    if (direction !== undefined && direction !== 'asc' && direction !== 'desc') {
      throw new FilterSyntaxError(`Invalid sort direction "${direction}"`, position);
    }

    clauses.push({ field, descending: direction === 'desc' });
    position += part.length + 1;
  }

  return clauses;
}

type Resolved = FilterValue | { datetime: number } | undefined;

function resolveOperand(operand: Operand, entity: Record<string, unknown>): Resolved {
  switch (operand.kind) {
    case 'literal':
      return operand.value;
    case 'datetime':
      return { datetime: operand.value };
    case 'field': {
      const value = entity[operand.name];
      if (
        value === null ||
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
      ) {
        return value;
      }
      return undefined;
    }
  }
}

function isDatetime(value: Resolved): value is { datetime: number } {
  return typeof value === 'object' && value !== null;
}

function toMillis(value: Resolved): number | null {
  if (isDatetime(value)) {
    return value.datetime;
  }
  if (typeof value === 'string') {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : ms;
  }
  return null;
}

/**
 * Comparison of two resolved operands, or null when they are not
 * comparable
 */
function compareResolved(left: Resolved, right: Resolved): number | null {
  if (isDatetime(left) || isDatetime(right)) {
    const l = toMillis(left);
    const r = toMillis(right);
    if (l === null || r === null) return null;
    return l === r ? 0 : l < r ? -1 : 1;
  }

  if (typeof left === 'string' && typeof right === 'string') {
    return left === right ? 0 : left < right ? -1 : 1;
  }
  if (typeof left === 'number' && typeof right === 'number') {
    return Math.sign(left - right);
  }
  if (typeof left === 'boolean' && typeof right === 'boolean') {
    return Number(left) - Number(right);
  }
  return null;
}

function isNullish(value: Resolved): boolean {
  return value === null || value === undefined;
}

function evaluateComparison(
  operator: ComparisonOperator,
  left: Resolved,
  right: Resolved
): boolean {
  if (isNullish(left) || isNullish(right)) {
    const bothNull = isNullish(left) && isNullish(right);
    if (operator === 'eq') return bothNull;
    if (operator === 'ne') return !bothNull;
    return false;
  }

  const order = compareResolved(left, right);
  if (order === null) {
    return operator === 'ne';
  }

  switch (operator) {
    case 'eq':
      return order === 0;
    case 'ne':
      return order !== 0;
    case 'gt':
      return order > 0;
    case 'ge':
      return order >= 0;
    case 'lt':
      return order < 0;
    case 'le':
      return order <= 0;
  }
}

/**
 * Whether `entity` satisfies a parsed filter. Strings compare by code
 * unit; timestamps compare as instants.
 */
export function evaluateFilter(node: FilterNode, entity: Record<string, unknown>): boolean {
  switch (node.kind) {
    case 'and':
      return evaluateFilter(node.left, entity) && evaluateFilter(node.right, entity);
    case 'or':
      return evaluateFilter(node.left, entity) || evaluateFilter(node.right, entity);
    case 'not':
      return !evaluateFilter(node.operand, entity);
    case 'compare':
      return evaluateComparison(
        node.operator,
        resolveOperand(node.left, entity),
        resolveOperand(node.right, entity)
      );
  }
}

/**
 * Sort comparator for `$orderby`. Nulls sort first.
 */
export function compareByOrder(
  clauses: OrderByClause[]
): (a: Record<string, unknown>, b: Record<string, unknown>) => number {
  return (a, b) => {
    for (const clause of clauses) {
      const order = compareFieldValues(a[clause.field], b[clause.field]);
      if (order !== 0) {
        return clause.descending ? -order : order;
      }
    }
    return 0;
  };
}

function compareFieldValues(a: unknown, b: unknown): number {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) {
    return aMissing === bMissing ? 0 : aMissing ? -1 : 1;
  }

  if (typeof a === 'string' && typeof b === 'string') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }

  const ta = typeof a;
  const tb = typeof b;
  return ta === tb ? 0 : ta < tb ? -1 : 1;
}
