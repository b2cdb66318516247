import { FilterEvaluationError } from '../errors.js';

/**
 * Restricted predicate interpreter for `script` filters.
 *
 * Accepts a small expression-oriented subset of JavaScript: `const`/`let`
 * declarations, `if`/`else`, blocks, `return`, ternaries and the usual
 * operators over plain data. There are no loops, no function literals, no
 * assignment to existing bindings and no ambient globals beyond the
 * whitelist below. Every evaluated node costs one step against a budget.
 */

export const DEFAULT_STEP_BUDGET = 10_000;

// ─── Runtime values ─────────────────────────────────────────────

export class Builtin {
  constructor(
    readonly name: string,
    readonly call: (args: readonly ScriptValue[]) => ScriptValue,
  ) {}
}

export type ScriptValue =
  | undefined
  | null
  | boolean
  | number
  | string
  | Builtin
  | readonly ScriptValue[]
  | ScriptObject;

export interface ScriptObject {
  readonly [key: string]: ScriptValue;
}

// ─── Tokens ─────────────────────────────────────────────────────

type Token =
  | { readonly type: 'num'; readonly value: number; readonly pos: number }
  | { readonly type: 'str'; readonly value: string; readonly pos: number }
  | { readonly type: 'ident'; readonly value: string; readonly pos: number }
  | { readonly type: 'punct'; readonly value: string; readonly pos: number }
  | { readonly type: 'eof'; readonly value: ''; readonly pos: number };

const PUNCTUATORS = [
  '===', '!==', '==', '!=', '<=', '>=', '&&', '||', '??',
  '<', '>', '+', '-', '*', '/', '%', '!', '?', ':', '(', ')', '[', ']', '{', '}', ',', ';', '.', '=',
];

const FORBIDDEN_KEYWORDS = new Set([
  'while', 'for', 'do', 'function', 'class', 'new', 'this', 'throw', 'try', 'catch', 'switch',
  'import', 'export', 'await', 'async', 'yield', 'delete', 'void', 'with', 'break', 'continue',
]);

const ESCAPES: Readonly<Record<string, string>> = { n: '\n', t: '\t', r: '\r', '\\': '\\', "'": "'", '"': '"', '0': '\0' };

function syntaxError(message: string, pos: number): FilterEvaluationError {
  return new FilterEvaluationError(`Script syntax error at ${pos}: ${message}`);
}

const NUMBER_RE = /^(?:\d+\.?\d*(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?)/;
const IDENT_RE = /^[A-Za-z_$][\w$]*/;

function leading(re: RegExp, source: string, from: number): string | undefined {
  const match = re.exec(source.slice(from));
  return match === null ? undefined : match[0];
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (source.startsWith('//', i)) {
      const end = source.indexOf('\n', i);
      i = end === -1 ? source.length : end;
      continue;
    }
    if (source.startsWith('/*', i)) {
      const end = source.indexOf('*/', i + 2);
      if (end === -1) throw syntaxError('unterminated comment', i);
      i = end + 2;
      continue;
    }

    const number = leading(NUMBER_RE, source, i);
    if (number !== undefined) {
      tokens.push({ type: 'num', value: Number(number), pos: i });
      i += number.length;
      continue;
    }

    const ident = leading(IDENT_RE, source, i);
    if (ident !== undefined) {
      tokens.push({ type: 'ident', value: ident, pos: i });
      i += ident.length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      let text = '';
      i++;
      for (;;) {
        if (i >= source.length) throw syntaxError('unterminated string', start);
        const c = source.charAt(i);
        if (c === ch) break;
        if (c === '\n') throw syntaxError('unterminated string', start);
        if (c === '\\') {
          const next = source.charAt(i + 1);
          if (next === 'u' && /^[0-9a-fA-F]{4}$/.test(source.slice(i + 2, i + 6))) {
            text += String.fromCharCode(parseInt(source.slice(i + 2, i + 6), 16));
            i += 6;
            continue;
          }
          text += ESCAPES[next] ?? next;
          i += 2;
          continue;
        }
        text += c;
        i++;
      }
      i++;
      tokens.push({ type: 'str', value: text, pos: start });
      continue;
    }

    const punct = PUNCTUATORS.find((p) => source.startsWith(p, i));
    if (punct === undefined) throw syntaxError(`unexpected character '${ch}'`, i);
    if (punct === '=' && source.charAt(i + 1) === '>') throw syntaxError('arrow functions are not supported', i);
    tokens.push({ type: 'punct', value: punct, pos: i });
    i += punct.length;
  }

  tokens.push({ type: 'eof', value: '', pos: source.length });
  return tokens;
}

// ─── AST ────────────────────────────────────────────────────────

type Expr =
  | { readonly type: 'literal'; readonly value: ScriptValue }
  | { readonly type: 'identifier'; readonly name: string }
  | { readonly type: 'array'; readonly elements: readonly Expr[] }
  | { readonly type: 'member'; readonly object: Expr; readonly property: Expr }
  | { readonly type: 'call'; readonly callee: Expr; readonly args: readonly Expr[] }
  | { readonly type: 'unary'; readonly operator: string; readonly argument: Expr }
  | { readonly type: 'binary'; readonly operator: string; readonly left: Expr; readonly right: Expr }
  | { readonly type: 'logical'; readonly operator: string; readonly left: Expr; readonly right: Expr }
  | { readonly type: 'conditional'; readonly test: Expr; readonly consequent: Expr; readonly alternate: Expr };

type Stmt =
  | { readonly type: 'declare'; readonly name: string; readonly init: Expr }
  | { readonly type: 'if'; readonly test: Expr; readonly consequent: Stmt; readonly alternate: Stmt | undefined }
  | { readonly type: 'block'; readonly body: readonly Stmt[] }
  | { readonly type: 'return'; readonly argument: Expr | undefined }
  | { readonly type: 'expression'; readonly expression: Expr }
  | { readonly type: 'empty' };

/** Parsed script, ready to run any number of times. */
export interface ScriptProgram {
  readonly source: string;
  readonly body: readonly Stmt[];
}

// ─── Parser ─────────────────────────────────────────────────────

class Parser {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parseProgram(): Stmt[] {
    const body: Stmt[] = [];
    while (this.peek().type !== 'eof') {
      body.push(this.statement());
    }
    return body;
  }

  private peek(): Token {
    const token = this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
    if (token === undefined) throw syntaxError('empty token stream', 0);
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private isPunct(value: string): boolean {
    const token = this.peek();
    return token.type === 'punct' && token.value === value;
  }

  private isKeyword(value: string): boolean {
    const token = this.peek();
    return token.type === 'ident' && token.value === value;
  }

  private eat(value: string): boolean {
    if (this.isPunct(value)) {
      this.index++;
      return true;
    }
    return false;
  }

  private expect(value: string): void {
    const token = this.peek();
    if (!this.eat(value)) throw syntaxError(`expected '${value}' but found '${token.value || 'end of input'}'`, token.pos);
  }

  private endStatement(): void {
    this.eat(';');
  }

  private statement(): Stmt {
    const token = this.peek();

    if (token.type === 'punct' && token.value === '{') {
      this.next();
      const body: Stmt[] = [];
      while (!this.isPunct('}')) {
        if (this.peek().type === 'eof') throw syntaxError("expected '}'", token.pos);
        body.push(this.statement());
      }
      this.next();
      return { type: 'block', body };
    }

    if (token.type === 'punct' && token.value === ';') {
      this.next();
      return { type: 'empty' };
    }

    if (token.type === 'ident') {
      if (FORBIDDEN_KEYWORDS.has(token.value)) {
        throw syntaxError(`'${token.value}' is not supported`, token.pos);
      }

      if (token.value === 'const' || token.value === 'let' || token.value === 'var') {
        this.next();
        const name = this.next();
        if (name.type !== 'ident') throw syntaxError('expected identifier', name.pos);
        this.expect('=');
        const init = this.expression();
        this.endStatement();
        return { type: 'declare', name: name.value, init };
      }

      if (token.value === 'if') {
        this.next();
        this.expect('(');
        const test = this.expression();
        this.expect(')');
        const consequent = this.statement();
        let alternate: Stmt | undefined;
        if (this.isKeyword('else')) {
          this.next();
          alternate = this.statement();
        }
        return { type: 'if', test, consequent, alternate };
      }

      if (token.value === 'return') {
        this.next();
        const following = this.peek();
        const bare = following.type === 'eof' || (following.type === 'punct' && (following.value === ';' || following.value === '}'));
        const argument = bare ? undefined : this.expression();
        this.endStatement();
        return { type: 'return', argument };
      }
    }

    const expression = this.expression();
    if (this.isPunct('=')) throw syntaxError('assignment is not supported', this.peek().pos);
    this.endStatement();
    return { type: 'expression', expression };
  }

  private expression(): Expr {
    return this.conditional();
  }

  private conditional(): Expr {
    const test = this.logical(0);
    if (!this.eat('?')) return test;
    const consequent = this.conditional();
    this.expect(':');
    const alternate = this.conditional();
    return { type: 'conditional', test, consequent, alternate };
  }

  private static readonly LOGICAL_LEVELS: readonly (readonly string[])[] = [['||', '??'], ['&&']];

  private logical(level: number): Expr {
    const operators = Parser.LOGICAL_LEVELS[level];
    if (operators === undefined) return this.binary(0);
    let left = this.logical(level + 1);
    for (;;) {
      const token = this.peek();
      if (token.type !== 'punct' || !operators.includes(token.value)) return left;
      this.next();
      left = { type: 'logical', operator: token.value, left, right: this.logical(level + 1) };
    }
  }

  private static readonly BINARY_LEVELS: readonly (readonly string[])[] = [
    ['==', '!=', '===', '!=='],
    ['<', '>', '<=', '>='],
    ['+', '-'],
    ['*', '/', '%'],
  ];

  private binary(level: number): Expr {
    const operators = Parser.BINARY_LEVELS[level];
    if (operators === undefined) return this.unary();
    let left = this.binary(level + 1);
    for (;;) {
      const token = this.peek();
      if (token.type !== 'punct' || !operators.includes(token.value)) return left;
      this.next();
      left = { type: 'binary', operator: token.value, left, right: this.binary(level + 1) };
    }
  }

  private unary(): Expr {
    const token = this.peek();
    if (token.type === 'punct' && (token.value === '!' || token.value === '-' || token.value === '+')) {
      this.next();
      return { type: 'unary', operator: token.value, argument: this.unary() };
    }
    if (token.type === 'ident' && token.value === 'typeof') {
      this.next();
      return { type: 'unary', operator: 'typeof', argument: this.unary() };
    }
    return this.postfix();
  }

  private postfix(): Expr {
    let expr = this.primary();
    for (;;) {
      if (this.eat('.')) {
        const name = this.next();
        if (name.type !== 'ident') throw syntaxError('expected property name', name.pos);
        expr = { type: 'member', object: expr, property: { type: 'literal', value: name.value } };
      } else if (this.eat('[')) {
        const property = this.expression();
        this.expect(']');
        expr = { type: 'member', object: expr, property };
      } else if (this.eat('(')) {
        const args = this.list(')');
        expr = { type: 'call', callee: expr, args };
      } else {
        return expr;
      }
    }
  }

  private list(close: string): Expr[] {
    const items: Expr[] = [];
    while (!this.eat(close)) {
      items.push(this.expression());
      if (!this.isPunct(close)) this.expect(',');
    }
    return items;
  }

  private primary(): Expr {
    const token = this.next();
    switch (token.type) {
      case 'num':
      case 'str':
        return { type: 'literal', value: token.value };
      case 'ident':
        if (FORBIDDEN_KEYWORDS.has(token.value)) throw syntaxError(`'${token.value}' is not supported`, token.pos);
        if (token.value === 'true') return { type: 'literal', value: true };
        if (token.value === 'false') return { type: 'literal', value: false };
        if (token.value === 'null') return { type: 'literal', value: null };
        return { type: 'identifier', name: token.value };
      case 'punct':
        if (token.value === '(') {
          const inner = this.expression();
          this.expect(')');
          return inner;
        }
        if (token.value === '[') {
          return { type: 'array', elements: this.list(']') };
        }
        throw syntaxError(`unexpected '${token.value}'`, token.pos);
      case 'eof':
        throw syntaxError('unexpected end of input', token.pos);
    }
  }
}

/** Parses a script. Throws `FilterEvaluationError` on syntax errors. */
export function parseScript(source: string): ScriptProgram {
  const body = new Parser(tokenize(source)).parseProgram();
  return { source, body };
}

// ─── Whitelisted globals ────────────────────────────────────────

function toNumber(value: ScriptValue): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value === null) return 0;
  if (typeof value === 'string') return value.trim() === '' ? 0 : Number(value);
  return NaN;
}

function toText(value: ScriptValue): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (value instanceof Builtin) return `function ${value.name}() { [native code] }`;
  if (Array.isArray(value)) return value.map((v) => (v === null || v === undefined ? '' : toText(v))).join(',');
  if (typeof value === 'object') return '[object Object]';
  return String(value);
}

function truthy(value: ScriptValue): boolean {
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value !== '';
  if (typeof value === 'boolean') return value;
  return value !== null && value !== undefined;
}

function numeric(name: string, fn: (...values: number[]) => number): Builtin {
  return new Builtin(name, (args) => fn(...args.map(toNumber)));
}

const GLOBALS: ReadonlyMap<string, ScriptValue> = new Map<string, ScriptValue>([
  ['undefined', undefined],
  ['NaN', NaN],
  ['Infinity', Infinity],
  ['parseFloat', new Builtin('parseFloat', (args) => parseFloat(toText(args[0])))],
  ['parseInt', new Builtin('parseInt', (args) => parseInt(toText(args[0]), args[1] === undefined ? undefined : toNumber(args[1])))],
  ['Number', new Builtin('Number', (args) => (args.length === 0 ? 0 : toNumber(args[0])))],
  ['String', new Builtin('String', (args) => (args.length === 0 ? '' : toText(args[0])))],
  ['Boolean', new Builtin('Boolean', (args) => truthy(args[0]))],
  ['Array', { isArray: new Builtin('isArray', (args) => Array.isArray(args[0])) }],
  ['Math', {
    abs: numeric('abs', Math.abs),
    min: numeric('min', Math.min),
    max: numeric('max', Math.max),
    floor: numeric('floor', Math.floor),
    ceil: numeric('ceil', Math.ceil),
    round: numeric('round', Math.round),
  }],
]);

function stringMethod(receiver: string, name: string): Builtin | undefined {
  switch (name) {
    case 'includes':
      return new Builtin(name, (args) => receiver.includes(toText(args[0])));
    case 'startsWith':
      return new Builtin(name, (args) => receiver.startsWith(toText(args[0])));
    case 'endsWith':
      return new Builtin(name, (args) => receiver.endsWith(toText(args[0])));
    case 'indexOf':
      return new Builtin(name, (args) => receiver.indexOf(toText(args[0])));
    case 'toLowerCase':
      return new Builtin(name, () => receiver.toLowerCase());
    case 'toUpperCase':
      return new Builtin(name, () => receiver.toUpperCase());
    case 'trim':
      return new Builtin(name, () => receiver.trim());
    default:
      return undefined;
  }
}

function arrayMethod(receiver: readonly ScriptValue[], name: string): Builtin | undefined {
  switch (name) {
    case 'includes':
      return new Builtin(name, (args) => receiver.some((item) => sameValueZero(item, args[0])));
    case 'indexOf':
      return new Builtin(name, (args) => receiver.findIndex((item) => item === args[0]));
    default:
      return undefined;
  }
}

function sameValueZero(a: ScriptValue, b: ScriptValue): boolean {
  return a === b || (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b));
}

// ─── Evaluator ──────────────────────────────────────────────────

class Scope {
  private readonly vars = new Map<string, ScriptValue>();

  constructor(private readonly parent: Scope | undefined) {}

  declare(name: string, value: ScriptValue): void {
    if (this.vars.has(name)) throw new FilterEvaluationError(`'${name}' has already been declared`);
    this.vars.set(name, value);
  }

  lookup(name: string): ScriptValue {
    if (this.vars.has(name)) return this.vars.get(name);
    if (this.parent !== undefined) return this.parent.lookup(name);
    if (GLOBALS.has(name)) return GLOBALS.get(name);
    throw new FilterEvaluationError(`${name} is not defined`);
  }
}

type Completion = { readonly returned: true; readonly value: ScriptValue } | { readonly returned: false };

const NORMAL: Completion = { returned: false };

class Interpreter {
  private steps = 0;
  lastExpression: ScriptValue = undefined;

  constructor(private readonly budget: number) {}

  private tick(): void {
    this.steps++;
    if (this.steps > this.budget) {
      throw new FilterEvaluationError(`Script exceeded step budget of ${this.budget}`);
    }
  }

  run(body: readonly Stmt[], scope: Scope): Completion {
    for (const stmt of body) {
      const completion = this.exec(stmt, scope);
      if (completion.returned) return completion;
    }
    return NORMAL;
  }

  private exec(stmt: Stmt, scope: Scope): Completion {
    this.tick();
    switch (stmt.type) {
      case 'empty':
        return NORMAL;
      case 'declare':
        scope.declare(stmt.name, this.eval(stmt.init, scope));
        return NORMAL;
      case 'expression':
        this.lastExpression = this.eval(stmt.expression, scope);
        return NORMAL;
      case 'return':
        return { returned: true, value: stmt.argument === undefined ? undefined : this.eval(stmt.argument, scope) };
      case 'block':
        return this.run(stmt.body, new Scope(scope));
      case 'if':
        if (truthy(this.eval(stmt.test, scope))) return this.exec(stmt.consequent, new Scope(scope));
        return stmt.alternate === undefined ? NORMAL : this.exec(stmt.alternate, new Scope(scope));
    }
  }

  private eval(expr: Expr, scope: Scope): ScriptValue {
    this.tick();
    switch (expr.type) {
      case 'literal':
        return expr.value;
      case 'identifier':
        return scope.lookup(expr.name);
      case 'array':
        return expr.elements.map((element) => this.eval(element, scope));
      case 'member':
        return this.member(this.eval(expr.object, scope), this.eval(expr.property, scope));
      case 'call': {
        const callee = this.eval(expr.callee, scope);
        if (!(callee instanceof Builtin)) throw new FilterEvaluationError('value is not a function');
        return callee.call(expr.args.map((arg) => this.eval(arg, scope)));
      }
      case 'unary': {
        const value = this.eval(expr.argument, scope);
        if (expr.operator === '!') return !truthy(value);
        if (expr.operator === '-') return -toNumber(value);
        if (expr.operator === '+') return toNumber(value);
        return typeOf(value);
      }
      case 'logical': {
        const left = this.eval(expr.left, scope);
        if (expr.operator === '&&') return truthy(left) ? this.eval(expr.right, scope) : left;
        if (expr.operator === '||') return truthy(left) ? left : this.eval(expr.right, scope);
        return left === null || left === undefined ? this.eval(expr.right, scope) : left;
      }
      case 'conditional':
        return truthy(this.eval(expr.test, scope))
          ? this.eval(expr.consequent, scope)
          : this.eval(expr.alternate, scope);
      case 'binary':
        return binary(expr.operator, this.eval(expr.left, scope), this.eval(expr.right, scope));
    }
  }

  private member(object: ScriptValue, property: ScriptValue): ScriptValue {
    if (object === null || object === undefined) {
      throw new FilterEvaluationError(`Cannot read property '${toText(property)}' of ${toText(object)}`);
    }
    const key = typeof property === 'number' ? String(property) : toText(property);

    if (typeof object === 'string') {
      if (key === 'length') return object.length;
      if (/^\d+$/.test(key)) return object.charAt(Number(key)) || undefined;
      return stringMethod(object, key);
    }
    if (Array.isArray(object)) {
      if (key === 'length') return object.length;
      if (/^\d+$/.test(key)) return object[Number(key)];
      return arrayMethod(object, key);
    }
    if (typeof object === 'object' && !(object instanceof Builtin) && isScriptObject(object)) {
      return Object.hasOwn(object, key) ? object[key] : undefined;
    }
    return undefined;
  }
}

function isScriptObject(value: object): value is ScriptObject {
  return !Array.isArray(value) && !(value instanceof Builtin);
}

function typeOf(value: ScriptValue): string {
  if (value === null) return 'object';
  if (value instanceof Builtin) return 'function';
  return typeof value;
}

function binary(operator: string, left: ScriptValue, right: ScriptValue): ScriptValue {
  switch (operator) {
    case '==':
    case '===':
      return left === right;
    case '!=':
    case '!==':
      return left !== right;
    case '+':
      if (typeof left === 'string' || typeof right === 'string') return toText(left) + toText(right);
      return toNumber(left) + toNumber(right);
    case '-':
      return toNumber(left) - toNumber(right);
    case '*':
      return toNumber(left) * toNumber(right);
    case '/':
      return toNumber(left) / toNumber(right);
    case '%':
      return toNumber(left) % toNumber(right);
  }

  if (typeof left === 'string' && typeof right === 'string') {
    switch (operator) {
      case '<': return left < right;
      case '>': return left > right;
      case '<=': return left <= right;
      case '>=': return left >= right;
    }
  }

  const a = toNumber(left);
  const b = toNumber(right);
  switch (operator) {
    case '<': return a < b;
    case '>': return a > b;
    case '<=': return a <= b;
    case '>=': return a >= b;
    default:
      throw new FilterEvaluationError(`Unsupported operator ${operator}`);
  }
}

export interface RunScriptOptions {
  stepBudget?: number;
}

/**
 * Runs a parsed script with the given bindings and returns its value: the
 * `return` argument, or the last expression statement when there is none.
 */
export function runScript(
  program: ScriptProgram,
  bindings: Readonly<Record<string, ScriptValue>>,
  options: RunScriptOptions = {},
): ScriptValue {
  const root = new Scope(undefined);
  for (const [name, value] of Object.entries(bindings)) {
    root.declare(name, value);
  }

  const interpreter = new Interpreter(options.stepBudget ?? DEFAULT_STEP_BUDGET);
  const completion = interpreter.run(program.body, new Scope(root));
  return completion.returned ? completion.value : interpreter.lastExpression;
}

export { truthy as isTruthy };
