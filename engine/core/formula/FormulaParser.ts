/**
 * Grid Formula Engine - Formula Parser
 *
 * Recursive-descent parser from tokens to an AST. Function arguments have their
 * own restricted grammar: each argument is a number, a nested call, a single
 * reference or a range. Arithmetic is only allowed outside of calls.
 */

import { CellRef } from '../types/index.js';
import { decodeReference } from '../reference/CellReference.js';
import { FormulaError } from './FormulaError.js';
import { tokenize, Token } from './Tokenizer.js';

export const SUPPORTED_FUNCTIONS = [
  'SUM',
  'PRODUCT',
  'AVERAGE',
  'MIN',
  'MAX',
  'COUNT',
  'ABS',
  'ROUND',
] as const;

export type FunctionName = (typeof SUPPORTED_FUNCTIONS)[number];

export type BinaryOp = '+' | '-' | '*' | '/';

export interface CallNode {
  type: 'call';
  name: FunctionName;
  /** Argument segments split on ';'. Segment 0 is the primary argument list. */
  segments: FunctionArg[][];
}

export type AST =
  | { type: 'num'; value: number }
  | { type: 'ref'; ref: CellRef }
  | { type: 'unary'; op: '+' | '-'; operand: AST }
  | { type: 'bin'; op: BinaryOp; left: AST; right: AST }
  | CallNode;

export type FunctionArg =
  /** Number literal or nested call, optionally signed */
  | { kind: 'scalar'; node: AST }
  | { kind: 'cell'; ref: CellRef }
  | { kind: 'range'; start: CellRef; end: CellRef };

const REFERENCE_WORD = /^[A-Z]+[0-9]+$/;
const FUNCTION_WORD = /^[A-Za-z]+$/;

/** Deepest allowed nesting of parentheses, unary signs and calls */
export const MAX_NESTING_DEPTH = 256;

export function isFunctionName(name: string): name is FunctionName {
  return SUPPORTED_FUNCTIONS.some((fn) => fn === name);
}

/**
 * Append the `)` characters a formula is missing. Extra `)` are left alone.
 */
export function balanceParentheses(formula: string): string {
  let open = 0;
  let close = 0;
  for (const ch of formula) {
    if (ch === '(') open++;
    else if (ch === ')') close++;
  }
  return open > close ? formula + ')'.repeat(open - close) : formula;
}

export function parseFormula(formula: string): AST {
  const toks = tokenize(formula);
  let pos = 0;

  const peek = (): Token => toks[pos];
  const next = (): Token => toks[pos++];

  function fail(message: string): never {
    throw new FormulaError('InvalidFormula', message);
  }

  let depth = 0;
  function enter(): void {
    if (++depth > MAX_NESTING_DEPTH) {
      fail(`Formula is nested more than ${MAX_NESTING_DEPTH} levels deep`);
    }
  }

  function parseExpr(): AST {
    let left = parseTerm();
    let tk = peek();
    while (tk.t === 'op' && (tk.v === '+' || tk.v === '-')) {
      pos++;
      left = { type: 'bin', op: tk.v, left, right: parseTerm() };
      tk = peek();
    }
    return left;
  }

  function parseTerm(): AST {
    let left = parseUnary();
    let tk = peek();
    while (tk.t === 'op' && (tk.v === '*' || tk.v === '/')) {
      pos++;
      left = { type: 'bin', op: tk.v, left, right: parseUnary() };
      tk = peek();
    }
    return left;
  }

  function parseUnary(): AST {
    enter();
    try {
      const tk = peek();
      if (tk.t === 'op' && (tk.v === '+' || tk.v === '-')) {
        pos++;
        return { type: 'unary', op: tk.v, operand: parseUnary() };
      }
      return parsePrimary();
    } finally {
      depth--;
    }
  }

  function parsePrimary(): AST {
    const tk = next();
    switch (tk.t) {
      case 'num':
        return { type: 'num', value: tk.v };
      case 'lparen': {
        const inner = parseExpr();
        if (next().t !== 'rparen') fail(`Expected ')' at position ${tk.pos}`);
        return inner;
      }
      case 'word': {
        if (peek().t === 'lparen' && FUNCTION_WORD.test(tk.v)) {
          return parseCall(tk.v);
        }
        if (!REFERENCE_WORD.test(tk.v)) {
          return fail(`Unexpected identifier '${tk.v}'`);
        }
        const ref = decodeReference(tk.v);
        if (peek().t === 'colon') {
          return fail(`Range ${tk.v}:… is only allowed as a function argument`);
        }
        return { type: 'ref', ref };
      }
      case 'eof':
        return fail('Unexpected end of formula');
      default:
        return fail(`Unexpected token at position ${tk.pos}`);
    }
  }

  function parseCall(rawName: string): CallNode {
    enter();
    try {
      const name = rawName.toUpperCase();
      if (!isFunctionName(name)) {
        throw new FormulaError('InvalidFunction', `Unknown function: ${rawName}`);
      }
      pos++; // '('

      const segments: FunctionArg[][] = [[]];
      let segment = segments[0];

      if (peek().t === 'rparen') {
        pos++;
        return { type: 'call', name, segments };
      }

      for (;;) {
        const tk = peek();
        // Segments may be empty: "ROUND(;2)", "SUM(1;)"
        const emptySegment = segment.length === 0 && (tk.t === 'semicolon' || tk.t === 'rparen');
        if (!emptySegment) segment.push(parseArg());

        const sep = next();
        if (sep.t === 'rparen') break;
        if (sep.t === 'comma') continue;
        if (sep.t === 'semicolon') {
          segment = [];
          segments.push(segment);
          continue;
        }
        if (sep.t === 'eof') fail(`Unterminated call to ${name}`);
        fail(`Unexpected token in ${name} arguments at position ${sep.pos}`);
      }

      return { type: 'call', name, segments };
    } finally {
      depth--;
    }
  }

  function parseArg(): FunctionArg {
    const tk = peek();

    if (tk.t === 'op' && (tk.v === '+' || tk.v === '-')) {
      pos++;
      const operand = peek();
      if (operand.t === 'num' || isCallStart(operand)) {
        const scalar = parseScalarArg();
        return { kind: 'scalar', node: { type: 'unary', op: tk.v, operand: scalar } };
      }
      throw new FormulaError('InvalidReference', `Invalid argument at position ${tk.pos}`);
    }

    if (isCallStart(tk)) {
      return { kind: 'scalar', node: parseScalarArg() };
    }

    if (tk.t === 'num') {
      pos++;
      if (peek().t === 'colon') {
        throw new FormulaError('InvalidReference', `Invalid range start at position ${tk.pos}`);
      }
      return { kind: 'scalar', node: { type: 'num', value: tk.v } };
    }

    if (tk.t === 'word') {
      pos++;
      if (!REFERENCE_WORD.test(tk.v)) {
        throw new FormulaError('InvalidReference', `Invalid cell reference: ${tk.v}`);
      }
      const start = decodeReference(tk.v);
      if (peek().t !== 'colon') {
        return { kind: 'cell', ref: start };
      }
      pos++;
      const end = parseRangeEnd();
      if (peek().t === 'colon') {
        throw new FormulaError('InvalidRange', `Range has more than two endpoints at position ${tk.pos}`);
      }
      return { kind: 'range', start, end };
    }

    if (tk.t === 'colon') {
      throw new FormulaError('InvalidRange', `Range is missing its first endpoint at position ${tk.pos}`);
    }

    throw new FormulaError('InvalidReference', `Empty argument at position ${tk.pos}`);
  }

  function parseRangeEnd(): CellRef {
    const tk = peek();
    if (tk.t === 'word' || tk.t === 'num') {
      pos++;
      if (tk.t === 'word' && REFERENCE_WORD.test(tk.v)) {
        return decodeReference(tk.v);
      }
      throw new FormulaError('InvalidReference', `Invalid range endpoint at position ${tk.pos}`);
    }
    throw new FormulaError('InvalidRange', `Range is missing its second endpoint at position ${tk.pos}`);
  }

  function parseScalarArg(): AST {
    const tk = next();
    if (tk.t === 'num') return { type: 'num', value: tk.v };
    if (tk.t === 'word') return parseCall(tk.v);
    return fail(`Unexpected token at position ${tk.pos}`);
  }

  function isCallStart(tk: Token): boolean {
    return tk.t === 'word' && FUNCTION_WORD.test(tk.v) && toks[pos + 1]?.t === 'lparen';
  }

  const ast = parseExpr();
  if (peek().t !== 'eof') fail(`Unexpected trailing input at position ${peek().pos}`);
  return ast;
}
