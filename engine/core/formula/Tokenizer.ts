/**
 * Grid Formula Engine - Formula Tokenizer
 */

import { FormulaError } from './FormulaError.js';

export type Token =
  | { t: 'num'; v: number; pos: number }
  | { t: 'word'; v: string; pos: number }
  | { t: 'op'; v: '+' | '-' | '*' | '/'; pos: number }
  | { t: 'lparen'; pos: number }
  | { t: 'rparen'; pos: number }
  | { t: 'comma'; pos: number }
  | { t: 'semicolon'; pos: number }
  | { t: 'colon'; pos: number }
  | { t: 'eof'; pos: number };

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const WORD_PATTERN = /^[A-Za-z]+[0-9]*/;

const isOperator = (ch: string): ch is '+' | '-' | '*' | '/' =>
  ch === '+' || ch === '-' || ch === '*' || ch === '/';

export function tokenize(src: string): Token[] {
  const out: Token[] = [];
  let i = 0;

  while (i < src.length) {
    const ch = src[i];

    if (ch === ' ' || ch === '\t') {
      i++;
      continue;
    }
    if (isOperator(ch)) {
      out.push({ t: 'op', v: ch, pos: i });
      i++;
      continue;
    }

    switch (ch) {
      case '(':
        out.push({ t: 'lparen', pos: i++ });
        continue;
      case ')':
        out.push({ t: 'rparen', pos: i++ });
        continue;
      case ',':
        out.push({ t: 'comma', pos: i++ });
        continue;
      case ';':
        out.push({ t: 'semicolon', pos: i++ });
        continue;
      case ':':
        out.push({ t: 'colon', pos: i++ });
        continue;
    }

    const rest = src.slice(i);

    const num = NUMBER_PATTERN.exec(rest);
    if (num) {
      out.push({ t: 'num', v: parseFloat(num[0]), pos: i });
      i += num[0].length;
      continue;
    }

    const word = WORD_PATTERN.exec(rest);
    if (word) {
      out.push({ t: 'word', v: word[0], pos: i });
      i += word[0].length;
      continue;
    }

    throw new FormulaError('InvalidFormula', `Unexpected character '${ch}' at position ${i}`);
  }

  out.push({ t: 'eof', pos: src.length });
  return out;
}
