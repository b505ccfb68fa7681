/**
 * ABC Lexer
 * Turns ABC text into an ordered sequence of positioned tokens.
 *
 * The lexer never fails: characters it has no rule for become `Symbol` or
 * `Unknown` tokens and the parser decides whether they are errors. Whitespace
 * and comments are kept so that diagnostics can point at any column.
 */

import type { Position, Token, TokenKind } from '../types';

class LexerState {
  private index = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  position(): Position {
    return { offset: this.index, line: this.line, column: this.column };
  }

  offset(): number {
    return this.index;
  }

  isAtEnd(): boolean {
    return this.index >= this.source.length;
  }

  isAtLineStart(): boolean {
    return this.column === 1;
  }

  peek(offset = 0): string | undefined {
    return this.source[this.index + offset];
  }

  advance(): string {
    const char = this.source[this.index++];
    if (char === '\n' || (char === '\r' && this.source[this.index] !== '\n')) {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    return char;
  }

  slice(start: number, end?: number): string {
    return this.source.slice(start, end);
  }
}

/**
 * Tokenize an ABC source text. The result always ends with one
 * `EndOfInput` token.
 */
export function tokenize(source: string): Token[] {
  const state = new LexerState(source);
  const tokens: Token[] = [];
  let previous: TokenKind | undefined;

  while (!state.isAtEnd()) {
    const token = readToken(state, previous);
    tokens.push(token);
    previous = token.kind;
  }

  const end = state.position();
  tokens.push({ kind: 'EndOfInput', lexeme: '', span: { start: end, end } });
  return tokens;
}

function readToken(state: LexerState, previous: TokenKind | undefined): Token {
  const start = state.position();
  const startIndex = state.offset();
  const current = state.peek() ?? '';

  const finish = (kind: TokenKind): Token => ({
    kind,
    lexeme: state.slice(startIndex, state.offset()),
    span: { start, end: state.position() },
  });

  if (current === '\n') {
    state.advance();
    return finish('Newline');
  }

  if (current === '\r') {
    state.advance();
    if (state.peek() === '\n') state.advance();
    return finish('Newline');
  }

  if (current === ' ' || current === '\t') {
    while (state.peek() === ' ' || state.peek() === '\t') state.advance();
    return finish('Whitespace');
  }

  if (current === '%') {
    while (!state.isAtEnd() && !isLineBreak(state.peek())) state.advance();
    return finish('Comment');
  }

  if (isAsciiLetter(current)) {
    const opensField = state.isAtLineStart() || previous === 'BracketOpen';
    state.advance();
    if (opensField && state.peek() === ':') {
      return finish('HeaderKey');
    }
    return finish(isPitchChar(current) ? 'PitchLetter' : 'Letter');
  }

  if (isDigit(current)) {
    while (isDigit(state.peek())) state.advance();
    return finish('DigitRun');
  }

  if (current === ':' && previous !== 'HeaderKey' && (state.peek(1) === '|' || state.peek(1) === ':')) {
    readBarSeparator(state);
    return finish('BarSeparator');
  }

  if (current === '|' || (current === '[' && state.peek(1) === '|')) {
    readBarSeparator(state);
    return finish('BarSeparator');
  }

  if (current === '"') {
    const close = findClosingQuote(state);
    if (close !== undefined) {
      while (state.offset() <= close) state.advance();
      return finish('Quoted');
    }
    state.advance();
    return finish('Symbol');
  }

  const single = SINGLE_CHAR_TOKENS[current];
  if (single) {
    state.advance();
    return finish(single);
  }

  if (isPrintableAscii(current)) {
    state.advance();
    return finish('Symbol');
  }

  // Keep surrogate pairs together so a token never splits a code point
  const code = current.charCodeAt(0);
  state.advance();
  if (code >= 0xd800 && code <= 0xdbff && !state.isAtEnd()) {
    const next = (state.peek() ?? '').charCodeAt(0);
    if (next >= 0xdc00 && next <= 0xdfff) state.advance();
  }
  return finish('Unknown');
}

const SINGLE_CHAR_TOKENS: Record<string, TokenKind> = {
  ':': 'Colon',
  '/': 'Slash',
  '^': 'Accidental',
  '_': 'Accidental',
  '=': 'Accidental',
  '\'': 'OctaveMark',
  ',': 'OctaveMark',
  '[': 'BracketOpen',
  ']': 'BracketClose',
  '(': 'ParenOpen',
  ')': 'ParenClose',
};

/** Bar lines: `|`, `||`, `|]`, `[|`, `|:`, `:|`, `::`, `:|:` and similar runs. */
function readBarSeparator(state: LexerState): void {
  if (state.peek() === '[') {
    state.advance();
    state.advance();
    while (state.peek() === ':') state.advance();
    return;
  }

  while (state.peek() === ':') state.advance();
  let pipes = 0;
  while (state.peek() === '|') {
    state.advance();
    pipes++;
  }
  if (pipes > 0 && state.peek() === ']') state.advance();
  while (state.peek() === ':') state.advance();
}

function findClosingQuote(state: LexerState): number | undefined {
  for (let i = 1; ; i++) {
    const char = state.peek(i);
    if (char === undefined || isLineBreak(char)) return undefined;
    if (char === '"') return state.offset() + i;
  }
}

function isLineBreak(char: string | undefined): boolean {
  return char === '\n' || char === '\r';
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

function isAsciiLetter(char: string): boolean {
  return (char >= 'A' && char <= 'Z') || (char >= 'a' && char <= 'z');
}

function isPitchChar(char: string): boolean {
  return (char >= 'A' && char <= 'G') || (char >= 'a' && char <= 'g');
}

function isPrintableAscii(char: string): boolean {
  const code = char.charCodeAt(0);
  return code >= 33 && code <= 126;
}
