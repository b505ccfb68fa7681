/**
 * ABC Parser
 * Recursive-descent parser from tokens to tunes.
 *
 * Every rule either succeeds or records exactly one diagnostic and resyncs,
 * so one pass collects every error in the file. Tunes are returned even when
 * they carry errors; only what parsed cleanly goes into them.
 */

import type {
  Accidental,
  Bar,
  DiagnosticKind,
  EmptyElement,
  FieldChange,
  HeaderField,
  HeaderValue,
  KeySignature,
  Metre,
  NoteElement,
  ParseResult,
  Pitch,
  Position,
  Rational,
  RestElement,
  RuleName,
  Span,
  Token,
  Tune,
} from '../types';
import { tokenize } from '../lexer';
import { MAX_NUMBER_DIGITS } from '../diagnostics';
import { defaultTupletQ, defaultUnitLength, divide, isPitchLetter, multiply, rational } from '../utils';
import { addDiagnostic, createParseContext, FAILED, succeed, withRule } from './context';
import type { ParseContext, RuleResult } from './context';
import { BarBuilder } from './bar';
import { BODY_FIELDS, lastMetre, modeFromWord } from './fields';

export { BarBuilder, BarInvariantError, createBar } from './bar';
export { BODY_FIELDS, MODE_ABBREVIATIONS, modeFromWord } from './fields';
export type { RuleResult } from './context';

// ============================================================
// Public API
// ============================================================

/**
 * Parse a token sequence produced by `tokenize`. A missing trailing
 * `EndOfInput` token is supplied.
 */
export function parse(tokens: Token[]): ParseResult {
  const ctx = createParseContext();
  const tunes = new Parser(tokens, ctx).parseFile();
  return { tunes, diagnostics: ctx.diagnostics };
}

/** Tokenize and parse ABC source text. */
export function parseAbc(source: string): ParseResult {
  return parse(tokenize(source));
}

// ============================================================
// Parser state
// ============================================================

type BlockOutcome = 'body' | 'end' | 'newTune';

type OpaqueRule = Extract<RuleName, 'Chord' | 'Decoration' | 'GraceNotes'>;

interface TuneDraft {
  referenceNumber?: number;
  sawReference: boolean;
  headers: HeaderField[];
  fieldChanges: FieldChange[];
  bars: Bar[];
}

interface OpenTuplet {
  p: number;
  q: number;
  r: number;
  remaining: number;
  start?: number;
}

interface BodyState {
  draft: TuneDraft;
  builder: BarBuilder;
  unit: Rational;
  metre?: Metre;
  beam?: { start: number; end: number };
  /** The last element was a note and nothing has broken the beam since */
  beamOpen: boolean;
  /** Start indices of slurs still open in this bar */
  slurStack: number[];
  /** `(` seen, waiting for the element that starts the slur */
  pendingSlurs: number;
  tuplet?: OpenTuplet;
  /** Factor owed to the next timed element by a broken rhythm, and the operator that set it */
  broken?: { factor: Rational; token: Token };
  /** Written length of the last timed element, relative to the unit length */
  lastLength?: Rational;
  /** Only a bar line has been read since the last element */
  sinceBarline: boolean;
}

const OK: RuleResult<true> = succeed(true);

const DECORATION_LETTERS: ReadonlySet<string> = new Set(['H', 'L', 'M', 'O', 'P', 'S', 'T', 'u', 'v']);

const ELEMENT_EXPECTED = 'a note, rest or bar line';

/** Largest numerator or denominator a written length may have */
const MAX_LENGTH_PART = 10 ** MAX_NUMBER_DIGITS - 1;

function fitsLength(value: Rational): boolean {
  return value.numerator <= MAX_LENGTH_PART && value.denominator <= MAX_LENGTH_PART;
}

/** Unmodeled text that stands for a timed element: a chord, with its length */
function isChordText(text: string): boolean {
  return text.startsWith('[');
}

class Parser {
  private readonly tokens: Token[];
  private readonly tunes: Tune[] = [];
  private index = 0;

  constructor(tokens: Token[], private readonly ctx: ParseContext) {
    const last = tokens[tokens.length - 1];
    if (last && last.kind === 'EndOfInput') {
      this.tokens = tokens;
    } else {
      const end: Position = last ? last.span.end : { offset: 0, line: 1, column: 1 };
      this.tokens = [...tokens, { kind: 'EndOfInput', lexeme: '', span: { start: end, end } }];
    }
  }

  // ============================================================
  // Token helpers
  // ============================================================

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'EndOfInput') this.index++;
    return token;
  }

  private isAtEnd(): boolean {
    return this.peek().kind === 'EndOfInput';
  }

  private isSymbol(token: Token, lexeme: string): boolean {
    return token.kind === 'Symbol' && token.lexeme === lexeme;
  }

  private skipWhitespace(): void {
    while (this.peek().kind === 'Whitespace') this.advance();
  }

  /** Skip the rest of the current line, including its line break. */
  private skipLine(): void {
    while (this.peek().kind !== 'Newline' && !this.isAtEnd()) this.advance();
    if (this.peek().kind === 'Newline') this.advance();
  }

  private isBlankLine(): boolean {
    const next = this.peek(this.peek().kind === 'Whitespace' ? 1 : 0);
    if (next.kind === 'Newline') return true;
    return next.kind === 'EndOfInput' && this.peek().kind === 'Whitespace';
  }

  private isCommentLine(): boolean {
    return this.peek(this.peek().kind === 'Whitespace' ? 1 : 0).kind === 'Comment';
  }

  private startsTune(): boolean {
    const token = this.peek();
    return token.kind === 'HeaderKey' && token.lexeme === 'X';
  }

  /** End of the last consumed token that is not layout. */
  private contentEnd(): Position {
    for (let i = this.index - 1; i >= 0; i--) {
      const token = this.tokens[i];
      if (token.kind !== 'Newline' && token.kind !== 'Whitespace') return token.span.end;
    }
    return this.peek().span.start;
  }

  private previousEnd(): Position {
    return this.index > 0 ? this.tokens[this.index - 1].span.end : this.peek().span.start;
  }

  private report(kind: DiagnosticKind, token: Token, expected?: string): void {
    addDiagnostic(this.ctx, kind, token, expected);
  }

  // ============================================================
  // File and tunes
  // ============================================================

  parseFile(): Tune[] {
    return withRule(this.ctx, 'File', () => {
      while (!this.isAtEnd()) {
        if (this.isBlankLine() || this.isCommentLine()) {
          this.skipLine();
          continue;
        }
        const before = this.index;
        this.parseTune();
        if (this.index === before) this.advance();
      }
      return this.tunes;
    });
  }

  private parseTune(): void {
    const index = this.tunes.length;
    const start = this.peek().span.start;
    const firstDiagnostic = this.ctx.diagnostics.length;
    const draft: TuneDraft = { sawReference: false, headers: [], fieldChanges: [], bars: [] };

    this.ctx.tune = index;
    withRule(this.ctx, 'Tune', () => {
      try {
        this.tune(draft);
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.report('UnknownError', this.peek(), detail);
        this.skipTuneRest();
      }
    });
    this.ctx.tune = undefined;

    if (draft.headers.length === 0 && draft.bars.length === 0 && draft.fieldChanges.length === 0) {
      // Nothing to attach the diagnostics to
      for (const diagnostic of this.ctx.diagnostics.slice(firstDiagnostic)) {
        delete diagnostic.tune;
      }
      return;
    }

    const tune: Tune = {
      headers: draft.headers,
      fieldChanges: draft.fieldChanges,
      body: { bars: draft.bars },
      span: { start, end: this.contentEnd() },
    };
    if (draft.referenceNumber !== undefined) tune.referenceNumber = draft.referenceNumber;
    this.tunes.push(tune);
  }

  private tune(draft: TuneDraft): void {
    if (this.headerBlock(draft) !== 'body') return;

    if (!draft.sawReference) {
      this.skipWhitespace();
      this.report('ExpectedHeader', this.peek(), 'a reference number (X:) header');
      this.skipTuneRest();
      return;
    }
    this.body(draft);
  }

  /** Skip to the next blank line, the next `X:` line or the end of input. */
  private skipTuneRest(): void {
    do {
      this.skipLine();
    } while (!this.isAtEnd() && !this.isBlankLine() && !this.startsTune());
    if (this.isBlankLine()) this.skipLine();
  }

  // ============================================================
  // Header block
  // ============================================================

  private headerBlock(draft: TuneDraft): BlockOutcome {
    return withRule(this.ctx, 'HeaderBlock', (): BlockOutcome => {
      for (;;) {
        const token = this.peek();
        if (token.kind === 'EndOfInput') return 'end';
        if (this.isBlankLine()) {
          this.skipLine();
          return 'end';
        }
        if (this.isCommentLine()) {
          this.skipLine();
          continue;
        }
        if (token.kind !== 'HeaderKey') return 'body';

        if (token.lexeme === 'X') {
          if (draft.sawReference) {
            this.report('UnexpectedHeaderLine', token, 'a second reference number (X:)');
            return 'newTune';
          }
          draft.sawReference = true;
        }

        const field = this.headerLine('header');
        if (!field.ok) continue;
        draft.headers.push(field.value);
        const value = field.value.value;
        if (value.kind === 'reference' && draft.referenceNumber === undefined) {
          draft.referenceNumber = value.value;
        }
      }
    });
  }

  /** One `F:value` line, through its line break. */
  private headerLine(region: 'header' | 'body'): RuleResult<HeaderField> {
    return withRule(this.ctx, 'HeaderLine', (): RuleResult<HeaderField> => {
      const key = this.advance();
      this.advance(); // ':'
      const value = this.fieldValue(key.lexeme, false);
      if (!value.ok) {
        this.skipLine();
        return FAILED;
      }
      const field: HeaderField = {
        letter: key.lexeme,
        value: value.value,
        span: { start: key.span.start, end: this.previousEnd() },
      };

      this.skipWhitespace();
      if (this.peek().kind === 'Comment') this.advance();
      const next = this.peek();
      if (next.kind !== 'Newline' && next.kind !== 'EndOfInput') {
        if (region === 'header') {
          this.report('ExpectedHeader', next, 'the end of the header line');
        } else {
          this.report('UnexpectedHeaderLine', next, 'music after a header field');
        }
      }
      this.skipLine();
      return succeed(field);
    });
  }

  // ============================================================
  // Header field values
  // ============================================================

  private fieldValue(letter: string, inline: boolean): RuleResult<HeaderValue> {
    switch (letter) {
      case 'X': return this.referenceNumber(inline);
      case 'M': return this.metre(inline);
      case 'L': return this.noteLength(inline);
      case 'K': return this.key(inline);
      default: return succeed<HeaderValue>({ kind: 'text', text: this.textField(inline) });
    }
  }

  private isValueEnd(token: Token, inline: boolean): boolean {
    return token.kind === 'Whitespace' || this.isTextEnd(token, inline);
  }

  private isTextEnd(token: Token, inline: boolean): boolean {
    return token.kind === 'Comment'
      || token.kind === 'Newline'
      || token.kind === 'EndOfInput'
      || (inline && token.kind === 'BracketClose');
  }

  private expectValueEnd(inline: boolean, expected: string): RuleResult<true> {
    const token = this.peek();
    if (this.isValueEnd(token, inline)) return OK;
    this.report('UnexpectedToken', token, expected);
    return FAILED;
  }

  private integer(expected: string, allowZero = false): RuleResult<number> {
    const token = this.peek();
    if (token.kind !== 'DigitRun') {
      this.report('UnexpectedToken', token, expected);
      return FAILED;
    }
    if (token.lexeme.length > MAX_NUMBER_DIGITS) {
      this.report('NumberTooLong', token);
      return FAILED;
    }
    const value = Number.parseInt(token.lexeme, 10);
    if (value === 0 && !allowZero) {
      this.report('UnexpectedToken', token, 'a number greater than zero');
      return FAILED;
    }
    this.advance();
    return succeed(value);
  }

  private referenceNumber(inline: boolean): RuleResult<HeaderValue> {
    return withRule(this.ctx, 'ReferenceNumber', (): RuleResult<HeaderValue> => {
      this.skipWhitespace();
      const value = this.integer('a number', true);
      if (!value.ok) return FAILED;
      if (!this.expectValueEnd(inline, 'the end of the reference number').ok) return FAILED;
      return succeed<HeaderValue>({ kind: 'reference', value: value.value });
    });
  }

  private metre(inline: boolean): RuleResult<HeaderValue> {
    return withRule(this.ctx, 'Metre', (): RuleResult<HeaderValue> => {
      this.skipWhitespace();
      const first = this.peek();
      let metre: Metre;

      if (first.kind === 'PitchLetter' && first.lexeme === 'C') {
        this.advance();
        const next = this.peek();
        if (inline && next.kind === 'BarSeparator' && next.lexeme === '|]') {
          // `[M:C|]` lexes its closing bracket into the bar line
          this.advance();
          return succeed<HeaderValue>({ kind: 'metre', metre: { numerator: 2, denominator: 2, symbol: 'cut' } });
        }
        if (next.kind === 'BarSeparator' && next.lexeme === '|') {
          this.advance();
          metre = { numerator: 2, denominator: 2, symbol: 'cut' };
        } else {
          metre = { numerator: 4, denominator: 4, symbol: 'common' };
        }
      } else {
        const numerator = this.integer('a number');
        if (!numerator.ok) return FAILED;
        if (this.peek().kind !== 'Slash') {
          this.report('UnexpectedToken', this.peek(), 'a slash');
          return FAILED;
        }
        this.advance();
        const denominator = this.integer('a number');
        if (!denominator.ok) return FAILED;
        metre = { numerator: numerator.value, denominator: denominator.value };
      }

      if (!this.expectValueEnd(inline, 'the end of the time signature').ok) return FAILED;
      return succeed<HeaderValue>({ kind: 'metre', metre });
    });
  }

  private noteLength(inline: boolean): RuleResult<HeaderValue> {
    return withRule(this.ctx, 'NoteLength', (): RuleResult<HeaderValue> => {
      this.skipWhitespace();
      const numerator = this.integer('a number');
      if (!numerator.ok) return FAILED;
      let denominator = 1;
      if (this.peek().kind === 'Slash') {
        this.advance();
        const value = this.integer('a number');
        if (!value.ok) return FAILED;
        denominator = value.value;
      }
      if (!this.expectValueEnd(inline, 'the end of the note length').ok) return FAILED;
      return succeed<HeaderValue>({ kind: 'length', length: rational(numerator.value, denominator) });
    });
  }

  private key(inline: boolean): RuleResult<HeaderValue> {
    return withRule(this.ctx, 'Key', (): RuleResult<HeaderValue> => {
      this.skipWhitespace();
      const tonicToken = this.peek();
      const tonic = tonicToken.lexeme.toUpperCase();
      if (tonicToken.kind !== 'PitchLetter' || !isPitchLetter(tonic)) {
        this.report('UnexpectedToken', tonicToken, 'a key note from A to G');
        return FAILED;
      }
      this.advance();
      const key: KeySignature = { tonic, mode: 'major' };

      const accidental = this.peek();
      if (this.isSymbol(accidental, '#')) {
        key.accidental = 'sharp';
        this.advance();
      } else if (accidental.kind === 'PitchLetter' && accidental.lexeme === 'b') {
        key.accidental = 'flat';
        this.advance();
      }

      const beforeMode = this.index;
      const spaced = this.peek().kind === 'Whitespace';
      this.skipWhitespace();
      const wordToken = this.peek();
      const word = this.readWord();
      const mode = word ? modeFromWord(word) : undefined;
      if (mode) {
        key.mode = mode;
      } else if (word && !spaced) {
        this.report('UnexpectedToken', wordToken, 'a mode such as m, dor or mix');
        return FAILED;
      } else {
        this.index = beforeMode;
      }

      if (this.peek().kind === 'Whitespace') {
        const beforeModifiers = this.index;
        this.skipWhitespace();
        if (this.isTextEnd(this.peek(), inline)) {
          this.index = beforeModifiers;
        } else {
          key.modifiers = this.readText(inline);
        }
      }

      if (!this.expectValueEnd(inline, 'the end of the key signature').ok) return FAILED;
      return succeed<HeaderValue>({ kind: 'key', key });
    });
  }

  private textField(inline: boolean): string {
    return withRule(this.ctx, 'TextField', () => {
      this.skipWhitespace();
      return this.readText(inline);
    });
  }

  private readText(inline: boolean): string {
    let text = '';
    while (!this.isTextEnd(this.peek(), inline)) {
      text += this.advance().lexeme;
    }
    return text.trim();
  }

  private readWord(): string {
    let word = '';
    while (this.peek().kind === 'PitchLetter' || this.peek().kind === 'Letter') {
      word += this.advance().lexeme;
    }
    return word;
  }

  // ============================================================
  // Body
  // ============================================================

  private body(draft: TuneDraft): void {
    withRule(this.ctx, 'Body', () => {
      const state: BodyState = {
        draft,
        builder: new BarBuilder(this.peek().span.start),
        unit: defaultUnitLength(draft.headers),
        metre: lastMetre(draft.headers),
        beamOpen: false,
        slurStack: [],
        pendingSlurs: 0,
        sinceBarline: false,
      };

      for (;;) {
        const token = this.peek();
        if (token.kind === 'EndOfInput') {
          this.finishBody(state, token);
          return;
        }
        if (this.isBlankLine()) {
          this.finishBody(state, this.peek(token.kind === 'Whitespace' ? 1 : 0));
          this.skipLine();
          return;
        }
        if (this.isCommentLine()) {
          this.skipLine();
          continue;
        }
        if (token.kind === 'HeaderKey') {
          if (token.lexeme === 'X') {
            this.finishBody(state, token);
            this.report('UnexpectedHeaderLine', token, 'a new tune (X:) without a blank line before it');
            return;
          }
          if (!BODY_FIELDS.has(token.lexeme)) {
            this.report('UnexpectedHeaderLine', token, `the ${token.lexeme}: field`);
            this.skipLine();
            continue;
          }
          this.breakBeam(state);
          const field = this.headerLine('body');
          if (field.ok) this.applyFieldChange(state, field.value, false);
          continue;
        }
        this.musicLine(state);
      }
    });
  }

  /** Close whatever is still open where the tune ends at `token`. */
  private finishBody(state: BodyState, token: Token): void {
    this.checkOpenConstructs(state, token);
    this.breakBeam(state);
    if (!state.builder.isEmpty()) {
      state.draft.bars.push(state.builder.build(this.contentEnd()));
    }
  }

  private applyFieldChange(state: BodyState, field: HeaderField, inline: boolean): FieldChange {
    const change: FieldChange = {
      field,
      bar: state.draft.bars.length,
      element: state.builder.size,
      inline,
    };
    state.draft.fieldChanges.push(change);
    if (field.value.kind === 'length') state.unit = field.value.length;
    if (field.value.kind === 'metre') state.metre = field.value.metre;
    return change;
  }

  private musicLine(state: BodyState): void {
    withRule(this.ctx, 'MusicLine', () => {
      for (;;) {
        const token = this.peek();
        if (token.kind === 'EndOfInput') return;
        if (token.kind === 'Newline') {
          this.advance();
          this.breakBeam(state);
          const bars = state.draft.bars;
          if (state.sinceBarline && bars.length > 0) bars[bars.length - 1].lineEnd = true;
          return;
        }

        const before = this.index;
        const result = withRule(this.ctx, 'Bar', () => this.barItem(state, token));
        if (!result.ok) this.recoverInBar(before);
      }
    });
  }

  /** After a failed item: skip to the next space, bar line or line break. */
  private recoverInBar(before: number): void {
    for (;;) {
      const kind = this.peek().kind;
      if (kind === 'Whitespace' || kind === 'BarSeparator' || kind === 'Newline' || kind === 'EndOfInput') break;
      this.advance();
    }
    if (this.index === before) this.advance();
  }

  private barItem(state: BodyState, token: Token): RuleResult<true> {
    switch (token.kind) {
      case 'Whitespace':
        this.advance();
        this.breakBeam(state);
        return OK;
      case 'Comment':
        this.advance();
        return OK;
      case 'BarSeparator':
        return this.barSeparator(state);
      case 'BracketOpen': {
        const next = this.peek(1);
        if (next.kind === 'HeaderKey') return this.inlineField(state);
        if (next.kind === 'DigitRun') return this.ending(state);
        return this.opaque(state, 'Chord', ']');
      }
      case 'ParenOpen':
        return this.peek(1).kind === 'DigitRun' ? this.tupletStart(state) : this.slurOpen(state);
      case 'ParenClose':
        return this.slurClose(state);
      case 'Accidental':
      case 'PitchLetter':
        return this.note(state);
      case 'Letter':
        return this.letterItem(state, token);
      case 'Quoted':
        this.advance();
        this.addUnmodeled(state, token.lexeme, token.span);
        return OK;
      case 'Symbol':
        return this.symbolItem(state, token);
      default:
        this.report('UnexpectedToken', token, ELEMENT_EXPECTED);
        return FAILED;
    }
  }

  private letterItem(state: BodyState, token: Token): RuleResult<true> {
    switch (token.lexeme) {
      case 'z': return this.restLike(state, 'rest');
      case 'x': return this.restLike(state, 'empty');
      case 'Z': {
        // Multi-bar rest
        this.advance();
        let text = token.lexeme;
        if (this.peek().kind === 'DigitRun') text += this.advance().lexeme;
        this.addUnmodeled(state, text, { start: token.span.start, end: this.previousEnd() });
        return OK;
      }
      default:
        if (token.lexeme === 'y' || DECORATION_LETTERS.has(token.lexeme)) {
          this.advance();
          this.addUnmodeled(state, token.lexeme, token.span);
          return OK;
        }
        this.report('UnexpectedToken', token, ELEMENT_EXPECTED);
        return FAILED;
    }
  }

  private symbolItem(state: BodyState, token: Token): RuleResult<true> {
    switch (token.lexeme) {
      case '~':
      case '.':
      case '&':
        this.advance();
        this.addUnmodeled(state, token.lexeme, token.span);
        return OK;
      case '!':
      case '+':
        return this.opaque(state, 'Decoration', token.lexeme);
      case '{':
        return this.opaque(state, 'GraceNotes', '}');
      case '>':
      case '<':
        return this.brokenRhythm(state);
      case '\\':
        // Line continuation
        this.advance();
        return OK;
      case '-':
        this.advance();
        this.report('UnexpectedToken', token, 'a note before the tie');
        return OK;
      default:
        this.report('UnexpectedToken', token, ELEMENT_EXPECTED);
        return FAILED;
    }
  }

  // ============================================================
  // Bars
  // ============================================================

  private barSeparator(state: BodyState): RuleResult<true> {
    const token = this.advance();
    this.closeBar(state, token);
    if (this.peek().kind === 'DigitRun') return this.endingNumbers(state);
    return OK;
  }

  private closeBar(state: BodyState, token: Token): void {
    this.checkOpenConstructs(state, token);
    this.breakBeam(state);
    state.draft.bars.push(state.builder.build(token.span.end, { symbol: token.lexeme, span: token.span }));
    state.builder = new BarBuilder(token.span.end);
    state.sinceBarline = true;
  }

  /** `[n` at the start of a bar */
  private ending(state: BodyState): RuleResult<true> {
    const open = this.advance();
    if (state.builder.size > 0) {
      const ending = this.integer('an ending number');
      if (!ending.ok) return FAILED;
      this.report('UnexpectedToken', open, 'a bar line before the ending');
      return OK;
    }
    return this.endingNumbers(state);
  }

  /** `1`, `1,3` or `1-3`: the passes an ending is played on */
  private endingNumbers(state: BodyState): RuleResult<true> {
    const first = this.integer('an ending number');
    if (!first.ok) return FAILED;
    let label = String(first.value);
    let last = first.value;

    for (;;) {
      const separator = this.peek();
      const isList = separator.kind === 'OctaveMark' && separator.lexeme === ',';
      if (!(isList || this.isSymbol(separator, '-')) || this.peek(1).kind !== 'DigitRun') break;
      this.advance();
      const numberToken = this.peek();
      const next = this.integer('an ending number');
      if (!next.ok) return FAILED;
      if (next.value <= last) {
        this.report('UnexpectedToken', numberToken, `an ending number above ${last}`);
        return FAILED;
      }
      label += separator.lexeme + String(next.value);
      last = next.value;
    }

    state.builder.ending = first.value;
    if (label !== String(first.value)) state.builder.endingLabel = label;
    state.sinceBarline = false;
    return OK;
  }

  /** Report structures still open at a bar line or the end of a tune. */
  private checkOpenConstructs(state: BodyState, token: Token): void {
    if (state.broken) {
      withRule(this.ctx, 'BrokenRhythm', () => this.report('UnexpectedToken', token, 'a note after the broken rhythm'));
      state.broken = undefined;
    }
    const tuplet = state.tuplet;
    if (tuplet) {
      const expected = `${tuplet.remaining} more ${tuplet.remaining === 1 ? 'note' : 'notes'}`;
      withRule(this.ctx, 'Tuplet', () => this.report('UnexpectedToken', token, expected));
      state.tuplet = undefined;
    }
    if (state.slurStack.length > 0 || state.pendingSlurs > 0) {
      withRule(this.ctx, 'Slur', () => this.report('UnexpectedToken', token, "a closing ')'"));
      state.slurStack = [];
      state.pendingSlurs = 0;
    }
  }

  private inlineField(state: BodyState): RuleResult<true> {
    return withRule(this.ctx, 'InlineField', (): RuleResult<true> => {
      this.breakBeam(state);
      state.sinceBarline = false;
      const open = this.advance();
      const key = this.advance();
      this.advance(); // ':'

      if (!BODY_FIELDS.has(key.lexeme)) {
        this.report('UnexpectedHeaderLine', key, `the ${key.lexeme}: field`);
        this.skipInlineField();
        return OK;
      }
      const value = this.fieldValue(key.lexeme, true);
      if (!value.ok) {
        this.skipInlineField();
        return OK;
      }
      const last = this.tokens[this.index - 1];
      if (last.kind === 'BarSeparator' && last.lexeme === '|]') {
        this.applyFieldChange(state, { letter: key.lexeme, value: value.value, span: { start: open.span.start, end: last.span.end } }, true);
        return OK;
      }
      this.skipWhitespace();
      const close = this.peek();
      if (close.kind !== 'BracketClose') {
        this.report('UnexpectedToken', close, "a closing ']'");
        this.skipInlineField();
        return OK;
      }
      this.advance();
      const field: HeaderField = {
        letter: key.lexeme,
        value: value.value,
        span: { start: open.span.start, end: close.span.end },
      };
      this.applyFieldChange(state, field, true);
      return OK;
    });
  }

  private skipInlineField(): void {
    for (;;) {
      const token = this.peek();
      if (token.kind === 'Newline' || token.kind === 'EndOfInput') return;
      this.advance();
      if (token.kind === 'BracketClose') return;
    }
  }

  // ============================================================
  // Elements
  // ============================================================

  private note(state: BodyState): RuleResult<true> {
    return withRule(this.ctx, 'Note', (): RuleResult<true> => {
      const start = this.peek().span.start;
      const accidental = this.accidental();

      const letterToken = this.peek();
      const letter = letterToken.lexeme.toUpperCase();
      if (letterToken.kind !== 'PitchLetter' || !isPitchLetter(letter)) {
        this.report('UnexpectedToken', letterToken, 'a note letter after the accidental');
        return FAILED;
      }
      this.advance();

      let octave = letterToken.lexeme === letter ? 4 : 5;
      while (this.peek().kind === 'OctaveMark') {
        octave += this.advance().lexeme === '\'' ? 1 : -1;
      }

      const length = this.length();
      if (!length.ok) return FAILED;

      const pitch: Pitch = { letter, octave };
      if (accidental) pitch.accidental = accidental;
      const note: NoteElement = {
        kind: 'note',
        pitch,
        duration: multiply(state.unit, length.value),
        span: { start, end: this.previousEnd() },
      };
      if (this.isSymbol(this.peek(), '-')) {
        this.advance();
        note.tie = true;
      }
      this.addTimed(state, note, length.value);
      return OK;
    });
  }

  private accidental(): Accidental | undefined {
    const first = this.peek();
    if (first.kind !== 'Accidental') return undefined;
    this.advance();
    const second = this.peek();
    if (first.lexeme !== '=' && second.kind === 'Accidental' && second.lexeme === first.lexeme) {
      this.advance();
      return first.lexeme === '^' ? 'double-sharp' : 'double-flat';
    }
    if (first.lexeme === '^') return 'sharp';
    return first.lexeme === '_' ? 'flat' : 'natural';
  }

  private restLike(state: BodyState, kind: 'rest' | 'empty'): RuleResult<true> {
    return withRule(this.ctx, 'Note', (): RuleResult<true> => {
      const token = this.advance();
      const length = this.length();
      if (!length.ok) return FAILED;
      const element: RestElement | EmptyElement = {
        kind,
        duration: multiply(state.unit, length.value),
        span: { start: token.span.start, end: this.previousEnd() },
      };
      this.addTimed(state, element, length.value);
      return OK;
    });
  }

  /** Length multiplier: `n`, `/`, `n/m`, `//` and so on. */
  private length(): RuleResult<Rational> {
    return withRule(this.ctx, 'Length', (): RuleResult<Rational> => {
      let length = rational(1);
      if (this.peek().kind === 'DigitRun') {
        const value = this.integer('a number');
        if (!value.ok) return FAILED;
        length = rational(value.value);
      }
      while (this.peek().kind === 'Slash') {
        const slash = this.advance();
        let divisor = 2;
        let token = slash;
        if (this.peek().kind === 'DigitRun') {
          token = this.peek();
          const value = this.integer('a number');
          if (!value.ok) return FAILED;
          divisor = value.value;
        }
        length = divide(length, rational(divisor));
        if (!fitsLength(length)) {
          this.report('NumberTooLong', token);
          return FAILED;
        }
      }
      return succeed(length);
    });
  }

  /**
   * Chords, decorations and grace notes: kept as source text up to the
   * closing character on the same line.
   */
  private opaque(state: BodyState, rule: OpaqueRule, closer: string): RuleResult<true> {
    return withRule(this.ctx, rule, (): RuleResult<true> => {
      const open = this.advance();
      let text = open.lexeme;
      for (;;) {
        const token = this.peek();
        if (token.kind === 'Newline' || token.kind === 'EndOfInput') {
          this.report('UnexpectedToken', token, `a closing '${closer}'`);
          return FAILED;
        }
        this.advance();
        text += token.lexeme;
        if (token.lexeme === closer) break;
      }
      if (rule === 'Chord') {
        while (this.peek().kind === 'DigitRun' || this.peek().kind === 'Slash') {
          text += this.advance().lexeme;
        }
        if (this.isSymbol(this.peek(), '-')) text += this.advance().lexeme;
      }
      this.addUnmodeled(state, text, { start: open.span.start, end: this.previousEnd() }, rule === 'Chord');
      return OK;
    });
  }

  /** @param length - written length relative to the unit, before any broken rhythm */
  private addTimed(state: BodyState, element: NoteElement | RestElement | EmptyElement, length: Rational): void {
    if (element.kind !== 'note' || !state.beamOpen) this.breakBeam(state);
    const index = state.builder.add(element);
    let written = length;
    const broken = state.broken;
    if (broken) {
      const scaled = multiply(length, broken.factor);
      if (fitsLength(scaled)) {
        state.builder.scale(index, broken.factor);
        written = scaled;
      } else {
        withRule(this.ctx, 'BrokenRhythm', () => this.report('NumberTooLong', broken.token));
      }
      state.broken = undefined;
    }
    state.lastLength = written;
    this.attachSlurs(state, index);
    this.countTuplet(state, index, true);
    if (element.kind === 'note') {
      state.beam = { start: state.beam ? state.beam.start : index, end: index };
      state.beamOpen = true;
    }
    state.sinceBarline = false;
  }

  /**
   * Add source text kept as is. Only a chord takes a place in a tuplet or
   * ends a pending broken rhythm; decorations, annotations and grace notes
   * leave both waiting for the next note.
   */
  private addUnmodeled(state: BodyState, text: string, span: Span, timed = false): void {
    this.breakBeam(state);
    if (timed) state.broken = undefined;
    const index = state.builder.add({ kind: 'unmodeled', text, span });
    this.attachSlurs(state, index);
    if (timed) this.countTuplet(state, index, false);
    state.sinceBarline = false;
  }

  /** The next token opens a chord rather than an inline field or an ending */
  private startsChord(): boolean {
    if (this.peek().kind !== 'BracketOpen') return false;
    const next = this.peek(1).kind;
    return next !== 'HeaderKey' && next !== 'DigitRun';
  }

  private breakBeam(state: BodyState): void {
    const beam = state.beam;
    if (beam && beam.end > beam.start) {
      state.builder.addGroup({ kind: 'beam', start: beam.start, end: beam.end });
    }
    state.beam = undefined;
    state.beamOpen = false;
  }

  // ============================================================
  // Slurs, tuplets, broken rhythm
  // ============================================================

  private slurOpen(state: BodyState): RuleResult<true> {
    this.advance();
    state.pendingSlurs++;
    state.sinceBarline = false;
    return OK;
  }

  private slurClose(state: BodyState): RuleResult<true> {
    return withRule(this.ctx, 'Slur', (): RuleResult<true> => {
      const token = this.advance();
      if (state.pendingSlurs > 0) {
        state.pendingSlurs--;
        this.report('UnexpectedToken', token, 'a note inside the slur');
        return OK;
      }
      const start = state.slurStack.pop();
      if (start === undefined) {
        this.report('UnexpectedToken', token, "an opening '(' before it");
        return OK;
      }
      state.builder.addGroup({ kind: 'slur', start, end: state.builder.size - 1 });
      return OK;
    });
  }

  private attachSlurs(state: BodyState, index: number): void {
    for (; state.pendingSlurs > 0; state.pendingSlurs--) {
      state.slurStack.push(index);
    }
  }

  /** `(p`, `(p:q` or `(p:q:r` */
  private tupletStart(state: BodyState): RuleResult<true> {
    return withRule(this.ctx, 'Tuplet', (): RuleResult<true> => {
      const open = this.advance();
      if (state.tuplet) {
        this.report('UnexpectedToken', open, 'the end of the previous tuplet');
        return FAILED;
      }
      const sizeToken = this.peek();
      const p = this.integer('a tuplet size');
      if (!p.ok) return FAILED;
      if (p.value < 2 || p.value > 9) {
        this.report('UnexpectedToken', sizeToken, 'a tuplet size from 2 to 9');
        return FAILED;
      }

      let q = defaultTupletQ(p.value, state.metre);
      let r = p.value;
      if (this.peek().kind === 'Colon') {
        this.advance();
        if (this.peek().kind === 'DigitRun') {
          const value = this.integer('a number');
          if (!value.ok) return FAILED;
          q = value.value;
        }
        if (this.peek().kind === 'Colon') {
          this.advance();
          if (this.peek().kind === 'DigitRun') {
            const value = this.integer('a number');
            if (!value.ok) return FAILED;
            r = value.value;
          }
        }
      }

      state.tuplet = { p: p.value, q, r, remaining: r };
      state.sinceBarline = false;
      return OK;
    });
  }

  private countTuplet(state: BodyState, index: number, timed: boolean): void {
    const tuplet = state.tuplet;
    if (!tuplet) return;
    if (tuplet.start === undefined) tuplet.start = index;
    if (timed) state.builder.scale(index, rational(tuplet.q, tuplet.p));
    tuplet.remaining--;
    if (tuplet.remaining === 0) {
      state.builder.addGroup({ kind: 'tuplet', start: tuplet.start, end: index, p: tuplet.p, q: tuplet.q, r: tuplet.r });
      state.tuplet = undefined;
    }
  }

  /** `>` lengthens the previous element and shortens the next; `<` the reverse. */
  private brokenRhythm(state: BodyState): RuleResult<true> {
    return withRule(this.ctx, 'BrokenRhythm', (): RuleResult<true> => {
      const first = this.peek();
      let count = 0;
      while (this.isSymbol(this.peek(), first.lexeme)) {
        this.advance();
        count++;
      }

      const operator = first.lexeme.repeat(count);
      const span: Span = { start: first.span.start, end: this.previousEnd() };

      const previousIndex = state.builder.size - 1;
      const previous = state.builder.at(previousIndex);
      const chordBefore = previous !== undefined && previous.kind === 'unmodeled' && isChordText(previous.text);
      if (!state.broken && (chordBefore || (previous !== undefined && this.startsChord()))) {
        // Chord lengths are not modeled, so neither side is rescaled
        this.addUnmodeled(state, operator, span);
        return OK;
      }
      if (!previous || previous.kind === 'unmodeled' || state.broken || !state.lastLength) {
        this.report('UnexpectedToken', first, 'a note before the broken rhythm');
        return OK;
      }

      const scale = 2 ** count;
      if (scale > MAX_LENGTH_PART) {
        this.report('NumberTooLong', first);
        return OK;
      }
      const longer = rational(2 * scale - 1, scale);
      const shorter = rational(1, scale);
      const previousFactor = first.lexeme === '>' ? longer : shorter;
      if (!fitsLength(multiply(state.lastLength, previousFactor))) {
        this.report('NumberTooLong', first);
        return OK;
      }
      state.builder.scale(previousIndex, previousFactor);
      state.lastLength = multiply(state.lastLength, previousFactor);
      state.broken = { factor: first.lexeme === '>' ? shorter : longer, token: first };
      return OK;
    });
  }
}
