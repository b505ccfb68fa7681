// ============================================================
// Source positions
// ============================================================
export interface Position {
  /** 0-based UTF-16 offset from the start of the source. */
  offset: number;
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
}

// ============================================================
// Tokens
// ============================================================
export type TokenKind =
  | 'HeaderKey'
  | 'Colon'
  | 'PitchLetter'
  | 'Letter'
  | 'Accidental'
  | 'OctaveMark'
  | 'DigitRun'
  | 'Slash'
  | 'BarSeparator'
  | 'BracketOpen'
  | 'BracketClose'
  | 'ParenOpen'
  | 'ParenClose'
  | 'Quoted'
  | 'Symbol'
  | 'Whitespace'
  | 'Newline'
  | 'Comment'
  | 'Unknown'
  | 'EndOfInput';

export interface Token {
  kind: TokenKind;
  lexeme: string;
  span: Span;
}

// ============================================================
// Diagnostics
// ============================================================
export type DiagnosticKind =
  | 'PrematureEnd'
  | 'UnexpectedToken'
  | 'NumberTooLong'
  | 'UnexpectedHeaderLine'
  | 'ExpectedHeader'
  | 'UnknownError';

export type RuleName =
  | 'File'
  | 'Tune'
  | 'HeaderBlock'
  | 'HeaderLine'
  | 'ReferenceNumber'
  | 'Metre'
  | 'NoteLength'
  | 'Key'
  | 'TextField'
  | 'Body'
  | 'MusicLine'
  | 'InlineField'
  | 'Bar'
  | 'Note'
  | 'Length'
  | 'Tuplet'
  | 'Slur'
  | 'BrokenRhythm'
  | 'Chord'
  | 'Decoration'
  | 'GraceNotes';

export interface Diagnostic {
  kind: DiagnosticKind;
  /** Innermost rule active when the fault was detected */
  rule: RuleName;
  /** Rule stack, outermost first */
  context: RuleName[];
  position: Position;
  expected?: string;
  found?: string;
  message: string;
  /** Index into ParseResult.tunes of the tune this diagnostic belongs to */
  tune?: number;
}

// ============================================================
// Music values
// ============================================================
export interface Rational {
  numerator: number;
  denominator: number;
}

export type PitchLetter = 'C' | 'D' | 'E' | 'F' | 'G' | 'A' | 'B';

export type Accidental = 'sharp' | 'flat' | 'natural' | 'double-sharp' | 'double-flat';

export interface Pitch {
  letter: PitchLetter;
  accidental?: Accidental;
  /** Uppercase letters sit in octave 4, lowercase in octave 5 */
  octave: number;
}

export interface Metre {
  numerator: number;
  denominator: number;
  symbol?: 'common' | 'cut';
}

export type Mode =
  | 'major'
  | 'minor'
  | 'ionian'
  | 'dorian'
  | 'phrygian'
  | 'lydian'
  | 'mixolydian'
  | 'aeolian'
  | 'locrian';

export interface KeySignature {
  tonic: PitchLetter;
  accidental?: 'sharp' | 'flat';
  mode: Mode;
  /** Raw trailing text such as `clef=bass`, kept for re-emission */
  modifiers?: string;
}

// ============================================================
// Header fields
// ============================================================
export type HeaderValue =
  | { kind: 'reference'; value: number }
  | { kind: 'metre'; metre: Metre }
  | { kind: 'length'; length: Rational }
  | { kind: 'key'; key: KeySignature }
  | { kind: 'text'; text: string };

export interface HeaderField {
  letter: string;
  value: HeaderValue;
  span: Span;
}

/** A header field met inside the body, placed before element `element` of bar `bar` */
export interface FieldChange {
  field: HeaderField;
  bar: number;
  element: number;
  inline: boolean;
}

// ============================================================
// Body
// ============================================================
export type Element =
  | NoteElement
  | RestElement
  | EmptyElement
  | UnmodeledElement;

export interface NoteElement {
  kind: 'note';
  pitch: Pitch;
  duration: Rational;
  /** Tied to whatever note follows, possibly in the next bar */
  tie?: boolean;
  span: Span;
}

export interface RestElement {
  kind: 'rest';
  duration: Rational;
  span: Span;
}

/** Invisible rest (`x`) */
export interface EmptyElement {
  kind: 'empty';
  duration: Rational;
  span: Span;
}

/** Source text for a feature without structural modeling yet */
export interface UnmodeledElement {
  kind: 'unmodeled';
  text: string;
  span: Span;
}

export type BarGroup =
  | { kind: 'beam'; start: number; end: number }
  | { kind: 'slur'; start: number; end: number }
  | { kind: 'tuplet'; start: number; end: number; p: number; q: number; r: number };

export interface Barline {
  symbol: string;
  span: Span;
}

export interface Bar {
  elements: Element[];
  /** Element indices are always inside this bar */
  groups: BarGroup[];
  /** Closing bar line; absent for a final bar left open */
  barline?: Barline;
  /** Volta number for a bar opening an n-th ending */
  ending?: number;
  /** Full volta list as written (`1,3`, `1-2`) when it names more than one pass */
  endingLabel?: string;
  /** A line break follows this bar's bar line */
  lineEnd?: boolean;
  span: Span;
}

export interface Body {
  bars: Bar[];
}

// ============================================================
// Tune / parse result
// ============================================================
export interface Tune {
  referenceNumber?: number;
  /** Initial header block in arrival order, duplicates kept */
  headers: HeaderField[];
  /** Header fields changed mid-tune, in body order */
  fieldChanges: FieldChange[];
  body: Body;
  span: Span;
}

export interface ParseResult {
  tunes: Tune[];
  diagnostics: Diagnostic[];
}
