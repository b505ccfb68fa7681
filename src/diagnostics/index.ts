import type { Diagnostic, DiagnosticKind, RuleName, Token } from '../types';

/** What each rule is working on, as it reads in a message */
export const RULE_DESCRIPTIONS: Record<RuleName, string> = {
  File: 'the file',
  Tune: 'the tune',
  HeaderBlock: 'the tune header',
  HeaderLine: 'the header line',
  ReferenceNumber: 'the reference number',
  Metre: 'the time signature',
  NoteLength: 'the default note length',
  Key: 'the key signature',
  TextField: 'the header text',
  Body: 'the tune body',
  MusicLine: 'the line of music',
  InlineField: 'the inline field',
  Bar: 'the bar',
  Note: 'the note',
  Length: 'the note length',
  Tuplet: 'the tuplet',
  Slur: 'the slur',
  BrokenRhythm: 'the broken rhythm',
  Chord: 'the chord',
  Decoration: 'the decoration',
  GraceNotes: 'the grace notes',
};

/** Longest digit run accepted as a number */
export const MAX_NUMBER_DIGITS = 9;

/** Describe a token the way a message names what was found */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'EndOfInput': return 'the end of the input';
    case 'Newline': return 'the end of the line';
    case 'Whitespace': return 'a space';
    case 'Comment': return 'a comment';
    default: return `'${token.lexeme}'`;
  }
}

export interface MessageDetails {
  expected?: string;
  found?: Token;
}

/** Build the human text for a diagnostic of the given kind raised in `rule` */
export function buildMessage(kind: DiagnosticKind, rule: RuleName, details: MessageDetails = {}): string {
  const subject = RULE_DESCRIPTIONS[rule];
  const found = details.found ? describeToken(details.found) : 'something else';

  switch (kind) {
    case 'PrematureEnd':
      return details.expected
        ? `I expected to find ${details.expected} for ${subject}, but the input ended.`
        : `The input ended in the middle of ${subject}.`;
    case 'UnexpectedToken':
      return `I expected to find ${details.expected ?? 'something else'} for ${subject}, but found ${found}.`;
    case 'NumberTooLong':
      return `This number is longer than I expected for ${subject}. Numbers can have at most ${MAX_NUMBER_DIGITS} digits.`;
    case 'ExpectedHeader':
      return `I expected to find ${details.expected ?? 'a header field'} here, but found ${found}.`;
    case 'UnexpectedHeaderLine':
      return `I didn't expect to find ${details.expected ?? 'a header line'} here, in ${subject}.`;
    case 'UnknownError':
      return `Something went wrong while reading ${subject}${details.expected ? `: ${details.expected}` : ''}.`;
  }
}

// ============================================================
// Reports
// ============================================================

/**
 * Summary line printed before a list of diagnostics.
 */
export function formatSummary(count: number): string {
  if (count === 1) return 'There was 1 error!';
  return `There were ${count} errors!`;
}

/**
 * Render one diagnostic as the offending line, a caret under its column and
 * the message. Tabs before the column are kept so the caret lines up.
 */
export function formatDiagnostic(source: string, diagnostic: Diagnostic): string {
  const { line, column } = diagnostic.position;
  const lineText = source.split(/\r\n|\r|\n/)[line - 1] ?? '';
  const prefix = Array.from(lineText.slice(0, column - 1), ch => (ch === '\t' ? '\t' : ' ')).join('');

  return [
    `line ${line}, column ${column}:`,
    lineText,
    `${prefix}^-- ${diagnostic.message}`,
  ].join('\n');
}

/** Full report for one file: summary followed by every diagnostic. Empty when there are none. */
export function formatReport(source: string, diagnostics: Diagnostic[]): string {
  if (diagnostics.length === 0) return '';
  const blocks = diagnostics.map(d => formatDiagnostic(source, d));
  return `${formatSummary(diagnostics.length)}\n\n${blocks.join('\n\n')}\n`;
}
