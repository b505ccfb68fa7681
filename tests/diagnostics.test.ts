import { describe, it, expect } from 'vitest';
import { parseAbc } from '../src/parser';
import { serialize } from '../src/serializer';
import {
  buildMessage,
  describeToken,
  formatDiagnostic,
  formatReport,
  formatSummary,
} from '../src/diagnostics';
import type { Token } from '../src/types';

describe('Diagnostics', () => {
  describe('header errors', () => {
    it('should report a premature end in the time signature', () => {
      const result = parseAbc('M:');

      expect(result.tunes).toEqual([]);
      expect(result.diagnostics).toEqual([
        {
          kind: 'PrematureEnd',
          rule: 'Metre',
          context: ['File', 'Tune', 'HeaderBlock', 'HeaderLine', 'Metre'],
          position: { offset: 2, line: 1, column: 3 },
          expected: 'a number',
          message: 'I expected to find a number for the time signature, but the input ended.',
        },
      ]);
    });

    it('should point at the missing slash of a time signature', () => {
      const { diagnostics } = parseAbc('M:3');

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].position).toEqual({ offset: 3, line: 1, column: 4 });
      expect(diagnostics[0].rule).toBe('Metre');
      expect(diagnostics[0].message).toBe('I expected to find a slash for the time signature, but the input ended.');
    });

    it('should report trailing header content as an expected header', () => {
      const result = parseAbc('M:3/4 abc');

      expect(result.diagnostics).toEqual([
        {
          kind: 'ExpectedHeader',
          rule: 'HeaderLine',
          context: ['File', 'Tune', 'HeaderBlock', 'HeaderLine'],
          position: { offset: 6, line: 1, column: 7 },
          expected: 'the end of the header line',
          found: 'a',
          message: "I expected to find the end of the header line here, but found 'a'.",
          tune: 0,
        },
      ]);
      expect(result.tunes[0].headers[0].value).toEqual({ kind: 'metre', metre: { numerator: 3, denominator: 4 } });
    });

    it('should report trailing content on a header line in the body as an unexpected header line', () => {
      const result = parseAbc('X:1\nK:C\nAB|\nM:3/4 abc\n');

      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        kind: 'UnexpectedHeaderLine',
        rule: 'HeaderLine',
        context: ['File', 'Tune', 'Body', 'HeaderLine'],
        position: { offset: 18, line: 4, column: 7 },
        message: "I didn't expect to find music after a header field here, in the header line.",
      });
      expect(result.tunes[0].fieldChanges).toHaveLength(1);
    });

    it('should report an over-long number once', () => {
      const { diagnostics } = parseAbc('M:23456789012/1234567890');

      expect(diagnostics).toEqual([
        {
          kind: 'NumberTooLong',
          rule: 'Metre',
          context: ['File', 'Tune', 'HeaderBlock', 'HeaderLine', 'Metre'],
          position: { offset: 2, line: 1, column: 3 },
          found: '23456789012',
          message: 'This number is longer than I expected for the time signature. Numbers can have at most 9 digits.',
        },
      ]);
    });

    it('should keep the first metre when a later one is malformed', () => {
      const result = parseAbc('X:100\nM:2/4\nM:2/4X');

      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        kind: 'UnexpectedToken',
        rule: 'Metre',
        position: { offset: 17, line: 3, column: 6 },
        expected: 'the end of the time signature',
        found: 'X',
        tune: 0,
      });
      expect(result.tunes[0].referenceNumber).toBe(100);
      expect(result.tunes[0].headers.map(h => h.letter)).toEqual(['X', 'M']);
    });

    it('should reject a zero length denominator', () => {
      const { diagnostics } = parseAbc('X:1\nL:1/0\nK:C\n');

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toMatchObject({
        kind: 'UnexpectedToken',
        rule: 'NoteLength',
        position: { offset: 8, line: 2, column: 5 },
        expected: 'a number greater than zero',
      });
    });

    it('should reject an unknown mode word', () => {
      const { diagnostics } = parseAbc('X:1\nK:Gx\n');

      expect(diagnostics[0]).toMatchObject({
        kind: 'UnexpectedToken',
        rule: 'Key',
        position: { offset: 7, line: 2, column: 4 },
        message: "I expected to find a mode such as m, dor or mix for the key signature, but found 'x'.",
      });
    });
  });

  describe('tune structure errors', () => {
    it('should report a body without a reference number and keep its headers', () => {
      const result = parseAbc('T:No ref\nK:C\nABC|\n');

      expect(result.diagnostics).toEqual([
        {
          kind: 'ExpectedHeader',
          rule: 'Tune',
          context: ['File', 'Tune'],
          position: { offset: 13, line: 3, column: 1 },
          expected: 'a reference number (X:) header',
          found: 'A',
          message: "I expected to find a reference number (X:) header here, but found 'A'.",
          tune: 0,
        },
      ]);
      expect(result.tunes).toHaveLength(1);
      expect(result.tunes[0].headers.map(h => h.letter)).toEqual(['T', 'K']);
      expect(result.tunes[0].body.bars).toEqual([]);
    });

    it('should start a new tune at a second reference number in the header', () => {
      const result = parseAbc('X:1\nX:2\nK:C\n');

      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        kind: 'UnexpectedHeaderLine',
        rule: 'HeaderBlock',
        position: { offset: 4, line: 2, column: 1 },
        message: "I didn't expect to find a second reference number (X:) here, in the tune header.",
      });
      expect(result.tunes.map(t => t.referenceNumber)).toEqual([1, 2]);
    });

    it('should start a new tune at a reference number inside the body', () => {
      const result = parseAbc('X:1\nK:C\nAB|\nX:2\nK:D\ncd|\n');

      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        kind: 'UnexpectedHeaderLine',
        rule: 'Body',
        position: { offset: 12, line: 4, column: 1 },
        expected: 'a new tune (X:) without a blank line before it',
      });
      expect(result.tunes.map(t => t.referenceNumber)).toEqual([1, 2]);
      expect(result.tunes[0].body.bars).toHaveLength(1);
      expect(result.tunes[1].body.bars).toHaveLength(1);
    });

    it('should skip header lines that are not allowed in the body', () => {
      const result = parseAbc('X:1\nK:C\nAB|\nZ:not here\ncd|\n');

      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        kind: 'UnexpectedHeaderLine',
        position: { line: 4, column: 1 },
        expected: 'the Z: field',
      });
      expect(result.tunes[0].body.bars).toHaveLength(2);
      expect(result.tunes[0].fieldChanges).toEqual([]);
    });
  });

  describe('body errors', () => {
    it('should collect several errors in one pass and keep the rest of the bar', () => {
      const result = parseAbc('X:1\nK:C\nA # B | c ? d|\n');

      expect(result.diagnostics.map(d => [d.kind, d.rule, d.position.line, d.position.column, d.found])).toEqual([
        ['UnexpectedToken', 'Bar', 3, 3, '#'],
        ['UnexpectedToken', 'Bar', 3, 11, '?'],
      ]);
      const bars = result.tunes[0].body.bars;
      expect(bars).toHaveLength(2);
      expect(bars.map(b => b.elements.length)).toEqual([2, 2]);
    });

    it('should report a slur left open at a bar line and drop it', () => {
      const result = parseAbc('X:1\nK:C\n(AB|\n');

      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        kind: 'UnexpectedToken',
        rule: 'Slur',
        context: ['File', 'Tune', 'Body', 'MusicLine', 'Bar', 'Slur'],
        position: { line: 3, column: 4 },
        message: "I expected to find a closing ')' for the slur, but found '|'.",
      });
      expect(result.tunes[0].body.bars[0].groups).toEqual([{ kind: 'beam', start: 0, end: 1 }]);
    });

    it('should report a tuplet that runs out of notes', () => {
      const { diagnostics } = parseAbc('X:1\nK:C\n(3AB|\n');

      expect(diagnostics[0]).toMatchObject({
        rule: 'Tuplet',
        expected: '1 more note',
        message: "I expected to find 1 more note for the tuplet, but found '|'.",
      });
    });

    it('should report a broken rhythm with nothing after it', () => {
      const { diagnostics } = parseAbc('X:1\nK:C\nA>|\n');

      expect(diagnostics[0]).toMatchObject({
        rule: 'BrokenRhythm',
        expected: 'a note after the broken rhythm',
        position: { line: 3, column: 3 },
      });
    });

    it('should turn a chord cut off by the end of input into a premature end', () => {
      const { diagnostics } = parseAbc('X:1\nK:C\n[CEG');

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toMatchObject({
        kind: 'PrematureEnd',
        rule: 'Chord',
        position: { offset: 12, line: 3, column: 5 },
        message: "I expected to find a closing ']' for the chord, but the input ended.",
      });
      expect(diagnostics[0].found).toBeUndefined();
    });

    it('should report a closing paren without an opening one', () => {
      const { diagnostics } = parseAbc('X:1\nK:C\nAB)|\n');

      expect(diagnostics[0]).toMatchObject({ rule: 'Slur', expected: "an opening '(' before it" });
    });

    it('should report a tuplet size out of range', () => {
      const { diagnostics } = parseAbc('X:1\nK:C\n(12ABC|\n');

      expect(diagnostics[0]).toMatchObject({ rule: 'Tuplet', expected: 'a tuplet size from 2 to 9', found: '12' });
    });

    it('should report a compound length too long to write and drop the note', () => {
      const { diagnostics, tunes } = parseAbc('X:1\nL:1/8\nK:C\nA/100000/100000 B|\n');

      expect(diagnostics.map(d => [d.kind, d.rule, d.position, d.found])).toEqual([
        ['NumberTooLong', 'Length', { offset: 23, line: 4, column: 10 }, '100000'],
      ]);
      expect(tunes[0].body.bars[0].elements.map(e => e.kind)).toEqual(['note']);
    });

    it('should stop halving at the slash that makes the length too long', () => {
      const { diagnostics, tunes } = parseAbc(`X:1\nK:C\nA${'/'.repeat(1100)} B|\n`);

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toMatchObject({
        kind: 'NumberTooLong',
        rule: 'Length',
        position: { offset: 38, line: 3, column: 31 },
        found: '/',
      });
      const durations = tunes[0].body.bars[0].elements.map(e => (e.kind === 'note' ? e.duration : undefined));
      expect(durations).toEqual([{ numerator: 1, denominator: 8 }]);
    });

    it('should report a broken rhythm that would make a length too long', () => {
      const { diagnostics, tunes } = parseAbc('X:1\nK:C\nA999999999>B|\n');

      expect(diagnostics.map(d => [d.kind, d.rule, d.position.column, d.found])).toEqual([
        ['NumberTooLong', 'BrokenRhythm', 11, '>'],
      ]);
      expect(tunes[0].body.bars[0].elements.map(e => (e.kind === 'note' ? e.duration : undefined))).toEqual([
        { numerator: 999999999, denominator: 8 },
        { numerator: 1, denominator: 8 },
      ]);
    });

    it('should report an ending list that does not go up', () => {
      const { diagnostics, tunes } = parseAbc('X:1\nK:C\nA|2,1 B|\n');

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toMatchObject({
        kind: 'UnexpectedToken',
        expected: 'an ending number above 2',
        found: '1',
        position: { line: 3, column: 5 },
      });
      expect(tunes[0].body.bars[1].ending).toBeUndefined();
    });

    it('should report non-ASCII characters in the music', () => {
      const { diagnostics, tunes } = parseAbc('X:1\nK:C\nA \u00e9 B|\n');

      expect(diagnostics[0]).toMatchObject({ kind: 'UnexpectedToken', found: '\u00e9', position: { column: 3 } });
      expect(tunes[0].body.bars[0].elements).toHaveLength(2);
    });
  });

  describe('round trip of a clean tune', () => {
    it('should keep four eighth notes in one bar', () => {
      const first = parseAbc('X:1\nM:4/4\nL:1/8\nK:C\nA B c d\n');
      const text = serialize(first.tunes[0]);
      const second = parseAbc(text);

      expect(text).toBe('X:1\nM:4/4\nL:1/8\nK:C\nA B c d\n');
      expect(second.diagnostics).toEqual([]);
      expect(second.tunes[0].body.bars).toHaveLength(1);
      expect(second.tunes[0].body.bars[0].elements.map(e => (e.kind === 'note' ? e.duration : undefined))).toEqual([
        { numerator: 1, denominator: 8 },
        { numerator: 1, denominator: 8 },
        { numerator: 1, denominator: 8 },
        { numerator: 1, denominator: 8 },
      ]);
    });
  });

  describe('messages', () => {
    const newline: Token = {
      kind: 'Newline',
      lexeme: '\n',
      span: { start: { offset: 0, line: 1, column: 1 }, end: { offset: 1, line: 2, column: 1 } },
    };

    it('should describe layout tokens in words', () => {
      expect(describeToken(newline)).toBe('the end of the line');
      expect(describeToken({ ...newline, kind: 'Whitespace', lexeme: ' ' })).toBe('a space');
      expect(describeToken({ ...newline, kind: 'Symbol', lexeme: '#' })).toBe("'#'");
    });

    it('should fill the message templates', () => {
      expect(buildMessage('UnexpectedToken', 'Note', { expected: 'a number', found: newline })).toBe(
        'I expected to find a number for the note, but found the end of the line.'
      );
      expect(buildMessage('PrematureEnd', 'Body')).toBe('The input ended in the middle of the tune body.');
      expect(buildMessage('UnknownError', 'Tune', { expected: 'boom' })).toBe(
        'Something went wrong while reading the tune: boom.'
      );
    });

    it('should pluralise the summary', () => {
      expect(formatSummary(1)).toBe('There was 1 error!');
      expect(formatSummary(3)).toBe('There were 3 errors!');
    });
  });

  describe('reports', () => {
    it('should put a caret under the column', () => {
      const source = 'M:3';
      const { diagnostics } = parseAbc(source);

      expect(formatDiagnostic(source, diagnostics[0])).toBe(
        'line 1, column 4:\nM:3\n   ^-- I expected to find a slash for the time signature, but the input ended.'
      );
    });

    it('should keep tabs before the caret', () => {
      const source = 'X:1\nK:C\n\tA # B|\n';
      const { diagnostics } = parseAbc(source);

      expect(formatDiagnostic(source, diagnostics[0])).toBe(
        "line 3, column 4:\n\tA # B|\n\t  ^-- I expected to find a note, rest or bar line for the bar, but found '#'."
      );
    });

    it('should list every diagnostic after the summary', () => {
      const source = 'X:1\nM:3\nL:1/0\nK:G\n';
      const { diagnostics } = parseAbc(source);

      expect(formatReport(source, diagnostics)).toBe(
        'There were 2 errors!\n' +
        '\n' +
        'line 2, column 4:\n' +
        'M:3\n' +
        '   ^-- I expected to find a slash for the time signature, but found the end of the line.\n' +
        '\n' +
        'line 3, column 5:\n' +
        'L:1/0\n' +
        '    ^-- I expected to find a number greater than zero for the default note length, but found \'0\'.\n'
      );
    });

    it('should be empty without diagnostics', () => {
      expect(formatReport('X:1\n', [])).toBe('');
    });
  });
});
