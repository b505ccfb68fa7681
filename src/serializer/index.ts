/**
 * ABC Serializer
 * Converts a parsed Tune back into ABC notation text.
 *
 * Output is canonical rather than a copy of the source: header order is
 * fixed, note lengths are written relative to the unit length in force and
 * layout is regenerated. Parsing the output yields the same tune again.
 */

import type {
  Bar,
  BarGroup,
  Element,
  FieldChange,
  HeaderField,
  HeaderValue,
  KeySignature,
  Metre,
  Pitch,
  Rational,
  Tune,
} from '../types';
import { defaultTupletQ, defaultUnitLength, divide, rational } from '../utils';
import { lastMetre, MODE_ABBREVIATIONS, modeFromWord } from '../parser/fields';

// ============================================================
// Header values
// ============================================================

const HEADER_RANK: Record<string, number> = { X: 0, T: 1, K: 3 };

function headerRank(field: HeaderField): number {
  return HEADER_RANK[field.letter] ?? 2;
}

/** `X` first, then `T`, then the rest in arrival order, `K` last. */
export function orderHeaders(headers: HeaderField[]): HeaderField[] {
  return [...headers].sort((a, b) => headerRank(a) - headerRank(b));
}

function serializeKey(key: KeySignature): string {
  let result = key.tonic;
  if (key.accidental === 'sharp') result += '#';
  else if (key.accidental === 'flat') result += 'b';

  let mode = MODE_ABBREVIATIONS[key.mode];
  // A bare major key would let a leading modifier word read back as the mode
  const firstModifier = key.modifiers?.split(/\s+/)[0];
  if (mode === '' && firstModifier && modeFromWord(firstModifier.replace(/[^A-Za-z].*$/, ''))) {
    mode = 'maj';
  }
  result += mode;

  if (key.modifiers) result += ` ${key.modifiers}`;
  return result;
}

function serializeMetre(metre: Metre): string {
  if (metre.symbol === 'common') return 'C';
  if (metre.symbol === 'cut') return 'C|';
  return `${metre.numerator}/${metre.denominator}`;
}

export function serializeHeaderValue(value: HeaderValue): string {
  switch (value.kind) {
    case 'reference': return String(value.value);
    case 'metre': return serializeMetre(value.metre);
    case 'length': return `${value.length.numerator}/${value.length.denominator}`;
    case 'key': return serializeKey(value.key);
    case 'text': return value.text;
  }
}

function serializeField(field: HeaderField): string {
  return `${field.letter}:${serializeHeaderValue(field.value)}`;
}

// ============================================================
// Elements
// ============================================================

function formatAbcDuration(value: Rational): string {
  const { numerator: num, denominator: den } = value;
  if (num === 1 && den === 1) return '';
  if (den === 1) return String(num);
  if (num === 1) {
    if (den === 2) return '/';
    return `/${den}`;
  }
  return `${num}/${den}`;
}

const ACCIDENTAL_PREFIX: Record<NonNullable<Pitch['accidental']>, string> = {
  'sharp': '^',
  'double-sharp': '^^',
  'flat': '_',
  'double-flat': '__',
  'natural': '=',
};

function serializePitch(pitch: Pitch): string {
  let result = pitch.accidental ? ACCIDENTAL_PREFIX[pitch.accidental] : '';
  const octave = pitch.octave;

  if (octave >= 5) {
    result += pitch.letter.toLowerCase();
    for (let o = 6; o <= octave; o++) {
      result += '\'';
    }
  } else {
    result += pitch.letter;
    for (let o = 3; o >= octave; o--) {
      result += ',';
    }
  }

  return result;
}

/** Element text with its length written relative to `unit`. */
function serializeElement(element: Element, unit: Rational): string {
  if (element.kind === 'unmodeled') return element.text;
  const length = formatAbcDuration(divide(element.duration, unit));
  switch (element.kind) {
    case 'note': return serializePitch(element.pitch) + length + (element.tie ? '-' : '');
    case 'rest': return `z${length}`;
    case 'empty': return `x${length}`;
  }
}

// ============================================================
// Body layout
// ============================================================

/** Accumulates output lines; a pending space is dropped at a line start. */
class LineWriter {
  private readonly lines: string[] = [];
  private current = '';

  get length(): number {
    return this.current.length;
  }

  write(text: string, spaced = false): void {
    if (spaced && this.current !== '' && !this.current.endsWith(' ')) {
      this.current += ' ';
    }
    this.current += text;
  }

  line(text: string): void {
    this.breakLine();
    this.lines.push(text);
  }

  breakLine(): void {
    if (this.current.trim() !== '') this.lines.push(this.current.trimEnd());
    this.current = '';
  }

  finish(): string[] {
    this.breakLine();
    return this.lines;
  }
}

interface LayoutState {
  unit: Rational;
  metre?: Metre;
}

function inSameBeam(groups: BarGroup[], left: number, right: number): boolean {
  return groups.some(g => g.kind === 'beam' && g.start <= left && g.end >= right);
}

function writeChanges(out: LineWriter, changes: FieldChange[], layout: LayoutState): boolean {
  for (const change of changes) {
    const text = serializeField(change.field);
    if (change.inline) out.write(`[${text}]`, true);
    else out.line(text);

    const value = change.field.value;
    if (value.kind === 'length') layout.unit = value.length;
    if (value.kind === 'metre') layout.metre = value.metre;
  }
  return changes.length > 0;
}

function tupletMarker(group: Extract<BarGroup, { kind: 'tuplet' }>, metre: Metre | undefined): string {
  if (group.r !== group.p) return `(${group.p}:${group.q}:${group.r}`;
  if (group.q !== defaultTupletQ(group.p, metre)) return `(${group.p}:${group.q}`;
  return `(${group.p}`;
}

function writeBar(
  out: LineWriter,
  bar: Bar,
  changesAt: (element: number) => FieldChange[],
  layout: LayoutState
): void {
  let attached = false;
  if (bar.ending !== undefined) {
    out.write(`[${bar.endingLabel ?? bar.ending}`, true);
    attached = true;
  }

  for (let i = 0; i <= bar.elements.length; i++) {
    const changed = writeChanges(out, changesAt(i), layout);
    if (i === bar.elements.length) break;
    const element = bar.elements[i];
    const previous = bar.elements[i - 1];

    const spaced = !changed && previous !== undefined
      ? previous.kind !== 'unmodeled' && !inSameBeam(bar.groups, i - 1, i)
      : !attached || changed;
    attached = false;

    const tuplet = bar.groups.find(
      (g): g is Extract<BarGroup, { kind: 'tuplet' }> => g.kind === 'tuplet' && g.start === i
    );
    const slurOpens = bar.groups.filter(g => g.kind === 'slur' && g.start === i).length;
    const slurCloses = bar.groups.filter(g => g.kind === 'slur' && g.end === i).length;

    let prefix = '('.repeat(slurOpens);
    if (tuplet) prefix += tupletMarker(tuplet, layout.metre);
    const inside = bar.groups.find(g => g.kind === 'tuplet' && g.start <= i && g.end >= i);
    const unit = inside && inside.kind === 'tuplet'
      ? divide(layout.unit, rational(inside.p, inside.q))
      : layout.unit;

    out.write(prefix + serializeElement(element, unit) + ')'.repeat(slurCloses), spaced);
  }

  if (bar.barline) {
    // A lone letter before `:` at a line start would read as a header key
    const spaced = bar.barline.symbol.startsWith(':') && out.length === 1;
    out.write(bar.barline.symbol, spaced);
    if (bar.lineEnd) out.breakLine();
    else out.write(' ');
  }
}

// ============================================================
// Public API
// ============================================================

/** Serialize one tune. The result ends with a newline. */
export function serialize(tune: Tune): string {
  const lines: string[] = [];
  const headers = orderHeaders(tune.headers);
  if (tune.referenceNumber !== undefined && !headers.some(h => h.letter === 'X')) {
    lines.push(`X:${tune.referenceNumber}`);
  }
  for (const field of headers) {
    lines.push(serializeField(field));
  }

  const layout: LayoutState = { unit: defaultUnitLength(tune.headers), metre: lastMetre(tune.headers) };
  const out = new LineWriter();
  const bars = tune.body.bars;
  for (let b = 0; b <= bars.length; b++) {
    const changesAt = (element: number): FieldChange[] =>
      tune.fieldChanges.filter(c => c.bar === b && c.element === element);
    const bar = bars[b];
    if (bar) {
      writeBar(out, bar, changesAt, layout);
    } else {
      writeChanges(out, changesAt(0), layout);
    }
  }
  lines.push(...out.finish());

  return lines.join('\n') + '\n';
}

/** Serialize several tunes separated by blank lines. */
export function serializeAll(tunes: Tune[]): string {
  return tunes.map(serialize).join('\n');
}
