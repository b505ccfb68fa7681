import type {
  Bar,
  BarGroup,
  Element,
  FieldChange,
  HeaderField,
  HeaderValue,
  KeySignature,
  Metre,
  NoteElement,
  Pitch,
  Rational,
  Tune,
} from '../types';
import { add, pitchToMidi, rational } from '../utils';
import { orderHeaders } from '../serializer';

// ============================================================
// Normalized form
// ============================================================

export interface NormalizedHeader {
  letter: string;
  value: HeaderValue;
}

export type NormalizedElement =
  | { kind: 'note'; pitch: Pitch; duration: Rational; tie?: boolean }
  | { kind: 'rest'; duration: Rational }
  | { kind: 'empty'; duration: Rational }
  | { kind: 'unmodeled'; text: string };

export interface NormalizedBar {
  elements: NormalizedElement[];
  groups: BarGroup[];
  barline?: string;
  ending?: number;
  endingLabel?: string;
  lineEnd?: boolean;
}

export interface NormalizedChange {
  field: NormalizedHeader;
  bar: number;
  element: number;
  inline: boolean;
}

export interface NormalizedTune {
  referenceNumber?: number;
  headers: NormalizedHeader[];
  fieldChanges: NormalizedChange[];
  bars: NormalizedBar[];
}

function normalizeHeader(field: HeaderField): NormalizedHeader {
  return { letter: field.letter, value: field.value };
}

function normalizeRational(value: Rational): Rational {
  return rational(value.numerator, value.denominator);
}

function normalizeElement(element: Element): NormalizedElement {
  switch (element.kind) {
    case 'note': {
      const note: Extract<NormalizedElement, { kind: 'note' }> = {
        kind: 'note',
        pitch: element.pitch,
        duration: normalizeRational(element.duration),
      };
      if (element.tie) note.tie = true;
      return note;
    }
    case 'rest':
    case 'empty':
      return { kind: element.kind, duration: normalizeRational(element.duration) };
    case 'unmodeled':
      return { kind: 'unmodeled', text: element.text };
  }
}

function normalizeBar(bar: Bar): NormalizedBar {
  const result: NormalizedBar = {
    elements: bar.elements.map(normalizeElement),
    groups: bar.groups,
  };
  if (bar.barline) result.barline = bar.barline.symbol;
  if (bar.ending !== undefined) result.ending = bar.ending;
  if (bar.endingLabel !== undefined) result.endingLabel = bar.endingLabel;
  if (bar.lineEnd) result.lineEnd = true;
  return result;
}

function normalizeChange(change: FieldChange): NormalizedChange {
  return {
    field: normalizeHeader(change.field),
    bar: change.bar,
    element: change.element,
    inline: change.inline,
  };
}

/**
 * Drop source spans and put headers in serialization order, so two tunes
 * that serialize alike compare equal.
 */
export function normalizeTune(tune: Tune): NormalizedTune {
  const result: NormalizedTune = {
    headers: orderHeaders(tune.headers).map(normalizeHeader),
    fieldChanges: tune.fieldChanges.map(normalizeChange),
    bars: tune.body.bars.map(normalizeBar),
  };
  if (tune.referenceNumber !== undefined) result.referenceNumber = tune.referenceNumber;
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }
  if (isRecord(a) && isRecord(b)) {
    const keys = Object.keys(a).filter(k => a[k] !== undefined);
    const otherKeys = Object.keys(b).filter(k => b[k] !== undefined);
    return keys.length === otherKeys.length && keys.every(k => deepEqual(a[k], b[k]));
  }
  return false;
}

/** Structural equality ignoring spans and header order. */
export function tunesEqual(a: Tune, b: Tune): boolean {
  return deepEqual(normalizeTune(a), normalizeTune(b));
}

// ============================================================
// Counting
// ============================================================

export function getBarCount(tune: Tune): number {
  return tune.body.bars.length;
}

/**
 * Get every note of a tune in body order
 */
export function getNotes(tune: Tune): NoteElement[] {
  const notes: NoteElement[] = [];
  for (const bar of tune.body.bars) {
    for (const element of bar.elements) {
      if (element.kind === 'note') notes.push(element);
    }
  }
  return notes;
}

/**
 * Total sounding length of the body, in whole notes
 */
export function getDuration(tune: Tune): Rational {
  let total = rational(0);
  for (const bar of tune.body.bars) {
    for (const element of bar.elements) {
      if (element.kind !== 'unmodeled') total = add(total, element.duration);
    }
  }
  return total;
}

/**
 * Get all values of one header letter: the header block first, then
 * mid-tune changes in body order
 */
export function getFieldValues(tune: Tune, letter: string): HeaderValue[] {
  return [
    ...tune.headers.filter(h => h.letter === letter).map(h => h.value),
    ...tune.fieldChanges.filter(c => c.field.letter === letter).map(c => c.field.value),
  ];
}

/** First `T:` text, if any */
export function getTitle(tune: Tune): string | undefined {
  for (const value of getFieldValues(tune, 'T')) {
    if (value.kind === 'text') return value.text;
  }
  return undefined;
}

// ============================================================
// Features
// ============================================================

export type Feature = [name: string, value: string];

function keyFeatures(key: KeySignature): Feature[] {
  const pitchClass = key.tonic + (key.accidental === 'sharp' ? '#' : key.accidental === 'flat' ? 'b' : '');
  return [
    ['key', pitchClass],
    ['mode', key.mode],
    ['key-signature', `${pitchClass}-${key.mode}`],
  ];
}

function metreFeatures(metre: Metre): Feature[] {
  return [
    ['metre', `${metre.numerator}/${metre.denominator}`],
    ['metre-beats', String(metre.numerator)],
  ];
}

/**
 * Name/value features of a tune: key, mode, metre and rhythm, from the
 * header block and every mid-tune change, in that order.
 */
export function extractFeatures(tune: Tune): Feature[] {
  const fields = [...tune.headers, ...tune.fieldChanges.map(c => c.field)];
  const keys: Feature[] = [];
  const metres: Feature[] = [];
  const rhythms: Feature[] = [];

  for (const field of fields) {
    const value = field.value;
    if (value.kind === 'key') keys.push(...keyFeatures(value.key));
    else if (value.kind === 'metre') metres.push(...metreFeatures(value.metre));
    else if (field.letter === 'R' && value.kind === 'text') rhythms.push(['rhythm', value.text]);
  }

  return [...keys, ...metres, ...rhythms];
}

// ============================================================
// Pitch statistics
// ============================================================

/** Intervals beyond this many semitones either side share the end buckets */
export const HISTOGRAM_SIZE = 12;

/** Buckets in an interval histogram */
export const HISTOGRAM_WIDTH = HISTOGRAM_SIZE + HISTOGRAM_SIZE + 2;

/**
 * MIDI pitches of every note in body order. Key signatures are not applied.
 */
export function pitchSequence(tune: Tune): number[] {
  return getNotes(tune).map(note => pitchToMidi(note.pitch));
}

/** Differences between consecutive pitches */
export function intervals(pitches: number[]): number[] {
  const result: number[] = [];
  for (let i = 1; i < pitches.length; i++) {
    result.push(pitches[i] - pitches[i - 1]);
  }
  return result;
}

/**
 * Relative frequency of each interval, bucket `i` holding `i - 12`
 * semitones. Out-of-range intervals count towards the nearest end bucket.
 */
export function intervalHistogram(values: number[]): number[] {
  const histogram = new Array<number>(HISTOGRAM_WIDTH).fill(0);

  for (const interval of values) {
    const i = Math.min(Math.max(interval + HISTOGRAM_SIZE, 0), HISTOGRAM_WIDTH - 1);
    histogram[i] += 1;
  }

  if (values.length > 0) {
    for (let i = 0; i < HISTOGRAM_WIDTH; i++) {
      histogram[i] /= values.length;
    }
  }

  return histogram;
}

/** Euclidean distance between two histograms */
export function histogramDistance(a: number[], b: number[]): number {
  let sum = 0;
  const width = Math.max(a.length, b.length);
  for (let i = 0; i < width; i++) {
    const d = (b[i] ?? 0) - (a[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}
