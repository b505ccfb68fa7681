import type { HeaderField, Metre, Mode } from '../types';

/** Header fields that may appear inside a tune body, as a line or `[F:...]` */
export const BODY_FIELDS: ReadonlySet<string> = new Set([
  'I', 'K', 'L', 'M', 'm', 'N', 'P', 'Q', 'R', 'r', 's', 'T', 'U', 'V', 'W', 'w',
]);

// Only the first three letters of a mode name are significant
const MODE_PREFIXES: Record<string, Mode> = {
  'maj': 'major',
  'min': 'minor',
  'ion': 'ionian',
  'dor': 'dorian',
  'phr': 'phrygian',
  'lyd': 'lydian',
  'mix': 'mixolydian',
  'aeo': 'aeolian',
  'loc': 'locrian',
};

/** Shortest spelling of each mode, as written after the tonic */
export const MODE_ABBREVIATIONS: Record<Mode, string> = {
  major: '',
  minor: 'm',
  ionian: 'ion',
  dorian: 'dor',
  phrygian: 'phr',
  lydian: 'lyd',
  mixolydian: 'mix',
  aeolian: 'aeo',
  locrian: 'loc',
};

export function modeFromWord(word: string): Mode | undefined {
  const lower = word.toLowerCase();
  if (lower === 'm') return 'minor';
  if (lower.length < 3) return undefined;
  return MODE_PREFIXES[lower.slice(0, 3)];
}

export function lastMetre(headers: HeaderField[]): Metre | undefined {
  let metre: Metre | undefined;
  for (const field of headers) {
    if (field.value.kind === 'metre') metre = field.value.metre;
  }
  return metre;
}
