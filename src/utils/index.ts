import type { Pitch, PitchLetter, Rational, Metre, HeaderField } from '../types';

// Pitch constants
export const STEPS: PitchLetter[] = ['C', 'D', 'E', 'F', 'G', 'A', 'B'];
export const STEP_SEMITONES: Record<PitchLetter, number> = {
  'C': 0, 'D': 2, 'E': 4, 'F': 5, 'G': 7, 'A': 9, 'B': 11,
};

const ACCIDENTAL_SEMITONES: Record<NonNullable<Pitch['accidental']>, number> = {
  'double-flat': -2, 'flat': -1, 'natural': 0, 'sharp': 1, 'double-sharp': 2,
};

/** MIDI note number of a pitch, C4 = 60. Only the written accidental is applied. */
export function pitchToMidi(pitch: Pitch): number {
  const alter = pitch.accidental ? ACCIDENTAL_SEMITONES[pitch.accidental] : 0;
  return (pitch.octave + 1) * 12 + STEP_SEMITONES[pitch.letter] + alter;
}

export function isPitchLetter(value: string): value is PitchLetter {
  return STEPS.some(step => step === value);
}

// ============================================================
// Rationals
// ============================================================

export function gcd(a: number, b: number): number {
  a = Math.abs(a);
  b = Math.abs(b);
  while (b) {
    [a, b] = [b, a % b];
  }
  return a;
}

/**
 * Build a rational reduced to lowest terms with a positive denominator.
 * Throws on a zero denominator; callers check their inputs first.
 */
export function rational(numerator: number, denominator = 1): Rational {
  if (denominator === 0) {
    throw new RangeError('Rational with zero denominator');
  }
  const sign = denominator < 0 ? -1 : 1;
  const g = gcd(numerator, denominator) || 1;
  return { numerator: (sign * numerator) / g, denominator: (sign * denominator) / g };
}

export function multiply(a: Rational, b: Rational): Rational {
  return rational(a.numerator * b.numerator, a.denominator * b.denominator);
}

export function divide(a: Rational, b: Rational): Rational {
  return rational(a.numerator * b.denominator, a.denominator * b.numerator);
}

export function add(a: Rational, b: Rational): Rational {
  return rational(a.numerator * b.denominator + b.numerator * a.denominator, a.denominator * b.denominator);
}

export function isPositive(value: Rational): boolean {
  return value.numerator > 0 && value.denominator > 0;
}

export function rationalEquals(a: Rational, b: Rational): boolean {
  const x = rational(a.numerator, a.denominator);
  const y = rational(b.numerator, b.denominator);
  return x.numerator === y.numerator && x.denominator === y.denominator;
}

export function rationalToString(value: Rational): string {
  return `${value.numerator}/${value.denominator}`;
}

// ============================================================
// Unit note length
// ============================================================

/**
 * Unit note length in force at the start of a body: the last `L:` of the
 * header block, else 1/16 for metres below 3/4 and 1/8 otherwise.
 */
export function defaultUnitLength(headers: HeaderField[]): Rational {
  let length: Rational | undefined;
  let metre: Metre | undefined;
  for (const field of headers) {
    if (field.value.kind === 'length') length = field.value.length;
    if (field.value.kind === 'metre') metre = field.value.metre;
  }
  if (length) return length;
  if (metre && metre.numerator / metre.denominator < 0.75) {
    return rational(1, 16);
  }
  return rational(1, 8);
}

/** Default `q` for a `(p` tuplet; 5, 7 and 9 depend on whether the metre is compound. */
export function defaultTupletQ(p: number, metre: Metre | undefined): number {
  switch (p) {
    case 2: return 3;
    case 3: return 2;
    case 4: return 3;
    case 6: return 2;
    case 8: return 3;
    default: {
      const compound = metre !== undefined && metre.numerator % 3 === 0 && metre.numerator > 3;
      return compound ? 3 : 2;
    }
  }
}
