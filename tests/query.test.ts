import { describe, it, expect } from 'vitest';
import { parseAbc } from '../src/parser';
import {
  extractFeatures,
  getBarCount,
  getDuration,
  getFieldValues,
  getNotes,
  getTitle,
  histogramDistance,
  intervalHistogram,
  intervals,
  normalizeTune,
  pitchSequence,
  HISTOGRAM_WIDTH,
} from '../src/query';
import type { Tune } from '../src/types';

function parseOne(source: string): Tune {
  const result = parseAbc(source);
  expect(result.diagnostics).toEqual([]);
  return result.tunes[0];
}

describe('Query', () => {
  describe('counting', () => {
    const tune = parseAbc('X:1\nT:Counting\nL:1/8\nK:C\nA2 B c|z2 "G"d2|\n').tunes[0];

    it('should count bars and notes', () => {
      expect(getBarCount(tune)).toBe(2);
      expect(getNotes(tune).map(n => n.pitch.letter)).toEqual(['A', 'B', 'C', 'D']);
    });

    it('should add up the sounding length of notes and rests', () => {
      expect(getDuration(tune)).toEqual({ numerator: 1, denominator: 1 });
    });

    it('should find field values and the title', () => {
      expect(getFieldValues(tune, 'K')).toEqual([{ kind: 'key', key: { tonic: 'C', mode: 'major' } }]);
      expect(getTitle(tune)).toBe('Counting');
      expect(getTitle(parseOne('X:1\nK:C\n'))).toBeUndefined();
    });

    it('should list mid-tune values after the header block', () => {
      const changing = parseOne('X:1\nM:4/4\nK:C\nA|\nM:3/4\nB|\n');

      expect(getFieldValues(changing, 'M')).toEqual([
        { kind: 'metre', metre: { numerator: 4, denominator: 4 } },
        { kind: 'metre', metre: { numerator: 3, denominator: 4 } },
      ]);
    });
  });

  describe('normalizeTune', () => {
    it('should drop spans and order headers', () => {
      const tune = parseOne('X:2\nK:D\nT:Plain\nA|\n');

      expect(normalizeTune(tune)).toEqual({
        referenceNumber: 2,
        headers: [
          { letter: 'X', value: { kind: 'reference', value: 2 } },
          { letter: 'T', value: { kind: 'text', text: 'Plain' } },
          { letter: 'K', value: { kind: 'key', key: { tonic: 'D', mode: 'major' } } },
        ],
        fieldChanges: [],
        bars: [
          {
            elements: [{ kind: 'note', pitch: { letter: 'A', octave: 4 }, duration: { numerator: 1, denominator: 8 } }],
            groups: [],
            barline: '|',
            lineEnd: true,
          },
        ],
      });
    });
  });

  describe('extractFeatures', () => {
    it('should list key, metre and rhythm features in that order', () => {
      const tune = parseOne('X:3\nT:Reel\nR:reel\nM:4/4\nK:Ador\nAB|\n');

      expect(extractFeatures(tune)).toEqual([
        ['key', 'A'],
        ['mode', 'dorian'],
        ['key-signature', 'A-dorian'],
        ['metre', '4/4'],
        ['metre-beats', '4'],
        ['rhythm', 'reel'],
      ]);
    });

    it('should include mid-tune key changes', () => {
      const tune = parseOne('X:1\nK:G\nAB|\nK:F#m\ncd|\n');

      expect(extractFeatures(tune)).toEqual([
        ['key', 'G'],
        ['mode', 'major'],
        ['key-signature', 'G-major'],
        ['key', 'F#'],
        ['mode', 'minor'],
        ['key-signature', 'F#-minor'],
      ]);
    });

    it('should return nothing for a tune without key, metre or rhythm', () => {
      expect(extractFeatures(parseOne('X:1\nT:Bare\n'))).toEqual([]);
    });
  });

  describe('pitch statistics', () => {
    it('should turn notes into MIDI numbers', () => {
      const tune = parseOne('X:1\nK:C\nC E G c|^F _B, c\'\n');

      expect(pitchSequence(tune)).toEqual([60, 64, 67, 72, 66, 58, 84]);
    });

    it('should take differences between neighbours', () => {
      expect(intervals([60, 64, 67, 72])).toEqual([4, 3, 5]);
      expect(intervals([60])).toEqual([]);
    });

    it('should build a normalised histogram', () => {
      const histogram = intervalHistogram([4, 3, 5]);

      expect(histogram).toHaveLength(HISTOGRAM_WIDTH);
      expect(histogram[15]).toBeCloseTo(1 / 3);
      expect(histogram[16]).toBeCloseTo(1 / 3);
      expect(histogram[17]).toBeCloseTo(1 / 3);
      expect(histogram.reduce((a, b) => a + b, 0)).toBeCloseTo(1);
    });

    it('should clamp large intervals into the end buckets', () => {
      const histogram = intervalHistogram([30, -30]);

      expect(histogram[0]).toBe(0.5);
      expect(histogram[HISTOGRAM_WIDTH - 1]).toBe(0.5);
    });

    it('should leave an empty histogram at zero', () => {
      expect(intervalHistogram([])).toEqual(new Array(HISTOGRAM_WIDTH).fill(0));
    });

    it('should measure the distance between histograms', () => {
      const h = intervalHistogram([2, 2, -2]);

      expect(histogramDistance(h, h)).toBe(0);
      expect(histogramDistance([1, 0], [0, 1])).toBeCloseTo(Math.SQRT2);
      expect(histogramDistance([3], [0, 4])).toBe(5);
    });
  });
});
