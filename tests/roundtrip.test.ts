import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { parseAbc } from '../src/parser';
import { serialize, serializeAll } from '../src/serializer';
import { normalizeTune, tunesEqual } from '../src/query';
import { validate } from '../src/validator';

const fixturesPath = join(__dirname, 'fixtures', 'abc');

function readFixture(name: string): string {
  return readFileSync(join(fixturesPath, name), 'utf-8');
}

const CLEAN_FIXTURES = ['reel.abc', 'jig.abc', 'collection.abc'];

describe('Round trip', () => {
  describe.each(CLEAN_FIXTURES)('%s', name => {
    const source = readFixture(name);
    const first = parseAbc(source);

    it('should parse without diagnostics', () => {
      expect(first.diagnostics).toEqual([]);
      expect(first.tunes.length).toBeGreaterThan(0);
    });

    it('should read back every tune unchanged', () => {
      const second = parseAbc(serializeAll(first.tunes));

      expect(second.diagnostics).toEqual([]);
      expect(second.tunes).toHaveLength(first.tunes.length);
      second.tunes.forEach((tune, i) => {
        expect(normalizeTune(tune)).toEqual(normalizeTune(first.tunes[i]));
      });
    });

    it('should be stable after one pass', () => {
      const once = serializeAll(first.tunes);
      const twice = serializeAll(parseAbc(once).tunes);

      expect(twice).toBe(once);
    });

    it('should produce tunes that pass validation', () => {
      for (const tune of first.tunes) {
        expect(validate(tune).errors).toEqual([]);
      }
    });
  });

  it('should write the reel in canonical form', () => {
    const { tunes } = parseAbc(readFixture('reel.abc'));

    expect(serialize(tunes[0])).toBe(
      'X:1\n' +
      'T:The Morning Lark\n' +
      'R:reel\n' +
      'C:Trad.\n' +
      'M:4/4\n' +
      'L:1/8\n' +
      'Q:1/4=112\n' +
      'K:D\n' +
      '|: "D"A2FA dAFA| "G"B2GB dBGB| "D"A2FA dAFA| [1"A"Bcde fdec:| [2"A"Bcde fdd2|]\n'
    );
  });

  it('should keep the jig key change on its own line', () => {
    const { tunes } = parseAbc(readFixture('jig.abc'));
    const lines = serialize(tunes[0]).split('\n');

    expect(lines.slice(6)).toEqual([
      'GAB c2A| B3/2A/G (3ABc d2|',
      'K:Em',
      '[M:9/8] e2f g2a b3| e3-e2 z x y|]',
      '',
    ]);
  });

  it('should keep both tunes of a collection', () => {
    const { tunes } = parseAbc(readFixture('collection.abc'));

    expect(tunes.map(t => t.referenceNumber)).toEqual([3, 4]);
    expect(serialize(tunes[1])).toBe('X:4\nT:Waltz\nM:3/4\nK:Bb\nB,2 D| F2 B| d3|]\n');
  });

  it('should recover the clean parts of a broken file', () => {
    const { tunes, diagnostics } = parseAbc(readFixture('broken.abc'));

    expect(diagnostics).toHaveLength(2);
    expect(serialize(tunes[0])).toBe('X:1\nT:Broken\nK:G\nAB c|\n');
  });

  it('should treat tunes that differ only in layout as equal', () => {
    const a = parseAbc('X:1\nT:A\nK:C\nAB c|\n').tunes[0];
    const b = parseAbc('X:1\nK:C\nT:A\nAB   c|\n').tunes[0];
    const c = parseAbc('X:1\nT:A\nK:C\nABc|\n').tunes[0];

    expect(tunesEqual(a, b)).toBe(true);
    expect(tunesEqual(a, c)).toBe(false);
  });
});
