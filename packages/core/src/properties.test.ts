import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { instruments, parseChord } from '@fingerboard/theory';
import {
  dedupeByShape,
  difficultyScore,
  fingersRequired,
  findVoicings,
  frettedShapeKey,
  fretSpan,
  mutedStringCount,
  parseVoicing,
  playedStringCount,
  playsChord,
  searchPresets,
  sortByDifficulty,
  soundingPitchClasses,
  toCompactString,
  voicingFromFrets,
} from './index.js';

const SYMBOLS = ['C', 'Am', 'G', 'D', 'Em', 'F', 'Dm', 'A7', 'Cmaj7', 'Bm'];

// Small fret alphabet so generated lists repeat shapes.
const smallVoicing = fc.array(fc.integer({ min: -1, max: 3 }), { minLength: 4, maxLength: 4 }).map((frets) => voicingFromFrets(frets));

// -2 mutes a string, -1 leaves it open, anything else is a fret above the shift.
const shapeOffsets = fc.array(fc.integer({ min: -2, max: 4 }), { minLength: 1, maxLength: 6 });
const shifted = (offsets: readonly number[], shift: number) =>
  voicingFromFrets(offsets.map((offset) => (offset === -2 ? -1 : offset === -1 ? 0 : shift + offset)));

describe('search invariants', () => {
  it('only returns playable voicings of the requested chord', () => {
    fc.assert(
      fc.property(fc.constantFrom(...SYMBOLS), fc.constantFrom('beginner' as const, 'intermediate' as const, 'advanced' as const), (symbol, level) => {
        const chord = parseChord(symbol);
        const options = searchPresets[level];
        const results = findVoicings(chord, instruments.guitar, options);
        let previousScore = -Infinity;
        for (const voicing of results) {
          expect(playsChord(voicing, chord, instruments.guitar)).toBe(true);
          expect(playedStringCount(voicing)).toBeGreaterThanOrEqual(options.minStringsPlayed);
          expect(mutedStringCount(voicing)).toBeLessThanOrEqual(options.maxMutedStrings);
          expect(fretSpan(voicing)).toBeLessThanOrEqual(options.maxFretSpan);
          expect(fingersRequired(voicing)).toBeLessThanOrEqual(options.maxFingers);
          if (options.rootInBass) {
            expect(soundingPitchClasses(voicing, instruments.guitar)[0]).toBe(chord.root);
          }
          const score = difficultyScore(voicing);
          expect(score).toBeGreaterThanOrEqual(previousScore);
          previousScore = score;
        }
      }),
      { numRuns: 12 },
    );
  });
});

describe('dedupeByShape', () => {
  it('is idempotent and leaves one voicing per shape', () => {
    fc.assert(
      fc.property(fc.array(smallVoicing, { maxLength: 20 }), (voicings) => {
        const once = dedupeByShape(voicings).map(toCompactString);
        expect(dedupeByShape(dedupeByShape(voicings)).map(toCompactString)).toEqual(once);
        expect(new Set(dedupeByShape(voicings).map(frettedShapeKey)).size).toBe(once.length);
      }),
    );
  });
});

describe('sortByDifficulty', () => {
  it('orders by score and keeps input order between equal scores', () => {
    fc.assert(
      fc.property(fc.array(smallVoicing, { maxLength: 20 }), (generated) => {
        const voicings = generated.map((voicing) => ({ ...voicing }));
        const sorted = sortByDifficulty(voicings);
        expect(sorted).toHaveLength(voicings.length);
        for (let index = 1; index < sorted.length; index += 1) {
          const before = sorted[index - 1];
          const after = sorted[index];
          if (!before || !after) continue;
          expect(difficultyScore(after)).toBeGreaterThanOrEqual(difficultyScore(before));
          if (difficultyScore(after) === difficultyScore(before)) {
            expect(voicings.indexOf(after)).toBeGreaterThan(voicings.indexOf(before));
          }
        }
      }),
    );
  });
});

describe('difficultyScore', () => {
  it('adds ten per fret of span', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 15 }), fc.integer({ min: 0, max: 5 }), (low, span) => {
        const narrow = voicingFromFrets([-1, low, low + span]);
        const wide = voicingFromFrets([-1, low, low + span + 1]);
        expect(difficultyScore(wide) - difficultyScore(narrow)).toBe(10);
      }),
    );
  });

  it('never gets easier as a shape moves up the neck', () => {
    fc.assert(
      fc.property(shapeOffsets, fc.integer({ min: 1, max: 15 }), fc.integer({ min: 1, max: 5 }), (offsets, shift, distance) => {
        const lower = difficultyScore(shifted(offsets, shift));
        const higher = difficultyScore(shifted(offsets, shift + distance));
        expect(higher).toBeGreaterThanOrEqual(lower);

        const fretted = offsets.filter((offset) => offset >= 0);
        if (fretted.length > 0 && shift + Math.min(...fretted) > 5) {
          expect(higher - lower).toBe(3 * distance);
        }
      }),
    );
  });
});

describe('compact notation', () => {
  it('reads back what it writes', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: -1, max: 22 }), { minLength: 1, maxLength: 8 }), (frets) => {
        const voicing = voicingFromFrets(frets);
        expect(toCompactString(parseVoicing(toCompactString(voicing)))).toBe(toCompactString(voicing));
      }),
    );
  });
});
