import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  analyzeVoicing,
  categorizeDifficulty,
  compareDifficulty,
  createBarre,
  createVoicing,
  difficultyOf,
  difficultyScore,
  fingersRequired,
  parseVoicing,
  voicingFromFrets,
} from './index.js';

const fBarre = createVoicing(parseVoicing('133211').positions, createBarre(1, 0, 5));

describe('fingersRequired', () => {
  it('counts one finger per fretted string in open shapes', () => {
    expect(fingersRequired(parseVoicing('X02210'))).toBe(3);
    expect(fingersRequired(parseVoicing('X32010'))).toBe(3);
    expect(fingersRequired(parseVoicing('000000'))).toBe(0);
  });

  it('collapses strings sharing the lowest fret into one finger', () => {
    expect(fingersRequired(parseVoicing('XX3211'))).toBe(3);
    expect(fingersRequired(parseVoicing('3X0003'))).toBe(1);
    expect(fingersRequired(parseVoicing('1XX111'))).toBe(1);
  });

  it('gives each lowest-fret string a finger when a string between them is fretted higher', () => {
    expect(fingersRequired(fBarre)).toBe(6);
    expect(fingersRequired(parseVoicing('8(10)(10)988'))).toBe(6);
    expect(fingersRequired(parseVoicing('X35553'))).toBe(5);
  });
});

describe('difficultyScore', () => {
  it('scores the common open chords', () => {
    expect(difficultyScore(parseVoicing('X02210'))).toBe(19);
    expect(difficultyScore(parseVoicing('X32010'))).toBe(29);
    expect(difficultyScore(parseVoicing('022100'))).toBe(16);
  });

  it('gives the open-string bonus only when the lowest fret is 1 or absent', () => {
    expect(difficultyScore(parseVoicing('X02220'))).toBe(15);
    expect(difficultyScore(parseVoicing('000000'))).toBe(0);
  });

  it('charges for barres, high positions and interior mutes', () => {
    expect(difficultyScore(fBarre)).toBe(80);
    expect(difficultyScore(parseVoicing('8(10)(10)988'))).toBe(59);
    expect(difficultyScore(parseVoicing('3X0003'))).toBe(25);
  });

  it('never goes negative', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: -1, max: 15 }), { minLength: 1, maxLength: 7 }), (frets) => {
        expect(difficultyScore(voicingFromFrets(frets))).toBeGreaterThanOrEqual(0);
      }),
    );
  });
});

describe('difficulty levels', () => {
  it('buckets scores at 25 and 50', () => {
    expect(categorizeDifficulty(25)).toBe('beginner');
    expect(categorizeDifficulty(26)).toBe('intermediate');
    expect(categorizeDifficulty(50)).toBe('intermediate');
    expect(categorizeDifficulty(51)).toBe('advanced');
  });

  it('orders levels', () => {
    expect(compareDifficulty('beginner', 'advanced')).toBeLessThan(0);
    expect(compareDifficulty('intermediate', 'intermediate')).toBe(0);
    expect(difficultyOf(fBarre)).toBe('advanced');
  });
});

describe('analyzeVoicing', () => {
  it('summarises a voicing', () => {
    expect(analyzeVoicing(parseVoicing('X02210'))).toEqual({
      compact: 'X02210',
      difficultyScore: 19,
      difficulty: 'beginner',
      fingersRequired: 3,
      lowestFret: 1,
      highestFret: 2,
      fretSpan: 1,
      requiresBarre: false,
      playedStrings: 5,
    });
  });

  it('omits fret bounds when nothing is fretted', () => {
    const analysis = analyzeVoicing(parseVoicing('000000'));
    expect(analysis).not.toHaveProperty('lowestFret');
    expect(analysis).not.toHaveProperty('highestFret');
    expect(analysis.difficulty).toBe('beginner');
  });
});
