import {
  barreStringCount,
  fretSpan,
  frettedStringCount,
  highestFret,
  interiorMutedStrings,
  lowestFret,
  openStringCount,
  playedStringCount,
  requiresBarre,
  toCompactString,
} from './model.js';
import type { Voicing, VoicingAnalysis, VoicingDifficulty } from './types.js';

export const DIFFICULTY_LEVELS: readonly VoicingDifficulty[] = ['beginner', 'intermediate', 'advanced'];

const BEGINNER_MAX_SCORE = 25;
const INTERMEDIATE_MAX_SCORE = 50;

/**
 * Estimated fretting-hand fingers. Strings sharing the lowest fret take one
 * barre finger, unless a string lying between them is fretted higher; then
 * each needs its own finger, as does every string above that fret.
 */
export const fingersRequired = (voicing: Voicing): number => {
  const frets = voicing.positions.map((position) => (position.kind === 'fretted' ? position.fret : undefined));
  const fretted = frets.filter((fret): fret is number => fret !== undefined);
  if (fretted.length === 0) return 0;

  const low = Math.min(...fretted);
  const lowStrings = frets.flatMap((fret, index) => (fret === low ? [index] : []));
  const first = lowStrings[0] ?? 0;
  const last = lowStrings[lowStrings.length - 1] ?? first;
  const blocked = frets.slice(first, last + 1).some((fret) => fret !== undefined && fret > low);

  const aboveLow = fretted.length - lowStrings.length;
  return aboveLow + (lowStrings.length >= 2 && !blocked ? 1 : lowStrings.length);
};

export const difficultyScore = (voicing: Voicing): number => {
  let score = fretSpan(voicing) * 10;
  score += frettedStringCount(voicing) * 5;

  if (voicing.barre) {
    score += 20;
    if (barreStringCount(voicing.barre) > 4) score += 10;
  }

  const low = lowestFret(voicing);
  if (low !== undefined && low > 5) {
    score += (low - 5) * 3;
  }

  score += interiorMutedStrings(voicing).length * 15;

  if (low === undefined || low === 1) {
    score -= openStringCount(voicing) * 3;
  }

  return Math.max(0, score);
};

export const categorizeDifficulty = (score: number): VoicingDifficulty => {
  if (score <= BEGINNER_MAX_SCORE) return 'beginner';
  if (score <= INTERMEDIATE_MAX_SCORE) return 'intermediate';
  return 'advanced';
};

export const difficultyOf = (voicing: Voicing): VoicingDifficulty => categorizeDifficulty(difficultyScore(voicing));

export const compareDifficulty = (a: VoicingDifficulty, b: VoicingDifficulty): number =>
  DIFFICULTY_LEVELS.indexOf(a) - DIFFICULTY_LEVELS.indexOf(b);

export const analyzeVoicing = (voicing: Voicing): VoicingAnalysis => {
  const score = difficultyScore(voicing);
  const low = lowestFret(voicing);
  const high = highestFret(voicing);
  return {
    compact: toCompactString(voicing),
    difficultyScore: score,
    difficulty: categorizeDifficulty(score),
    fingersRequired: fingersRequired(voicing),
    ...(low !== undefined ? { lowestFret: low } : {}),
    ...(high !== undefined ? { highestFret: high } : {}),
    fretSpan: fretSpan(voicing),
    requiresBarre: requiresBarre(voicing),
    playedStrings: playedStringCount(voicing),
  };
};
