import {
  chordKind,
  chordSymbol,
  parsePitchClass,
  pitchClassName,
  semitonesBetween,
  transposeChord,
  type Chord,
  type ChordKind,
  type Instrument,
  type PitchClass,
} from '@fingerboard/theory';
import { VoicingError } from './errors.js';
import type { CapoSuggestion } from './types.js';

export const DEFAULT_MAX_CAPO_FRET = 12;

const roots = (...names: string[]): ReadonlySet<PitchClass> => new Set(names.map(parsePitchClass));

// Cowboy chords and their seventh-chord cousins.
const EASY_SHAPES: Partial<Record<ChordKind, ReadonlySet<PitchClass>>> = {
  major: roots('C', 'G', 'D', 'E', 'A'),
  minor: roots('A', 'E', 'D'),
  dominant7: roots('G', 'C', 'D', 'E', 'A'),
  minor7: roots('A', 'E', 'D'),
};

const MODERATE_SHAPES: Partial<Record<ChordKind, ReadonlySet<PitchClass>>> = {
  major: roots('F'),
  dominant7: roots('B'),
  major7: roots('F', 'C', 'D', 'A'),
};

const inTable = (table: Partial<Record<ChordKind, ReadonlySet<PitchClass>>>, chord: Chord): boolean =>
  table[chordKind(chord)]?.has(chord.root) ?? false;

/**
 * Rough cost of fingering a chord shape in open position: 1 for open chords,
 * 2 for awkward open chords, 3 for an E- or A-shape barre, 4 for the rest.
 */
export const chordShapeDifficulty = (chord: Chord): number => {
  if (inTable(EASY_SHAPES, chord)) return 1;
  if (inTable(MODERATE_SHAPES, chord)) return 2;
  const kind = chordKind(chord);
  if (kind === 'major' || kind === 'minor') return 3;
  return 4;
};

export const capoShapeSymbols = (suggestion: CapoSuggestion): string[] => suggestion.shapes.map(chordSymbol);

export const describeCapoSuggestion = (suggestion: CapoSuggestion): string =>
  suggestion.capoFret === 0 ? 'No capo needed' : `Capo fret ${suggestion.capoFret}: play ${capoShapeSymbols(suggestion).join(', ')}`;

export interface CapoOptions {
  maxCapoFret?: number;
}

/**
 * Tries capo offsets 0..maxCapoFret against the progression. Offsets move the
 * chord shapes, so the instrument's own capo and fret count do not limit them.
 */
export const suggestCapo = (chords: readonly Chord[], _instrument: Instrument, options: CapoOptions = {}): CapoSuggestion[] => {
  if (chords.length === 0) return [];

  const maxCapoFret = options.maxCapoFret ?? DEFAULT_MAX_CAPO_FRET;
  if (!Number.isInteger(maxCapoFret) || maxCapoFret < 0) {
    throw new VoicingError('INVALID_OPTIONS', `maxCapoFret must be a non-negative integer, got ${maxCapoFret}.`);
  }

  const originalChords = Object.freeze([...chords]);
  const suggestions: CapoSuggestion[] = [];
  for (let capoFret = 0; capoFret <= maxCapoFret; capoFret += 1) {
    const shapes = Object.freeze(chords.map((chord) => transposeChord(chord, -capoFret)));
    const difficultyScore = shapes.reduce((total, shape) => total + chordShapeDifficulty(shape), 0);
    suggestions.push(Object.freeze({ capoFret, shapes, originalChords, difficultyScore }));
  }

  return suggestions.sort((a, b) => a.difficultyScore - b.difficultyScore);
};

export const suggestBestCapo = (chords: readonly Chord[], instrument: Instrument, options: CapoOptions = {}): CapoSuggestion | undefined =>
  suggestCapo(chords, instrument, options)[0];

/** Hard major keys mapped to easier open shapes and the capo fret that reaches them. */
export const COMMON_CAPO_POSITIONS: Readonly<Record<string, Readonly<Record<string, number>>>> = Object.freeze({
  F: { E: 1, D: 3, C: 5 },
  'A#': { A: 1, G: 3 },
  'D#': { D: 1, C: 3 },
  'G#': { G: 1 },
  'C#': { C: 1 },
  'F#': { E: 2 },
  B: { A: 2 },
});

const MINOR_EASY_ROOTS = roots('A', 'E', 'D');
const MAJOR_EASY_ROOTS = roots('C', 'G', 'D', 'E', 'A');

export const capoPositionsForChord = (chord: Chord): number[] => {
  const kind = chordKind(chord);
  if (kind === 'major') {
    const tabulated = COMMON_CAPO_POSITIONS[pitchClassName(chord.root)];
    return tabulated ? Object.values(tabulated).sort((a, b) => a - b) : [0];
  }

  const easyRoots = kind === 'minor' ? MINOR_EASY_ROOTS : MAJOR_EASY_ROOTS;
  return [...easyRoots]
    .map((easyRoot) => semitonesBetween(easyRoot, chord.root))
    .filter((distance) => distance > 0)
    .sort((a, b) => a - b);
};
