import { Chord as TonalChord, ChordType, Interval, Note } from 'tonal';
import { TheoryError } from './errors.js';
import { parsePitchClass, pitchClassName, transposePitchClass, type PitchClass } from './pitchClass.js';

export interface Chord {
  readonly root: PitchClass;
  /** Semitone offsets from the root, root first (`intervals[0] === 0`). */
  readonly intervals: readonly number[];
  readonly bass?: PitchClass;
  /** Quality suffix as written, e.g. `m7` in `Am7`; empty for a major triad. */
  readonly suffix: string;
}

export type ChordKind =
  | 'major'
  | 'minor'
  | 'dominant7'
  | 'major7'
  | 'minor7'
  | 'diminished'
  | 'augmented'
  | 'sus2'
  | 'sus4'
  | 'halfDiminished7'
  | 'diminished7'
  | 'other';

const KIND_BY_INTERVALS: Record<string, ChordKind> = {
  '0,4,7': 'major',
  '0,3,7': 'minor',
  '0,4,7,10': 'dominant7',
  '0,4,7,11': 'major7',
  '0,3,7,10': 'minor7',
  '0,3,6': 'diminished',
  '0,4,8': 'augmented',
  '0,2,7': 'sus2',
  '0,5,7': 'sus4',
  '0,3,6,10': 'halfDiminished7',
  '0,3,6,9': 'diminished7',
};

const isNoteName = (value: string): boolean => {
  const chroma = Note.chroma(value);
  return typeof chroma === 'number' && !Number.isNaN(chroma);
};

const resolveChordBody = (body: string): { root: PitchClass; intervals: number[]; suffix: string } | undefined => {
  const [tonic, suffix] = TonalChord.tokenize(body);
  if (!tonic || !isNoteName(tonic)) return undefined;
  const type = ChordType.get(suffix === '' ? 'M' : suffix);
  if (type.empty) return undefined;
  const intervals: number[] = [];
  for (const interval of type.intervals) {
    const semitones = Interval.semitones(interval);
    if (typeof semitones !== 'number' || Number.isNaN(semitones)) return undefined;
    intervals.push(semitones);
  }
  return { root: parsePitchClass(tonic), intervals, suffix };
};

export const createChord = (root: PitchClass, intervals: readonly number[], options: { bass?: PitchClass; suffix?: string } = {}): Chord => {
  if (intervals[0] !== 0) {
    throw new TheoryError('INVALID_CHORD', 'Chord intervals must start with the root (0).');
  }
  return Object.freeze({
    root,
    intervals: Object.freeze([...intervals]),
    suffix: options.suffix ?? '',
    ...(options.bass !== undefined ? { bass: options.bass } : {}),
  });
};

/**
 * Parses a chord symbol such as `Am7`, `F#m7b5`, `Bb` or the slash chord `C/G`.
 * A trailing `/X` is read as a bass note only when `X` is a note name, so
 * suffixes like `6/9` survive.
 */
export const parseChord = (symbol: string): Chord => {
  const trimmed = symbol.trim();
  const slash = trimmed.lastIndexOf('/');
  if (slash > 0) {
    const bassName = trimmed.slice(slash + 1);
    const body = resolveChordBody(trimmed.slice(0, slash));
    if (body && isNoteName(bassName)) {
      return createChord(body.root, body.intervals, { suffix: body.suffix, bass: parsePitchClass(bassName) });
    }
  }

  const body = resolveChordBody(trimmed);
  if (!body) {
    throw new TheoryError('INVALID_CHORD', `Unrecognised chord symbol "${symbol}".`);
  }
  return createChord(body.root, body.intervals, { suffix: body.suffix });
};

export const chordPitchClasses = (chord: Chord): PitchClass[] => {
  const seen = new Set<PitchClass>();
  for (const interval of chord.intervals) {
    seen.add(transposePitchClass(chord.root, interval));
  }
  return [...seen];
};

export const chordSymbol = (chord: Chord): string => {
  const base = `${pitchClassName(chord.root)}${chord.suffix}`;
  return chord.bass === undefined ? base : `${base}/${pitchClassName(chord.bass)}`;
};

export const transposeChord = (chord: Chord, semitones: number): Chord =>
  createChord(transposePitchClass(chord.root, semitones), chord.intervals, {
    suffix: chord.suffix,
    ...(chord.bass !== undefined ? { bass: transposePitchClass(chord.bass, semitones) } : {}),
  });

export const chordKind = (chord: Chord): ChordKind => {
  const reduced = [...new Set(chord.intervals.map((interval) => ((interval % 12) + 12) % 12))].sort((a, b) => a - b);
  return KIND_BY_INTERVALS[reduced.join(',')] ?? 'other';
};
