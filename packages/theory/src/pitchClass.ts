import { Note } from 'tonal';
import { TheoryError } from './errors.js';

export type PitchClass = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11;

export const PITCH_CLASSES: readonly PitchClass[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11];

const SHARP_NAMES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'] as const;

export const toPitchClass = (value: number): PitchClass => PITCH_CLASSES[((value % 12) + 12) % 12] ?? 0;

export const transposePitchClass = (pitchClass: PitchClass, semitones: number): PitchClass =>
  toPitchClass(pitchClass + semitones);

/** Forward distance in semitones from `from` up to `to`, in 0..11. */
export const semitonesBetween = (from: PitchClass, to: PitchClass): number => (((to - from) % 12) + 12) % 12;

export const pitchClassName = (pitchClass: PitchClass): string => SHARP_NAMES[pitchClass];

export const parsePitchClass = (name: string): PitchClass => {
  const chroma = Note.chroma(name.trim());
  if (typeof chroma !== 'number' || Number.isNaN(chroma)) {
    throw new TheoryError('INVALID_NOTE', `Invalid note name "${name}".`);
  }
  return toPitchClass(chroma);
};
