import { Note } from 'tonal';
import { TheoryError } from './errors.js';
import { parsePitchClass, pitchClassName, transposePitchClass, type PitchClass } from './pitchClass.js';

export const DEFAULT_FRET_COUNT = 22;

export interface InstrumentString {
  readonly openPitch: PitchClass;
  readonly octave: number;
  readonly fretCount: number;
}

/** Strings are ordered low to high pitch; `capo` shifts every string up uniformly. */
export interface Instrument {
  readonly name: string;
  readonly strings: readonly InstrumentString[];
  readonly capo: number;
}

export const createInstrumentString = (openPitch: PitchClass, octave: number, fretCount = DEFAULT_FRET_COUNT): InstrumentString => {
  if (!Number.isInteger(fretCount) || fretCount < 1) {
    throw new TheoryError('INVALID_INSTRUMENT', `Fret count must be a positive integer, got ${fretCount}.`);
  }
  return Object.freeze({ openPitch, octave, fretCount });
};

export const parseInstrumentString = (note: string, fretCount = DEFAULT_FRET_COUNT): InstrumentString => {
  const match = /^([A-Ga-g](?:#|b)?)(-?\d+)$/.exec(note.trim());
  const octave = Note.octave(note.trim());
  if (!match?.[1] || typeof octave !== 'number') {
    throw new TheoryError('INVALID_TUNING', `Invalid string note "${note}". Expected a note with octave such as "E2" or "F#3".`);
  }
  return createInstrumentString(parsePitchClass(match[1]), octave, fretCount);
};

const shortestString = (strings: readonly InstrumentString[]): number =>
  strings.reduce((min, string) => Math.min(min, string.fretCount), Number.POSITIVE_INFINITY);

export const createInstrument = (name: string, strings: readonly InstrumentString[], capo = 0): Instrument => {
  if (strings.length === 0) {
    throw new TheoryError('INVALID_INSTRUMENT', `Instrument "${name}" must have at least one string.`);
  }
  if (!Number.isInteger(capo) || capo < 0 || capo > shortestString(strings)) {
    throw new TheoryError('INVALID_INSTRUMENT', `Capo ${capo} is outside 0..${shortestString(strings)} for "${name}".`);
  }
  return Object.freeze({ name, strings: Object.freeze([...strings]), capo });
};

export const stringCount = (instrument: Instrument): number => instrument.strings.length;

/** Highest fret reachable above the capo on the given string. */
export const playableFretCount = (instrument: Instrument, stringIndex: number): number => {
  const string = instrument.strings[stringIndex];
  if (!string) {
    throw new RangeError(`String ${stringIndex} is out of range [0, ${instrument.strings.length - 1}].`);
  }
  return Math.max(0, string.fretCount - instrument.capo);
};

/** Pitch class heard when `fret` (counted from the capo) is pressed on `stringIndex`. */
export const soundingPitchClass = (instrument: Instrument, stringIndex: number, fret: number): PitchClass => {
  const string = instrument.strings[stringIndex];
  if (!string) {
    throw new RangeError(`String ${stringIndex} is out of range [0, ${instrument.strings.length - 1}].`);
  }
  const highest = Math.max(0, string.fretCount - instrument.capo);
  if (!Number.isInteger(fret) || fret < 0 || fret > highest) {
    throw new RangeError(`Fret ${fret} is out of range [0, ${highest}].`);
  }
  return transposePitchClass(string.openPitch, fret + instrument.capo);
};

export const withCapo = (instrument: Instrument, capo: number): Instrument =>
  createInstrument(instrument.name, instrument.strings, capo);

export const withTuning = (instrument: Instrument, tuning: string): Instrument => {
  const notes = tuning.trim().split(/\s+/).filter((note) => note !== '');
  if (notes.length !== instrument.strings.length) {
    throw new TheoryError(
      'INVALID_TUNING',
      `Tuning must have ${instrument.strings.length} notes, got ${notes.length}.`,
    );
  }
  const strings = notes.map((note, index) => parseInstrumentString(note, instrument.strings[index]?.fretCount));
  return createInstrument(instrument.name, strings, instrument.capo);
};

export const describeTuning = (instrument: Instrument): string =>
  instrument.strings.map((string) => `${pitchClassName(string.openPitch)}${string.octave}`).join(' ');

export const describeInstrument = (instrument: Instrument): string => {
  const base = `${instrument.name} (${describeTuning(instrument)})`;
  return instrument.capo > 0 ? `${base}, capo ${instrument.capo}` : base;
};
