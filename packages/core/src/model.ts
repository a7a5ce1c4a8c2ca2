import { chordPitchClasses, soundingPitchClass, stringCount, type Chord, type Instrument, type PitchClass } from '@fingerboard/theory';
import { VoicingError } from './errors.js';
import type { Barre, Finger, FrettedPosition, MutedPosition, OpenPosition, StringPosition, Voicing } from './types.js';

const MUTED: MutedPosition = { kind: 'muted' };
const OPEN: OpenPosition = { kind: 'open' };
Object.freeze(MUTED);
Object.freeze(OPEN);

export const mutedString = (): StringPosition => MUTED;

export const openString = (): StringPosition => OPEN;

export const frettedString = (fret: number, finger?: Finger): StringPosition => {
  if (!Number.isInteger(fret) || fret < 1) {
    throw new VoicingError('INVALID_POSITION', `Fretted positions need a fret of 1 or more, got ${fret}.`);
  }
  if (finger !== undefined && ![1, 2, 3, 4].includes(finger)) {
    throw new VoicingError('INVALID_POSITION', `Finger must be 1-4, got ${finger}.`);
  }
  const position: FrettedPosition = finger === undefined ? { kind: 'fretted', fret } : { kind: 'fretted', fret, finger };
  return Object.freeze(position);
};

export const createBarre = (fret: number, fromStringIndex: number, toStringIndex: number, finger: Finger = 1): Barre =>
  Object.freeze({ fret, fromStringIndex, toStringIndex, finger });

export const barreStringCount = (barre: Barre): number => barre.toStringIndex - barre.fromStringIndex + 1;

const validateBarre = (barre: Barre, stringCount: number): void => {
  if (
    !Number.isInteger(barre.fret) ||
    barre.fret < 1 ||
    barre.fromStringIndex < 0 ||
    barre.toStringIndex >= stringCount ||
    barre.fromStringIndex > barre.toStringIndex
  ) {
    throw new VoicingError(
      'INVALID_BARRE',
      `Barre at fret ${barre.fret} over strings ${barre.fromStringIndex}-${barre.toStringIndex} does not fit ${stringCount} strings.`,
    );
  }
};

export const createVoicing = (positions: readonly StringPosition[], barre?: Barre): Voicing => {
  if (positions.length === 0) {
    throw new VoicingError('INVALID_VOICING', 'A voicing needs at least one string.');
  }
  if (barre) {
    validateBarre(barre, positions.length);
    return Object.freeze({ positions: Object.freeze([...positions]), barre: createBarre(barre.fret, barre.fromStringIndex, barre.toStringIndex, barre.finger) });
  }
  return Object.freeze({ positions: Object.freeze([...positions]) });
};

/** `null` or a negative number mutes a string, 0 plays it open. */
export const voicingFromFrets = (frets: ReadonlyArray<number | null>, barre?: Barre): Voicing =>
  createVoicing(
    frets.map((fret) => {
      if (fret === null || fret < 0) return mutedString();
      if (fret === 0) return openString();
      return frettedString(fret);
    }),
    barre,
  );

const parseFretToken = (token: string, input: string): number | null => {
  const lower = token.toLowerCase().replace(/^\((\d+)\)$/, '$1');
  if (lower === 'x') return null;
  if (lower === 'o') return 0;
  if (/^\d+$/.test(lower)) return Number(lower);
  throw new VoicingError('INVALID_VOICING', `Cannot read "${token}" in voicing "${input}".`);
};

/**
 * Reads `X02210`, `X-0-2-2-1-0`, `x 0 10 10 9 0` or the compact form with
 * parenthesised frets, `X0(10)(10)90`.
 */
export const parseVoicing = (input: string): Voicing => {
  const trimmed = input.trim();
  if (trimmed === '') {
    throw new VoicingError('INVALID_VOICING', 'Empty voicing string.');
  }

  const tokens = /[-\s]/.test(trimmed) ? trimmed.split(/[-\s]+/) : (trimmed.match(/\(\d+\)|./g) ?? []);
  return voicingFromFrets(tokens.map((token) => parseFretToken(token, input)));
};

const isFretted = (position: StringPosition): position is FrettedPosition => position.kind === 'fretted';

const frettedFrets = (voicing: Voicing): number[] => voicing.positions.filter(isFretted).map((position) => position.fret);

export const stringCountOf = (voicing: Voicing): number => voicing.positions.length;

export const playedStringCount = (voicing: Voicing): number =>
  voicing.positions.filter((position) => position.kind !== 'muted').length;

export const mutedStringCount = (voicing: Voicing): number =>
  voicing.positions.filter((position) => position.kind === 'muted').length;

export const openStringCount = (voicing: Voicing): number =>
  voicing.positions.filter((position) => position.kind === 'open').length;

export const frettedStringCount = (voicing: Voicing): number => voicing.positions.filter(isFretted).length;

export const lowestFret = (voicing: Voicing): number | undefined => {
  const frets = frettedFrets(voicing);
  return frets.length === 0 ? undefined : Math.min(...frets);
};

export const highestFret = (voicing: Voicing): number | undefined => {
  const frets = frettedFrets(voicing);
  return frets.length === 0 ? undefined : Math.max(...frets);
};

export const fretSpan = (voicing: Voicing): number => {
  const low = lowestFret(voicing);
  const high = highestFret(voicing);
  return low === undefined || high === undefined ? 0 : high - low;
};

export const requiresBarre = (voicing: Voicing): boolean => voicing.barre !== undefined;

export const isAllOpen = (voicing: Voicing): boolean => voicing.positions.every((position) => !isFretted(position));

/** Muted strings with a played string somewhere on each side. */
export const interiorMutedStrings = (voicing: Voicing): number[] => {
  const played = voicing.positions.map((position) => position.kind !== 'muted');
  const first = played.indexOf(true);
  const last = played.lastIndexOf(true);
  const interior: number[] = [];
  for (let index = first + 1; first >= 0 && index < last; index += 1) {
    if (!played[index]) interior.push(index);
  }
  return interior;
};

/** Identity of the fretting hand's shape: fretted (string, fret) pairs only. */
export const frettedShapeKey = (voicing: Voicing): string =>
  voicing.positions.flatMap((position, index) => (isFretted(position) ? [`${index}:${position.fret}`] : [])).join(',');

export const toCompactString = (voicing: Voicing): string =>
  voicing.positions
    .map((position) => {
      switch (position.kind) {
        case 'muted':
          return 'X';
        case 'open':
          return '0';
        case 'fretted':
          return position.fret >= 10 ? `(${position.fret})` : String(position.fret);
      }
    })
    .join('');

const fretOf = (position: StringPosition): number | undefined => {
  switch (position.kind) {
    case 'muted':
      return undefined;
    case 'open':
      return 0;
    case 'fretted':
      return position.fret;
  }
};

export const assertFitsInstrument = (voicing: Voicing, instrument: Instrument): void => {
  const positions = stringCountOf(voicing);
  const strings = stringCount(instrument);
  if (positions !== strings) {
    throw new VoicingError('STRING_COUNT_MISMATCH', `Voicing has ${positions} positions but ${instrument.name} has ${strings} strings.`);
  }
};

/** Pitch classes of the played strings, lowest string first. */
export const soundingPitchClasses = (voicing: Voicing, instrument: Instrument): PitchClass[] => {
  assertFitsInstrument(voicing, instrument);
  const pitches: PitchClass[] = [];
  voicing.positions.forEach((position, index) => {
    const fret = fretOf(position);
    if (fret !== undefined) pitches.push(soundingPitchClass(instrument, index, fret));
  });
  return pitches;
};

export const playsChord = (voicing: Voicing, chord: Chord, instrument: Instrument): boolean => {
  const sounding = new Set(soundingPitchClasses(voicing, instrument));
  const tones = new Set(chordPitchClasses(chord));
  return [...sounding].every((pitch) => tones.has(pitch)) && [...tones].every((pitch) => sounding.has(pitch)) && sounding.has(chord.root);
};

const positionsEqual = (a: StringPosition, b: StringPosition): boolean => {
  if (a.kind !== b.kind) return false;
  if (a.kind === 'fretted' && b.kind === 'fretted') return a.fret === b.fret && a.finger === b.finger;
  return true;
};

export const voicingsEqual = (a: Voicing, b: Voicing): boolean =>
  a.positions.length === b.positions.length &&
  a.positions.every((position, index) => {
    const other = b.positions[index];
    return other !== undefined && positionsEqual(position, other);
  }) &&
  ((a.barre === undefined && b.barre === undefined) ||
    (a.barre !== undefined &&
      b.barre !== undefined &&
      a.barre.fret === b.barre.fret &&
      a.barre.fromStringIndex === b.barre.fromStringIndex &&
      a.barre.toStringIndex === b.barre.toStringIndex &&
      a.barre.finger === b.barre.finger));
