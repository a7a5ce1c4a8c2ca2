import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  TheoryError,
  chordKind,
  chordPitchClasses,
  chordSymbol,
  createChord,
  createInstrument,
  describeInstrument,
  instrumentPresets,
  instruments,
  loadInstrumentPresets,
  parseChord,
  parseInstrumentString,
  parsePitchClass,
  pitchClassName,
  resolveInstrument,
  semitonesBetween,
  soundingPitchClass,
  stringCount,
  toPitchClass,
  transposeChord,
  transposePitchClass,
  withCapo,
  withTuning,
} from './index.js';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw.');
};

describe('pitch classes', () => {
  it('parses sharp and flat spellings', () => {
    expect(parsePitchClass('C')).toBe(0);
    expect(parsePitchClass('C#')).toBe(1);
    expect(parsePitchClass('Bb')).toBe(10);
    expect(parsePitchClass(' F# ')).toBe(6);
    expect(captureError(() => parsePitchClass('H'))).toMatchObject({ code: 'INVALID_NOTE' });
  });

  it('transposes modulo 12 in both directions', () => {
    expect(transposePitchClass(11, 1)).toBe(0);
    expect(transposePitchClass(0, -1)).toBe(11);
    expect(transposePitchClass(4, -25)).toBe(3);
    expect(semitonesBetween(9, 0)).toBe(3);
    expect(pitchClassName(toPitchClass(-2))).toBe('A#');
  });

  it('property test: transposing up then down is the identity', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 11 }), fc.integer({ min: -48, max: 48 }), (value, semitones) => {
        const pc = toPitchClass(value);
        return transposePitchClass(transposePitchClass(pc, semitones), -semitones) === pc;
      }),
    );
  });
});

describe('chords', () => {
  it('parses quality suffixes into root-first intervals', () => {
    const am7 = parseChord('Am7');
    expect(am7.root).toBe(9);
    expect(am7.intervals).toEqual([0, 3, 7, 10]);
    expect(am7.suffix).toBe('m7');
    expect(chordSymbol(am7)).toBe('Am7');
    expect(parseChord('C').intervals).toEqual([0, 4, 7]);
    expect(chordPitchClasses(parseChord('Am'))).toEqual([9, 0, 4]);
  });

  it('reads a trailing note name as the slash bass', () => {
    const slash = parseChord('C/G');
    expect(slash.root).toBe(0);
    expect(slash.bass).toBe(7);
    expect(chordSymbol(slash)).toBe('C/G');
    expect(chordSymbol(transposeChord(slash, 2))).toBe('D/A');
  });

  it('classifies chord kinds by interval content', () => {
    expect(chordKind(parseChord('G'))).toBe('major');
    expect(chordKind(parseChord('Em'))).toBe('minor');
    expect(chordKind(parseChord('G7'))).toBe('dominant7');
    expect(chordKind(parseChord('Fmaj7'))).toBe('major7');
    expect(chordKind(parseChord('Dm7'))).toBe('minor7');
    expect(chordKind(parseChord('Bm7b5'))).toBe('halfDiminished7');
    expect(chordKind(createChord(0, [0, 2, 4, 7]))).toBe('other');
  });

  it('transposes shapes down for capo use', () => {
    expect(chordSymbol(transposeChord(parseChord('F'), -1))).toBe('E');
    expect(chordSymbol(transposeChord(parseChord('Bbm'), -1))).toBe('Am');
  });

  it('rejects unknown symbols and malformed interval lists', () => {
    expect(captureError(() => parseChord('Xyz'))).toBeInstanceOf(TheoryError);
    expect(captureError(() => parseChord(''))).toMatchObject({ code: 'INVALID_CHORD' });
    expect(captureError(() => createChord(0, [4, 7]))).toMatchObject({ code: 'INVALID_CHORD' });
  });
});

describe('instruments', () => {
  it('computes capo-aware sounding pitch classes', () => {
    expect(soundingPitchClass(instruments.guitar, 0, 5)).toBe(9);
    expect(soundingPitchClass(instruments.guitar, 5, 0)).toBe(4);
    const capoed = withCapo(instruments.guitar, 2);
    expect(soundingPitchClass(capoed, 0, 0)).toBe(6);
    expect(describeInstrument(capoed)).toBe('Guitar (E2 A2 D3 G3 B3 E4), capo 2');
    expect(stringCount(capoed)).toBe(6);
    expect(stringCount(instruments.ukulele)).toBe(4);
  });

  it('rejects out-of-range strings and frets', () => {
    expect(captureError(() => soundingPitchClass(instruments.guitar, 6, 0))).toBeInstanceOf(RangeError);
    expect(captureError(() => soundingPitchClass(instruments.guitar, 0, 23))).toBeInstanceOf(RangeError);
    expect(captureError(() => soundingPitchClass(withCapo(instruments.guitar, 5), 0, 18))).toBeInstanceOf(RangeError);
  });

  it('validates construction', () => {
    expect(captureError(() => createInstrument('Empty', []))).toMatchObject({ code: 'INVALID_INSTRUMENT' });
    expect(captureError(() => withCapo(instruments.ukulele, 16))).toMatchObject({ code: 'INVALID_INSTRUMENT' });
    expect(captureError(() => parseInstrumentString('E'))).toMatchObject({ code: 'INVALID_TUNING' });
    expect(parseInstrumentString('Eb2', 20)).toEqual({ openPitch: 3, octave: 2, fretCount: 20 });
  });

  it('retunes while keeping string count and capo', () => {
    const dropD = withTuning(withCapo(instruments.guitar, 1), 'D2 A2 D3 G3 B3 E4');
    expect(dropD.strings[0]?.openPitch).toBe(2);
    expect(dropD.capo).toBe(1);
    expect(captureError(() => withTuning(instruments.guitar, 'E2 A2 D3'))).toMatchObject({ code: 'INVALID_TUNING' });
  });
});

describe('presets', () => {
  it('loads every preset from the data file', () => {
    expect(instrumentPresets().map((preset) => preset.key)).toEqual([
      'guitar',
      'bass',
      'ukulele',
      'cavaquinho',
      'banjo',
      'guitar7String',
    ]);
    expect(describeInstrument(instruments.guitar)).toBe('Guitar (E2 A2 D3 G3 B3 E4)');
    expect(describeInstrument(instruments.ukulele)).toBe('Ukulele (G4 C4 E4 A4)');
    expect(instruments.bass.strings[0]?.fretCount).toBe(20);
    expect(instruments.guitar7String.strings).toHaveLength(7);
  });

  it('resolves tunings and capo by key', () => {
    expect(resolveInstrument('guitar', 'dropD').strings[0]?.openPitch).toBe(2);
    expect(resolveInstrument('guitar', undefined, 3).capo).toBe(3);
    expect(captureError(() => resolveInstrument('lute'))).toMatchObject({ code: 'UNKNOWN_PRESET' });
    expect(captureError(() => resolveInstrument('guitar', 'openQ'))).toMatchObject({ code: 'UNKNOWN_PRESET' });
  });

  it('rejects malformed preset tables', () => {
    expect(captureError(() => loadInstrumentPresets('[]'))).toMatchObject({ code: 'UNKNOWN_PRESET' });
    const missingDefault = JSON.stringify({ lyre: { name: 'Lyre', fretCount: 12, defaultTuning: 'a', tunings: { b: 'E2' } } });
    expect(captureError(() => loadInstrumentPresets(missingDefault))).toMatchObject({ code: 'UNKNOWN_PRESET' });
  });
});
