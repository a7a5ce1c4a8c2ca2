import {
  chordPitchClasses,
  playableFretCount,
  soundingPitchClass,
  type Chord,
  type Instrument,
  type PitchClass,
} from '@fingerboard/theory';
import { compareDifficulty, difficultyOf, difficultyScore, fingersRequired } from './difficulty.js';
import { VoicingError } from './errors.js';
import {
  createVoicing,
  fretSpan,
  frettedShapeKey,
  frettedString,
  interiorMutedStrings,
  lowestFret,
  mutedString,
  mutedStringCount,
  openString,
  playedStringCount,
  soundingPitchClasses,
} from './model.js';
import type { SearchOptions, StringPosition, Voicing, VoicingDifficulty } from './types.js';

export const DEFAULT_SEARCH_OPTIONS: Readonly<SearchOptions> = Object.freeze({
  maxFretSpan: 4,
  minFret: 0,
  maxFret: 12,
  rootInBass: true,
  allowInteriorMutes: true,
  minStringsPlayed: 3,
  maxMutedStrings: 2,
  maxFingers: 4,
});

const BEGINNER_OPTIONS: SearchOptions = {
  ...DEFAULT_SEARCH_OPTIONS,
  maxFretSpan: 3,
  maxFret: 5,
  allowInteriorMutes: false,
  minStringsPlayed: 4,
  maxMutedStrings: 1,
  maxDifficulty: 'beginner',
};

const INTERMEDIATE_OPTIONS: SearchOptions = {
  ...DEFAULT_SEARCH_OPTIONS,
  maxFret: 9,
  minStringsPlayed: 4,
  maxDifficulty: 'intermediate',
};

const ADVANCED_OPTIONS: SearchOptions = {
  ...DEFAULT_SEARCH_OPTIONS,
  maxFretSpan: 5,
  rootInBass: false,
  maxMutedStrings: 3,
};

export const searchPresets: Readonly<Record<VoicingDifficulty, Readonly<SearchOptions>>> = Object.freeze({
  beginner: Object.freeze(BEGINNER_OPTIONS),
  intermediate: Object.freeze(INTERMEDIATE_OPTIONS),
  advanced: Object.freeze(ADVANCED_OPTIONS),
});

const requireCount = (name: keyof SearchOptions, value: number): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new VoicingError('INVALID_OPTIONS', `${name} must be a non-negative integer, got ${value}.`);
  }
  return value;
};

export const resolveSearchOptions = (overrides: Partial<SearchOptions> = {}, base: Readonly<SearchOptions> = DEFAULT_SEARCH_OPTIONS): SearchOptions => {
  const options: SearchOptions = {
    maxFretSpan: requireCount('maxFretSpan', overrides.maxFretSpan ?? base.maxFretSpan),
    minFret: requireCount('minFret', overrides.minFret ?? base.minFret),
    maxFret: requireCount('maxFret', overrides.maxFret ?? base.maxFret),
    rootInBass: overrides.rootInBass ?? base.rootInBass,
    allowInteriorMutes: overrides.allowInteriorMutes ?? base.allowInteriorMutes,
    minStringsPlayed: requireCount('minStringsPlayed', overrides.minStringsPlayed ?? base.minStringsPlayed),
    maxMutedStrings: requireCount('maxMutedStrings', overrides.maxMutedStrings ?? base.maxMutedStrings),
    maxFingers: requireCount('maxFingers', overrides.maxFingers ?? base.maxFingers),
  };
  if (options.minFret > options.maxFret) {
    throw new VoicingError('INVALID_OPTIONS', `minFret (${options.minFret}) must not exceed maxFret (${options.maxFret}).`);
  }
  const maxDifficulty = overrides.maxDifficulty ?? base.maxDifficulty;
  return maxDifficulty === undefined ? options : { ...options, maxDifficulty };
};

interface SearchContext {
  instrument: Instrument;
  options: SearchOptions;
  root: PitchClass;
  tones: ReadonlySet<PitchClass>;
  allowed: ReadonlySet<PitchClass>;
  requiredBass?: PitchClass;
}

/** Muted first, then every in-window fret that sounds an allowed pitch, ascending. */
export const stringCandidates = (
  instrument: Instrument,
  stringIndex: number,
  allowed: ReadonlySet<PitchClass>,
  options: Pick<SearchOptions, 'minFret' | 'maxFret'>,
): StringPosition[] => {
  const candidates: StringPosition[] = [mutedString()];
  const highest = Math.min(options.maxFret, playableFretCount(instrument, stringIndex));
  for (let fret = options.minFret; fret <= highest; fret += 1) {
    if (allowed.has(soundingPitchClass(instrument, stringIndex, fret))) {
      candidates.push(fret === 0 ? openString() : frettedString(fret));
    }
  }
  return candidates;
};

/**
 * Depth-first walk of the cartesian product, first list outermost, each list
 * in its given order. Yields fresh arrays.
 */
export function* enumerateAssignments<T>(choices: ReadonlyArray<readonly T[]>, prefix: T[] = []): Generator<T[]> {
  const depth = prefix.length;
  if (depth === choices.length) {
    yield [...prefix];
    return;
  }
  for (const choice of choices[depth] ?? []) {
    prefix.push(choice);
    yield* enumerateAssignments(choices, prefix);
    prefix.pop();
  }
}

const isAcceptable = (voicing: Voicing, context: SearchContext): boolean => {
  const { options } = context;
  if (playedStringCount(voicing) < options.minStringsPlayed) return false;
  if (mutedStringCount(voicing) > options.maxMutedStrings) return false;
  if (fretSpan(voicing) > options.maxFretSpan) return false;
  if (fingersRequired(voicing) > options.maxFingers) return false;
  if (!options.allowInteriorMutes && interiorMutedStrings(voicing).length > 0) return false;

  const sounding = soundingPitchClasses(voicing, context.instrument);
  const distinct = new Set(sounding);
  if (!distinct.has(context.root)) return false;
  // sounding is ordered low to high, so its first entry is the bass
  if (context.requiredBass !== undefined && sounding[0] !== context.requiredBass) return false;
  for (const pitch of distinct) {
    if (!context.allowed.has(pitch)) return false;
  }
  for (const tone of context.tones) {
    if (!distinct.has(tone)) return false;
  }
  if (distinct.size < 2) return false;

  return options.maxDifficulty === undefined || compareDifficulty(difficultyOf(voicing), options.maxDifficulty) <= 0;
};

/**
 * Collapses voicings sharing a fretted shape, keeping the one with the most
 * played strings (first found on ties) at the position its shape first appeared.
 */
export const dedupeByShape = (voicings: readonly Voicing[]): Voicing[] => {
  const byShape = new Map<string, Voicing>();
  for (const voicing of voicings) {
    const key = frettedShapeKey(voicing);
    const kept = byShape.get(key);
    if (!kept || playedStringCount(voicing) > playedStringCount(kept)) {
      byShape.set(key, voicing);
    }
  }
  return [...byShape.values()];
};

export const sortByDifficulty = (voicings: readonly Voicing[]): Voicing[] =>
  voicings
    .map((voicing) => ({ voicing, score: difficultyScore(voicing) }))
    .sort((a, b) => a.score - b.score)
    .map((entry) => entry.voicing);

export const findVoicings = (chord: Chord, instrument: Instrument, overrides: Partial<SearchOptions> = {}): Voicing[] => {
  if (instrument.strings.length === 0) {
    throw new VoicingError('INVALID_INSTRUMENT', `Instrument "${instrument.name}" has no strings.`);
  }
  const options = resolveSearchOptions(overrides);
  const tones = new Set(chordPitchClasses(chord));
  const allowed = new Set(tones);
  if (chord.bass !== undefined) allowed.add(chord.bass);

  const context: SearchContext = {
    instrument,
    options,
    root: chord.root,
    tones,
    allowed,
    ...(chord.bass !== undefined
      ? { requiredBass: chord.bass }
      : options.rootInBass
        ? { requiredBass: chord.root }
        : {}),
  };

  const choices = instrument.strings.map((_, index) => stringCandidates(instrument, index, allowed, options));
  const accepted: Voicing[] = [];
  for (const positions of enumerateAssignments(choices)) {
    const voicing = createVoicing(positions);
    if (isAcceptable(voicing, context)) accepted.push(voicing);
  }

  return sortByDifficulty(dedupeByShape(accepted));
};

export const findEasiestVoicings = (
  chord: Chord,
  instrument: Instrument,
  limit = 5,
  overrides: Partial<SearchOptions> = {},
): Voicing[] => findVoicings(chord, instrument, overrides).slice(0, Math.max(0, limit));

/** Groups by lowest fretted fret (0 for all-open voicings), keys in first-seen order. */
export const groupVoicingsByPosition = (voicings: readonly Voicing[]): Map<number, Voicing[]> => {
  const grouped = new Map<number, Voicing[]>();
  for (const voicing of voicings) {
    const position = lowestFret(voicing) ?? 0;
    const group = grouped.get(position) ?? [];
    group.push(voicing);
    grouped.set(position, group);
  }
  return grouped;
};
