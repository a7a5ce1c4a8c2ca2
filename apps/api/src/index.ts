import {
  analyzeVoicing,
  capoShapeSymbols,
  categorizeTransition,
  describeCapoSuggestion,
  findVoicings,
  parseVoicing,
  rankVoicings,
  searchPresets,
  sequenceProgression,
  suggestCapo,
  suggestedIndex,
  toCompactString,
  VoicingError,
  type SearchOptions,
  type TransitionDifficulty,
  type VoicingAnalysis,
  type VoicingDifficulty,
  type VoicingPreference,
} from '@fingerboard/core';
import {
  chordSymbol,
  describeInstrument,
  instrumentPresets,
  parseChord,
  resolveInstrument,
  TheoryError,
  type Instrument,
} from '@fingerboard/theory';
import type { ApiConfig } from './config.js';

export interface InstrumentSummary {
  key: string;
  name: string;
  description: string;
  fretCount: number;
  defaultTuning: string;
  tunings: string[];
}

export interface VoicingsResponse {
  chord: string;
  instrument: string;
  total: number;
  voicings: VoicingAnalysis[];
}

export interface CapoResponse {
  chords: string[];
  suggestions: Array<{ capoFret: number; shapes: string[]; difficultyScore: number; description: string }>;
}

export interface RankResponse {
  suggestedIndex: number;
  ranked: Array<{ compact: string; originalIndex: number; transitionCost: number; isSuggested: boolean }>;
}

export interface ProgressionResponse {
  instrument: string;
  steps: Array<{
    chord: string;
    voicing: string | null;
    costFromPrevious: number;
    transition: TransitionDifficulty;
    candidates: number;
  }>;
}

export interface ErrorBody {
  error: string;
  code?: string;
}

type Payload = Record<string, unknown>;

const isRecord = (value: unknown): value is Payload => typeof value === 'object' && value !== null && !Array.isArray(value);

const isDifficulty = (value: unknown): value is VoicingDifficulty =>
  value === 'beginner' || value === 'intermediate' || value === 'advanced';

const isPreference = (value: unknown): value is VoicingPreference =>
  value === 'preferOpen' || value === 'preferBarre' || value === 'balanced';

const requirePayload = (payload: unknown): Payload => {
  if (!isRecord(payload)) {
    throw new Error('Request body must be a JSON object.');
  }
  return payload;
};

const requireString = (payload: Payload, key: string): string => {
  const value = payload[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Missing ${key} value.`);
  }
  return value;
};

const optionalString = (payload: Payload, key: string): string | undefined => {
  const value = payload[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Invalid ${key} value.`);
  }
  return value;
};

const optionalInteger = (payload: Payload, key: string): number | undefined => {
  const value = payload[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`Invalid ${key} value. Expected an integer.`);
  }
  return value;
};

const optionalBoolean = (payload: Payload, key: string): boolean | undefined => {
  const value = payload[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid ${key} value. Expected a boolean.`);
  }
  return value;
};

const requireStringList = (payload: Payload, key: string): string[] => {
  const value = payload[key];
  if (!Array.isArray(value)) {
    throw new Error(`Missing ${key} list.`);
  }
  const strings: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') {
      throw new Error(`Invalid ${key} entry. Expected strings.`);
    }
    strings.push(entry);
  }
  return strings;
};

const readPreference = (payload: Payload): VoicingPreference => {
  const value = payload.preference;
  if (value === undefined) return 'balanced';
  if (!isPreference(value)) {
    throw new Error('Invalid preference value. Expected preferOpen, preferBarre or balanced.');
  }
  return value;
};

const COUNT_OPTIONS = ['maxFretSpan', 'minFret', 'maxFret', 'minStringsPlayed', 'maxMutedStrings', 'maxFingers'] as const;
const FLAG_OPTIONS = ['rootInBass', 'allowInteriorMutes'] as const;

const readSearchOptions = (payload: Payload): Partial<SearchOptions> => {
  const preset = payload.preset;
  if (preset !== undefined && !isDifficulty(preset)) {
    throw new Error('Invalid preset value. Expected beginner, intermediate or advanced.');
  }
  const overrides: Partial<SearchOptions> = preset === undefined ? {} : { ...searchPresets[preset] };

  const raw = payload.options;
  if (raw === undefined) return overrides;
  if (!isRecord(raw)) {
    throw new Error('Invalid options value. Expected an object.');
  }
  for (const key of COUNT_OPTIONS) {
    const value = optionalInteger(raw, key);
    if (value !== undefined) overrides[key] = value;
  }
  for (const key of FLAG_OPTIONS) {
    const value = optionalBoolean(raw, key);
    if (value !== undefined) overrides[key] = value;
  }
  const maxDifficulty = raw.maxDifficulty;
  if (maxDifficulty !== undefined) {
    if (!isDifficulty(maxDifficulty)) {
      throw new Error('Invalid maxDifficulty value. Expected beginner, intermediate or advanced.');
    }
    overrides.maxDifficulty = maxDifficulty;
  }
  return overrides;
};

const readInstrument = (payload: Payload, config: ApiConfig): Instrument =>
  resolveInstrument(optionalString(payload, 'instrument') ?? config.defaultInstrument, optionalString(payload, 'tuning'), optionalInteger(payload, 'capo') ?? 0);

const readLimit = (payload: Payload, config: ApiConfig): number => {
  const limit = optionalInteger(payload, 'limit') ?? config.maxResults;
  if (limit < 0) {
    throw new Error('Invalid limit value. Expected a non-negative integer.');
  }
  return Math.min(limit, config.maxResults);
};

export const errorBody = (error: unknown): ErrorBody => {
  const message = error instanceof Error ? error.message : 'Invalid request.';
  return error instanceof TheoryError || error instanceof VoicingError ? { error: message, code: error.code } : { error: message };
};

export const listInstruments = (): InstrumentSummary[] =>
  instrumentPresets().map((preset) => ({
    key: preset.key,
    name: preset.name,
    description: describeInstrument(resolveInstrument(preset.key)),
    fretCount: preset.fretCount,
    defaultTuning: preset.defaultTuning,
    tunings: Object.keys(preset.tunings),
  }));

export const handleVoicings = (body: unknown, config: ApiConfig): VoicingsResponse => {
  const payload = requirePayload(body);
  const chord = parseChord(requireString(payload, 'chord'));
  const instrument = readInstrument(payload, config);
  const voicings = findVoicings(chord, instrument, readSearchOptions(payload));
  return {
    chord: chordSymbol(chord),
    instrument: describeInstrument(instrument),
    total: voicings.length,
    voicings: voicings.slice(0, readLimit(payload, config)).map(analyzeVoicing),
  };
};

export const handleCapo = (body: unknown, config: ApiConfig): CapoResponse => {
  const payload = requirePayload(body);
  const chords = requireStringList(payload, 'chords').map(parseChord);
  const instrument = readInstrument(payload, config);
  const maxCapoFret = optionalInteger(payload, 'maxCapoFret');
  const suggestions = suggestCapo(chords, instrument, maxCapoFret === undefined ? {} : { maxCapoFret });
  return {
    chords: chords.map(chordSymbol),
    suggestions: suggestions.map((suggestion) => ({
      capoFret: suggestion.capoFret,
      shapes: capoShapeSymbols(suggestion),
      difficultyScore: suggestion.difficultyScore,
      description: describeCapoSuggestion(suggestion),
    })),
  };
};

export const handleRank = (body: unknown): RankResponse => {
  const payload = requirePayload(body);
  const previous = optionalString(payload, 'previous');
  const next = optionalString(payload, 'next');
  const request = {
    candidates: requireStringList(payload, 'candidates').map(parseVoicing),
    preference: readPreference(payload),
    ...(previous !== undefined ? { previous: parseVoicing(previous) } : {}),
    ...(next !== undefined ? { next: parseVoicing(next) } : {}),
  };
  return {
    suggestedIndex: suggestedIndex(request),
    ranked: rankVoicings(request).map((entry) => ({
      compact: toCompactString(entry.voicing),
      originalIndex: entry.originalIndex,
      transitionCost: entry.transitionCost,
      isSuggested: entry.isSuggested,
    })),
  };
};

export const handleProgression = (body: unknown, config: ApiConfig): ProgressionResponse => {
  const payload = requirePayload(body);
  const chords = requireStringList(payload, 'chords').map(parseChord);
  const instrument = readInstrument(payload, config);
  const options = readSearchOptions(payload);
  const candidateLists = chords.map((chord) => findVoicings(chord, instrument, options).slice(0, config.maxResults));
  const steps = sequenceProgression(candidateLists, readPreference(payload));
  const symbols = chords.map(chordSymbol);
  return {
    instrument: describeInstrument(instrument),
    steps: steps.map((step) => ({
      chord: symbols[step.chordIndex] ?? '',
      voicing: step.voicing ? toCompactString(step.voicing) : null,
      costFromPrevious: step.costFromPrevious,
      transition: categorizeTransition(step.costFromPrevious),
      candidates: step.ranked.length,
    })),
  };
};
