import { readFileSync } from 'node:fs';
import { TheoryError } from './errors.js';
import { createInstrument, parseInstrumentString, withCapo, type Instrument } from './instrument.js';

export interface InstrumentPreset {
  key: string;
  name: string;
  fretCount: number;
  defaultTuning: string;
  tunings: Record<string, string>;
}

const PRESET_FILE = new URL('../data/instruments.json', import.meta.url);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readStringTable = (value: unknown): Record<string, string> | undefined => {
  if (!isRecord(value)) return undefined;
  const table: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') return undefined;
    table[key] = entry;
  }
  return table;
};

const readPreset = (key: string, value: unknown): InstrumentPreset => {
  const tunings = isRecord(value) ? readStringTable(value.tunings) : undefined;
  if (
    !isRecord(value) ||
    typeof value.name !== 'string' ||
    typeof value.fretCount !== 'number' ||
    typeof value.defaultTuning !== 'string' ||
    !tunings ||
    tunings[value.defaultTuning] === undefined
  ) {
    throw new TheoryError('UNKNOWN_PRESET', `Instrument preset "${key}" is malformed.`);
  }
  return { key, name: value.name, fretCount: value.fretCount, defaultTuning: value.defaultTuning, tunings };
};

export const loadInstrumentPresets = (raw: string = readFileSync(PRESET_FILE, 'utf8')): InstrumentPreset[] => {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new TheoryError('UNKNOWN_PRESET', 'Instrument preset table must be a JSON object.');
  }
  return Object.entries(parsed).map(([key, value]) => readPreset(key, value));
};

const presets = loadInstrumentPresets();

export const instrumentPresets = (): readonly InstrumentPreset[] => presets;

const findPreset = (key: string): InstrumentPreset => {
  const preset = presets.find((candidate) => candidate.key === key);
  if (!preset) {
    const known = presets.map((candidate) => candidate.key).join(', ');
    throw new TheoryError('UNKNOWN_PRESET', `Unknown instrument "${key}". Known instruments: ${known}.`);
  }
  return preset;
};

const buildInstrument = (preset: InstrumentPreset, tuningKey: string): Instrument => {
  const tuning = preset.tunings[tuningKey];
  if (tuning === undefined) {
    const known = Object.keys(preset.tunings).join(', ');
    throw new TheoryError('UNKNOWN_PRESET', `Unknown tuning "${tuningKey}" for ${preset.name}. Known tunings: ${known}.`);
  }
  const strings = tuning.split(/\s+/).map((note) => parseInstrumentString(note, preset.fretCount));
  return createInstrument(preset.name, strings);
};

/**
 * Looks up a preset instrument, optionally retuned (by tuning key) and capoed.
 */
export const resolveInstrument = (key: string, tuning?: string, capo = 0): Instrument => {
  const preset = findPreset(key);
  const instrument = buildInstrument(preset, tuning ?? preset.defaultTuning);
  return capo === 0 ? instrument : withCapo(instrument, capo);
};

export const instruments = {
  guitar: resolveInstrument('guitar'),
  bass: resolveInstrument('bass'),
  ukulele: resolveInstrument('ukulele'),
  cavaquinho: resolveInstrument('cavaquinho'),
  banjo: resolveInstrument('banjo'),
  guitar7String: resolveInstrument('guitar7String'),
} as const;
