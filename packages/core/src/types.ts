import type { Chord } from '@fingerboard/theory';

export type Finger = 1 | 2 | 3 | 4;

export interface MutedPosition {
  kind: 'muted';
}

export interface OpenPosition {
  kind: 'open';
}

export interface FrettedPosition {
  kind: 'fretted';
  fret: number;
  finger?: Finger;
}

export type StringPosition = MutedPosition | OpenPosition | FrettedPosition;

export interface Barre {
  fret: number;
  fromStringIndex: number;
  toStringIndex: number;
  finger: Finger;
}

export interface Voicing {
  readonly positions: readonly StringPosition[];
  readonly barre?: Barre;
}

export type VoicingDifficulty = 'beginner' | 'intermediate' | 'advanced';

export interface VoicingAnalysis {
  compact: string;
  difficultyScore: number;
  difficulty: VoicingDifficulty;
  fingersRequired: number;
  lowestFret?: number;
  highestFret?: number;
  fretSpan: number;
  requiresBarre: boolean;
  playedStrings: number;
}

export interface SearchOptions {
  maxFretSpan: number;
  minFret: number;
  maxFret: number;
  rootInBass: boolean;
  allowInteriorMutes: boolean;
  minStringsPlayed: number;
  maxMutedStrings: number;
  maxFingers: number;
  maxDifficulty?: VoicingDifficulty;
}

export interface CapoSuggestion {
  readonly capoFret: number;
  readonly shapes: readonly Chord[];
  readonly originalChords: readonly Chord[];
  readonly difficultyScore: number;
}

export type VoicingPreference = 'preferOpen' | 'preferBarre' | 'balanced';

export type TransitionDifficulty = 'easy' | 'medium' | 'hard';

export interface RankedVoicing {
  voicing: Voicing;
  originalIndex: number;
  transitionCost: number;
  isSuggested: boolean;
}

export interface SequencedStep {
  chordIndex: number;
  voicing?: Voicing;
  costFromPrevious: number;
  ranked: RankedVoicing[];
}

export type VoicingErrorCode =
  | 'INVALID_POSITION'
  | 'INVALID_BARRE'
  | 'INVALID_VOICING'
  | 'STRING_COUNT_MISMATCH'
  | 'INVALID_OPTIONS'
  | 'INVALID_INSTRUMENT';
