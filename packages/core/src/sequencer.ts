import { difficultyScore, fingersRequired } from './difficulty.js';
import { fretSpan, lowestFret, requiresBarre } from './model.js';
import type { RankedVoicing, SequencedStep, TransitionDifficulty, Voicing, VoicingPreference } from './types.js';

const EASY_TRANSITION_BELOW = 20;
const MEDIUM_TRANSITION_MAX = 50;

/** Hand movement between two voicings. A missing side is a sequence boundary and costs nothing. */
export const transitionCost = (from: Voicing | undefined, to: Voicing | undefined): number => {
  if (!from || !to) return 0;

  let cost = 10 * Math.abs((lowestFret(from) ?? 0) - (lowestFret(to) ?? 0));

  const shared = Math.min(from.positions.length, to.positions.length);
  for (let index = 0; index < shared; index += 1) {
    const a = from.positions[index];
    const b = to.positions[index];
    if (!a || !b) continue;
    if (a.kind === 'fretted' && b.kind === 'fretted') {
      cost += 2 * Math.abs(a.fret - b.fret);
    } else if (a.kind === 'fretted' || b.kind === 'fretted') {
      cost += 3;
    }
  }

  if (requiresBarre(from) !== requiresBarre(to)) cost += 15;

  if (Math.abs(fretSpan(from) - fretSpan(to)) <= 1 && Math.abs(fingersRequired(from) - fingersRequired(to)) <= 1) {
    cost -= 5;
  }

  return Math.max(0, cost);
};

export const categorizeTransition = (cost: number): TransitionDifficulty => {
  if (cost < EASY_TRANSITION_BELOW) return 'easy';
  if (cost <= MEDIUM_TRANSITION_MAX) return 'medium';
  return 'hard';
};

const preferenceAdjustment = (voicing: Voicing, preference: VoicingPreference): number => {
  switch (preference) {
    case 'preferOpen':
      return requiresBarre(voicing) ? 30 : -15;
    case 'preferBarre':
      return requiresBarre(voicing) ? -15 : 25;
    case 'balanced':
      return 0;
  }
};

export interface RankRequest {
  previous?: Voicing;
  next?: Voicing;
  candidates: readonly Voicing[];
  preference?: VoicingPreference;
}

/**
 * Orders candidates by how little the hand moves from `previous` and on to
 * `next`, nudged by preference and raw difficulty. Only the immediate
 * neighbours are considered.
 */
export const rankVoicings = ({ previous, next, candidates, preference = 'balanced' }: RankRequest): RankedVoicing[] =>
  candidates
    .map((voicing, originalIndex) => ({
      voicing,
      originalIndex,
      transitionCost:
        Math.round(0.6 * transitionCost(previous, voicing) + 0.4 * transitionCost(voicing, next)) +
        preferenceAdjustment(voicing, preference) +
        Math.floor(difficultyScore(voicing) / 10),
      isSuggested: false,
    }))
    .sort((a, b) => a.transitionCost - b.transitionCost)
    .map((ranked, order) => (order === 0 ? { ...ranked, isSuggested: true } : ranked));

export const suggestedIndex = (request: RankRequest): number => rankVoicings(request)[0]?.originalIndex ?? 0;

/**
 * Walks a progression left to right. Each chord is ranked against the voicing
 * already chosen for the chord before it and the easiest candidate of the
 * chord after it.
 */
export const sequenceProgression = (
  candidateLists: ReadonlyArray<readonly Voicing[]>,
  preference: VoicingPreference = 'balanced',
): SequencedStep[] => {
  const steps: SequencedStep[] = [];
  let previous: Voicing | undefined;

  candidateLists.forEach((candidates, chordIndex) => {
    const next = candidateLists[chordIndex + 1]?.[0];
    const ranked = rankVoicings({
      candidates,
      preference,
      ...(previous ? { previous } : {}),
      ...(next ? { next } : {}),
    });
    const voicing = ranked[0]?.voicing;
    steps.push({
      chordIndex,
      ...(voicing ? { voicing } : {}),
      costFromPrevious: transitionCost(previous, voicing),
      ranked,
    });
    previous = voicing;
  });

  return steps;
};
