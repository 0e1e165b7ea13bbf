import type { CriterionWeights, Rater } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';

export interface RaterProfile {
  specialty: string;
  weights: CriterionWeights;
}

/**
 * Built-in rater profiles. Each emphasises a different criterion so a
 * default panel never has two raters with the same outlook.
 */
export const RATER_PROFILES: readonly RaterProfile[] = [
  {
    specialty: 'technical',
    weights: {
      accuracy: 0.4,
      relevance: 0.2,
      completeness: 0.2,
      explainability: 0.1,
      efficiency: 0.05,
      safety: 0.05,
    },
  },
  {
    specialty: 'creative',
    weights: {
      accuracy: 0.1,
      relevance: 0.3,
      completeness: 0.2,
      explainability: 0.2,
      efficiency: 0.1,
      safety: 0.1,
    },
  },
  {
    specialty: 'efficiency',
    weights: {
      accuracy: 0.2,
      relevance: 0.2,
      completeness: 0.1,
      explainability: 0.1,
      efficiency: 0.3,
      safety: 0.1,
    },
  },
  {
    specialty: 'user-centric',
    weights: {
      accuracy: 0.15,
      relevance: 0.25,
      completeness: 0.15,
      explainability: 0.3,
      efficiency: 0.05,
      safety: 0.1,
    },
  },
  {
    specialty: 'risk',
    weights: {
      accuracy: 0.15,
      relevance: 0.15,
      completeness: 0.15,
      explainability: 0.1,
      efficiency: 0.05,
      safety: 0.4,
    },
  },
];

export type RaterEvaluatorFactory = (profile: RaterProfile) => Rater['evaluate'];

/**
 * Raters for the first `size` built-in profiles. Size must be odd, 3 to 5.
 */
export function createDefaultRaters(size: number, evaluatorFactory: RaterEvaluatorFactory): Rater[] {
  if (!Number.isInteger(size) || size < 3 || size > RATER_PROFILES.length || size % 2 === 0) {
    throw new ConfigError(`Panel size must be odd and between 3 and ${RATER_PROFILES.length}, got ${size}`);
  }
  return RATER_PROFILES.slice(0, size).map((profile) => ({
    id: `${profile.specialty}-rater`,
    specialty: profile.specialty,
    weights: profile.weights,
    evaluate: evaluatorFactory(profile),
  }));
}
