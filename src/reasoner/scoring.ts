import { config } from '../config.js';

/**
 * Tunable weights for matching and ranking.
 *
 * - match score  = overlap + redFlagBase * (2^k - 1), k = red flags observed
 * - confidence   = min(1, matched/total * confidenceScale + min(k * redFlagBoost, redFlagBoostCap))
 */
export type ScoringConfig = {
  redFlagBase: number;
  confidenceScale: number;
  redFlagBoost: number;
  redFlagBoostCap: number;
  defaultLimit: number;
};

export const DEFAULT_SCORING: Readonly<ScoringConfig> = Object.freeze({
  redFlagBase: 2,
  confidenceScale: 1,
  redFlagBoost: 0.1,
  redFlagBoostCap: 0.3,
  defaultLimit: 5,
});

export function scoringFromConfig(): ScoringConfig {
  return {
    redFlagBase: Math.max(0, Math.round(config.MATCH_RED_FLAG_BASE)),
    confidenceScale: config.CONFIDENCE_SCALE,
    redFlagBoost: config.RED_FLAG_CONFIDENCE_BOOST,
    redFlagBoostCap: config.RED_FLAG_CONFIDENCE_CAP,
    defaultLimit: Math.max(1, Math.floor(config.DIFFERENTIAL_LIMIT)),
  };
}

export function redFlagBonus(redFlagsMatched: number, scoring: ScoringConfig): number {
  if (redFlagsMatched <= 0) return 0;
  return scoring.redFlagBase * (2 ** redFlagsMatched - 1);
}

export function confidenceFor(matched: number, total: number, redFlagsMatched: number, scoring: ScoringConfig): number {
  if (total <= 0 || matched <= 0) return 0;
  const base = (matched / total) * scoring.confidenceScale;
  const boost = Math.min(redFlagsMatched * scoring.redFlagBoost, scoring.redFlagBoostCap);
  return Math.round(Math.min(1, base + boost) * 10_000) / 10_000;
}
