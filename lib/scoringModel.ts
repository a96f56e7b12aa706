/**
 * Scoring model metadata for reporting alongside composite scores.
 * All values are sourced from the scoring modules; no duplicated magic numbers.
 */

import type { ScoreComponentName } from "./metricContract";
import {
  SCORE_WEIGHT_PERCENT,
  NEUTRAL_SCORE,
  RATING_SCALE_FACTOR,
  OUTLIER_SIGMA,
  OFFICIAL_DELIVERY_WEIGHT,
  RATING_DELIVERY_WEIGHT,
  RATES_PER_CAPITA_BASELINE,
  RATES_PER_CAPITA_DIVISOR,
  RESPONSIVENESS_BUCKETS,
  RESPONSIVENESS_FLOOR,
} from "./scoringEngine";
import {
  NO_BASELINE_MULTIPLIER,
  SPIKE_SCORE_FACTOR,
  RED_FLAG_MEDIUM_CONFIDENCE_MIN,
} from "./redFlagIndex";
import { SAMPLE_SIZE_THRESHOLDS, SIGNAL_COUNT_THRESHOLDS } from "./confidence";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "./engineConfig";

export const SCORING_MODEL_VERSION = "1.0";

export type ScoringModelMetadata = {
  version: string;
  weight_pct: Record<ScoreComponentName, number>;
  neutral_score: number;
  rating_scale_factor: number;
  rating_window_days: number;
  outlier_sigma: number;
  service_delivery_blend: { official: number; ratings: number };
  rates_factor: { baseline_per_capita: number; divisor: number };
  responsiveness_buckets: { max_days: number; score: number }[];
  responsiveness_floor: number;
  confidence_thresholds: {
    sample_size: { high: number; medium: number; low: number };
    signal_count: { high: number; medium: number; low: number };
  };
  red_flag: {
    window_days: number;
    no_baseline_multiplier: number;
    score_factor: number;
    medium_confidence_min: number;
  };
};

/**
 * Returns metadata for the current scoring model. The windows come from the
 * engine config in effect; everything else from the scoring constants.
 */
export function getScoringModelMetadata(
  config: Pick<EngineConfig, "ratingWindowDays" | "redFlagWindowDays"> = DEFAULT_ENGINE_CONFIG
): ScoringModelMetadata {
  return {
    version: SCORING_MODEL_VERSION,
    weight_pct: { ...SCORE_WEIGHT_PERCENT },
    neutral_score: NEUTRAL_SCORE,
    rating_scale_factor: RATING_SCALE_FACTOR,
    rating_window_days: config.ratingWindowDays,
    outlier_sigma: OUTLIER_SIGMA,
    service_delivery_blend: { official: OFFICIAL_DELIVERY_WEIGHT, ratings: RATING_DELIVERY_WEIGHT },
    rates_factor: { baseline_per_capita: RATES_PER_CAPITA_BASELINE, divisor: RATES_PER_CAPITA_DIVISOR },
    responsiveness_buckets: RESPONSIVENESS_BUCKETS.map(([maxDays, score]) => ({ max_days: maxDays, score })),
    responsiveness_floor: RESPONSIVENESS_FLOOR,
    confidence_thresholds: {
      sample_size: { ...SAMPLE_SIZE_THRESHOLDS },
      signal_count: { ...SIGNAL_COUNT_THRESHOLDS },
    },
    red_flag: {
      window_days: config.redFlagWindowDays,
      no_baseline_multiplier: NO_BASELINE_MULTIPLIER,
      score_factor: SPIKE_SCORE_FACTOR,
      medium_confidence_min: RED_FLAG_MEDIUM_CONFIDENCE_MIN,
    },
  };
}
