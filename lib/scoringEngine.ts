/**
 * Composite council score: four weighted components, each 0–100.
 * Overall = 40% customer satisfaction + 30% service delivery + 20% value for rates + 10% responsiveness.
 *
 * Every component degrades to a neutral 50 (confidence low, sampleSize 0) with a reason
 * when its inputs are absent, so the overall score is always defined.
 * Deterministic: same inputs and `now` give the same result.
 */

import type {
  ComponentReason,
  ComponentScore,
  CompositeScore,
  EntityRecord,
  IssueRecord,
  OfficialMetrics,
  RatingRecord,
  ScoreComponentName,
} from "./metricContract";
import { gradeBySampleSize, gradeBySignalCount } from "./confidence";

/** Integer percents so the weights sum to exactly 100. */
export const SCORE_WEIGHT_PERCENT: Record<ScoreComponentName, number> = {
  customerSatisfaction: 40,
  serviceDelivery: 30,
  valueForRates: 20,
  responsiveness: 10,
};

export const SCORE_WEIGHTS: Record<ScoreComponentName, number> = {
  customerSatisfaction: SCORE_WEIGHT_PERCENT.customerSatisfaction / 100,
  serviceDelivery: SCORE_WEIGHT_PERCENT.serviceDelivery / 100,
  valueForRates: SCORE_WEIGHT_PERCENT.valueForRates / 100,
  responsiveness: SCORE_WEIGHT_PERCENT.responsiveness / 100,
};

export const NEUTRAL_SCORE = 50;
export const RATING_SCALE_FACTOR = 20;
export const DEFAULT_RATING_WINDOW_DAYS = 730;
export const OUTLIER_SIGMA = 3;

export const OFFICIAL_DELIVERY_WEIGHT = 0.7;
export const RATING_DELIVERY_WEIGHT = 0.3;

/** ratesFactor = clamp(0, 100, 100 − (ratesPerCapita − baseline) / divisor) */
export const RATES_PER_CAPITA_BASELINE = 500;
export const RATES_PER_CAPITA_DIVISOR = 15;

/** Upper bound in days → score; anything slower than the last bucket scores RESPONSIVENESS_FLOOR. */
export const RESPONSIVENESS_BUCKETS: readonly (readonly [number, number])[] = [
  [1, 100],
  [7, 90],
  [14, 75],
  [30, 50],
  [60, 25],
];
export const RESPONSIVENESS_FLOOR = 10;

const DAY_MS = 24 * 60 * 60 * 1000;

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function neutral(reason: ComponentReason): ComponentScore {
  return { score: NEUTRAL_SCORE, confidence: "low", sampleSize: 0, reason };
}

/**
 * Drops points more than 3 population standard deviations from the mean.
 * Needs at least 3 samples; if fewer than half would survive, returns the input unchanged.
 */
export function filterSuspiciousScores(scores: number[]): number[] {
  if (scores.length < 3) return scores;
  const mean = scores.reduce((s, x) => s + x, 0) / scores.length;
  const variance = scores.reduce((s, x) => s + (x - mean) ** 2, 0) / scores.length;
  const limit = OUTLIER_SIGMA * Math.sqrt(variance);
  const filtered = scores.filter((x) => Math.abs(x - mean) <= limit);
  return filtered.length < scores.length * 0.5 ? scores : filtered;
}

/** Approved ratings created within `windowDays` of `now`. */
export function eligibleRatings(ratings: RatingRecord[], now: Date, windowDays: number): RatingRecord[] {
  const cutoff = now.getTime() - windowDays * DAY_MS;
  return ratings.filter((r) => r.moderationStatus === "approved" && Date.parse(r.createdAt) >= cutoff);
}

export function customerSatisfactionScore(ratings: RatingRecord[]): ComponentScore {
  if (ratings.length === 0) return neutral("insufficient_data");
  const scores = filterSuspiciousScores(ratings.map((r) => r.rating * RATING_SCALE_FACTOR));
  const avg = scores.reduce((s, x) => s + x, 0) / scores.length;
  return {
    score: round(avg, 1),
    confidence: gradeBySampleSize(scores.length),
    sampleSize: scores.length,
  };
}

/** Mean over rating categories of each category's mean rating×20. */
function categoryAverage(ratings: RatingRecord[]): number | null {
  const byCategory = new Map<string, number[]>();
  for (const r of ratings) {
    const list = byCategory.get(r.category) ?? [];
    list.push(r.rating * RATING_SCALE_FACTOR);
    byCategory.set(r.category, list);
  }
  if (byCategory.size === 0) return null;
  let total = 0;
  for (const list of byCategory.values()) total += list.reduce((s, x) => s + x, 0) / list.length;
  return total / byCategory.size;
}

export function serviceDeliveryScore(official: OfficialMetrics | null, ratings: RatingRecord[]): ComponentScore {
  const officialScore = official?.serviceDeliveryScore ?? null;
  const ratingScore = categoryAverage(ratings);

  let score: number;
  let signals: number;
  if (officialScore != null && ratingScore != null) {
    score = OFFICIAL_DELIVERY_WEIGHT * officialScore + RATING_DELIVERY_WEIGHT * ratingScore;
    signals = 2;
  } else if (officialScore != null) {
    score = officialScore;
    signals = 1;
  } else if (ratingScore != null) {
    score = ratingScore;
    signals = 1;
  } else {
    return neutral("insufficient_data");
  }
  return { score: round(score, 1), confidence: gradeBySampleSize(signals), sampleSize: signals };
}

export function valueForRatesScore(entity: EntityRecord, official: OfficialMetrics | null): ComponentScore {
  const satisfaction = official?.customerSatisfaction ?? null;
  const ratesRevenue = official?.ratesRevenue ?? null;
  const population = entity.population;
  if (!satisfaction || !ratesRevenue || population == null || population <= 0) {
    return neutral("missing_required_inputs");
  }
  const ratesPerCapita = ratesRevenue / population;
  const ratesFactor = Math.max(
    0,
    Math.min(100, 100 - (ratesPerCapita - RATES_PER_CAPITA_BASELINE) / RATES_PER_CAPITA_DIVISOR)
  );
  return {
    score: round((satisfaction + ratesFactor) / 2, 1),
    confidence: "medium",
    sampleSize: 1,
    details: { ratesPerCapita: round(ratesPerCapita, 2) },
  };
}

export function responsivenessBucket(avgResolutionDays: number): number {
  for (const [maxDays, score] of RESPONSIVENESS_BUCKETS) {
    if (avgResolutionDays <= maxDays) return score;
  }
  return RESPONSIVENESS_FLOOR;
}

export function responsivenessScore(issues: IssueRecord[]): ComponentScore {
  if (issues.length === 0) return neutral("insufficient_data");
  // A zero-day resolution counts as "not recorded".
  const resolved = issues.filter((i) => i.status === "resolved" && !!i.resolutionTimeDays);
  if (resolved.length === 0) return neutral("no_resolved_issues");
  const avg = resolved.reduce((s, i) => s + (i.resolutionTimeDays ?? 0), 0) / resolved.length;
  return {
    score: responsivenessBucket(avg),
    confidence: gradeBySampleSize(resolved.length),
    sampleSize: resolved.length,
    details: { avgResolutionDays: round(avg, 1) },
  };
}

export type CompositeScoreInput = {
  entity: EntityRecord;
  official: OfficialMetrics | null;
  /** Unfiltered; moderation status and the rating window are applied here. */
  ratings: RatingRecord[];
  issues: IssueRecord[];
  now?: Date;
  ratingWindowDays?: number;
};

export function computeCompositeScore(input: CompositeScoreInput): CompositeScore {
  const now = input.now ?? new Date();
  const ratings = eligibleRatings(input.ratings, now, input.ratingWindowDays ?? DEFAULT_RATING_WINDOW_DAYS);

  const components: Record<ScoreComponentName, ComponentScore> = {
    customerSatisfaction: customerSatisfactionScore(ratings),
    serviceDelivery: serviceDeliveryScore(input.official, ratings),
    valueForRates: valueForRatesScore(input.entity, input.official),
    responsiveness: responsivenessScore(input.issues),
  };

  const weighted =
    (components.customerSatisfaction.score * SCORE_WEIGHT_PERCENT.customerSatisfaction +
      components.serviceDelivery.score * SCORE_WEIGHT_PERCENT.serviceDelivery +
      components.valueForRates.score * SCORE_WEIGHT_PERCENT.valueForRates +
      components.responsiveness.score * SCORE_WEIGHT_PERCENT.responsiveness) /
    100;

  return {
    overallScore: round(weighted, 1),
    components,
    overallConfidence: gradeBySignalCount(ratings.length + input.issues.length),
    sampleSizes: { ratings: ratings.length, issues: input.issues.length },
    computedAt: now.toISOString(),
  };
}
