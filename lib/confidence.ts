/**
 * Confidence grading shared by the scoring components.
 */

import type { ConfidenceGrade } from "./metricContract";

/** Minimum sample size per grade (component-level: ratings, resolved issues). */
export const SAMPLE_SIZE_THRESHOLDS = { high: 30, medium: 10, low: 3 } as const;

/** Minimum total signal count (ratings + issues) per grade for the overall score. */
export const SIGNAL_COUNT_THRESHOLDS = { high: 50, medium: 20, low: 5 } as const;

type Thresholds = { high: number; medium: number; low: number };

function grade(count: number, t: Thresholds): ConfidenceGrade {
  if (count >= t.high) return "high";
  if (count >= t.medium) return "medium";
  if (count >= t.low) return "low";
  return "very_low";
}

export function gradeBySampleSize(sampleSize: number): ConfidenceGrade {
  return grade(sampleSize, SAMPLE_SIZE_THRESHOLDS);
}

export function gradeBySignalCount(signalCount: number): ConfidenceGrade {
  return grade(signalCount, SIGNAL_COUNT_THRESHOLDS);
}
