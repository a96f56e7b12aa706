/**
 * Complaint spike detection: issues in the trailing window vs the window before it.
 * A 4x increase saturates the score at 100.
 */

import type { IssueRecord, RedFlagIndex } from "./metricContract";

export const DEFAULT_RED_FLAG_WINDOW_DAYS = 90;
/** spikeRatio multiplier when there is no baseline window to compare against. */
export const NO_BASELINE_MULTIPLIER = 2;
export const SPIKE_SCORE_FACTOR = 25;
export const RED_FLAG_MEDIUM_CONFIDENCE_MIN = 10;

const DAY_MS = 24 * 60 * 60 * 1000;

export function spikeScore(spikeRatio: number): number {
  return Math.min(100, spikeRatio * SPIKE_SCORE_FACTOR);
}

export function computeRedFlagIndex(
  issues: IssueRecord[],
  now: Date = new Date(),
  windowDays: number = DEFAULT_RED_FLAG_WINDOW_DAYS
): RedFlagIndex {
  const recentStart = now.getTime() - windowDays * DAY_MS;
  const previousStart = now.getTime() - 2 * windowDays * DAY_MS;

  let recentCount = 0;
  let previousCount = 0;
  for (const issue of issues) {
    const t = Date.parse(issue.createdAt);
    if (Number.isNaN(t)) continue;
    if (t >= recentStart) recentCount += 1;
    else if (t >= previousStart) previousCount += 1;
  }

  const spikeRatio = previousCount === 0 ? recentCount * NO_BASELINE_MULTIPLIER : recentCount / previousCount;

  return {
    recentCount,
    previousCount,
    spikeRatio: Math.round(spikeRatio * 100) / 100,
    score: Math.round(spikeScore(spikeRatio) * 10) / 10,
    confidence: recentCount + previousCount >= RED_FLAG_MEDIUM_CONFIDENCE_MIN ? "medium" : "low",
  };
}
