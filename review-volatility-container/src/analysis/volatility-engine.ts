/**
 * Volatility Engine
 *
 * Weekly pain-review counts, their linear trend (slope) and the change in
 * trend between the most recent window and the one before it (slope delta).
 * Insufficient data always yields 0 rather than an error.
 */

import { isoWeekOf, isoWeekRange } from '../processing/dates';
import type { MomentumLabel, ReviewMatch, VolatilitySignal } from '../types';

export interface WeeklyCount {
  weekLabel: string;
  count: number;
}

export interface VolatilityOptions {
  /** Weeks per window when comparing recent vs prior slope. */
  windowWeeks: number;
}

export class VolatilityEngine {
  private windowWeeks: number;

  constructor(options: VolatilityOptions) {
    this.windowWeeks = options.windowWeeks;
  }

  analyze(matches: ReviewMatch[]): VolatilitySignal {
    const slope = this.calculateSlope(matches);
    const { recentSlope, priorSlope, delta } = this.calculateSlopeDelta(matches);
    const momentum = deriveMomentum(slope, delta);

    return {
      slope,
      slopeDelta: delta,
      recentSlope,
      priorSlope,
      momentum,
      insight: momentumInsight(momentum, delta),
    };
  }

  /**
   * Pain-review count per ISO week, gap-filled from the first to the last pain week
   */
  weeklyPainCounts(matches: ReviewMatch[]): WeeklyCount[] {
    const pain = matches.filter((match) => match.hasPain);
    if (pain.length === 0) {
      return [];
    }

    const counts = new Map<string, number>();
    let first = pain[0].review.date;
    let last = pain[0].review.date;
    for (const match of pain) {
      const date = match.review.date;
      const label = isoWeekOf(date).label;
      counts.set(label, (counts.get(label) ?? 0) + 1);
      if (date < first) first = date;
      if (date > last) last = date;
    }

    return isoWeekRange(first, last).map((week) => ({
      weekLabel: week.label,
      count: counts.get(week.label) ?? 0,
    }));
  }

  /**
   * Least-squares slope of weekly pain count against week index
   */
  calculateSlope(matches: ReviewMatch[]): number {
    const painReviews = matches.filter((match) => match.hasPain).length;
    if (painReviews < 2) {
      return 0;
    }

    const weekly = this.weeklyPainCounts(matches);
    if (weekly.length < 2) {
      return 0;
    }

    return linearSlope(weekly.map((week) => week.count));
  }

  /**
   * Slope of the last `windowWeeks` weeks minus slope of the window before.
   * Positive = decline accelerating.
   */
  calculateSlopeDelta(matches: ReviewMatch[]): { recentSlope: number; priorSlope: number; delta: number } {
    const neutral = { recentSlope: 0, priorSlope: 0, delta: 0 };
    if (matches.filter((match) => match.hasPain).length < 2) {
      return neutral;
    }

    const counts = this.weeklyPainCounts(matches).map((week) => week.count);
    if (counts.length < 2) {
      return neutral;
    }

    const recent = counts.slice(-this.windowWeeks);
    const prior = counts.slice(-2 * this.windowWeeks, -this.windowWeeks);
    const recentSlope = recent.length >= 2 ? linearSlope(recent) : 0;
    const priorSlope = prior.length >= 2 ? linearSlope(prior) : 0;

    return { recentSlope, priorSlope, delta: recentSlope - priorSlope };
  }
}

/**
 * First-degree least-squares fit of values against their index; returns the slope.
 */
export function linearSlope(values: number[]): number {
  const n = values.length;
  if (n < 2) {
    return 0;
  }

  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, value) => sum + value, 0) / n;

  let numerator = 0;
  let denominator = 0;
  values.forEach((value, x) => {
    numerator += (x - meanX) * (value - meanY);
    denominator += (x - meanX) ** 2;
  });

  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Momentum label from slope and slope delta.
 *
 * A positive slope between 0.05 and 0.1, or above 0.1 with a zero delta,
 * matches none of the named trends and is reported as Drifting.
 */
export function deriveMomentum(slope: number, delta: number): MomentumLabel {
  if (slope > 0.1 && delta > 0) {
    return 'Accelerating';
  }
  if (slope > 0.1 && delta < 0) {
    return 'Decelerating';
  }
  if (slope >= -0.05 && slope <= 0.05) {
    return 'Stabilizing';
  }
  if (slope < -0.05) {
    return 'Improving';
  }
  return 'Drifting';
}

export function momentumInsight(momentum: MomentumLabel, delta: number): string {
  const change = Math.abs(delta).toFixed(2);
  switch (momentum) {
    case 'Accelerating':
      return `Decline is accelerating: weekly pain growth rose by ${change} reviews/week versus the prior window.`;
    case 'Decelerating':
      return `Decline is slowing: weekly pain growth fell by ${change} reviews/week versus the prior window.`;
    case 'Stabilizing':
      return 'Pain volume is flat week over week.';
    case 'Improving':
      return 'Pain volume is trending down.';
    case 'Drifting':
      return 'Pain volume is creeping up without a clear change in pace.';
  }
}
