import { roundToTenth } from '../lib/math';
import type { GrowthEntry } from '../types/stats';

export type MetricValues = Readonly<Record<string, number | null | undefined>>;

/**
 * Percentage change per metric from `prev` to `curr`, rounded to one decimal.
 * A metric whose previous value is zero or missing has no baseline and is null.
 */
export function calculateGrowth(
  prev: MetricValues,
  curr: MetricValues,
  metrics: readonly string[]
): GrowthEntry {
  const growth: GrowthEntry = {};

  for (const metric of metrics) {
    const prevValue = prev[metric];
    const currValue = curr[metric] ?? 0;

    if (!prevValue) {
      growth[metric] = null;
      continue;
    }

    growth[metric] = roundToTenth(((currValue - prevValue) / Math.abs(prevValue)) * 100);
  }

  return growth;
}
