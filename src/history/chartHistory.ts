import type { ChartHistory, RandomSource } from "../types.js";
import { ON_CURRENT_RANGE, ON_VOLTAGE_RANGE, sampleReal } from "../engine/electrical.js";
import { formatHourLabel } from "../utils/time.js";

export const HISTORY_POINTS = 6;

const HOUR_MS = 60 * 60 * 1000;

/**
 * Illustrative voltage/current series for the dashboard charts.
 * Nothing is stored: every call draws fresh values for the six hours before `now`.
 */
export function buildChartHistory(params: {
  now: Date;
  timezone: string;
  random: RandomSource;
  points?: number;
}): ChartHistory {
  const points = params.points ?? HISTORY_POINTS;
  const labels = Array.from({ length: points }, (_, i) =>
    formatHourLabel(new Date(params.now.getTime() - (points - i) * HOUR_MS), params.timezone)
  );

  const voltage = labels.map(() => sampleReal(ON_VOLTAGE_RANGE, params.random));
  const current = labels.map(() => sampleReal(ON_CURRENT_RANGE, params.random));

  return {
    voltage: { labels, data: voltage },
    current: { labels: [...labels], data: current }
  };
}
