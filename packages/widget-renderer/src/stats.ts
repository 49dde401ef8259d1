export type WidgetStats = {
  average: number; // floor(sum / samples)
  minimum: number;
  maximum: number;
  samples: number;
};

/**
 * Summary statistics over a sample series.
 *
 * The average is floor division, kept as the widget has always reported it
 * (41.5 is shown as 41).
 *
 * @throws Error when the series is empty.
 */
export function computeStats(series: ReadonlyArray<number>): WidgetStats {
  if (series.length === 0) throw new Error("sample series is empty");

  let sum = 0;
  let minimum = series[0];
  let maximum = series[0];
  for (const v of series) {
    sum += v;
    if (v < minimum) minimum = v;
    if (v > maximum) maximum = v;
  }

  return {
    average: Math.floor(sum / series.length),
    minimum,
    maximum,
    samples: series.length
  };
}
