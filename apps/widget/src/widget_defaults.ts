// Values this widget instance was generated with.

import type { WidgetConfigV1, WidgetSampleV1 } from "@statuskit/widget-renderer";
import { parseWidgetConfigV1, parseWidgetSampleV1 } from "@statuskit/widget-renderer";

export const DEFAULT_WIDGET_CONFIG: WidgetConfigV1 = parseWidgetConfigV1({
  title: "Sample Metric",
  description: "Hard-coded sample trace for dashboard layout checks",
  author: "statuskit",
  refreshInterval: 5,
  outputFile: "apps/widget/src/main.ts"
});

// Replace with real collection; the renderer only needs { current, history }.
export const DEFAULT_WIDGET_SAMPLE: WidgetSampleV1 = parseWidgetSampleV1({
  current: 42,
  history: [30, 35, 40, 42, 45, 50, 48, 42]
});
