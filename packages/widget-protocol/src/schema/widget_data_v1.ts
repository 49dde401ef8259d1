// Parsed view of a widget's output, as the dashboard sees it.

import type { StatusStateV1 } from "./status_v1";
import type { WidgetActionV1 } from "./widget_action_v1";

export type WidgetTableV1 = {
  headers: string[];
  rows: string[][];
};

export type WidgetProgressV1 = {
  value: number; // 0-100
  style: "inline" | "chart";
  gradient?: string;
};

export type WidgetMiniProgressV1 = {
  value: number; // 0-100
  width: number; // 3-20 cells
  gradient?: string;
};

export type WidgetDividerV1 = {
  character: string;
  color?: string;
};

export type WidgetTextRowV1 = {
  kind: "text";
  content: string; // Row text with every extracted element tag removed.
  status?: StatusStateV1;
  progress?: WidgetProgressV1;
  sparkline?: number[];
  miniProgress?: WidgetMiniProgressV1;
  divider?: WidgetDividerV1;
  graph?: number[];
};

export type WidgetTableRowV1 = {
  kind: "table";
  table: WidgetTableV1;
};

export type WidgetRowV1 = WidgetTextRowV1 | WidgetTableRowV1;

export type WidgetDataV1 = {
  title: string;
  refreshInterval: number;
  rows: WidgetRowV1[];
  actions: WidgetActionV1[];
};

export const DEFAULT_REFRESH_INTERVAL = 5; // Used when no valid refresh: directive is present.
