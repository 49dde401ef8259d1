import type { StatusStateV1 } from "@statuskit/widget-protocol";

export const STATUS_THRESHOLD = 80;

export type WidgetStatus = Extract<StatusStateV1, "ok" | "error">;

export function classifyStatus(current: number, threshold: number = STATUS_THRESHOLD): WidgetStatus {
  return current < threshold ? "ok" : "error";
}
