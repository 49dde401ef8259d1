// @statuskit/widget-renderer
// Widget configuration (v1).
//
// Replaces textual {{PLACEHOLDER}} substitution: the values a generator used to
// paste into the script are handed to the renderer as one validated struct.

import { z } from "zod";

import { RefreshIntervalZ, TitleTextZ } from "@statuskit/widget-protocol";

export const WidgetConfigV1Z = z
  .object({
    title: TitleTextZ, // Display name shown by the dashboard.
    description: z.string(), // Free text; diagnostics only.
    author: z.string(), // Free text; diagnostics only.
    refreshInterval: RefreshIntervalZ, // Seconds.
    outputFile: z.string().trim().min(1) // Script path the Refresh action re-invokes.
  })
  .strict();

export type WidgetConfigV1 = z.infer<typeof WidgetConfigV1Z>;

export function parseWidgetConfigV1(input: unknown): WidgetConfigV1 {
  return WidgetConfigV1Z.parse(input);
}
