import { z } from "zod";

// One run's worth of readings: the latest value plus the history trace.
// Emptiness of the history is checked by computeStats, not here.
export const WidgetSampleV1Z = z
  .object({
    current: z.number().int(),
    history: z.array(z.number().int())
  })
  .strict();

export type WidgetSampleV1 = z.infer<typeof WidgetSampleV1Z>;

export function parseWidgetSampleV1(input: unknown): WidgetSampleV1 {
  return WidgetSampleV1Z.parse(input);
}
