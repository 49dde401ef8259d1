import { z } from "zod";

export const StatusStateV1Z = z.enum(["ok", "info", "warn", "error"]); // Closed set understood by the dashboard.

export type StatusStateV1 = z.infer<typeof StatusStateV1Z>;

export function isStatusStateV1(input: string): input is StatusStateV1 {
  return StatusStateV1Z.safeParse(input).success;
}
