import { z } from "zod";

import { SingleLineZ } from "./directive_text_v1";

export const ActionFlagV1Z = z.enum(["danger", "refresh", "sudo"]); // Boolean flags; timeout=N is carried separately.

export type ActionFlagV1 = z.infer<typeof ActionFlagV1Z>;

export const WidgetActionV1Z = z
  .object({
    label: SingleLineZ.pipe(z.string().trim().min(1)).refine((s) => !s.includes(":"), {
      message: "action label must not contain ':'" // The first ':' separates label from command.
    }),
    command: SingleLineZ.pipe(z.string().trim().min(1)),
    flags: z.array(ActionFlagV1Z).default([]),
    timeout: z.number().int().nonnegative().optional() // Seconds; 0 means no timeout.
  })
  .strict();

export type WidgetActionV1 = z.infer<typeof WidgetActionV1Z>;
export type WidgetActionV1Input = z.input<typeof WidgetActionV1Z>;

export function parseWidgetActionV1(input: unknown): WidgetActionV1 {
  return WidgetActionV1Z.parse(input);
}
