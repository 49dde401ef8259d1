export type WidgetMode = "compact" | "extended";

export const EXTENDED_FLAG = "--extended";

/**
 * Extended iff the flag appears anywhere in argv; every other token is ignored.
 */
export function selectMode(argv: ReadonlyArray<string>): WidgetMode {
  return argv.includes(EXTENDED_FLAG) ? "extended" : "compact";
}
