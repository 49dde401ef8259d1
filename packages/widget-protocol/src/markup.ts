// Inline markup embedded in row text.

import type { StatusStateV1 } from "./schema/status_v1";
import { StatusStateV1Z } from "./schema/status_v1";
import { SeriesValuesZ, SingleLineZ } from "./schema/directive_text_v1";

export function bold(text: string): string {
  return `[bold]${SingleLineZ.parse(text)}[/]`;
}

export function statusTag(state: StatusStateV1): string {
  return `[status:${StatusStateV1Z.parse(state)}]`;
}

export function sparkline(values: ReadonlyArray<number>): string {
  return `[sparkline:${SeriesValuesZ.parse([...values]).join(",")}]`;
}

export function graph(values: ReadonlyArray<number>): string {
  return `[graph:${SeriesValuesZ.parse([...values]).join(",")}]`;
}
