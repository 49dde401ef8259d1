// @statuskit/widget-protocol
// Directive builders.
//
// Every protocol line a widget prints goes through one of these functions.
// Each builder validates its input and throws on text that would break the
// line-oriented protocol (newlines, stray delimiters).

import type { WidgetActionV1Input } from "./schema/widget_action_v1";
import { parseWidgetActionV1 } from "./schema/widget_action_v1";
import {
  RefreshIntervalZ,
  SingleLineZ,
  TableCellZ,
  TableHeadersZ,
  TitleTextZ
} from "./schema/directive_text_v1";

/** `title: <text>` */
export function titleDirective(text: string): string {
  return `title: ${TitleTextZ.parse(text)}`;
}

/** `refresh: <seconds>` */
export function refreshDirective(seconds: number): string {
  return `refresh: ${RefreshIntervalZ.parse(seconds)}`;
}

/**
 * `row: <text>`, or a bare `row:` for a blank spacer row.
 */
export function rowDirective(text: string = ""): string {
  const body = SingleLineZ.parse(text);
  return body === "" ? "row:" : `row: ${body}`;
}

/** `[table:H1|H2|...]` */
export function tableDirective(headers: ReadonlyArray<string>): string {
  return `[table:${TableHeadersZ.parse([...headers]).join("|")}]`;
}

/** `[tablerow:V1|V2|...]` */
export function tableRowDirective(cells: ReadonlyArray<string | number>): string {
  const parsed = cells.map((c) => TableCellZ.parse(String(c)));
  return `[tablerow:${parsed.join("|")}]`;
}

/**
 * `action: [flags] Label:command`
 *
 * The flag block is only written when the action carries flags or a timeout.
 */
export function actionDirective(action: WidgetActionV1Input): string {
  const a = parseWidgetActionV1(action);

  const flagTokens: string[] = [...a.flags];
  if (a.timeout !== undefined) flagTokens.push(`timeout=${a.timeout}`);

  const prefix = flagTokens.length > 0 ? `[${flagTokens.join(",")}] ` : "";
  return `action: ${prefix}${a.label}:${a.command}`;
}
