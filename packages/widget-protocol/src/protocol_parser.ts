// @statuskit/widget-protocol
// Consumer-side parser: raw widget output -> WidgetDataV1.
//
// Mirrors how the dashboard reads a widget:
// - lines are trimmed, blank lines skipped
// - directive prefixes are case-insensitive
// - a table is inserted at the position it was opened, once a non-table
//   line (or the end of input) closes it
// - unknown lines are ignored

import type { ActionFlagV1, WidgetActionV1 } from "./schema/widget_action_v1";
import { ActionFlagV1Z } from "./schema/widget_action_v1";
import { isStatusStateV1 } from "./schema/status_v1";
import type {
  WidgetDataV1,
  WidgetDividerV1,
  WidgetMiniProgressV1,
  WidgetProgressV1,
  WidgetTableV1,
  WidgetTextRowV1
} from "./schema/widget_data_v1";
import { DEFAULT_REFRESH_INTERVAL } from "./schema/widget_data_v1";

// Row elements: the first match is extracted, every match is stripped.
const STATUS_RE = /\[status:(ok|info|warn|error)\]/i;
const PROGRESS_RE = /\[progress:(\d+)(?::([^:\]]+))?(?::(inline|chart))?\]/i;
const SPARKLINE_RE = /\[sparkline:([\d.,\s]+)(?::([^\]:]+))?(?::(\d+))?\]/i;
const MINI_PROGRESS_RE = /\[miniprogress:(\d+)(?::(\d+))?(?::([^\]]+))?\]/i;
const DIVIDER_RE = /\[divider(?::([^:]+))?(?::(\w+))?\]/i;
const GRAPH_RE = /\[graph:([\d.,\s]+)(?::([^\]:]+))?(?::([^\]:]+))?(?::([^\]:]+))?(?::(\d+))?\]/i;
const TABLE_HEADER_RE = /\[table:(.+)\]$/i;
const TABLE_ROW_RE = /\[tablerow:(.+)\]$/i;
const ACTION_FLAGS_RE = /^\[([^\]]+)\]\s*/;
const TIMEOUT_FLAG_RE = /^timeout=(\d+)$/i;
const INTEGER_RE = /^[+-]?\d+$/;

function startsWithDirective(line: string, prefix: string): boolean {
  return line.slice(0, prefix.length).toLowerCase() === prefix;
}

const DEFAULT_DIVIDER = "\u2500";

function stripAll(content: string, re: RegExp): string {
  return content.replace(new RegExp(re.source, "gi"), "");
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function parseDataPoints(values: string): number[] {
  return values
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0)
    .map((v) => {
      const n = Number(v);
      return Number.isFinite(n) ? n : 0; // Unparseable points render as 0.
    });
}

/**
 * Parses the body of a `row:` directive into a text row.
 */
export function parseRowContent(content: string): WidgetTextRowV1 {
  const row: WidgetTextRowV1 = { kind: "text", content };

  const statusMatch = STATUS_RE.exec(row.content);
  if (statusMatch) {
    const state = statusMatch[1].toLowerCase();
    if (isStatusStateV1(state)) row.status = state;
    row.content = stripAll(row.content, STATUS_RE).trim();
  }

  const progressMatch = PROGRESS_RE.exec(row.content);
  if (progressMatch) {
    // The second parameter is a style when it names one, otherwise a gradient.
    const progress: WidgetProgressV1 = { value: clamp(Number(progressMatch[1]), 0, 100), style: "inline" };
    const second = progressMatch[2];
    if (second !== undefined) {
      const lowered = second.toLowerCase();
      if (lowered === "inline" || lowered === "chart") progress.style = lowered;
      else progress.gradient = second;
    }
    const third = progressMatch[3];
    if (third !== undefined) progress.style = third.toLowerCase() === "chart" ? "chart" : "inline";
    row.progress = progress;
    row.content = stripAll(row.content, PROGRESS_RE).trim();
  }

  const sparklineMatch = SPARKLINE_RE.exec(row.content);
  if (sparklineMatch) {
    row.sparkline = parseDataPoints(sparklineMatch[1]);
    row.content = stripAll(row.content, SPARKLINE_RE);
  }

  const miniMatch = MINI_PROGRESS_RE.exec(row.content);
  if (miniMatch) {
    const mini: WidgetMiniProgressV1 = {
      value: clamp(Number(miniMatch[1]), 0, 100),
      width: miniMatch[2] !== undefined ? clamp(Number(miniMatch[2]), 3, 20) : 10
    };
    if (miniMatch[3] !== undefined) mini.gradient = miniMatch[3];
    row.miniProgress = mini;
    row.content = stripAll(row.content, MINI_PROGRESS_RE);
  }

  const dividerMatch = DIVIDER_RE.exec(row.content);
  if (dividerMatch) {
    const divider: WidgetDividerV1 = { character: dividerMatch[1] ?? DEFAULT_DIVIDER };
    if (dividerMatch[2] !== undefined) divider.color = dividerMatch[2];
    row.divider = divider;
    row.content = stripAll(row.content, DIVIDER_RE);
  }

  const graphMatch = GRAPH_RE.exec(row.content);
  if (graphMatch) {
    row.graph = parseDataPoints(graphMatch[1]);
    row.content = stripAll(row.content, GRAPH_RE);
  }

  row.content = row.content.trim();
  return row;
}

/**
 * Parses the body of an `action:` directive.
 *
 * Format: `[flag1,flag2,timeout=N] Label:command`. Returns null when the
 * label or command is missing. Unknown flags are dropped.
 */
export function parseActionContent(content: string): WidgetActionV1 | null {
  const flags: ActionFlagV1[] = [];
  let timeout: number | undefined;
  let working = content.trim();

  const flagMatch = ACTION_FLAGS_RE.exec(working);
  if (flagMatch) {
    for (const raw of flagMatch[1].split(",")) {
      const token = raw.trim();
      if (!token) continue;

      const timeoutMatch = TIMEOUT_FLAG_RE.exec(token);
      if (timeoutMatch) {
        timeout = Number(timeoutMatch[1]);
        continue;
      }

      const flag = ActionFlagV1Z.safeParse(token.toLowerCase());
      if (flag.success && !flags.includes(flag.data)) flags.push(flag.data);
    }
    working = working.slice(flagMatch[0].length).trim();
  }

  const colon = working.indexOf(":");
  if (colon < 0) return null;

  const label = working.slice(0, colon).trim();
  const command = working.slice(colon + 1).trim();
  if (!label || !command) return null;

  const action: WidgetActionV1 = { label, command, flags };
  if (timeout !== undefined) action.timeout = timeout;
  return action;
}

/**
 * Parses complete widget output into WidgetDataV1.
 */
export function parseWidgetOutput(output: string): WidgetDataV1 {
  const data: WidgetDataV1 = {
    title: "",
    refreshInterval: DEFAULT_REFRESH_INTERVAL,
    rows: [],
    actions: []
  };

  let currentTable: WidgetTableV1 | null = null;
  let tableStartIndex = -1;

  // Insert the open table where it started and reset table state.
  const closeTable = (): void => {
    if (currentTable && tableStartIndex >= 0) {
      data.rows.splice(tableStartIndex, 0, { kind: "table", table: currentTable });
    }
    currentTable = null;
    tableStartIndex = -1;
  };

  for (const rawLine of output.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    if (startsWithDirective(line, "title:")) {
      data.title = line.slice(6).trim();
      continue;
    }

    if (startsWithDirective(line, "refresh:")) {
      const value = line.slice(8).trim();
      if (INTEGER_RE.test(value)) data.refreshInterval = Number(value);
      continue;
    }

    if (startsWithDirective(line, "row:")) {
      closeTable();
      data.rows.push(parseRowContent(line.slice(4).trim()));
      continue;
    }

    if (startsWithDirective(line, "action:")) {
      closeTable();
      const action = parseActionContent(line.slice(7).trim());
      if (action) data.actions.push(action);
      continue;
    }

    const headerMatch = TABLE_HEADER_RE.exec(line);
    if (headerMatch) {
      closeTable();
      currentTable = { headers: headerMatch[1].split("|").map((h) => h.trim()), rows: [] };
      tableStartIndex = data.rows.length;
      continue;
    }

    const tableRowMatch = TABLE_ROW_RE.exec(line);
    if (tableRowMatch && currentTable) {
      currentTable.rows.push(tableRowMatch[1].split("|").map((v) => v.trim()));
      continue;
    }

    closeTable();
  }

  closeTable();
  return data;
}
