// @statuskit/widget-renderer
// Pure widget rendering.
//
// render() never throws: any failure while building the lines comes back as
// { ok: false, error }. Printing is the caller's job.
//
// No IO. Same config + mode + sample => identical lines.

import { ZodError } from "zod";

import {
  actionDirective,
  bold,
  graph,
  refreshDirective,
  rowDirective,
  sparkline,
  statusTag,
  tableDirective,
  tableRowDirective,
  titleDirective
} from "@statuskit/widget-protocol";

import type { WidgetConfigV1 } from "./config/widget_config_v1";
import { parseWidgetConfigV1 } from "./config/widget_config_v1";
import type { WidgetMode } from "./mode";
import type { WidgetSampleV1 } from "./sample/widget_sample_v1";
import { parseWidgetSampleV1 } from "./sample/widget_sample_v1";
import { computeStats } from "./stats";
import { classifyStatus } from "./status";

export type RenderResult =
  | { ok: true; lines: ReadonlyArray<string> }
  | { ok: false; error: string };

export interface WidgetRenderer {
  readonly config: WidgetConfigV1;
  render(mode: WidgetMode, sample: WidgetSampleV1): RenderResult;
  outputLines(result: RenderResult): ReadonlyArray<string>;
}

export const REFRESH_ACTION_LABEL = "Refresh";
export const REFRESH_RUNTIME = "npx tsx"; // Runs outputFile from its TypeScript source.

/**
 * Flattens a thrown value to a single-line message.
 */
export function errorMessage(e: unknown): string {
  let msg: string;
  if (e instanceof ZodError) {
    // Zod's own message is multi-line JSON; keep path + message per issue.
    msg = e.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
  } else if (e instanceof Error) {
    msg = e.message;
  } else {
    msg = String(e);
  }
  return msg.replace(/\s*[\r\n]+\s*/g, " ");
}

/** `row: [status:error] Error: <message>` */
export function formatRenderError(message: string): string {
  return rowDirective(`${statusTag("error")} Error: ${errorMessage(message)}`);
}

export function headerLines(config: WidgetConfigV1): string[] {
  return [titleDirective(config.title), refreshDirective(config.refreshInterval)];
}

function refreshActionLine(config: WidgetConfigV1): string {
  return actionDirective({
    label: REFRESH_ACTION_LABEL,
    command: `${REFRESH_RUNTIME} ${config.outputFile}`
  });
}

function compactBody(sample: WidgetSampleV1): string[] {
  const status = classifyStatus(sample.current);
  const stats = computeStats(sample.history);
  return [
    rowDirective(`${statusTag(status)} Current: ${sample.current}`),
    rowDirective(sparkline(sample.history)),
    rowDirective(`Average: ${stats.average}`)
  ];
}

function extendedBody(sample: WidgetSampleV1): string[] {
  const status = classifyStatus(sample.current);
  const stats = computeStats(sample.history);
  return [
    rowDirective(bold("Current Status")),
    rowDirective(`${statusTag(status)} Value: ${sample.current}`),

    rowDirective(),
    rowDirective(bold("History Graph")),
    rowDirective(graph(sample.history)),

    rowDirective(),
    rowDirective(bold("Statistics")),
    tableDirective(["Metric", "Value"]),
    tableRowDirective(["Average", stats.average]),
    tableRowDirective(["Minimum", stats.minimum]),
    tableRowDirective(["Maximum", stats.maximum]),
    tableRowDirective(["Samples", stats.samples])
  ];
}

function renderLines(config: WidgetConfigV1, mode: WidgetMode, input: WidgetSampleV1): string[] {
  const sample = parseWidgetSampleV1(input);
  const body = mode === "extended" ? extendedBody(sample) : compactBody(sample);
  return [...headerLines(config), ...body, refreshActionLine(config)];
}

/**
 * Creates a renderer bound to a validated config.
 *
 * @throws ZodError when the config is invalid.
 */
export function createWidgetRenderer(config: WidgetConfigV1): WidgetRenderer {
  const cfg = Object.freeze(parseWidgetConfigV1(config));

  return {
    config: cfg,

    render(mode: WidgetMode, sample: WidgetSampleV1): RenderResult {
      try {
        return { ok: true, lines: Object.freeze(renderLines(cfg, mode, sample)) };
      } catch (e) {
        return { ok: false, error: errorMessage(e) };
      }
    },

    // The header goes out ahead of the error row, as it would have been
    // printed before the failing step.
    outputLines(result: RenderResult): ReadonlyArray<string> {
      if (result.ok) return result.lines;
      return [...headerLines(cfg), formatRenderError(result.error)];
    }
  };
}

/**
 * One-shot render that never throws, including on an invalid config.
 */
export function renderWidget(config: WidgetConfigV1, mode: WidgetMode, sample: WidgetSampleV1): RenderResult {
  try {
    return createWidgetRenderer(config).render(mode, sample);
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}
