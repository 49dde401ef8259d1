#!/usr/bin/env -S npx tsx
// @statuskit/widget
// CLI entry: argv -> mode -> render -> stdout.
//
// Usage: statuskit-widget [--extended] [--verbose]
// Other arguments are ignored. The process always exits 0; a failed render
// is reported as a status:error row.

import type { WidgetConfigV1, WidgetRenderer, WidgetSampleV1 } from "@statuskit/widget-renderer";
import { createWidgetRenderer, errorMessage, formatRenderError, selectMode } from "@statuskit/widget-renderer";

import type { LineSink } from "./log";
import { createWidgetLog } from "./log";
import { DEFAULT_WIDGET_CONFIG, DEFAULT_WIDGET_SAMPLE } from "./widget_defaults";

export const VERBOSE_FLAG = "--verbose";

export type WidgetIo = {
  out: LineSink; // Protocol lines.
  err: LineSink; // Diagnostics.
};

export type RunWidgetOptions = {
  io?: WidgetIo;
  config?: WidgetConfigV1;
  sample?: WidgetSampleV1;
};

const consoleIo: WidgetIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

export function runWidget(argv: ReadonlyArray<string>, options: RunWidgetOptions = {}): void {
  const io = options.io ?? consoleIo;
  const config = options.config ?? DEFAULT_WIDGET_CONFIG;
  const sample = options.sample ?? DEFAULT_WIDGET_SAMPLE;

  const log = createWidgetLog(io.err, argv.includes(VERBOSE_FLAG));
  const mode = selectMode(argv);

  let renderer: WidgetRenderer;
  try {
    renderer = createWidgetRenderer(config);
  } catch (e) {
    // No valid title to head the output with: the error row stands alone.
    const message = errorMessage(e);
    log.fail(`widget config invalid: ${message}`);
    io.out(formatRenderError(message));
    return;
  }

  log.info(`widget title=${renderer.config.title} author=${renderer.config.author}`);
  log.info(`widget description=${renderer.config.description}`);
  log.info(`mode=${mode} refresh=${renderer.config.refreshInterval}`);

  const result = renderer.render(mode, sample);
  if (!result.ok) log.fail(`widget render failed: ${result.error}`);

  for (const line of renderer.outputLines(result)) io.out(line);
}

function main(): void {
  runWidget(process.argv.slice(2));
}

if (require.main === module) main();
