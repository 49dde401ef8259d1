import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";
import { describe, it } from "node:test";

import { parseWidgetOutput } from "@statuskit/widget-protocol";

import type { WidgetIo } from "../main";
import { runWidget } from "../main";

function captureIo(): WidgetIo & { outLines: string[]; errLines: string[] } {
  const outLines: string[] = [];
  const errLines: string[] = [];
  return {
    outLines,
    errLines,
    out: (line) => outLines.push(line),
    err: (line) => errLines.push(line)
  };
}

describe("runWidget", () => {
  it("prints the compact widget by default", () => {
    const io = captureIo();
    runWidget(["ignored-arg"], { io });

    assert.deepStrictEqual(io.outLines, [
      "title: Sample Metric",
      "refresh: 5",
      "row: [status:ok] Current: 42",
      "row: [sparkline:30,35,40,42,45,50,48,42]",
      "row: Average: 41",
      "action: Refresh:npx tsx apps/widget/src/main.ts"
    ]);
    assert.deepStrictEqual(io.errLines, []);
  });

  it("prints the extended widget and verbose diagnostics on stderr only", () => {
    const io = captureIo();
    runWidget(["--verbose", "--extended"], { io });

    assert.strictEqual(io.outLines.length, 15);
    assert.strictEqual(io.outLines[9], "[table:Metric|Value]");
    assert.strictEqual(io.outLines[10], "[tablerow:Average|41]");
    assert.deepStrictEqual(io.errLines, [
      "INFO: widget title=Sample Metric author=statuskit",
      "INFO: widget description=Hard-coded sample trace for dashboard layout checks",
      "INFO: mode=extended refresh=5"
    ]);
  });

  it("prints one error row after the header when rendering fails", () => {
    const io = captureIo();
    runWidget([], { io, sample: { current: 42, history: [] } });

    assert.deepStrictEqual(io.outLines, [
      "title: Sample Metric",
      "refresh: 5",
      "row: [status:error] Error: sample series is empty"
    ]);
    assert.deepStrictEqual(io.errLines, ["FAIL: widget render failed: sample series is empty"]);
  });

  it("prints a lone error row when the config is invalid", () => {
    const io = captureIo();
    runWidget(["--extended"], {
      io,
      config: { title: "", description: "", author: "", refreshInterval: 5, outputFile: "widget.ts" }
    });

    assert.deepStrictEqual(io.outLines, ["row: [status:error] Error: title: title must not be empty"]);
    assert.deepStrictEqual(io.errLines, ["FAIL: widget config invalid: title: title must not be empty"]);
  });

  it("points the Refresh action at this entry's source, run through tsx", () => {
    const io = captureIo();
    runWidget([], { io });

    const [refresh] = parseWidgetOutput(io.outLines.join("\n")).actions;
    assert.strictEqual(refresh.label, "Refresh");
    assert.ok(refresh.command.startsWith("npx tsx "), `unexpected command: ${refresh.command}`);

    // Commands run from the repository root.
    const repoRoot = path.resolve(__dirname, "../../../..");
    const entry = path.resolve(repoRoot, refresh.command.slice("npx tsx ".length));
    assert.strictEqual(entry, path.resolve(__dirname, "../main.ts"));
    assert.ok(fs.existsSync(entry));
  });
});
