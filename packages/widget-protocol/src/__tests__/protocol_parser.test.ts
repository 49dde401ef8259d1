import assert from "node:assert";
import { describe, it } from "node:test";

import { parseActionContent, parseRowContent, parseWidgetOutput } from "../index";

const EXTENDED_OUTPUT = [
  "title: Sample Metric",
  "refresh: 5",
  "row: [bold]Current Status[/]",
  "row: [status:ok] Value: 42",
  "row:",
  "row: [bold]History Graph[/]",
  "row: [graph:30,35,40]",
  "row:",
  "row: [bold]Statistics[/]",
  "[table:Metric|Value]",
  "[tablerow:Average|35]",
  "[tablerow:Samples|3]",
  "action: Refresh:node widget.js"
].join("\n");

describe("parseWidgetOutput", () => {
  it("reads header, rows, table and action of an extended widget", () => {
    const data = parseWidgetOutput(EXTENDED_OUTPUT);

    assert.strictEqual(data.title, "Sample Metric");
    assert.strictEqual(data.refreshInterval, 5);
    assert.deepStrictEqual(data.rows, [
      { kind: "text", content: "[bold]Current Status[/]" },
      { kind: "text", content: "Value: 42", status: "ok" },
      { kind: "text", content: "" },
      { kind: "text", content: "[bold]History Graph[/]" },
      { kind: "text", content: "", graph: [30, 35, 40] },
      { kind: "text", content: "" },
      { kind: "text", content: "[bold]Statistics[/]" },
      {
        kind: "table",
        table: {
          headers: ["Metric", "Value"],
          rows: [
            ["Average", "35"],
            ["Samples", "3"]
          ]
        }
      }
    ]);
    assert.deepStrictEqual(data.actions, [{ label: "Refresh", command: "node widget.js", flags: [] }]);
  });

  it("inserts a table where it was opened", () => {
    const data = parseWidgetOutput("row: first\n[table:A]\n[tablerow:x]\nrow: after");
    assert.deepStrictEqual(data.rows, [
      { kind: "text", content: "first" },
      { kind: "table", table: { headers: ["A"], rows: [["x"]] } },
      { kind: "text", content: "after" }
    ]);
  });

  it("closes a table at end of input", () => {
    const data = parseWidgetOutput("[table:A|B]\n[tablerow:1|2]\n");
    assert.deepStrictEqual(data.rows, [{ kind: "table", table: { headers: ["A", "B"], rows: [["1", "2"]] } }]);
  });

  it("ignores a tablerow with no open table", () => {
    assert.deepStrictEqual(parseWidgetOutput("[tablerow:1|2]").rows, []);
  });

  it("matches prefixes case-insensitively and keeps the default refresh on junk", () => {
    const data = parseWidgetOutput("TITLE: Disk\r\nrefresh: soon\r\n");
    assert.strictEqual(data.title, "Disk");
    assert.strictEqual(data.refreshInterval, 5);
  });
});

describe("parseRowContent", () => {
  it("extracts a status tag regardless of case", () => {
    assert.deepStrictEqual(parseRowContent("[status:WARN] Disk 91%"), {
      kind: "text",
      content: "Disk 91%",
      status: "warn"
    });
  });

  it("extracts sparkline values and drops color/width parameters", () => {
    assert.deepStrictEqual(parseRowContent("Load [sparkline:1,2,3:green:20]"), {
      kind: "text",
      content: "Load",
      sparkline: [1, 2, 3]
    });
  });

  it("strips every repeat of an element tag but keeps the first values", () => {
    assert.deepStrictEqual(parseRowContent("mid [sparkline:1,2] and [sparkline:3,4] end"), {
      kind: "text",
      content: "mid  and  end",
      sparkline: [1, 2]
    });
  });

  it("reads a progress style given as the second parameter", () => {
    assert.deepStrictEqual(parseRowContent("CPU [progress:75:chart]"), {
      kind: "text",
      content: "CPU",
      progress: { value: 75, style: "chart" }
    });
  });

  it("clamps progress and keeps a gradient ahead of the style", () => {
    assert.deepStrictEqual(parseRowContent("[progress:150:warm:inline] Load"), {
      kind: "text",
      content: "Load",
      progress: { value: 100, style: "inline", gradient: "warm" }
    });
  });

  it("clamps mini progress width", () => {
    assert.deepStrictEqual(parseRowContent("[miniprogress:40:30:cool] Mem"), {
      kind: "text",
      content: "Mem",
      miniProgress: { value: 40, width: 20, gradient: "cool" }
    });
  });

  it("reads dividers with and without parameters", () => {
    assert.deepStrictEqual(parseRowContent("[divider]"), {
      kind: "text",
      content: "",
      divider: { character: "\u2500" }
    });
    assert.deepStrictEqual(parseRowContent("[divider:=:red]"), {
      kind: "text",
      content: "",
      divider: { character: "=", color: "red" }
    });
  });
});

describe("parseActionContent", () => {
  it("reads known flags and timeout, dropping unknown flags", () => {
    assert.deepStrictEqual(parseActionContent("[danger, SUDO, timeout=30, bogus] Restart all:docker restart web"), {
      label: "Restart all",
      command: "docker restart web",
      flags: ["danger", "sudo"],
      timeout: 30
    });
  });

  it("returns null without a label or command", () => {
    assert.strictEqual(parseActionContent("no separator"), null);
    assert.strictEqual(parseActionContent(":cmd"), null);
    assert.strictEqual(parseActionContent("Label:"), null);
  });
});
