// @statuskit/widget-protocol
// Text constraints shared by the directive builders.
//
// A directive is exactly one line; table cells and headers are split on "|"
// and closed by "]", so neither may appear inside a cell.

import { z } from "zod";

export const SingleLineZ = z
  .string()
  .refine((s) => !/[\r\n]/.test(s), { message: "directive text must be a single line" });

export const TitleTextZ = SingleLineZ.pipe(z.string().trim().min(1, "title must not be empty"));

export const RefreshIntervalZ = z.number().int().positive(); // Seconds between refreshes.

export const TableCellZ = SingleLineZ.refine((s) => !s.includes("|") && !s.includes("]"), {
  message: "table cell must not contain '|' or ']'"
});

export const TableHeadersZ = z.array(TableCellZ).min(1, "table needs at least one column");

export const SeriesValuesZ = z.array(z.number().finite()); // Sparkline/graph values: finite numbers only.
