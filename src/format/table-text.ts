import type { ParsedTable } from "../parsing/table.js";
import { normalizeTable } from "../parsing/table.js";

const COLUMN_GAP = "  ";

const formatRow = ({ cells, widths }: { cells: readonly string[]; widths: readonly number[] }): string =>
  cells
    .map((cell, idx) => cell.padEnd(widths[idx] ?? cell.length))
    .join(COLUMN_GAP)
    .trimEnd();

/** Renders a parsed table as left-aligned columns followed by its footer. */
export const renderTableText = ({ table }: { table: ParsedTable }): string => {
  const normalized = normalizeTable({ table });
  const lines: string[] = [];
  if (normalized.headers.length > 0) {
    const widths = normalized.headers.map((header, idx) =>
      normalized.rows.reduce((width, row) => Math.max(width, (row[idx] ?? "").length), header.length),
    );
    lines.push(formatRow({ cells: normalized.headers, widths }));
    lines.push(widths.map((width) => "-".repeat(width)).join(COLUMN_GAP));
    for (const row of normalized.rows) {
      lines.push(formatRow({ cells: row, widths }));
    }
  }
  if (normalized.footer.length > 0) {
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(normalized.footer);
  }
  return lines.join("\n");
};
