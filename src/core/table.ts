import { parse } from "csv-parse/sync";
import stringWidth from "string-width";
import { z } from "zod";
import { DataFormatError, errorMessage } from "./errors.js";
import type { DataTable } from "../types/index.js";

const RecordsSchema = z.array(z.array(z.string()));

export interface ParseTableOptions {
  delimiter?: string;
}

/**
 * Parse delimited text into a table. The first record is the header.
 */
export function parseTable(text: string, options: ParseTableOptions = {}): DataTable {
  let records: unknown;
  try {
    records = parse(text, {
      delimiter: options.delimiter ?? ",",
      skip_empty_lines: true,
      bom: true,
    });
  } catch (error) {
    throw new DataFormatError(`Could not parse data: ${errorMessage(error)}`, { cause: error });
  }

  const checked = RecordsSchema.safeParse(records);
  if (!checked.success) {
    throw new DataFormatError("Could not parse data: unexpected record shape");
  }

  const [columns, ...rows] = checked.data;
  if (!columns || columns.length === 0) {
    throw new DataFormatError("Could not parse data: no columns to parse");
  }

  return { columns, rows };
}

/**
 * Render a table as aligned plain text with a leading row-index column.
 *
 * ```
 *     name  age
 * 0  alice   30
 * 1    bob    7
 * ```
 */
export function renderTable(table: DataTable): string {
  if (table.rows.length === 0) {
    return `Empty table\nColumns: [${table.columns.join(", ")}]`;
  }

  const indexWidth = String(table.rows.length - 1).length;
  const widths = table.columns.map((column, col) =>
    table.rows.reduce((width, row) => Math.max(width, stringWidth(row[col] ?? "")), stringWidth(column))
  );

  const header =
    " ".repeat(indexWidth) +
    table.columns.map((column, col) => "  " + alignRight(column, widths[col] ?? 0)).join("");

  const lines = table.rows.map(
    (row, i) =>
      String(i).padEnd(indexWidth) +
      table.columns.map((_, col) => "  " + alignRight(row[col] ?? "", widths[col] ?? 0)).join("")
  );

  return [header, ...lines].join("\n");
}

/** Pad on the left to a display width (wide characters take two columns) */
function alignRight(text: string, width: number): string {
  return " ".repeat(Math.max(0, width - stringWidth(text))) + text;
}
