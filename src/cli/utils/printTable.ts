/**
 * Plain-text tables for CLI output
 */

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

function visibleLength(str: string): number {
  return str.replace(ANSI_PATTERN, "").length;
}

function pad(cell: string, width: number): string {
  return cell + " ".repeat(Math.max(0, width - visibleLength(cell)));
}

/**
 * Lay out rows under headers; every column is as wide as its widest cell.
 * Trailing whitespace is trimmed from each line.
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const allRows = [headers, ...rows];
  const widths = headers.map((_, col) => Math.max(...allRows.map((row) => visibleLength(row[col] ?? ""))));

  const line = (row: string[]) =>
    widths
      .map((width, col) => pad(row[col] ?? "", width))
      .join(" │ ")
      .trimEnd();

  return [line(headers), widths.map((w) => "─".repeat(w)).join("─┼─"), ...rows.map(line)];
}

export function printTable(headers: string[], rows: string[][]): void {
  if (rows.length === 0) {
    console.log("No data to display");
    return;
  }
  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}
