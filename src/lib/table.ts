export interface TableColumn {
  header: string;
  align?: "left" | "right";
  maxWidth?: number;
}

type ColumnInput = string | TableColumn;

function toColumn(input: ColumnInput): TableColumn {
  return typeof input === "string" ? { header: input } : input;
}

function clip(cell: string, maxWidth?: number): string {
  if (maxWidth === undefined || cell.length <= maxWidth) {
    return cell;
  }
  return `${cell.slice(0, Math.max(0, maxWidth - 3))}...`;
}

export function renderTable(columns: ColumnInput[], rows: string[][]): string {
  if (rows.length === 0) {
    return "";
  }

  const specs = columns.map(toColumn);
  const cells = rows.map((row) => specs.map((spec, idx) => clip(row[idx] ?? "", spec.maxWidth)));
  const widths = specs.map((spec, idx) => Math.max(spec.header.length, ...cells.map((row) => row[idx].length)));

  const pad = (value: string, idx: number) =>
    specs[idx].align === "right" ? value.padStart(widths[idx]) : value.padEnd(widths[idx]);
  const line = (row: string[]) => row.map(pad).join("  ").trimEnd();

  const headerLine = line(specs.map((spec) => spec.header));
  const divider = widths.map((width) => "-".repeat(width)).join("  ");
  return [headerLine, divider, ...cells.map(line)].join("\n");
}
