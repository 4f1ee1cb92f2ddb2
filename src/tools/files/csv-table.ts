import xlsx from "xlsx";

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).replace(/\r?\n/g, " ").replace(/\|/g, "\\|").trim();
}

/**
 * Renders CSV text as a markdown table with the first row as the header.
 * Cells are kept as written; short rows are padded to the widest one.
 */
export function csvToMarkdownTable(csv: string): string {
  if (csv.trim().length === 0) return "";
  const workbook = xlsx.read(csv, { type: "string", raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) return "";

  const rows = xlsx.utils
    .sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: "", blankrows: false })
    .map((row) => row.map(cellText));
  const [header, ...body] = rows;
  if (!header) return "";

  const width = Math.max(...rows.map((row) => row.length));
  const line = (cells: string[]): string => {
    const padded = Array.from({ length: width }, (_, i) => cells[i] ?? "");
    return `| ${padded.join(" | ")} |`;
  };

  return [
    line(header),
    line(Array.from({ length: width }, () => "---")),
    ...body.map(line),
  ].join("\n");
}
