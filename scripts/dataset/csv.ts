import type { TabularRow } from "./types";

export interface ParsedCsv {
  header: string[];
  rows: TabularRow[];
}

/** Splits CSV text into records of raw cells (RFC 4180: quoted fields, "" escapes, CRLF). */
function tokenize(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let quoted = false;
  let index = 0;

  const endField = () => {
    record.push(field);
    field = "";
  };
  const endRecord = () => {
    endField();
    records.push(record);
    record = [];
  };

  while (index < text.length) {
    const char = text[index];
    if (quoted) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          field += '"';
          index += 2;
          continue;
        }
        quoted = false;
      } else {
        field += char;
      }
      index += 1;
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      endField();
    } else if (char === "\r") {
      if (text[index + 1] === "\n") {
        index += 1;
      }
      endRecord();
    } else if (char === "\n") {
      endRecord();
    } else {
      field += char;
    }
    index += 1;
  }

  if (field !== "" || record.length > 0) {
    endRecord();
  }
  return records;
}

export function parseCsv(text: string): ParsedCsv {
  const records = tokenize(text.replace(/^\uFEFF/, ""));
  const nonEmpty = records.filter((cells) => !(cells.length === 1 && cells[0].trim() === ""));
  const [headerCells, ...body] = nonEmpty;
  if (!headerCells) {
    return { header: [], rows: [] };
  }

  const header = headerCells.map((cell) => cell.trim());
  const rows = body.map((cells) => {
    const row: TabularRow = {};
    header.forEach((column, position) => {
      row[column] = cells[position] ?? "";
    });
    return row;
  });
  return { header, rows };
}

function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(header: readonly string[], rows: readonly TabularRow[]): string {
  const lines = [header.map(escapeCell).join(",")];
  for (const row of rows) {
    lines.push(header.map((column) => escapeCell(row[column] ?? "")).join(","));
  }
  return `${lines.join("\n")}\n`;
}
