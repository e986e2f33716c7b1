// ---------------------------------------------------------------------------
// Minimal RFC 4180 CSV codec (comma separator, double-quote escaping)
// ---------------------------------------------------------------------------

export interface CsvRow {
  /** 1-based line the row starts on */
  line: number;
  cells: string[];
}

/** Split CSV text into rows of cells, keeping track of line numbers. Blank lines are dropped. */
export function parseCsvRows(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let cells: string[] = [];
  let cell = "";
  let quoted = false;
  let line = 1;
  let rowLine = 1;
  let i = 0;

  const endRow = () => {
    cells.push(cell);
    if (cells.length > 1 || cells[0] !== "") rows.push({ line: rowLine, cells });
    cells = [];
    cell = "";
  };

  while (i < text.length) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        if (ch === "\n" || (ch === "\r" && text[i + 1] !== "\n")) line += 1;
        cell += ch;
      }
      i += 1;
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      cells.push(cell);
      cell = "";
    } else if (ch === "\r" || ch === "\n") {
      endRow();
      if (ch === "\r" && text[i + 1] === "\n") i += 1;
      line += 1;
      rowLine = line;
    } else {
      cell += ch;
    }
    i += 1;
  }

  if (quoted) throw new Error(`Line ${rowLine}: Unterminated quoted field`);
  if (cell !== "" || cells.length) endRow();
  return rows;
}

export function parseCsv(text: string): string[][] {
  return parseCsvRows(text).map((row) => row.cells);
}

export function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function stringifyCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(escapeCell).join(",") + "\r\n").join("");
}

export interface CsvTable {
  header: string[];
  records: Record<string, string>[];
}

/**
 * Rows of a report keyed by header: rows whose first cell starts with "#"
 * are comments, the first remaining row is the header.
 */
export function parseCsvTable(text: string): CsvTable {
  const rows = parseCsv(text).filter((row) => !(row[0] ?? "").startsWith("#"));
  const [header, ...data] = rows;
  if (!header) return { header: [], records: [] };
  const records = data.map((row) => {
    const record: Record<string, string> = {};
    header.forEach((key, i) => {
      const value = row[i];
      if (value !== undefined) record[key] = value;
    });
    return record;
  });
  return { header, records };
}

export function parseCsvRecords(text: string): Record<string, string>[] {
  return parseCsvTable(text).records;
}
