/**
 * Minimal RFC 4180 reader/writer for CSV and TSV.
 *
 * Quoted fields may contain the delimiter, newlines and doubled quotes.
 * Blank lines are dropped.
 */

export interface DelimitedRow {
  /** 1-based line number where the row starts */
  line: number;
  fields: string[];
}

export function parseDelimited(text: string, delimiter = ","): DelimitedRow[] {
  const rows: DelimitedRow[] = [];
  let fields: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;
  let rowHasContent = false;

  const endRow = () => {
    fields.push(field);
    if (rowHasContent || fields.length > 1 || field.length > 0) {
      rows.push({ line: rowStart, fields });
    }
    fields = [];
    field = "";
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === "\n") line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field.length === 0) {
      inQuotes = true;
      rowHasContent = true;
    } else if (ch === delimiter) {
      fields.push(field);
      field = "";
      rowHasContent = true;
    } else if (ch === "\r" && text[i + 1] === "\n") {
      continue;
    } else if (ch === "\n" || ch === "\r") {
      endRow();
      line++;
      rowStart = line;
    } else {
      field += ch;
    }
  }

  if (field.length > 0 || fields.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
}

function quoteField(value: string, delimiter: string): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function stringifyDelimited(rows: Array<Array<string | number | boolean>>, delimiter = ","): string {
  return rows
    .map((row) => row.map((value) => quoteField(String(value), delimiter)).join(delimiter))
    .join("\n");
}
