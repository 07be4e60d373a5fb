/**
 * CSV reading and writing
 *
 * Quoted fields may hold commas, doubled quotes and line breaks (complaint
 * text routinely does).
 */

export type CsvValue = string | number | null | undefined;

/**
 * Split CSV text into rows of raw field values
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  // Strip a UTF-8 byte order mark
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && input[i + 1] === '\n') {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  // Blank lines carry no record
  return rows.filter((values) => !(values.length === 1 && values[0] === ''));
}

/**
 * Parse CSV text with a header row into objects keyed by column name
 *
 * Missing trailing fields read as empty strings.
 */
export function parseCsvObjects(text: string): { columns: string[]; rows: Record<string, string>[] } {
  const [header, ...body] = parseCsv(text);
  if (!header) {
    return { columns: [], rows: [] };
  }

  const columns = header.map((column) => column.trim());
  const rows = body.map((values) => {
    const entry: Record<string, string> = {};
    columns.forEach((column, index) => {
      entry[column] = values[index] ?? '';
    });
    return entry;
  });

  return { columns, rows };
}

export function csvEscape(value: CsvValue): string {
  const text = value === null || value === undefined ? '' : String(value);
  if (text.includes(',') || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Render rows as CSV with a header line, columns in the given order
 */
export function stringifyCsv<Row extends { [K in Column]: CsvValue }, Column extends string>(
  columns: readonly Column[],
  rows: readonly Row[]
): string {
  const lines = [columns.map(csvEscape).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => csvEscape(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
