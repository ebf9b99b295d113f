import { ValidationError } from './errors.js';

export function parseCsvLine(line: string, delimiter = ','): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (i + 1 < line.length && line[i + 1] === '"') {
          current += '"';
          i++; // escaped quote
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      fields.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current.trim());
  return fields;
}

export interface CsvTable {
  header: string[];
  rows: string[][];
}

/** Splits on line breaks outside quotes; a quoted cell may span lines. */
function splitRecords(text: string): string[] {
  const records: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') inQuotes = !inQuotes;
    if (!inQuotes && (ch === '\n' || (ch === '\r' && text[i + 1] === '\n'))) {
      if (ch === '\r') i++;
      records.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  if (inQuotes) {
    throw new ValidationError([{ code: 'csv_quote', field: `line ${records.length + 1}`, message: 'unterminated quoted cell' }]);
  }
  records.push(current);
  return records;
}

/** Header row plus data rows; blank lines are skipped, header names are lowercased. */
export function parseCsv(text: string, delimiter = ','): CsvTable {
  const lines = splitRecords(text.replace(/^\uFEFF/, '')).filter((l) => l.trim().length > 0);
  if (lines.length === 0) {
    throw new ValidationError([{ code: 'csv_empty', field: 'header', message: 'CSV file is empty' }]);
  }
  return {
    header: parseCsvLine(lines[0], delimiter).map((h) => h.toLowerCase()),
    rows: lines.slice(1).map((l) => parseCsvLine(l, delimiter)),
  };
}

/** Column indexes by name; missing required columns raise one issue each. */
export function requireColumns(header: string[], required: readonly string[]): Record<string, number> {
  const index: Record<string, number> = {};
  header.forEach((name, i) => {
    if (!(name in index)) index[name] = i;
  });
  const missing = required.filter((name) => !(name in index));
  if (missing.length > 0) {
    throw new ValidationError(missing.map((name) => ({
      code: 'csv_missing_column',
      field: name,
      message: `CSV must contain a '${name}' column`,
    })));
  }
  return index;
}

function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function writeCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  return [header, ...rows].map((r) => r.map(escapeCell).join(',')).join('\n') + '\n';
}
