/**
 * Minimal delimited-text reader for the load dataset.
 *
 * Handles quoted cells (`"Dallas, TX"`), doubled quotes inside quotes and
 * CRLF line endings. Quoted cells may not span lines.
 */

export interface CsvRow {
  line: number; // 1-based line in the source
  cells: string[];
}

export class CsvSyntaxError extends Error {
  line: number;

  constructor(message: string, line: number) {
    super(message);
    this.name = 'CsvSyntaxError';
    this.line = line;
  }
}

// Split a single line into cells
export function splitCsvLine(text: string, line: number, delimiter: string = ','): string[] {
  const cells: string[] = [];
  let current = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"' && current.trim() === '') {
      current = '';
      inQuotes = true;
    } else if (ch === delimiter) {
      cells.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new CsvSyntaxError('Unterminated quoted cell', line);
  }

  cells.push(current.trim());
  return cells;
}

// Parse full text into rows, skipping blank lines
export function parseCsv(text: string, delimiter: string = ','): CsvRow[] {
  const rows: CsvRow[] = [];
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  lines.forEach((raw, index) => {
    if (raw.trim() === '') return;
    rows.push({ line: index + 1, cells: splitCsvLine(raw, index + 1, delimiter) });
  });

  return rows;
}
