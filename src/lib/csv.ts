export type CsvParseResult = {
  headers: string[];
  rows: string[][];
  delimiter: string;
  truncated: boolean;
};

export type CsvRecord = Record<string, string>;

const DEFAULT_DELIMITERS = [',', '\t', ';'];

function countUnquoted(line: string, delimiter: string): number {
  let count = 0;
  let inQuotes = false;
  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        i += 1;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }
    if (!inQuotes && ch === delimiter) count += 1;
  }
  return count;
}

function detectDelimiter(line: string): string {
  let best = ',';
  let bestCount = -1;
  for (const delimiter of DEFAULT_DELIMITERS) {
    const count = countUnquoted(line, delimiter);
    if (count > bestCount) {
      bestCount = count;
      best = delimiter;
    }
  }
  return best;
}

function isBlank(row: string[]): boolean {
  return row.every((value) => value.trim() === '');
}

/**
 * Splits CSV text into a header row and data rows. Quoted fields may contain the
 * delimiter, doubled quotes and line breaks. Blank rows are dropped.
 */
export function parseCsv(text: string, maxRows?: number): CsvParseResult {
  const sanitized = text.replace(/^\uFEFF/, '');
  const firstLineEnd = sanitized.search(/\r?\n/);
  const delimiter = detectDelimiter(firstLineEnd >= 0 ? sanitized.slice(0, firstLineEnd) : sanitized);

  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let truncated = false;

  const endRow = () => {
    row.push(field);
    field = '';
    if (!isBlank(row)) rows.push(row);
    row = [];
  };

  for (let i = 0; i < sanitized.length; i += 1) {
    const ch = sanitized[i];

    if (inQuotes) {
      if (ch === '"' && sanitized[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      endRow();
      // header row does not count towards maxRows
      if (maxRows && rows.length > maxRows + 1) {
        rows.pop();
        truncated = true;
        break;
      }
    } else if (ch !== '\r') {
      field += ch;
    }
  }

  if (!truncated && (field.length > 0 || row.length > 0)) {
    endRow();
  }

  const [headerRow, ...dataRows] = rows;
  const headers = (headerRow ?? []).map((h) => h.trim());

  return { headers, rows: dataRows, delimiter, truncated };
}

export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '')
    .replace(/[^a-z0-9]/g, '');
}

/**
 * Resolves the first header matching one of `synonyms` (compared after normalization).
 */
export function findHeader(headers: string[], synonyms: readonly string[]): string | undefined {
  const byNormalized = new Map<string, string>();
  for (const header of headers) {
    const key = normalizeHeader(header);
    if (!byNormalized.has(key)) byNormalized.set(key, header);
  }
  for (const candidate of synonyms) {
    const match = byNormalized.get(normalizeHeader(candidate));
    if (match !== undefined) return match;
  }
  return undefined;
}

/** Zips each data row with the header row. Missing trailing cells read as ''. */
export function toRecords(result: Pick<CsvParseResult, 'headers' | 'rows'>): CsvRecord[] {
  return result.rows.map((cells) => {
    const record: CsvRecord = {};
    result.headers.forEach((header, idx) => {
      record[header] = (cells[idx] ?? '').trim();
    });
    return record;
  });
}
