// ─── CSV Parser ────────────────────────────────────────────────────────────
// Parses CSV text into header-keyed rows and formats rows back to CSV.
// Handles quoted fields, doubled quotes and newlines inside quotes.

export type CsvRawRow = Record<string, string>;

export type CsvRecord = {
  /** 1-based line of the record's first character (header is line 1). */
  line: number;
  values: CsvRawRow;
};

export type CsvParseResult = {
  headers: string[];
  separator: string;
  records: CsvRecord[];
  errors: string[];
};

const SEPARATOR_CANDIDATES = [',', ';', '\t'];

/**
 * Detects the separator used in the header line.
 * Supports comma, semicolon, and tab; ties go to comma.
 */
export function detectSeparator(headerLine: string): string {
  let best = ',';
  let bestCount = 0;
  for (const sep of SEPARATOR_CANDIDATES) {
    const count = headerLine.split(sep).length;
    if (count > bestCount) {
      bestCount = count;
      best = sep;
    }
  }
  return best;
}

/** Splits the whole text into records of raw fields, tracking line numbers. */
function tokenize(
  content: string,
  separator: string,
): { line: number; fields: string[] }[] {
  const records: { line: number; fields: string[] }[] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = () => {
    fields.push(current.trim());
    if (fields.some((field) => field.length > 0)) {
      records.push({ line: recordLine, fields });
    }
    fields = [];
    current = '';
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === separator) {
      fields.push(current.trim());
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      current += char;
    }
  }
  endRecord();
  return records;
}

/**
 * Parse CSV content into structured data.
 *
 * - Blank lines are dropped.
 * - Missing trailing fields read as empty strings.
 */
export function parseCsv(content: string): CsvParseResult {
  const text = content.replace(/^\uFEFF/, '');
  if (text.trim().length === 0) {
    return { headers: [], separator: ',', records: [], errors: ['CSV content is empty.'] };
  }

  const firstLine = text.split(/\r?\n/).find((l) => l.trim().length > 0) ?? '';
  const separator = detectSeparator(firstLine);
  const [headerRecord, ...dataRecords] = tokenize(text, separator);
  const headers = (headerRecord?.fields ?? []).map((h) => h.toLowerCase());

  if (headers.length === 0 || headers.every((h) => h.length === 0)) {
    return {
      headers: [],
      separator,
      records: [],
      errors: ['No valid headers found in CSV.'],
    };
  }

  const errors: string[] = [];
  const records = dataRecords.map(({ line, fields }) => {
    if (fields.length > headers.length) {
      errors.push(
        `Row ${line}: ${fields.length} fields for ${headers.length} columns; extra fields ignored.`,
      );
    }
    const values: CsvRawRow = {};
    headers.forEach((header, index) => {
      values[header] = fields[index] ?? '';
    });
    return { line, values };
  });

  return { headers, separator, records, errors };
}

const needsQuoting = /[",;\t\r\n]/;

export function formatCsvField(value: string | number | null | undefined): string {
  const text = value === null || value === undefined ? '' : String(value);
  return needsQuoting.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Formats a header row plus data rows, comma-separated, newline-terminated. */
export function formatCsv(
  headers: readonly string[],
  rows: readonly Record<string, string | number | null | undefined>[],
): string {
  const lines = [
    headers.map(formatCsvField).join(','),
    ...rows.map((row) => headers.map((h) => formatCsvField(row[h])).join(',')),
  ];
  return `${lines.join('\n')}\n`;
}
