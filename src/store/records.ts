/**
 * Flat record codec for user.txt and tasks.txt.
 *
 * One record per line, fields joined by ", ". Field values are escaped so
 * that a delimiter inside a value survives a write/read cycle:
 *
 *   \  -> \\      ,  -> \,      LF -> \n      CR -> \r
 *
 * Surrounding blanks are trimmed from each line on read, so a space or tab at either
 * edge of a value is written as \s or \t, and an empty value as \e.
 *
 * On read, only an unescaped ", " separates fields. A lone unescaped comma
 * is kept as a literal, which keeps files written without escaping readable.
 */

/** Separator between fields on a line. */
export const FIELD_DELIMITER = ', ';

const BOM = '\uFEFF';

const EDGE_BLANKS = /^[ \t]+|[ \t]+$/g;
const LINE_PADDING = /^[ \t\r]+|[ \t\r]+$/g;

/** A line that did not split into the expected number of fields. */
export interface SkippedLine {
  /** 1-based line number in the file. */
  lineNumber: number;
  /** The trimmed line text. */
  text: string;
  fieldCount: number;
}

/** Result of parsing a record file. */
export interface ParsedRecords {
  records: string[][];
  skipped: SkippedLine[];
}

/** Escape a single field value. */
export function escapeField(value: string): string {
  if (value === '') return '\\e';
  return value
    .replace(/\\/g, '\\\\')
    .replace(/,/g, '\\,')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(EDGE_BLANKS, (run) => run.replace(/ /g, '\\s').replace(/\t/g, '\\t'));
}

/** Encode one record as a line (without the trailing newline). */
export function encodeRecord(fields: readonly string[]): string {
  return fields.map(escapeField).join(FIELD_DELIMITER);
}

/** Split one line into unescaped field values. */
export function splitRecord(line: string): string[] {
  const fields: string[] = [];
  let current = '';

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (ch === '\\' && i + 1 < line.length) {
      const next = line.charAt(i + 1);
      if (next === 'n') current += '\n';
      else if (next === 'r') current += '\r';
      else if (next === 's') current += ' ';
      else if (next === 't') current += '\t';
      else if (next !== 'e') current += next;
      i++;
      continue;
    }

    if (ch === ',' && line.charAt(i + 1) === ' ') {
      fields.push(current);
      current = '';
      i++;
      continue;
    }

    current += ch;
  }

  fields.push(current);
  return fields;
}

/**
 * Parse file content into records of exactly `fieldCount` fields.
 * Blank lines are ignored; any other line with the wrong field count is
 * reported in `skipped` and left out of `records`.
 */
export function parseRecords(content: string, fieldCount: number): ParsedRecords {
  const body = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  const records: string[][] = [];
  const skipped: SkippedLine[] = [];

  body.split('\n').forEach((raw, index) => {
    const line = raw.replace(LINE_PADDING, '');
    if (line === '') return;

    const fields = splitRecord(line);
    if (fields.length !== fieldCount) {
      skipped.push({ lineNumber: index + 1, text: line, fieldCount: fields.length });
      return;
    }
    records.push(fields);
  });

  return { records, skipped };
}

/** Serialize records as file content, one newline-terminated line each. */
export function serializeRecords(records: ReadonlyArray<readonly string[]>): string {
  return records.map((fields) => `${encodeRecord(fields)}\n`).join('');
}
