/**
 * lib/csv.ts - Minimal RFC 4180 reader and writer
 *
 * Comma separator, double-quoted fields with "" escapes, LF or CRLF
 * record endings. Blank records are dropped on read.
 */

import { InputError } from "./errors";

/**
 * Split CSV text into records of raw field strings.
 *
 * @throws InputError on an unterminated quoted field
 */
export function parseCsv(text: string, source?: string): string[][] {
  const input = text.startsWith("\uFEFF") ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;
  let quotedRecord = false;

  const endRecord = (): void => {
    record.push(field);
    // A lone empty field means the line was blank
    if (record.length > 1 || record[0] !== "" || quotedRecord) {
      records.push(record);
    }
    record = [];
    field = "";
    quotedRecord = false;
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      quotedRecord = true;
    } else if (ch === ",") {
      record.push(field);
      field = "";
    } else if (ch === "\n") {
      endRecord();
    } else if (ch === "\r") {
      if (input[i + 1] === "\n") i++;
      endRecord();
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new InputError("Unterminated quoted field in CSV", source);
  }

  if (field !== "" || record.length > 0 || quotedRecord) {
    endRecord();
  }

  return records;
}

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Serialize one record, quoting fields only where needed. */
export function formatCsvRecord(fields: readonly string[]): string {
  return fields.map(escapeField).join(",");
}
