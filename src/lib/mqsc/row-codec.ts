/** Unit separator between fields; never appears raw inside an encoded value. */
export const FIELD_SEPARATOR = '\x1f';

// Backslash is escaped too so that decoding is unambiguous.
const ESCAPED_CHARS = /[\\\x00-\x1f\x7f]/g;
const ESCAPE_SEQUENCE = /\\(\\|x[0-9a-f]{2})/g;

export type RowField = string | number;

function escapeField(value: string): string {
  return value.replace(ESCAPED_CHARS, (ch) =>
    ch === '\\' ? '\\\\' : `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`,
  );
}

function unescapeField(value: string): string {
  return value.replace(ESCAPE_SEQUENCE, (_match, seq: string) =>
    seq === '\\' ? '\\' : String.fromCharCode(Number.parseInt(seq.slice(1), 16)),
  );
}

export function encodeRow(fields: readonly RowField[]): string {
  return fields.map((field) => escapeField(String(field))).join(FIELD_SEPARATOR);
}

export function decodeRows(text: string): string[][] {
  return text
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => line.split(FIELD_SEPARATOR).map(unescapeField));
}
