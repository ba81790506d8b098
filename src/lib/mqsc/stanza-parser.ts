export type WhitespacePolicy = 'strip' | 'trim';

export type FieldSpec = {
  /** MQSC attribute keyword, e.g. `CURDEPTH`. */
  attribute: string;
  /** `strip` removes every whitespace character from the value, `trim` only the edges. */
  whitespace?: WhitespacePolicy;
  /** Values that do not match are reported as absent. */
  accept?: RegExp;
};

export type StanzaSpec<K extends string> = {
  isMarker: (line: string) => boolean;
  fields: Record<K, FieldSpec>;
};

export type ParsedStanza<K extends string> = {
  [P in K]: string | null;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const attributePatterns = new Map<string, RegExp>();

function attributePattern(attribute: string): RegExp {
  let pattern = attributePatterns.get(attribute);
  if (!pattern) {
    pattern = new RegExp(`(?<![A-Za-z0-9_])${escapeRegExp(attribute)}\\(([^)]*)\\)`);
    attributePatterns.set(attribute, pattern);
  }
  return pattern;
}

function cleanValue(raw: string, field: FieldSpec): string | null {
  const value = (field.whitespace ?? 'strip') === 'strip' ? raw.replace(/\s+/g, '') : raw.trim();
  if (field.accept && !field.accept.test(value)) return null;
  return value;
}

/** First `ATTR(value)` in `text`, cleaned per `field`, or `null`. */
export function extractAttribute(text: string, field: FieldSpec): string | null {
  for (const line of text.split(/\r?\n/)) {
    const match = attributePattern(field.attribute).exec(line);
    if (match) return cleanValue(match[1] ?? '', field);
  }
  return null;
}

/** Line predicate for stanzas that open with `ATTR(` after optional indentation. */
export function startsWithAttribute(attribute: string): (line: string) => boolean {
  const pattern = new RegExp(`^\\s*${escapeRegExp(attribute)}\\(`);
  return (line) => pattern.test(line);
}

/**
 * Split MQSC display output into logical records. A record starts at a line the
 * marker accepts and runs until the next one; attributes may sit on any of its
 * lines, including the marker line. Text before the first marker is ignored.
 */
export function parseStanzas<K extends string>(text: string, spec: StanzaSpec<K>): ParsedStanza<K>[] {
  const groups: string[][] = [];
  for (const line of text.split(/\r?\n/)) {
    if (spec.isMarker(line)) {
      groups.push([line]);
      continue;
    }
    groups.at(-1)?.push(line);
  }

  const keys = Object.keys(spec.fields).filter((key): key is K => key in spec.fields);
  return groups.map((lines) => {
    const body = lines.join('\n');
    const entries = keys.map((key) => [key, extractAttribute(body, spec.fields[key])] as const);
    return Object.fromEntries(entries) as ParsedStanza<K>;
  });
}
