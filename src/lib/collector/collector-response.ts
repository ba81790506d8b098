/** Serialize collector records; an empty batch (or anything unserializable) is `[]`. */
export function emitRecords(records: readonly unknown[]): string {
  try {
    return JSON.stringify(records) ?? '[]';
  } catch {
    return '[]';
  }
}

export function formatErrorEnvelope(message: string): string {
  return JSON.stringify({ error: message });
}
