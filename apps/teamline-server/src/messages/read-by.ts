/**
 * Reader sets are stored as a JSON array string. Older rows were written with
 * other encodings (NULL, a double-encoded string, arrays holding stringified
 * arrays); every read goes through `normalizeReadBy` once at the store
 * boundary so the rest of the server only ever sees an ordered, de-duplicated
 * list of ids.
 */
export function normalizeReadBy(raw: unknown): string[] {
  const seen = new Set<string>();
  collect(raw, seen, 0);
  return [...seen];
}

export function encodeReadBy(readers: readonly string[]): string {
  return JSON.stringify(normalizeReadBy([...readers]));
}

const MAX_DEPTH = 3;

function collect(value: unknown, into: Set<string>, depth: number): void {
  if (value === null || value === undefined || depth > MAX_DEPTH) return;

  if (Array.isArray(value)) {
    for (const item of value) {
      if (typeof item === "string" && item.trim().startsWith("[")) {
        collect(parseJson(item), into, depth + 1);
      } else if (typeof item === "string" || typeof item === "number") {
        const id = String(item).trim();
        if (id) into.add(id);
      }
    }
    return;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) return;
    const parsed = parseJson(trimmed);
    // A bare string that is not JSON is not a reader set
    if (parsed !== undefined) collect(parsed, into, depth + 1);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
