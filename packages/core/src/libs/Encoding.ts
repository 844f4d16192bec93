/**
 * JSON replacer that renders bigints as decimal strings.
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

