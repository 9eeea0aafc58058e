/** Commander parser for repeatable options: accumulates every value */
export const collect = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

/**
 * Parse `key=value` pairs, keeping order and duplicates.
 * Only the first "=" separates; the value may contain more.
 */
export function parseFieldOptions(raw: string[]): Array<[string, string]> {
  return raw.map((entry) => {
    const index = entry.indexOf("=");
    if (index <= 0) {
      throw new Error(`Invalid field "${entry}", expected key=value`);
    }
    return [entry.slice(0, index), entry.slice(index + 1)];
  });
}

/** Parse `Name: value` header options */
export function parseHeaderOptions(raw: string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const entry of raw) {
    const index = entry.indexOf(":");
    const name = index > 0 ? entry.slice(0, index).trim() : "";
    if (!name) {
      throw new Error(`Invalid header "${entry}", expected Name: value`);
    }
    headers[name] = entry.slice(index + 1).trim();
  }
  return headers;
}

/** Parse a timeout in milliseconds; undefined when not given */
export function parseTimeout(raw?: string): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const timeout = Number(raw);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new Error(`Invalid timeout "${raw}", expected a positive integer`);
  }
  return timeout;
}
