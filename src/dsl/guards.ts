export type YamlMapping = Record<string, unknown>;

export function isMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNonEmptyMapping(value: unknown): value is YamlMapping {
  return isMapping(value) && Object.keys(value).length > 0;
}

/** Missing, null, false, 0, empty strings and empty collections all count as absent. */
export function isBlank(value: unknown): boolean {
  if (Array.isArray(value)) return value.length === 0;
  if (isMapping(value)) return Object.keys(value).length === 0;
  return value === undefined || value === null || value === '' || value === 0 || value === false;
}

export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'sequence';
  if (isMapping(value)) return 'mapping';
  return typeof value;
}
