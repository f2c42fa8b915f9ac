// Key translation between the on-disk lowerCamelCase and the model's snake_case.

export function camelToSnake(key: string): string {
  return key.replace(/[A-Z]/g, c => '_' + c.toLowerCase());
}

export function snakeToCamel(key: string): string {
  return key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

const LOWER_CAMEL = /^[a-z][a-zA-Z0-9]*$/;
const SNAKE = /^[a-z][a-z0-9]*(_[a-z0-9]+)*$/;

// Keys that are not in the source convention are dropped, so `plane_information`
// on disk never stands in for `planeInformation`.
function mapKeys(value: unknown, accept: RegExp, convert: (key: string) => string): unknown {
  if (Array.isArray(value)) return value.map(v => mapKeys(v, accept, convert));
  if (!isPlainObject(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (!accept.test(k)) continue;
    out[convert(k)] = mapKeys(v, accept, convert);
  }
  return out;
}

export function keysToSnake(value: unknown): unknown {
  return mapKeys(value, LOWER_CAMEL, camelToSnake);
}

export function keysToCamel(value: unknown): unknown {
  return mapKeys(value, SNAKE, snakeToCamel);
}
