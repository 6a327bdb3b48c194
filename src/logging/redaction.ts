import type { LogMeta } from './types.js';

const arrayIndexExpr = /^\d+(\.|$)/;

function nestedPaths(paths: string[], prefix: string): string[] {
  return paths
    .filter((path) => path.startsWith(prefix + '.'))
    .map((path) => path.substring(prefix.length + 1));
}

/**
 * Replace the values found at `paths` with `redaction`.
 *
 * Paths use dot notation. A numeric segment addresses one array element;
 * any other segment applied to an array addresses every element, so
 * `identities.accessToken` redacts the token of each identity.
 *
 * Error instances are written as `{ name, message }` since their own
 * properties do not survive structured logging.
 *
 * @example
 * ```typescript
 * redactValue({ accessToken: 'abc', provider: 'facebook' }, ['accessToken']);
 * // { accessToken: '[redacted]', provider: 'facebook' }
 * ```
 */
export function redactValue(
  value: unknown,
  paths: string[],
  redaction = '[redacted]'
): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (value === null || typeof value !== 'object' || paths.length === 0) {
    return value;
  }

  const pathSet = new Set(paths);

  if (Array.isArray(value)) {
    const generalPaths = paths.filter((path) => !arrayIndexExpr.test(path));
    return value.map((item: unknown, index) => {
      const key = index.toString();
      if (pathSet.has(key)) {
        return redaction;
      }
      return redactValue(
        item,
        [...nestedPaths(paths, key), ...generalPaths],
        redaction
      );
    });
  }

  return redact(value, paths, redaction);
}

/**
 * Redact log metadata, keeping its object shape.
 */
export function redact(
  meta: object,
  paths: string[],
  redaction = '[redacted]'
): LogMeta {
  const pathSet = new Set(paths);
  const result: LogMeta = {};
  for (const [key, entry] of Object.entries(meta)) {
    result[key] = pathSet.has(key)
      ? redaction
      : redactValue(entry, nestedPaths(paths, key), redaction);
  }
  return result;
}
