/**
 * Type Guards
 *
 * Used to narrow decoded token payloads and other untyped input.
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNonEmptyString(value: unknown): value is string {
  return isString(value) && value.trim().length > 0;
}
