/**
 * Numeric inputs that may instead ask for a random value.
 *
 * The string 'random' is only accepted at the public API; it is converted to
 * a `Value` immediately and resolved to a number during validation.
 */
export type Value = { kind: 'fixed'; value: number } | { kind: 'random' };

export const RANDOM = 'random';

export type ValueInput = number | typeof RANDOM | Value;

export const random = (): Value => ({ kind: 'random' });

export const fixed = (value: number): Value => ({ kind: 'fixed', value });

export function toValue(input: ValueInput): Value {
  if (typeof input === 'number') return fixed(input);
  if (input === RANDOM) return random();
  return input;
}

export function formatValue(value: Value): string {
  return value.kind === 'random' ? RANDOM : String(value.value);
}
