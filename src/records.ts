/**
 * Own-property access for objects keyed by column, parameter or evaluator names.
 *
 * Names come from user data, so `constructor` or `__proto__` must behave like any other key.
 */

/**
 * The value stored under `key` on `record` itself, ignoring inherited properties.
 */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Define `key` as an own enumerable property. Unlike assignment, `__proto__` becomes a
 * regular key instead of replacing the prototype.
 */
export function setOwn<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}
