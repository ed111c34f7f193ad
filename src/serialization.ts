/**
 * Helpers Input classes use to project their fields onto the wire.
 *
 * An unset field is left out of the payload entirely. A map that is set
 * but empty is still written, as `{}`, so the service can tell it apart
 * from an absent one.
 */

import { InvalidEnumValueError, MissingRequiredFieldError } from './errors.js';
import { isEnumMember } from './enum.js';
import type { EnumObject, EnumValue } from './enum.js';
import type { JsonObject, JsonValue } from './json.js';

/**
 * Return the value of a required field.
 * @throws MissingRequiredFieldError when the field is unset.
 */
export function requireField<T>(
  value: T | null | undefined,
  field: string,
  owner: string,
): T {
  if (value === undefined || value === null) {
    throw new MissingRequiredFieldError(field, owner);
  }
  return value;
}

/**
 * Check that a value belongs to the enum's closed value set.
 * @throws InvalidEnumValueError otherwise.
 */
export function assertEnumMember<E extends EnumObject>(
  enumObject: E,
  enumName: string,
  value: string,
  field: string,
  owner: string,
): EnumValue<E> {
  if (!isEnumMember(enumObject, value)) {
    throw new InvalidEnumValueError(field, value, enumName, owner);
  }
  return value;
}

/** Encode a map as a JSON object; an empty map gives `{}`. */
export function encodeMap<T>(
  map: Readonly<Record<string, T>>,
  encodeValue: (value: T, key: string) => JsonValue,
): JsonObject {
  const encoded: JsonObject = {};
  for (const [key, value] of Object.entries(map)) {
    // Own property even for `__proto__`, which plain assignment would swallow.
    Object.defineProperty(encoded, key, {
      value: encodeValue(value, key),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return encoded;
}

export function encodeStringMap(map: Readonly<Record<string, string>>): JsonObject {
  return encodeMap(map, (value) => value);
}

/** Serialize a body payload. An empty payload still yields `{}`. */
export function encodeJsonBody(payload: JsonObject): string {
  return JSON.stringify(payload);
}

/** Percent-encode a value substituted into a URI path segment. */
export function encodePathParameter(value: string): string {
  return encodeURIComponent(value);
}
