/**
 * Readers that turn a parsed response body into typed result fields.
 *
 * Every `read*` helper takes the parent object and a key: a missing or
 * `null` key yields `undefined`, keys nobody reads are ignored, and a value
 * of the wrong shape raises {@link MalformedResponseError} naming the dotted
 * path of the key.
 */

import { MalformedResponseError } from './errors.js';
import { isJsonObject } from './json.js';
import type { JsonObject, JsonValue } from './json.js';

/** Converts one wire value found at `path`. */
export type ValueReader<T> = (value: JsonValue, path: string) => T;

const EPOCH_SECONDS = /^-?\d+(\.\d+)?$/;
const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;

export function joinPath(parent: string, key: string): string {
  return parent === '' ? key : `${parent}.${key}`;
}

// ---- Scalar conversions ----

export function asString(value: JsonValue, path: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  throw malformed(path, 'a string', value);
}

export function asNumber(value: JsonValue, path: string): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (!isNaN(parsed)) return parsed;
  }
  throw malformed(path, 'a number', value);
}

export function asBoolean(value: JsonValue, path: string): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw malformed(path, 'a boolean', value);
}

/**
 * Timestamps arrive either as epoch seconds (JSON protocols) or as ISO 8601
 * strings (REST protocols), the latter sometimes with a `+hhmm` offset.
 * Strings must carry a full date, a time and a zone; calendar fields out of
 * range (`2024-02-30`) are rejected rather than rolled over.
 */
export function asDate(value: JsonValue, path: string): Date {
  let millis = NaN;
  if (typeof value === 'number') {
    millis = value * 1000;
  } else if (typeof value === 'string') {
    millis = EPOCH_SECONDS.test(value) ? Number(value) * 1000 : parseIso8601(value);
  }
  if (!Number.isFinite(millis)) {
    throw malformed(path, 'a timestamp', value);
  }
  return new Date(millis);
}

function parseIso8601(value: string): number {
  const match = ISO_8601.exec(value);
  if (match === null) {
    return NaN;
  }
  const [, year, month, day, hour, minute, second = '00'] = match;
  const daysInMonth = new Date(Date.UTC(Number(year), Number(month), 0)).getUTCDate();
  const inRange =
    Number(month) >= 1 &&
    Number(month) <= 12 &&
    Number(day) >= 1 &&
    Number(day) <= daysInMonth &&
    Number(hour) <= 23 &&
    Number(minute) <= 59 &&
    Number(second) <= 59;
  return inRange ? Date.parse(value.replace(COMPACT_OFFSET, '$1:$2')) : NaN;
}

export function asObject(value: JsonValue, path: string): JsonObject {
  if (isJsonObject(value)) return value;
  throw malformed(path, 'an object', value);
}

// ---- Keyed readers ----

export function readString(data: JsonObject, key: string, parent = ''): string | undefined {
  return read(data, key, parent, asString);
}

export function readNumber(data: JsonObject, key: string, parent = ''): number | undefined {
  return read(data, key, parent, asNumber);
}

export function readBoolean(data: JsonObject, key: string, parent = ''): boolean | undefined {
  return read(data, key, parent, asBoolean);
}

export function readDate(data: JsonObject, key: string, parent = ''): Date | undefined {
  return read(data, key, parent, asDate);
}

/** Hydrates a nested object with the given function. */
export function readObject<T>(
  data: JsonObject,
  key: string,
  hydrate: (raw: JsonObject, path: string) => T,
  parent = '',
): T | undefined {
  return read(data, key, parent, (value, path) => hydrate(asObject(value, path), path));
}

export function readList<T>(
  data: JsonObject,
  key: string,
  item: ValueReader<T>,
  parent = '',
): T[] | undefined {
  return read(data, key, parent, (value, path) => {
    if (!Array.isArray(value)) {
      throw malformed(path, 'a list', value);
    }
    return value.map((v, i) => item(v, `${path}[${i}]`));
  });
}

export function readMap<T>(
  data: JsonObject,
  key: string,
  item: ValueReader<T>,
  parent = '',
): Record<string, T> | undefined {
  return read(data, key, parent, (value, path) => {
    const raw = asObject(value, path);
    const result: Record<string, T> = {};
    for (const [name, v] of Object.entries(raw)) {
      result[name] = item(v, joinPath(path, name));
    }
    return result;
  });
}

export function readStringMap(
  data: JsonObject,
  key: string,
  parent = '',
): Record<string, string> | undefined {
  return readMap(data, key, asString, parent);
}

function read<T>(
  data: JsonObject,
  key: string,
  parent: string,
  convert: ValueReader<T>,
): T | undefined {
  const value = data[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return convert(value, joinPath(parent, key));
}

function malformed(path: string, expected: string, value: JsonValue): MalformedResponseError {
  return new MalformedResponseError(
    `Expected "${path}" to be ${expected}, got ${JSON.stringify(value)}.`,
    path,
  );
}
