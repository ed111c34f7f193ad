/**
 * Closed string value sets. Each enum is declared as an `as const` object
 * whose values are the wire strings:
 *
 * @example
 * ```ts
 * export const LogType = { None: 'None', Tail: 'Tail' } as const;
 * export type LogTypeValue = EnumValue<typeof LogType>;
 * ```
 */

export type EnumObject = Readonly<Record<string, string>>;

export type EnumValue<E extends EnumObject> = E[keyof E];

/** True when `value` is one of the enum's wire strings. */
export function isEnumMember<E extends EnumObject>(
  enumObject: E,
  value: string,
): value is EnumValue<E> {
  return Object.values(enumObject).includes(value);
}
