/** Primitive values that survive a JSON round trip. */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Any value that can be stored in a `jsonb` column.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
