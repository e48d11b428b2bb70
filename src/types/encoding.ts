/**
 * Represents a JSON object.
 */
export type Json = { [key: string]: JsonValue };

/**
 * Represents either an JSON object, an array, a string, a number, a null
 * or a boolean.
 */
export type JsonValue = Json | JsonValue[] | string | number | boolean | null;
