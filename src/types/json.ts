/**
 * Any value that survives a JSON round trip.
 */
export type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue }
