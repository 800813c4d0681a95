import superjson from "superjson";

/**
 * Renders any value as text for error messages. Handles what `JSON.stringify`
 * cannot (bigint, Map, Set, undefined, Date).
 */
export const describe = (value: unknown): string => {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(superjson.serialize(value).json) ?? String(value);
  } catch {
    return String(value);
  }
};
