import { isNoResult } from "./tree/node.js";

/**
 * JSON.stringify replacer that writes BigInts as decimal strings and
 * replaces a reference back to an enclosing object with "[Circular]".
 */
function safeReplacer(): (this: unknown, key: string, value: unknown) => unknown {
  const ancestors: unknown[] = [];
  return function (this: unknown, _key: string, value: unknown): unknown {
    if (typeof value === "bigint") return value.toString();
    if (typeof value !== "object" || value === null) return value;
    // `this` is the object holding `value`; drop ancestors we have left
    while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
      ancestors.pop();
    }
    if (ancestors.includes(value)) return "[Circular]";
    ancestors.push(value);
    return value;
  };
}

/** JSON encoding that accepts BigInts and circular structures. */
export function safeStringify(value: unknown, indent?: number): string | undefined {
  return JSON.stringify(value, safeReplacer(), indent);
}

/**
 * Render an evaluation result for display. Never throws.
 *
 * Strings pass through, numbers, booleans and BigInts use String(), NO_RESULT
 * prints as "NO_RESULT" and everything else is JSON-encoded.
 */
export function formatResult(value: unknown): string {
  if (isNoResult(value)) return "NO_RESULT";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (value === undefined) return "undefined";
  try {
    return safeStringify(value) ?? String(value);
  } catch (error) {
    // a toJSON() or getter threw
    const reason = error instanceof Error ? error.message : String(error);
    return `[unserializable: ${reason}]`;
  }
}
