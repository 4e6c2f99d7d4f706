/**
 * Value rendering shared by the formatters.
 */

/**
 * JSON.stringify replacer that survives values JSON cannot carry:
 * bigint becomes a string, Error becomes `{ name, message }`, functions and
 * symbols are omitted and reference cycles become `"[Circular]"`.
 */
function createSafeReplacer(): (this: unknown, key: string, value: unknown) => unknown {
  const ancestors: unknown[] = [];

  return function replacer(this: unknown, _key: string, value: unknown): unknown {
    if (typeof value === "bigint") {
      return value.toString();
    }
    if (typeof value === "function" || typeof value === "symbol") {
      return undefined;
    }
    if (typeof value !== "object" || value === null) {
      return value;
    }

    // `this` is the object holding `value`; unwind to it
    while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
      ancestors.pop();
    }
    if (ancestors.includes(value)) {
      return "[Circular]";
    }

    const replaced = value instanceof Error ? { name: value.name, message: value.message } : value;
    ancestors.push(replaced);
    return replaced;
  };
}

export function safeStringify(value: unknown): string {
  return JSON.stringify(value, createSafeReplacer()) ?? "null";
}

const BARE_VALUE = /^[^\s"=]+$/;

/**
 * Renders a field value for `key=value` output. Strings without spaces,
 * quotes or `=` are written bare; everything else is JSON-encoded.
 */
export function renderFieldValue(value: unknown): string {
  if (typeof value === "string") {
    return BARE_VALUE.test(value) ? value : JSON.stringify(value);
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (value === undefined) {
    return "undefined";
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  return safeStringify(value);
}
