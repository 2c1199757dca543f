/**
 * Diagnostic formatting for error arguments.
 *
 * Produces strings like `{left=/a, right=a/b}`. Strings are printed
 * verbatim, arrays as `[a, b]`, plain objects as `{key=value}`, and any
 * other object through its own `toString()`, which for a path is its
 * canonical form.
 */

export function formatValue(value: unknown): string {
  return fmt(value, new Set());
}

export function formatArgs(args: Readonly<Record<string, unknown>>): string {
  return fmtRecord(args, new Set());
}

function fmt(thing: unknown, seen: Set<object>): string {
  if (typeof thing === "string") return thing;
  if (thing === null || typeof thing !== "object") return String(thing);

  if (seen.has(thing)) return "[Circular]";
  seen.add(thing);
  try {
    if (Array.isArray(thing)) {
      return "[" + thing.map((item) => fmt(item, seen)).join(", ") + "]";
    }
    if (isPlainObject(thing)) {
      return fmtRecord(thing, seen);
    }
    return String(thing);
  } finally {
    seen.delete(thing);
  }
}

function fmtRecord(
  record: Readonly<Record<string, unknown>>,
  seen: Set<object>,
): string {
  const entries = Object.keys(record).map(
    (key) => key + "=" + fmt(record[key], seen),
  );
  return "{" + entries.join(", ") + "}";
}

function isPlainObject(thing: object): thing is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(thing);
  return proto === Object.prototype || proto === null;
}
