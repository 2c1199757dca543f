import { Path, SEPARATOR } from "./path.ts";

/**
 * Builds a path by joining the non-empty `segments` with `/` and parsing
 * the result, so the constructor's validation applies. The path is
 * absolute iff the first non-empty segment starts with `/`.
 *
 * ```ts
 * path("/srv", "www", "index.html"); // "/srv/www/index.html"
 * path("a", null, "", "b/");          // "a/b/"
 * ```
 */
export function path(...segments: Array<string | null | undefined>): Path {
  const present = segments.filter(
    (s): s is string => s !== null && s !== undefined && s.length > 0,
  );
  return new Path(present.join(SEPARATOR));
}
