/**
 * Path — an OS-independent, Unix-style syntactic path.
 *
 * A path is a list of segments separated by `/`. Segments are arbitrary
 * strings that contain no `/` and are never `.`; the segment `..` is a
 * backwards reference that stays in place until `normalize()` collapses it.
 *
 * Every path is absolute or relative, and a folder or not: absolute paths
 * start with `/`, folders end with `/`. The root `/` is an absolute folder,
 * the empty path `""` a relative non-folder.
 *
 * `toString()` is the inverse of the constructor: for every valid path
 * string `s`, `new Path(s).toString() === s`. Nothing here touches a
 * filesystem.
 */

import {
  IllegalCharacterError,
  IllegalSegmentError,
  InvalidRelativizeError,
  NullInputError,
} from "./errors.ts";

export const SEPARATOR = "/";
export const SEPARATOR_CHAR_CODE = 0x2f;
export const BACKWARDS_SEGMENT = "..";

const ILLEGAL_CHARACTER = "\u0000";
const ILLEGAL_SEGMENT = ".";

// Unforgeable token for the unvalidated constructor overload.
const trusted = Symbol("trusted");

export class Path {
  readonly #segments: readonly string[];
  readonly #absolute: boolean;
  readonly #folder: boolean;

  #string: string | undefined;
  #normalized: Path | undefined;

  constructor(input: string | null | undefined);
  /** @internal */
  constructor(
    token: typeof trusted,
    segments: readonly string[],
    isAbsolute: boolean,
    isFolder: boolean,
  );
  constructor(
    input: string | null | undefined | typeof trusted,
    segments: readonly string[] = [],
    isAbsolute = false,
    isFolder = false,
  ) {
    if (input === trusted) {
      this.#segments = Object.freeze(segments.slice());
      this.#absolute = isAbsolute;
      this.#folder = isFolder;
      return;
    }
    if (input === null || input === undefined) {
      throw new NullInputError();
    }
    this.#segments = Object.freeze(checkAndSplit(input));
    this.#absolute = input.startsWith(SEPARATOR);
    this.#folder = input.endsWith(SEPARATOR);
  }

  /**
   * Returns this path with all backward navigation resolved, e.g. `/a/b/..`
   * becomes `/a`. Backward navigation past the first segment is dropped, so
   * `a/../..` normalizes to the empty path. Absoluteness and folder-ness are
   * kept.
   */
  normalize(): Path {
    this.#normalized ??= this.#normalizeInternal();
    return this.#normalized;
  }

  #normalizeInternal(): Path {
    const normal: string[] = [];
    for (const segment of this.#segments) {
      if (segment === BACKWARDS_SEGMENT) {
        normal.pop();
      } else {
        normal.push(segment);
      }
    }
    return new Path(trusted, normal, this.#absolute, this.#folder);
  }

  /** The root path if this path is absolute and has segments. */
  getRoot(): Path | undefined {
    return this.#segments.length > 0 && this.#absolute ? ROOT_PATH : undefined;
  }

  isAbsolute(): boolean {
    return this.#absolute;
  }

  isFolder(): boolean {
    return this.#folder;
  }

  getSegments(): readonly string[] {
    return this.#segments;
  }

  /**
   * The last segment of the normalized path as a relative non-folder path.
   * A relative path whose normalized form is a single segment returns
   * itself as is, backwards segments included: `a/b/..` gives `a/b/..`.
   */
  getFileName(): Path | undefined {
    const normal = this.normalize();
    const size = normal.#segments.length;

    if (size === 0) return undefined;
    if (size === 1 && !normal.#absolute) return this;

    return new Path(trusted, [normal.#segments[size - 1]!], false, false);
  }

  /**
   * The first `size - 1` segments of the normalized path, always as a
   * folder. A single segment has the root as parent when absolute and no
   * parent otherwise.
   */
  getParent(): Path | undefined {
    const normal = this.normalize();
    const size = normal.#segments.length;

    if (size === 0) return undefined;
    if (size === 1) return this.getRoot();

    return new Path(
      trusted,
      normal.#segments.slice(0, size - 1),
      normal.#absolute,
      true,
    );
  }

  /**
   * Appends `other` to this path. An absolute `other` is returned as is.
   * The result is not normalized and is a folder iff `other` is.
   */
  resolve(other: Path | string): Path {
    const right = toPath(other);
    if (right.#absolute) return right;

    return new Path(
      trusted,
      [...this.#segments, ...right.#segments],
      this.#absolute,
      right.#folder,
    );
  }

  /**
   * The suffix of `other` seen from this path, e.g. `/a/b` relativizes
   * `/a/b/c/d` to `c/d`. Both paths are normalized first; they must agree
   * on absoluteness and this path must be a proper prefix of `other`.
   */
  relativize(other: Path | string): Path {
    const left = this.normalize();
    const right = toPath(other).normalize();
    const leftSize = left.#segments.length;
    const rightSize = right.#segments.length;

    if (left.#absolute !== right.#absolute) {
      throw new InvalidRelativizeError("mixed-absoluteness", left, right);
    }
    if (
      leftSize >= rightSize ||
      !segmentsEqual(left.#segments, right.#segments.slice(0, leftSize))
    ) {
      throw new InvalidRelativizeError("not-proper-prefix", left, right);
    }

    if (leftSize === 0 && !left.#absolute) return right;

    return new Path(
      trusted,
      right.#segments.slice(leftSize),
      false,
      right.#folder,
    );
  }

  /**
   * Whether the normalized `other` is a prefix of (or equal to) the
   * normalized path, compared on canonical strings. Paths of different
   * absoluteness never match.
   */
  startsWithSegment(other: Path | string): boolean {
    const left = this.normalize();
    const right = toPath(other).normalize();

    if (left.#segments.length < right.#segments.length) return false;
    if (left.#absolute !== right.#absolute) return false;

    return left.toString().startsWith(right.toString());
  }

  /**
   * Whether the segments of the normalized `other` are a suffix of (or
   * equal to) those of the normalized path. An absolute `other` only
   * matches a full absolute path. Folder-ness is ignored: `a/b` ends with
   * `b/`.
   */
  endsWithSegment(other: Path | string): boolean {
    const left = this.normalize();
    const right = toPath(other).normalize();
    const leftSize = left.#segments.length;
    const rightSize = right.#segments.length;

    if (leftSize < rightSize) return false;

    if (leftSize === rightSize) {
      if (!left.#absolute && right.#absolute) return false;
      return segmentsEqual(left.#segments, right.#segments);
    }

    if (right.#absolute) return false;
    return segmentsEqual(
      left.#segments.slice(leftSize - rightSize),
      right.#segments,
    );
  }

  toAbsolutePath(): Path {
    if (this.#absolute) return this;
    return ROOT_PATH.resolve(this);
  }

  compareTo(other: Path): number {
    return Path.compare(this, other);
  }

  /** Orders paths by canonical string, usable with `Array.prototype.sort`. */
  static compare(a: Path, b: Path): number {
    const left = a.toString();
    const right = b.toString();
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  }

  equals(other: unknown): boolean {
    return other instanceof Path && this.toString() === other.toString();
  }

  hashCode(): number {
    let hash = 1;
    for (const segment of this.#segments) {
      hash = (Math.imul(31, hash) + stringHash(segment)) | 0;
    }
    return hash;
  }

  /** The canonical (non-normalized) string form. */
  toString(): string {
    this.#string ??= this.#toStringInternal();
    return this.#string;
  }

  toJSON(): string {
    return this.toString();
  }

  #toStringInternal(): string {
    if (this.#segments.length === 0) {
      return this.#absolute ? SEPARATOR : "";
    }
    const prefix = this.#absolute ? SEPARATOR : "";
    const suffix = this.#folder ? SEPARATOR : "";
    return prefix + this.#segments.join(SEPARATOR) + suffix;
  }
}

export const ROOT_PATH = new Path(trusted, [], true, true);
export const EMPTY_PATH = new Path(trusted, [], false, false);

function toPath(value: Path | string): Path {
  return value instanceof Path ? value : new Path(value);
}

function checkAndSplit(input: string): string[] {
  if (input.includes(ILLEGAL_CHARACTER)) {
    throw new IllegalCharacterError(input);
  }
  const segments = input.split(SEPARATOR).filter((s) => s.length > 0);
  if (segments.includes(ILLEGAL_SEGMENT)) {
    throw new IllegalSegmentError(segments, ILLEGAL_SEGMENT);
  }
  return segments;
}

function segmentsEqual(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function stringHash(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}
