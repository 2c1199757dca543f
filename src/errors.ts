import { formatArgs } from "./format.ts";
import type { Path } from "./path.ts";

export type ErrorArgs = Readonly<Record<string, unknown>>;

export class PathError extends Error {
  readonly code: string;
  readonly args: ErrorArgs;

  constructor(code: string, message: string, args: ErrorArgs = {}) {
    super(
      Object.keys(args).length === 0
        ? message
        : `${message}: ${formatArgs(args)}`,
    );
    this.code = code;
    this.args = args;
    this.name = this.constructor.name;
  }
}

export class NullInputError extends PathError {
  constructor() {
    super("NULL_INPUT", "path cannot be null");
  }
}

export class IllegalCharacterError extends PathError {
  readonly path: string;

  constructor(path: string) {
    super("ILLEGAL_CHARACTER", "Path contains illegal characters", { path });
    this.path = path;
  }
}

export class IllegalSegmentError extends PathError {
  readonly segments: readonly string[];
  readonly illegalSegment: string;

  constructor(segments: readonly string[], illegalSegment: string) {
    super("ILLEGAL_SEGMENT", "Path contains illegal segments", {
      segments,
      illegalSegment,
    });
    this.segments = segments;
    this.illegalSegment = illegalSegment;
  }
}

export type RelativizeFailure = "mixed-absoluteness" | "not-proper-prefix";

const relativizeMessages: Record<RelativizeFailure, string> = {
  "mixed-absoluteness": "Cannot relativize absolute vs relative path",
  "not-proper-prefix":
    "Relativize requires this path to be a proper prefix of the other path",
};

/** Thrown by `Path.relativize`; `left` and `right` are the normalized operands. */
export class InvalidRelativizeError extends PathError {
  readonly reason: RelativizeFailure;
  readonly left: Path;
  readonly right: Path;

  constructor(reason: RelativizeFailure, left: Path, right: Path) {
    super("INVALID_RELATIVIZE", relativizeMessages[reason], { left, right });
    this.reason = reason;
    this.left = left;
    this.right = right;
  }
}
