// Path value type
export {
  Path,
  ROOT_PATH,
  EMPTY_PATH,
  SEPARATOR,
  SEPARATOR_CHAR_CODE,
  BACKWARDS_SEGMENT,
} from "./path.ts";

// Factory
export { path } from "./paths.ts";

// Errors
export {
  PathError,
  NullInputError,
  IllegalCharacterError,
  IllegalSegmentError,
  InvalidRelativizeError,
} from "./errors.ts";
export type { ErrorArgs, RelativizeFailure } from "./errors.ts";

// Formatting
export { formatValue, formatArgs } from "./format.ts";

// Serialization
export { createSerializer } from "./serialization.ts";
export type {
  Serializer,
  SerializerOptions,
  Reducers,
  Revivers,
} from "./serialization.ts";

// Schemas
export {
  pathSchema,
  absolutePathSchema,
  folderPathSchema,
} from "./schema.ts";
