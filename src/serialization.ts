/**
 * Serialization layer using devalue with a built-in `Path` reducer/reviver.
 *
 * A path travels as its canonical string. Reviving goes through the
 * constructor, so a malformed string raises the same errors as direct
 * construction.
 */

import { stringify, parse, unflatten } from "devalue";
import { z } from "zod";
import { Path } from "./path.ts";

export type Reducers = Record<string, (value: unknown) => false | unknown[]>;
export type Revivers = Record<string, (value: unknown) => unknown>;

export interface Serializer {
  stringify(value: unknown): string;
  parse(str: string): unknown;
  revive(flattened: number | unknown[]): unknown;
}

export interface SerializerOptions {
  reducers?: Reducers;
  revivers?: Revivers;
}

const encodedPath = z.tuple([z.string()]);

// Reducers must return a truthy value to claim a type, hence the tuple:
// the empty path's canonical string is "".
const builtinReducers: Reducers = {
  Path: (v) => v instanceof Path && [v.toString()],
};

const builtinRevivers: Revivers = {
  Path: (v) => new Path(encodedPath.parse(v)[0]),
};

export function createSerializer(options: SerializerOptions = {}): Serializer {
  const reducers = { ...options.reducers, ...builtinReducers };
  const revivers = { ...options.revivers, ...builtinRevivers };
  return {
    stringify(value: unknown): string {
      return stringify(value, reducers);
    },
    parse(str: string): unknown {
      return parse(str, revivers);
    },
    revive(flattened: number | unknown[]): unknown {
      return unflatten(flattened, revivers);
    },
  };
}
