/**
 * zod schemas that parse strings into paths at configuration and request
 * boundaries. Construction failures surface as zod issues carrying the
 * error's message; zod schemas also implement Standard Schema.
 */

import { z } from "zod";
import { PathError } from "./errors.ts";
import { Path } from "./path.ts";

export const pathSchema = z.string().transform((input, ctx) => {
  try {
    return new Path(input);
  } catch (err) {
    if (!(err instanceof PathError)) throw err;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err.message,
      params: { code: err.code },
    });
    return z.NEVER;
  }
});

export const absolutePathSchema = pathSchema.refine((p) => p.isAbsolute(), {
  message: "Expected an absolute path",
});

export const folderPathSchema = pathSchema.refine((p) => p.isFolder(), {
  message: "Expected a folder path",
});
