/**
 * The serialized endpoint tree, as loaded from a schema file.
 *
 * A document maps API version → version tree. Inside a tree, every key is
 * one of:
 *   - `METHODS`: a list of `[httpMethod, packedDoc]` pairs
 *   - `_name_`: a parameter node accepting the keyword `name`
 *   - anything else: a static path segment
 *
 * Documentation is stored as base64(gzip(utf8(text))).
 */

import { gunzipSync, gzipSync } from "node:zlib";
import { z } from "zod";
import { ValidationError } from "./errors.ts";

export const METHODS_KEY = "METHODS";

export const HTTP_METHODS = [
  "OPTIONS",
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "TRACE",
  "CONNECT",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(word: string): word is HttpMethod {
  return HTTP_METHODS.some((m) => m === word);
}

export type RawMethod = [method: string, doc: string];

export interface RawTree {
  [key: string]: RawTree | RawMethod[];
}

export type RawDocument = Record<string, RawTree>;

const HTTP_TOKEN = /^[A-Za-z]+$/;

/**
 * `_board_id_` → `board_id`; `undefined` for static names. The name is
 * wrapped in exactly one underscore on each side, so `__proto__` is static.
 */
export function parameterKeyword(key: string): string | undefined {
  if (key.length <= 2 || !key.startsWith("_") || !key.endsWith("_")) {
    return undefined;
  }
  const keyword = key.slice(1, -1);
  if (keyword.startsWith("_") || keyword.endsWith("_")) return undefined;
  return keyword;
}

export function parameterKey(keyword: string): string {
  return `_${keyword}_`;
}

const methodSchema = z.tuple([
  z.string().regex(HTTP_TOKEN, "HTTP method must be a bare token"),
  z.string(),
]);

const treeSchema: z.ZodType<RawTree, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .preprocess(
      // YAML writes an empty mapping as null
      (value) => (value === null ? {} : value),
      z.record(z.string(), z.union([z.array(methodSchema), treeSchema])),
    )
    .superRefine((tree, ctx) => {
      for (const [key, value] of Object.entries(tree)) {
        if (key === METHODS_KEY && !Array.isArray(value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${METHODS_KEY} must be a list of [method, doc] pairs`,
            path: [key],
          });
        } else if (key !== METHODS_KEY && Array.isArray(value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `"${key}" must be a mapping`,
            path: [key],
          });
        }
      }
    }),
);

const documentSchema = z.record(z.string(), treeSchema);

/**
 * Validate an untrusted value (parsed YAML or JSON) as a schema document.
 * Throws ValidationError with one issue per problem found.
 */
export function parseDocument(value: unknown): RawDocument {
  const result = documentSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        message: issue.message,
        path: issue.path,
      })),
    );
  }
  return result.data;
}

export function packDoc(text: string): string {
  return gzipSync(Buffer.from(text, "utf8")).toString("base64");
}

export function unpackDoc(packed: string): string {
  try {
    return gunzipSync(Buffer.from(packed, "base64")).toString("utf8");
  } catch (err) {
    throw new ValidationError([
      {
        message: `Documentation is not base64-encoded gzip: ${err instanceof Error ? err.message : String(err)}`,
      },
    ]);
  }
}
