/**
 * Offline tree builder.
 *
 * Turns documented endpoints (`GET /1/boards/[idBoard]/cards` plus its
 * text) into the schema document the client loads. Extracting endpoints
 * from an HTML reference is left to the caller.
 */

import { z } from "zod";
import {
  HTTP_METHODS,
  isHttpMethod,
  METHODS_KEY,
  packDoc,
  parameterKeyword,
  type HttpMethod,
  type RawDocument,
  type RawTree,
} from "../document.ts";
import { ValidationError } from "../errors.ts";

export interface EndpointRecord {
  method: HttpMethod;
  url: string;
  doc: string;
}

const endpointListSchema = z.array(
  z.object({
    method: z.enum(HTTP_METHODS),
    url: z.string().min(1),
    doc: z.string().default(""),
  }),
);

const ENDPOINT_LINE = new RegExp(
  `\\b(${HTTP_METHODS.join("|")})\\s+(/[/A-Za-z0-9\\[\\]_]*)`,
);

/** `GET /1/actions/[idAction]` → true; `action` → false. */
export function isApiDefinition(line: string): boolean {
  return isHttpMethod(line.split(" ", 1)[0] ?? "");
}

/** Extract method and URL from a definition line, wherever it appears. */
export function parseEndpointLine(
  line: string,
): { method: HttpMethod; url: string } | undefined {
  const match = ENDPOINT_LINE.exec(line);
  const method = match?.[1];
  const url = match?.[2];
  if (method === undefined || url === undefined || !isHttpMethod(method)) {
    return undefined;
  }
  return { method, url };
}

/**
 * `minutesBetweenSummaries` → `minutes_between_summaries`.
 * Every character that is not lowercase becomes `_`, followed by its
 * lowercase form when it is a letter, so `[idAction]` → `_id_action_`.
 */
export function camelCaseToUnderscore(segment: string): string {
  let out = "";
  for (const char of segment) {
    const lower = char.toLowerCase();
    const upper = char.toUpperCase();
    if (char !== upper) {
      out += char;
      continue;
    }
    out += "_";
    if (lower !== upper) out += lower;
  }
  return out;
}

/**
 * Split reference text into endpoint records. A record starts at each
 * definition line; the lines up to the next one are its documentation,
 * led by the normalized `METHOD /url` line. Text before the first
 * definition is ignored.
 */
export function parseEndpointText(text: string): EndpointRecord[] {
  const blocks: Array<{ method: HttpMethod; url: string; lines: string[] }> =
    [];
  for (const line of text.split(/\r?\n/)) {
    const definition = isApiDefinition(line)
      ? parseEndpointLine(line)
      : undefined;
    if (definition) {
      blocks.push({
        ...definition,
        lines: [`${definition.method} ${definition.url}`],
      });
    } else {
      blocks.at(-1)?.lines.push(line);
    }
  }
  return blocks.map(({ method, url, lines }) => ({
    method,
    url,
    doc: lines.join("\n").trim(),
  }));
}

/** Validate parsed YAML or JSON as a list of endpoint records. */
export function parseEndpoints(value: unknown): EndpointRecord[] {
  const result = endpointListSchema.safeParse(value);
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

function subtree(tree: RawTree, key: string): RawTree {
  const existing = Object.hasOwn(tree, key) ? tree[key] : undefined;
  if (existing !== undefined && !Array.isArray(existing)) return existing;
  const created: RawTree = {};
  tree[key] = created;
  return created;
}

/**
 * Group endpoints into a document: the first path element is the
 * version, the rest are normalized with camelCaseToUnderscore.
 */
export function createTree(endpoints: Iterable<EndpointRecord>): RawDocument {
  const document: RawDocument = {};

  for (const { method, url, doc } of endpoints) {
    const [version = "", ...rest] = url.replace(/^\/+|\/+$/g, "").split("/");
    let here = subtree(document, version);
    for (const part of rest) {
      here = subtree(here, camelCaseToUnderscore(part));
    }

    const methods = Object.hasOwn(here, METHODS_KEY)
      ? here[METHODS_KEY]
      : undefined;
    if (Array.isArray(methods)) {
      if (!methods.some(([m]) => m === method)) {
        methods.push([method, packDoc(doc)]);
      }
    } else {
      here[METHODS_KEY] = [[method, packDoc(doc)]];
    }
  }

  return document;
}

/**
 * Every endpoint of a document as `METHOD path` lines, parameters shown
 * as `{keyword}`, in document order.
 */
export function listEndpoints(document: RawDocument, version?: string) {
  const lines: string[] = [];

  function walk(tree: RawTree, path: string[]) {
    for (const [key, value] of Object.entries(tree)) {
      if (Array.isArray(value)) {
        if (key !== METHODS_KEY) continue;
        for (const [method] of value) {
          lines.push(`${method.toUpperCase()} ${path.join("/")}`);
        }
        continue;
      }
      const keyword = parameterKeyword(key);
      walk(value, [...path, keyword === undefined ? key : `{${keyword}}`]);
    }
  }

  for (const [v, tree] of Object.entries(document)) {
    if (version === undefined || v === version) walk(tree, [v]);
  }
  return lines;
}
