/**
 * Query: one immutable point in a walk down the endpoint tree.
 *
 * A query holds the node it stands on, its own path segment and its
 * parent. Descending returns a new query; nothing is ever mutated, so a
 * partial path can be branched from freely. Only `request()` has an
 * effect outside the process.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import {
  MissingArgumentError,
  TooManyArgumentsError,
  UnknownArgumentError,
  UnknownPathError,
  UnsupportedMethodError,
  ValidationError,
} from "./errors.ts";
import { formatPath, formatValue } from "./format.ts";
import {
  joinPath,
  type PathSegment,
  type PathSegments,
  type PathValue,
} from "./path.ts";
import type { Schema } from "./schema.ts";
import type { QueryParams, RequestOptions, Transport } from "./transport.ts";

/** Per-keyword validators applied to parameter values before descent. */
export type ArgumentValidators = Readonly<Record<string, StandardSchemaV1>>;

export interface RequestInfo {
  /** Uppercase HTTP method. */
  method: string;
  /** Fully qualified URL, without query string. */
  url: string;
  /** Human-readable path, e.g. `root["1"].boards({board_id: "B1"})`. */
  path: string;
  /** Query-string parameters, API key included. */
  params: Readonly<QueryParams>;
}

const INSPECT: unique symbol = Symbol.for("nodejs.util.inspect.custom");

export type Dispatch<R> = (
  info: RequestInfo,
  send: () => Promise<R>,
) => Promise<R>;

/** State shared by every query descended from one root. */
export interface QueryContext<R> {
  readonly schema: Schema;
  readonly apiKey: string;
  /** Always ends with "/". */
  readonly baseUrl: string;
  readonly transport: Transport<R>;
  readonly validators: ArgumentValidators;
  readonly dispatch: Dispatch<R>;
}

function isPathValue(value: unknown): value is PathValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return true;
    default:
      return false;
  }
}

function validateArgument(
  validators: ArgumentValidators,
  keyword: string,
  value: unknown,
): PathValue {
  let validated = value;
  const validator = Object.hasOwn(validators, keyword)
    ? validators[keyword]
    : undefined;
  if (validator) {
    const result = validator["~standard"].validate(value);
    if (result instanceof Promise) {
      throw new ValidationError([
        { message: `${keyword}: validator must be synchronous` },
      ]);
    }
    if (result.issues) {
      throw new ValidationError(
        result.issues.map((issue) => ({
          message: `${keyword}: ${issue.message}`,
          path: issue.path?.map((p) => (typeof p === "object" ? p.key : p)),
        })),
      );
    }
    validated = result.value;
  }
  if (!isPathValue(validated)) {
    throw new ValidationError([
      {
        message: `${keyword}: expected a string, number, bigint or boolean, got ${formatValue(validated)}`,
      },
    ]);
  }
  return validated;
}

export class Query<R = Response> {
  readonly context: QueryContext<R>;
  /** Index of the schema node this query stands on. */
  readonly node: number;
  readonly segment: PathSegment;
  readonly parent: Query<R> | null;
  readonly legalArguments: readonly string[];
  #url: string | undefined;

  constructor(
    context: QueryContext<R>,
    node: number,
    segment: PathSegment,
    parent: Query<R> | null,
  ) {
    this.context = context;
    this.node = node;
    this.segment = segment;
    this.parent = parent;
    this.legalArguments = context.schema.legalArgumentKeywords(node);
    Object.freeze(this);
  }

  /** Segments from the root down to this query. */
  get path(): PathSegments {
    const segments: PathSegments = [];
    for (let q: Query<R> | null = this; q; q = q.parent) {
      segments.push(q.segment);
    }
    return segments.reverse();
  }

  /** The path relative to the base URL, e.g. `1/boards/B1/cards`. */
  get url(): string {
    return (this.#url ??= joinPath(this.path));
  }

  /** Static child names declared at this node. */
  get children(): readonly string[] {
    return this.context.schema.childNames(this.node);
  }

  /** HTTP methods declared at this node, uppercase. */
  get methods(): readonly string[] {
    return this.context.schema.methods(this.node).map((m) => m.method);
  }

  has(name: string): boolean {
    return this.context.schema.childByName(this.node, name) !== undefined;
  }

  supports(verb: string): boolean {
    return this.context.schema.method(this.node, verb) !== undefined;
  }

  child(name: string): Query<R> {
    const index = this.context.schema.childByName(this.node, name);
    if (index === undefined) {
      throw new UnknownPathError(name, formatPath(this.path));
    }
    return new Query(this.context, index, name, this);
  }

  /**
   * Descend through a parameter: `boards.with({ board_id: "B1" })`.
   * Exactly one keyword must be given.
   */
  with(args: Readonly<Record<string, unknown>>): Query<R> {
    const keywords = Object.keys(args);
    if (keywords.length === 0) {
      throw new MissingArgumentError(this.legalArguments);
    }
    if (keywords.length > 1) {
      throw new TooManyArgumentsError(keywords);
    }
    const keyword = keywords[0];
    const index = this.context.schema.parameterChild(this.node, keyword);
    if (index === undefined) {
      throw new UnknownArgumentError(keyword, this.legalArguments);
    }
    const value = validateArgument(
      this.context.validators,
      keyword,
      args[keyword],
    );
    return new Query(this.context, index, [keyword, value], this);
  }

  /** Decoded documentation of a declared method. */
  documentation(verb: string): string {
    return this.#method(verb).doc;
  }

  /**
   * Issue the HTTP request for this path. The API key is merged into
   * `params.key`; the caller's options object is left untouched.
   */
  request(verb: string, options: RequestOptions = {}): Promise<R> {
    const { method } = this.#method(verb);
    const { apiKey, baseUrl, transport, dispatch } = this.context;
    const params: QueryParams = { ...options.params, key: apiKey };
    const merged: RequestOptions = { ...options, params };
    const url = baseUrl + this.url;
    const info: RequestInfo = {
      method,
      url,
      path: formatPath(this.path),
      params,
    };
    return dispatch(info, () => transport.request(method, url, merged));
  }

  toString(): string {
    return `Query<"${this.url}">`;
  }

  [INSPECT](): string {
    return this.toString();
  }

  #method(verb: string) {
    const method = this.context.schema.method(this.node, verb);
    if (!method) {
      throw new UnsupportedMethodError(
        verb.toUpperCase(),
        this.methods,
        this.url,
      );
    }
    return method;
  }
}
