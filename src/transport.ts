/**
 * The HTTP collaborator a query dispatches through.
 *
 * The core never interprets what a transport returns: status codes,
 * retries and timeouts belong to the transport.
 */

export type QueryValue = string | number | bigint | boolean;

export type QueryParams = Record<
  string,
  QueryValue | readonly QueryValue[] | undefined
>;

/** A body fetch sends as is: text, bytes, blobs, forms, streams. */
export type RawBody = NonNullable<RequestInit["body"]>;

/** Plain objects and arrays, sent as JSON. */
export type JsonBody = { readonly [key: string]: unknown } | readonly unknown[];

export interface RequestOptions {
  /** Query-string parameters. `key` is always set to the API key. */
  params?: QueryParams;
  headers?: Record<string, string>;
  body?: RawBody | JsonBody;
  signal?: AbortSignal;
}

export interface Transport<R = Response> {
  /** `method` is uppercase; `url` is fully qualified. */
  request(method: string, url: string, options: RequestOptions): Promise<R>;
}

export interface FetchTransportOptions {
  /** Defaults to the global fetch. */
  fetch?: typeof fetch;
  /** Sent with every request; per-request headers win. */
  headers?: Record<string, string>;
}

/** Append params to a URL, keeping any query it already has. */
export function withParams(url: string, params: QueryParams = {}): string {
  const target = new URL(url);
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) continue;
    const values = typeof value === "object" ? value : [value];
    for (const v of values) {
      target.searchParams.append(name, String(v));
    }
  }
  return target.href;
}

function isJsonBody(body: RawBody | JsonBody): body is JsonBody {
  if (Array.isArray(body)) return true;
  if (typeof body !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(body);
  return proto === Object.prototype || proto === null;
}

function encodeBody(
  body: RawBody | JsonBody | undefined,
  headers: Record<string, string>,
): RawBody | undefined {
  if (body === undefined) return undefined;
  if (!isJsonBody(body)) return body;
  if (!Object.keys(headers).some((h) => h.toLowerCase() === "content-type")) {
    headers["content-type"] = "application/json";
  }
  return JSON.stringify(body);
}

/**
 * Transport over the platform fetch. Resolves with the Response as-is,
 * whatever its status; rejects only when fetch itself does.
 */
export function fetchTransport(
  options: FetchTransportOptions = {},
): Transport<Response> {
  const fetchImpl = options.fetch ?? globalThis.fetch;
  return {
    request(method, url, { params, headers, body, signal }) {
      const merged = { ...options.headers, ...headers };
      const encoded = encodeBody(body, merged);
      return fetchImpl(withParams(url, params), {
        method,
        headers: merged,
        body: encoded,
        signal,
      });
    },
  };
}
