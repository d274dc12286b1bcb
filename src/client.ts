/**
 * Client factories.
 *
 * A root query is bound to one version of a document. Schemas are built
 * once per (document, version) and shared by every root created from
 * them, so repeated factory calls hold references into a single arena.
 */

import type { RawDocument } from "./document.ts";
import { UnknownPathError } from "./errors.ts";
import { formatPath } from "./format.ts";
import { createStub } from "./proxy.ts";
import { Query, type Dispatch, type RequestInfo } from "./query.ts";
import { buildSchema, type Schema } from "./schema.ts";
import type {
  ApiClient,
  ApiStub,
  ClientEvent,
  ClientEventMap,
  ClientOptions,
  RootOptions,
} from "./types.ts";

/**
 * The REST host. The legacy `https://trello.com/` host serves the same
 * `1/...` paths; pass it as `baseUrl` to target it instead.
 */
export const DEFAULT_BASE_URL = "https://api.trello.com/";

const schemaCache = new WeakMap<RawDocument, Map<string, Schema>>();

function schemaFor(document: RawDocument, version: string): Schema {
  let versions = schemaCache.get(document);
  if (!versions) {
    versions = new Map();
    schemaCache.set(document, versions);
  }
  let schema = versions.get(version);
  if (!schema) {
    const tree = Object.hasOwn(document, version)
      ? document[version]
      : undefined;
    if (!tree) {
      throw new UnknownPathError(version, formatPath([]));
    }
    schema = buildSchema(tree);
    versions.set(version, schema);
  }
  return schema;
}

function sendDirectly<R>(_info: RequestInfo, send: () => Promise<R>) {
  return send();
}

/**
 * Create the root query of `version`. Its segment is the version string,
 * so every URL starts with it (an empty version adds nothing).
 */
export function createRoot<R>(
  document: RawDocument,
  version: string,
  apiKey: string,
  options: RootOptions<R>,
): Query<R> {
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  return new Query(
    {
      schema: schemaFor(document, version),
      apiKey,
      baseUrl: baseUrl.endsWith("/") ? baseUrl : baseUrl + "/",
      transport: options.transport,
      validators: options.arguments ?? {},
      dispatch: options.dispatch ?? sendDirectly,
    },
    0,
    version,
    null,
  );
}

export function createClient<R>(
  document: RawDocument,
  options: ClientOptions<R>,
): ApiClient<R> {
  // --- Event emitter ---
  const listeners: { [E in ClientEvent]: Set<ClientEventMap<R>[E]> } = {
    request: new Set(),
    error: new Set(),
  };

  function on<E extends ClientEvent>(event: E, handler: ClientEventMap<R>[E]) {
    listeners[event].add(handler);
  }

  function off<E extends ClientEvent>(
    event: E,
    handler: ClientEventMap<R>[E],
  ) {
    listeners[event].delete(handler);
  }

  const dispatch: Dispatch<R> = (info, send) => {
    // Snapshot handlers at call time so mid-request off() doesn't affect this chain
    const handlers = [...listeners.request];
    // Build middleware chain: first registered = outermost
    let execute = send;
    for (let i = handlers.length - 1; i >= 0; i--) {
      const handler = handlers[i];
      const next = execute;
      execute = () => handler(info, next);
    }
    // A middleware that throws synchronously still rejects the promise
    return new Promise<R>((resolve) => resolve(execute())).catch(
      (err: unknown) => {
        for (const handler of listeners.error) handler(info, err);
        throw err;
      },
    );
  };

  const query = createRoot(document, options.version, options.apiKey, {
    ...options,
    dispatch,
  });

  return {
    root: createStub(query),
    query,
    on,
    off,
  };
}

export interface VersionFactory<R> {
  (apiKey: string): ApiStub<R>;
  readonly version: string;
  readonly description: string;
}

/**
 * One entry point per declared version: `V1`, `V2`, ...
 * Each takes an API key and returns the root stub of that version.
 */
export function generateApis<R>(
  document: RawDocument,
  options: Omit<ClientOptions<R>, "version" | "apiKey">,
): Record<`V${string}`, VersionFactory<R>> {
  const apis: Record<`V${string}`, VersionFactory<R>> = {};
  for (const version of Object.keys(document)) {
    apis[`V${version}`] = Object.assign(
      (apiKey: string) =>
        createClient(document, { ...options, version, apiKey }).root,
      {
        version,
        description: `REST interface, version ${version}`,
      },
    );
  }
  return apis;
}
