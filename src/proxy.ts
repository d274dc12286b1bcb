/**
 * Fluent proxy facade over Query.
 *
 * Property reads descend to static children, calls descend through a
 * parameter, and reading a declared HTTP method yields a function that
 * dispatches the request:
 *
 *   root.boards({ board_id: "B1" }).cards.get()
 *
 * Reading an HTTP method the node does not declare throws
 * UnsupportedMethodError. A static child always wins over an HTTP method
 * of the same name; use `queryOf(stub).request(...)` to reach the method
 * in that case.
 */

import { isHttpMethod } from "./document.ts";
import { UnsupportedMethodError } from "./errors.ts";
import { Query } from "./query.ts";
import type { RequestOptions } from "./transport.ts";
import type { ApiStub, MethodStub } from "./types.ts";

export const STUB_QUERY: unique symbol = Symbol("api-tree.stubQuery");

const INSPECT = Symbol.for("nodejs.util.inspect.custom");
const STRING_FALLBACKS = new Set(["toString", "toJSON", "valueOf"]);

function createMethodStub<R>(query: Query<R>, verb: string): MethodStub<R> {
  return Object.assign(
    (options?: RequestOptions) => query.request(verb, options),
    { doc: () => query.documentation(verb) },
  );
}

export function createStub<R>(query: Query<R>): ApiStub<R> {
  const cache = new Map<string, ApiStub<R> | MethodStub<R>>();

  function describe(): string {
    return query.toString();
  }

  // Arrow target: no own `prototype`, so the get trap is unconstrained
  const target = () => {};

  const handler: ProxyHandler<typeof target> = {
    get(_target, prop) {
      if (prop === STUB_QUERY) return query;
      if (typeof prop === "symbol") {
        return prop === INSPECT || prop === Symbol.toPrimitive
          ? describe
          : undefined;
      }
      // Stubs are not thenables
      if (prop === "then") return undefined;

      const cached = cache.get(prop);
      if (cached !== undefined) return cached;

      let next: ApiStub<R> | MethodStub<R>;
      if (query.has(prop)) {
        next = createStub(query.child(prop));
      } else if (query.supports(prop)) {
        next = createMethodStub(query, prop);
      } else if (STRING_FALLBACKS.has(prop)) {
        return describe;
      } else if (isHttpMethod(prop.toUpperCase())) {
        throw new UnsupportedMethodError(
          prop.toUpperCase(),
          query.methods,
          query.url,
        );
      } else {
        // Throws UnknownPathError
        next = createStub(query.child(prop));
      }
      cache.set(prop, next);
      return next;
    },
    apply(_target, _thisArg, args: unknown[]) {
      if (args.length > 1) {
        throw new TypeError(
          `Expected a single object of keyword arguments, got ${args.length} arguments`,
        );
      }
      const [bag = {}] = args;
      if (bag === null || typeof bag !== "object") {
        throw new TypeError("Expected an object of keyword arguments");
      }
      return createStub(query.with(Object.fromEntries(Object.entries(bag))));
    },
  };

  // The proxy's shape is decided at run time by the schema
  return new Proxy(target, handler) as unknown as ApiStub<R>;
}
