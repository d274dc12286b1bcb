/**
 * Type-level tests for ApiStub<R>.
 *
 * This file is NOT executed at runtime. It is checked by `npm run typecheck`.
 * Every @ts-expect-error must suppress a real error; tsc reports unused
 * directives, so each one doubles as a negative assertion.
 */

import type { Query } from "./query.ts";
import type { ApiClient, ApiStub, MethodStub, PathArguments } from "./types.ts";
import type { VersionFactory } from "./client.ts";
import { queryOf } from "./query-of.ts";

type Equal<A, B> =
  (<T>() => T extends A ? 1 : 2) extends <T>() => T extends B ? 1 : 2
    ? true
    : false;
function assertType<T extends true>(_value?: T): void {}

interface Reply {
  status: number;
}

declare const root: ApiStub<Reply>;
declare const client: ApiClient<Reply>;
declare const v1: VersionFactory<Reply>;

// Property reads descend
const cards = root.boards({ board_id: "B1" }).cards;
assertType<Equal<typeof cards, ApiStub<Reply>>>();

// Calling with keyword arguments descends through a parameter
const board = root.boards({ board_id: 42 });
assertType<Equal<typeof board, ApiStub<Reply>>>();

// Calling with request options (or nothing) resolves with R
const reply = cards.get({ params: { limit: 10 } });
assertType<Equal<typeof reply, Promise<Reply>>>();
const bare = cards.get();
assertType<Equal<typeof bare, Promise<Reply>>>();

// Keyword values are primitives
const args: PathArguments = { board_id: "B1", closed: false, n: 1n };
void args;
// @ts-expect-error objects are not path values
const badArgs: PathArguments = { board_id: { id: "B1" } };
void badArgs;

// Client surface
assertType<Equal<typeof client.root, ApiStub<Reply>>>();
assertType<Equal<typeof client.query, Query<Reply>>>();
client.on("request", (info, next) => {
  assertType<Equal<typeof info.method, string>>();
  return next();
});
client.on("error", (_info, error) => {
  assertType<Equal<typeof error, unknown>>();
});
// @ts-expect-error unknown event
client.on("response", () => {});
// @ts-expect-error request middleware must return the reply
client.on("request", () => 1);

// Version factories
const versionRoot = v1("test-key");
assertType<Equal<typeof versionRoot, ApiStub<Reply>>>();
assertType<Equal<typeof v1.version, string>>();

declare const method: MethodStub<Reply>;
assertType<Equal<ReturnType<typeof method.doc>, string>>();

// Documentation is read through the Query
const documentation = queryOf(root.batch).documentation("GET");
assertType<Equal<typeof documentation, string>>();
