/**
 * queryOf(): unwrap the Query behind a proxy stub.
 *
 * Gives unambiguous access to children and methods that share a name,
 * and to the resolved URL of a stub.
 */

import { STUB_QUERY } from "./proxy.ts";
import { Query } from "./query.ts";
import type { ApiStub } from "./types.ts";

export function queryOf<R>(stub: ApiStub<R>): Query<R> {
  const query: unknown = Reflect.get(stub, STUB_QUERY);
  if (!(query instanceof Query)) {
    throw new TypeError("queryOf() requires a stub");
  }
  return query;
}
