/**
 * ApiStub<R>: the compile-time shape of a proxy stub.
 *
 * The endpoint tree is only known at run time, so every property of a
 * stub is typed as another stub. Calling a stub with keyword arguments
 * descends through a parameter; calling a stub that names an HTTP method
 * (with request options or nothing) resolves with the transport's `R`.
 *
 * A method's `doc()` exists at run time but is typed as another stub
 * call; `queryOf(stub).documentation("GET")` is the typed way to read it.
 */

import type { PathValue } from "./path.ts";
import type {
  ArgumentValidators,
  Dispatch,
  Query,
  RequestInfo,
} from "./query.ts";
import type { RequestOptions, Transport } from "./transport.ts";

/** Keyword arguments of a parameter descent, e.g. `{ board_id: "B1" }`. */
export type PathArguments = Readonly<Record<string, PathValue>>;

export interface MethodStub<R> {
  (options?: RequestOptions): Promise<R>;
  /** Decoded documentation of this method. */
  doc(): string;
}

export interface ApiStub<R = Response> {
  (options?: RequestOptions): Promise<R>;
  (args: PathArguments): ApiStub<R>;
  readonly [segment: string]: ApiStub<R>;
}

// -- Client options --

export interface RootOptions<R> {
  transport: Transport<R>;
  /** Prefix of every request URL. Defaults to DEFAULT_BASE_URL. */
  baseUrl?: string;
  /** Validators for parameter values, keyed by keyword. */
  arguments?: ArgumentValidators;
  /** Wraps every dispatch; defaults to sending directly. */
  dispatch?: Dispatch<R>;
}

export interface ClientOptions<R> extends Omit<RootOptions<R>, "dispatch"> {
  version: string;
  apiKey: string;
}

// -- Client event types --

export type ClientEventMap<R> = {
  /** Middleware around every request; first registered is outermost. */
  request: (info: RequestInfo, next: () => Promise<R>) => Promise<R>;
  /** Called when a request (transport or middleware) fails. */
  error: (info: RequestInfo, error: unknown) => void;
};

export type ClientEvent = keyof ClientEventMap<unknown>;

export interface ApiClient<R = Response> {
  readonly root: ApiStub<R>;
  /** The root as an explicit Query. */
  readonly query: Query<R>;
  on<E extends ClientEvent>(event: E, handler: ClientEventMap<R>[E]): void;
  off<E extends ClientEvent>(event: E, handler: ClientEventMap<R>[E]): void;
}
