// Client
export { createClient, createRoot, generateApis, DEFAULT_BASE_URL } from "./client.ts";
export type { VersionFactory } from "./client.ts";

// Navigation
export { Query } from "./query.ts";
export type {
  ArgumentValidators,
  Dispatch,
  QueryContext,
  RequestInfo,
} from "./query.ts";
export { createStub } from "./proxy.ts";
export { queryOf } from "./query-of.ts";

// Schema
export { Schema, buildSchema } from "./schema.ts";
export type { MethodSchema, NodeSchema } from "./schema.ts";
export {
  METHODS_KEY,
  packDoc,
  parameterKey,
  parameterKeyword,
  parseDocument,
  unpackDoc,
} from "./document.ts";
export type { RawDocument, RawMethod, RawTree } from "./document.ts";
export { loadDocument, parseDocumentText } from "./loader.ts";
export type { DocumentFormat } from "./loader.ts";

// Path utilities
export { joinPath, segmentText } from "./path.ts";
export type { PathSegment, PathSegments, PathValue } from "./path.ts";

// Formatting
export { formatPath, formatSegment, formatValue } from "./format.ts";

// Transport
export { fetchTransport, withParams } from "./transport.ts";
export type {
  FetchTransportOptions,
  QueryParams,
  QueryValue,
  RequestOptions,
  Transport,
} from "./transport.ts";

// Errors
export {
  ApiTreeError,
  ValidationError,
  UnknownPathError,
  UnknownArgumentError,
  MissingArgumentError,
  TooManyArgumentsError,
  UnsupportedMethodError,
} from "./errors.ts";
export type { ValidationIssue } from "./errors.ts";

// Types
export type {
  ApiClient,
  ApiStub,
  ClientEvent,
  ClientEventMap,
  ClientOptions,
  MethodStub,
  PathArguments,
  RootOptions,
} from "./types.ts";
