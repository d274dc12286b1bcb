export class ApiTreeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = this.constructor.name;
  }
}

export interface ValidationIssue {
  message: string;
  path?: ReadonlyArray<PropertyKey>;
}

export class ValidationError extends ApiTreeError {
  readonly issues: ReadonlyArray<ValidationIssue>;

  constructor(issues: ReadonlyArray<ValidationIssue>) {
    super(
      "VALIDATION_ERROR",
      `Validation failed: ${issues.map((i) => i.message).join(", ")}`,
    );
    this.issues = issues;
  }
}

export class UnknownPathError extends ApiTreeError {
  readonly segment: string;
  readonly path: string;

  /** `path` is the formatted path of the node the lookup started from. */
  constructor(segment: string, path: string) {
    super("UNKNOWN_PATH", `Unknown path "${segment}" at ${path}`);
    this.segment = segment;
    this.path = path;
  }
}

export class MissingArgumentError extends ApiTreeError {
  readonly allowed: readonly string[];

  constructor(allowed: readonly string[]) {
    super(
      "MISSING_ARGUMENT",
      allowed.length > 0
        ? `A keyword argument must be provided: ${allowed.join(", ")}`
        : "A keyword argument must be provided, but none are accepted here",
    );
    this.allowed = allowed;
  }
}

export class TooManyArgumentsError extends ApiTreeError {
  readonly keywords: readonly string[];

  constructor(keywords: readonly string[]) {
    super(
      "TOO_MANY_ARGUMENTS",
      `Too many arguments: expected 1, got ${keywords.length} (${keywords.join(", ")})`,
    );
    this.keywords = keywords;
  }
}

export class UnknownArgumentError extends ApiTreeError {
  readonly keyword: string;
  readonly allowed: readonly string[];

  constructor(keyword: string, allowed: readonly string[]) {
    super(
      "UNKNOWN_ARGUMENT",
      allowed.length > 0
        ? `Unknown argument "${keyword}", expected one of: ${allowed.join(", ")}`
        : `Unknown argument "${keyword}", no arguments are accepted here`,
    );
    this.keyword = keyword;
    this.allowed = allowed;
  }
}

export class UnsupportedMethodError extends ApiTreeError {
  readonly method: string;
  readonly allowed: readonly string[];
  readonly path: string;

  constructor(method: string, allowed: readonly string[], path: string) {
    super(
      "UNSUPPORTED_METHOD",
      allowed.length > 0
        ? `Method ${method} is not supported at ${path} (supported: ${allowed.join(", ")})`
        : `Method ${method} is not supported at ${path}`,
    );
    this.method = method;
    this.allowed = allowed;
    this.path = path;
  }
}
