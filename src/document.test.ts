import { test, expect, describe } from "vitest";
import {
  packDoc,
  parameterKey,
  parameterKeyword,
  parseDocument,
  unpackDoc,
} from "./document.ts";
import { ValidationError } from "./errors.ts";
import { sampleDocument } from "./test-utils.ts";

function validationErrorOf(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("parameter keys", () => {
  test("strip one underscore on each side", () => {
    expect(parameterKeyword("_board_id_")).toBe("board_id");
    expect(parameterKeyword("_filter_")).toBe("filter");
  });

  test("static names are not parameters", () => {
    expect(parameterKeyword("boards")).toBeUndefined();
    expect(parameterKeyword("_private")).toBeUndefined();
    expect(parameterKeyword("__")).toBeUndefined();
  });

  test("names wrapped in doubled underscores are static", () => {
    expect(parameterKeyword("__proto__")).toBeUndefined();
    expect(parameterKeyword("___")).toBeUndefined();
    expect(parameterKeyword("_id_list__")).toBeUndefined();
    expect(parameterKeyword("_a_")).toBe("a");
  });

  test("parameterKey wraps a keyword", () => {
    expect(parameterKey("board_id")).toBe("_board_id_");
  });
});

describe("documentation codec", () => {
  test("unpacks what packDoc produced", () => {
    const text = "PUT /1/cards/[card_id]\n\nRenomme la carte ✓";
    expect(unpackDoc(packDoc(text))).toBe(text);
  });

  test("packed form is base64", () => {
    expect(packDoc("GET /1/batch")).toMatch(/^[A-Za-z0-9+/]+=*$/);
  });

  test("garbage is a ValidationError", () => {
    const err = validationErrorOf(() => unpackDoc("bm90IGd6aXA="));
    expect(err.code).toBe("VALIDATION_ERROR");
    expect(err.message).toMatch(
      /^Validation failed: Documentation is not base64-encoded gzip: /,
    );
  });
});

describe("parseDocument", () => {
  test("accepts a well-formed document unchanged", () => {
    const document = sampleDocument();
    expect(parseDocument(document)).toEqual(document);
  });

  test("null subtrees become empty mappings", () => {
    expect(parseDocument({ "1": { boards: null } })).toEqual({
      "1": { boards: {} },
    });
  });

  test("METHODS must be a list", () => {
    const err = validationErrorOf(() =>
      parseDocument({ "1": { METHODS: { GET: {} } } }),
    );
    expect(err.message).toBe(
      "Validation failed: METHODS must be a list of [method, doc] pairs",
    );
    expect(err.issues[0]?.path).toEqual(["1", "METHODS"]);
  });

  test("path segments must be mappings", () => {
    const err = validationErrorOf(() =>
      parseDocument({ "1": { boards: [["GET", packDoc("x")]] } }),
    );
    expect(err.message).toBe('Validation failed: "boards" must be a mapping');
    expect(err.issues[0]?.path).toEqual(["1", "boards"]);
  });

  test("method names must be bare tokens", () => {
    const err = validationErrorOf(() =>
      parseDocument({ "1": { METHODS: [["GET /1", packDoc("x")]] } }),
    );
    expect(err.message).toBe(
      "Validation failed: HTTP method must be a bare token",
    );
    expect(err.issues[0]?.path).toEqual(["1", "METHODS", 0, 0]);
  });

  test("scalars are rejected where a subtree is expected", () => {
    const err = validationErrorOf(() => parseDocument({ "1": { boards: 5 } }));
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]?.path).toEqual(["1", "boards"]);
  });

  test("the document itself must be a mapping", () => {
    expect(() => parseDocument(["1"])).toThrow(ValidationError);
  });
});
