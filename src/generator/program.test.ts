import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { unpackDoc } from "../document.ts";
import { ValidationError } from "../errors.ts";
import { parseDocumentText } from "../loader.ts";
import { createProgram, serializeDocument, type ProgramIO } from "./program.ts";
import { createTree, listEndpoints } from "./tree.ts";

const endpointsYaml = `
- method: GET
  url: /1/boards/[idBoard]
  doc: Get a board
- method: GET
  url: /1/boards/[idBoard]/cards
- method: POST
  url: /1/boards
  doc: Create a board
`;

let dir: string;
let output: string[];
let io: ProgramIO;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "api-tree-program-"));
  output = [];
  io = { out: (text) => output.push(text) };
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function run(...args: string[]) {
  return createProgram(io).exitOverride().parseAsync(args, { from: "user" });
}

describe("build", () => {
  test("writes YAML to stdout by default", async () => {
    const file = join(dir, "endpoints.yaml");
    await writeFile(file, endpointsYaml, "utf8");
    await run("build", file);

    const document = parseDocumentText(output.join(""));
    expect(listEndpoints(document)).toEqual([
      "GET 1/boards/{id_board}",
      "GET 1/boards/{id_board}/cards",
      "POST 1/boards",
    ]);
  });

  test("picks JSON from the output file's extension", async () => {
    const file = join(dir, "endpoints.yaml");
    const out = join(dir, "schema.json");
    await writeFile(file, endpointsYaml, "utf8");
    await run("build", file, "-o", out);

    expect(output).toEqual([]);
    const document = parseDocumentText(await readFile(out, "utf8"), "json");
    const boards = document["1"]?.boards;
    const methods =
      boards && !Array.isArray(boards) ? boards.METHODS : undefined;
    expect(Array.isArray(methods) ? methods[0]?.[0] : undefined).toBe("POST");
    expect(
      Array.isArray(methods) ? unpackDoc(methods[0]?.[1] ?? "") : undefined,
    ).toBe("Create a board");
  });

  test("rejects an invalid endpoint list", async () => {
    const file = join(dir, "endpoints.json");
    await writeFile(file, JSON.stringify([{ method: "FETCH", url: "/1" }]));
    await expect(run("build", file)).rejects.toBeInstanceOf(ValidationError);
  });

  test("rejects a file that does not parse", async () => {
    const file = join(dir, "endpoints.json");
    await writeFile(file, "[{", "utf8");
    await expect(run("build", file)).rejects.toThrow(
      `Cannot parse ${file}:`,
    );
  });
});

describe("build from reference text", () => {
  const reference = [
    "Actions",
    "GET /1/actions/[idAction]",
    "Fetch an action.",
    "DELETE /1/actions/[idAction]",
    "Remove an action.",
  ].join("\n");

  test("text files are read as definition blocks", async () => {
    const file = join(dir, "reference.txt");
    await writeFile(file, reference, "utf8");
    await run("build", file, "--format", "json");

    const document = parseDocumentText(output.join(""), "json");
    expect(listEndpoints(document)).toEqual([
      "GET 1/actions/{id_action}",
      "DELETE 1/actions/{id_action}",
    ]);
    const action = document["1"]?.actions;
    const node =
      action && !Array.isArray(action) ? action._id_action_ : undefined;
    const methods = node && !Array.isArray(node) ? node.METHODS : undefined;
    expect(
      Array.isArray(methods) ? unpackDoc(methods[1]?.[1] ?? "") : undefined,
    ).toBe("DELETE /1/actions/[idAction]\nRemove an action.");
  });

  test("--input text overrides the extension", async () => {
    const file = join(dir, "reference.yaml");
    await writeFile(file, reference, "utf8");
    await run("build", file, "--input", "text");
    expect(listEndpoints(parseDocumentText(output.join("")))).toHaveLength(2);
  });

  test("text without definitions is rejected", async () => {
    const file = join(dir, "empty.md");
    await writeFile(file, "# Nothing documented\n", "utf8");
    await expect(run("build", file)).rejects.toThrow(
      `No endpoint definitions found in ${file}`,
    );
  });
});

describe("show", () => {
  test("lists endpoints, optionally for one version", async () => {
    const schema = join(dir, "schema.json");
    const document = createTree([
      { method: "GET", url: "/1/batch", doc: "" },
      { method: "GET", url: "/2/search", doc: "" },
    ]);
    await writeFile(schema, serializeDocument(document, "json"), "utf8");

    await run("show", schema);
    expect(output).toEqual(["GET 1/batch\n", "GET 2/search\n"]);

    output.length = 0;
    await run("show", schema, "--api-version", "2");
    expect(output).toEqual(["GET 2/search\n"]);
  });
});
