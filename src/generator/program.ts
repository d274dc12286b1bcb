/**
 * api-tree command line: build a schema document from endpoint records
 * or reference text, or list the endpoints a document declares.
 */

import { readFile, writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { Command, Option } from "commander";
import yaml from "js-yaml";
import type { RawDocument } from "../document.ts";
import { formatOf, loadDocument, type DocumentFormat } from "../loader.ts";
import { ValidationError } from "../errors.ts";
import {
  createTree,
  listEndpoints,
  parseEndpoints,
  parseEndpointText,
} from "./tree.ts";

export interface ProgramIO {
  out(text: string): void;
}

const consoleIO: ProgramIO = {
  out: (text) => process.stdout.write(text),
};

export function serializeDocument(
  document: RawDocument,
  format: DocumentFormat,
): string {
  return format === "json"
    ? JSON.stringify(document, null, 2) + "\n"
    : yaml.dump(document, { lineWidth: -1 });
}

export type EndpointInput = "records" | "text";

/** `.txt` and `.md` files hold reference text; anything else records. */
export function inputOf(file: string): EndpointInput {
  const ext = extname(file).toLowerCase();
  return ext === ".txt" || ext === ".md" ? "text" : "records";
}

async function readEndpoints(file: string, input: EndpointInput) {
  const text = await readFile(file, "utf8");
  if (input === "text") {
    const endpoints = parseEndpointText(text);
    if (endpoints.length === 0) {
      throw new ValidationError([
        { message: `No endpoint definitions found in ${file}` },
      ]);
    }
    return endpoints;
  }
  let value: unknown;
  try {
    value = formatOf(file) === "json" ? JSON.parse(text) : yaml.load(text);
  } catch (err) {
    throw new ValidationError([
      {
        message: `Cannot parse ${file}: ${err instanceof Error ? err.message : String(err)}`,
      },
    ]);
  }
  return parseEndpoints(value);
}

export function registerBuildCommand(program: Command, io: ProgramIO): void {
  program
    .command("build")
    .description(
      "Build a schema document from endpoint records or reference text",
    )
    .argument(
      "<endpoints>",
      "YAML or JSON { method, url, doc } records, or reference text",
    )
    .option("-o, --output <file>", "write the document here instead of stdout")
    .addOption(
      new Option("-f, --format <format>", "output format").choices([
        "yaml",
        "json",
      ]),
    )
    .addOption(
      new Option(
        "-i, --input <kind>",
        "read records, or text blocks led by definition lines",
      ).choices(["records", "text"]),
    )
    .action(
      async (
        endpoints: string,
        opts: {
          output?: string;
          format?: DocumentFormat;
          input?: EndpointInput;
        },
      ) => {
        const document = createTree(
          await readEndpoints(endpoints, opts.input ?? inputOf(endpoints)),
        );
        const format =
          opts.format ?? (opts.output ? formatOf(opts.output) : "yaml");
        const text = serializeDocument(document, format);
        if (opts.output) {
          await writeFile(opts.output, text, "utf8");
        } else {
          io.out(text);
        }
      },
    );
}

export function registerShowCommand(program: Command, io: ProgramIO): void {
  program
    .command("show")
    .description("List the endpoints of a schema document")
    .argument("<schema>", "YAML or JSON schema document")
    .option("-v, --api-version <version>", "only this API version")
    .action(async (schema: string, opts: { apiVersion?: string }) => {
      const document = await loadDocument(schema);
      for (const line of listEndpoints(document, opts.apiVersion)) {
        io.out(line + "\n");
      }
    });
}

export function createProgram(io: ProgramIO = consoleIO): Command {
  const program = new Command();
  program
    .name("api-tree")
    .description("Build and inspect REST endpoint tree documents");
  registerBuildCommand(program, io);
  registerShowCommand(program, io);
  return program;
}
