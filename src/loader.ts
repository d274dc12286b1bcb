/**
 * Read a schema document from disk.
 *
 * `.json` files are parsed as JSON, anything else as YAML (which also
 * accepts JSON). The result is validated before it is returned.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import yaml from "js-yaml";
import { parseDocument, type RawDocument } from "./document.ts";
import { ValidationError } from "./errors.ts";

export type DocumentFormat = "json" | "yaml";

export function formatOf(file: string): DocumentFormat {
  return extname(file).toLowerCase() === ".json" ? "json" : "yaml";
}

export function parseDocumentText(
  text: string,
  format: DocumentFormat = "yaml",
): RawDocument {
  let value: unknown;
  try {
    value = format === "json" ? JSON.parse(text) : yaml.load(text);
  } catch (err) {
    throw new ValidationError([
      {
        message: `Invalid ${format.toUpperCase()}: ${err instanceof Error ? err.message : String(err)}`,
      },
    ]);
  }
  return parseDocument(value);
}

export async function loadDocument(file: string): Promise<RawDocument> {
  const text = await readFile(file, "utf8");
  return parseDocumentText(text, formatOf(file));
}
