/**
 * Human-readable formatting for paths and values.
 *
 * Produces unambiguous strings like `root["1"].boards({board_id: "B1"})`
 * for paths and `{a: 1, b: "hello"}` for values. Used in error messages,
 * request events and debugging.
 */

import type { PathSegments, PathSegment } from "./path.ts";

const IS_IDENT = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function formatValue(value: unknown): string {
  return fmt(value, new Map());
}

export function formatPath(path: readonly PathSegment[]): string {
  const seen = new Map<object, number>();
  let out = "root";
  for (const seg of path) {
    out += fmtSegment(seg, seen);
  }
  return out;
}

export function formatSegment(seg: PathSegment): string {
  return fmtSegment(seg, new Map());
}

function fmtKey(key: string): string {
  return IS_IDENT.test(key) ? key : JSON.stringify(key);
}

function fmtSegment(seg: PathSegment, seen: Map<object, number>): string {
  if (typeof seg === "string") {
    return IS_IDENT.test(seg) ? "." + seg : "[" + JSON.stringify(seg) + "]";
  }
  // Parameter segment: [keyword, value]
  const [keyword, value] = seg;
  return "({" + fmtKey(keyword) + ": " + fmt(value, seen) + "})";
}

function fmt(thing: unknown, seen: Map<object, number>): string {
  // Primitives
  if (thing === undefined) return "undefined";
  if (thing === null) return "null";

  switch (typeof thing) {
    case "string":
      return JSON.stringify(thing);
    case "number":
      if (Number.isNaN(thing)) return "NaN";
      if (thing === Infinity) return "Infinity";
      if (thing === -Infinity) return "-Infinity";
      if (Object.is(thing, -0)) return "-0";
      return String(thing);
    case "boolean":
      return String(thing);
    case "bigint":
      return thing + "n";
    case "symbol":
      return (
        "Symbol(" +
        (thing.description !== undefined
          ? JSON.stringify(thing.description)
          : "") +
        ")"
      );
    case "function":
      return "[Function]";
  }

  if (typeof thing !== "object" || thing === null) return String(thing);

  // Objects, with circular reference tracking
  const prior = seen.get(thing);
  if (prior !== undefined) return "$" + prior;
  seen.set(thing, seen.size);

  // Array (including sparse)
  if (Array.isArray(thing)) {
    const items: string[] = [];
    for (let i = 0; i < thing.length; i++) {
      items.push(i in thing ? fmt(thing[i], seen) : "<hole>");
    }
    return "[" + items.join(", ") + "]";
  }

  // Plain objects (with or without prototype)
  const proto: unknown = Object.getPrototypeOf(thing);
  if (proto === null || proto === Object.prototype) {
    const prefix = proto === null ? "[Object: null prototype] " : "";
    const entries: string[] = [];
    for (const [key, value] of Object.entries(thing)) {
      entries.push(fmtKey(key) + ": " + fmt(value, seen));
    }
    return prefix + "{" + entries.join(", ") + "}";
  }

  // Unknown object type
  return "[" + Object.prototype.toString.call(thing).slice(8, -1) + "]";
}
