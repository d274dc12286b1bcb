/**
 * Build the indexed schema arena from one version of a document.
 *
 * The tree is walked once at load time. Each node gets an index (the
 * version root is always 0); children and parameters refer to nodes by
 * index, so queries hold a reference into one shared, read-only structure.
 */

import {
  METHODS_KEY,
  parameterKeyword,
  unpackDoc,
  type RawMethod,
  type RawTree,
} from "./document.ts";

export interface MethodSchema {
  /** HTTP method name, uppercase. */
  readonly method: string;
  /** Decoded on first read. */
  readonly doc: string;
}

export interface NodeSchema {
  readonly children: ReadonlyMap<string, number>; // static name → node index
  readonly parameters: ReadonlyMap<string, number>; // keyword → node index
  readonly methods: readonly MethodSchema[];
}

class LazyMethod implements MethodSchema {
  readonly method: string;
  #packed: string;
  #doc: string | undefined;

  constructor([method, packed]: RawMethod) {
    this.method = method.toUpperCase();
    this.#packed = packed;
  }

  get doc(): string {
    return (this.#doc ??= unpackDoc(this.#packed));
  }
}

export class Schema {
  readonly nodes: readonly NodeSchema[];

  constructor(nodes: readonly NodeSchema[]) {
    this.nodes = nodes;
  }

  node(index: number): NodeSchema {
    const node = this.nodes[index];
    if (!node) {
      throw new RangeError(`No schema node at index ${index}`);
    }
    return node;
  }

  childByName(index: number, name: string): number | undefined {
    return this.node(index).children.get(name);
  }

  parameterChild(index: number, keyword: string): number | undefined {
    return this.node(index).parameters.get(keyword);
  }

  legalArgumentKeywords(index: number): readonly string[] {
    return [...this.node(index).parameters.keys()];
  }

  childNames(index: number): readonly string[] {
    return [...this.node(index).children.keys()];
  }

  methods(index: number): readonly MethodSchema[] {
    return this.node(index).methods;
  }

  /** Case-insensitive lookup of a declared HTTP method. */
  method(index: number, verb: string): MethodSchema | undefined {
    const upper = verb.toUpperCase();
    return this.node(index).methods.find((m) => m.method === upper);
  }
}

/**
 * Build a Schema from a version tree.
 * Walks the tree depth-first; the first declaration of a method wins.
 */
export function buildSchema(tree: RawTree): Schema {
  const nodes: NodeSchema[] = [];

  function register(subtree: RawTree): number {
    // Reserve index before walking children so the root stays at 0
    const index = nodes.length;
    nodes.push({ children: new Map(), parameters: new Map(), methods: [] });

    const children = new Map<string, number>();
    const parameters = new Map<string, number>();
    const methods: MethodSchema[] = [];

    for (const [key, value] of Object.entries(subtree)) {
      if (key === METHODS_KEY) {
        if (!Array.isArray(value)) continue;
        for (const entry of value) {
          const method = new LazyMethod(entry);
          if (!methods.some((m) => m.method === method.method)) {
            methods.push(method);
          }
        }
        continue;
      }
      if (Array.isArray(value)) continue;

      const keyword = parameterKeyword(key);
      if (keyword !== undefined) {
        parameters.set(keyword, register(value));
      } else {
        children.set(key, register(value));
      }
    }

    nodes[index] = { children, parameters, methods };
    return index;
  }

  register(tree);
  return new Schema(nodes);
}
