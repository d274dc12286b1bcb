import { test, expect, describe } from "vitest";
import { createClient } from "../client.ts";
import { unpackDoc, type RawTree } from "../document.ts";
import { ValidationError } from "../errors.ts";
import { queryOf } from "../query-of.ts";
import { fakeTransport } from "../test-utils.ts";
import {
  camelCaseToUnderscore,
  createTree,
  isApiDefinition,
  listEndpoints,
  parseEndpointLine,
  parseEndpointText,
  parseEndpoints,
  type EndpointRecord,
} from "./tree.ts";

const endpoints: EndpointRecord[] = [
  { method: "GET", url: "/1/actions/[idAction]", doc: "GET an action" },
  {
    method: "DELETE",
    url: "/1/boards/[board_id]/members/[idMember]",
    doc: "Remove a member",
  },
  { method: "GET", url: "/1/actions/[idAction]", doc: "duplicate" },
  { method: "PUT", url: "/1/actions/[idAction]", doc: "Update an action" },
  {
    method: "PUT",
    url: "/1/members/[idMember]/minutesBetweenSummaries",
    doc: "",
  },
];

function methodsAt(tree: RawTree | undefined, ...path: string[]) {
  let here = tree;
  for (const key of path) {
    const next = here?.[key];
    here = next === undefined || Array.isArray(next) ? undefined : next;
  }
  const methods = here?.METHODS;
  return Array.isArray(methods) ? methods : [];
}

describe("camelCaseToUnderscore", () => {
  test("splits camelCase words", () => {
    expect(camelCaseToUnderscore("minutesBetweenSummaries")).toBe(
      "minutes_between_summaries",
    );
    expect(camelCaseToUnderscore("boards")).toBe("boards");
  });

  test("brackets become parameter delimiters", () => {
    expect(camelCaseToUnderscore("[idAction]")).toBe("_id_action_");
    expect(camelCaseToUnderscore("[board_id]")).toBe("_board_id_");
  });

  test("digits become underscores", () => {
    expect(camelCaseToUnderscore("idList2")).toBe("id_list_");
  });
});

describe("definition lines", () => {
  test("isApiDefinition checks the first word", () => {
    expect(isApiDefinition("GET /1/actions/[idAction]")).toBe(true);
    expect(isApiDefinition("DELETE /1/boards/[board_id]")).toBe(true);
    expect(isApiDefinition("action")).toBe(false);
    expect(isApiDefinition("get /1/actions")).toBe(false);
  });

  test("parseEndpointLine finds the method and URL", () => {
    expect(parseEndpointLine("PUT /1/cards/[idCard]/name ¶")).toEqual({
      method: "PUT",
      url: "/1/cards/[idCard]/name",
    });
    expect(parseEndpointLine("## GET /1/batch")).toEqual({
      method: "GET",
      url: "/1/batch",
    });
    expect(parseEndpointLine("no endpoint here")).toBeUndefined();
  });
});

describe("parseEndpointText", () => {
  test("each definition line starts a record", () => {
    const text = [
      "Boards reference",
      "",
      "GET /1/boards/[board_id]",
      "Fetch one board.",
      "",
      "Arguments: fields",
      "",
      "PUT /1/boards/[board_id]/name ¶",
      "Rename a board.",
      "",
    ].join("\n");
    expect(parseEndpointText(text)).toEqual([
      {
        method: "GET",
        url: "/1/boards/[board_id]",
        doc: "GET /1/boards/[board_id]\nFetch one board.\n\nArguments: fields",
      },
      {
        method: "PUT",
        url: "/1/boards/[board_id]/name",
        doc: "PUT /1/boards/[board_id]/name\nRename a board.",
      },
    ]);
  });

  test("text without definitions yields nothing", () => {
    expect(parseEndpointText("get /1/boards\nnothing here")).toEqual([]);
  });
});

describe("createTree", () => {
  test("groups endpoints under their version", () => {
    const tree = createTree(endpoints);
    expect(Object.keys(tree)).toEqual(["1"]);
    expect(Object.keys(tree["1"] ?? {})).toEqual([
      "actions",
      "boards",
      "members",
    ]);
    expect(listEndpoints(tree)).toEqual([
      "GET 1/actions/{id_action}",
      "PUT 1/actions/{id_action}",
      "DELETE 1/boards/{board_id}/members/{id_member}",
      "PUT 1/members/{id_member}/minutes_between_summaries",
    ]);
  });

  test("the first documentation of a method is kept", () => {
    const tree = createTree(endpoints);
    const methods = methodsAt(tree["1"], "actions", "_id_action_");
    expect(methods.map(([m]) => m)).toEqual(["GET", "PUT"]);
    expect(methods.map(([, doc]) => unpackDoc(doc))).toEqual([
      "GET an action",
      "Update an action",
    ]);
  });

  test("the built document drives a client", async () => {
    const transport = fakeTransport();
    const { root } = createClient(createTree(endpoints), {
      version: "1",
      apiKey: "test-key",
      transport,
    });
    const member = root.boards({ board_id: "B1" }).members({ id_member: "M1" });
    expect(queryOf(member).url).toBe("1/boards/B1/members/M1");
    await member.delete();
    expect(transport.calls[0]?.url).toBe(
      "https://api.trello.com/1/boards/B1/members/M1",
    );
    expect(queryOf(member).documentation("DELETE")).toBe("Remove a member");
  });
});

describe("listEndpoints", () => {
  test("can be limited to one version", () => {
    const tree = createTree([
      { method: "GET", url: "/1/batch", doc: "" },
      { method: "GET", url: "/2/batch", doc: "" },
    ]);
    expect(listEndpoints(tree, "2")).toEqual(["GET 2/batch"]);
    expect(listEndpoints(tree, "3")).toEqual([]);
  });
});

describe("parseEndpoints", () => {
  test("fills in a missing doc", () => {
    expect(parseEndpoints([{ method: "GET", url: "/1/batch" }])).toEqual([
      { method: "GET", url: "/1/batch", doc: "" },
    ]);
  });

  test("rejects unknown methods", () => {
    let caught: unknown;
    try {
      parseEndpoints([{ method: "FETCH", url: "/1/batch" }]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ issues: [{ path: [0, "method"] }] });
  });
});
