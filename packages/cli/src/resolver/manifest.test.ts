import { describe, expect, it } from "vitest";

import { binaryNameFor, parseBinaryDeclaration } from "./manifest.js";

describe("parseBinaryDeclaration", () => {
  it("recognises a single bin path", () => {
    expect(parseBinaryDeclaration({ name: "x", bin: "dist/index.js" })).toEqual(
      { kind: "single", path: "dist/index.js" }
    );
  });

  it("keeps the declaration order of a bin mapping", () => {
    expect(
      parseBinaryDeclaration({
        bin: { "mcp-server-b": "b.js", "mcp-server-a": "a.js" },
      })
    ).toEqual({
      kind: "multiple",
      binaries: [
        ["mcp-server-b", "b.js"],
        ["mcp-server-a", "a.js"],
      ],
    });
  });

  it("returns null for missing or empty bin", () => {
    expect(parseBinaryDeclaration({ name: "x" })).toBeNull();
    expect(parseBinaryDeclaration({ bin: "" })).toBeNull();
    expect(parseBinaryDeclaration({ bin: {} })).toBeNull();
  });

  it("returns null for shapes npm would reject", () => {
    expect(parseBinaryDeclaration({ bin: ["a.js"] })).toBeNull();
    expect(parseBinaryDeclaration({ bin: { a: 1 } })).toBeNull();
    expect(parseBinaryDeclaration("not a manifest")).toBeNull();
  });
});

describe("binaryNameFor", () => {
  it("uses the unscoped package name for a single bin", () => {
    expect(
      binaryNameFor(
        { kind: "single", path: "dist/index.js" },
        "@modelcontextprotocol/server-filesystem"
      )
    ).toBe("server-filesystem");
  });

  it("uses the first key of a bin mapping", () => {
    expect(
      binaryNameFor(
        {
          kind: "multiple",
          binaries: [
            ["notion-mcp-server", "bin/cli.mjs"],
            ["other", "bin/other.mjs"],
          ],
        },
        "@notionhq/notion-mcp-server"
      )
    ).toBe("notion-mcp-server");
  });
});
