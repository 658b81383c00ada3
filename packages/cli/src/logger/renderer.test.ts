// pattern: Functional Core

import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";

import createRenderer, { formatLogObject } from "./renderer.js";

const plain = new Chalk({ level: 0 });

describe("formatLogObject", () => {
  it("renders info lines with the info marker", () => {
    const line = formatLogObject(
      { level: 30, time: 1, pid: 2, hostname: "h", name: "mcpbake", msg: "hi" },
      plain
    );
    expect(line).toBe("> hi\n");
  });

  it("renders warnings with extra bindings", () => {
    const line = formatLogObject(
      { level: 40, msg: "careful", server: "fs" },
      plain
    );
    expect(line).toBe('W careful {"server":"fs"}\n');
  });

  it("indents error messages and stack lines", () => {
    const line = formatLogObject(
      {
        level: 50,
        msg: "failed",
        err: { message: "boom", stack: ["at one", "at two"] },
      },
      plain
    );
    expect(line).toBe(
      "E failed\n    boom\n        at one\n        at two\n"
    );
  });
});

describe("createRenderer", () => {
  it("passes through lines that are not JSON", async () => {
    const renderer = createRenderer({ colorize: false });
    const chunks: string[] = [];
    renderer.on("data", (chunk: Buffer) => chunks.push(chunk.toString()));

    const done = new Promise<void>(resolve => renderer.on("end", resolve));
    renderer.end('not json\n{"level":30,"msg":"ok"}\n');
    await done;

    expect(chunks.join("")).toBe("not json\n> ok\n");
  });
});
