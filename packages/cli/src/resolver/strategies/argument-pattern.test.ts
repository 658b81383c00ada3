import { describe, expect, it } from "vitest";

import { UnmappedCommandWarning } from "../../utils/errors.js";

import {
  ArgumentPatternStrategy,
  extractNpxPackage,
  extractPythonModule,
  extractUvxPackage,
} from "./argument-pattern.js";

import type { ServerEntry } from "../../config/types/index.js";

function entry(name: string, command: string, args: string[]): ServerEntry {
  return { name, command, args, raw: { command, args } };
}

describe("extractNpxPackage", () => {
  it("finds a scoped package after the auto-confirm flag", () => {
    expect(extractNpxPackage(["-y", "@scope/pkg", "--flag", "value"])).toBe(
      "@scope/pkg"
    );
  });

  it("finds a scoped package in first position", () => {
    expect(extractNpxPackage(["@scope/pkg"])).toBe("@scope/pkg");
  });

  it("skips an unscoped token in first position", () => {
    expect(extractNpxPackage(["pkg"])).toBeNull();
    expect(extractNpxPackage(["pkg", "extra"])).toBe("extra");
  });

  it("accepts an unscoped token after a flag", () => {
    expect(extractNpxPackage(["-y", "pkg"])).toBe("pkg");
  });
});

describe("extractUvxPackage", () => {
  it("takes the first non-flag token", () => {
    expect(extractUvxPackage(["mcp-server-fetch"])).toBe("mcp-server-fetch");
    expect(extractUvxPackage(["--from", "git+https://example.test/x"])).toBe(
      "git+https://example.test/x"
    );
    expect(extractUvxPackage(["--offline"])).toBeNull();
  });
});

describe("extractPythonModule", () => {
  it("reads `-m <module>`", () => {
    expect(extractPythonModule(["-m", "mypkg"])).toBe("mypkg");
  });

  it("needs a module after -m", () => {
    expect(extractPythonModule(["-m"])).toBeNull();
  });

  it("ignores scripts", () => {
    expect(extractPythonModule(["server.py"])).toBeNull();
  });
});

describe("ArgumentPatternStrategy", () => {
  const strategy = new ArgumentPatternStrategy();

  it("maps each runner to its ecosystem", () => {
    expect(
      strategy.extract(entry("mem", "npx", ["-y", "@scope/memory"]))
    ).toEqual({
      kind: "package",
      reference: { ecosystem: "npm", identifier: "@scope/memory" },
    });
    expect(strategy.extract(entry("fetch", "uvx", ["mcp-server-fetch"])))
      .toEqual({
        kind: "package",
        reference: { ecosystem: "uv", identifier: "mcp-server-fetch" },
      });
    expect(strategy.extract(entry("py", "python", ["-m", "mypkg"]))).toEqual({
      kind: "package",
      reference: { ecosystem: "pip", identifier: "mypkg" },
    });
  });

  it("skips direct binaries as pre-installed", () => {
    const outcome = strategy.extract(entry("custom", "custom-binary", ["--x"]));

    expect(outcome.kind).toBe("skipped");
    if (outcome.kind === "skipped") {
      expect(outcome.warning).toBeInstanceOf(UnmappedCommandWarning);
      expect(outcome.warning.message).toBe(
        "Skipping direct command for custom: custom-binary (assumed pre-installed)"
      );
    }
  });

  it("skips runners without args", () => {
    expect(strategy.extract(entry("bare", "npx", [])).kind).toBe("skipped");
  });

  it("explains runners whose args name no package", () => {
    const outcome = strategy.extract(entry("py", "python", ["-m"]));

    expect(outcome.kind).toBe("skipped");
    if (outcome.kind === "skipped") {
      expect(outcome.warning.message).toBe(
        "No package found in python args for py: -m"
      );
    }
  });

  it("does not treat inherited object keys as commands", () => {
    expect(strategy.extract(entry("odd", "toString", ["x"])).kind).toBe(
      "skipped"
    );
  });
});
