// pattern: Imperative Shell

import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { extractConfiguration } from "../config/loaders/servers-config-loader.js";
import { serializeConfigDocument } from "../config/writers/servers-config-writer.js";
import { CommandResolver, FixedGlobalRootProvider } from "../resolver/index.js";
import { createRecordingLogger } from "../test-utils/recording-logger.js";
import { InputMissingError } from "../utils/errors.js";

import { rewriteDispatchCommands } from "./config-rewriter.js";
import { convertConfigFile } from "./convert-config.js";

import type { ConfigDocument, LoadedConfig } from "../config/types/index.js";

function loadedFrom(document: ConfigDocument): LoadedConfig {
  return {
    path: "config.json",
    format: "json",
    document,
    configuration: extractConfiguration(document, "permissive", "config.json"),
  };
}

describe("rewriteDispatchCommands", () => {
  let globalRoot: string;

  async function installPackage(name: string, manifest: object): Promise<void> {
    const dir = join(globalRoot, name);
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "package.json"), JSON.stringify(manifest));
  }

  beforeEach(async () => {
    globalRoot = await mkdtemp(join(tmpdir(), "mcpbake-rewrite-"));
    await installPackage("@modelcontextprotocol/server-filesystem", {
      bin: { "mcp-server-filesystem": "dist/index.js" },
    });
  });

  afterEach(async () => {
    await rm(globalRoot, { recursive: true, force: true });
  });

  function resolverFor(recording = createRecordingLogger()): CommandResolver {
    return new CommandResolver({
      logger: recording.logger,
      globalRoot: new FixedGlobalRootProvider(globalRoot),
    });
  }

  it("writes an empty mapping for a configuration without servers", async () => {
    const { logger } = createRecordingLogger();

    const result = await rewriteDispatchCommands(
      loadedFrom({ mcpServers: {} }),
      resolverFor(),
      logger
    );

    expect(result.document).toEqual({ mcpServers: {} });
    expect(serializeConfigDocument(result.document, "json")).toBe(
      '{\n  "mcpServers": {}\n}\n'
    );
  });

  it("rewrites resolvable npx entries and keeps their other fields", async () => {
    const recording = createRecordingLogger();

    const result = await rewriteDispatchCommands(
      loadedFrom({
        mcpServers: {
          filesystem: {
            command: "npx",
            args: [
              "-y",
              "@modelcontextprotocol/server-filesystem",
              "/data",
            ],
            env: { DEBUG: "1" },
          },
        },
      }),
      resolverFor(),
      recording.logger
    );

    expect(result.document).toEqual({
      mcpServers: {
        filesystem: {
          command: "mcp-server-filesystem",
          args: ["/data"],
          env: { DEBUG: "1" },
        },
      },
    });
    expect(recording.messages(30)).toEqual([
      "Converted filesystem: npx @modelcontextprotocol/server-filesystem -> mcp-server-filesystem",
    ]);
  });

  it("copies unresolved and direct entries unchanged", async () => {
    const { logger } = createRecordingLogger();
    const servers = {
      missing: { command: "npx", args: ["-y", "@scope/not-installed"] },
      custom: { command: "custom-binary", args: ["--port", "9000"] },
      fetch: { command: "uvx", args: ["mcp-server-fetch"] },
    };

    const result = await rewriteDispatchCommands(
      loadedFrom({ mcpServers: servers }),
      resolverFor(),
      logger
    );

    expect(JSON.stringify(result.document)).toBe(
      JSON.stringify({ mcpServers: servers })
    );
    expect(result.unresolved).toEqual(["missing"]);
    expect(result.converted).toEqual([]);
  });

  it("is idempotent", async () => {
    const { logger } = createRecordingLogger();
    const first = await rewriteDispatchCommands(
      loadedFrom({
        mcpServers: {
          filesystem: {
            command: "npx",
            args: ["-y", "@modelcontextprotocol/server-filesystem"],
          },
        },
      }),
      resolverFor(),
      logger
    );

    const second = await rewriteDispatchCommands(
      loadedFrom(first.document),
      resolverFor(),
      logger
    );

    expect(second.document).toEqual(first.document);
    expect(second.converted).toEqual([]);
  });

  it("returns a document without mcpServers unchanged", async () => {
    const { logger } = createRecordingLogger();
    const document = { servers: { a: { command: "npx" } } };

    const result = await rewriteDispatchCommands(
      loadedFrom(document),
      resolverFor(),
      logger
    );

    expect(result.document).toBe(document);
  });

  it("keeps other top-level keys", async () => {
    const { logger } = createRecordingLogger();

    const result = await rewriteDispatchCommands(
      loadedFrom({ version: 2, mcpServers: {} }),
      resolverFor(),
      logger
    );

    expect(result.document).toEqual({ version: 2, mcpServers: {} });
  });
});

describe("convertConfigFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "mcpbake-convert-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("reads the input, rewrites it and writes the output", async () => {
    const npmRoot = join(tempDir, "node_modules");
    await mkdir(join(npmRoot, "memory-server"), { recursive: true });
    await writeFile(
      join(npmRoot, "memory-server", "package.json"),
      JSON.stringify({ bin: "index.js" })
    );
    const inputPath = join(tempDir, "config.json");
    const outputPath = join(tempDir, "converted.json");
    await writeFile(
      inputPath,
      JSON.stringify({
        mcpServers: { memory: { command: "npx", args: ["-y", "memory-server"] } },
      })
    );

    await convertConfigFile({
      inputPath,
      outputPath,
      mode: "permissive",
      logger: createRecordingLogger().logger,
      globalRoot: new FixedGlobalRootProvider(npmRoot),
    });

    expect(JSON.parse(await readFile(outputPath, "utf8"))).toEqual({
      mcpServers: { memory: { command: "memory-server", args: [] } },
    });
  });

  it("copies command-less and unreadable entries through in order", async () => {
    const inputPath = join(tempDir, "config.json");
    const outputPath = join(tempDir, "converted.json");
    const servers = {
      remote: { url: "https://example.test/mcp" },
      broken: { command: "npx", args: [1] },
      local: { command: "custom-binary" },
    };
    await writeFile(inputPath, JSON.stringify({ mcpServers: servers }));
    const recording = createRecordingLogger();

    const result = await convertConfigFile({
      inputPath,
      outputPath,
      mode: "permissive",
      logger: recording.logger,
      globalRoot: new FixedGlobalRootProvider(tempDir),
    });

    expect(await readFile(outputPath, "utf8")).toBe(
      `${JSON.stringify({ mcpServers: servers }, null, 2)}\n`
    );
    expect(result.unresolved).toEqual([]);
    expect(recording.messages(40)).toEqual([
      "Copying broken unchanged: not a server entry mcpbake can read",
    ]);
  });

  it("keeps a server named __proto__ as its own entry", async () => {
    const inputPath = join(tempDir, "config.json");
    const outputPath = join(tempDir, "converted.json");
    await writeFile(
      inputPath,
      '{"mcpServers":{"__proto__":{"command":"custom-binary","args":["x"]},"b":{"command":"c"}}}'
    );

    await convertConfigFile({
      inputPath,
      outputPath,
      mode: "permissive",
      logger: createRecordingLogger().logger,
      globalRoot: new FixedGlobalRootProvider(tempDir),
    });

    expect(await readFile(outputPath, "utf8")).toBe(
      [
        "{",
        '  "mcpServers": {',
        '    "__proto__": {',
        '      "command": "custom-binary",',
        '      "args": [',
        '        "x"',
        "      ]",
        "    },",
        '    "b": {',
        '      "command": "c"',
        "    }",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("fails when the input is missing", async () => {
    await expect(
      convertConfigFile({
        inputPath: join(tempDir, "config.json"),
        outputPath: join(tempDir, "out.json"),
        mode: "permissive",
        logger: createRecordingLogger().logger,
        globalRoot: new FixedGlobalRootProvider(tempDir),
      })
    ).rejects.toBeInstanceOf(InputMissingError);
  });
});
