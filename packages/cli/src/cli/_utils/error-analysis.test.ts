// pattern: Functional Core

import { describe, expect, it } from "vitest";

import {
  InputMissingError,
  LookupError,
  ParseError,
  ResolutionFailure,
  SchemaError,
} from "../../utils/errors.js";

import { analyzeError } from "./error-analysis.js";

describe("analyzeError", () => {
  describe("mcpbake errors", () => {
    it("reports missing input files like the historical scripts", () => {
      const result = analyzeError(new InputMissingError("/app/config.json"));

      expect(result.category).toBe("filesystem");
      expect(result.userMessage).toBe("Error: /app/config.json not found");
    });

    it("categorizes parse errors as configuration problems", () => {
      const result = analyzeError(
        new ParseError("Failed to parse config.json: Unexpected token", "config.json")
      );

      expect(result.category).toBe("configuration");
      expect(result.userMessage).toBe(
        "Failed to parse config.json: Unexpected token"
      );
    });

    it("lists schema violations as suggestions", () => {
      const result = analyzeError(
        new SchemaError("Invalid MCP server configuration", [
          "/mcpServers/a: must have required property 'command'",
        ])
      );

      expect(result.category).toBe("validation");
      expect(result.suggestions).toContain(
        "- /mcpServers/a: must have required property 'command'"
      );
    });

    it("suggests --npm-root when the global root lookup fails", () => {
      const result = analyzeError(new LookupError("npm root -g failed", "npm"));

      expect(result.category).toBe("process");
      expect(result.suggestions).toContain(
        "Pass --npm-root to point at the global node_modules directory"
      );
    });

    it("falls back to the resolution category", () => {
      const result = analyzeError(new ResolutionFailure("no binary", "fs"));

      expect(result.category).toBe("resolution");
      expect(result.userMessage).toBe("no binary");
    });
  });

  describe("other errors", () => {
    it("should categorize EACCES errors", () => {
      const result = analyzeError(
        new Error("EACCES: permission denied, open '/tmp/config.json'")
      );

      expect(result.category).toBe("filesystem");
      expect(result.userMessage).toBe(
        "Permission denied accessing files or directories"
      );
    });

    it("should categorize ENOENT errors", () => {
      const result = analyzeError(new Error("ENOENT: no such file or directory"));

      expect(result.category).toBe("filesystem");
      expect(result.suggestions).toEqual([
        "Verify the file or directory path exists",
      ]);
    });

    it("should handle non-Error values", () => {
      const result = analyzeError("something broke");

      expect(result.category).toBe("unknown");
      expect(result.technicalMessage).toBe("something broke");
    });
  });
});
