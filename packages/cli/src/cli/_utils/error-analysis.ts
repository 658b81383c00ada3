// pattern: Functional Core

import {
  ConfigurationError,
  FileSystemError,
  InputMissingError,
  LookupError,
  McpBakeError,
  ParseError,
  ProcessError,
  SchemaError,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category:
    | "filesystem"
    | "process"
    | "validation"
    | "configuration"
    | "resolution"
    | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

function analyzeMcpBakeError(error: McpBakeError): AnalyzedError {
  const errorMessage = error.message;

  if (error instanceof InputMissingError) {
    return {
      category: "filesystem",
      userMessage: `Error: ${errorMessage}`,
      technicalMessage: errorMessage,
      suggestions: [
        "Check the path, or pass the file explicitly (see --help for the option)",
        "Relative paths are resolved from the current directory",
      ],
    };
  }

  if (error instanceof FileSystemError) {
    const suggestions = [
      "Verify the file or directory path exists",
      "Check that you have the necessary permissions",
    ];
    if (error.operation === "write") {
      suggestions.push("Ensure the directory is writable");
    }
    return {
      category: "filesystem",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions,
    };
  }

  if (error instanceof ParseError) {
    return {
      category: "configuration",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions: [
        "Check the file for syntax errors",
        "Verify all brackets, braces, and quotes are properly closed",
        "The format is chosen by extension: .json, .yaml/.yml or .toml",
      ],
    };
  }

  if (error instanceof ConfigurationError) {
    return {
      category: "configuration",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions: [
        "Verify that all required configuration is present",
        "Run with --log-level debug for more detailed information",
      ],
    };
  }

  if (error instanceof ValidationError) {
    const suggestions =
      error instanceof SchemaError
        ? [
            'The configuration must look like {"mcpServers": {"<name>": {"command": "...", "args": []}}}',
          ]
        : ["Verify all required fields are present"];

    if (error.validationErrors && error.validationErrors.length > 0) {
      suggestions.push(...error.validationErrors.map(e => `- ${e}`));
    }

    return {
      category: "validation",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions,
    };
  }

  if (error instanceof LookupError) {
    return {
      category: "process",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions: [
        "Verify Node.js and npm are installed and in your PATH",
        "Pass --npm-root to point at the global node_modules directory",
      ],
    };
  }

  if (error instanceof ProcessError) {
    return {
      category: "process",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions: [
        "Verify the command is installed and in your PATH",
        "Run with --log-level debug to see its stderr",
      ],
    };
  }

  return {
    category: "resolution",
    userMessage: errorMessage,
    technicalMessage: errorMessage,
    suggestions: [
      "Check the error message for details",
      "Run with --log-level debug for more information",
    ],
  };
}

/**
 * Analyzes an error and provides structured information with user-friendly messages
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof McpBakeError) {
    return analyzeMcpBakeError(error);
  }

  // Fall back to string-based analysis for errors from libraries and Node
  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (
    errorString.includes("eacces") ||
    errorString.includes("permission denied")
  ) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that you have write permissions to the target directories",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: ["Verify the file or directory path exists"],
    };
  }

  if (errorString.includes("eisdir")) {
    return {
      category: "filesystem",
      userMessage: "Expected a file but found a directory",
      technicalMessage: errorMessage,
      suggestions: ["Check the file path is correct"],
    };
  }

  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Try the operation again",
      "Check the command syntax and arguments",
      "Run with --log-level debug for more detailed information",
    ],
  };
}

/**
 * Extracts a string message from various error types
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
