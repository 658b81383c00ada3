// pattern: Functional Core

/**
 * Base class for mcpbake application errors
 */
export abstract class McpBakeError extends Error {
  public readonly category: string;

  protected constructor(category: string, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to the contents of configuration documents
 */
export class ConfigurationError extends McpBakeError {
  public readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super("configuration", message);
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * A document that is not well-formed JSON, YAML or TOML
 */
export class ParseError extends ConfigurationError {}

/**
 * Errors related to file system operations
 */
export class FileSystemError extends McpBakeError {
  public readonly operation?: string;
  public readonly filePath?: string;

  constructor(message: string, operation?: string, filePath?: string) {
    super("filesystem", message);
    if (operation) {
      this.operation = operation;
    }
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * A required input file (configuration, template) does not exist
 */
export class InputMissingError extends FileSystemError {
  constructor(filePath: string) {
    super(`${filePath} not found`, "read", filePath);
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends McpBakeError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * A well-formed document whose shape is not an MCP server configuration
 */
export class SchemaError extends ValidationError {}

/**
 * Errors related to running external processes
 */
export class ProcessError extends McpBakeError {
  public readonly processName?: string;
  public readonly exitCode?: number;

  constructor(message: string, processName?: string, exitCode?: number) {
    super("process", message);
    if (processName) {
      this.processName = processName;
    }
    if (exitCode !== undefined) {
      this.exitCode = exitCode;
    }
  }
}

/**
 * The package manager could not report its global installation root
 */
export class LookupError extends ProcessError {}

/**
 * A server's binary could not be determined. Never fatal: the resolver
 * returns it inside an outcome and the entry keeps its original command.
 */
export class ResolutionFailure extends McpBakeError {
  public readonly serverName: string;
  public readonly packageIdentifier?: string;

  constructor(message: string, serverName: string, packageIdentifier?: string) {
    super("resolution", message);
    this.serverName = serverName;
    if (packageIdentifier) {
      this.packageIdentifier = packageIdentifier;
    }
  }
}

/**
 * A server command maps to no known package; the entry is left out of the
 * package set. Never fatal.
 */
export class UnmappedCommandWarning extends McpBakeError {
  public readonly serverName: string;
  public readonly command: string;

  constructor(serverName: string, command: string, message?: string) {
    super(
      "resolution",
      message ??
        `Skipping direct command for ${serverName}: ${command} (assumed pre-installed)`
    );
    this.serverName = serverName;
    this.command = command;
  }
}
