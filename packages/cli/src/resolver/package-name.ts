// pattern: Functional Core

export function isFlag(arg: string): boolean {
  return arg.startsWith("-");
}

export function isScoped(identifier: string): boolean {
  return identifier.startsWith("@");
}

/**
 * Drops a trailing `@version` or `@tag`: `@scope/pkg@1.2.0` -> `@scope/pkg`
 */
export function stripVersionSpecifier(identifier: string): string {
  const at = identifier.lastIndexOf("@");
  return at > 0 ? identifier.slice(0, at) : identifier;
}

/**
 * Binary name npm uses for a package whose `bin` is a single path: the
 * package name without its scope.
 */
export function defaultBinaryName(identifier: string): string {
  const name = stripVersionSpecifier(identifier);
  return name.split("/").at(-1) ?? name;
}
