// pattern: Functional Core

/**
 * The Go-template loop older Dockerfile templates use to install MCP
 * packages. Matched as a literal substring; the rest of the template is
 * opaque.
 */
export const PACKAGE_INSTALL_PLACEHOLDER =
  "{{range .MCPPackages}} && npm install -g {{.}}{{end}}";

export const LINE_CONTINUATION = " \\\n";

/**
 * Splits text into lines that keep their terminators, so
 * `splitTemplateLines(text).join("") === text`
 */
export function splitTemplateLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Replaces the placeholder with the install plan joined by shell line
 * continuations. With an empty plan the placeholder line is dropped.
 */
export function renderTemplate(
  lines: readonly string[],
  installPlan: readonly string[]
): string[] {
  const replacement = installPlan.join(LINE_CONTINUATION);
  const output: string[] = [];

  for (const line of lines) {
    if (!line.includes(PACKAGE_INSTALL_PLACEHOLDER)) {
      output.push(line);
      continue;
    }
    if (installPlan.length === 0) {
      continue;
    }
    output.push(line.replaceAll(PACKAGE_INSTALL_PLACEHOLDER, replacement));
  }

  return output;
}
