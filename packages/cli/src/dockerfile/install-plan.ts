// pattern: Functional Core

import { ECOSYSTEMS, type Ecosystem } from "../resolver/types.js";

import type { PackageSet } from "../resolver/package-set.js";

const INSTALL_COMMANDS: Readonly<Record<Ecosystem, (identifier: string) => string>> = {
  npm: identifier => `&& npm install -g ${identifier}`,
  pip: identifier =>
    `&& pip3 install --no-cache-dir --break-system-packages ${identifier}`,
  uv: identifier => `&& uv tool install ${identifier}`,
};

/**
 * One shell-chained install command per package: npm first, then pip, then
 * uv, each group sorted by identifier
 */
export function buildInstallPlan(packages: PackageSet): string[] {
  return ECOSYSTEMS.flatMap(ecosystem =>
    packages.identifiersFor(ecosystem).map(INSTALL_COMMANDS[ecosystem])
  );
}
