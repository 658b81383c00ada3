// pattern: Imperative Shell

import { readFile, writeFile } from "fs/promises";

import {
  assertInputExists,
  loadServersConfig,
} from "../config/loaders/servers-config-loader.js";
import { CommandResolver, type PackageSet } from "../resolver/index.js";

import { buildInstallPlan } from "./install-plan.js";
import { renderTemplate, splitTemplateLines } from "./template-renderer.js";

import type { LoadMode } from "../config/types/index.js";
import type { PackageStrategy } from "../resolver/index.js";
import type { Logger } from "pino";

export const DEFAULT_DOCKERFILE_CONFIG = "config.json";
export const DEFAULT_DOCKERFILE_TEMPLATE = "Dockerfile.template";
export const DEFAULT_DOCKERFILE_OUTPUT = "Dockerfile";

export interface PackagePlanOptions {
  configPath: string;
  mode: LoadMode;
  packageStrategy: PackageStrategy;
  logger: Logger;
}

export interface PackagePlan {
  packages: PackageSet;
  installPlan: string[];
}

export interface GenerateDockerfileOptions extends PackagePlanOptions {
  templatePath: string;
  outputPath: string;
}

/**
 * Loads a configuration and derives its package set and install commands
 */
export async function planPackages(
  options: PackagePlanOptions
): Promise<PackagePlan> {
  const loaded = await loadServersConfig(options.configPath, {
    mode: options.mode,
  });
  const resolver = new CommandResolver({
    logger: options.logger,
    packageStrategy: options.packageStrategy,
  });

  const packages = resolver.collectPackages(loaded.configuration);
  return { packages, installPlan: buildInstallPlan(packages) };
}

/**
 * Renders a Dockerfile template with the install commands the server
 * configuration needs
 */
export async function generateDockerfile(
  options: GenerateDockerfileOptions
): Promise<PackagePlan> {
  const { logger } = options;

  // Both inputs must exist before anything is written
  await assertInputExists(options.configPath);
  await assertInputExists(options.templatePath);

  const plan = await planPackages(options);
  const template = await readFile(options.templatePath, "utf8");
  const rendered = renderTemplate(splitTemplateLines(template), plan.installPlan);
  await writeFile(options.outputPath, rendered.join(""), "utf8");

  const identifiers = plan.packages.references().map(r => r.identifier);
  logger.info(
    { packages: identifiers },
    `Generating ${options.outputPath} with packages: ${identifiers.join(" ")}`
  );
  logger.info(`Successfully generated ${options.outputPath}`);
  return plan;
}
