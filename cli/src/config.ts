/**
 * Locating and reading the .draftline directory
 */

import * as fs from "fs";
import * as path from "path";
import type { Config } from "@draftline/types";
import { ValidationError, errorMessage } from "./errors.js";

export const CONFIG_DIR_NAME = ".draftline";
export const CONFIG_FILE_NAME = "config.json";
export const CONFIG_VERSION = "1";

/**
 * Find the .draftline directory: an explicit path, then DRAFTLINE_DIR, then the
 * nearest ancestor of the working directory that has one. Falls back to
 * .draftline in the working directory.
 */
export function findConfigDir(
  dir?: string,
  cwd: string = process.cwd()
): string {
  if (dir) {
    return path.resolve(cwd, dir);
  }
  const fromEnv = process.env.DRAFTLINE_DIR;
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }

  let currentDir = path.resolve(cwd);
  while (currentDir !== path.parse(currentDir).root) {
    const candidate = path.join(currentDir, CONFIG_DIR_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    currentDir = path.dirname(currentDir);
  }

  return path.join(cwd, CONFIG_DIR_NAME);
}

export function defaultConfig(configDir: string): Config {
  return {
    version: CONFIG_VERSION,
    database: "draftline.db",
    templateName: "Standard",
    productionActor: "Production",
    printPackageRoot: path.join(configDir, "print-packages"),
  };
}

function readString(
  raw: Record<string, unknown>,
  key: keyof Config,
  fallback: string
): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Config field '${key}' must be a non-empty string`, {
      [key]: value,
    });
  }
  return value;
}

/**
 * Read config.json, filling in defaults for missing fields
 */
export function readConfig(configDir: string): Config {
  const defaults = defaultConfig(configDir);
  const configPath = path.join(configDir, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) {
    return defaults;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new ValidationError(
      `${configPath} is not valid JSON: ${errorMessage(error)}`
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`${configPath} must contain a JSON object`);
  }
  const raw: Record<string, unknown> = { ...parsed };

  const printPackageRoot = readString(
    raw,
    "printPackageRoot",
    defaults.printPackageRoot
  );

  return {
    version: readString(raw, "version", defaults.version),
    database: readString(raw, "database", defaults.database),
    templateName: readString(raw, "templateName", defaults.templateName),
    productionActor: readString(raw, "productionActor", defaults.productionActor),
    printPackageRoot: path.resolve(configDir, printPackageRoot),
  };
}

export function writeConfig(configDir: string, config: Config): void {
  fs.mkdirSync(configDir, { recursive: true });
  fs.writeFileSync(
    path.join(configDir, CONFIG_FILE_NAME),
    JSON.stringify(config, null, 2) + "\n",
    "utf8"
  );
}

export function databasePath(configDir: string, config: Config): string {
  return path.resolve(configDir, config.database);
}
