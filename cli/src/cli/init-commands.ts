/**
 * Handler for `draftline init`
 */

import chalk from "chalk";
import * as fs from "fs";
import * as path from "path";
import type { Clock } from "../clock.js";
import {
  databasePath,
  defaultConfig,
  readConfig,
  writeConfig,
  CONFIG_FILE_NAME,
} from "../config.js";
import { closeDatabase, initDatabase } from "../db.js";
import { hasActiveTemplate, publishNewVersion } from "../operations/templates.js";
import { readTemplateFile, STANDARD_TEMPLATE_PATH } from "../template-file.js";
import { failCommand } from "./context.js";

export interface InitOptions {
  configDir: string;
  jsonOutput: boolean;
  /** Template file published when the configured template has no versions */
  templateFile?: string;
  now?: Clock;
}

export async function handleInit(options: InitOptions): Promise<void> {
  try {
    const configPath = path.join(options.configDir, CONFIG_FILE_NAME);
    const createdConfig = !fs.existsSync(configPath);
    if (createdConfig) {
      writeConfig(options.configDir, defaultConfig(options.configDir));
    }
    const config = readConfig(options.configDir);
    const dbPath = databasePath(options.configDir, config);

    const db = initDatabase({ path: dbPath });
    let publishedVersion: number | null = null;
    try {
      if (!hasActiveTemplate(db, config.templateName)) {
        const definition = readTemplateFile(
          options.templateFile ?? STANDARD_TEMPLATE_PATH
        );
        publishedVersion = publishNewVersion(db, config.templateName, definition.steps, {
          now: options.now,
        }).version;
      }
    } finally {
      closeDatabase(db);
    }

    if (options.jsonOutput) {
      console.log(
        JSON.stringify(
          {
            configDir: options.configDir,
            database: dbPath,
            createdConfig,
            publishedVersion,
          },
          null,
          2
        )
      );
      return;
    }

    console.log(chalk.green("✓ Initialized"), chalk.cyan(options.configDir));
    console.log(chalk.gray(`  Database: ${dbPath}`));
    if (publishedVersion !== null) {
      console.log(
        chalk.gray(`  Published ${config.templateName} v${publishedVersion}`)
      );
    }
  } catch (error) {
    failCommand("initialize", error);
  }
}
