/**
 * config command - Show or initialise the configuration
 */

import * as fs from "node:fs";
import chalk from "chalk";
import { createLogger, getConfigPath, writeJson } from "../../utils/index.js";
import { parseConfig, redactConfig } from "../../core/config.js";
import { loadCliConfig, type GlobalOptions } from "../shared.js";

const logger = createLogger("config");

export interface ConfigOptions extends GlobalOptions {
  /** Write a configuration file with every default spelled out */
  init?: boolean;
  force?: boolean;
  /** Print only the configuration file path */
  path?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  const configPath = options.config ?? getConfigPath();

  if (options.path) {
    console.log(configPath);
    return;
  }

  if (options.init) {
    if (fs.existsSync(configPath) && !options.force) {
      console.log(chalk.yellow(`${configPath} already exists.`), chalk.dim("Use --force to overwrite it."));
      return;
    }
    writeJson(configPath, parseConfig({}));
    logger.info({ configPath }, "Configuration file written");
    console.log(chalk.green(`Wrote ${configPath}`));
    console.log(chalk.dim("API keys are read from OPENAI_API_KEY / ANTHROPIC_API_KEY unless set in the file."));
    return;
  }

  const config = loadCliConfig(options);
  console.log(chalk.dim(`# ${fs.existsSync(configPath) ? configPath : "defaults + environment"}`));
  console.log(JSON.stringify(redactConfig(config), null, 2));
}
