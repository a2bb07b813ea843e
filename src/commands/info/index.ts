import { Command } from "commander";
import chalk from "chalk";
import { existsSync } from "fs";
import { release, type } from "os";
import {
  getApiUrl,
  getConfigFile,
  isConfigValid,
  resolveConfig,
} from "../../lib/config";
import { withErrorHandler } from "../../lib/command";

declare const __CLI_VERSION__: string;

export const infoCommand = new Command()
  .name("info")
  .description("Display environment and debug information")
  .action(
    withErrorHandler(async () => {
      console.log(chalk.bold(`camper v${__CLI_VERSION__}`));
      console.log();

      // Configuration section
      const configFile = getConfigFile();
      const config = await resolveConfig();
      console.log(chalk.bold("Configuration:"));
      if (isConfigValid(config)) {
        console.log(`  ${chalk.green("✓")} Configured for fan ${config.fanId}`);
      } else {
        console.log(`  ${chalk.red("✗")} Not configured`);
      }
      const configDisplay = existsSync(configFile)
        ? configFile
        : `${configFile} (not found)`;
      console.log(`  Config: ${configDisplay}`);
      console.log();

      // API section
      const apiUrl = await getApiUrl();
      console.log(chalk.bold("API:"));
      console.log(`  Host: ${apiUrl}`);
      console.log();

      // System section
      console.log(chalk.bold("System:"));
      console.log(`  Node: ${process.version}`);
      console.log(`  Platform: ${process.platform} (${process.arch})`);
      console.log(`  OS: ${type()} ${release()}`);
    }),
  );
