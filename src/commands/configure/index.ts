import { Command, Option } from "commander";
import chalk from "chalk";
import { existsSync } from "fs";
import { resolve } from "path";
import {
  ConfigError,
  formatConfig,
  getConfigFile,
  isDirectory,
  loadConfig,
  saveConfig,
  type CliConfig,
} from "../../lib/config";
import { AUDIO_FORMATS, type AudioFormat } from "../../lib/domain/audio-format";
import { parsePositiveInteger, withErrorHandler } from "../../lib/command";
import { promptSelect, promptText } from "../../lib/prompt-utils";

interface ConfigureOptions {
  fanId?: number;
  identity?: string;
  library?: string;
  defaultFormat?: AudioFormat;
  update?: boolean;
  print?: boolean;
}

function validateFanId(value: string): boolean | string {
  return /^[1-9]\d*$/.test(value.trim()) || "Fan ID must be a positive integer";
}

/**
 * Use the option when given, otherwise ask for it
 */
async function valueOrPrompt<T>(
  value: T | undefined,
  prompt: () => Promise<T | undefined>,
  flag: string,
): Promise<T> {
  const resolved = value ?? (await prompt());
  if (resolved === undefined || resolved === "") {
    throw new ConfigError(
      `Missing ${flag} (pass it as an option when not running in a terminal)`,
    );
  }
  return resolved;
}

/**
 * Resolve the library path; it has to be an existing directory
 */
function checkLibrary(library: string): string {
  const libraryPath = resolve(library);
  if (!existsSync(libraryPath)) {
    throw new Error(`Library path does not exist: '${libraryPath}'`);
  }
  if (!isDirectory(libraryPath)) {
    throw new Error(`Library path is not a directory: '${libraryPath}'`);
  }
  return libraryPath;
}

async function loadExistingConfig(): Promise<CliConfig> {
  try {
    return await loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    console.error(chalk.yellow(`⚠ ${error.message}, replacing it`));
    return {};
  }
}

async function createConfig(options: ConfigureOptions): Promise<void> {
  const fanId = await valueOrPrompt(
    options.fanId,
    async () => {
      const answer = await promptText(
        "Bandcamp fan ID",
        undefined,
        validateFanId,
      );
      return answer === undefined ? undefined : Number(answer.trim());
    },
    "--fan-id",
  );
  const identity = await valueOrPrompt(
    options.identity,
    () => promptText("Bandcamp identity cookie"),
    "--identity",
  );
  const library = await valueOrPrompt(
    options.library,
    () => promptText("Music library directory"),
    "--library",
  );
  const format = await valueOrPrompt(
    options.defaultFormat,
    () => promptSelect("Default audio file format", AUDIO_FORMATS),
    "--default-format",
  );

  const libraryPath = checkLibrary(library);

  // Replaces the file; only the API host carries over
  const existing = await loadExistingConfig();
  await saveConfig(
    { apiUrl: existing.apiUrl, fanId, identity, library: libraryPath, format },
    { replace: true },
  );
  console.log(chalk.green(`✓ Configuration saved to ${getConfigFile()}`));
}

async function updateConfig(options: ConfigureOptions): Promise<void> {
  const updates: CliConfig = {};
  const messages: string[] = [];

  if (options.fanId !== undefined) {
    updates.fanId = options.fanId;
    messages.push(`Updated fan ID to ${options.fanId}`);
  }
  if (options.identity !== undefined) {
    updates.identity = options.identity;
    messages.push(`Updated identity to ${options.identity}`);
  }
  if (options.library !== undefined) {
    updates.library = checkLibrary(options.library);
    messages.push(`Updated library to ${updates.library}`);
  }
  if (options.defaultFormat !== undefined) {
    updates.format = options.defaultFormat;
    messages.push(`Updated default format to ${options.defaultFormat}`);
  }

  if (messages.length === 0) {
    console.log(chalk.dim("Nothing to update"));
    return;
  }

  await saveConfig(updates);
  for (const message of messages) {
    console.log(chalk.green(`✓ ${message}`));
  }
}

export const configureCommand = new Command()
  .name("configure")
  .description(
    "Configure the application with authentication and library settings",
  )
  .option("-f, --fan-id <id>", "Bandcamp user identifier", parsePositiveInteger)
  .option("-i, --identity <cookie>", "Bandcamp identity cookie")
  .option("-l, --library <path>", "Path to music library")
  .addOption(
    new Option(
      "-d, --default-format <format>",
      "Default audio file format to download",
    ).choices(AUDIO_FORMATS),
  )
  .option("-u, --update", "Overwrite existing values with the provided values")
  .option(
    "-p, --print",
    "Print the current configuration, other options are ignored",
  )
  .action(
    withErrorHandler(async (options: ConfigureOptions) => {
      if (options.print) {
        const config = await loadConfig();
        const output = formatConfig(config);
        console.log(output || chalk.dim("No configuration found"));
      } else if (options.update) {
        await updateConfig(options);
      } else {
        await createConfig(options);
      }
    }),
  );
