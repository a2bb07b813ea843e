import { homedir } from "os";
import { join } from "path";
import { readFile, writeFile, mkdir } from "fs/promises";
import { existsSync, statSync } from "fs";
import { z } from "zod";
import { audioFormatSchema } from "./domain/audio-format";

const DEFAULT_API_URL = "https://bandcamp.com";

export const MISSING_CONFIG_MESSAGE =
  "Missing or invalid configuration; please run `camper configure` and try again.";

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

const cliConfigSchema = z.object({
  fanId: z.number().int().positive().optional(),
  identity: z.string().optional(),
  library: z.string().optional(),
  format: audioFormatSchema.optional(),
  apiUrl: z.string().optional(),
});

export type CliConfig = z.infer<typeof cliConfigSchema>;

/**
 * Configuration with everything the listing commands need
 */
export type ValidConfig = CliConfig &
  Required<Pick<CliConfig, "fanId" | "identity" | "library" | "format">>;

// Use functions for lazy evaluation (enables testing with mocked homedir)
function getConfigDir(): string {
  return join(homedir(), ".camper");
}

export function getConfigFile(): string {
  return join(getConfigDir(), "config.json");
}

export async function loadConfig(): Promise<CliConfig> {
  const configFile = getConfigFile();
  if (!existsSync(configFile)) {
    return {};
  }
  const content = await readFile(configFile, "utf8");

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${configFile} is not valid JSON`, {
      cause: error,
    });
  }

  const result = cliConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Config file ${configFile} is invalid`, {
      cause: result.error,
    });
  }
  return result.data;
}

export interface SaveConfigOptions {
  /** Write the given values alone instead of merging them into the file */
  replace?: boolean;
}

export async function saveConfig(
  config: CliConfig,
  options: SaveConfigOptions = {},
): Promise<void> {
  const configDir = getConfigDir();
  const configFile = getConfigFile();

  await mkdir(configDir, { recursive: true });

  const existing = options.replace ? {} : await loadConfig();
  const merged = { ...existing, ...config };

  await writeFile(configFile, JSON.stringify(merged, null, 2), "utf8");
}

function parseFanIdEnv(value: string): number {
  const fanId = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(fanId) || fanId <= 0) {
    throw new ConfigError(
      `CAMPER_FAN_ID must be a positive integer, got "${value}"`,
    );
  }
  return fanId;
}

/**
 * Config file values with CAMPER_FAN_ID and CAMPER_IDENTITY applied on top
 */
export async function resolveConfig(): Promise<CliConfig> {
  const config = await loadConfig();
  const fanId = process.env.CAMPER_FAN_ID;
  const identity = process.env.CAMPER_IDENTITY;

  return {
    ...config,
    ...(fanId ? { fanId: parseFanIdEnv(fanId) } : {}),
    ...(identity ? { identity } : {}),
  };
}

export async function getApiUrl(): Promise<string> {
  const apiUrl = process.env.CAMPER_API_URL;
  if (apiUrl) {
    // Add protocol if missing
    return apiUrl.startsWith("http") ? apiUrl : `https://${apiUrl}`;
  }
  const config = await loadConfig();
  return config.apiUrl ?? DEFAULT_API_URL;
}

export function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

export function isConfigValid(config: CliConfig): config is ValidConfig {
  return (
    config.fanId !== undefined &&
    config.fanId > 0 &&
    Boolean(config.identity) &&
    config.library !== undefined &&
    isDirectory(config.library) &&
    config.format !== undefined
  );
}

/**
 * Render the configured values as aligned "key: value" lines
 */
export function formatConfig(config: CliConfig): string {
  const entries: Array<[string, string | number | undefined]> = [
    ["fanId", config.fanId],
    ["identity", config.identity],
    ["library", config.library],
    ["format", config.format],
    ["apiUrl", config.apiUrl],
  ];
  const present = entries.filter(
    (entry): entry is [string, string | number] => entry[1] !== undefined,
  );
  const keyWidth = Math.max(0, ...present.map(([key]) => key.length + 1));

  return present
    .map(([key, value]) => `${`${key}:`.padEnd(keyWidth)} ${value}`)
    .join("\n");
}
