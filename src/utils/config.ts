import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { describeError } from './error';

export const CONFIG_FILE_NAME = '.droidctl.json';

export const DEFAULT_CONFIG = {
  defaultTimeout: 30,
  outputDirLogs: 'logs',
  outputDirScreens: 'screenshots',
  logFile: 'droidctl.log',
} as const;

const optionalText = z
  .string()
  .trim()
  .transform(value => value || undefined)
  .optional();

// Keys accepted in ~/.droidctl.json; unknown keys are ignored
export const ConfigFileSchema = z.object({
  adbPath: optionalText,
  defaultSerial: optionalText,
  defaultTimeout: z.number().int().positive().optional(),
  outputDirLogs: optionalText,
  outputDirScreens: optionalText,
  logFile: optionalText,
});

export interface Config {
  adbPath?: string;
  defaultSerial?: string;
  defaultTimeout: number;
  outputDirLogs: string;
  outputDirScreens: string;
  logFile: string;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export interface LoadedConfig {
  config: Config;
  /** Problems found while loading; reported once logging is set up. */
  warnings: string[];
}

function readConfigFile(file: string, warnings: string[]): z.infer<typeof ConfigFileSchema> {
  if (!fs.existsSync(file)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    warnings.push(`Failed to read config ${file}: ${describeError(error)}`);
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    warnings.push(`Ignoring invalid config ${file}: ${issue.path.join('.')}: ${issue.message}`);
    return {};
  }

  return parsed.data;
}

function positiveInt(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const parsed = Number(value);
  return parsed > 0 ? parsed : undefined;
}

/**
 * Resolve configuration from defaults, the JSON file in the home directory
 * and DROIDCTL_* environment variables, in increasing precedence. Command
 * line flags are applied on top by the caller.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const warnings: string[] = [];

  const file = readConfigFile(path.join(homeDir, CONFIG_FILE_NAME), warnings);

  const config: Config = {
    adbPath: env.DROIDCTL_ADB_PATH || file.adbPath,
    defaultSerial: env.DROIDCTL_DEFAULT_SERIAL || file.defaultSerial,
    defaultTimeout:
      positiveInt(env.DROIDCTL_DEFAULT_TIMEOUT) ??
      file.defaultTimeout ??
      DEFAULT_CONFIG.defaultTimeout,
    outputDirLogs: env.DROIDCTL_OUTPUT_LOGS || file.outputDirLogs || DEFAULT_CONFIG.outputDirLogs,
    outputDirScreens:
      env.DROIDCTL_OUTPUT_SCREENS || file.outputDirScreens || DEFAULT_CONFIG.outputDirScreens,
    logFile: env.DROIDCTL_LOG_FILE || file.logFile || DEFAULT_CONFIG.logFile,
  };

  if (env.DROIDCTL_DEFAULT_TIMEOUT && positiveInt(env.DROIDCTL_DEFAULT_TIMEOUT) === undefined) {
    warnings.push(`Ignoring invalid DROIDCTL_DEFAULT_TIMEOUT '${env.DROIDCTL_DEFAULT_TIMEOUT}'`);
  }

  return { config, warnings };
}
