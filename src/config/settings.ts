import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { AppError, ErrorType } from '../utils/errors';

// Load environment variables from .env file
dotenv.config();

export interface Settings {
  configDir: string;
  configFile: string;
  databasePath: string;
  rulesFile: string;
}

export interface ConfigFile {
  databasePath?: string;
  rulesFile?: string;
}

export const CONFIG_FILE_NAME = 'config.json';
export const DATABASE_FILE_NAME = 'financial_data.db';
export const RULES_FILE_NAME = 'category_rules.yaml';

function configError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError({
    type: ErrorType.CONFIGURATION_ERROR,
    message,
    retryable: false,
    context,
  });
}

function readConfigFile(configFile: string): ConfigFile {
  if (!fs.existsSync(configFile)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = fs.readJsonSync(configFile);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw configError(`Failed to parse ${configFile}: ${reason}`, { configFile });
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw configError(`${configFile} must contain a JSON object`, { configFile });
  }

  const config: ConfigFile = {};
  for (const key of ['databasePath', 'rulesFile'] as const) {
    const value: unknown = key in raw ? Reflect.get(raw, key) : undefined;
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string' || value.trim() === '') {
      throw configError(`${key} in ${configFile} must be a non-empty string`, { configFile, key });
    }
    config[key] = value;
  }
  return config;
}

function resolvePath(configDir: string, value: string): string {
  const expanded = value.startsWith('~/') ? path.join(os.homedir(), value.slice(2)) : value;
  return path.resolve(configDir, expanded);
}

/**
 * Resolve where the database and rules file live.
 * Priority per path: config.json > environment variables > defaults in the config directory.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const configDir = env.FIN_CONFIG_DIR
    ? path.resolve(env.FIN_CONFIG_DIR)
    : path.join(os.homedir(), '.fin');
  const configFile = path.join(configDir, CONFIG_FILE_NAME);
  const config = readConfigFile(configFile);

  const databasePath = config.databasePath ?? (env.FIN_DATABASE_PATH || DATABASE_FILE_NAME);
  const rulesFile = config.rulesFile ?? (env.FIN_RULES_FILE || RULES_FILE_NAME);

  return {
    configDir,
    configFile,
    databasePath: resolvePath(configDir, databasePath),
    rulesFile: resolvePath(configDir, rulesFile),
  };
}

/**
 * Create a template config.json in the config directory
 */
export function createConfigTemplate(settings: Settings): boolean {
  if (fs.existsSync(settings.configFile)) {
    console.warn(`Config file already exists at ${settings.configFile}`);
    return false;
  }

  const template: ConfigFile = {
    databasePath: settings.databasePath,
    rulesFile: settings.rulesFile,
  };

  fs.ensureDirSync(settings.configDir);
  fs.writeJsonSync(settings.configFile, template, { spaces: 2 });
  console.log(`Created template config at ${settings.configFile}`);
  console.log('Edit it to move the database or the rules file.');
  return true;
}
