import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import yaml from 'js-yaml';
import { ConfigurationError, errorMessage, isNodeError } from '../errors.js';
import type { Category } from '../categories.js';
import type { LogLevel } from '../utils/logger.js';
import { ConfigFileSchema, type EntryKeyMode } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'config.yaml';
export const CONFIG_ENV_VAR = 'DOC_AGGREGATOR_CONFIG';

export interface AppConfig {
  rootFolder: string;
  /** root_folder exactly as written; category names are matched below it only. */
  configuredRootFolder: string;
  outputFolder: string;
  trackerFile: string;
  documentExtensions: ReadonlySet<string>;
  ignoreExtensions: ReadonlySet<string>;
  folders: Readonly<Record<Category, string>>;
  outputFiles: Readonly<Record<Category, string>>;
  entryKey: EntryKeyMode;
  exclude: readonly string[];
  logLevel: LogLevel;
}

export function resolveConfigPath(explicit?: string): string {
  return resolve(explicit ?? process.env[CONFIG_ENV_VAR] ?? DEFAULT_CONFIG_FILE);
}

/**
 * Validates an already-parsed config document. Relative paths resolve
 * against baseDir (the directory holding the config file).
 */
export function parseConfig(raw: unknown, baseDir: string): AppConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const file = result.data;
  return {
    rootFolder: resolve(baseDir, file.paths.root_folder),
    configuredRootFolder: file.paths.root_folder,
    outputFolder: resolve(baseDir, file.paths.output_folder),
    trackerFile: resolve(baseDir, file.tracker.file),
    documentExtensions: new Set(file.file_types.documents),
    ignoreExtensions: new Set(file.file_types.ignore),
    folders: {
      external: file.folders.external,
      internal: file.folders.internal,
      client: file.folders.client,
    },
    outputFiles: {
      external: file.xml.external_file,
      internal: file.xml.internal_file,
      client: file.xml.client_file,
    },
    entryKey: file.processing.entry_key,
    exclude: file.processing.exclude,
    logLevel: file.logging.level,
  };
}

export async function loadConfig(configPath: string): Promise<AppConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      throw new ConfigurationError(`Config file not found: ${configPath}`, { cause: err });
    }
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: configPath });
  } catch (err) {
    throw new ConfigurationError(`Malformed YAML in ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  return parseConfig(raw, dirname(configPath));
}

export type { EntryKeyMode } from './schema.js';
