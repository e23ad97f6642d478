/**
 * CLI Configuration Management
 *
 * Loads configuration from .piggdekkrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (PIGGDEKK_*)
 * 3. Config file (.piggdekkrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_REGISTRY_TIMEOUT_MS,
  DEFAULT_REGISTRY_URL,
} from '../../registry/municipality-registry.js';
import {
  CONTACTS_FILE_NAME,
  SUPPORT_FILE_NAME,
} from '../../dashboard/support-dashboard.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Absolute directory holding the CSV inputs */
  readonly data: string;
  readonly supportFile: string;
  readonly contactsFile: string;
}

export interface RegistryServiceConfig {
  readonly baseUrl: string;
  readonly timeout: number;
}

export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly services: {
    readonly registry: RegistryServiceConfig;
  };

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        data: z.string().optional(),
        support_file: z.string().optional(),
        contacts_file: z.string().optional(),
      })
      .optional(),
    services: z
      .object({
        registry: z
          .object({
            base_url: z.string().url().optional(),
            timeout: z.number().int().positive().optional(),
          })
          .optional(),
      })
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  paths: {
    data: './data',
    supportFile: SUPPORT_FILE_NAME,
    contactsFile: CONTACTS_FILE_NAME,
  },

  services: {
    registry: {
      baseUrl: DEFAULT_REGISTRY_URL,
      timeout: DEFAULT_REGISTRY_TIMEOUT_MS,
    },
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

export const CONFIG_FILE_NAMES = ['.piggdekkrc', '.piggdekkrc.yaml', '.piggdekkrc.yml', '.piggdekkrc.json'];

/**
 * Find a config file in `startDir` or its ancestors
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');
  // YAML is a superset of JSON, so one parser covers every file name
  const raw: unknown = parseYaml(content) ?? {};
  const parsed = ConfigFileSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment to read PIGGDEKK_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    dataDir?: string;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws Error if an explicit config file is missing or any file is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const getEnvVar = (name: string): string | undefined => {
    const value = env[`PIGGDEKK_${name}`];
    return value === undefined || value === '' ? undefined : value;
  };
  const getEnvBool = (name: string): boolean | undefined => {
    const value = getEnvVar(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  };
  const getEnvNumber = (name: string): number | undefined => {
    const value = getEnvVar(name);
    if (value === undefined) return undefined;
    const num = parseInt(value, 10);
    return isNaN(num) ? undefined : num;
  };

  let configPath: string | null = null;
  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      const candidate = resolve(cwd, envConfigPath);
      configPath = existsSync(candidate) ? candidate : null;
    } else {
      configPath = findConfigFile(cwd);
    }
  }

  const fileConfig: ConfigFile = configPath ? parseConfigFile(configPath) : {};

  // A data directory from the config file is relative to that file
  const resolveDataDir = (): string => {
    const explicit = options.overrides?.dataDir ?? getEnvVar('DATA_DIR');
    if (explicit !== undefined) return resolve(cwd, explicit);
    if (configPath && fileConfig.paths?.data !== undefined) {
      return resolve(dirname(configPath), fileConfig.paths.data);
    }
    return resolve(cwd, DEFAULT_CONFIG.paths.data);
  };

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      data: resolveDataDir(),
      supportFile:
        getEnvVar('SUPPORT_FILE') ??
        fileConfig.paths?.support_file ??
        DEFAULT_CONFIG.paths.supportFile,
      contactsFile:
        getEnvVar('CONTACTS_FILE') ??
        fileConfig.paths?.contacts_file ??
        DEFAULT_CONFIG.paths.contactsFile,
    },

    services: {
      registry: {
        baseUrl:
          getEnvVar('REGISTRY_URL') ??
          fileConfig.services?.registry?.base_url ??
          DEFAULT_CONFIG.services.registry.baseUrl,
        timeout:
          getEnvNumber('REGISTRY_TIMEOUT') ??
          fileConfig.services?.registry?.timeout ??
          DEFAULT_CONFIG.services.registry.timeout,
      },
    },

    verbose: options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };
}

/**
 * @throws Error if the configuration is unusable
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new Error(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (config.services.registry.timeout <= 0) {
    throw new Error('Registry timeout must be a positive number');
  }

  if (config.paths.supportFile === config.paths.contactsFile) {
    throw new Error('Support and contacts files must be different files');
  }
}
