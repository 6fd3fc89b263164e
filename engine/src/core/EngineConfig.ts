/**
 * Engine Configuration
 *
 * Loads `etc/taskline.yaml` (YAML or JSON) from the working directory,
 * validates it and layers environment overrides on top.
 *
 * Precedence, lowest first: built-in defaults, file values, environment.
 *
 * @example
 * ```ts
 * const config = loadConfig({ workdir: process.cwd() });
 * const client = MySQLClient.connect(config.db);
 * ```
 *
 * @module core
 */

import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { LogLevel } from '../types/log-types.js';
import { ConfigurationError } from '../errors/index.js';

export const DEFAULT_CONFIG_PATH = join('etc', 'taskline.yaml');

const TableName = z.string().regex(/^[A-Za-z0-9_]+$/, 'must be a plain identifier');

const LogSettingsSchema = z.object({
  level: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  format: z.enum(['text', 'json']).default('text'),
  colors: z.boolean().default(true),
  console: z.boolean().default(true),
  file: z.boolean().default(true),
  database: z.boolean().default(true),
  path: z.string().min(1).default('logs'),
  fileName: z.string().min(1).default('taskline.log'),
  rotate: z
    .object({
      maxSizeMb: z.number().positive().default(100),
      backupCount: z.number().int().min(0).default(5),
    })
    .default({}),
  table: TableName.default('workflow_syslog'),
});

const DatabaseSettingsSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().positive().default(3306),
  username: z.string().default('root'),
  password: z.string().default(''),
  database: z.string().min(1).default('workflow'),
  charset: z.string().min(1).default('utf8mb4'),
  connectionLimit: z.number().int().positive().default(5),
});

const FlowSettingsSchema = z.object({
  table: TableName.default('workflow_flow'),
});

export const ConfigSchema = z.object({
  name: z.string().min(1).default('taskline'),
  log: LogSettingsSchema.default({}),
  db: DatabaseSettingsSchema.default({}),
  flow: FlowSettingsSchema.default({}),
});

export type LogSettings = z.infer<typeof LogSettingsSchema>;
export type DatabaseSettings = z.infer<typeof DatabaseSettingsSchema>;
export type FlowSettings = z.infer<typeof FlowSettingsSchema>;

export type TasklineConfig = z.infer<typeof ConfigSchema> & {
  /** Absolute working directory; `log.path` is resolved against it */
  workdir: string;
  /** The file the values came from, when one was read */
  configFile?: string;
};

export interface LoadConfigOptions {
  /** @default process.cwd() */
  workdir?: string;
  /** Explicit config file; a missing explicit file is an error */
  file?: string;
  /** @default process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load, validate and resolve the configuration
 *
 * @throws {ConfigurationError} On a missing explicit file, unparsable YAML or invalid values
 */
export function loadConfig(options: LoadConfigOptions = {}): TasklineConfig {
  const workdir = resolve(options.workdir ?? process.cwd());
  const env = options.env ?? process.env;
  const explicit = options.file ?? env.TASKLINE_CONFIG;
  const configFile = resolve(workdir, explicit ?? DEFAULT_CONFIG_PATH);

  let raw: unknown = {};
  let source: string | undefined;
  if (existsSync(configFile)) {
    raw = readConfigFile(configFile);
    source = configFile;
  } else if (explicit !== undefined) {
    throw ConfigurationError.invalidSettings(`Config file not found: ${configFile}`, configFile);
  }

  const config = parseConfig(applyEnvOverrides(raw, env));
  const logPath = isAbsolute(config.log.path) ? config.log.path : resolve(workdir, config.log.path);

  if (config.log.file) {
    mkdirSync(logPath, { recursive: true });
  }

  return {
    ...config,
    log: { ...config.log, path: logPath },
    workdir,
    configFile: source,
  };
}

/**
 * Validate a decoded settings object and fill in defaults
 */
export function parseConfig(raw: unknown): z.infer<typeof ConfigSchema> {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    const path = issue ? issue.path.join('.') : '';
    const detail = issue ? issue.message : 'invalid configuration';
    throw ConfigurationError.invalidSettings(
      path ? `Invalid configuration at ${path}: ${detail}` : `Invalid configuration: ${detail}`,
      path || undefined
    );
  }
  return result.data;
}

function readConfigFile(configFile: string): unknown {
  try {
    const parsed: unknown = YAML.parse(readFileSync(configFile, 'utf-8'));
    return parsed ?? {};
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw ConfigurationError.invalidSettings(`Malformed config file ${configFile}: ${detail}`, configFile, error);
  }
}

/**
 * TASKLINE_* variables override the matching file values
 */
function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const log: Record<string, unknown> = {};
  if (env.TASKLINE_LOG_LEVEL) log.level = env.TASKLINE_LOG_LEVEL.toLowerCase();

  const db: Record<string, unknown> = {};
  if (env.TASKLINE_DB_HOST) db.host = env.TASKLINE_DB_HOST;
  if (env.TASKLINE_DB_PORT) db.port = env.TASKLINE_DB_PORT;
  if (env.TASKLINE_DB_USER) db.username = env.TASKLINE_DB_USER;
  if (env.TASKLINE_DB_PASSWORD !== undefined) db.password = env.TASKLINE_DB_PASSWORD;
  if (env.TASKLINE_DB_NAME) db.database = env.TASKLINE_DB_NAME;

  return {
    ...raw,
    log: mergeSection(raw.log, log),
    db: mergeSection(raw.db, db),
  };
}

function mergeSection(section: unknown, overrides: Record<string, unknown>): unknown {
  if (Object.keys(overrides).length === 0) {
    return section;
  }
  if (section === undefined || section === null) {
    return overrides;
  }
  return isRecord(section) ? { ...section, ...overrides } : section;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
