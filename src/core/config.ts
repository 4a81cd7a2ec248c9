/**
 * Configuration engine for teamtask.
 *
 * Resolution priority: CLI flags > Environment vars > Project config > Global config > Defaults
 */

import { z } from 'zod';
import type { TeamTaskConfig } from '../types/config.js';
import { readJson } from '../store/atomic.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { TeamTaskError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
const DEFAULTS: TeamTaskConfig = {
  storage: {
    dataDir: '.',
    usersFile: 'user.txt',
    tasksFile: 'tasks.txt',
  },
  reports: {
    dir: '.',
    taskOverviewFile: 'task_overview.txt',
    userOverviewFile: 'user_overview.txt',
  },
  admin: {
    username: 'admin',
    defaultPassword: 'adm1n',
  },
  logging: {
    level: 'info',
    filePath: 'logs/teamtask.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

// ── Schemas ──────────────────────────────────────────────────────────

const fileName = z.string().min(1);

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const StorageSchema = z.object({
  dataDir: fileName,
  usersFile: fileName,
  tasksFile: fileName,
});

const ReportsSchema = z.object({
  dir: fileName,
  taskOverviewFile: fileName,
  userOverviewFile: fileName,
});

const AdminSchema = z.object({
  username: z.string().min(1),
  defaultPassword: z.string().min(1),
});

const LoggingSchema = z.object({
  level: LogLevelSchema,
  filePath: fileName,
  maxFileSize: z.number().int().positive(),
  maxFiles: z.number().int().positive(),
});

/** A config file or environment layer: every section and key optional. */
export const ConfigLayerSchema = z.object({
  storage: StorageSchema.partial().optional(),
  reports: ReportsSchema.partial().optional(),
  admin: AdminSchema.partial().optional(),
  logging: LoggingSchema.partial().optional(),
});
export type ConfigLayer = z.infer<typeof ConfigLayerSchema>;

/** Environment variable overrides. */
const ENV_VARS = {
  dataDir: 'TEAMTASK_DATA_DIR',
  reportDir: 'TEAMTASK_REPORT_DIR',
  logLevel: 'TEAMTASK_LOG_LEVEL',
  logFile: 'TEAMTASK_LOG_FILE',
} as const;

/** Apply one layer over a resolved configuration. Later layers win per key. */
export function mergeLayer(base: TeamTaskConfig, layer: ConfigLayer): TeamTaskConfig {
  return {
    storage: { ...base.storage, ...layer.storage },
    reports: { ...base.reports, ...layer.reports },
    admin: { ...base.admin, ...layer.admin },
    logging: { ...base.logging, ...layer.logging },
  };
}

/**
 * Validate raw config file content as a layer.
 * Throws CONFIG_ERROR naming the first offending key.
 */
export function parseConfigLayer(raw: unknown, source: string): ConfigLayer {
  const result = ConfigLayerSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '(root)';
    throw new TeamTaskError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration in ${source}: ${where} ${issue?.message ?? ''}`.trim(),
      { fix: `Correct or remove ${source}` },
    );
  }
  return result.data;
}

/** Build the environment layer from TEAMTASK_* variables. */
function readEnvLayer(): ConfigLayer {
  const env = process.env;
  const dataDir = env[ENV_VARS.dataDir];
  const reportDir = env[ENV_VARS.reportDir];
  const logFile = env[ENV_VARS.logFile];
  const logLevel = env[ENV_VARS.logLevel];

  return parseConfigLayer({
    ...(dataDir !== undefined && { storage: { dataDir } }),
    ...(reportDir !== undefined && { reports: { dir: reportDir } }),
    ...((logLevel !== undefined || logFile !== undefined) && {
      logging: {
        ...(logLevel !== undefined && { level: logLevel }),
        ...(logFile !== undefined && { filePath: logFile }),
      },
    }),
  }, 'environment');
}

/** Get a fresh copy of the default configuration. */
export function getDefaultConfig(): TeamTaskConfig {
  return mergeLayer(DEFAULTS, {});
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<TeamTaskConfig> {
  let merged = getDefaultConfig();

  // Layer 1: Global config
  const globalPath = getGlobalConfigPath();
  const globalConfig = await readJson(globalPath);
  if (globalConfig !== null) {
    merged = mergeLayer(merged, parseConfigLayer(globalConfig, globalPath));
  }

  // Layer 2: Project config
  const projectPath = getConfigPath(cwd);
  const projectConfig = await readJson(projectPath);
  if (projectConfig !== null) {
    merged = mergeLayer(merged, parseConfigLayer(projectConfig, projectPath));
  }

  // Layer 3: Environment variables
  return mergeLayer(merged, readEnvLayer());
}
