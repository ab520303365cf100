/**
 * core/config.ts
 *
 * Resolves the SchedulerConfig. Sources, lowest priority first:
 *   1. Built-in defaults
 *   2. config/scheduler.json (if present)
 *   3. CROSSCHED_* environment variables (.env is loaded first)
 *   4. Explicit overrides from the caller
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import Ajv from 'ajv';
import { LogLevel, Platform, SchedulerConfig } from './types';
import { ValidationError } from './errors';
import { DEFAULT_TASK_FOLDER } from '../codecs/windows_codec';

const PLATFORMS: readonly Platform[] = ['unix', 'windows'];
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const DEFAULT_TIMEOUT_MS = 15000;

const ajv = new Ajv({ allErrors: true });

const validateFile = ajv.compile<Partial<SchedulerConfig>>({
  type: 'object',
  properties: {
    platform:         { type: 'string', enum: [...PLATFORMS] },
    logLevel:         { type: 'string', enum: [...LOG_LEVELS] },
    taskFolder:       { type: 'string', minLength: 1 },
    crontabFile:      { type: 'string', minLength: 1 },
    crontabUser:      { type: 'string', minLength: 1 },
    commandTimeoutMs: { type: 'integer', minimum: 1 }
  },
  additionalProperties: false
});

export interface LoadConfigOptions {
  /** Defaults to config/scheduler.json under the working directory. */
  configPath?: string;
  /** Environment to read; when omitted, .env is loaded into process.env and that is used. */
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<SchedulerConfig>;
}

function readConfigFile(configPath: string): Partial<SchedulerConfig> {
  if (!fs.existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (e) {
    throw new ValidationError(`Config file ${configPath} is not valid JSON`, {
      path: configPath,
      error: e instanceof Error ? e.message : String(e)
    });
  }

  if (!validateFile(parsed)) {
    throw new ValidationError(`Config file ${configPath} is malformed`, {
      path: configPath,
      violations: validateFile.errors ?? []
    });
  }
  return parsed;
}

function isPlatform(value: string): value is Platform {
  return PLATFORMS.some(p => p === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(l => l === value);
}

function readEnv(env: NodeJS.ProcessEnv): Partial<SchedulerConfig> {
  const config: Partial<SchedulerConfig> = {};

  const platform = env.CROSSCHED_PLATFORM;
  if (platform) {
    if (!isPlatform(platform)) {
      throw new ValidationError(`CROSSCHED_PLATFORM must be one of ${PLATFORMS.join(', ')}`, { value: platform });
    }
    config.platform = platform;
  }

  const level = env.CROSSCHED_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new ValidationError(`CROSSCHED_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, { value: level });
    }
    config.logLevel = level;
  }

  const timeout = env.CROSSCHED_COMMAND_TIMEOUT_MS;
  if (timeout) {
    const ms = Number(timeout);
    if (!Number.isInteger(ms) || ms < 1) {
      throw new ValidationError('CROSSCHED_COMMAND_TIMEOUT_MS must be a positive integer', { value: timeout });
    }
    config.commandTimeoutMs = ms;
  }

  if (env.CROSSCHED_TASK_FOLDER) config.taskFolder = env.CROSSCHED_TASK_FOLDER;
  if (env.CROSSCHED_CRONTAB_FILE) config.crontabFile = env.CROSSCHED_CRONTAB_FILE;
  if (env.CROSSCHED_CRONTAB_USER) config.crontabUser = env.CROSSCHED_CRONTAB_USER;

  return config;
}

export function loadSchedulerConfig(options: LoadConfigOptions = {}): SchedulerConfig {
  let env = options.env;
  if (env === undefined) {
    dotenv.config();
    env = process.env;
  }

  const configPath = options.configPath ?? path.resolve(process.cwd(), 'config', 'scheduler.json');
  const merged: Partial<SchedulerConfig> = {
    ...readConfigFile(configPath),
    ...readEnv(env),
    ...options.overrides
  };

  return {
    platform: merged.platform ?? (process.platform === 'win32' ? 'windows' : 'unix'),
    logLevel: merged.logLevel ?? 'info',
    taskFolder: merged.taskFolder ?? DEFAULT_TASK_FOLDER,
    crontabFile: merged.crontabFile,
    crontabUser: merged.crontabUser,
    commandTimeoutMs: merged.commandTimeoutMs ?? DEFAULT_TIMEOUT_MS
  };
}
