/**
 * DugoutBot Configuration I/O
 *
 * Config sources, first match wins:
 *   DUGOUTBOT_CONFIG_YAML   inline YAML (containers, CI)
 *   DUGOUTBOT_CONFIG        explicit file path
 *   ./dugoutbot.yaml, ./dugoutbot.yml, ~/.dugoutbot/config.yaml
 *
 * Environment variables override individual fields afterwards.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import YAML from 'yaml';
import type { DugoutBotConfig } from './types.js';
import { defaultConfig, isLogLevel } from './types.js';
import { ConfigError } from '../core/errors.js';
import { nonEmpty, parsePositiveNumber } from '../utils/parse.js';
import { createLogger } from '../logger.js';

const log = createLogger('Config');

const INLINE_ENV = 'DUGOUTBOT_CONFIG_YAML';
const PATH_ENV = 'DUGOUTBOT_CONFIG';

let loadFailed = false;

function candidatePaths(): string[] {
  return [
    resolve(process.cwd(), 'dugoutbot.yaml'),
    resolve(process.cwd(), 'dugoutbot.yml'),
    join(homedir(), '.dugoutbot', 'config.yaml'),
  ];
}

/**
 * Config file path: DUGOUTBOT_CONFIG, else the first existing candidate.
 * Undefined when there is no file and defaults apply.
 */
export function resolveConfigPath(): string | undefined {
  const explicit = nonEmpty(process.env[PATH_ENV]);
  if (explicit) return resolve(explicit);
  return candidatePaths().find((p) => existsSync(p));
}

/**
 * Human-readable name of where config comes from, for error messages
 */
export function configSourceLabel(): string {
  if (nonEmpty(process.env[INLINE_ENV])) return INLINE_ENV;
  return resolveConfigPath() ?? 'default config';
}

/**
 * Whether the last load attempt failed and fell back (or exited)
 */
export function didLoadFail(): boolean {
  return loadFailed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
  const value = root[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`"${key}" must be a mapping`, source);
  }
  return value;
}

function optionalString(raw: Record<string, unknown>, key: string, path: string, source: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  // YAML reads unquoted ids like 1234567890 as numbers
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') {
    throw new ConfigError(`"${path}" must be a string`, source);
  }
  return value;
}

function readSource(source: string): string | undefined {
  const inline = nonEmpty(process.env[INLINE_ENV]);
  if (inline) return inline;
  if (source === 'default config') return undefined;
  if (!existsSync(source)) {
    throw new ConfigError(`Config file not found: ${source}`, source);
  }
  return readFileSync(source, 'utf-8');
}

/**
 * Merge parsed YAML over the defaults, checking types along the way
 */
function fromDocument(doc: unknown, source: string): DugoutBotConfig {
  const config = defaultConfig();
  if (doc === undefined || doc === null) return config;
  if (!isRecord(doc)) {
    throw new ConfigError('Config root must be a mapping', source);
  }

  const bot = section(doc, 'bot', source);
  config.bot.name = optionalString(bot, 'name', 'bot.name', source) ?? config.bot.name;
  config.bot.groupmeBotId = optionalString(bot, 'groupmeBotId', 'bot.groupmeBotId', source);

  const conversation = section(doc, 'conversation', source);
  const timeout = conversation.sessionTimeoutMin;
  if (timeout !== undefined && timeout !== null) {
    const minutes = parsePositiveNumber(timeout);
    if (minutes === undefined) {
      throw new ConfigError(`"conversation.sessionTimeoutMin" must be a positive number, got ${String(timeout)}`, source);
    }
    config.conversation.sessionTimeoutMin = minutes;
  }

  const server = section(doc, 'server', source);
  const logLevel = server.logLevel;
  if (logLevel !== undefined && logLevel !== null) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(`"server.logLevel" is not a log level: ${String(logLevel)}`, source);
    }
    config.server.logLevel = logLevel;
  }

  return config;
}

/**
 * Environment variables win over file values
 */
function applyEnvOverrides(config: DugoutBotConfig, env: NodeJS.ProcessEnv): void {
  const botName = env.GROUPME_BOT_NAME;
  if (botName !== undefined) config.bot.name = botName.trim();
  config.bot.groupmeBotId = nonEmpty(env.GROUPME_BOT_ID) ?? config.bot.groupmeBotId;

  const timeout = nonEmpty(env.SESSION_TIMEOUT_MIN);
  if (timeout !== undefined) {
    const minutes = parsePositiveNumber(timeout);
    if (minutes === undefined) {
      throw new ConfigError(`SESSION_TIMEOUT_MIN must be a positive number, got ${timeout}`, 'SESSION_TIMEOUT_MIN');
    }
    config.conversation.sessionTimeoutMin = minutes;
  }

  const logLevel = nonEmpty(env.LOG_LEVEL);
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(`LOG_LEVEL is not a log level: ${logLevel}`, 'LOG_LEVEL');
    }
    config.server.logLevel = logLevel;
  }
}

/**
 * Load config, throwing ConfigError on anything invalid
 */
export function loadConfigStrict(): DugoutBotConfig {
  const source = configSourceLabel();
  loadFailed = false;

  try {
    const content = readSource(source);
    let doc: unknown;
    if (content !== undefined) {
      try {
        doc = YAML.parse(content);
      } catch (err) {
        throw new ConfigError(`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`, source, { cause: err });
      }
    }

    const config = fromDocument(doc, source);
    applyEnvOverrides(config, process.env);

    if (!config.bot.name.trim()) {
      throw new ConfigError('"bot.name" must not be empty', source);
    }
    return config;
  } catch (err) {
    loadFailed = true;
    throw err;
  }
}

/**
 * Load config, falling back to defaults when it is invalid
 */
export function loadConfig(): DugoutBotConfig {
  try {
    return loadConfigStrict();
  } catch (err) {
    log.error(`Failed to load ${configSourceLabel()}, using defaults:`, err);
    return defaultConfig();
  }
}
