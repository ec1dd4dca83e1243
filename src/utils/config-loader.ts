import { existsSync, readFileSync } from 'fs';
import logger, { loggerType } from './logger.js';
import { getErrorMessage } from './error-helper.js';
import type { BroadlinkConfig, Config, WebhookConfig } from '../types/streamer.js';

/**
 * Usual debug categories for balanced debugging output
 */
const USUAL_DEBUG_CATEGORIES = ['api', 'gena', 'state', 'remote'];

type MutableConfig = Omit<Config, 'isDevelopment' | 'isProduction'>;

/**
 * Default configuration values
 */
function defaultConfig(): MutableConfig {
  return {
    host: '0.0.0.0',
    port: 5006,
    logLevel: 'info',
    streamer: {
      port: 8080,
      descriptionPath: '/description.xml'
    },
    callback: {
      port: 0
    },
    httpTimeout: 5000,
    subscriptionTimeout: 1800,
    malformedThreshold: 5,
    pollInterval: 300000,
    buttonCodes: {},
    debounceMs: 400,
    volumeStep: 5,
    webhooks: []
  };
}

const ENV_VARS = [
  'NODE_ENV', 'LOGGER', 'HOST', 'PORT',
  'LOG_LEVEL', 'DEBUG_LEVEL', 'DEBUG_CATEGORIES',
  'STREAMER_LOCATION', 'STREAMER_HOST', 'STREAMER_PORT',
  'CALLBACK_HOST', 'CALLBACK_PORT',
  'HTTP_TIMEOUT', 'SUBSCRIPTION_TIMEOUT', 'POLL_INTERVAL', 'VOLUME_STEP',
  'BROADLINK_HOST', 'BROADLINK_PORT', 'BROADLINK_MAC', 'BROADLINK_DEVTYPE',
  'BUTTON_CODES_FILE', 'DEBOUNCE_MS',
  'WEBHOOKS_STATE_URL'
];

/**
 * Parse comma-separated environment variable into array
 */
export function parseArrayEnv(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

/**
 * Parse boolean environment variable
 */
export function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Integer env var; "0x" prefixed values are read as hex (device types)
 */
export function parseIntegerEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const trimmed = value.trim();
  const parsed = /^0x/i.test(trimmed) ? parseInt(trimmed.slice(2), 16) : parseInt(trimmed, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`${name} must be a number, got '${value}'`);
  }
  return parsed;
}

/**
 * Result of configuration loading
 */
export interface ConfigLoadResult {
  config: Config;
  sources: string[];
  envOverrides: string[];
}

export interface ConfigLoadOptions {
  settingsPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Format the configuration loading info as a message
 */
export function formatConfigInfo(result: ConfigLoadResult): string {
  return result.envOverrides.length > 0
    ? `Configuration loaded from: ${result.sources.join(' → ')} (${result.envOverrides.join(', ')})`
    : `Configuration loaded from: ${result.sources.join(' → ')}`;
}

/**
 * Streamer description URL from config: an explicit location wins, otherwise
 * it is built from host, port and description path
 */
export function streamerLocation(config: Pick<Config, 'streamer'>): string | undefined {
  if (config.streamer.location) {
    return config.streamer.location;
  }
  if (!config.streamer.host) {
    return undefined;
  }
  const port = config.streamer.port ?? 8080;
  const path = config.streamer.descriptionPath.startsWith('/')
    ? config.streamer.descriptionPath
    : `/${config.streamer.descriptionPath}`;
  return `http://${config.streamer.host}:${port}${path}`;
}

/**
 * Read learned codes: `{ "<button>": "b64:..." }`
 */
export function loadButtonCodes(path: string): Record<string, string> {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isObject(parsed)) {
    throw new Error(`Button codes file ${path} must contain a JSON object`);
  }
  const codes: Record<string, string> = {};
  for (const [button, code] of Object.entries(parsed)) {
    if (typeof code !== 'string') {
      logger.warn(`Ignoring non-string code for button '${button}' in ${path}`);
      continue;
    }
    codes[button] = code;
  }
  return codes;
}

/**
 * Load configuration from multiple sources with precedence:
 * 1. Default values
 * 2. settings.json (if exists)
 * 3. Environment variables (highest priority)
 *
 * Button codes come last, from `buttonCodesFile` when one is set.
 */
export function loadConfiguration(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const env = options.env ?? process.env;
  const settingsPath = options.settingsPath ?? './settings.json';
  const sources = ['defaults'];

  let merged: Record<string, unknown> = { ...defaultConfig() };

  if (existsSync(settingsPath)) {
    try {
      const settings: unknown = JSON.parse(readFileSync(settingsPath, 'utf-8'));
      if (isObject(settings)) {
        merged = deepMerge(merged, settings);
        sources.push(settingsPath);
      } else {
        logger.warn(`${settingsPath} does not contain a JSON object, ignoring it`);
      }
    } catch (error) {
      throw new Error(`Failed to read ${settingsPath}: ${getErrorMessage(error)}`);
    }
  } else {
    logger.debug(`No ${settingsPath} found, using defaults`);
  }

  const config = fromRecord(merged);

  // Environment settings (read first as they might affect other behavior)
  if (env.NODE_ENV) config.nodeEnv = env.NODE_ENV;
  if (env.LOGGER) config.logger = env.LOGGER.toLowerCase();

  // Server configuration
  if (env.HOST) config.host = env.HOST;
  config.port = parseIntegerEnv('PORT', env.PORT) ?? config.port;

  // Logging configuration
  if (env.LOG_LEVEL || env.DEBUG_LEVEL) {
    config.logLevel = env.LOG_LEVEL || env.DEBUG_LEVEL || config.logLevel;
  }
  if (env.DEBUG_CATEGORIES) {
    config.debugCategories = env.DEBUG_CATEGORIES.toLowerCase() === 'usual'
      ? USUAL_DEBUG_CATEGORIES
      : parseArrayEnv(env.DEBUG_CATEGORIES);
  }

  // Streamer
  if (env.STREAMER_LOCATION) config.streamer.location = env.STREAMER_LOCATION;
  if (env.STREAMER_HOST) config.streamer.host = env.STREAMER_HOST;
  config.streamer.port = parseIntegerEnv('STREAMER_PORT', env.STREAMER_PORT) ?? config.streamer.port;

  // Event callback server
  if (env.CALLBACK_HOST) config.callback.host = env.CALLBACK_HOST;
  config.callback.port = parseIntegerEnv('CALLBACK_PORT', env.CALLBACK_PORT) ?? config.callback.port;

  // Timing
  config.httpTimeout = parseIntegerEnv('HTTP_TIMEOUT', env.HTTP_TIMEOUT) ?? config.httpTimeout;
  config.subscriptionTimeout = parseIntegerEnv('SUBSCRIPTION_TIMEOUT', env.SUBSCRIPTION_TIMEOUT) ?? config.subscriptionTimeout;
  config.pollInterval = parseIntegerEnv('POLL_INTERVAL', env.POLL_INTERVAL) ?? config.pollInterval;
  config.volumeStep = parseIntegerEnv('VOLUME_STEP', env.VOLUME_STEP) ?? config.volumeStep;
  config.debounceMs = parseIntegerEnv('DEBOUNCE_MS', env.DEBOUNCE_MS) ?? config.debounceMs;

  // Broadlink bridge
  if (env.BROADLINK_HOST) {
    config.broadlink = { ...config.broadlink, host: env.BROADLINK_HOST };
  }
  if (config.broadlink) {
    if (env.BROADLINK_MAC) config.broadlink.mac = env.BROADLINK_MAC;
    const port = parseIntegerEnv('BROADLINK_PORT', env.BROADLINK_PORT);
    if (port !== undefined) config.broadlink.port = port;
    const devtype = parseIntegerEnv('BROADLINK_DEVTYPE', env.BROADLINK_DEVTYPE);
    if (devtype !== undefined) config.broadlink.devtype = devtype;
  }
  if (env.BUTTON_CODES_FILE) config.buttonCodesFile = env.BUTTON_CODES_FILE;

  // Webhooks
  if (env.WEBHOOKS_STATE_URL) {
    config.webhooks = [{ url: env.WEBHOOKS_STATE_URL }];
  }

  if (config.buttonCodesFile) {
    config.buttonCodes = { ...config.buttonCodes, ...loadButtonCodes(config.buttonCodesFile) };
    sources.push(config.buttonCodesFile);
  }

  const envOverrides = ENV_VARS.filter(name => env[name] !== undefined);
  if (envOverrides.length > 0) {
    sources.push('env vars');
  }

  // Apply log level to logger before showing startup banner
  logger.level = config.logLevel;
  logger.debug(`Logger: ${loggerType}`);

  const finalConfig: Config = {
    ...config,
    isDevelopment: !config.nodeEnv || config.nodeEnv === 'development',
    isProduction: config.nodeEnv === 'production'
  };

  return {
    config: finalConfig,
    sources,
    envOverrides
  };
}

/**
 * Type the merged record field by field; bad values from settings.json fall
 * back to the defaults
 */
function fromRecord(record: Record<string, unknown>): MutableConfig {
  const defaults = defaultConfig();
  const streamer = isObject(record['streamer']) ? record['streamer'] : {};
  const callback = isObject(record['callback']) ? record['callback'] : {};

  const config: MutableConfig = {
    host: stringOr(record['host'], defaults.host),
    port: numberOr(record['port'], defaults.port),
    logLevel: stringOr(record['logLevel'], defaults.logLevel),
    streamer: {
      descriptionPath: stringOr(streamer['descriptionPath'], defaults.streamer.descriptionPath),
      port: numberOr(streamer['port'], defaults.streamer.port ?? 8080)
    },
    callback: {
      port: numberOr(callback['port'], defaults.callback.port)
    },
    httpTimeout: numberOr(record['httpTimeout'], defaults.httpTimeout),
    subscriptionTimeout: numberOr(record['subscriptionTimeout'], defaults.subscriptionTimeout),
    malformedThreshold: numberOr(record['malformedThreshold'], defaults.malformedThreshold),
    pollInterval: numberOr(record['pollInterval'], defaults.pollInterval),
    buttonCodes: stringRecord(record['buttonCodes']),
    debounceMs: numberOr(record['debounceMs'], defaults.debounceMs),
    volumeStep: numberOr(record['volumeStep'], defaults.volumeStep),
    webhooks: webhookList(record['webhooks'])
  };

  if (typeof streamer['location'] === 'string') config.streamer.location = streamer['location'];
  if (typeof streamer['host'] === 'string') config.streamer.host = streamer['host'];
  if (typeof callback['host'] === 'string') config.callback.host = callback['host'];
  if (typeof record['nodeEnv'] === 'string') config.nodeEnv = record['nodeEnv'];
  if (typeof record['logger'] === 'string') config.logger = record['logger'].toLowerCase();
  if (typeof record['buttonCodesFile'] === 'string') config.buttonCodesFile = record['buttonCodesFile'];

  const debugCategories = record['debugCategories'];
  if (Array.isArray(debugCategories)) {
    config.debugCategories = debugCategories.filter((c): c is string => typeof c === 'string');
  }

  const broadlink = broadlinkConfig(record['broadlink']);
  if (broadlink) config.broadlink = broadlink;

  return config;
}

function broadlinkConfig(value: unknown): BroadlinkConfig | undefined {
  if (!isObject(value) || typeof value['host'] !== 'string') {
    return undefined;
  }
  const config: BroadlinkConfig = { host: value['host'] };
  if (typeof value['port'] === 'number') config.port = value['port'];
  if (typeof value['mac'] === 'string') config.mac = value['mac'];
  if (typeof value['devtype'] === 'number') {
    config.devtype = value['devtype'];
  } else if (typeof value['devtype'] === 'string') {
    config.devtype = parseIntegerEnv('broadlink.devtype', value['devtype']);
  }
  return config;
}

function webhookList(value: unknown): WebhookConfig[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const webhooks: WebhookConfig[] = [];
  for (const entry of value) {
    if (!isObject(entry) || typeof entry['url'] !== 'string') {
      continue;
    }
    const headers = isObject(entry['headers']) ? stringRecord(entry['headers']) : undefined;
    webhooks.push(headers ? { url: entry['url'], headers } : { url: entry['url'] });
  }
  return webhooks;
}

function stringRecord(value: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (isObject(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === 'string') {
        record[key] = entry;
      }
    }
  }
  return record;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' && value !== '' ? value : fallback;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Deep merge two objects
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const output = { ...target };

  Object.keys(source).forEach(key => {
    const value = source[key];
    const existing = target[key];
    if (isObject(value) && isObject(existing)) {
      output[key] = deepMerge(existing, value);
    } else {
      output[key] = value;
    }
  });

  return output;
}

/**
 * Check if value is an object
 */
function isObject(item: unknown): item is Record<string, unknown> {
  return item !== null && typeof item === 'object' && !Array.isArray(item);
}
