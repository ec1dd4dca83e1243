import logger from './logger.js';

export const DEBUG_CATEGORIES = ['soap', 'gena', 'events', 'state', 'remote', 'capabilities', 'api', 'sse'] as const;

export type DebugCategory = typeof DEBUG_CATEGORIES[number];

export type DebugCategories = Record<DebugCategory, boolean>;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export interface DebugSettings {
  logLevel?: string;
  debugCategories?: string[];
}

export function isLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some(l => l === level);
}

export function isDebugCategory(category: string): category is DebugCategory {
  return DEBUG_CATEGORIES.some(c => c === category);
}

export class DebugManager {
  private categories: DebugCategories;

  constructor(settings?: DebugSettings) {
    this.categories = {
      soap: false,         // SOAP request/response bodies
      gena: false,         // SUBSCRIBE / renew / NOTIFY intake
      events: false,       // Parsed event properties and merges
      state: false,        // Player state transitions
      remote: false,       // Broadlink packets and debounce windows
      capabilities: false, // Description and SCPD walk
      api: true,           // API request logging (always on by default)
      sse: false           // Server-Sent Events clients
    };

    if (settings) {
      this.initFromSettings(settings);
    }
  }

  private initFromSettings(settings: DebugSettings): void {
    const level = settings.logLevel?.toLowerCase();
    if (level && isLogLevel(level)) {
      logger.level = level;
      logger.info(`Log level set to '${logger.level}' from configuration`);
    }

    if (settings.debugCategories && settings.debugCategories.length > 0) {
      const requested = settings.debugCategories.map(c => c.trim().toLowerCase());

      // '*' or 'all' enables everything
      if (requested.includes('*') || requested.includes('all')) {
        this.enableAll();
      } else {
        const enabled = requested.filter(isDebugCategory);
        enabled.forEach(category => {
          this.categories[category] = true;
        });
        logger.info(`Debug categories enabled from configuration: ${enabled.join(', ')}`);
      }
    }

    logger.info('Debug configuration:', {
      logLevel: logger.level,
      categories: DEBUG_CATEGORIES.filter(c => this.categories[c]).join(', ') || 'none'
    });
  }

  isEnabled(category: DebugCategory): boolean {
    return this.categories[category];
  }

  setCategory(category: DebugCategory, enabled: boolean): void {
    this.categories[category] = enabled;
    logger.info(`Debug category '${category}' ${enabled ? 'enabled' : 'disabled'}`);
  }

  setLogLevel(level: string): void {
    const normalized = level.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new Error(`Invalid log level: ${level}`);
    }
    logger.level = normalized;
    process.env['LOG_LEVEL'] = normalized;
    logger.info(`Log level set to: ${normalized}`);
  }

  getLogLevel(): LogLevel {
    const current = logger.level;
    return isLogLevel(current) ? current : 'info';
  }

  getCategories(): DebugCategories {
    return { ...this.categories };
  }

  enableAll(): void {
    DEBUG_CATEGORIES.forEach(category => {
      this.categories[category] = true;
    });
    logger.info('All debug categories enabled');
  }

  disableAll(): void {
    DEBUG_CATEGORIES.forEach(category => {
      this.categories[category] = false;
    });
    // Keep API logging on
    this.categories.api = true;
    logger.info('All debug categories disabled (except API)');
  }

  debug(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('debug', category, message, meta);
  }

  info(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('info', category, message, meta);
  }

  warn(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('warn', category, message, meta);
  }

  error(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('error', category, message, meta);
  }

  trace(category: DebugCategory, message: string, meta?: unknown): void {
    this.write('trace', category, message, meta);
  }

  // Always logs regardless of debug level or category
  always(message: string, meta?: unknown): void {
    logger.always(message, meta);
  }

  private write(level: LogLevel, category: DebugCategory, message: string, meta: unknown): void {
    if (!this.categories[category] || !this.shouldLog(level)) {
      return;
    }
    const logMeta = typeof meta === 'object' && meta !== null ? { ...meta, category } : { data: meta, category };
    logger[level](`[${category.toUpperCase()}] ${message}`, logMeta);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.getLogLevel());
  }
}

let debugManagerInstance: DebugManager | null = null;

export function initializeDebugManager(settings: DebugSettings): DebugManager {
  debugManagerInstance = new DebugManager(settings);
  return debugManagerInstance;
}

/**
 * Shared instance. Until initializeDebugManager() runs it carries the defaults,
 * so modules loaded by tests can log without any setup.
 */
export function getDebugManager(): DebugManager {
  if (!debugManagerInstance) {
    debugManagerInstance = new DebugManager();
  }
  return debugManagerInstance;
}

export const debugManager = {
  debug: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().debug(category, message, meta),
  info: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().info(category, message, meta),
  warn: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().warn(category, message, meta),
  error: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().error(category, message, meta),
  trace: (category: DebugCategory, message: string, meta?: unknown) => getDebugManager().trace(category, message, meta),
  isEnabled: (category: DebugCategory) => getDebugManager().isEnabled(category),
  setCategory: (category: DebugCategory, enabled: boolean) => getDebugManager().setCategory(category, enabled),
  setLogLevel: (level: string) => getDebugManager().setLogLevel(level),
  getLogLevel: () => getDebugManager().getLogLevel(),
  getCategories: () => getDebugManager().getCategories(),
  enableAll: () => getDebugManager().enableAll(),
  disableAll: () => getDebugManager().disableAll()
};
