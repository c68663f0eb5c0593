import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigurationError, errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';
import { CacheConfig, PartialScoutConfig, PartialScoutConfigSchema, ScoutConfig } from './types.js';

const logger = new Logger({ scope: 'config' });

const DEFAULT_EFS_MOUNT = '/mnt/efs';

/**
 * Cache defaults for a container-local cache and for a persistent volume
 */
function defaultCacheConfig(persistent: boolean, env: NodeJS.ProcessEnv): CacheConfig {
  if (persistent) {
    return {
      dir: path.join(env.EFS_MOUNT_PATH || DEFAULT_EFS_MOUNT, 'symbolscope-cache'),
      maxAgeHours: 168,
      maxSizeMb: 50000,
      persistent: true,
    };
  }

  return {
    dir: path.join(os.tmpdir(), 'symbolscope-cache'),
    maxAgeHours: 24,
    maxSizeMb: 5000,
    persistent: false,
  };
}

function buildDefaultConfig(env: NodeJS.ProcessEnv = {}): ScoutConfig {
  return {
    exclude: ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/build/**', '**/coverage/**'],
    defaultPattern: '*.ts',
    useCache: true,
    cache: defaultCacheConfig(false, env),
    git: {
      cloneTimeoutMs: 300000, // 5 minutes
      commandTimeoutMs: 60000,
    },
    github: {
      apiBaseUrl: 'https://api.github.com',
      rawBaseUrl: 'https://raw.githubusercontent.com',
    },
    output: {
      maxResults: 50,
    },
  };
}

/**
 * Configuration file names to search for (in order of precedence)
 */
const CONFIG_FILE_NAMES = [
  '.symbolscope.yaml',
  '.symbolscope.yml',
  'symbolscope.yaml',
  'symbolscope.yml',
];

/**
 * Configuration loader singleton
 */
class ConfigLoader {
  private config: ScoutConfig | null = null;
  private configPath: string | null = null;

  /**
   * Load configuration from file or use defaults
   */
  load(projectRoot?: string, env: NodeJS.ProcessEnv = process.env): ScoutConfig {
    if (this.config) {
      return this.config;
    }

    const root = projectRoot || process.cwd();
    const configFile = this.findConfigFile(root);

    let fileConfig: PartialScoutConfig = {};
    if (configFile) {
      logger.debug('Loading configuration', { file: configFile });
      this.configPath = configFile;
      fileConfig = this.loadFromFile(configFile);
    }

    const merged = this.merge(fileConfig, this.readEnvironment(env), env);
    this.validateConfig(merged);
    this.config = merged;

    return this.config;
  }

  get(): ScoutConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  reload(projectRoot?: string, env?: NodeJS.ProcessEnv): ScoutConfig {
    this.config = null;
    this.configPath = null;
    return this.load(projectRoot, env);
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  private findConfigFile(root: string): string | null {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = path.join(root, fileName);
      if (fs.existsSync(filePath)) {
        return filePath;
      }
    }
    return null;
  }

  /**
   * Parse and validate the YAML file; an unusable file falls back to defaults
   */
  private loadFromFile(filePath: string): PartialScoutConfig {
    try {
      const fileContent = fs.readFileSync(filePath, 'utf-8');
      const parsed: unknown = yaml.parse(fileContent) ?? {};
      const result = PartialScoutConfigSchema.safeParse(parsed);

      if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        logger.warn('Invalid configuration file, using defaults', { file: filePath, issues });
        return {};
      }

      return result.data;
    } catch (error) {
      logger.warn('Could not read configuration file, using defaults', {
        file: filePath,
        error: errorMessage(error),
      });
      return {};
    }
  }

  /**
   * Environment overrides, applied on top of the file
   */
  private readEnvironment(env: NodeJS.ProcessEnv): PartialScoutConfig {
    const overrides: PartialScoutConfig = {};
    const cache: NonNullable<PartialScoutConfig['cache']> = {};
    const git: NonNullable<PartialScoutConfig['git']> = {};

    if (env.GITHUB_TOKEN) {
      overrides.github = { token: env.GITHUB_TOKEN };
    }

    if (env.SYMBOLSCOPE_USE_CACHE === 'false') {
      overrides.useCache = false;
    }

    if (env.SYMBOLSCOPE_CACHE_PERSISTENT === 'true' || env.EFS_MOUNT_PATH) {
      cache.persistent = true;
    }

    if (env.SYMBOLSCOPE_CACHE_DIR) {
      cache.dir = env.SYMBOLSCOPE_CACHE_DIR;
    }

    const maxAge = this.readPositiveNumber(env, 'SYMBOLSCOPE_CACHE_MAX_AGE_HOURS');
    if (maxAge !== undefined) {
      cache.maxAgeHours = maxAge;
    }

    const maxSize = this.readPositiveNumber(env, 'SYMBOLSCOPE_CACHE_MAX_SIZE_MB');
    if (maxSize !== undefined) {
      cache.maxSizeMb = maxSize;
    }

    const cloneTimeout = this.readPositiveNumber(env, 'SYMBOLSCOPE_CLONE_TIMEOUT_MS');
    if (cloneTimeout !== undefined) {
      git.cloneTimeoutMs = cloneTimeout;
    }

    if (Object.keys(cache).length > 0) {
      overrides.cache = cache;
    }
    if (Object.keys(git).length > 0) {
      overrides.git = git;
    }

    return overrides;
  }

  private readPositiveNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw === '') {
      return undefined;
    }

    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
      logger.warn(`Ignoring ${name}: expected a positive number`, { value: raw });
      return undefined;
    }
    return value;
  }

  /**
   * Deep merge file and environment configuration over the defaults
   */
  private merge(
    fileConfig: PartialScoutConfig,
    envConfig: PartialScoutConfig,
    env: NodeJS.ProcessEnv
  ): ScoutConfig {
    const defaults = buildDefaultConfig(env);
    const userCache = { ...fileConfig.cache, ...envConfig.cache };
    const persistent = userCache.persistent ?? false;

    return {
      exclude: envConfig.exclude ?? fileConfig.exclude ?? defaults.exclude,
      defaultPattern: envConfig.defaultPattern ?? fileConfig.defaultPattern ?? defaults.defaultPattern,
      useCache: envConfig.useCache ?? fileConfig.useCache ?? defaults.useCache,
      cache: {
        ...defaultCacheConfig(persistent, env),
        ...userCache,
      },
      git: {
        ...defaults.git,
        ...fileConfig.git,
        ...envConfig.git,
      },
      github: {
        ...defaults.github,
        ...fileConfig.github,
        ...envConfig.github,
      },
      output: {
        ...defaults.output,
        ...fileConfig.output,
        ...envConfig.output,
      },
    };
  }

  private validateConfig(config: ScoutConfig): void {
    if (!path.isAbsolute(config.cache.dir)) {
      throw new ConfigurationError('cache.dir', 'must be an absolute path');
    }

    if (config.git.cloneTimeoutMs < 1000) {
      throw new ConfigurationError('git.cloneTimeoutMs', 'must be at least 1000');
    }
  }
}

/**
 * Singleton instance
 */
const configLoader = new ConfigLoader();

/**
 * Get the current configuration
 */
export function getConfig(): ScoutConfig {
  return configLoader.get();
}

/**
 * Load configuration from a specific project root
 */
export function loadConfig(projectRoot?: string, env?: NodeJS.ProcessEnv): ScoutConfig {
  return configLoader.load(projectRoot, env);
}

/**
 * Reload configuration
 */
export function reloadConfig(projectRoot?: string, env?: NodeJS.ProcessEnv): ScoutConfig {
  return configLoader.reload(projectRoot, env);
}

/**
 * Get the path to the loaded configuration file
 */
export function getConfigPath(): string | null {
  return configLoader.getConfigPath();
}

/**
 * Get default configuration (useful for documentation/examples)
 */
export function getDefaultConfig(): ScoutConfig {
  return buildDefaultConfig();
}
