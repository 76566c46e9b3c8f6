import { GatewayConfig, LogLevel } from '@/types/config';
import { DEFAULT_VALUES, MAX_PERFORMANCE_SAMPLES, SYSTEM_PROGRAM_ADDRESS } from './constants';
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

type Section = Record<string, unknown>;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'debug'];

/**
 * Configuration Manager - Supports YAML config files with environment variable overrides
 */
export class ConfigManager {
  private static instance: ConfigManager;
  private config: GatewayConfig;

  private constructor() {
    this.config = resolveConfig(process.env, this.loadYamlConfig());
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadYamlConfig(): Section {
    const configPaths = [
      path.join(process.cwd(), 'config.yaml'),
      path.join(process.cwd(), 'config.yml'),
      path.join(__dirname, '..', '..', 'config.yaml'),
      path.join(__dirname, '..', '..', 'config.yml'),
    ];

    for (const configPath of configPaths) {
      if (fs.existsSync(configPath)) {
        try {
          const fileContents = fs.readFileSync(configPath, 'utf8');
          const loaded = yaml.load(fileContents);
          console.log(`Loaded configuration from: ${configPath}`);
          return isSection(loaded) ? loaded : {};
        } catch (error) {
          console.warn(`Failed to load YAML config from ${configPath}:`, error);
        }
      }
    }

    return {};
  }

  getConfig(): GatewayConfig {
    return this.config;
  }
}

/**
 * Merge a parsed YAML document with environment variables (env vars take precedence)
 * and validate the result. Throws listing every invalid setting.
 */
export function resolveConfig(env: NodeJS.ProcessEnv, yamlConfig: Section = {}): GatewayConfig {
  const server = section(yamlConfig, 'server');
  const logging = section(yamlConfig, 'logging');
  const rpc = section(yamlConfig, 'rpc');
  const stats = section(yamlConfig, 'stats');
  const feed = section(yamlConfig, 'feed');
  const cors = section(yamlConfig, 'cors');
  const helmet = section(yamlConfig, 'helmet');
  const database = section(yamlConfig, 'database');
  const logLevel = pickString(env.LOG_LEVEL, logging.level) ?? DEFAULT_VALUES.LOG_LEVEL;

  const config: GatewayConfig = {
    server: {
      port: pickInt(env.PORT, server.port, DEFAULT_VALUES.PORT),
      host: pickString(env.HOST, server.host) ?? DEFAULT_VALUES.HOST,
      environment: pickString(env.NODE_ENV, server.environment) ?? DEFAULT_VALUES.ENVIRONMENT,
    },
    logging: {
      level: isLogLevel(logLevel) ? logLevel : DEFAULT_VALUES.LOG_LEVEL,
      enableConsole: pickBool(env.LOG_CONSOLE, logging.enable_console, true),
    },
    rpc: {
      url: pickString(env.SOLANA_RPC_URL, rpc.url) ?? DEFAULT_VALUES.RPC_URL,
      timeout: pickInt(env.RPC_TIMEOUT, rpc.timeout_ms, DEFAULT_VALUES.RPC_TIMEOUT),
    },
    stats: {
      sampleCount: pickInt(env.STATS_SAMPLE_COUNT, stats.sample_count, DEFAULT_VALUES.PERFORMANCE_SAMPLE_COUNT),
      blockHeightDelayMs: pickInt(env.BLOCK_HEIGHT_DELAY_MS, stats.block_height_delay_ms, DEFAULT_VALUES.BLOCK_HEIGHT_DELAY_MS),
    },
    feed: {
      address: pickString(env.FEED_ADDRESS, feed.address) ?? SYSTEM_PROGRAM_ADDRESS,
    },
    cors: {
      enabled: pickBool(env.CORS_ENABLED, cors.enabled, true),
      origin: pickString(env.CORS_ORIGIN, cors.origin) ?? DEFAULT_VALUES.CORS_ORIGIN,
      credentials: pickBool(env.CORS_CREDENTIALS, cors.credentials, false),
    },
    helmet: {
      enabled: pickBool(env.HELMET_ENABLED, helmet.enabled, true),
      contentSecurityPolicy: pickBool(env.HELMET_CSP, helmet.content_security_policy, false),
    },
    database: {
      url: pickString(env.DATABASE_URL, database.url),
      name: pickString(env.DATABASE_NAME, database.name),
    },
  };

  const problems = validateConfig(config);
  if (!isLogLevel(logLevel)) {
    problems.push(`logging.level: expected one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }
  if (problems.length > 0) {
    throw new Error(`Invalid configuration:\n${problems.join('\n')}`);
  }

  return config;
}

function validateConfig(config: GatewayConfig): string[] {
  const problems: string[] = [];

  if (!isHttpUrl(config.rpc.url)) {
    problems.push(`rpc.url: expected an http(s) URL, got "${config.rpc.url}"`);
  }
  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    problems.push(`server.port: expected 0-65535, got ${config.server.port}`);
  }
  if (!(config.rpc.timeout > 0)) {
    problems.push(`rpc.timeout: expected a positive number of milliseconds, got ${config.rpc.timeout}`);
  }
  if (!(config.stats.sampleCount >= 1 && config.stats.sampleCount <= MAX_PERFORMANCE_SAMPLES)) {
    problems.push(`stats.sampleCount: expected 1-${MAX_PERFORMANCE_SAMPLES}, got ${config.stats.sampleCount}`);
  }
  if (!(config.stats.blockHeightDelayMs >= 0)) {
    problems.push(`stats.blockHeightDelayMs: expected >= 0, got ${config.stats.blockHeightDelayMs}`);
  }
  return problems;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Section, key: string): Section {
  const value = root[key];
  return isSection(value) ? value : {};
}

function pickString(envValue: string | undefined, yamlValue: unknown): string | undefined {
  if (envValue !== undefined && envValue !== '') return envValue;
  if (typeof yamlValue === 'string' && yamlValue !== '') return yamlValue;
  if (typeof yamlValue === 'number') return String(yamlValue);
  return undefined;
}

function pickInt(envValue: string | undefined, yamlValue: unknown, fallback: number): number {
  const raw = pickString(envValue, yamlValue);
  return raw === undefined ? fallback : Number(raw);
}

function pickBool(envValue: string | undefined, yamlValue: unknown, fallback: boolean): boolean {
  if (envValue !== undefined && envValue !== '') return envValue === 'true';
  if (typeof yamlValue === 'boolean') return yamlValue;
  return fallback;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export { DEFAULT_VALUES } from './constants';
