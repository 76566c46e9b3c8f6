/**
 * Application Configuration Types
 */

export interface GatewayConfig {
  server: ServerConfig;
  logging: LoggingConfig;
  rpc: RPCConfig;
  stats: StatsConfig;
  feed: FeedConfig;
  cors: CorsConfig;
  helmet: HelmetConfig;
  database: DatabaseConfig;
}

export interface ServerConfig {
  port: number;
  host: string;
  environment: string;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'debug';

export interface LoggingConfig {
  level: LogLevel;
  enableConsole: boolean;
}

export interface RPCConfig {
  url: string;
  timeout: number;
}

export interface StatsConfig {
  sampleCount: number;
  blockHeightDelayMs: number;
}

export interface FeedConfig {
  address: string;
}

export interface CorsConfig {
  enabled: boolean;
  origin: string;
  credentials: boolean;
}

export interface HelmetConfig {
  enabled: boolean;
  contentSecurityPolicy: boolean;
}

export interface DatabaseConfig {
  url?: string;
  name?: string;
}
