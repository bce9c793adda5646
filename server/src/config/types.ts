/**
 * Configuration Types
 */

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ServerConfig {
  nodeEnv: NodeEnv;
  port: number;
}

export interface DatabaseConfig {
  /** SQLite database file, or ':memory:' */
  path: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

/**
 * Provider liveness checking. All durations are milliseconds.
 */
export interface HealthCheckConfig {
  /** Steady-state poll period while a provider is ready */
  intervalMs: number;
  /** Per-probe timeout */
  timeoutMs: number;
  /** Failures in a row before a provider is marked not_ready */
  maxConsecutiveFailures: number;
  /** First backoff delay once a provider is not_ready */
  baseBackoffIntervalMs: number;
  /** Upper bound for the backoff delay */
  maxBackoffIntervalMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  logging: LoggingConfig;
  healthCheck: HealthCheckConfig;
}
