/**
 * Environment variable handling with validation
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type NodeEnv = 'development' | 'production' | 'test';

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() ? value.trim() : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some((env) => env === value);
}

export function loadEnvConfig(): EnvConfig {
  const nodeEnvRaw = getEnvVar('NODE_ENV') ?? 'development';
  const nodeEnv = isNodeEnv(nodeEnvRaw) ? nodeEnvRaw : 'development';

  // Tests stay quiet unless a level is asked for explicitly.
  const logLevelRaw = getEnvVar('LOG_LEVEL') ?? (nodeEnv === 'test' ? 'silent' : 'info');
  const logLevel = isLogLevel(logLevelRaw) ? logLevelRaw : 'info';

  return {
    logLevel,
    nodeEnv,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
