export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
}

export interface RuntimeConfig {
  serviceName: string;
  logLevel: string;
  enableRequestLogging: boolean;
  cacheTtlSeconds: number;
}

export interface MonitoringConfig {
  traceHeader: string;
  requestIdHeader: string;
  traceProjectId?: string;
}

export interface ServiceConfig {
  redis: RedisConfig;
  runtime: RuntimeConfig;
  monitoring: MonitoringConfig;
}

let cachedConfig: ServiceConfig | null = null;

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }

  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function clamp(value: number, options: { min?: number; max?: number }): number {
  const { min, max } = options;
  let result = value;
  if (typeof min === 'number') {
    result = Math.max(min, result);
  }
  if (typeof max === 'number') {
    result = Math.min(max, result);
  }
  return result;
}

function validateConfig(config: ServiceConfig): void {
  if (!config.monitoring.requestIdHeader) {
    throw new Error('REQUEST_ID_HEADER must not be empty.');
  }

  if (!Number.isInteger(config.redis.port) || config.redis.port <= 0) {
    throw new Error(`REDIS_PORT must be a positive integer, received ${config.redis.port}.`);
  }
}

export function loadConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const config: ServiceConfig = {
    redis: {
      host: process.env.REDIS_HOST ?? 'localhost',
      port: parseNumber(process.env.REDIS_PORT, 6379),
      password: process.env.REDIS_PASSWORD || undefined
    },
    runtime: {
      serviceName: process.env.SERVICE_NAME ?? 'ar-service',
      logLevel: process.env.LOG_LEVEL ?? 'info',
      enableRequestLogging: parseBoolean(process.env.ENABLE_REQUEST_LOGGING, true),
      cacheTtlSeconds: parseNumber(process.env.COMMON_CACHE_TTL, 300)
    },
    monitoring: {
      traceHeader: process.env.TRACE_HEADER ?? 'X-Cloud-Trace-Context',
      requestIdHeader: process.env.REQUEST_ID_HEADER ?? 'X-Request-ID',
      traceProjectId: process.env.TRACE_PROJECT_ID?.trim() || undefined
    }
  };

  validateConfig(config);
  cachedConfig = config;

  return cachedConfig;
}

export function getConfig(): ServiceConfig {
  return cachedConfig ?? loadConfig();
}

export function resetConfigForTesting(): void {
  cachedConfig = null;
}
