import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_STATUS_PATH } from './probe';
import { isSensorKey, MONITORED_CONDITIONS, SensorKey } from './sensors';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface AppConfig {
  printerHost: string;
  printerPath: string;
  deviceName?: string;
  monitoredConditions: SensorKey[];
  scanIntervalMs: number;
  requestTimeoutMs: number;
  appHost: string;
  appPort: number;
  apiKey?: string;
  rateLimitPerMinute: number;
  logLevel: LogLevel;
  dbPath: string;
  configPath?: string;
  requireApiKey: boolean;
}

interface RawConfig {
  [key: string]: unknown;
}

const LOG_LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

// Timer delays above 2^31 - 1 ms overflow and fire after 1 ms.
const MAX_TIMER_MS = 0x7fffffff;
const MAX_SCAN_INTERVAL_MINUTES = Math.floor(MAX_TIMER_MS / 60_000);

function readOptionalConfig(configPath?: string): RawConfig {
  if (!configPath) {
    return {};
  }

  if (!fs.existsSync(configPath)) {
    return {};
  }

  const raw = fs.readFileSync(configPath, 'utf8');
  try {
    return JSON.parse(raw) as RawConfig;
  } catch (error) {
    throw new Error(`Failed to parse config file at ${configPath}`, { cause: error });
  }
}

function toValue(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const stringValue = Array.isArray(value) ? value.join(',') : String(value);
  return stringValue.length === 0 ? undefined : stringValue;
}

function parseNumber(value: string | undefined, name: string, fallback?: number): number {
  if (value === undefined || value === '') {
    if (fallback !== undefined) {
      return fallback;
    }
    throw new Error(`${name} is required`);
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number`);
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, name: string, fallback?: number): number {
  const parsed = parseNumber(value, name, fallback);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return parsed;
}

function parseBoundedInt(value: string | undefined, name: string, max: number, fallback?: number): number {
  const parsed = parsePositiveInt(value, name, fallback);
  if (parsed > max) {
    throw new Error(`${name} must be at most ${max}`);
  }
  return parsed;
}

function parseConditions(value: string | undefined): SensorKey[] {
  if (!value) {
    return [...MONITORED_CONDITIONS];
  }
  const keys: SensorKey[] = [];
  for (const entry of value.split(',')) {
    const key = entry.trim();
    if (key.length === 0) {
      continue;
    }
    if (!isSensorKey(key)) {
      throw new Error(`MONITORED_CONDITIONS contains unknown sensor "${key}"`);
    }
    if (!keys.includes(key)) {
      keys.push(key);
    }
  }
  if (keys.length === 0) {
    throw new Error('MONITORED_CONDITIONS must name at least one sensor');
  }
  return keys;
}

function parsePrinterPath(value: string | undefined): string {
  const raw = value?.trim() || DEFAULT_STATUS_PATH;
  return raw.startsWith('/') ? raw : `/${raw}`;
}

function isLocalhost(host: string): boolean {
  return host === '127.0.0.1' || host === '::1' || host === 'localhost';
}

function resolvePath(value: string | undefined, fallback: string): string {
  const raw = value && value.trim().length > 0 ? value : fallback;
  if (raw === ':memory:') {
    return raw;
  }
  return path.isAbsolute(raw) ? raw : path.join(process.cwd(), raw);
}

export function loadConfig(): { config: AppConfig; redacted: Record<string, unknown> } {
  const rawConfigPath = toValue(process.env.CONFIG_PATH);
  const configPath = rawConfigPath ? resolvePath(rawConfigPath, rawConfigPath) : undefined;
  const fileConfig = readOptionalConfig(configPath);

  const get = (key: string): string | undefined => {
    const envValue = toValue(process.env[key]);
    if (envValue !== undefined) {
      return envValue;
    }
    return toValue(fileConfig[key]);
  };

  const printerHost = get('PRINTER_HOST')?.trim();
  if (!printerHost) {
    throw new Error('PRINTER_HOST is required');
  }
  const printerPath = parsePrinterPath(get('PRINTER_PATH'));
  const deviceName = get('DEVICE_NAME');
  const monitoredConditions = parseConditions(get('MONITORED_CONDITIONS'));
  const scanIntervalMinutes = parseBoundedInt(
    get('SCAN_INTERVAL_MINUTES'),
    'SCAN_INTERVAL_MINUTES',
    MAX_SCAN_INTERVAL_MINUTES,
    60
  );
  const requestTimeoutMs = parseBoundedInt(get('REQUEST_TIMEOUT_MS'), 'REQUEST_TIMEOUT_MS', MAX_TIMER_MS, 10000);

  const appHost = get('APP_HOST') ?? '127.0.0.1';
  const appPort = parsePositiveInt(get('APP_PORT'), 'APP_PORT', 3000);
  const apiKey = get('API_KEY');
  const rateLimitPerMinute = parsePositiveInt(get('RATE_LIMIT_PER_MINUTE'), 'RATE_LIMIT_PER_MINUTE', 60);

  const logLevelRaw = get('LOG_LEVEL') ?? 'info';
  const logLevel = LOG_LEVELS.find((level) => level === logLevelRaw);
  if (!logLevel) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }

  const dbPath = resolvePath(get('DB_PATH'), path.join('data', 'epson-monitor.sqlite'));

  const requireApiKey = !isLocalhost(appHost);
  if (requireApiKey && (!apiKey || apiKey.length === 0)) {
    throw new Error('API_KEY is required when APP_HOST is not localhost');
  }

  const config: AppConfig = {
    printerHost,
    printerPath,
    deviceName,
    monitoredConditions,
    scanIntervalMs: scanIntervalMinutes * 60_000,
    requestTimeoutMs,
    appHost,
    appPort,
    apiKey,
    rateLimitPerMinute,
    logLevel,
    dbPath,
    configPath,
    requireApiKey
  };

  const redacted = {
    PRINTER_HOST: config.printerHost,
    PRINTER_PATH: config.printerPath,
    DEVICE_NAME: config.deviceName,
    MONITORED_CONDITIONS: config.monitoredConditions.join(','),
    SCAN_INTERVAL_MINUTES: scanIntervalMinutes,
    REQUEST_TIMEOUT_MS: config.requestTimeoutMs,
    APP_HOST: config.appHost,
    APP_PORT: config.appPort,
    API_KEY: config.apiKey ? 'redacted' : undefined,
    RATE_LIMIT_PER_MINUTE: config.rateLimitPerMinute,
    LOG_LEVEL: config.logLevel,
    DB_PATH: config.dbPath,
    CONFIG_PATH: config.configPath
  };

  return { config, redacted };
}
