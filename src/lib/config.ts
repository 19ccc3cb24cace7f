import { ConfigError } from './errors';
import type { DataSourceKind, ExportEmptyPolicy } from '@/types/forecast';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(raw: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

function parseExportPolicy(raw: string | undefined): ExportEmptyPolicy {
  return raw === 'header-only' ? 'header-only' : 'reject';
}

export const APP_CONFIG = {
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || '10000', 10),
  topSkuLimit: 10,
  criticalThreshold: 5,
  exportEmptyPolicy: parseExportPolicy(process.env.EXPORT_EMPTY_POLICY),
  metricsWindowMs: 60_000,
  defaultTable: 'forecasts',
} as const;

export interface RestSourceConfig {
  kind: 'rest';
  baseUrl: string;
  apiKey: string;
  table: string;
  timeoutMs: number;
}

export interface SqlSourceConfig {
  kind: 'sql';
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  table: string;
  timeoutMs: number;
}

export type DataSourceConfig = RestSourceConfig | SqlSourceConfig;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function required(env: Env, key: string, problems: string[]): string {
  const value = env[key]?.trim();
  if (!value) {
    problems.push(`${key} is not set`);
    return '';
  }
  return value;
}

function tableName(env: Env, key: string, problems: string[]): string {
  const table = env[key]?.trim() || APP_CONFIG.defaultTable;
  if (!IDENTIFIER.test(table)) {
    problems.push(`${key} must be a plain table identifier`);
  }
  return table;
}

function timeout(env: Env, problems: string[]): number {
  const raw = env.REQUEST_TIMEOUT_MS?.trim();
  if (!raw) return APP_CONFIG.requestTimeoutMs;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    problems.push('REQUEST_TIMEOUT_MS must be a positive integer');
  }
  return parsed;
}

function asBoolean(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  return raw === 'true' || raw === '1' || raw.toLowerCase() === 'yes';
}

/**
 * Builds the backing-store configuration from environment variables.
 * Every missing or invalid variable is collected before throwing, so one
 * failed start reports all of them.
 */
export function loadDataSourceConfig(env: Env = process.env): DataSourceConfig {
  const problems: string[] = [];
  const kindRaw = env.DATA_SOURCE?.trim() || 'rest';
  if (kindRaw !== 'rest' && kindRaw !== 'sql') {
    throw new ConfigError([`DATA_SOURCE must be "rest" or "sql", got "${kindRaw}"`]);
  }
  const kind: DataSourceKind = kindRaw;
  const timeoutMs = timeout(env, problems);

  if (kind === 'rest') {
    const baseUrl = required(env, 'DATA_API_URL', problems);
    const apiKey = required(env, 'DATA_API_KEY', problems);
    if (baseUrl && !/^https?:\/\/[^\s]+$/.test(baseUrl)) {
      problems.push('DATA_API_URL must be an http(s) URL');
    }
    const table = tableName(env, 'DATA_API_TABLE', problems);
    if (problems.length > 0) throw new ConfigError(problems);
    return { kind, baseUrl: baseUrl.replace(/\/+$/, ''), apiKey, table, timeoutMs };
  }

  const host = required(env, 'DATABASE_HOST', problems);
  const database = required(env, 'DATABASE_NAME', problems);
  const user = required(env, 'DATABASE_USER', problems);
  const password = required(env, 'DATABASE_PASSWORD', problems);
  const portRaw = env.DATABASE_PORT?.trim() || '5432';
  const port = Number(portRaw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    problems.push('DATABASE_PORT must be a port number');
  }
  const table = tableName(env, 'DATABASE_TABLE', problems);
  if (problems.length > 0) throw new ConfigError(problems);

  return {
    kind,
    host,
    port,
    database,
    user,
    password,
    ssl: asBoolean(env.DATABASE_SSL),
    table,
    timeoutMs,
  };
}
