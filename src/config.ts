import path from 'path';
import { ConfigError } from './errors.js';
import { normalizeBasePath } from './imageNaming.js';
import { isLogLevel } from './logger.js';
import type { LevelWithSilent } from 'pino';

export interface FtpConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  secure: boolean;
  basePath: string;
  timeoutMs: number;
}

export interface CatalogConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  tablePrefix: string;
  /** `id_lang` used for product names (the shop's default locale). */
  languageId: number;
  /** `id_product_attribute` used for stock (0 is the base variant). */
  stockAttributeId: number;
  connectTimeoutMs: number;
}

export interface RetryConfig {
  attempts: number;
  backoffFactor: number;
  statuses: number[];
}

export interface WooCommerceConfig {
  apiUrl: string;
  consumerKey: string;
  consumerSecret: string;
  timeoutMs: number;
  uploadTimeoutMs: number;
  productPageSize: number;
  mediaPageSize: number;
  retry: RetryConfig;
}

export interface MigratorConfig {
  ftp: FtpConfig;
  catalog: CatalogConfig;
  wooCommerce: WooCommerceConfig;
  dataDir: string;
  logsDir: string;
  stagingDir: string;
  logLevel: LevelWithSilent;
}

type Env = Record<string, string | undefined>;

const TABLE_PREFIX_REGEX = /^[A-Za-z0-9_]*$/;

class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  optional(key: string, fallback: string): string {
    const value = this.env[key]?.trim();
    return value ? value : fallback;
  }

  required(key: string): string {
    const value = this.env[key]?.trim();
    if (!value) {
      this.problems.push(`${key} is required`);
      return '';
    }
    return value;
  }

  int(key: string, fallback: number, min = 0): number {
    const raw = this.env[key]?.trim();
    if (!raw) {
      return fallback;
    }
    const value = Number.parseInt(raw, 10);
    if (Number.isNaN(value) || String(value) !== raw || value < min) {
      this.problems.push(`${key} must be an integer >= ${min}, got "${raw}"`);
      return fallback;
    }
    return value;
  }

  float(key: string, fallback: number): number {
    const raw = this.env[key]?.trim();
    if (!raw) {
      return fallback;
    }
    const value = Number.parseFloat(raw);
    if (!Number.isFinite(value) || value < 0) {
      this.problems.push(`${key} must be a non-negative number, got "${raw}"`);
      return fallback;
    }
    return value;
  }

  bool(key: string, fallback: boolean): boolean {
    const raw = (this.env[key] || '').trim().toLowerCase();
    if (!raw) {
      return fallback;
    }
    return raw !== '0' && raw !== 'false' && raw !== 'no';
  }

  intList(key: string, fallback: number[]): number[] {
    const raw = this.env[key]?.trim();
    if (!raw) {
      return fallback;
    }
    const values = raw.split(',').map(part => part.trim()).filter(Boolean);
    const parsed = values.map(part => Number.parseInt(part, 10));
    if (parsed.some((value, idx) => Number.isNaN(value) || String(value) !== values[idx])) {
      this.problems.push(`${key} must be a comma-separated list of integers, got "${raw}"`);
      return fallback;
    }
    return parsed;
  }
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): MigratorConfig {
  const reader = new EnvReader(env);

  const ftp: FtpConfig = {
    host: reader.required('FTP_HOST'),
    port: reader.int('FTP_PORT', 21, 1),
    user: reader.required('FTP_USER'),
    password: reader.required('FTP_PASSWORD'),
    secure: reader.bool('FTP_SECURE', false),
    basePath: normalizeBasePath(reader.optional('FTP_BASE_PATH', '/img/p/')),
    timeoutMs: reader.int('FTP_TIMEOUT_MS', 30000, 1)
  };

  const tablePrefix = reader.optional('DB_PREFIX', 'ps_');
  if (!TABLE_PREFIX_REGEX.test(tablePrefix)) {
    reader.problems.push(`DB_PREFIX may only contain letters, digits and underscores, got "${tablePrefix}"`);
  }

  const catalog: CatalogConfig = {
    host: reader.optional('DB_HOST', 'localhost'),
    port: reader.int('DB_PORT', 3306, 1),
    database: reader.optional('DB_NAME', 'prestashop'),
    user: reader.optional('DB_USER', 'root'),
    password: env.DB_PASS ?? '',
    tablePrefix,
    languageId: reader.int('DB_LANG_ID', 1, 1),
    stockAttributeId: reader.int('DB_STOCK_ATTRIBUTE_ID', 0),
    connectTimeoutMs: reader.int('DB_CONNECT_TIMEOUT_MS', 10000, 1)
  };

  const apiUrl = reader.required('WC_API_URL').replace(/\/+$/, '');
  if (apiUrl && !/^https?:\/\//i.test(apiUrl)) {
    reader.problems.push(`WC_API_URL must be an http(s) URL, got "${apiUrl}"`);
  }
  const timeoutMs = reader.int('WC_TIMEOUT_MS', 30000, 1);

  const wooCommerce: WooCommerceConfig = {
    apiUrl,
    consumerKey: reader.required('WC_CONSUMER_KEY'),
    consumerSecret: reader.required('WC_CONSUMER_SECRET'),
    timeoutMs,
    uploadTimeoutMs: timeoutMs * 2,
    productPageSize: reader.int('WC_PRODUCT_PAGE_SIZE', 20, 1),
    mediaPageSize: reader.int('WC_MEDIA_PAGE_SIZE', 5, 1),
    retry: {
      attempts: reader.int('WC_RETRY_ATTEMPTS', 3, 1),
      backoffFactor: reader.float('WC_RETRY_BACKOFF_FACTOR', 0.5),
      statuses: reader.intList('WC_RETRY_STATUSES', [500, 502, 503, 504])
    }
  };

  const rawLogLevel = reader.optional('LOG_LEVEL', 'info').toLowerCase();
  let logLevel: LevelWithSilent = 'info';
  if (isLogLevel(rawLogLevel)) {
    logLevel = rawLogLevel;
  } else {
    reader.problems.push(`LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent, got "${rawLogLevel}"`);
  }

  if (reader.problems.length > 0) {
    throw new ConfigError(reader.problems);
  }

  const dataDir = path.resolve(cwd, reader.optional('MIGRATOR_DATA_DIR', 'data'));

  return {
    ftp,
    catalog,
    wooCommerce,
    dataDir,
    logsDir: path.join(dataDir, 'logs'),
    stagingDir: path.join(dataDir, 'staging'),
    logLevel
  };
}
