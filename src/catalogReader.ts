import mysql, { type RowDataPacket } from 'mysql2/promise';
import type { Logger } from 'pino';
import type { CatalogConfig } from './config.js';
import { CatalogConnectionError, CatalogError, describeError } from './errors.js';
import { sanitizeProductName } from './imageNaming.js';

export type CatalogRow = Record<string, unknown>;

export interface CatalogConnection {
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  ping(): Promise<void>;
  query(sql: string, params: (string | number)[]): Promise<CatalogRow[]>;
  release(): void;
}

export interface CatalogPool {
  getConnection(): Promise<CatalogConnection>;
  end(): Promise<void>;
}

export type CatalogPoolFactory = (config: CatalogConfig) => CatalogPool;

export const createMysqlPool: CatalogPoolFactory = config => {
  const pool = mysql.createPool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    connectTimeout: config.connectTimeoutMs,
    connectionLimit: 1,
    charset: 'utf8mb4'
  });

  return {
    async getConnection(): Promise<CatalogConnection> {
      const connection = await pool.getConnection();
      return {
        beginTransaction: () => connection.beginTransaction(),
        commit: () => connection.commit(),
        rollback: () => connection.rollback(),
        ping: () => connection.ping(),
        async query(sql: string, params: (string | number)[]): Promise<CatalogRow[]> {
          const [rows] = await connection.execute<RowDataPacket[]>(sql, params);
          return rows;
        },
        release: () => connection.release()
      };
    },
    end: () => pool.end()
  };
};

function toInteger(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' || typeof value === 'bigint') {
    const parsed = Number.parseInt(String(value), 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Read-only access to the PrestaShop catalog. The pool is created on first
 * use and lives until `close()`; every query runs inside its own explicit
 * transaction on a pooled connection that is always released.
 */
export class CatalogReader {
  private pool: CatalogPool | null = null;

  constructor(
    private readonly config: CatalogConfig,
    private readonly logger: Logger,
    private readonly createPool: CatalogPoolFactory = createMysqlPool
  ) {}

  async connect(): Promise<void> {
    if (this.pool) {
      return;
    }

    const pool = this.createPool(this.config);
    let connection: CatalogConnection | null = null;
    try {
      connection = await pool.getConnection();
      await connection.ping();
    } catch (error) {
      await pool.end().catch((endError: unknown) => {
        this.logger.debug({ err: describeError(endError) }, 'Ignoring pool shutdown failure after connect error');
      });
      this.logger.error({ host: this.config.host, err: describeError(error) }, 'Catalog connection failed');
      throw new CatalogConnectionError(error);
    } finally {
      connection?.release();
    }

    this.pool = pool;
    this.logger.info({ host: this.config.host, database: this.config.database }, 'Catalog connection established');
  }

  async getProductName(productId: string | number): Promise<string | null> {
    const rows = await this.query(
      `SELECT pl.name
       FROM ${this.config.tablePrefix}product_lang pl
       WHERE pl.id_product = ?
       AND pl.id_lang = ?
       LIMIT 1`,
      [String(productId), this.config.languageId]
    );

    const name = rows[0]?.name;
    if (typeof name !== 'string') {
      this.logger.warn({ productId: String(productId) }, 'Product not found in catalog');
      return null;
    }
    return sanitizeProductName(name);
  }

  async getProductStock(productId: string | number): Promise<number> {
    const rows = await this.query(
      `SELECT sa.quantity
       FROM ${this.config.tablePrefix}stock_available sa
       WHERE sa.id_product = ?
       AND sa.id_product_attribute = ?
       LIMIT 1`,
      [String(productId), this.config.stockAttributeId]
    );

    const quantity = toInteger(rows[0]?.quantity);
    if (quantity === null) {
      this.logger.warn({ productId: String(productId) }, 'No stock row found, using 0');
      return 0;
    }
    return Math.max(0, quantity);
  }

  async close(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    if (!pool) {
      return;
    }
    try {
      await pool.end();
      this.logger.info('Catalog connection closed');
    } catch (error) {
      this.logger.error({ err: describeError(error) }, 'Failed to close catalog connection');
    }
  }

  private async query(sql: string, params: (string | number)[]): Promise<CatalogRow[]> {
    await this.connect();
    const pool = this.pool;
    if (!pool) {
      throw new CatalogConnectionError('pool unavailable');
    }

    let connection: CatalogConnection;
    try {
      connection = await pool.getConnection();
    } catch (error) {
      throw new CatalogError(error);
    }

    try {
      await connection.beginTransaction();
      const rows = await connection.query(sql, params);
      await connection.commit();
      return rows;
    } catch (error) {
      await connection.rollback().catch((rollbackError: unknown) => {
        this.logger.debug({ err: describeError(rollbackError) }, 'Rollback after failed query also failed');
      });
      this.logger.error({ err: describeError(error) }, 'Catalog query failed');
      throw new CatalogError(error);
    } finally {
      connection.release();
    }
  }
}
