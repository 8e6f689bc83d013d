export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export class MigrationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends MigrationError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.problems = problems;
  }
}

export class RemoteConnectionError extends MigrationError {
  readonly host: string;

  constructor(host: string, cause: unknown) {
    super(`FTP connection to ${host} failed: ${describeError(cause)}`, { cause });
    this.host = host;
  }
}

export type StorageOperation = 'list' | 'download';

export class StorageOperationError extends MigrationError {
  readonly op: StorageOperation;
  readonly path: string;

  constructor(op: StorageOperation, path: string, cause: unknown) {
    super(`FTP ${op} failed on ${path}: ${describeError(cause)}`, { cause });
    this.op = op;
    this.path = path;
  }
}

export class CatalogConnectionError extends MigrationError {
  constructor(cause: unknown) {
    super(`Catalog database connection failed: ${describeError(cause)}`, { cause });
  }
}

export class CatalogError extends MigrationError {
  constructor(cause: unknown) {
    super(`Catalog query failed: ${describeError(cause)}`, { cause });
  }
}

/** A WooCommerce endpoint answered with a status we cannot use. Status 0 means no answer at all. */
export class RemoteAPIError extends MigrationError {
  readonly endpoint: string;
  readonly status: number;
  readonly body: string;

  constructor(endpoint: string, status: number, body: string) {
    super(`WooCommerce API error (${endpoint}): ${status} - ${body}`);
    this.endpoint = endpoint;
    this.status = status;
    this.body = body;
  }
}

export class ImageUploadError extends MigrationError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Upload of ${path} failed: ${describeError(cause)}`, { cause });
    this.path = path;
  }
}

export class MissingFileError extends MigrationError {
  readonly path: string;

  constructor(path: string) {
    super(`Image file does not exist: ${path}`);
    this.path = path;
  }
}
