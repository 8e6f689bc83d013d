import { Client, type AccessOptions } from 'basic-ftp';
import type { Logger } from 'pino';
import type { FtpConfig } from './config.js';
import { RemoteConnectionError, StorageOperationError, describeError } from './errors.js';
import { classifyProductImages, getProductImageDir, isProductDirectoryName } from './imageNaming.js';
import type { RemoteImageSet } from './types.js';

export interface FtpEntry {
  name: string;
  isDirectory: boolean;
}

/** The part of basic-ftp's `Client` the store relies on. */
export interface FtpSession {
  readonly closed: boolean;
  access(options: AccessOptions): Promise<unknown>;
  cd(path: string): Promise<unknown>;
  list(path?: string): Promise<FtpEntry[]>;
  downloadTo(destination: string, fromRemotePath: string): Promise<unknown>;
  close(): void;
}

export type FtpSessionFactory = (timeoutMs: number) => FtpSession;

const defaultSessionFactory: FtpSessionFactory = timeoutMs => new Client(timeoutMs);

export class RemoteFileStore {
  private session: FtpSession | null = null;

  constructor(
    private readonly config: FtpConfig,
    private readonly logger: Logger,
    private readonly createSession: FtpSessionFactory = defaultSessionFactory
  ) {}

  isConnected(): boolean {
    return this.session !== null && !this.session.closed;
  }

  async connect(): Promise<void> {
    if (this.isConnected()) {
      return;
    }

    const session = this.createSession(this.config.timeoutMs);
    try {
      await session.access({
        host: this.config.host,
        port: this.config.port,
        user: this.config.user,
        password: this.config.password,
        secure: this.config.secure
      });
    } catch (error) {
      session.close();
      throw new RemoteConnectionError(this.config.host, error);
    }

    this.session = session;
    this.logger.info({ host: this.config.host }, 'FTP session established');
  }

  async disconnect(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) {
      return;
    }
    try {
      session.close();
      this.logger.info({ host: this.config.host }, 'FTP session closed');
    } catch (error) {
      this.logger.error({ host: this.config.host, err: describeError(error) }, 'Failed to close FTP session');
    }
  }

  /** Connects, runs `work`, and always releases the session afterwards. */
  async withSession<T>(work: () => Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await work();
    } finally {
      await this.disconnect();
    }
  }

  async listProductDirectories(): Promise<string[]> {
    const session = this.requireSession();
    let entries: FtpEntry[];
    try {
      entries = await session.list(this.config.basePath);
    } catch (error) {
      throw new StorageOperationError('list', this.config.basePath, error);
    }
    return entries.map(entry => entry.name).filter(isProductDirectoryName);
  }

  /**
   * Lists the product's image directory and makes it the working directory,
   * so `downloadImage` takes bare file names from the returned set.
   */
  async listProductImages(productId: string | number): Promise<RemoteImageSet> {
    const session = this.requireSession();
    let dir = `${this.config.basePath}${String(productId)}`;
    try {
      dir = getProductImageDir(this.config.basePath, productId);
      await session.cd(dir);
      const entries = await session.list();
      const images = classifyProductImages(productId, entries.filter(entry => !entry.isDirectory).map(entry => entry.name));
      this.logger.debug(
        { productId: String(productId), dir, main: images.mainImage, additional: images.additionalImages.length },
        'Listed product images'
      );
      return images;
    } catch (error) {
      throw new StorageOperationError('list', dir, error);
    }
  }

  async downloadImage(remoteName: string, localPath: string): Promise<void> {
    const session = this.requireSession();
    try {
      await session.downloadTo(localPath, remoteName);
    } catch (error) {
      throw new StorageOperationError('download', remoteName, error);
    }
    this.logger.info({ remote: remoteName, local: localPath }, 'Image downloaded');
  }

  private requireSession(): FtpSession {
    if (!this.session || this.session.closed) {
      throw new Error('FTP session is not connected');
    }
    return this.session;
  }
}
