import fs from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { CatalogConnectionError, describeError } from './errors.js';
import { getStagedImageName, orderedImageNames } from './imageNaming.js';
import { buildReport } from './report.js';
import type { MigrationReport, ProductRecord, RemoteImageSet } from './types.js';

/** What the extractor needs from the FTP image tree. */
export interface ImageSource {
  withSession<T>(work: () => Promise<T>): Promise<T>;
  listProductDirectories(): Promise<string[]>;
  listProductImages(productId: string): Promise<RemoteImageSet>;
  downloadImage(remoteName: string, localPath: string): Promise<void>;
}

/** What the extractor needs from the PrestaShop catalog. */
export interface ProductCatalog {
  getProductName(productId: string): Promise<string | null>;
  getProductStock(productId: string): Promise<number>;
}

export interface ExtractorOptions {
  stagingDir: string;
  logger: Logger;
  limit?: number;
  onProgress?: (done: number, total: number, productId: string) => void;
}

export interface NameCollision {
  name: string;
  previousId: string;
  id: string;
}

export class CatalogExtractor {
  private readonly products = new Map<string, ProductRecord>();
  private readonly collisions: NameCollision[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly source: ImageSource,
    private readonly catalog: ProductCatalog,
    private readonly options: ExtractorOptions
  ) {
    this.logger = options.logger;
  }

  getProducts(): Record<string, ProductRecord> {
    return Object.fromEntries(this.products);
  }

  getCollisions(): NameCollision[] {
    return [...this.collisions];
  }

  buildReport(now: Date = new Date()): MigrationReport {
    return buildReport(this.getProducts(), now);
  }

  /**
   * Walks every product directory in one FTP session. A product that fails is
   * logged and skipped; only connection failures end the walk early.
   * Returns true when at least one product was staged.
   */
  async extract(): Promise<boolean> {
    return this.source.withSession(async () => {
      const directories = await this.source.listProductDirectories();
      const limit = this.options.limit;
      const productIds = limit !== undefined && limit >= 0 ? directories.slice(0, limit) : directories;
      this.logger.info({ candidates: productIds.length }, 'Starting extraction');

      let processed = 0;
      for (let i = 0; i < productIds.length; i += 1) {
        const productId = productIds[i];
        try {
          if (await this.extractProduct(productId)) {
            processed += 1;
          }
        } catch (error) {
          if (error instanceof CatalogConnectionError) {
            throw error;
          }
          this.logger.error({ productId, err: describeError(error) }, 'Product extraction failed');
        }
        this.options.onProgress?.(i + 1, productIds.length, productId);
      }

      this.logger.info({ processed, candidates: productIds.length }, 'Extraction finished');
      return processed > 0;
    });
  }

  private async extractProduct(productId: string): Promise<boolean> {
    const name = await this.catalog.getProductName(productId);
    if (!name) {
      this.logger.warn({ productId }, 'No product name in catalog, skipping');
      return false;
    }

    const folder = path.join(this.options.stagingDir, name);
    const relative = path.relative(this.options.stagingDir, folder);
    if (!relative || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      this.logger.warn({ productId, product: name }, 'Product name does not map to a staging folder, skipping');
      return false;
    }
    await fs.mkdir(folder, { recursive: true });

    const remoteImages = orderedImageNames(await this.source.listProductImages(productId));
    if (remoteImages.length === 0) {
      this.logger.warn({ productId, product: name }, 'No images found, skipping');
      return false;
    }

    const stock = await this.catalog.getProductStock(productId);

    let downloaded = 0;
    for (let i = 0; i < remoteImages.length; i += 1) {
      const localPath = path.join(folder, getStagedImageName(name, i + 1));
      try {
        await this.source.downloadImage(remoteImages[i], localPath);
        downloaded += 1;
      } catch (error) {
        // A failed transfer can leave a truncated file that the upload phase would pick up.
        await fs.rm(localPath, { force: true });
        this.logger.warn({ productId, image: remoteImages[i], err: describeError(error) }, 'Image download failed');
      }
    }

    if (downloaded === 0) {
      this.logger.warn({ productId, product: name }, 'No image could be downloaded, skipping');
      return false;
    }

    const previous = this.products.get(name);
    if (previous) {
      // Two source products share a display name; the later one replaces the earlier record.
      this.collisions.push({ name, previousId: previous.id, id: productId });
      this.logger.warn({ product: name, previousId: previous.id, productId }, 'Display name collision, overwriting record');
    }

    this.products.set(name, { id: productId, images: downloaded, stock, folder });
    this.logger.info({ productId, product: name, images: downloaded, stock }, 'Product extracted');
    return true;
  }
}
