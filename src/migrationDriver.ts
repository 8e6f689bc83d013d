import fs from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { describeError } from './errors.js';
import { parseStagedImageIndex } from './imageNaming.js';
import type { MigrationCounts, ProductRecord, StagedImage, WooProduct } from './types.js';

/** What the driver needs from the destination shop. */
export interface ImageDestination {
  findProductByName(name: string): Promise<WooProduct | null>;
  uploadImage(localPath: string, productId: number, isMain: boolean): Promise<boolean>;
  getProductStock(productId: number): Promise<number>;
}

/**
 * Staged images of one product, ordered by their numeric index
 * (`Name-2.jpg` before `Name-10.jpg`). A missing folder yields no images.
 */
export async function listStagedImages(folder: string, productName: string): Promise<StagedImage[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(folder);
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const images: StagedImage[] = [];
  for (const entry of entries) {
    const index = parseStagedImageIndex(productName, entry);
    if (index !== null) {
      images.push({ path: path.join(folder, entry), index });
    }
  }
  return images.sort((a, b) => a.index - b.index);
}

export class MigrationDriver {
  constructor(
    private readonly destination: ImageDestination,
    private readonly logger: Logger
  ) {}

  /**
   * Uploads every staged product. The staging folder, not the record's image
   * count, decides what is sent. A product counts as migrated when at least
   * one of its images made it.
   */
  async migrate(products: Record<string, ProductRecord>): Promise<MigrationCounts> {
    const counts: MigrationCounts = { successful: 0, failed: 0 };
    const entries = Object.entries(products);
    this.logger.info({ products: entries.length }, 'Starting WooCommerce migration');

    for (const [name, record] of entries) {
      try {
        const uploaded = await this.migrateProduct(name, record);
        if (uploaded > 0) {
          counts.successful += 1;
        } else {
          counts.failed += 1;
        }
      } catch (error) {
        this.logger.error({ product: name, err: describeError(error) }, 'Product migration failed');
        counts.failed += 1;
      }
    }

    this.logger.info({ ...counts }, 'WooCommerce migration finished');
    return counts;
  }

  private async migrateProduct(name: string, record: ProductRecord): Promise<number> {
    const images = await listStagedImages(record.folder, name);
    if (images.length === 0) {
      this.logger.warn({ product: name, folder: record.folder }, 'No staged images found');
      return 0;
    }

    const product = await this.destination.findProductByName(name);
    if (!product) {
      this.logger.error({ product: name }, 'No matching WooCommerce product, skipping');
      return 0;
    }

    let uploaded = 0;
    for (let i = 0; i < images.length; i += 1) {
      const image = images[i];
      try {
        if (await this.destination.uploadImage(image.path, product.id, i === 0)) {
          uploaded += 1;
          this.logger.info({ product: name, image: i + 1, of: images.length }, 'Image migrated');
        }
      } catch (error) {
        this.logger.error({ product: name, image: i + 1, err: describeError(error) }, 'Image migration failed');
      }
    }

    if (uploaded === images.length) {
      this.logger.info({ product: name, uploaded, total: images.length }, 'Product migrated');
    } else if (uploaded > 0) {
      this.logger.warn({ product: name, uploaded, total: images.length }, 'Product partially migrated');
    } else {
      this.logger.error({ product: name, total: images.length }, 'No image of the product could be migrated');
    }

    if (uploaded > 0) {
      await this.compareStock(name, record, product.id);
    }
    return uploaded;
  }

  private async compareStock(name: string, record: ProductRecord, productId: number): Promise<void> {
    try {
      const destinationStock = await this.destination.getProductStock(productId);
      if (destinationStock !== record.stock) {
        this.logger.warn(
          { product: name, sourceStock: record.stock, destinationStock },
          'Stock differs between PrestaShop and WooCommerce'
        );
      }
    } catch (error) {
      this.logger.warn({ product: name, err: describeError(error) }, 'Could not read WooCommerce stock');
    }
  }
}
