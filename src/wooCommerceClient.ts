/**
 * WooCommerce REST client
 *
 * Finds destination products and media by name, uploads staged images and
 * attaches them to products. Every call goes through the shared retry policy.
 */

import fs from 'fs/promises';
import path from 'path';
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import FormData from 'form-data';
import type { Logger } from 'pino';
import type { WooCommerceConfig } from './config.js';
import { ImageUploadError, MigrationError, MissingFileError, RemoteAPIError, describeError } from './errors.js';
import { describeBody, isTimeoutError, requestWithRetry, type Sleep } from './httpRetry.js';
import type { WooImage, WooMedia, WooProduct } from './types.js';

export type UploadState =
  | 'PENDING'
  | 'UPLOADING'
  | 'UPLOADED'
  | 'FETCHING_PRODUCT'
  | 'MERGING_IMAGES'
  | 'UPDATING_PRODUCT'
  | 'DONE'
  | 'FAILED';

export interface WooCommerceClientOptions {
  logger: Logger;
  /** Replaces axios' HTTP adapter; tests use it to answer in-process. */
  adapter?: AxiosAdapter;
  sleep?: Sleep;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toWooImage(value: unknown): WooImage | null {
  if (!isRecord(value) || typeof value.id !== 'number') {
    return null;
  }
  return { id: value.id };
}

function toWooProduct(value: unknown): WooProduct | null {
  if (!isRecord(value) || typeof value.id !== 'number' || typeof value.name !== 'string') {
    return null;
  }
  const images = Array.isArray(value.images)
    ? value.images.map(toWooImage).filter((image): image is WooImage => image !== null)
    : [];
  const stock = typeof value.stock_quantity === 'number' ? value.stock_quantity : null;
  return { id: value.id, name: value.name, stock_quantity: stock, images };
}

function toWooMedia(value: unknown): WooMedia | null {
  if (!isRecord(value) || typeof value.id !== 'number') {
    return null;
  }
  const title = isRecord(value.title) && typeof value.title.rendered === 'string' ? { rendered: value.title.rendered } : undefined;
  return { id: value.id, title };
}

function toList<T>(data: unknown, convert: (value: unknown) => T | null): T[] {
  if (!Array.isArray(data)) {
    return [];
  }
  return data.map(convert).filter((item): item is T => item !== null);
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class WooCommerceClient {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly sleep?: Sleep;

  constructor(private readonly config: WooCommerceConfig, options: WooCommerceClientOptions) {
    this.logger = options.logger;
    this.sleep = options.sleep;
    this.http = axios.create({
      baseURL: config.apiUrl,
      timeout: config.timeoutMs,
      auth: { username: config.consumerKey, password: config.consumerSecret },
      headers: { Accept: 'application/json' },
      // Statuses are checked per call so retries and error mapping see every answer.
      validateStatus: () => true,
      adapter: options.adapter
    });
  }

  async findProductByName(name: string): Promise<WooProduct | null> {
    if (!name) {
      this.logger.warn('Empty product name, skipping product search');
      return null;
    }

    const response = await this.send('products', () =>
      this.http.get<unknown>('products', { params: { search: name, per_page: this.config.productPageSize } })
    );
    if (response.status !== 200) {
      throw new RemoteAPIError('products', response.status, describeBody(response.data));
    }

    const wanted = name.toLowerCase();
    const match = toList(response.data, toWooProduct).find(product => product.name.toLowerCase() === wanted);
    if (!match) {
      this.logger.warn({ product: name }, 'Product not found in WooCommerce');
      return null;
    }
    return match;
  }

  async mediaExists(imageName: string): Promise<boolean> {
    if (!imageName) {
      this.logger.warn('Empty image name, skipping media search');
      return false;
    }

    const response = await this.send('media', () =>
      this.http.get<unknown>('media', { params: { search: imageName, per_page: this.config.mediaPageSize } })
    );
    if (response.status !== 200) {
      throw new RemoteAPIError('media', response.status, describeBody(response.data));
    }

    const wanted = imageName.toLowerCase();
    const found = toList(response.data, toWooMedia).some(item => item.title?.rendered?.toLowerCase() === wanted);
    if (found) {
      this.logger.info({ image: imageName }, 'Image already in media library');
    }
    return found;
  }

  /**
   * Uploads one staged image and attaches it to the product: a main image is
   * put in front of the product's gallery, any other image goes at the end.
   * An image whose name is already in the media library counts as done.
   */
  async uploadImage(localPath: string, productId: number, isMain: boolean): Promise<boolean> {
    try {
      await fs.access(localPath);
    } catch {
      this.logger.error({ path: localPath }, 'Image file not found');
      throw new MissingFileError(localPath);
    }

    const imageName = path.basename(localPath);
    let state: UploadState = 'PENDING';
    const moveTo = (next: UploadState): void => {
      state = next;
      this.logger.debug({ image: imageName, productId, state }, 'Upload state');
    };

    try {
      if (await this.mediaExists(imageName)) {
        moveTo('DONE');
        return true;
      }

      moveTo('UPLOADING');
      const payload = await fs.readFile(localPath);
      this.logger.info({ image: imageName, productId }, 'Uploading image');
      const uploadResponse = await this.send('media', () => {
        const form = new FormData();
        form.append('file', payload, { filename: imageName, contentType: 'image/jpeg' });
        form.append('title', imageName);
        form.append('alt_text', imageName.split('.')[0]);
        form.append('post', String(productId));
        return this.http.post<unknown>('media', form, {
          headers: form.getHeaders(),
          timeout: this.config.uploadTimeoutMs
        });
      });
      if (uploadResponse.status !== 201) {
        throw new RemoteAPIError('media', uploadResponse.status, describeBody(uploadResponse.data));
      }
      const media = toWooMedia(uploadResponse.data);
      if (!media) {
        throw new RemoteAPIError('media', uploadResponse.status, 'upload response has no media id');
      }
      moveTo('UPLOADED');
      this.logger.info({ image: imageName, mediaId: media.id }, 'Image uploaded');

      moveTo('FETCHING_PRODUCT');
      const product = await this.getProduct(productId);

      moveTo('MERGING_IMAGES');
      const current = (product.images ?? []).map(image => ({ id: image.id }));
      const images = isMain ? [{ id: media.id }, ...current] : [...current, { id: media.id }];

      moveTo('UPDATING_PRODUCT');
      const endpoint = `products/${productId}`;
      const updateResponse = await this.send(endpoint, () => this.http.put<unknown>(endpoint, { images }));
      if (updateResponse.status !== 200 && updateResponse.status !== 201) {
        throw new RemoteAPIError(endpoint, updateResponse.status, describeBody(updateResponse.data));
      }

      moveTo('DONE');
      this.logger.info({ image: imageName, productId, main: isMain }, 'Image attached to product');
      return true;
    } catch (error) {
      const failedAt = state;
      moveTo('FAILED');
      this.logger.error({ image: imageName, productId, failedAt, err: describeError(error) }, 'Image upload failed');
      if (error instanceof RemoteAPIError && error.status === 0) {
        throw new ImageUploadError(localPath, error.body);
      }
      if (error instanceof MigrationError) {
        throw error;
      }
      throw new ImageUploadError(localPath, isTimeoutError(error) ? 'request timed out' : error);
    }
  }

  async getProductStock(productId: number): Promise<number> {
    const product = await this.getProduct(productId);
    return product.stock_quantity ?? 0;
  }

  private async getProduct(productId: number): Promise<WooProduct> {
    const endpoint = `products/${productId}`;
    const response = await this.send(endpoint, () => this.http.get<unknown>(endpoint));
    if (response.status !== 200) {
      throw new RemoteAPIError(endpoint, response.status, describeBody(response.data));
    }
    const product = toWooProduct(response.data);
    if (!product) {
      throw new RemoteAPIError(endpoint, response.status, 'response is not a product');
    }
    return product;
  }

  /** Retries, then turns transport failures on read calls into `RemoteAPIError` with status 0. */
  private async send<T>(endpoint: string, request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await requestWithRetry(request, {
        endpoint,
        policy: this.config.retry,
        logger: this.logger,
        sleep: this.sleep
      });
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }
      const reason = isTimeoutError(error) ? 'request timed out' : error.message;
      this.logger.error({ endpoint, err: reason }, 'WooCommerce request failed');
      throw new RemoteAPIError(endpoint, 0, reason);
    }
  }
}
