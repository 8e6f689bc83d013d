import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import FormData from 'form-data';
import type { WooCommerceConfig } from '../src/config.js';
import { ImageUploadError, MissingFileError, RemoteAPIError } from '../src/errors.js';
import { createSilentLogger } from '../src/logger.js';
import { WooCommerceClient } from '../src/wooCommerceClient.js';

const WOO_CONFIG: WooCommerceConfig = {
  apiUrl: 'https://shop.test/wp-json/wc/v3/',
  consumerKey: 'ck_test',
  consumerSecret: 'test-secret',
  timeoutMs: 30000,
  uploadTimeoutMs: 60000,
  productPageSize: 20,
  mediaPageSize: 5,
  retry: { attempts: 3, backoffFactor: 0.5, statuses: [500, 502, 503, 504] }
};

interface ShopProduct {
  id: number;
  name: string;
  stock_quantity: number | null;
  images: { id: number }[];
}

interface ShopUpload {
  id: number;
  title: string;
  altText: string;
  post: string;
  filename: string | null;
}

interface RecordedRequest {
  method: string;
  url: string;
  timeout: number | undefined;
}

interface Override {
  status: number;
  data: unknown;
  remaining: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formField(body: string, name: string): string {
  const match = new RegExp(`name="${name}"\\r\\n\\r\\n([^\\r]*)\\r\\n`).exec(body);
  return match ? match[1] : '';
}

/** A WooCommerce store answering through the axios adapter, without a network. */
class FakeShop {
  readonly products = new Map<number, ShopProduct>();
  readonly uploads: ShopUpload[] = [];
  readonly requests: RecordedRequest[] = [];
  private readonly overrides = new Map<string, Override>();
  private readonly timeouts = new Set<string>();
  private nextMediaId = 100;

  addProduct(product: ShopProduct): void {
    this.products.set(product.id, product);
  }

  fail(method: string, url: string, status: number, data: unknown, times = Number.POSITIVE_INFINITY): void {
    this.overrides.set(`${method} ${url}`, { status, data, remaining: times });
  }

  timeOut(method: string, url: string): void {
    this.timeouts.add(`${method} ${url}`);
  }

  count(method: string, url: string): number {
    return this.requests.filter(request => request.method === method && request.url === url).length;
  }

  readonly adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const method = config.method ?? 'get';
    const url = config.url ?? '';
    this.requests.push({ method, url, timeout: config.timeout });
    const key = `${method} ${url}`;

    if (this.timeouts.has(key)) {
      throw new AxiosError(`timeout of ${config.timeout ?? 0}ms exceeded`, 'ECONNABORTED', config);
    }
    const override = this.overrides.get(key);
    if (override && override.remaining > 0) {
      override.remaining -= 1;
      return this.reply(config, override.status, override.data);
    }
    return this.route(config, method, url);
  };

  private route(config: InternalAxiosRequestConfig, method: string, url: string): AxiosResponse {
    const params: Record<string, unknown> = isRecord(config.params) ? config.params : {};
    const search = String(params.search ?? '').toLowerCase();

    if (method === 'get' && url === 'products') {
      const found = [...this.products.values()].filter(product => product.name.toLowerCase().includes(search));
      return this.reply(config, 200, found);
    }
    if (method === 'get' && url === 'media') {
      const found = this.uploads
        .filter(upload => upload.title.toLowerCase().includes(search))
        .map(upload => ({ id: upload.id, title: { rendered: upload.title } }));
      return this.reply(config, 200, found);
    }
    if (method === 'post' && url === 'media' && config.data instanceof FormData) {
      const body = config.data.getBuffer().toString('latin1');
      const filename = /name="file"; filename="([^"]*)"/.exec(body);
      const upload: ShopUpload = {
        id: this.nextMediaId,
        title: formField(body, 'title'),
        altText: formField(body, 'alt_text'),
        post: formField(body, 'post'),
        filename: filename ? filename[1] : null
      };
      this.nextMediaId += 1;
      this.uploads.push(upload);
      return this.reply(config, 201, { id: upload.id, title: { rendered: upload.title } });
    }

    const productMatch = /^products\/(\d+)$/.exec(url);
    const product = productMatch ? this.products.get(Number(productMatch[1])) : undefined;
    if (!product) {
      return this.reply(config, 404, { code: 'woocommerce_rest_product_invalid_id' });
    }
    if (method === 'get') {
      return this.reply(config, 200, product);
    }
    if (method === 'put' && typeof config.data === 'string') {
      const body: unknown = JSON.parse(config.data);
      if (isRecord(body) && Array.isArray(body.images)) {
        product.images = body.images.flatMap(image => (isRecord(image) && typeof image.id === 'number' ? [{ id: image.id }] : []));
      }
      return this.reply(config, 200, product);
    }
    return this.reply(config, 405, { code: 'method_not_allowed' });
  }

  private reply(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
    return { data, status, statusText: String(status), headers: {}, config };
  }
}

describe('WooCommerceClient', () => {
  let shop: FakeShop;
  let delays: number[];
  let client: WooCommerceClient;
  let tempDir: string;

  beforeEach(async () => {
    shop = new FakeShop();
    delays = [];
    client = new WooCommerceClient(WOO_CONFIG, {
      logger: createSilentLogger(),
      adapter: shop.adapter,
      sleep: async ms => {
        delays.push(ms);
      }
    });
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'woo-client-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function stageImage(name: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, Buffer.from([0xff, 0xd8, 0xff, 0xd9]));
    return filePath;
  }

  describe('findProductByName', () => {
    it('matches the product name exactly, ignoring case', async () => {
      shop.addProduct({ id: 7, name: 'Oak Chair', stock_quantity: 4, images: [] });
      shop.addProduct({ id: 8, name: 'Oak Chair Cushion', stock_quantity: 2, images: [] });

      const product = await client.findProductByName('oak chair');

      expect(product?.id).toBe(7);
      expect(shop.count('get', 'products')).toBe(1);
    });

    it('returns null when the search has no exact match', async () => {
      shop.addProduct({ id: 8, name: 'Oak Chair Cushion', stock_quantity: 2, images: [] });
      await expect(client.findProductByName('Oak Chair')).resolves.toBeNull();
    });

    it('skips the request for an empty name', async () => {
      await expect(client.findProductByName('')).resolves.toBeNull();
      await expect(client.mediaExists('')).resolves.toBe(false);
      expect(shop.requests).toHaveLength(0);
    });

    it('raises RemoteAPIError for a non-retryable status without retrying', async () => {
      shop.fail('get', 'products', 401, { code: 'woocommerce_rest_cannot_view' });

      const error = await client.findProductByName('Oak Chair').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteAPIError);
      expect(error).toMatchObject({ endpoint: 'products', status: 401 });
      expect(shop.count('get', 'products')).toBe(1);
      expect(delays).toEqual([]);
    });
  });

  describe('retries', () => {
    it('retries retryable statuses with exponential backoff and gives up after the last attempt', async () => {
      shop.fail('get', 'products', 503, { code: 'unavailable' });

      const error = await client.findProductByName('Oak Chair').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteAPIError);
      expect(error).toMatchObject({ status: 503, body: '{"code":"unavailable"}' });
      expect(shop.count('get', 'products')).toBe(3);
      expect(delays).toEqual([500, 1000]);
    });

    it('recovers when a retry succeeds', async () => {
      shop.addProduct({ id: 7, name: 'Oak Chair', stock_quantity: 4, images: [] });
      shop.fail('get', 'products', 502, '', 1);

      const product = await client.findProductByName('Oak Chair');

      expect(product?.id).toBe(7);
      expect(shop.count('get', 'products')).toBe(2);
      expect(delays).toEqual([500]);
    });

    it('maps repeated timeouts to a RemoteAPIError with status 0', async () => {
      shop.timeOut('get', 'products');

      const error = await client.findProductByName('Oak Chair').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteAPIError);
      expect(error).toMatchObject({ status: 0, body: 'request timed out' });
      expect(shop.count('get', 'products')).toBe(3);
      expect(delays).toEqual([500, 1000]);
    });
  });

  describe('uploadImage', () => {
    beforeEach(() => {
      shop.addProduct({ id: 7, name: 'Oak Chair', stock_quantity: 12, images: [] });
    });

    it('keeps the main image first and appends the others in upload order', async () => {
      await client.uploadImage(await stageImage('Oak Chair-1.jpg'), 7, true);
      await client.uploadImage(await stageImage('Oak Chair-2.jpg'), 7, false);
      await client.uploadImage(await stageImage('Oak Chair-3.jpg'), 7, false);

      expect(shop.products.get(7)?.images).toEqual([{ id: 100 }, { id: 101 }, { id: 102 }]);
    });

    it('puts a main image before the existing gallery and appends other images after it', async () => {
      shop.addProduct({ id: 7, name: 'Oak Chair', stock_quantity: 12, images: [{ id: 55 }] });

      await client.uploadImage(await stageImage('Oak Chair-1.jpg'), 7, true);
      expect(shop.products.get(7)?.images).toEqual([{ id: 100 }, { id: 55 }]);

      await client.uploadImage(await stageImage('Oak Chair-2.jpg'), 7, false);
      expect(shop.products.get(7)?.images).toEqual([{ id: 100 }, { id: 55 }, { id: 101 }]);
    });

    it('sends the file with its title, alt text and parent product', async () => {
      await expect(client.uploadImage(await stageImage('Oak Chair-1.jpg'), 7, true)).resolves.toBe(true);

      expect(shop.uploads).toEqual([
        { id: 100, title: 'Oak Chair-1.jpg', altText: 'Oak Chair-1', post: '7', filename: 'Oak Chair-1.jpg' }
      ]);
      const [upload] = shop.requests.filter(request => request.method === 'post');
      expect(upload.timeout).toBe(60000);
    });

    it('does not upload an image whose name is already in the media library', async () => {
      const imagePath = await stageImage('Oak Chair-1.jpg');

      await client.uploadImage(imagePath, 7, true);
      await expect(client.uploadImage(imagePath, 7, true)).resolves.toBe(true);

      expect(shop.count('post', 'media')).toBe(1);
      expect(shop.products.get(7)?.images).toEqual([{ id: 100 }]);
    });

    it('raises MissingFileError before any request for a missing file', async () => {
      const missing = path.join(tempDir, 'Oak Chair-9.jpg');

      const error = await client.uploadImage(missing, 7, false).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(MissingFileError);
      expect(error).toMatchObject({ path: missing });
      expect(shop.requests).toHaveLength(0);
    });

    it('raises RemoteAPIError when the media upload is rejected', async () => {
      shop.fail('post', 'media', 400, { code: 'rest_upload_unknown_error' });

      const error = await client.uploadImage(await stageImage('Oak Chair-1.jpg'), 7, true).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteAPIError);
      expect(error).toMatchObject({ endpoint: 'media', status: 400 });
      expect(shop.count('put', 'products/7')).toBe(0);
    });

    it('raises RemoteAPIError when the product update fails', async () => {
      shop.fail('put', 'products/7', 400, { code: 'woocommerce_rest_invalid_image' });

      const error = await client.uploadImage(await stageImage('Oak Chair-1.jpg'), 7, true).catch((caught: unknown) => caught);

      expect(error).toMatchObject({ endpoint: 'products/7', status: 400 });
    });

    it('reports a timed-out upload as ImageUploadError', async () => {
      const imagePath = await stageImage('Oak Chair-1.jpg');
      shop.timeOut('get', 'media');

      const error = await client.uploadImage(imagePath, 7, true).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ImageUploadError);
      expect(error).toMatchObject({ path: imagePath, message: `Upload of ${imagePath} failed: request timed out` });
    });
  });

  describe('getProductStock', () => {
    it('returns the stock quantity and 0 when the product tracks none', async () => {
      shop.addProduct({ id: 7, name: 'Oak Chair', stock_quantity: 12, images: [] });
      shop.addProduct({ id: 9, name: 'Pine Table', stock_quantity: null, images: [] });

      await expect(client.getProductStock(7)).resolves.toBe(12);
      await expect(client.getProductStock(9)).resolves.toBe(0);
    });

    it('raises RemoteAPIError for an unknown product', async () => {
      await expect(client.getProductStock(404)).rejects.toMatchObject({ endpoint: 'products/404', status: 404 });
    });
  });
});
